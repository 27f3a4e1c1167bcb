import { Shape, ShapeOptions } from '../Shape';
import { Ray } from '../Ray';
import { Intersection, Intersections } from '../Intersection';
import { PreconditionError } from '../errors';
import { Group } from './Group';

export enum CsgOperation {
    Union = 'union',
    Intersection = 'intersection',
    Difference = 'difference'
}

/**
 * Should an intersection survive the operation?
 * `leftHit`: the intersection belongs to the left operand.
 * `inLeft`/`inRight`: whether the ray is currently inside each operand,
 * evaluated before this intersection toggles its side.
 */
export function intersectionAllowed(op: CsgOperation, leftHit: boolean, inLeft: boolean, inRight: boolean): boolean {
    switch (op) {
        case CsgOperation.Union:
            return (leftHit && !inRight) || (!leftHit && !inLeft);
        case CsgOperation.Intersection:
            return (leftHit && inRight) || (!leftHit && inLeft);
        case CsgOperation.Difference:
            return (leftHit && !inRight) || (!leftHit && inLeft);
    }
}

/**
 * Boolean combination of exactly two solids. Either operand may itself be
 * a Group or another CSG.
 */
export class CSG extends Group {
    readonly kind = 'csg';
    readonly operation: CsgOperation;
    readonly left: Shape;
    readonly right: Shape;

    constructor(operation: CsgOperation, left: Shape, right: Shape, options: ShapeOptions = {}) {
        super({ name: `CSG ${operation}`, ...options });
        this.operation = operation;
        this.left = left;
        this.right = right;
        this.attach(left);
        this.attach(right);
    }

    addChild(_child: Shape): this {
        throw new PreconditionError('CSG operands are fixed at construction');
    }

    removeChild(_child: Shape): void {
        throw new PreconditionError('CSG operands are fixed at construction');
    }

    protected localIntersect(ray: Ray): Intersections {
        const all = this.left.intersect(ray).concat(this.right.intersect(ray));
        return this.filterIntersections(all);
    }

    filterIntersections(xs: Intersections): Intersections {
        let inLeft = false;
        let inRight = false;
        const kept: Intersection[] = [];

        for (const i of xs) {
            const leftHit = this.left.includes(i.object);
            if (intersectionAllowed(this.operation, leftHit, inLeft, inRight)) kept.push(i);

            if (leftHit) inLeft = !inLeft;
            else inRight = !inRight;
        }

        return new Intersections(kept);
    }
}
