import { Shape, ShapeOptions } from '../Shape';
import { Ray } from '../Ray';
import { Tuple } from '../tuple';
import { Intersections } from '../Intersection';
import { PreconditionError, precondition } from '../errors';

/**
 * A node with no surface of its own. Its transform applies implicitly to
 * every descendant: the ray is moved into the group's space once, then each
 * child applies its own transform on top.
 */
export class Group extends Shape {
    readonly kind: 'group' | 'csg' = 'group';
    protected readonly _children: Shape[] = [];

    constructor(options: ShapeOptions = {}) {
        super({ name: 'Group', ...options });
    }

    get children(): readonly Shape[] {
        return this._children;
    }

    /** Adopt `child`, detaching it from any previous parent first. */
    addChild(child: Shape): this {
        this.attach(child);
        return this;
    }

    addChildren(...children: Shape[]): this {
        for (const child of children) this.addChild(child);
        return this;
    }

    removeChild(child: Shape): void {
        const idx = this._children.indexOf(child);
        if (idx === -1) return;
        this._children.splice(idx, 1);
        child.parent = null;
    }

    protected attach(child: Shape): void {
        // A group beneath `child` (or `child` itself) would make the graph cyclic
        precondition(!child.includes(this), `Cannot add ${child.name} beneath itself`);
        if (child.parent) child.parent.removeChild(child);
        this._children.push(child);
        child.parent = this;
    }

    includes(other: Shape): boolean {
        if (this === other) return true;
        return this._children.some(child => child.includes(other));
    }

    protected localIntersect(ray: Ray): Intersections {
        return Intersections.merge(this._children.map(child => child.intersect(ray)));
    }

    protected localNormalAt(_localPoint: Tuple): Tuple {
        // Intersections always reference primitives, so this is a caller bug
        throw new PreconditionError(`${this.name} has no surface; query the primitive that was hit`);
    }
}
