import { Matrix4 } from 'three';
import { v4 as uuidv4 } from 'uuid';
import { Ray } from './Ray';
import { Tuple } from './tuple';
import { Intersection, Intersections } from './Intersection';
import { Material, DEFAULT_MATERIAL } from './Material';
import { precondition } from './errors';
import { applyToNormal, applyTransform, inverse, transpose } from './transforms';
import type { Group } from './shapes/Group';

export type ShapeKind =
    | 'sphere'
    | 'plane'
    | 'cube'
    | 'cylinder'
    | 'cone'
    | 'triangle'
    | 'smooth-triangle'
    | 'group'
    | 'csg';

export interface ShapeOptions {
    name?: string;
    transform?: Matrix4;
    material?: Material;
}

/**
 * Base class for everything that can sit in a scene.
 *
 * Subclasses supply `localIntersect` and `localNormalAt` in their own
 * object space; this class moves rays and points between spaces. Shapes are
 * compared by identity: two shapes with identical fields are still distinct.
 */
export abstract class Shape {
    abstract readonly kind: ShapeKind;
    id: string;
    name: string;
    material: Material;
    /** Enclosing Group or CSG. Set only through `Group.addChild`. */
    parent: Group | null = null;
    version: number = 0; // Increments on every transform change

    private _transform: Matrix4;
    private _inverse: Matrix4 = new Matrix4();
    private _inverseTranspose: Matrix4 = new Matrix4();
    /** Tracks last version for which the inverses were computed (dirty-flag). */
    private _matrixVersion: number = -1;

    constructor(options: ShapeOptions = {}) {
        this.id = uuidv4();
        this.name = options.name ?? 'Unnamed Shape';
        this.material = options.material ?? DEFAULT_MATERIAL;
        this._transform = options.transform?.clone() ?? new Matrix4();
    }

    /** A copy; use `setTransform` to move the shape. */
    get transform(): Matrix4 {
        return this._transform.clone();
    }

    setTransform(m: Matrix4): this {
        this._transform = m.clone();
        this.version++;
        return this;
    }

    setMaterial(m: Material): this {
        this.material = m;
        return this;
    }

    get inverseTransform(): Matrix4 {
        this.updateMatrices();
        return this._inverse;
    }

    updateMatrices() {
        if (this._matrixVersion === this.version) return;
        this._inverse = inverse(this._transform);
        this._inverseTranspose = transpose(this._inverse);
        this._matrixVersion = this.version;
    }

    // Template method: only this shape's own transform is applied here.
    // Ancestors have already moved the ray when a Group passes it down.
    intersect(ray: Ray): Intersections {
        const localRay = ray.transform(this.inverseTransform);
        return this.localIntersect(localRay);
    }

    /**
     * Surface normal at a world-space point. `hit` is required by shapes
     * whose normal depends on where on the face it was struck (smooth triangles).
     */
    normalAt(worldPoint: Tuple, hit?: Intersection): Tuple {
        precondition(worldPoint.isPoint(), `Normal query location must be a point, received ${worldPoint}`);
        const localPoint = this.worldToObject(worldPoint);
        const localNormal = this.localNormalAt(localPoint, hit);
        return this.normalToWorld(localNormal);
    }

    /** Apply every ancestor's inverse, outermost first, then this shape's own. */
    worldToObject(p: Tuple): Tuple {
        const inParentSpace = this.parent ? this.parent.worldToObject(p) : p;
        return applyTransform(this.inverseTransform, inParentSpace);
    }

    /** Inverse-transpose this shape's transform, renormalize, then repeat up the ancestor chain. */
    normalToWorld(normal: Tuple): Tuple {
        this.updateMatrices();
        const n = applyToNormal(this._inverseTranspose, normal).normalize();
        return this.parent ? this.parent.normalToWorld(n) : n;
    }

    /** True when `other` is this shape or, for composites, anywhere beneath it. */
    includes(other: Shape): boolean {
        return this === other;
    }

    protected abstract localIntersect(localRay: Ray): Intersections;
    protected abstract localNormalAt(localPoint: Tuple, hit?: Intersection): Tuple;
}
