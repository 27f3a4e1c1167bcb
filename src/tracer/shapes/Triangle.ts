import { Shape, ShapeOptions } from '../Shape';
import { Ray } from '../Ray';
import { Tuple } from '../tuple';
import { Intersections, intersection } from '../Intersection';
import { EPSILON } from '../math_solvers';
import { precondition } from '../errors';

export interface BarycentricHit {
    t: number;
    u: number;
    v: number;
}

/**
 * Möller–Trumbore ray/triangle test against the triangle (p1, p1+e1, p1+e2).
 * Returns null for a ray parallel to the triangle's plane or outside its edges.
 */
export function mollerTrumbore(ray: Ray, p1: Tuple, e1: Tuple, e2: Tuple): BarycentricHit | null {
    const dirCrossE2 = ray.direction.cross(e2);
    const det = e1.dot(dirCrossE2);
    if (Math.abs(det) < EPSILON) return null;

    const f = 1 / det;
    const p1ToOrigin = ray.origin.subtract(p1);
    const u = f * p1ToOrigin.dot(dirCrossE2);
    if (u < 0 || u > 1) return null;

    const originCrossE1 = p1ToOrigin.cross(e1);
    const v = f * ray.direction.dot(originCrossE1);
    if (v < 0 || u + v > 1) return null;

    const t = f * e2.dot(originCrossE1);
    return { t, u, v };
}

export interface TriangleVertices {
    p1: Tuple;
    p2: Tuple;
    p3: Tuple;
}

/** Flat-shaded triangle; edges and face normal are fixed at construction. */
export class Triangle extends Shape {
    readonly kind = 'triangle';
    readonly p1: Tuple;
    readonly p2: Tuple;
    readonly p3: Tuple;
    readonly e1: Tuple;
    readonly e2: Tuple;
    /** e2 × e1, unnormalized; each normal query normalizes it */
    readonly faceNormal: Tuple;

    constructor(vertices: TriangleVertices, options: ShapeOptions = {}) {
        super({ name: 'Triangle', ...options });
        const { p1, p2, p3 } = vertices;
        precondition(p1.isPoint() && p2.isPoint() && p3.isPoint(), 'Triangle vertices must be points');
        this.p1 = p1;
        this.p2 = p2;
        this.p3 = p3;
        this.e1 = p2.subtract(p1);
        this.e2 = p3.subtract(p1);
        this.faceNormal = this.e2.cross(this.e1);
    }

    protected localIntersect(ray: Ray): Intersections {
        const hit = mollerTrumbore(ray, this.p1, this.e1, this.e2);
        if (!hit) return new Intersections();
        return Intersections.of(intersection(hit.t, this, hit.u, hit.v));
    }

    protected localNormalAt(_localPoint: Tuple): Tuple {
        return this.faceNormal.normalize();
    }
}
