import { Shape, ShapeOptions } from '../Shape';
import { Ray } from '../Ray';
import { Tuple, vector } from '../tuple';
import { Intersection, Intersections, intersection } from '../Intersection';
import { EPSILON, solveQuadratic } from '../math_solvers';

export interface CylinderOptions extends ShapeOptions {
    minimum?: number;   // Exclusive lower y bound
    maximum?: number;   // Exclusive upper y bound
    closed?: boolean;   // Cap the truncated ends
}

/**
 * Unit-radius tube around the local y axis, infinite unless truncated by
 * `minimum`/`maximum`. A tangent ray yields the same `t` twice.
 */
export class Cylinder extends Shape {
    readonly kind = 'cylinder';
    minimum: number;
    maximum: number;
    closed: boolean;

    constructor(options: CylinderOptions = {}) {
        super({ name: 'Cylinder', ...options });
        this.minimum = options.minimum ?? -Infinity;
        this.maximum = options.maximum ?? Infinity;
        this.closed = options.closed ?? false;
    }

    protected localIntersect(ray: Ray): Intersections {
        const hits: Intersection[] = [];
        const dx = ray.direction.x, dz = ray.direction.z;
        const ox = ray.origin.x, oz = ray.origin.z;

        // x^2 + z^2 = 1
        const A = dx * dx + dz * dz;

        // A ~ 0: ray runs parallel to the axis and can only hit the caps
        if (Math.abs(A) >= EPSILON) {
            const B = 2 * ox * dx + 2 * oz * dz;
            const C = ox * ox + oz * oz - 1;
            const roots = solveQuadratic(A, B, C);
            if (!roots) return new Intersections();

            for (const t of roots) {
                const y = ray.origin.y + t * ray.direction.y;
                if (this.minimum < y && y < this.maximum) hits.push(intersection(t, this));
            }
        }

        this.intersectCaps(ray, hits);
        return new Intersections(hits);
    }

    private intersectCaps(ray: Ray, hits: Intersection[]): void {
        if (!this.closed || Math.abs(ray.direction.y) < EPSILON) return;

        for (const capY of [this.minimum, this.maximum]) {
            const t = (capY - ray.origin.y) / ray.direction.y;
            if (withinRadius(ray, t, 1)) hits.push(intersection(t, this));
        }
    }

    protected localNormalAt(p: Tuple): Tuple {
        const dist = p.x * p.x + p.z * p.z;
        if (dist < 1 && p.y >= this.maximum - EPSILON) return vector(0, 1, 0);
        if (dist < 1 && p.y <= this.minimum + EPSILON) return vector(0, -1, 0);
        return vector(p.x, 0, p.z);
    }
}

/** Is the ray at `t` within `radius` of the y axis? Shared with Cone's caps. */
export function withinRadius(ray: Ray, t: number, radius: number): boolean {
    const x = ray.origin.x + t * ray.direction.x;
    const z = ray.origin.z + t * ray.direction.z;
    return x * x + z * z <= radius * radius;
}
