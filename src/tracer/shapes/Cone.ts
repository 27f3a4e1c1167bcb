import { Shape } from '../Shape';
import { Ray } from '../Ray';
import { Tuple, vector } from '../tuple';
import { Intersection, Intersections, intersection } from '../Intersection';
import { EPSILON, solveQuadratic } from '../math_solvers';
import { CylinderOptions, withinRadius } from './Cylinder';

/**
 * Double-napped cone, apexes meeting at the local origin and opening along
 * ±y. Truncation and caps behave as for Cylinder, except that a cap's
 * radius equals |y| at that cap.
 */
export class Cone extends Shape {
    readonly kind = 'cone';
    minimum: number;
    maximum: number;
    closed: boolean;

    constructor(options: CylinderOptions = {}) {
        super({ name: 'Cone', ...options });
        this.minimum = options.minimum ?? -Infinity;
        this.maximum = options.maximum ?? Infinity;
        this.closed = options.closed ?? false;
    }

    protected localIntersect(ray: Ray): Intersections {
        const hits: Intersection[] = [];
        const { x: dx, y: dy, z: dz } = ray.direction;
        const { x: ox, y: oy, z: oz } = ray.origin;

        // x^2 - y^2 + z^2 = 0
        const A = dx * dx - dy * dy + dz * dz;
        const B = 2 * ox * dx - 2 * oy * dy + 2 * oz * dz;
        const C = ox * ox - oy * oy + oz * oz;

        if (Math.abs(A) < EPSILON) {
            // Parallel to one nappe: at most one hit, on the other nappe.
            // With B ~ 0 as well the ray misses the walls entirely.
            if (Math.abs(B) >= EPSILON) {
                const t = -C / (2 * B);
                const y = oy + t * dy;
                if (this.minimum < y && y < this.maximum) hits.push(intersection(t, this));
            }
        } else {
            const roots = solveQuadratic(A, B, C);
            if (!roots) return new Intersections();

            for (const t of roots) {
                const y = oy + t * dy;
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
            if (withinRadius(ray, t, Math.abs(capY))) hits.push(intersection(t, this));
        }
    }

    protected localNormalAt(p: Tuple): Tuple {
        const dist = p.x * p.x + p.z * p.z;
        const capRadius = p.y * p.y;
        if (dist < capRadius && p.y >= this.maximum - EPSILON) return vector(0, 1, 0);
        if (dist < capRadius && p.y <= this.minimum + EPSILON) return vector(0, -1, 0);

        // y component points away from the apex side the point is on
        let y = Math.sqrt(dist);
        if (p.y > 0) y = -y;
        return vector(p.x, y, p.z);
    }
}
