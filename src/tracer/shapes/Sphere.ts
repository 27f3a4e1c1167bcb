import { Shape, ShapeOptions } from '../Shape';
import { Ray } from '../Ray';
import { Tuple, point } from '../tuple';
import { Intersections, intersection } from '../Intersection';
import { solveQuadratic } from '../math_solvers';

/**
 * Unit sphere centered on the local origin. Position, size and orientation
 * come entirely from the transform.
 *
 * A tangent ray produces the same `t` twice; both are kept.
 */
export class Sphere extends Shape {
    readonly kind = 'sphere';

    constructor(options: ShapeOptions = {}) {
        super({ name: 'Sphere', ...options });
    }

    protected localIntersect(ray: Ray): Intersections {
        // |O + tD|^2 = 1
        const sphereToRay = ray.origin.subtract(point(0, 0, 0));
        const a = ray.direction.dot(ray.direction);
        const b = 2 * ray.direction.dot(sphereToRay);
        const c = sphereToRay.dot(sphereToRay) - 1;

        const roots = solveQuadratic(a, b, c);
        if (!roots) return new Intersections();

        return Intersections.of(intersection(roots[0], this), intersection(roots[1], this));
    }

    protected localNormalAt(localPoint: Tuple): Tuple {
        return localPoint.subtract(point(0, 0, 0));
    }
}
