import { Shape, ShapeOptions } from '../Shape';
import { Ray } from '../Ray';
import { Tuple, vector } from '../tuple';
import { Intersections, intersection } from '../Intersection';
import { EPSILON } from '../math_solvers';

/**
 * Infinite plane spanning local XZ through the origin.
 * A ray parallel to (or lying in) the plane misses it.
 */
export class Plane extends Shape {
    readonly kind = 'plane';

    constructor(options: ShapeOptions = {}) {
        super({ name: 'Plane', ...options });
    }

    protected localIntersect(ray: Ray): Intersections {
        if (Math.abs(ray.direction.y) < EPSILON) return new Intersections();

        const t = -ray.origin.y / ray.direction.y;
        return Intersections.of(intersection(t, this));
    }

    protected localNormalAt(_localPoint: Tuple): Tuple {
        return vector(0, 1, 0);
    }
}
