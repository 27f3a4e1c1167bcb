import { Shape, ShapeOptions } from '../Shape';
import { Ray } from '../Ray';
import { Tuple, vector } from '../tuple';
import { Intersections, intersection } from '../Intersection';
import { checkAxis } from '../math_solvers';

/**
 * Axis-aligned cube spanning [-1, 1] on every local axis, treated as three
 * pairs of parallel planes (slab method).
 */
export class Cube extends Shape {
    readonly kind = 'cube';

    constructor(options: ShapeOptions = {}) {
        super({ name: 'Cube', ...options });
    }

    protected localIntersect(ray: Ray): Intersections {
        const [xtMin, xtMax] = checkAxis(ray.origin.x, ray.direction.x);
        const [ytMin, ytMax] = checkAxis(ray.origin.y, ray.direction.y);
        const [ztMin, ztMax] = checkAxis(ray.origin.z, ray.direction.z);

        // Largest entry, smallest exit
        const tMin = Math.max(xtMin, ytMin, ztMin);
        const tMax = Math.min(xtMax, ytMax, ztMax);

        // Written negated so a NaN slab (origin on a face, direction ~0) misses
        if (!(tMin <= tMax)) return new Intersections();
        return Intersections.of(intersection(tMin, this), intersection(tMax, this));
    }

    protected localNormalAt(p: Tuple): Tuple {
        // The face is the axis with the largest magnitude. Strict comparisons
        // keep corners and edges on the x faces first, then y.
        const ax = Math.abs(p.x), ay = Math.abs(p.y), az = Math.abs(p.z);
        const maxC = Math.max(ax, ay, az);

        if (maxC === ax) return vector(p.x, 0, 0);
        if (maxC === ay) return vector(0, p.y, 0);
        return vector(0, 0, p.z);
    }
}
