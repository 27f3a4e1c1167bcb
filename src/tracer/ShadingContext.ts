import { Ray } from './Ray';
import { Tuple } from './tuple';
import { Intersection, Intersections } from './Intersection';
import { EPSILON } from './math_solvers';
import type { Shape } from './Shape';

/** Everything shading needs about one hit, computed once. */
export interface ShadingContext {
    t: number;
    object: Shape;
    point: Tuple;       // World hit point
    eyeV: Tuple;        // Toward the viewer
    normal: Tuple;      // Flipped to face the eye when `inside`
    inside: boolean;
    reflectV: Tuple;
    n1: number;         // Refractive index of the medium being exited
    n2: number;         // Refractive index of the medium being entered
    overPoint: Tuple;   // point + normal·ε: origin for shadow and reflection rays
    underPoint: Tuple;  // point - normal·ε: origin for refraction rays
}

/**
 * Walk the full intersection list, tracking which shapes the ray is inside
 * (the container stack), to find the media on either side of `hit`.
 */
export function refractiveIndices(hit: Intersection, xs: Intersections): [number, number] {
    const containers: Shape[] = [];
    const topIndex = () => containers.length === 0 ? 1.0 : containers[containers.length - 1].material.refractiveIndex;

    let n1 = 1.0;
    for (const i of xs) {
        const isHit = i === hit;
        if (isHit) n1 = topIndex();

        // Already inside this object: the intersection exits it
        const idx = containers.indexOf(i.object);
        if (idx === -1) containers.push(i.object);
        else containers.splice(idx, 1);

        if (isHit) return [n1, topIndex()];
    }

    // `hit` was not in `xs`; treat it as the lone entry into its object
    return [1.0, hit.object.material.refractiveIndex];
}

/**
 * Precompute the shading data for `hit`. Pass the full sorted list the hit
 * came from for correct n1/n2; without it the hit is treated as the only
 * intersection along the ray.
 */
export function prepareComputations(hit: Intersection, ray: Ray, xs: Intersections = Intersections.of(hit)): ShadingContext {
    const point = ray.position(hit.t);
    const eyeV = ray.direction.negate();
    let normal = hit.object.normalAt(point, hit);

    let inside = false;
    if (normal.dot(eyeV) < 0) {
        inside = true;
        normal = normal.negate();
    }

    const [n1, n2] = refractiveIndices(hit, xs);

    return {
        t: hit.t,
        object: hit.object,
        point,
        eyeV,
        normal,
        inside,
        reflectV: ray.direction.reflect(normal),
        n1,
        n2,
        overPoint: point.add(normal.scale(EPSILON)),
        underPoint: point.subtract(normal.scale(EPSILON)),
    };
}

/**
 * Schlick's approximation of the Fresnel reflectance at the hit: the
 * fraction of light reflected rather than refracted.
 */
export function schlick(comps: ShadingContext): number {
    let cos = comps.eyeV.dot(comps.normal);

    // Total internal reflection is only possible going into a less dense medium
    if (comps.n1 > comps.n2) {
        const n = comps.n1 / comps.n2;
        const sin2T = n * n * (1 - cos * cos);
        if (sin2T > 1) return 1.0;
        cos = Math.sqrt(1 - sin2T);
    }

    const r0 = ((comps.n1 - comps.n2) / (comps.n1 + comps.n2)) ** 2;
    return r0 + (1 - r0) * (1 - cos) ** 5;
}
