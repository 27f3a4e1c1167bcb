/** Offset used to nudge points off a surface and to treat near-zero denominators as zero. */
export const EPSILON = 1e-5;

/** Component-wise tolerance for comparing tuples and matrices. */
export const EQUALITY_EPSILON = 1e-4;

export function almostEqual(a: number, b: number, epsilon: number = EQUALITY_EPSILON): boolean {
    if (a === b) return true; // also covers matching infinities
    return Math.abs(a - b) < epsilon;
}

/**
 * Solves Quadratic Equation At^2 + Bt + C = 0
 * Returns both real roots in ascending order. A tangent ray (zero
 * discriminant) yields the same root twice; callers count on the pair.
 */
export function solveQuadratic(A: number, B: number, C: number): [number, number] | null {
    const disc = B * B - 4 * A * C;
    if (disc < 0) return null;

    const sqrtDisc = Math.sqrt(disc);
    const t0 = (-B - sqrtDisc) / (2 * A);
    const t1 = (-B + sqrtDisc) / (2 * A);

    return t0 <= t1 ? [t0, t1] : [t1, t0];
}

/**
 * Slab test for one axis of the [-1, 1] box.
 * A direction component near zero is multiplied by signed infinity instead
 * of divided, so the entry/exit times keep the sign of the numerators.
 */
export function checkAxis(origin: number, direction: number, min: number = -1, max: number = 1): [number, number] {
    const tMinNumerator = min - origin;
    const tMaxNumerator = max - origin;

    let tMin: number, tMax: number;
    if (Math.abs(direction) >= EPSILON) {
        tMin = tMinNumerator / direction;
        tMax = tMaxNumerator / direction;
    } else {
        tMin = tMinNumerator * Infinity;
        tMax = tMaxNumerator * Infinity;
    }

    if (tMin > tMax) [tMin, tMax] = [tMax, tMin];
    return [tMin, tMax];
}
