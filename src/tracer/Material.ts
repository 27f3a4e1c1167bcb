import { Tuple, WHITE } from './tuple';
import { MaterialError, precondition } from './errors';
import type { Pattern } from './patterns';

/**
 * Phong surface attributes plus the reflection/refraction coefficients.
 * Typical ranges: ambient/diffuse/specular in [0, 1], shininess 10..200,
 * refractive index 1 (vacuum) .. 2.4 (diamond). Only non-negativity is enforced.
 */
export interface Material {
    readonly color: Tuple;
    readonly pattern: Pattern | null;
    readonly ambient: number;
    readonly diffuse: number;
    readonly specular: number;
    readonly shininess: number;
    readonly reflective: number;
    readonly transparency: number;
    readonly refractiveIndex: number;
}

const COEFFICIENTS = [
    'ambient',
    'diffuse',
    'specular',
    'shininess',
    'reflective',
    'transparency',
    'refractiveIndex',
] as const;

export const DEFAULT_MATERIAL: Material = Object.freeze({
    color: WHITE,
    pattern: null,
    ambient: 0.1,
    diffuse: 0.9,
    specular: 0.9,
    shininess: 200,
    reflective: 0,
    transparency: 0,
    refractiveIndex: 1,
});

export function material(props: Partial<Material> = {}): Material {
    const m: Material = { ...DEFAULT_MATERIAL, ...props };
    precondition(m.color.isColor(), `Material color must be a color, received ${m.color}`);
    for (const field of COEFFICIENTS) {
        if (m[field] < 0) throw new MaterialError(field, m[field]);
    }
    return Object.freeze(m);
}

/** A glassy default, handy for refraction scenes. */
export function glass(props: Partial<Material> = {}): Material {
    return material({ transparency: 1, refractiveIndex: 1.5, ...props });
}
