import { Ray } from './Ray';
import { Tuple, BLACK, color } from './tuple';
import { Intersections } from './Intersection';
import { PointLight, defaultLight, lighting } from './lights';
import { ShadingContext, prepareComputations, schlick } from './ShadingContext';
import { material } from './Material';
import { scaling } from './transforms';
import { Shape } from './Shape';
import { Sphere } from './shapes/Sphere';

/** Bounce budget for reflection/refraction when the caller gives none. */
export const DEFAULT_REMAINING = 5;

export interface WorldOptions {
    /**
     * Blend reflection and refraction by Schlick reflectance on materials that
     * are both reflective and transparent. Off: the two are summed unweighted.
     */
    fresnel?: boolean;
}

/**
 * One light and a flat list of top-level shapes. Groups and CSG nodes in
 * the list are descended by their own intersection routines.
 */
export class World {
    light: PointLight;
    objects: Shape[];
    fresnel: boolean;

    constructor(light: PointLight, objects: Shape[] = [], options: WorldOptions = {}) {
        this.light = light;
        this.objects = objects;
        this.fresnel = options.fresnel ?? false;
    }

    addObject(...shapes: Shape[]): this {
        this.objects.push(...shapes);
        return this;
    }

    intersectWorld(ray: Ray): Intersections {
        return Intersections.merge(this.objects.map(obj => obj.intersect(ray)));
    }

    /** Is anything between `point` and the light? */
    isShadowed(point: Tuple): boolean {
        const toLight = this.light.position.subtract(point);
        const distance = toLight.magnitude();
        if (distance === 0) return false;

        const hit = this.intersectWorld(new Ray(point, toLight.normalize())).hit();
        return hit !== null && hit.t < distance;
    }

    /** Color seen along `ray`; black when it hits nothing. */
    colorAt(ray: Ray, remaining: number = DEFAULT_REMAINING): Tuple {
        const xs = this.intersectWorld(ray);
        const hit = xs.hit();
        if (!hit) return BLACK;

        const comps = prepareComputations(hit, ray, xs);
        return this.shadeHit(comps, remaining);
    }

    shadeHit(comps: ShadingContext, remaining: number = DEFAULT_REMAINING): Tuple {
        const m = comps.object.material;
        const surface = lighting(
            m,
            this.light,
            comps.point,
            comps.eyeV,
            comps.normal,
            this.isShadowed(comps.overPoint),
            comps.object
        );

        const reflected = this.reflectedColor(comps, remaining);
        const refracted = this.refractedColor(comps, remaining);

        if (this.fresnel && m.reflective > 0 && m.transparency > 0) {
            const reflectance = schlick(comps);
            return surface
                .add(reflected.scale(reflectance))
                .add(refracted.scale(1 - reflectance));
        }

        return surface.add(reflected).add(refracted);
    }

    reflectedColor(comps: ShadingContext, remaining: number = DEFAULT_REMAINING): Tuple {
        const reflective = comps.object.material.reflective;
        if (reflective === 0 || remaining <= 0) return BLACK;

        const reflectRay = new Ray(comps.overPoint, comps.reflectV);
        return this.colorAt(reflectRay, remaining - 1).scale(reflective);
    }

    refractedColor(comps: ShadingContext, remaining: number = DEFAULT_REMAINING): Tuple {
        const transparency = comps.object.material.transparency;
        if (transparency === 0 || remaining <= 0) return BLACK;

        // Snell's law, vector form
        const nRatio = comps.n1 / comps.n2;
        const cosI = comps.eyeV.dot(comps.normal);
        const sin2T = nRatio * nRatio * (1 - cosI * cosI);
        if (sin2T > 1) return BLACK; // Total internal reflection

        const cosT = Math.sqrt(1 - sin2T);
        const direction = comps.normal
            .scale(nRatio * cosI - cosT)
            .subtract(comps.eyeV.scale(nRatio));

        const refractRay = new Ray(comps.underPoint, direction);
        return this.colorAt(refractRay, remaining - 1).scale(transparency);
    }
}

/**
 * Two concentric spheres under the default light: an outer unit sphere in
 * a green-yellow diffuse material and an inner sphere scaled by one half.
 */
export function defaultWorld(options: WorldOptions = {}): World {
    const outer = new Sphere({
        name: 'Outer Sphere',
        material: material({ color: color(0.8, 1.0, 0.6), diffuse: 0.7, specular: 0.2 }),
    });
    const inner = new Sphere({ name: 'Inner Sphere', transform: scaling(0.5, 0.5, 0.5) });
    return new World(defaultLight(), [outer, inner], options);
}
