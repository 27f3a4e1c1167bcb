import { World } from '../tracer/World';
import { Camera } from '../tracer/Camera';
import { pointLight } from '../tracer/lights';
import { glass, material } from '../tracer/Material';
import { CheckerPattern } from '../tracer/patterns';
import { Plane } from '../tracer/shapes/Plane';
import { Sphere } from '../tracer/shapes/Sphere';
import { Cube } from '../tracer/shapes/Cube';
import { BLACK, WHITE, color, point, vector } from '../tracer/tuple';
import { chain, rotationY, scaling, translation, viewTransform } from '../tracer/transforms';
import type { CameraSize, PresetResult } from './index';

/**
 * Glass and Mirror: a hollow glass ball (an air bubble inside a glass
 * sphere) in front of a mirrored slab, over a faintly reflective floor.
 * Looks best with Fresnel blending on.
 */
export function createGlassAndMirrorScene(size: CameraSize): PresetResult {
    const floor = new Plane({
        name: 'Floor',
        material: material({
            pattern: new CheckerPattern(color(0.35, 0.35, 0.35), color(0.65, 0.65, 0.65)),
            specular: 0,
            reflective: 0.1,
        }),
    });

    const mirror = new Cube({
        name: 'Mirror',
        transform: chain(translation(0.5, 1.5, 4), rotationY(-Math.PI / 8), scaling(2.5, 1.5, 0.1)),
        material: material({
            color: color(0.05, 0.05, 0.08),
            diffuse: 0.1,
            specular: 1,
            shininess: 300,
            reflective: 0.9,
        }),
    });

    const lens = new Sphere({
        name: 'Glass Ball',
        transform: translation(0, 1, 0),
        material: glass({
            color: BLACK,
            ambient: 0,
            diffuse: 0.1,
            specular: 1,
            shininess: 300,
            reflective: 0.9,
            transparency: 0.9,
        }),
    });

    const bubble = new Sphere({
        name: 'Air Bubble',
        transform: chain(translation(0, 1, 0), scaling(0.5, 0.5, 0.5)),
        material: glass({
            color: BLACK,
            ambient: 0,
            diffuse: 0,
            specular: 1,
            shininess: 300,
            reflective: 0.9,
            transparency: 0.9,
            refractiveIndex: 1.0000034,
        }),
    });

    const marble = new Sphere({
        name: 'Red Marble',
        transform: chain(translation(-1.8, 0.4, 1.5), scaling(0.4, 0.4, 0.4)),
        material: material({ color: color(0.9, 0.2, 0.15), diffuse: 0.8, specular: 0.4 }),
    });

    const world = new World(pointLight(point(-4.9, 6, -5), WHITE), [floor, mirror, lens, bubble, marble]);
    const camera = new Camera(
        size.width,
        size.height,
        size.fieldOfView,
        viewTransform(point(-1.2, 2.2, -5), point(0, 0.9, 0), vector(0, 1, 0))
    );

    return { world, camera };
}
