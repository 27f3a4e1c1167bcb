import { World } from '../tracer/World';
import { Camera } from '../tracer/Camera';
import { pointLight } from '../tracer/lights';
import { material } from '../tracer/Material';
import { CheckerPattern, StripePattern } from '../tracer/patterns';
import { Plane } from '../tracer/shapes/Plane';
import { Sphere } from '../tracer/shapes/Sphere';
import { WHITE, color, point, vector } from '../tracer/tuple';
import { chain, rotationX, rotationY, rotationZ, scaling, translation, viewTransform } from '../tracer/transforms';
import type { CameraSize, PresetResult } from './index';

/**
 * Balls on the Floor: three spheres on a checkered floor in front of a
 * striped wall, lit from above-left.
 */
export function createBallsOnTheFloorScene(size: CameraSize): PresetResult {
    const floor = new Plane({
        name: 'Floor',
        material: material({
            color: color(1, 0.9, 0.9),
            specular: 0,
            pattern: new CheckerPattern(color(1, 0.9, 0.9), color(0.6, 0.5, 0.5)),
        }),
    });

    const wall = new Plane({
        name: 'Back Wall',
        transform: chain(translation(0, 0, 5), rotationX(Math.PI / 2)),
        material: material({
            specular: 0,
            pattern: new StripePattern(color(0.9, 0.9, 1), color(0.7, 0.7, 0.9), rotationY(Math.PI / 4)),
        }),
    });

    const middle = new Sphere({
        name: 'Middle Ball',
        transform: translation(-0.5, 1, 0.5),
        material: material({
            color: color(0.1, 1, 0.5),
            diffuse: 0.7,
            specular: 0.3,
            pattern: new StripePattern(
                color(0.1, 1, 0.5),
                color(0.05, 0.6, 0.3),
                chain(rotationZ(Math.PI / 3), scaling(0.2, 0.2, 0.2))
            ),
        }),
    });

    const right = new Sphere({
        name: 'Right Ball',
        transform: chain(translation(1.5, 0.5, -0.5), scaling(0.5, 0.5, 0.5)),
        material: material({ color: color(0.5, 1, 0.1), diffuse: 0.7, specular: 0.3 }),
    });

    const left = new Sphere({
        name: 'Left Ball',
        transform: chain(translation(-1.5, 0.33, -0.75), scaling(0.33, 0.33, 0.33)),
        material: material({ color: color(1, 0.8, 0.1), diffuse: 0.7, specular: 0.3 }),
    });

    const world = new World(pointLight(point(-10, 10, -10), WHITE), [floor, wall, middle, right, left]);
    const camera = new Camera(
        size.width,
        size.height,
        size.fieldOfView,
        viewTransform(point(0, 1.5, -5), point(0, 1, 0), vector(0, 1, 0))
    );

    return { world, camera };
}
