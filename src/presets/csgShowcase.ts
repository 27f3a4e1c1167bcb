import { World } from '../tracer/World';
import { Camera } from '../tracer/Camera';
import { pointLight } from '../tracer/lights';
import { material } from '../tracer/Material';
import { CheckerPattern, RingPattern } from '../tracer/patterns';
import { Plane } from '../tracer/shapes/Plane';
import { Sphere } from '../tracer/shapes/Sphere';
import { Cube } from '../tracer/shapes/Cube';
import { Cylinder } from '../tracer/shapes/Cylinder';
import { Cone } from '../tracer/shapes/Cone';
import { CSG, CsgOperation } from '../tracer/shapes/CSG';
import { WHITE, color, point, vector } from '../tracer/tuple';
import { chain, rotationY, scaling, translation, viewTransform } from '../tracer/transforms';
import type { CameraSize, PresetResult } from './index';

const RED = material({ color: color(0.9, 0.25, 0.2), diffuse: 0.8, specular: 0.3 });
const BLUE = material({ color: color(0.2, 0.35, 0.9), diffuse: 0.8, specular: 0.3 });
const GOLD = material({ color: color(0.95, 0.75, 0.2), diffuse: 0.7, specular: 0.6, reflective: 0.15 });

/**
 * CSG Showcase: the three boolean operations side by side:
 *   left:   cube minus sphere (difference)
 *   middle: cube ∩ sphere, a rounded die (intersection)
 *   right:  capped cylinder ∪ cone, a pencil tip (union)
 */
export function createCsgShowcaseScene(size: CameraSize): PresetResult {
    const floor = new Plane({
        name: 'Floor',
        material: material({
            specular: 0,
            pattern: new CheckerPattern(color(0.85, 0.85, 0.85), color(0.55, 0.55, 0.55), scaling(0.5, 0.5, 0.5)),
        }),
    });

    const carved = new CSG(
        CsgOperation.Difference,
        new Cube({ name: 'Block', material: RED }),
        new Sphere({ name: 'Scoop', transform: scaling(1.3, 1.3, 1.3), material: BLUE }),
        { name: 'Carved Block', transform: chain(translation(-3, 1, 0), rotationY(Math.PI / 5)) }
    );

    const die = new CSG(
        CsgOperation.Intersection,
        new Cube({ name: 'Die Body', material: BLUE }),
        new Sphere({ name: 'Die Rounding', transform: scaling(1.35, 1.35, 1.35), material: BLUE }),
        { name: 'Rounded Die', transform: chain(translation(0, 1, 0), rotationY(-Math.PI / 6)) }
    );

    const pencil = new CSG(
        CsgOperation.Union,
        new Cylinder({
            name: 'Shaft',
            minimum: 0,
            maximum: 1.5,
            closed: true,
            transform: scaling(0.5, 1, 0.5),
            material: material({
                color: GOLD.color,
                pattern: new RingPattern(GOLD.color, color(0.8, 0.55, 0.1), scaling(0.1, 0.1, 0.1)),
            }),
        }),
        new Cone({
            name: 'Tip',
            minimum: -1,
            maximum: 0,
            closed: true,
            transform: chain(translation(0, 2, 0), scaling(0.5, 0.5, 0.5)),
            material: GOLD,
        }),
        { name: 'Pencil', transform: translation(3, 0, 0) }
    );

    const world = new World(pointLight(point(-8, 10, -10), WHITE), [floor, carved, die, pencil]);
    const camera = new Camera(
        size.width,
        size.height,
        size.fieldOfView,
        viewTransform(point(0, 4, -8), point(0, 0.8, 0), vector(0, 1, 0))
    );

    return { world, camera };
}
