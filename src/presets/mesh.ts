import { World } from '../tracer/World';
import { Camera } from '../tracer/Camera';
import { pointLight } from '../tracer/lights';
import { Material, material } from '../tracer/Material';
import { CheckerPattern } from '../tracer/patterns';
import { Shape } from '../tracer/Shape';
import { Plane } from '../tracer/shapes/Plane';
import { Group } from '../tracer/shapes/Group';
import { WHITE, color, point, vector } from '../tracer/tuple';
import { chain, rotationY, scaling, translation, viewTransform } from '../tracer/transforms';
import { objToGroup, parseObj } from '../state/objParser';
import type { CameraSize, PresetResult } from './index';

// Unit octahedron, split into two named halves
const OCTAHEDRON_OBJ = `
v 0 1 0
v 1 0 0
v 0 0 1
v -1 0 0
v 0 0 -1
v 0 -1 0

g upper
f 1 2 3
f 1 3 4
f 1 4 5
f 1 5 2

g lower
f 6 3 2
f 6 4 3
f 6 5 4
f 6 2 5
`;

// Groups don't carry materials down to their children
function paint(shape: Shape, m: Material): void {
    if (shape instanceof Group) {
        for (const child of shape.children) paint(child, m);
    } else {
        shape.setMaterial(m);
    }
}

/**
 * Mesh: a faceted gem imported from an OBJ string, each half in its own
 * color, standing on a tiled floor.
 */
export function createMeshScene(size: CameraSize): PresetResult {
    const parsed = parseObj(OCTAHEDRON_OBJ);

    const upper = parsed.namedGroups.get('upper');
    const lower = parsed.namedGroups.get('lower');
    if (upper) paint(upper, material({ color: color(0.3, 0.8, 0.9), diffuse: 0.6, specular: 0.9, reflective: 0.2 }));
    if (lower) paint(lower, material({ color: color(0.2, 0.5, 0.9), diffuse: 0.6, specular: 0.9, reflective: 0.2 }));

    const gem = objToGroup(parsed);
    gem.name = 'Gem';
    gem.setTransform(chain(translation(0, 1, 0), rotationY(Math.PI / 5), scaling(1, 1.2, 1)));

    const floor = new Plane({
        name: 'Floor',
        material: material({
            specular: 0,
            reflective: 0.05,
            pattern: new CheckerPattern(color(0.9, 0.9, 0.9), color(0.3, 0.3, 0.35)),
        }),
    });

    const world = new World(pointLight(point(-6, 8, -6), WHITE), [floor, gem]);
    const camera = new Camera(
        size.width,
        size.height,
        size.fieldOfView,
        viewTransform(point(0, 2, -4), point(0, 0.9, 0), vector(0, 1, 0))
    );

    return { world, camera };
}
