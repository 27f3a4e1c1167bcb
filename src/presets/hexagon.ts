import { World } from '../tracer/World';
import { Camera } from '../tracer/Camera';
import { pointLight } from '../tracer/lights';
import { Material, material } from '../tracer/Material';
import { Plane } from '../tracer/shapes/Plane';
import { Sphere } from '../tracer/shapes/Sphere';
import { Cylinder } from '../tracer/shapes/Cylinder';
import { Group } from '../tracer/shapes/Group';
import { WHITE, color, point, vector } from '../tracer/tuple';
import { chain, rotationX, rotationY, rotationZ, scaling, translation, viewTransform } from '../tracer/transforms';
import type { CameraSize, PresetResult } from './index';

const FRAME = material({ color: color(0.75, 0.3, 0.2), diffuse: 0.7, specular: 0.6, shininess: 120, reflective: 0.2 });

function hexagonCorner(m: Material): Sphere {
    return new Sphere({ name: 'Corner', transform: chain(translation(0, 0, -1), scaling(0.25, 0.25, 0.25)), material: m });
}

function hexagonEdge(m: Material): Cylinder {
    return new Cylinder({
        name: 'Edge',
        minimum: 0,
        maximum: 1,
        transform: chain(
            translation(0, 0, -1),
            rotationY(-Math.PI / 6),
            rotationZ(-Math.PI / 2),
            scaling(0.25, 1, 0.25)
        ),
        material: m,
    });
}

/** One corner and the edge leaving it, rotated into place as a unit. */
function hexagonSide(index: number, m: Material): Group {
    return new Group({ name: `Side ${index}`, transform: rotationY((index * Math.PI) / 3) })
        .addChildren(hexagonCorner(m), hexagonEdge(m));
}

/**
 * Hexagon: six corner spheres joined by cylinder edges, built from nested
 * groups so each side only knows its own local layout.
 */
export function createHexagonScene(size: CameraSize): PresetResult {
    const floor = new Plane({
        name: 'Floor',
        transform: translation(0, -0.5, 0),
        material: material({ color: color(0.9, 0.9, 0.85), specular: 0 }),
    });

    const hexagon = new Group({
        name: 'Hexagon',
        transform: chain(translation(0, 0.6, 0), rotationX(-Math.PI / 6)),
    });
    for (let i = 0; i < 6; i++) hexagon.addChild(hexagonSide(i, FRAME));

    const world = new World(pointLight(point(-5, 8, -8), WHITE), [floor, hexagon]);
    const camera = new Camera(
        size.width,
        size.height,
        size.fieldOfView,
        viewTransform(point(0, 2.5, -3.5), point(0, 0.2, 0), vector(0, 1, 0))
    );

    return { world, camera };
}
