/**
 * ShapeRegistry: the single mapping between shape kinds and the type
 * names used in scene files. Adding a shape kind means adding it here and
 * the scene serializer picks it up.
 */
import type { Shape, ShapeKind } from './Shape';

const TYPE_NAMES: Record<ShapeKind, string> = {
    'sphere': 'Sphere',
    'plane': 'Plane',
    'cube': 'Cube',
    'cylinder': 'Cylinder',
    'cone': 'Cone',
    'triangle': 'Triangle',
    'smooth-triangle': 'SmoothTriangle',
    'group': 'Group',
    'csg': 'CSG',
};

/** Master list of all shape kinds. */
export const SHAPE_KINDS: readonly ShapeKind[] = [
    'sphere',
    'plane',
    'cube',
    'cylinder',
    'cone',
    'triangle',
    'smooth-triangle',
    'group',
    'csg',
];

/** Map from type name → kind. */
export const shapeKindsByName = new Map<string, ShapeKind>(
    SHAPE_KINDS.map((kind): [string, ShapeKind] => [TYPE_NAMES[kind], kind])
);

export function getShapeTypeName(shape: Shape): string {
    return TYPE_NAMES[shape.kind];
}
