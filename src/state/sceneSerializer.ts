/**
 * Scene Serializer: Save/Load scenes as plain-text scene files.
 *
 * Format: one block per light, camera or shape, separated by blank lines.
 * Lines starting with # are comments.
 * Each block starts with [Type] and lists key = value pairs.
 * Shapes name their enclosing Group or CSG through `parent = <id>`; a CSG's
 * operands are the first and second blocks that name it.
 */

import { Matrix4 } from 'three';
import { Tuple, color, point, vector } from '../tracer/tuple';
import {
    fromRowMajor,
    identity,
    matricesEqual,
    toRowMajor,
    viewTransform
} from '../tracer/transforms';
import { DEFAULT_MATERIAL, Material, material } from '../tracer/Material';
import { CheckerPattern, GradientPattern, Pattern, RingPattern, StripePattern } from '../tracer/patterns';
import { MaterialError, ParseError } from '../tracer/errors';
import { PointLight, defaultLight, pointLight } from '../tracer/lights';
import { World } from '../tracer/World';
import { Camera } from '../tracer/Camera';
import { Shape, ShapeKind, ShapeOptions } from '../tracer/Shape';
import { getShapeTypeName, shapeKindsByName } from '../tracer/ShapeRegistry';
import { Sphere } from '../tracer/shapes/Sphere';
import { Plane } from '../tracer/shapes/Plane';
import { Cube } from '../tracer/shapes/Cube';
import { Cylinder } from '../tracer/shapes/Cylinder';
import { Cone } from '../tracer/shapes/Cone';
import { Triangle } from '../tracer/shapes/Triangle';
import { SmoothTriangle } from '../tracer/shapes/SmoothTriangle';
import { Group } from '../tracer/shapes/Group';
import { CSG, CsgOperation } from '../tracer/shapes/CSG';

export interface SceneData {
    world: World;
    camera: Camera | null;
}

// ════════════════════════════════════════════════════════════
//  SERIALIZE
// ════════════════════════════════════════════════════════════

export function serializeScene(world: World, camera: Camera | null = null): string {
    const lines: string[] = [];
    lines.push('# Whitted Tracer Scene');
    lines.push(`# Saved: ${new Date().toISOString()}`);
    lines.push('');

    lines.push('[Light]');
    lines.push(`position = ${fmtTuple(world.light.position)}`);
    lines.push(`intensity = ${fmtTuple(world.light.intensity)}`);
    lines.push('');

    if (camera) {
        writeCamera(camera, lines);
        lines.push('');
    }

    for (const shape of world.objects) {
        writeShape(shape, null, lines);
    }

    return lines.join('\n');
}

function fmt(n: number): string {
    // Remove trailing zeros, max 8 decimal places
    return parseFloat(n.toFixed(8)).toString();
}

function fmtTuple(t: Tuple): string {
    return `${fmt(t.x)}, ${fmt(t.y)}, ${fmt(t.z)}`;
}

function fmtMatrix(m: Matrix4): string {
    return toRowMajor(m).map(fmt).join(', ');
}

function writeCamera(camera: Camera, lines: string[]) {
    lines.push('[Camera]');
    lines.push(`width = ${camera.hsize}`);
    lines.push(`height = ${camera.vsize}`);
    lines.push(`fov = ${fmt(camera.fieldOfView)}`);
    lines.push(`transform = ${fmtMatrix(camera.transform)}`);
}

// Depth-first so every parent block precedes its children
function writeShape(shape: Shape, parent: Shape | null, lines: string[]) {
    lines.push(`[${getShapeTypeName(shape)}]`);
    lines.push(`id = ${shape.id}`);
    lines.push(`name = ${shape.name}`);
    if (parent) lines.push(`parent = ${parent.id}`);
    if (!matricesEqual(shape.transform, identity())) {
        lines.push(`transform = ${fmtMatrix(shape.transform)}`);
    }

    writeShapeProps(shape, lines);
    if (!(shape instanceof Group)) writeMaterial(shape.material, lines);
    lines.push('');

    if (shape instanceof Group) {
        for (const child of shape.children) writeShape(child, shape, lines);
    }
}

function writeShapeProps(shape: Shape, lines: string[]) {
    if (shape instanceof Cylinder || shape instanceof Cone) {
        lines.push(`minimum = ${fmt(shape.minimum)}`);
        lines.push(`maximum = ${fmt(shape.maximum)}`);
        lines.push(`closed = ${shape.closed}`);
    } else if (shape instanceof SmoothTriangle) {
        lines.push(`p1 = ${fmtTuple(shape.p1)}`);
        lines.push(`p2 = ${fmtTuple(shape.p2)}`);
        lines.push(`p3 = ${fmtTuple(shape.p3)}`);
        lines.push(`n1 = ${fmtTuple(shape.n1)}`);
        lines.push(`n2 = ${fmtTuple(shape.n2)}`);
        lines.push(`n3 = ${fmtTuple(shape.n3)}`);
    } else if (shape instanceof Triangle) {
        lines.push(`p1 = ${fmtTuple(shape.p1)}`);
        lines.push(`p2 = ${fmtTuple(shape.p2)}`);
        lines.push(`p3 = ${fmtTuple(shape.p3)}`);
    } else if (shape instanceof CSG) {
        lines.push(`operation = ${shape.operation}`);
    }
}

const SCALAR_FIELDS = [
    'ambient',
    'diffuse',
    'specular',
    'shininess',
    'reflective',
    'transparency',
    'refractiveIndex',
] as const;

/** Only fields that differ from the default material are written. */
function writeMaterial(m: Material, lines: string[]) {
    if (!m.color.equals(DEFAULT_MATERIAL.color)) lines.push(`material.color = ${fmtTuple(m.color)}`);
    for (const field of SCALAR_FIELDS) {
        if (m[field] !== DEFAULT_MATERIAL[field]) lines.push(`material.${field} = ${fmt(m[field])}`);
    }
    if (m.pattern) writePattern(m.pattern, lines);
}

function writePattern(p: Pattern, lines: string[]) {
    if (p.kind === 'test') {
        console.warn('[Scene] Test patterns are not saved');
        return;
    }
    lines.push(`pattern.type = ${p.kind}`);
    lines.push(`pattern.a = ${fmtTuple(p.a)}`);
    lines.push(`pattern.b = ${fmtTuple(p.b)}`);
    if (!matricesEqual(p.transform, identity())) {
        lines.push(`pattern.transform = ${fmtMatrix(p.transform)}`);
    }
}

// ════════════════════════════════════════════════════════════
//  DESERIALIZE
// ════════════════════════════════════════════════════════════

interface Prop { value: string; line: number; source: string }
type PropMap = Map<string, Prop>;

interface Block { type: string; line: number; source: string; props: PropMap }

interface ShapeEntry {
    block: Block;
    kind: ShapeKind;
    id: string;
    parentId: string | null;
}

export function deserializeScene(text: string): SceneData {
    const blocks = parseBlocks(text);
    let light: PointLight | null = null;
    let camera: Camera | null = null;
    const entries: ShapeEntry[] = [];

    for (const block of blocks) {
        if (block.type === 'Light') {
            light = pointLight(
                tuple(block.props, 'position', point, point(-10, 10, -10)),
                tuple(block.props, 'intensity', color, color(1, 1, 1))
            );
            continue;
        }
        if (block.type === 'Camera') {
            camera = createCamera(block.props);
            continue;
        }

        const kind = shapeKindsByName.get(block.type);
        if (!kind) {
            console.warn(`[Scene] Unknown block type "${block.type}" at line ${block.line}, skipping`);
            continue;
        }
        entries.push({
            block,
            kind,
            id: str(block.props, 'id', `shape-${entries.length + 1}`),
            parentId: block.props.get('parent')?.value ?? null,
        });
    }

    if (!light) {
        console.warn('[Scene] No [Light] block, using the default light');
        light = defaultLight();
    }

    const world = new World(light);
    for (const shape of buildShapes(entries)) world.addObject(shape);
    return { world, camera };
}

/**
 * Build every shape, wire up parents, and return the top-level ones in file
 * order. CSG operands are built before the CSG that owns them.
 */
function buildShapes(entries: ShapeEntry[]): Shape[] {
    const byId = new Map<string, ShapeEntry>();
    for (const entry of entries) {
        if (byId.has(entry.id)) {
            throw new ParseError(`Duplicate shape id "${entry.id}"`, entry.block.line, entry.block.source);
        }
        byId.set(entry.id, entry);
    }

    const built = new Map<string, Shape>();
    const building = new Set<string>();
    const build = (entry: ShapeEntry): Shape => {
        const existing = built.get(entry.id);
        if (existing) return existing;
        if (building.has(entry.id)) {
            throw new ParseError(`Shape "${entry.id}" is nested inside itself`, entry.block.line, entry.block.source);
        }
        building.add(entry.id);

        let shape: Shape;
        if (entry.kind === 'csg') {
            const operands = entries.filter(e => e.parentId === entry.id);
            if (operands.length !== 2) {
                throw new ParseError(
                    `CSG "${entry.id}" needs exactly two operands, found ${operands.length}`,
                    entry.block.line,
                    entry.block.source
                );
            }
            shape = new CSG(
                operation(entry.block),
                build(operands[0]),
                build(operands[1]),
                shapeOptions(entry.block.props)
            );
        } else {
            shape = createShape(entry.kind, entry.block);
        }

        shape.id = entry.id;
        building.delete(entry.id);
        built.set(entry.id, shape);
        return shape;
    };

    const topLevel: Shape[] = [];
    for (const entry of entries) {
        const shape = build(entry);

        if (entry.parentId === null) {
            topLevel.push(shape);
            continue;
        }

        const parentEntry = byId.get(entry.parentId);
        if (!parentEntry) {
            console.warn(`[Scene] Shape "${entry.id}" names unknown parent "${entry.parentId}", placing it at the top level`);
            topLevel.push(shape);
            continue;
        }
        if (parentEntry.kind === 'csg') continue; // attached as an operand

        const parent = build(parentEntry);
        if (!(parent instanceof Group) || parent === shape) {
            throw new ParseError(`Parent "${entry.parentId}" cannot hold children`, entry.block.line, entry.block.source);
        }
        parent.addChild(shape);
    }

    return topLevel;
}

function parseBlocks(text: string): Block[] {
    const blocks: Block[] = [];
    let current: Block | null = null;

    for (const [index, rawLine] of text.split('\n').entries()) {
        const line = rawLine.trim();
        const lineNumber = index + 1;

        // Skip comments and empty lines
        if (line.startsWith('#') || line === '') {
            // Empty line ends current block
            if (line === '' && current) {
                blocks.push(current);
                current = null;
            }
            continue;
        }

        // Type header
        const headerMatch = line.match(/^\[(\w+)\]$/);
        if (headerMatch) {
            // Save previous block if any
            if (current) blocks.push(current);
            current = { type: headerMatch[1], line: lineNumber, source: rawLine, props: new Map() };
            continue;
        }

        // Key = value
        const eqIdx = line.indexOf('=');
        if (eqIdx > 0 && current) {
            const key = line.substring(0, eqIdx).trim();
            const value = line.substring(eqIdx + 1).trim();
            current.props.set(key, { value, line: lineNumber, source: rawLine });
            continue;
        }

        throw new ParseError('Expected a [Type] header or a key = value line', lineNumber, rawLine);
    }

    // Final block
    if (current) blocks.push(current);

    return blocks;
}

// --- Value readers ---

function num(props: PropMap, key: string, fallback: number): number {
    const prop = props.get(key);
    if (prop === undefined) return fallback;
    const v = parseFloat(prop.value);
    if (isNaN(v)) throw new ParseError(`"${key}" must be a number`, prop.line, prop.source);
    return v;
}

function int(props: PropMap, key: string, fallback: number): number {
    const v = num(props, key, fallback);
    const prop = props.get(key);
    if (prop && (!Number.isInteger(v) || v <= 0)) {
        throw new ParseError(`"${key}" must be a positive integer`, prop.line, prop.source);
    }
    return v;
}

function str(props: PropMap, key: string, fallback: string): string {
    return props.get(key)?.value ?? fallback;
}

function bool(props: PropMap, key: string, fallback: boolean): boolean {
    const prop = props.get(key);
    if (prop === undefined) return fallback;
    if (prop.value === 'true') return true;
    if (prop.value === 'false') return false;
    throw new ParseError(`"${key}" must be true or false`, prop.line, prop.source);
}

function numbers(prop: Prop, count: number): number[] {
    const values = prop.value.split(',').map(s => parseFloat(s.trim()));
    if (values.length !== count || values.some(v => isNaN(v))) {
        throw new ParseError(`Expected ${count} comma-separated numbers`, prop.line, prop.source);
    }
    return values;
}

function tuple(
    props: PropMap,
    key: string,
    make: (x: number, y: number, z: number) => Tuple,
    fallback: Tuple
): Tuple {
    const prop = props.get(key);
    if (prop === undefined) return fallback;
    const [x, y, z] = numbers(prop, 3);
    return make(x, y, z);
}

function matrix(props: PropMap, key: string): Matrix4 {
    const prop = props.get(key);
    if (prop === undefined) return identity();
    return fromRowMajor(numbers(prop, 16));
}

function operation(block: Block): CsgOperation {
    const prop = block.props.get('operation');
    switch (prop?.value) {
        case CsgOperation.Union: return CsgOperation.Union;
        case CsgOperation.Intersection: return CsgOperation.Intersection;
        case CsgOperation.Difference: return CsgOperation.Difference;
    }
    throw new ParseError(
        'CSG operation must be union, intersection or difference',
        prop?.line ?? block.line,
        prop?.source ?? block.source
    );
}

// --- Builders ---

/** A hand-written file may give `from`/`to`/`up` instead of a matrix. */
function createCamera(props: PropMap): Camera {
    const transform = props.has('transform')
        ? matrix(props, 'transform')
        : viewTransform(
            tuple(props, 'from', point, point(0, 0, 0)),
            tuple(props, 'to', point, point(0, 0, -1)),
            tuple(props, 'up', vector, vector(0, 1, 0))
        );
    return new Camera(int(props, 'width', 100), int(props, 'height', 100), num(props, 'fov', Math.PI / 3), transform);
}

function shapeOptions(props: PropMap): ShapeOptions {
    const options: ShapeOptions = { transform: matrix(props, 'transform'), material: readMaterial(props) };
    const name = props.get('name');
    if (name) options.name = name.value;
    return options;
}

function readMaterial(props: PropMap): Material {
    const overrides: { -readonly [K in keyof Material]?: Material[K] } = {
        color: tuple(props, 'material.color', color, DEFAULT_MATERIAL.color),
        pattern: readPattern(props),
    };
    for (const field of SCALAR_FIELDS) {
        overrides[field] = num(props, `material.${field}`, DEFAULT_MATERIAL[field]);
    }

    try {
        return material(overrides);
    } catch (err) {
        if (err instanceof MaterialError) {
            const prop = props.get(`material.${err.field}`);
            throw new ParseError(err.message, prop?.line ?? 0, prop?.source ?? '');
        }
        throw err;
    }
}

function readPattern(props: PropMap): Pattern | null {
    const type = props.get('pattern.type');
    if (type === undefined) return null;

    const a = tuple(props, 'pattern.a', color, color(1, 1, 1));
    const b = tuple(props, 'pattern.b', color, color(0, 0, 0));
    const transform = matrix(props, 'pattern.transform');

    switch (type.value) {
        case 'stripe': return new StripePattern(a, b, transform);
        case 'gradient': return new GradientPattern(a, b, transform);
        case 'ring': return new RingPattern(a, b, transform);
        case 'checker': return new CheckerPattern(a, b, transform);
        default:
            throw new ParseError(`Unknown pattern type "${type.value}"`, type.line, type.source);
    }
}

function requiredTuple(block: Block, key: string, make: (x: number, y: number, z: number) => Tuple): Tuple {
    const prop = block.props.get(key);
    if (prop === undefined) throw new ParseError(`${block.type} needs "${key}"`, block.line, block.source);
    const [x, y, z] = numbers(prop, 3);
    return make(x, y, z);
}

function createShape(kind: Exclude<ShapeKind, 'csg'>, block: Block): Shape {
    const props = block.props;
    const options = shapeOptions(props);
    switch (kind) {
        case 'sphere': return new Sphere(options);
        case 'plane': return new Plane(options);
        case 'cube': return new Cube(options);
        case 'cylinder':
        case 'cone': {
            const bounds = {
                ...options,
                minimum: num(props, 'minimum', -Infinity),
                maximum: num(props, 'maximum', Infinity),
                closed: bool(props, 'closed', false),
            };
            return kind === 'cylinder' ? new Cylinder(bounds) : new Cone(bounds);
        }
        case 'triangle':
            return new Triangle(triangleVertices(block), options);
        case 'smooth-triangle':
            return new SmoothTriangle(
                triangleVertices(block),
                {
                    n1: requiredTuple(block, 'n1', vector),
                    n2: requiredTuple(block, 'n2', vector),
                    n3: requiredTuple(block, 'n3', vector),
                },
                options
            );
        case 'group':
            // Groups carry no material of their own
            return new Group(
                options.name === undefined
                    ? { transform: options.transform }
                    : { name: options.name, transform: options.transform }
            );
    }
}

function triangleVertices(block: Block) {
    return {
        p1: requiredTuple(block, 'p1', point),
        p2: requiredTuple(block, 'p2', point),
        p3: requiredTuple(block, 'p3', point),
    };
}
