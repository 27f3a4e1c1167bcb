/**
 * OBJ Parser: Wavefront OBJ meshes as triangle groups.
 *
 * Supported statements: `v`, `vn`, `f` (with `i`, `i/t`, `i//n` or `i/t/n`
 * references) and `g`. Polygons are fan-triangulated. Everything else is
 * counted in `ignored` and otherwise skipped.
 */

import { Tuple, point, vector } from '../tracer/tuple';
import { Group } from '../tracer/shapes/Group';
import { Triangle } from '../tracer/shapes/Triangle';
import { SmoothTriangle } from '../tracer/shapes/SmoothTriangle';
import { ParseError } from '../tracer/errors';
import type { Shape } from '../tracer/Shape';

export interface ObjParseResult {
    vertices: Tuple[];              // 0-based here, 1-based in the file
    normals: Tuple[];
    defaultGroup: Group;
    namedGroups: Map<string, Group>;
    ignored: number;                // Non-blank lines that were not understood
}

interface FaceVertex {
    position: Tuple;
    normal: Tuple | null;
}

export function parseObj(source: string): ObjParseResult {
    const vertices: Tuple[] = [];
    const normals: Tuple[] = [];
    const defaultGroup = new Group({ name: 'OBJ' });
    const namedGroups = new Map<string, Group>();
    let current = defaultGroup;
    let ignored = 0;

    for (const [index, rawLine] of source.split(/\r?\n/).entries()) {
        const line = rawLine.trim();
        if (line === '') continue;

        const [command, ...args] = line.split(/\s+/);
        const lineNumber = index + 1;

        switch (command) {
            case 'v':
            case 'vn': {
                const coords = parseCoords(args);
                if (!coords) { ignored++; continue; }
                if (command === 'v') vertices.push(point(...coords));
                else normals.push(vector(...coords));
                continue;
            }
            case 'f': {
                const refs = resolveFace(args, vertices, normals, lineNumber, rawLine);
                if (!refs) { ignored++; continue; }
                current.addChildren(...fanTriangulation(refs));
                continue;
            }
            case 'g': {
                const name = args.join(' ');
                if (name === '') { ignored++; continue; }
                let group = namedGroups.get(name);
                if (!group) {
                    group = new Group({ name });
                    namedGroups.set(name, group);
                    defaultGroup.addChild(group);
                }
                current = group;
                continue;
            }
            default:
                ignored++;
        }
    }

    if (ignored > 0) {
        console.warn(`[OBJ] Ignored ${ignored} unsupported or malformed line(s)`);
    }

    return { vertices, normals, defaultGroup, namedGroups, ignored };
}

/** The default group, which holds every named group and any ungrouped faces. */
export function objToGroup(result: ObjParseResult): Group {
    return result.defaultGroup;
}

function parseCoords(args: string[]): [number, number, number] | null {
    if (args.length < 3) return null;
    const [x, y, z] = args.slice(0, 3).map(Number);
    if (!Number.isFinite(x) || !Number.isFinite(y) || !Number.isFinite(z)) return null;
    return [x, y, z];
}

function resolveFace(
    args: string[],
    vertices: Tuple[],
    normals: Tuple[],
    line: number,
    source: string
): FaceVertex[] | null {
    if (args.length < 3) return null;
    const refs: FaceVertex[] = [];
    for (const arg of args) {
        const ref = resolveReference(arg, vertices, normals, line, source);
        if (!ref) return null;
        refs.push(ref);
    }
    return refs;
}

/**
 * Resolve one `i[/t[/n]]` reference. Negative indices count back from the
 * most recent entry. Returns null for a token that is not a reference at
 * all; throws when it points at something that does not exist.
 */
function resolveReference(
    token: string,
    vertices: Tuple[],
    normals: Tuple[],
    line: number,
    source: string
): FaceVertex | null {
    const [v, , n] = token.split('/');
    const vIndex = parseIndex(v);
    if (vIndex === null) return null;

    const position = lookup(vertices, vIndex);
    if (!position) throw new ParseError(`Face references missing vertex ${vIndex}`, line, source);

    if (n === undefined || n === '') return { position, normal: null };

    const nIndex = parseIndex(n);
    if (nIndex === null) return null;
    const normal = lookup(normals, nIndex);
    if (!normal) throw new ParseError(`Face references missing normal ${nIndex}`, line, source);

    return { position, normal };
}

function parseIndex(token: string): number | null {
    if (!/^-?\d+$/.test(token)) return null;
    return Number(token);
}

function lookup(list: Tuple[], index: number): Tuple | undefined {
    if (index === 0) return undefined;
    return list[index > 0 ? index - 1 : list.length + index];
}

/** Split a convex polygon into triangles sharing its first vertex. */
function fanTriangulation(refs: FaceVertex[]): Shape[] {
    const triangles: Shape[] = [];
    const smooth = refs.every(r => r.normal !== null);
    const first = refs[0];

    for (let i = 1; i < refs.length - 1; i++) {
        const a = refs[i];
        const b = refs[i + 1];
        const vertices = { p1: first.position, p2: a.position, p3: b.position };

        if (smooth && first.normal && a.normal && b.normal) {
            triangles.push(new SmoothTriangle(vertices, { n1: first.normal, n2: a.normal, n3: b.normal }));
        } else {
            triangles.push(new Triangle(vertices));
        }
    }

    return triangles;
}
