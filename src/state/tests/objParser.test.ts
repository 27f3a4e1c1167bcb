import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { objToGroup, parseObj } from "../objParser";
import { Triangle } from "../../tracer/shapes/Triangle";
import { SmoothTriangle } from "../../tracer/shapes/SmoothTriangle";
import { Group } from "../../tracer/shapes/Group";
import { ParseError } from "../../tracer/errors";
import { point, vector } from "../../tracer/tuple";
import { expectTuple } from "../../tracer/tests/helpers";

// ─── Helper: narrow a child to a flat triangle ────────────────────────
function triangleAt(group: Group, index: number): Triangle {
    const child = group.children[index];
    if (!(child instanceof Triangle)) throw new Error(`child ${index} is not a Triangle`);
    return child;
}

const QUAD = [
    "v -1 1 0",
    "v -1 0 0",
    "v 1 0 0",
    "v 1 1 0",
].join("\n");

describe("parseObj", () => {
    beforeEach(() => {
        vi.spyOn(console, "warn").mockImplementation(() => undefined);
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    test("unrecognised lines are counted and reported", () => {
        const result = parseObj([
            "There was a young lady named Bright",
            "who traveled much faster than light.",
            "",
            "She set out one day",
            "in a relative way,",
            "and came back the previous night.",
        ].join("\n"));
        expect(result.ignored).toBe(5);
        expect(result.defaultGroup.children.length).toBe(0);
        expect(console.warn).toHaveBeenCalledWith("[OBJ] Ignored 5 unsupported or malformed line(s)");
    });

    test("vertex records", () => {
        const result = parseObj(["v -1 1 0", "v -1.0000 0.5000 0.0000", "v 1 0 0", "v 1 1 0"].join("\n"));
        expect(result.vertices.length).toBe(4);
        expectTuple(result.vertices[0], point(-1, 1, 0));
        expectTuple(result.vertices[1], point(-1, 0.5, 0));
        expectTuple(result.vertices[3], point(1, 1, 0));
        expect(result.ignored).toBe(0);
    });

    test("vertex normal records", () => {
        const result = parseObj(["vn 0 0 1", "vn 0.707 0 -0.707", "vn 1 2 3"].join("\n"));
        expectTuple(result.normals[0], vector(0, 0, 1));
        expectTuple(result.normals[1], vector(0.707, 0, -0.707));
        expectTuple(result.normals[2], vector(1, 2, 3));
    });

    test("triangle faces", () => {
        const result = parseObj([QUAD, "", "f 1 2 3", "f 1 3 4"].join("\n"));
        const g = result.defaultGroup;
        const t1 = triangleAt(g, 0);
        const t2 = triangleAt(g, 1);
        expect(t1.p1).toBe(result.vertices[0]);
        expect(t1.p2).toBe(result.vertices[1]);
        expect(t1.p3).toBe(result.vertices[2]);
        expect(t2.p1).toBe(result.vertices[0]);
        expect(t2.p2).toBe(result.vertices[2]);
        expect(t2.p3).toBe(result.vertices[3]);
    });

    test("polygons are fan-triangulated", () => {
        const result = parseObj([QUAD, "v 0 2 0", "f 1 2 3 4 5"].join("\n"));
        const g = result.defaultGroup;
        expect(g.children.length).toBe(3);
        const t3 = triangleAt(g, 2);
        expect(t3.p1).toBe(result.vertices[0]);
        expect(t3.p2).toBe(result.vertices[3]);
        expect(t3.p3).toBe(result.vertices[4]);
    });

    test("named groups become children of the default group", () => {
        const result = parseObj([QUAD, "g FirstGroup", "f 1 2 3", "g SecondGroup", "f 1 3 4"].join("\n"));
        const first = result.namedGroups.get("FirstGroup");
        const second = result.namedGroups.get("SecondGroup");
        expect(first?.children.length).toBe(1);
        expect(second?.children.length).toBe(1);
        expect(first?.parent).toBe(result.defaultGroup);

        const g = objToGroup(result);
        expect(g).toBe(result.defaultGroup);
        expect(g.children).toEqual([first, second]);
    });

    test("returning to a named group reuses it", () => {
        const result = parseObj([QUAD, "g A", "f 1 2 3", "g B", "f 1 3 4", "g A", "f 2 3 4"].join("\n"));
        expect(result.namedGroups.size).toBe(2);
        expect(result.namedGroups.get("A")?.children.length).toBe(2);
    });

    test("faces with normals make smooth triangles", () => {
        const result = parseObj([
            "v 0 1 0",
            "v -1 0 0",
            "v 1 0 0",
            "vn -1 0 0",
            "vn 1 0 0",
            "vn 0 1 0",
            "f 1//3 2//1 3//2",
            "f 1/0/3 2/102/1 3/14/2",
        ].join("\n"));
        const g = result.defaultGroup;
        expect(g.children.length).toBe(2);
        for (const child of g.children) {
            expect(child).toBeInstanceOf(SmoothTriangle);
            if (child instanceof SmoothTriangle) {
                expect(child.p1).toBe(result.vertices[0]);
                expect(child.p2).toBe(result.vertices[1]);
                expect(child.p3).toBe(result.vertices[2]);
                expect(child.n1).toBe(result.normals[2]);
                expect(child.n2).toBe(result.normals[0]);
                expect(child.n3).toBe(result.normals[1]);
            }
        }
    });

    test("texture-only references give flat triangles", () => {
        const result = parseObj([QUAD, "f 1/1 2/2 3/3"].join("\n"));
        expect(result.defaultGroup.children[0]).toBeInstanceOf(Triangle);
    });

    test("negative indices count back from the last vertex", () => {
        const result = parseObj([QUAD, "f -3 -2 -1"].join("\n"));
        const t = triangleAt(result.defaultGroup, 0);
        expect(t.p1).toBe(result.vertices[1]);
        expect(t.p3).toBe(result.vertices[3]);
    });

    test("malformed statements are ignored", () => {
        const result = parseObj([QUAD, "v 1 two 3", "f 1 2", "f 1 x 3", "g", "vt 0.5 0.5", "s off"].join("\n"));
        expect(result.vertices.length).toBe(4);
        expect(result.defaultGroup.children.length).toBe(0);
        expect(result.ignored).toBe(6);
    });

    test("a reference to a missing vertex is a parse error", () => {
        expect(() => parseObj([QUAD, "f 1 2 7"].join("\n"))).toThrow(ParseError);
    });

    test("the error carries the line", () => {
        try {
            parseObj([QUAD, "f 1//1 2//1 3//1"].join("\n"));
            expect.unreachable();
        } catch (err) {
            expect(err).toBeInstanceOf(ParseError);
            if (err instanceof ParseError) {
                expect(err.line).toBe(5);
                expect(err.source).toBe("f 1//1 2//1 3//1");
            }
        }
    });

    test("index zero is never valid", () => {
        expect(() => parseObj([QUAD, "f 0 1 2"].join("\n"))).toThrow(ParseError);
    });
});
