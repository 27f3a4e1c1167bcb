import { describe, expect, test } from "vitest";
import { Group } from "../shapes/Group";
import { Sphere } from "../shapes/Sphere";
import { Ray } from "../Ray";
import { point, vector } from "../tuple";
import { chain, identity, matricesEqual, rotationX, rotationY, rotationZ, scaling, translation } from "../transforms";
import { PreconditionError } from "../errors";
import { expectTuple } from "./helpers";

describe("Group", () => {
    test("starts empty with the identity transform", () => {
        const g = new Group();
        expect(g.children.length).toBe(0);
        expect(matricesEqual(g.transform, identity())).toBe(true);
    });

    test("adding a child sets its parent", () => {
        const g = new Group();
        const s = new Sphere();
        g.addChild(s);
        expect(g.children).toContain(s);
        expect(s.parent).toBe(g);
    });

    test("moving a child detaches it from the old group", () => {
        const g1 = new Group();
        const g2 = new Group();
        const s = new Sphere();
        g1.addChild(s);
        g2.addChild(s);
        expect(g1.children.length).toBe(0);
        expect(g2.children).toEqual([s]);
        expect(s.parent).toBe(g2);
    });

    test("removing a child clears its parent", () => {
        const g = new Group();
        const s = new Sphere();
        g.addChild(s);
        g.removeChild(s);
        expect(g.children.length).toBe(0);
        expect(s.parent).toBeNull();
    });

    test("cycles are rejected", () => {
        const outer = new Group();
        const inner = new Group();
        outer.addChild(inner);
        expect(() => inner.addChild(outer)).toThrow(PreconditionError);
        expect(() => outer.addChild(outer)).toThrow(PreconditionError);
    });

    test("includes searches the whole subtree", () => {
        const outer = new Group();
        const inner = new Group();
        const s = new Sphere();
        inner.addChild(s);
        outer.addChild(inner);
        expect(outer.includes(s)).toBe(true);
        expect(outer.includes(new Sphere())).toBe(false);
    });

    test("a group has no surface of its own", () => {
        expect(() => new Group().normalAt(point(0, 0, 0))).toThrow(PreconditionError);
    });
});

describe("Group intersection", () => {
    test("empty group", () => {
        expect(new Group().intersect(new Ray(point(0, 0, 0), vector(0, 0, 1))).length).toBe(0);
    });

    test("non-empty group returns primitives in t order", () => {
        const s1 = new Sphere();
        const s2 = new Sphere({ transform: translation(0, 0, -3) });
        const s3 = new Sphere({ transform: translation(5, 0, 0) });
        const g = new Group().addChildren(s1, s2, s3);

        const xs = g.intersect(new Ray(point(0, 0, -5), vector(0, 0, 1)));
        expect(xs.times()).toEqual([1, 3, 4, 6]);
        expect([...xs].map(i => i.object)).toEqual([s2, s2, s1, s1]);
    });

    test("group transform applies to children", () => {
        const s = new Sphere({ transform: translation(5, 0, 0) });
        const g = new Group({ transform: scaling(2, 2, 2) }).addChild(s);
        expect(g.intersect(new Ray(point(10, 0, -10), vector(0, 0, 1))).length).toBe(2);
    });
});

describe("Nested transforms", () => {
    function nested() {
        const g1 = new Group({ transform: rotationY(Math.PI / 2) });
        const g2 = new Group({ transform: scaling(1, 2, 3) });
        const s = new Sphere({ transform: translation(5, 0, 0) });
        g1.addChild(g2);
        g2.addChild(s);
        return s;
    }

    test("world to object goes through every ancestor", () => {
        const g1 = new Group({ transform: rotationY(Math.PI / 2) });
        const g2 = new Group({ transform: scaling(2, 2, 2) });
        const s = new Sphere({ transform: translation(5, 0, 0) });
        g1.addChild(g2);
        g2.addChild(s);
        expectTuple(s.worldToObject(point(-2, 0, -10)), point(0, 0, -1));
    });

    test("normal to world goes through every ancestor", () => {
        const k = Math.sqrt(3) / 3;
        expectTuple(nested().normalToWorld(vector(k, k, k)), vector(2 / 7, 3 / 7, -6 / 7));
    });

    test("normal on a child object", () => {
        expectTuple(nested().normalAt(point(1.7321, 1.1547, -5.5774)), vector(0.2857, 0.4286, -0.8571), 3);
    });

    // ─── Helper: a sphere under `depth` rotated and translated groups ─────
    function rigidChain(depth: number) {
        const s = new Sphere({ transform: chain(translation(0, 1, 0), rotationZ(0.4)) });
        let child: Sphere | Group = s;
        for (let level = 1; level <= depth; level++) {
            const g = new Group({
                transform: chain(translation(level, -2 * level, 3), rotationX(0.3 * level), rotationY(0.7 * level)),
            });
            g.addChild(child);
            child = g;
        }
        return s;
    }

    test.each([1, 2, 3])("world to object undoes normal to world under %i rigid groups", depth => {
        const s = rigidChain(depth);
        const v = vector(1, 2, 3).normalize();
        const world = s.normalToWorld(v);
        expect(world.magnitude()).toBeCloseTo(1, 6);
        expectTuple(s.worldToObject(world).normalize(), v);
    });
});
