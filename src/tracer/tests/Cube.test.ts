import { describe, expect, test } from "vitest";
import { Cube } from "../shapes/Cube";
import { Ray } from "../Ray";
import { point, vector } from "../tuple";
import { expectTuple } from "./helpers";

type Triple = [number, number, number];

describe("Cube intersection", () => {
    const hits: [string, Triple, Triple, number, number][] = [
        ["+x", [5, 0.5, 0], [-1, 0, 0], 4, 6],
        ["-x", [-5, 0.5, 0], [1, 0, 0], 4, 6],
        ["+y", [0.5, 5, 0], [0, -1, 0], 4, 6],
        ["-y", [0.5, -5, 0], [0, 1, 0], 4, 6],
        ["+z", [0.5, 0, 5], [0, 0, -1], 4, 6],
        ["-z", [0.5, 0, -5], [0, 0, 1], 4, 6],
        ["inside", [0, 0.5, 0], [0, 0, 1], -1, 1],
    ];

    test.each(hits)("ray hits the %s face", (_face, [ox, oy, oz], [dx, dy, dz], t1, t2) => {
        const xs = new Cube().intersect(new Ray(point(ox, oy, oz), vector(dx, dy, dz)));
        expect(xs.times()).toEqual([t1, t2]);
    });

    const misses: [Triple, Triple][] = [
        [[-2, 0, 0], [0.2673, 0.5345, 0.8018]],
        [[0, -2, 0], [0.8018, 0.2673, 0.5345]],
        [[0, 0, -2], [0.5345, 0.8018, 0.2673]],
        [[2, 0, 2], [0, 0, -1]],
        [[0, 2, 2], [0, -1, 0]],
        [[2, 2, 0], [-1, 0, 0]],
    ];

    test.each(misses)("ray from %j misses", ([ox, oy, oz], [dx, dy, dz]) => {
        expect(new Cube().intersect(new Ray(point(ox, oy, oz), vector(dx, dy, dz))).length).toBe(0);
    });
});

describe("Cube normals", () => {
    const cases: [Triple, Triple][] = [
        [[1, 0.5, -0.8], [1, 0, 0]],
        [[-1, -0.2, 0.9], [-1, 0, 0]],
        [[-0.4, 1, -0.1], [0, 1, 0]],
        [[0.3, -1, -0.7], [0, -1, 0]],
        [[-0.6, 0.3, 1], [0, 0, 1]],
        [[0.4, 0.4, -1], [0, 0, -1]],
        [[1, 1, 1], [1, 0, 0]],
        [[-1, -1, -1], [-1, 0, 0]],
    ];

    test.each(cases)("normal at %j", ([px, py, pz], [nx, ny, nz]) => {
        expectTuple(new Cube().normalAt(point(px, py, pz)), vector(nx, ny, nz));
    });
});
