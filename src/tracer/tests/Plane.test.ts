import { describe, expect, test } from "vitest";
import { Plane } from "../shapes/Plane";
import { Ray } from "../Ray";
import { point, vector } from "../tuple";
import { expectTuple } from "./helpers";

describe("Plane", () => {
    test("normal is constant everywhere", () => {
        const p = new Plane();
        expectTuple(p.normalAt(point(0, 0, 0)), vector(0, 1, 0));
        expectTuple(p.normalAt(point(10, 0, -10)), vector(0, 1, 0));
        expectTuple(p.normalAt(point(-5, 0, 150)), vector(0, 1, 0));
    });

    test("parallel ray misses", () => {
        expect(new Plane().intersect(new Ray(point(0, 10, 0), vector(0, 0, 1))).length).toBe(0);
    });

    test("coplanar ray misses", () => {
        expect(new Plane().intersect(new Ray(point(0, 0, 0), vector(0, 0, 1))).length).toBe(0);
    });

    test("ray from above", () => {
        const p = new Plane();
        const xs = p.intersect(new Ray(point(0, 1, 0), vector(0, -1, 0)));
        expect(xs.times()).toEqual([1]);
        expect(xs.at(0)?.object).toBe(p);
    });

    test("ray from below", () => {
        const xs = new Plane().intersect(new Ray(point(0, -1, 0), vector(0, 1, 0)));
        expect(xs.times()).toEqual([1]);
    });
});
