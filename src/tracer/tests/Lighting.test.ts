import { describe, expect, test } from "vitest";
import { defaultLight, lighting, pointLight } from "../lights";
import { DEFAULT_MATERIAL, material } from "../Material";
import { StripePattern } from "../patterns";
import { Sphere } from "../shapes/Sphere";
import { BLACK, WHITE, color, point, vector } from "../tuple";
import { PreconditionError } from "../errors";
import { expectTuple } from "./helpers";

const HALF_SQRT2 = Math.SQRT2 / 2;

describe("PointLight", () => {
    test("has a position and intensity", () => {
        const light = pointLight(point(0, 0, 0), WHITE);
        expectTuple(light.position, point(0, 0, 0));
        expect(light.intensity).toBe(WHITE);
    });

    test("rejects the wrong kinds", () => {
        expect(() => pointLight(vector(0, 0, 0), WHITE)).toThrow(PreconditionError);
        expect(() => pointLight(point(0, 0, 0), point(1, 1, 1))).toThrow(PreconditionError);
    });

    test("default light", () => {
        expectTuple(defaultLight().position, point(-10, 10, -10));
    });
});

describe("Phong lighting", () => {
    const m = DEFAULT_MATERIAL;
    const position = point(0, 0, 0);
    const shape = new Sphere();

    test("eye between light and surface", () => {
        const c = lighting(m, pointLight(point(0, 0, -10)), position, vector(0, 0, -1), vector(0, 0, -1), false, shape);
        expectTuple(c, color(1.9, 1.9, 1.9));
    });

    test("eye offset 45 degrees", () => {
        const c = lighting(m, pointLight(point(0, 0, -10)), position, vector(0, HALF_SQRT2, -HALF_SQRT2), vector(0, 0, -1), false, shape);
        expectTuple(c, color(1.0, 1.0, 1.0));
    });

    test("light offset 45 degrees", () => {
        const c = lighting(m, pointLight(point(0, 10, -10)), position, vector(0, 0, -1), vector(0, 0, -1), false, shape);
        expectTuple(c, color(0.7364, 0.7364, 0.7364));
    });

    test("eye in the path of the reflection", () => {
        const c = lighting(m, pointLight(point(0, 10, -10)), position, vector(0, -HALF_SQRT2, -HALF_SQRT2), vector(0, 0, -1), false, shape);
        expectTuple(c, color(1.6364, 1.6364, 1.6364));
    });

    test("light behind the surface", () => {
        const c = lighting(m, pointLight(point(0, 0, 10)), position, vector(0, 0, -1), vector(0, 0, -1), false, shape);
        expectTuple(c, color(0.1, 0.1, 0.1));
    });

    test("surface in shadow", () => {
        const c = lighting(m, pointLight(point(0, 0, -10)), position, vector(0, 0, -1), vector(0, 0, -1), true, shape);
        expectTuple(c, color(0.1, 0.1, 0.1));
    });

    test("pattern replaces the color", () => {
        const striped = material({ pattern: new StripePattern(WHITE, BLACK), ambient: 1, diffuse: 0, specular: 0 });
        const light = pointLight(point(0, 0, -10));
        const eyeV = vector(0, 0, -1);
        const normal = vector(0, 0, -1);
        expectTuple(lighting(striped, light, point(0.9, 0, 0), eyeV, normal, false, shape), WHITE);
        expectTuple(lighting(striped, light, point(1.1, 0, 0), eyeV, normal, false, shape), BLACK);
    });

    test("light intensity tints the result", () => {
        const flat = material({ ambient: 1, diffuse: 0, specular: 0 });
        const c = lighting(flat, pointLight(point(0, 0, -10), color(1, 0.5, 0)), position, vector(0, 0, -1), vector(0, 0, -1), false, shape);
        expectTuple(c, color(1, 0.5, 0));
    });
});
