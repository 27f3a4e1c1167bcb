import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { buildScene, progressReporter, run, settingsFromArgs } from "../cli";
import { resolveSettings } from "../config";
import { PreconditionError } from "../tracer/errors";
import { point, vector } from "../tracer/tuple";
import { matricesEqual, translation, viewTransform } from "../tracer/transforms";

const ROOM = [
    "[Light]",
    "position = 0, 10, 0",
    "",
    "[Camera]",
    "width = 100",
    "height = 100",
    "fov = 1",
    "transform = 1, 0, 0, 0, 0, 1, 0, 0, 0, 0, 1, -4, 0, 0, 0, 1",
    "",
    "[Sphere]",
    "id = ball",
].join("\n");

describe("Command-line arguments", () => {
    test("no flags give the defaults", () => {
        const { settings, list } = settingsFromArgs([]);
        expect(list).toBe(false);
        expect(settings).toEqual(resolveSettings());
    });

    test("every flag", () => {
        const { settings } = settingsFromArgs([
            "--preset", "hexagon",
            "--width", "20",
            "--height", "10",
            "--fov", "90",
            "--depth", "2",
            "--fresnel",
            "-o", "out.ppm",
        ]);
        expect(settings.preset).toBe("hexagon");
        expect(settings.width).toBe(20);
        expect(settings.height).toBe(10);
        expect(settings.fieldOfView).toBeCloseTo(Math.PI / 2, 10);
        expect(settings.maxDepth).toBe(2);
        expect(settings.fresnel).toBe(true);
        expect(settings.output).toBe("out.ppm");
        expect(settings.scenePath).toBeNull();
    });

    test("--list", () => {
        expect(settingsFromArgs(["--list"]).list).toBe(true);
    });

    test("--preset and --scene together are rejected", () => {
        expect(() => settingsFromArgs(["--preset", "mesh", "--scene", "room.scene"])).toThrow(PreconditionError);
    });

    test("a non-numeric width is rejected", () => {
        expect(() => settingsFromArgs(["--width", "wide"])).toThrow("Width must be a positive integer, received NaN");
    });

    test("unknown flags are rejected", () => {
        expect(() => settingsFromArgs(["--bogus"])).toThrow(TypeError);
    });
});

describe("Scene loading", () => {
    beforeEach(() => {
        vi.spyOn(console, "log").mockImplementation(() => undefined);
        vi.spyOn(console, "warn").mockImplementation(() => undefined);
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    test("a scene file keeps its view but takes the requested size", () => {
        const settings = resolveSettings({ scenePath: "room.scene", width: 20, height: 10 });
        const read = vi.fn((_path: string) => ROOM);
        const { world, camera } = buildScene(settings, read);

        expect(read).toHaveBeenCalledWith("room.scene");
        expect(console.log).toHaveBeenCalledWith("[Scene] Loaded 1 top-level shape(s) from room.scene");
        expect(world.objects.map(o => o.id)).toEqual(["ball"]);
        expect(camera.hsize).toBe(20);
        expect(camera.vsize).toBe(10);
        expect(camera.fieldOfView).toBe(Math.PI / 3);
        expect(matricesEqual(camera.transform, translation(0, 0, -4))).toBe(true);
    });

    test("a scene file without a camera gets the default view", () => {
        const settings = resolveSettings({ scenePath: "bare.scene" });
        const { camera } = buildScene(settings, () => "[Sphere]\nid = ball");
        const expected = viewTransform(point(0, 1.5, -5), point(0, 1, 0), vector(0, 1, 0));
        expect(matricesEqual(camera.transform, expected)).toBe(true);
    });

    test("without a scene file the preset is loaded", () => {
        const read = vi.fn((_path: string) => "");
        const { camera } = buildScene(resolveSettings({ preset: "mesh", width: 4, height: 2 }), read);
        expect(read).not.toHaveBeenCalled();
        expect(camera.hsize).toBe(4);
    });
});

describe("Progress output", () => {
    beforeEach(() => {
        vi.spyOn(console, "log").mockImplementation(() => undefined);
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    test("roughly every tenth of the rows, plus the last", () => {
        const report = progressReporter(25);
        for (let y = 0; y < 25; y++) report(y);

        const lines = vi.mocked(console.log).mock.calls.map(call => call[0]);
        expect(lines.length).toBe(9);
        expect(lines[0]).toBe("[Camera] 12% (3/25 rows)");
        expect(lines[8]).toBe("[Camera] 100% (25/25 rows)");
    });

    test("short images report every row", () => {
        const report = progressReporter(4);
        for (let y = 0; y < 4; y++) report(y);

        expect(vi.mocked(console.log).mock.calls.map(call => call[0])).toEqual([
            "[Camera] 25% (1/4 rows)",
            "[Camera] 50% (2/4 rows)",
            "[Camera] 75% (3/4 rows)",
            "[Camera] 100% (4/4 rows)",
        ]);
    });

    test("--list prints the preset names", () => {
        run(["--list"]);
        expect(vi.mocked(console.log).mock.calls.map(call => call[0])).toEqual([
            "balls-on-the-floor",
            "glass-and-mirror",
            "csg-showcase",
            "hexagon",
            "mesh",
        ]);
    });
});
