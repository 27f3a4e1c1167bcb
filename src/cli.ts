import { readFileSync, writeFileSync } from 'fs';
import { parseArgs } from 'util';
import { RenderSettings, resolveSettings } from './config';
import { PRESET_NAMES, PresetResult, loadPreset } from './presets';
import { deserializeScene } from './state/sceneSerializer';
import { Camera } from './tracer/Camera';
import { precondition } from './tracer/errors';
import { point, vector } from './tracer/tuple';
import { viewTransform } from './tracer/transforms';

export const USAGE = `Usage: whitted-tracer [options]

  --preset <name>    Render a built-in scene (see --list)
  --scene <file>     Render a scene file instead of a preset
  --width <px>       Image width
  --height <px>      Image height
  --fov <degrees>    Field of view across the wider image side
  --depth <n>        Reflection/refraction bounce budget
  --fresnel          Blend reflection and refraction by Schlick reflectance
  --output <file>    PPM output path
  --list             Print the preset names and exit`;

export interface CliRequest {
    settings: RenderSettings;
    list: boolean;
}

function numeric(value: string | undefined): number | undefined {
    return value === undefined ? undefined : Number(value);
}

/** Parse argv (without the node/script entries) into validated settings. */
export function settingsFromArgs(argv: string[]): CliRequest {
    const { values } = parseArgs({
        args: argv,
        options: {
            preset: { type: 'string', short: 'p' },
            scene: { type: 'string', short: 's' },
            width: { type: 'string' },
            height: { type: 'string' },
            fov: { type: 'string' },
            depth: { type: 'string' },
            fresnel: { type: 'boolean' },
            output: { type: 'string', short: 'o' },
            list: { type: 'boolean' },
        },
        strict: true,
        allowPositionals: false,
    });

    precondition(
        values.preset === undefined || values.scene === undefined,
        'Give either --preset or --scene, not both'
    );

    const fovDegrees = numeric(values.fov);
    const settings = resolveSettings({
        width: numeric(values.width),
        height: numeric(values.height),
        fieldOfView: fovDegrees === undefined ? undefined : (fovDegrees * Math.PI) / 180,
        maxDepth: numeric(values.depth),
        fresnel: values.fresnel,
        preset: values.preset,
        scenePath: values.scene,
        output: values.output,
    });

    return { settings, list: values.list ?? false };
}

/** The preset, or the scene file seen through its own camera (or a default one) at the requested size. */
export function buildScene(settings: RenderSettings, readText: (path: string) => string): PresetResult {
    const size = { width: settings.width, height: settings.height, fieldOfView: settings.fieldOfView };
    if (settings.scenePath === null) return loadPreset(settings.preset, size);

    const scene = deserializeScene(readText(settings.scenePath));
    console.log(`[Scene] Loaded ${scene.world.objects.length} top-level shape(s) from ${settings.scenePath}`);

    const view = scene.camera?.transform
        ?? viewTransform(point(0, 1.5, -5), point(0, 1, 0), vector(0, 1, 0));
    return { world: scene.world, camera: new Camera(size.width, size.height, size.fieldOfView, view) };
}

/** Log roughly every tenth of the image, plus the last row. */
export function progressReporter(rows: number): (y: number) => void {
    const step = Math.max(1, Math.ceil(rows / 10));
    return (y: number) => {
        const done = y + 1;
        if (done % step !== 0 && done !== rows) return;
        console.log(`[Camera] ${Math.round((done / rows) * 100)}% (${done}/${rows} rows)`);
    };
}

export function run(argv: string[]): void {
    const { settings, list } = settingsFromArgs(argv);

    if (list) {
        for (const name of PRESET_NAMES) console.log(name);
        return;
    }

    const { world, camera } = buildScene(settings, path => readFileSync(path, 'utf8'));
    world.fresnel = settings.fresnel;

    const source = settings.scenePath ?? `preset ${settings.preset}`;
    console.log(
        `[CLI] Rendering ${source} at ${camera.hsize}x${camera.vsize}, depth ${settings.maxDepth}` +
        (settings.fresnel ? ', fresnel on' : '')
    );

    const started = performance.now();
    const image = camera.render(world, { maxDepth: settings.maxDepth, onRow: progressReporter(camera.vsize) });
    writeFileSync(settings.output, image.toPPM());

    const seconds = (performance.now() - started) / 1000;
    console.log(`[CLI] Wrote ${settings.output} in ${seconds.toFixed(2)}s`);
}
