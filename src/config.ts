import { precondition } from './tracer/errors';
import { DEFAULT_REMAINING } from './tracer/World';
import { PresetName, PRESET_NAMES, isPresetName } from './presets';

/** Everything a render run needs besides the scene itself. */
export interface RenderSettings {
    width: number;              // pixels
    height: number;             // pixels
    fieldOfView: number;        // radians, in (0, π)
    maxDepth: number;           // reflection/refraction bounce budget
    fresnel: boolean;           // Schlick-weighted reflection/refraction blend
    preset: PresetName;
    scenePath: string | null;   // Scene file; takes the place of the preset
    output: string;             // PPM path
}

/** Overrides as they arrive from the command line; the preset is still a bare string. */
export type SettingsOverrides = Partial<Omit<RenderSettings, 'preset'>> & { preset?: string };

export const DEFAULT_SETTINGS: Readonly<RenderSettings> = Object.freeze({
    width: 400,
    height: 300,
    fieldOfView: Math.PI / 3,
    maxDepth: DEFAULT_REMAINING,
    fresnel: false,
    preset: PresetName.BallsOnTheFloor,
    scenePath: null,
    output: 'render.ppm',
});

/** Merge `overrides` over the defaults and validate. Undefined fields keep their default. */
export function resolveSettings(overrides: SettingsOverrides = {}): RenderSettings {
    const width = overrides.width ?? DEFAULT_SETTINGS.width;
    const height = overrides.height ?? DEFAULT_SETTINGS.height;
    const fieldOfView = overrides.fieldOfView ?? DEFAULT_SETTINGS.fieldOfView;
    const maxDepth = overrides.maxDepth ?? DEFAULT_SETTINGS.maxDepth;
    const preset = overrides.preset ?? DEFAULT_SETTINGS.preset;

    precondition(Number.isInteger(width) && width > 0, `Width must be a positive integer, received ${width}`);
    precondition(Number.isInteger(height) && height > 0, `Height must be a positive integer, received ${height}`);
    precondition(
        fieldOfView > 0 && fieldOfView < Math.PI,
        `Field of view must lie strictly between 0 and π radians, received ${fieldOfView}`
    );
    precondition(Number.isInteger(maxDepth) && maxDepth >= 0, `Depth must be a non-negative integer, received ${maxDepth}`);
    precondition(
        isPresetName(preset),
        `Unknown preset "${preset}", expected one of: ${PRESET_NAMES.join(', ')}`
    );

    return {
        width,
        height,
        fieldOfView,
        maxDepth,
        fresnel: overrides.fresnel ?? DEFAULT_SETTINGS.fresnel,
        preset,
        scenePath: overrides.scenePath ?? DEFAULT_SETTINGS.scenePath,
        output: overrides.output ?? DEFAULT_SETTINGS.output,
    };
}
