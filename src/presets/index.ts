import { World } from '../tracer/World';
import { Camera } from '../tracer/Camera';
import { createBallsOnTheFloorScene } from './ballsOnTheFloor';
import { createGlassAndMirrorScene } from './glassAndMirror';
import { createCsgShowcaseScene } from './csgShowcase';
import { createHexagonScene } from './hexagon';
import { createMeshScene } from './mesh';

// Preset Management
export enum PresetName {
    BallsOnTheFloor = 'balls-on-the-floor',
    GlassAndMirror = 'glass-and-mirror',
    CsgShowcase = 'csg-showcase',
    Hexagon = 'hexagon',
    Mesh = 'mesh'
}

/** Image size and lens; each preset only chooses where the camera looks. */
export interface CameraSize {
    width: number;
    height: number;
    fieldOfView: number;
}

/** Normalized preset result: all presets produce this shape. */
export interface PresetResult {
    world: World;
    camera: Camera;
}

const presetFactories = new Map<PresetName, (size: CameraSize) => PresetResult>([
    [PresetName.BallsOnTheFloor, createBallsOnTheFloorScene],
    [PresetName.GlassAndMirror, createGlassAndMirrorScene],
    [PresetName.CsgShowcase, createCsgShowcaseScene],
    [PresetName.Hexagon, createHexagonScene],
    [PresetName.Mesh, createMeshScene],
]);

export const PRESET_NAMES: readonly PresetName[] = Object.values(PresetName);

export function isPresetName(name: string): name is PresetName {
    return PRESET_NAMES.some(p => p === name);
}

export function loadPreset(name: PresetName, size: CameraSize): PresetResult {
    const factory = presetFactories.get(name);
    if (!factory) throw new Error(`No factory registered for preset "${name}"`);
    return factory(size);
}
