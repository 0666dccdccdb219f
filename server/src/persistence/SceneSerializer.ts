import * as fs from 'fs/promises';
import { ParseError, SchemaError } from '../errors';
import { LightEffect } from '../effects/LightEffect';
import { BLEND_MODES, LightSegment, MOVEMENT_MODES } from '../effects/LightSegment';
import { LightScene } from '../effects/LightScene';
import { Palette } from '../effects/Palette';
import { DEFAULT_LED_COUNT } from '../effects/types';
import type { SceneManager } from '../effects/SceneManager';
import type {
  BlendMode,
  ColorDocument,
  ColorSource,
  EffectDocument,
  EffectsDocument,
  MovementMode,
  PalettesDocument,
  PaletteStop,
  PulseDocument,
  PulseSettings,
  RGB,
  SceneDocument,
  SceneManagerDocument,
  SegmentDocument,
} from '../types';

/*
 * Conversion between the engine objects and their JSON documents.
 * Readers take `unknown`, validate every field and throw SchemaError with
 * the path of the first bad value; nothing is built until a whole
 * document has been checked.
 */

// ---------------------------------------------------------------------------
// Writing
// ---------------------------------------------------------------------------

export function paletteToDocument(palette: Palette): PalettesDocument[string] {
  return palette.stops.map((stop) => ({
    position: stop.position,
    r: stop.color[0],
    g: stop.color[1],
    b: stop.color[2],
  }));
}

export function palettesToDocument(palettes: ReadonlyMap<string, Palette>): PalettesDocument {
  const document: PalettesDocument = {};
  for (const [name, palette] of palettes) {
    document[name] = paletteToDocument(palette);
  }
  return document;
}

function colorToDocument(color: ColorSource): ColorDocument {
  switch (color.type) {
    case 'solid':
      return { type: 'solid', r: color.color[0], g: color.color[1], b: color.color[2] };
    case 'gradient':
      return { type: 'gradient', start: color.start, end: color.end };
    case 'slice':
      return { type: 'slice', palette: color.palette, start: color.start, end: color.end };
  }
}

function pulseToDocument(pulse: PulseSettings): PulseDocument {
  return {
    fade_in_start: pulse.fadeInStart,
    fade_in_end: pulse.fadeInEnd,
    fade_out_start: pulse.fadeOutStart,
    fade_out_end: pulse.fadeOutEnd,
    cycle: pulse.cycle,
    time_scale: pulse.timeScale,
  };
}

export function segmentToDocument(segment: LightSegment): SegmentDocument {
  const document: SegmentDocument = {
    id: segment.id,
    position: segment.position,
    length: segment.length,
    movement: {
      mode: segment.movement.mode,
      speed: segment.movement.speed,
      bounds: [segment.movement.bounds[0], segment.movement.bounds[1]],
    },
    color: colorToDocument(segment.color),
    fade: {
      enabled: segment.fade.enabled,
      in_ratio: segment.fade.inRatio,
      out_ratio: segment.fade.outRatio,
    },
    dimmer: segment.dimmer,
    blend: segment.blend,
    transparency: segment.transparency,
  };
  if (segment.pulse) {
    document.pulse = pulseToDocument(segment.pulse);
  }
  return document;
}

export function effectToDocument(effect: LightEffect): EffectDocument {
  return {
    id: effect.id,
    led_count: effect.ledCount,
    palette: effect.paletteName,
    background: [effect.background[0], effect.background[1], effect.background[2]],
    segments: effect.listSegments().map(segmentToDocument),
  };
}

export function effectsToDocument(effects: LightEffect[]): EffectsDocument {
  return effects.map(effectToDocument);
}

export function sceneToDocument(scene: LightScene): SceneDocument {
  return {
    id: scene.id,
    active_effect: scene.activeEffectId,
    current_palette: scene.currentPalette,
    palettes: palettesToDocument(scene.paletteLibrary),
    effects: effectsToDocument(scene.listEffects()),
  };
}

export function sceneManagerToDocument(manager: SceneManager): SceneManagerDocument {
  return manager.allScenes().map(sceneToDocument);
}

// ---------------------------------------------------------------------------
// Reading
// ---------------------------------------------------------------------------

/** Values for effect fields a document leaves out */
export interface EffectDefaults {
  ledCount: number;
  /** Palette name; the built-in default when unset */
  palette?: string;
}

const DEFAULT_EFFECT_FIELDS: EffectDefaults = { ledCount: DEFAULT_LED_COUNT };

export function palettesFromDocument(value: unknown, path = 'palettes'): Map<string, Palette> {
  const record = expectObject(value, path);
  const palettes = new Map<string, Palette>();
  for (const [name, stopsValue] of Object.entries(record)) {
    palettes.set(name, paletteFromDocument(stopsValue, `${path}.${name}`));
  }
  if (palettes.size === 0) {
    throw new SchemaError(path, 'at least one palette is required');
  }
  return palettes;
}

export function paletteFromDocument(value: unknown, path: string): Palette {
  const stops: PaletteStop[] = expectArray(value, path).map((stopValue, i) => {
    const stopPath = `${path}[${i}]`;
    const stop = expectObject(stopValue, stopPath);
    return {
      position: expectNumber(stop.position, `${stopPath}.position`),
      color: [
        expectChannel(stop.r, `${stopPath}.r`),
        expectChannel(stop.g, `${stopPath}.g`),
        expectChannel(stop.b, `${stopPath}.b`),
      ],
    };
  });
  const problem = Palette.validate(stops);
  if (problem) {
    throw new SchemaError(path, problem);
  }
  return new Palette(stops);
}

function colorFromDocument(value: unknown, path: string): ColorSource {
  const color = expectObject(value, path);
  const type = expectString(color.type, `${path}.type`);
  switch (type) {
    case 'solid':
      return {
        type: 'solid',
        color: [
          expectChannel(color.r, `${path}.r`),
          expectChannel(color.g, `${path}.g`),
          expectChannel(color.b, `${path}.b`),
        ],
      };
    case 'gradient':
      return {
        type: 'gradient',
        start: expectUnit(color.start, `${path}.start`),
        end: expectUnit(color.end, `${path}.end`),
      };
    case 'slice':
      return {
        type: 'slice',
        palette: expectString(color.palette, `${path}.palette`),
        start: expectUnit(color.start, `${path}.start`),
        end: expectUnit(color.end, `${path}.end`),
      };
    default:
      throw new SchemaError(`${path}.type`, `unknown color type "${type}"`);
  }
}

function pulseFromDocument(value: unknown, path: string): PulseSettings | null {
  if (value === undefined || value === null) return null;
  const pulse = expectObject(value, path);
  return {
    fadeInStart: expectNumber(pulse.fade_in_start, `${path}.fade_in_start`),
    fadeInEnd: expectNumber(pulse.fade_in_end, `${path}.fade_in_end`),
    fadeOutStart: expectNumber(pulse.fade_out_start, `${path}.fade_out_start`),
    fadeOutEnd: expectNumber(pulse.fade_out_end, `${path}.fade_out_end`),
    cycle: expectNumber(pulse.cycle, `${path}.cycle`),
    timeScale: pulse.time_scale === undefined ? 1 : expectNumber(pulse.time_scale, `${path}.time_scale`),
  };
}

export function segmentFromDocument(value: unknown, path: string, ledCount: number): LightSegment {
  const segment = expectObject(value, path);
  const id = expectId(segment.id, `${path}.id`);

  const length = expectNumber(segment.length, `${path}.length`);
  if (!Number.isInteger(length) || length < 1) {
    throw new SchemaError(`${path}.length`, 'must be an integer >= 1');
  }
  if (length > ledCount) {
    throw new SchemaError(`${path}.length`, `exceeds the effect LED count ${ledCount}`);
  }

  const movement = expectObject(segment.movement, `${path}.movement`);
  const mode = expectOneOf<MovementMode>(movement.mode, MOVEMENT_MODES, `${path}.movement.mode`);
  const speed = expectNumber(movement.speed, `${path}.movement.speed`);
  const boundsValue = expectArray(movement.bounds, `${path}.movement.bounds`);
  if (boundsValue.length !== 2) {
    throw new SchemaError(`${path}.movement.bounds`, 'must hold [min, max]');
  }
  const bounds: [number, number] = [
    expectNumber(boundsValue[0], `${path}.movement.bounds[0]`),
    expectNumber(boundsValue[1], `${path}.movement.bounds[1]`),
  ];

  const fade: Record<string, unknown> =
    segment.fade === undefined ? {} : expectObject(segment.fade, `${path}.fade`);
  const inRatio = fade.in_ratio === undefined ? 0 : expectUnit(fade.in_ratio, `${path}.fade.in_ratio`);
  const outRatio = fade.out_ratio === undefined ? 0 : expectUnit(fade.out_ratio, `${path}.fade.out_ratio`);
  // Without an explicit flag, a fade is on when it has a ramp
  const fadeEnabled =
    fade.enabled === undefined ? inRatio > 0 || outRatio > 0 : expectBoolean(fade.enabled, `${path}.fade.enabled`);

  return build(path, () =>
    new LightSegment({
      id,
      position: expectNumber(segment.position, `${path}.position`),
      length,
      movement: { mode, speed, bounds },
      color: colorFromDocument(segment.color, `${path}.color`),
      fade: { enabled: fadeEnabled, inRatio, outRatio },
      dimmer: segment.dimmer === undefined ? 1 : expectUnit(segment.dimmer, `${path}.dimmer`),
      blend:
        segment.blend === undefined
          ? 'overwrite'
          : expectOneOf<BlendMode>(segment.blend, BLEND_MODES, `${path}.blend`),
      transparency:
        segment.transparency === undefined ? 1 : expectUnit(segment.transparency, `${path}.transparency`),
      pulse: pulseFromDocument(segment.pulse, `${path}.pulse`),
    })
  );
}

export function effectFromDocument(
  value: unknown,
  path: string,
  defaults: EffectDefaults = DEFAULT_EFFECT_FIELDS
): LightEffect {
  const effect = expectObject(value, path);
  const id = expectId(effect.id, `${path}.id`);
  const ledCount =
    effect.led_count === undefined ? defaults.ledCount : expectNumber(effect.led_count, `${path}.led_count`);
  if (!Number.isInteger(ledCount) || ledCount < 1) {
    throw new SchemaError(`${path}.led_count`, 'must be an integer >= 1');
  }
  const palette = effect.palette === undefined ? defaults.palette : expectString(effect.palette, `${path}.palette`);

  let background: RGB | undefined;
  if (effect.background !== undefined) {
    const channels = expectArray(effect.background, `${path}.background`);
    if (channels.length !== 3) {
      throw new SchemaError(`${path}.background`, 'must hold [r, g, b]');
    }
    background = [
      expectChannel(channels[0], `${path}.background[0]`),
      expectChannel(channels[1], `${path}.background[1]`),
      expectChannel(channels[2], `${path}.background[2]`),
    ];
  }

  const segments = expectArray(effect.segments, `${path}.segments`).map((segment, i) =>
    segmentFromDocument(segment, `${path}.segments[${i}]`, ledCount)
  );
  assertUniqueIds(segments, `${path}.segments`);

  const result = build(path, () => new LightEffect({ id, ledCount, palette, background }));
  for (const segment of segments) {
    result.addSegment(segment);
  }
  return result;
}

export function effectsFromDocument(
  value: unknown,
  path = 'effects',
  defaults: EffectDefaults = DEFAULT_EFFECT_FIELDS
): LightEffect[] {
  const effects = expectArray(value, path).map((effect, i) =>
    effectFromDocument(effect, `${path}[${i}]`, defaults)
  );
  assertUniqueIds(effects, path);
  return effects;
}

/**
 * Effects that leave out `palette` take the scene's `current_palette`.
 * @param ledCount for effects that leave out `led_count`
 */
export function sceneFromDocument(value: unknown, path = '', ledCount = DEFAULT_LED_COUNT): LightScene {
  const scene = expectObject(value, path || 'scene');
  const at = (key: string) => (path ? `${path}.${key}` : key);

  const id = expectId(scene.id, at('id'));
  const palettes = palettesFromDocument(scene.palettes, at('palettes'));
  const currentPalette = expectString(scene.current_palette, at('current_palette'));
  if (!palettes.has(currentPalette)) {
    throw new SchemaError(at('current_palette'), `palette "${currentPalette}" is not in the scene palettes`);
  }
  const effects = effectsFromDocument(scene.effects, at('effects'), { ledCount, palette: currentPalette });

  let activeEffect: string | null = null;
  if (scene.active_effect !== undefined && scene.active_effect !== null) {
    activeEffect = expectId(scene.active_effect, at('active_effect'));
    if (!effects.some((effect) => effect.id === activeEffect)) {
      throw new SchemaError(at('active_effect'), `effect "${activeEffect}" is not in the scene`);
    }
  }

  const result = build(path || 'scene', () => new LightScene({ id, palettes, currentPalette }));
  result.replaceEffects(effects);
  if (activeEffect !== null) {
    result.setActiveEffect(activeEffect);
  }
  return result;
}

export function scenesFromDocument(value: unknown, ledCount = DEFAULT_LED_COUNT): LightScene[] {
  const scenes = expectArray(value, 'scenes').map((scene, i) =>
    sceneFromDocument(scene, `scenes[${i}]`, ledCount)
  );
  assertUniqueIds(scenes, 'scenes');
  return scenes;
}

// ---------------------------------------------------------------------------
// JSON text and files
// ---------------------------------------------------------------------------

export function parseJson(text: string, source = 'input'): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ParseError(`Invalid JSON in ${source}: ${reason}`, { source });
  }
}

/** Read and parse a JSON file */
export async function readJsonFile(filePath: string): Promise<unknown> {
  const text = await fs.readFile(filePath, 'utf-8');
  return parseJson(text, filePath);
}

/** Write a document as pretty-printed JSON */
export async function writeJsonFile(filePath: string, document: unknown): Promise<void> {
  await fs.writeFile(filePath, JSON.stringify(document, null, 2), 'utf-8');
}

// ---------------------------------------------------------------------------
// Validation helpers
// ---------------------------------------------------------------------------

function expectObject(value: unknown, path: string): Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new SchemaError(path, 'must be an object');
  }
  return Object.fromEntries(Object.entries(value));
}

function expectArray(value: unknown, path: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new SchemaError(path, 'must be an array');
  }
  return value;
}

function expectNumber(value: unknown, path: string): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new SchemaError(path, 'must be a finite number');
  }
  return value;
}

function expectUnit(value: unknown, path: string): number {
  const n = expectNumber(value, path);
  if (n < 0 || n > 1) {
    throw new SchemaError(path, 'must be within [0, 1]');
  }
  return n;
}

function expectChannel(value: unknown, path: string): number {
  const n = expectNumber(value, path);
  if (n < 0 || n > 255) {
    throw new SchemaError(path, 'must be within 0-255');
  }
  return n;
}

function expectString(value: unknown, path: string): string {
  if (typeof value !== 'string' || value.length === 0) {
    throw new SchemaError(path, 'must be a non-empty string');
  }
  return value;
}

function expectBoolean(value: unknown, path: string): boolean {
  if (typeof value !== 'boolean') {
    throw new SchemaError(path, 'must be a boolean');
  }
  return value;
}

/** Ids are written as strings or integers and always read as strings */
function expectId(value: unknown, path: string): string {
  if (typeof value === 'number' && Number.isInteger(value)) {
    return String(value);
  }
  return expectString(value, path);
}

function expectOneOf<T extends string>(value: unknown, allowed: ReadonlyArray<T>, path: string): T {
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new SchemaError(path, `must be one of ${allowed.join(', ')}`);
  }
  return match;
}

function assertUniqueIds(items: Array<{ id: string }>, path: string): void {
  const seen = new Set<string>();
  items.forEach((item, i) => {
    if (seen.has(item.id)) {
      throw new SchemaError(`${path}[${i}].id`, `duplicate id "${item.id}"`);
    }
    seen.add(item.id);
  });
}

/** Run a constructor, reporting its range errors at the given path */
function build<T>(path: string, create: () => T): T {
  try {
    return create();
  } catch (error) {
    if (error instanceof RangeError) {
      throw new SchemaError(path, error.message);
    }
    throw error;
  }
}
