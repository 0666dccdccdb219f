/**
 * Command tables
 *
 * Each entity type has a closed table of commands. A command declares its
 * argument signature and a `bind` step that validates the coerced
 * arguments without touching any state and returns the mutation to run
 * later, inside a render tick, against the resolved entity.
 */

import { TypeMismatchError } from '../errors';
import { LightEffect } from '../effects/LightEffect';
import { BLEND_MODES, MOVEMENT_MODES, type LightSegment } from '../effects/LightSegment';
import { Palette } from '../effects/Palette';
import { ColorUtils } from '../effects/types';
import { OscArgs, typeTags, type OscArgument, type OscMessage } from '../osc/OscMessage';
import {
  paletteFromDocument,
  palettesFromDocument,
  parseJson,
  sceneToDocument,
  segmentFromDocument,
} from '../persistence/SceneSerializer';
import { createDefaultSegment } from '../presets/defaultScene';
import type { CommandArgs } from './CommandArgs';
import type { LightScene } from '../effects/LightScene';
import type { SceneManager } from '../effects/SceneManager';
import type { RGB } from '../types';

export type Apply<C> = (context: C) => OscMessage | void;

export interface CommandDefinition<C> {
  /** Required argument kinds, e.g. 'fff' */
  args: string;
  /** Optional trailing argument kinds */
  optional?: string;
  bind: (args: CommandArgs, name: string) => Apply<C>;
}

export type CommandTable<C> = ReadonlyMap<string, CommandDefinition<C>>;

export interface SegmentContext {
  segment: LightSegment;
  effect: LightEffect;
}

export interface EffectContext {
  effect: LightEffect;
  scene: LightScene;
}

export interface SceneContext {
  scene: LightScene;
  /** LED count for effects added without one */
  ledCount: number;
}

export interface ManagerContext {
  manager: SceneManager;
}

export const SCENE_LIST_REPLY_ADDRESS = '/scene_manager/scenes';
export const ACTIVE_SCENE_REPLY_ADDRESS = '/scene_manager/active_scene';

function table<C>(entries: Record<string, CommandDefinition<C>>): CommandTable<C> {
  return new Map(Object.entries(entries));
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function channel(value: number): number {
  return ColorUtils.toByte(value);
}

function unit(value: number): number {
  return ColorUtils.clamp(value, 0, 1);
}

function rgbAt(args: CommandArgs, start: number): RGB {
  return [channel(args.number(start)), channel(args.number(start + 1)), channel(args.number(start + 2))];
}

function choice<T extends string>(name: string, value: string, allowed: ReadonlyArray<T>): T {
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new TypeMismatchError(name, allowed.join('|'), `"${value}"`);
  }
  return match;
}

/**
 * A palette argument: either stop documents `[{position, r, g, b}, ...]`
 * or a plain color list `[[r, g, b], ...]` spread evenly.
 */
function paletteFromJson(text: string, name: string): Palette {
  const value = parseJson(text, name);
  if (Array.isArray(value) && value.length > 0 && value.every(Array.isArray)) {
    const colors = value.map((color, i) => {
      if (!ColorUtils.isRgb(color)) {
        throw new TypeMismatchError(name, '[r, g, b] colors', `entry ${i}`);
      }
      return ColorUtils.quantize(color);
    });
    return Palette.fromColors(colors);
  }
  return paletteFromDocument(value, name);
}

function withId(value: unknown, id: string): unknown {
  if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
    return { ...value, id };
  }
  return value;
}

// ---------------------------------------------------------------------------
// /scene/{s}/effect/{e}/segment/{g}/{param}
// ---------------------------------------------------------------------------

export const SEGMENT_COMMANDS: CommandTable<SegmentContext> = table<SegmentContext>({
  position: {
    args: 'f',
    bind: (args) => {
      const position = args.number(0);
      return ({ segment }) => segment.setPosition(position);
    },
  },
  length: {
    args: 'i',
    bind: (args) => {
      const length = args.number(0);
      return ({ segment, effect }) => segment.setLength(length, effect.ledCount);
    },
  },
  speed: {
    args: 'f',
    bind: (args) => {
      const speed = args.number(0);
      return ({ segment }) => segment.setSpeed(speed);
    },
  },
  mode: {
    args: 's',
    bind: (args, name) => {
      const mode = choice(name, args.string(0), MOVEMENT_MODES);
      return ({ segment }) => segment.setMode(mode);
    },
  },
  bounds: {
    args: 'ff',
    bind: (args) => {
      const a = args.number(0);
      const b = args.number(1);
      return ({ segment }) => segment.setBounds(a, b);
    },
  },
  color: {
    args: 'iii',
    bind: (args) => {
      const color = rgbAt(args, 0);
      return ({ segment }) => {
        segment.color = { type: 'solid', color };
      };
    },
  },
  gradient: {
    args: 'ff',
    bind: (args) => {
      const start = unit(args.number(0));
      const end = unit(args.number(1));
      return ({ segment }) => {
        segment.color = { type: 'gradient', start, end };
      };
    },
  },
  slice: {
    args: 'sff',
    bind: (args) => {
      const palette = args.string(0);
      const start = unit(args.number(1));
      const end = unit(args.number(2));
      return ({ segment }) => {
        segment.color = { type: 'slice', palette, start, end };
      };
    },
  },
  dimmer: {
    args: 'f',
    bind: (args) => {
      const dimmer = args.number(0);
      return ({ segment }) => segment.setDimmer(dimmer);
    },
  },
  fade: {
    args: 'ff',
    bind: (args) => {
      const inRatio = args.number(0);
      const outRatio = args.number(1);
      return ({ segment }) => segment.setFadeRatios(inRatio, outRatio);
    },
  },
  fade_enabled: {
    args: 'b',
    bind: (args) => {
      const enabled = args.boolean(0);
      return ({ segment }) => segment.setFadeEnabled(enabled);
    },
  },
  blend: {
    args: 's',
    bind: (args, name) => {
      const blend = choice(name, args.string(0), BLEND_MODES);
      return ({ segment }) => {
        segment.blend = blend;
      };
    },
  },
  // fade-in start, fade-in end, fade-out start, fade-out end, cycle (ms)
  pulse: {
    args: 'fffff',
    bind: (args) => {
      const times = [0, 1, 2, 3, 4].map((i) => Math.max(0, args.number(i)));
      return ({ segment }) =>
        segment.setPulse({
          fadeInStart: times[0],
          fadeInEnd: times[1],
          fadeOutStart: times[2],
          fadeOutEnd: times[3],
          cycle: times[4],
          timeScale: segment.pulse?.timeScale ?? 1,
        });
    },
  },
  transparency: {
    args: 'f',
    bind: (args) => {
      const transparency = args.number(0);
      return ({ segment }) => segment.setTransparency(transparency);
    },
  },
  pulse_scale: {
    args: 'f',
    bind: (args) => {
      const scale = args.number(0);
      return ({ segment }) => segment.setPulseTimeScale(scale);
    },
  },
});

// ---------------------------------------------------------------------------
// /scene/{s}/effect/{e}/{param}
// ---------------------------------------------------------------------------

export const EFFECT_COMMANDS: CommandTable<EffectContext> = table<EffectContext>({
  set_palette: {
    args: 's',
    bind: (args) => {
      const name = args.string(0);
      return ({ effect, scene }) => effect.setPalette(name, scene.paletteLibrary);
    },
  },
  change_palette: {
    args: 'sf',
    bind: (args) => {
      const name = args.string(0);
      const duration = args.number(1);
      return ({ effect, scene }) => effect.changePalette(name, duration, scene.paletteLibrary);
    },
  },
  add_segment: {
    args: 's',
    optional: 's',
    bind: (args, name) => {
      const id = args.string(0);
      const document = args.has(1) ? withId(parseJson(args.string(1), name), id) : null;
      return ({ effect }) => {
        const segment =
          document === null
            ? createDefaultSegment(id, effect.ledCount)
            : segmentFromDocument(document, `segment ${id}`, effect.ledCount);
        effect.addSegment(segment);
      };
    },
  },
  remove_segment: {
    args: 's',
    bind: (args) => {
      const id = args.string(0);
      return ({ effect }) => effect.removeSegment(id);
    },
  },
  background: {
    args: 'iii',
    bind: (args) => {
      const color = rgbAt(args, 0);
      return ({ effect }) => {
        effect.background = color;
      };
    },
  },
});

// ---------------------------------------------------------------------------
// /scene/{s}/{param}
// ---------------------------------------------------------------------------

export const SCENE_COMMANDS: CommandTable<SceneContext> = table<SceneContext>({
  set_palette: {
    args: 's',
    bind: (args) => {
      const name = args.string(0);
      return ({ scene }) => scene.setPalette(name);
    },
  },
  update_palettes: {
    args: 's',
    bind: (args, name) => {
      const palettes = palettesFromDocument(parseJson(args.string(0), name));
      return ({ scene }) => scene.updatePalettes(palettes);
    },
  },
  update_palette: {
    args: 'ss',
    bind: (args, name) => {
      const paletteName = args.string(0);
      const palette = paletteFromJson(args.string(1), name);
      return ({ scene }) => scene.updatePalette(paletteName, palette);
    },
  },
  change_effect: {
    args: 'sf',
    bind: (args) => {
      const id = args.string(0);
      const duration = args.number(1);
      return ({ scene }) => scene.changeEffect(id, duration);
    },
  },
  set_effect: {
    args: 's',
    bind: (args) => {
      const id = args.string(0);
      return ({ scene }) => scene.setActiveEffect(id);
    },
  },
  add_effect: {
    args: 's',
    optional: 'i',
    bind: (args) => {
      const id = args.string(0);
      const ledCount = args.has(1) ? args.number(1) : null;
      return ({ scene, ledCount: defaultCount }) =>
        scene.addEffect(new LightEffect({ id, ledCount: ledCount ?? defaultCount }));
    },
  },
  remove_effect: {
    args: 's',
    bind: (args) => {
      const id = args.string(0);
      return ({ scene }) => scene.removeEffect(id);
    },
  },
});

// ---------------------------------------------------------------------------
// /scene_manager/{param}
// ---------------------------------------------------------------------------

export const MANAGER_COMMANDS: CommandTable<ManagerContext> = table<ManagerContext>({
  add_scene: {
    args: 's',
    bind: (args) => {
      const id = args.string(0);
      return ({ manager }) => {
        manager.createScene(id);
      };
    },
  },
  remove_scene: {
    args: 's',
    bind: (args) => {
      const id = args.string(0);
      return ({ manager }) => manager.removeScene(id);
    },
  },
  switch_scene: {
    args: 's',
    bind: (args) => {
      const id = args.string(0);
      return ({ manager }) => manager.switchScene(id);
    },
  },
  list_scenes: {
    args: '',
    bind: () => ({ manager }) => sceneList(manager),
  },
});

function sceneList(manager: SceneManager): OscMessage {
  return {
    address: SCENE_LIST_REPLY_ADDRESS,
    args: manager.listScenes().map((id) => OscArgs.string(id)),
  };
}

// ---------------------------------------------------------------------------
// /palette/{name} and /request/init
// ---------------------------------------------------------------------------

/**
 * A palette from flat `r g b r g b ...` arguments, colors spread evenly.
 */
export function paletteFromChannels(name: string, args: OscArgument[]): Palette {
  const channels: number[] = [];
  for (const arg of args) {
    const value = arg.type === 'i' || arg.type === 'f' || arg.type === 'd' ? arg.value : NaN;
    if (!Number.isFinite(value)) {
      throw new TypeMismatchError(name, 'r g b triples', typeTags(args));
    }
    channels.push(channel(value));
  }
  if (channels.length === 0 || channels.length % 3 !== 0) {
    throw new TypeMismatchError(name, 'r g b triples', typeTags(args));
  }
  const colors: RGB[] = [];
  for (let i = 0; i < channels.length; i += 3) {
    colors.push([channels[i], channels[i + 1], channels[i + 2]]);
  }
  return Palette.fromColors(colors);
}

function paletteChannels(palette: Palette): OscArgument[] {
  return palette.stops.flatMap((stop) => stop.color.map((value) => OscArgs.int(channel(value))));
}

/**
 * Everything a control surface needs to show the current state: the scene
 * list, the active scene with its palettes as `/palette/{name}` colors, and
 * each scene as a JSON document on `/scene/{id}/state`.
 */
export function stateReplies(manager: SceneManager): OscMessage[] {
  const replies: OscMessage[] = [sceneList(manager)];
  const active = manager.getActiveScene();
  if (active) {
    replies.push({ address: ACTIVE_SCENE_REPLY_ADDRESS, args: [OscArgs.string(active.id)] });
    for (const [name, palette] of active.paletteLibrary) {
      replies.push({ address: `/palette/${name}`, args: paletteChannels(palette) });
    }
  }
  for (const scene of manager.allScenes()) {
    replies.push({
      address: `/scene/${scene.id}/state`,
      args: [OscArgs.string(JSON.stringify(sceneToDocument(scene)))],
    });
  }
  return replies;
}
