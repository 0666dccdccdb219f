/**
 * Shared types for the light control server
 */

/** RGB color tuple [r, g, b]. Rendered buffers hold integers 0-255. */
export type RGB = [number, number, number];

/** One rendered frame, one RGB entry per LED index */
export type LedBuffer = RGB[];

export type MovementMode = 'static' | 'linear' | 'bounce' | 'wrap';

export type BlendMode = 'overwrite' | 'additive';

/** What to do when the active scene is removed */
export type RemoveActiveScenePolicy = 'reject' | 'clear' | 'next';

export type QueueOverflowPolicy = 'drop-oldest' | 'drop-newest';

export interface PaletteStop {
  position: number;
  color: RGB;
}

export interface Movement {
  mode: MovementMode;
  /** LEDs per second */
  speed: number;
  /** [min, max] with min <= max */
  bounds: [number, number];
}

/** Where a segment takes its colors from */
export type ColorSource =
  | { type: 'solid'; color: RGB }
  | { type: 'gradient'; start: number; end: number }
  | { type: 'slice'; palette: string; start: number; end: number };

export interface FadeSettings {
  enabled: boolean;
  inRatio: number;
  outRatio: number;
}

/**
 * Time-based brightness envelope, in milliseconds.
 * Times are stretched by timeScale before use.
 */
export interface PulseSettings {
  fadeInStart: number;
  fadeInEnd: number;
  fadeOutStart: number;
  fadeOutEnd: number;
  cycle: number;
  timeScale: number;
}

// ---------------------------------------------------------------------------
// Persisted JSON documents
// ---------------------------------------------------------------------------

export interface PaletteStopDocument {
  position: number;
  r: number;
  g: number;
  b: number;
}

export type PalettesDocument = Record<string, PaletteStopDocument[]>;

export type ColorDocument =
  | { type: 'solid'; r: number; g: number; b: number }
  | { type: 'gradient'; start: number; end: number }
  | { type: 'slice'; palette: string; start: number; end: number };

export interface PulseDocument {
  fade_in_start: number;
  fade_in_end: number;
  fade_out_start: number;
  fade_out_end: number;
  cycle: number;
  time_scale: number;
}

export interface SegmentDocument {
  id: string;
  position: number;
  length: number;
  movement: {
    mode: MovementMode;
    speed: number;
    bounds: [number, number];
  };
  color: ColorDocument;
  fade: {
    enabled: boolean;
    in_ratio: number;
    out_ratio: number;
  };
  dimmer: number;
  blend: BlendMode;
  transparency: number;
  pulse?: PulseDocument | null;
}

/** `led_count` and `palette` may be left out when reading */
export interface EffectDocument {
  id: string;
  led_count: number;
  palette: string;
  background?: [number, number, number];
  segments: SegmentDocument[];
}

export type EffectsDocument = EffectDocument[];

export interface SceneDocument {
  id: string;
  active_effect: string | null;
  current_palette: string;
  palettes: PalettesDocument;
  effects: EffectsDocument;
}

export type SceneManagerDocument = SceneDocument[];

// ---------------------------------------------------------------------------
// Application config
// ---------------------------------------------------------------------------

export interface Config {
  fps: number;
  ledCount: number;
  osc: {
    host: string;
    port: number;
  };
  output: {
    enabled: boolean;
    host: string;
    port: number;
    address: string;
  };
  api: {
    enabled: boolean;
    port: number;
  };
  queue: {
    capacity: number;
    overflow: QueueOverflowPolicy;
    maxPerTick: number;
  };
  removeActiveScene: RemoveActiveScenePolicy;
  /** Scene-manager document loaded at startup */
  scenesFile?: string;
}
