/**
 * Effect System Types
 *
 * Shared shapes for segments and effects, plus the color math they use.
 */

import type { Palette } from './Palette';
import type {
  BlendMode,
  ColorSource,
  FadeSettings,
  Movement,
  PulseSettings,
  RGB,
} from '../types';

export type { RGB } from '../types';

/** Read-only view of a scene's palette library, looked up by name */
export type PaletteLibrary = ReadonlyMap<string, Palette>;

/** Options accepted when creating a segment; everything but the id has a default */
export interface SegmentOptions {
  id: string;
  position?: number;
  length?: number;
  movement?: Partial<Movement>;
  color?: ColorSource;
  fade?: Partial<FadeSettings>;
  dimmer?: number;
  blend?: BlendMode;
  /** Opacity over the layers below, 0-1 */
  transparency?: number;
  pulse?: PulseSettings | null;
}

export interface EffectOptions {
  id: string;
  ledCount: number;
  palette?: string;
  background?: RGB;
}

export const DEFAULT_LED_COUNT = 225;
export const DEFAULT_FPS = 60;

/** Shown where a segment's color cannot be resolved */
export const FALLBACK_COLOR: RGB = [255, 0, 0];

export const BLACK: RGB = [0, 0, 0];

/**
 * Color utilities for effects
 */
export const ColorUtils = {
  /** Clamp a number into [min, max] */
  clamp(value: number, min: number, max: number): number {
    return Math.max(min, Math.min(max, value));
  },

  /** Round and clamp one channel to 0-255 (NaN becomes 0) */
  toByte(value: number): number {
    if (!Number.isFinite(value)) return 0;
    return Math.max(0, Math.min(255, Math.round(value)));
  },

  /** Linear interpolation between two colors, t in [0, 1] */
  lerp(a: RGB, b: RGB, t: number): RGB {
    return [
      a[0] + (b[0] - a[0]) * t,
      a[1] + (b[1] - a[1]) * t,
      a[2] + (b[2] - a[2]) * t,
    ];
  },

  /** Multiply every channel by a factor */
  scale(color: RGB, factor: number): RGB {
    return [color[0] * factor, color[1] * factor, color[2] * factor];
  },

  /** Round a float color to integer channels */
  quantize(color: RGB): RGB {
    return [ColorUtils.toByte(color[0]), ColorUtils.toByte(color[1]), ColorUtils.toByte(color[2])];
  },

  /** Per-channel add, saturating at 255 */
  addSaturating(a: RGB, b: RGB): RGB {
    return [
      Math.min(255, a[0] + b[0]),
      Math.min(255, a[1] + b[1]),
      Math.min(255, a[2] + b[2]),
    ];
  },

  /** Floored modulo (result has the sign of the divisor) */
  mod(value: number, divisor: number): number {
    return ((value % divisor) + divisor) % divisor;
  },

  isRgb(value: unknown): value is RGB {
    return (
      Array.isArray(value) &&
      value.length === 3 &&
      value.every((channel) => typeof channel === 'number' && Number.isFinite(channel))
    );
  },
};
