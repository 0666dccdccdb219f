import {
  ColorUtils,
  DEFAULT_LED_COUNT,
  FALLBACK_COLOR,
  type PaletteLibrary,
  type SegmentOptions,
} from './types';
import type { Palette } from './Palette';
import type {
  BlendMode,
  ColorSource,
  FadeSettings,
  Movement,
  MovementMode,
  PulseSettings,
  RGB,
} from '../types';

export const DEFAULT_SEGMENT_LENGTH = 10;
export const DEFAULT_MOVE_SPEED = 10;
export const DEFAULT_MOVE_RANGE: [number, number] = [0, DEFAULT_LED_COUNT - 1];

export const MOVEMENT_MODES: ReadonlyArray<MovementMode> = ['static', 'linear', 'bounce', 'wrap'];
export const BLEND_MODES: ReadonlyArray<BlendMode> = ['overwrite', 'additive'];

/**
 * A contiguous animated run of LEDs inside an effect.
 *
 * Position is a float LED index; the segment covers every integer index i
 * with position <= i < position + length.
 */
export class LightSegment {
  readonly id: string;
  private _position: number;
  private _length: number;
  private _movement: Movement;
  color: ColorSource;
  private _fade: FadeSettings;
  private _dimmer: number;
  blend: BlendMode;
  private _transparency: number;
  private _pulse: PulseSettings | null;
  private _elapsed = 0;

  constructor(options: SegmentOptions) {
    if (!options.id) {
      throw new RangeError('Segment id must be a non-empty string');
    }
    this.id = options.id;
    this._length = validateLength(options.length ?? DEFAULT_SEGMENT_LENGTH);
    this._movement = {
      mode: options.movement?.mode ?? 'static',
      speed: options.movement?.speed ?? 0,
      bounds: normalizeBounds(options.movement?.bounds ?? DEFAULT_MOVE_RANGE),
    };
    this._position = this.constrain(options.position ?? this._movement.bounds[0]);
    this.color = options.color ?? { type: 'solid', color: [255, 255, 255] };
    this._fade = {
      enabled: options.fade?.enabled ?? false,
      inRatio: 0,
      outRatio: 0,
    };
    this.setFadeRatios(options.fade?.inRatio ?? 0, options.fade?.outRatio ?? 0);
    this._dimmer = ColorUtils.clamp(options.dimmer ?? 1, 0, 1);
    this.blend = options.blend ?? 'overwrite';
    this._transparency = ColorUtils.clamp(options.transparency ?? 1, 0, 1);
    this._pulse = options.pulse ? { ...options.pulse } : null;
  }

  get position(): number {
    return this._position;
  }

  get length(): number {
    return this._length;
  }

  get movement(): Readonly<Movement> {
    return this._movement;
  }

  get fade(): Readonly<FadeSettings> {
    return this._fade;
  }

  get dimmer(): number {
    return this._dimmer;
  }

  /** Opacity when composited over earlier segments; 1 covers them fully */
  get transparency(): number {
    return this._transparency;
  }

  get pulse(): Readonly<PulseSettings> | null {
    return this._pulse;
  }

  /** Seconds this segment has been animated for */
  get elapsed(): number {
    return this._elapsed;
  }

  // ---------------------------------------------------------------------------
  // Setters used by the command router
  // ---------------------------------------------------------------------------

  setPosition(position: number): void {
    this._position = this.constrain(position);
  }

  /**
   * @param maxLength the owning effect's LED count
   */
  setLength(length: number, maxLength: number): void {
    this._length = Math.min(validateLength(length), maxLength);
  }

  setSpeed(speed: number): void {
    if (!Number.isFinite(speed)) {
      throw new RangeError(`Speed must be finite, got ${speed}`);
    }
    this._movement.speed = speed;
  }

  setMode(mode: MovementMode): void {
    this._movement.mode = mode;
    this._position = this.constrain(this._position);
  }

  setBounds(a: number, b: number): void {
    this._movement.bounds = normalizeBounds([a, b]);
    this._position = this.constrain(this._position);
  }

  setDimmer(dimmer: number): void {
    this._dimmer = ColorUtils.clamp(dimmer, 0, 1);
  }

  setTransparency(transparency: number): void {
    this._transparency = ColorUtils.clamp(transparency, 0, 1);
  }

  setFadeEnabled(enabled: boolean): void {
    this._fade.enabled = enabled;
  }

  /**
   * Ratios are clamped to [0, 1]; when their sum exceeds 1 the fade-out
   * ratio is reduced to fit.
   */
  setFadeRatios(inRatio: number, outRatio: number): void {
    const fadeIn = ColorUtils.clamp(inRatio, 0, 1);
    const fadeOut = Math.min(ColorUtils.clamp(outRatio, 0, 1), 1 - fadeIn);
    this._fade.inRatio = fadeIn;
    this._fade.outRatio = fadeOut;
  }

  setPulse(pulse: PulseSettings | null): void {
    this._pulse = pulse ? { ...pulse } : null;
  }

  setPulseTimeScale(timeScale: number): void {
    if (this._pulse) {
      this._pulse.timeScale = Math.max(0.1, timeScale);
    }
  }

  // ---------------------------------------------------------------------------
  // Animation
  // ---------------------------------------------------------------------------

  /**
   * Move by the movement rule and advance the pulse phase.
   */
  advance(dt: number): void {
    if (!(dt > 0)) return;
    this._elapsed += dt;

    const { mode, speed, bounds } = this._movement;
    const [min, max] = bounds;
    const span = max - min;

    switch (mode) {
      case 'static':
        this._position = this.constrain(this._position);
        return;
      case 'linear':
        this._position = wrapInto(this._position + Math.abs(speed) * dt, min, max);
        return;
      case 'wrap':
        this._position = wrapInto(this._position + speed * dt, min, max);
        return;
      case 'bounce': {
        if (span <= 0) {
          this._position = min;
          return;
        }
        // Fold the travelled distance onto [0, 2*span); the second half of
        // the period is the return leg.
        const start = ColorUtils.clamp(this._position, min, max) - min;
        const folded = ColorUtils.mod(start + speed * dt, 2 * span);
        if (folded <= span) {
          this._position = min + folded;
        } else {
          this._position = min + (2 * span - folded);
        }
        const legs = Math.floor((start + speed * dt) / span);
        if (ColorUtils.mod(legs, 2) === 1) {
          this._movement.speed = -speed;
        }
        return;
      }
    }
  }

  /** True when this segment writes the given LED index */
  covers(ledIndex: number): boolean {
    return ledIndex >= this._position && ledIndex < this._position + this._length;
  }

  /** First and one-past-last integer LED index covered */
  coveredRange(): [number, number] {
    const first = Math.ceil(this._position);
    return [first, Math.ceil(this._position + this._length)];
  }

  /**
   * Composited color for one LED, as float channels.
   * @param effectPalette the owning effect's effective palette
   * @param palettes the scene library, used by palette slices
   * @returns null when the index is not covered
   */
  colorAt(ledIndex: number, effectPalette: Palette, palettes: PaletteLibrary): RGB | null {
    if (!this.covers(ledIndex)) return null;

    const t = this.relativePosition(ledIndex);
    const base = this.baseColor(t, effectPalette, palettes);
    const brightness = this.fadeMultiplier(t) * this.pulseMultiplier() * this._dimmer;
    return ColorUtils.scale(base, brightness);
  }

  /** Normalized offset within the segment, 0 at the first LED and 1 at the last */
  relativePosition(ledIndex: number): number {
    if (this._length <= 1) return 0;
    return ColorUtils.clamp((ledIndex - this._position) / (this._length - 1), 0, 1);
  }

  fadeMultiplier(t: number): number {
    const { enabled, inRatio, outRatio } = this._fade;
    if (!enabled) return 1;
    if (inRatio > 0 && t < inRatio) {
      return t / inRatio;
    }
    if (outRatio > 0 && t > 1 - outRatio) {
      return (1 - t) / outRatio;
    }
    return 1;
  }

  /** Time-based envelope; 1 when no pulse is configured */
  pulseMultiplier(): number {
    const pulse = this._pulse;
    if (!pulse) return 1;
    const scale = pulse.timeScale;
    const cycle = pulse.cycle * scale;
    if (!(cycle > 0)) return 1;

    const now = ColorUtils.mod(this._elapsed * 1000, cycle);
    const fadeInStart = pulse.fadeInStart * scale;
    const fadeInEnd = pulse.fadeInEnd * scale;
    const fadeOutStart = pulse.fadeOutStart * scale;
    const fadeOutEnd = pulse.fadeOutEnd * scale;

    if (now < fadeInStart) return 0;
    if (now < fadeInEnd) return (now - fadeInStart) / Math.max(1, fadeInEnd - fadeInStart);
    if (now < fadeOutStart) return 1;
    if (now < fadeOutEnd) return 1 - (now - fadeOutStart) / Math.max(1, fadeOutEnd - fadeOutStart);
    return 0;
  }

  private baseColor(t: number, effectPalette: Palette, palettes: PaletteLibrary): RGB {
    const source = this.color;
    switch (source.type) {
      case 'solid':
        return source.color;
      case 'gradient':
        return effectPalette.colorAt(source.start + (source.end - source.start) * t);
      case 'slice': {
        const palette = palettes.get(source.palette);
        if (!palette) {
          this.reportMissingPalette(source.palette);
          return FALLBACK_COLOR;
        }
        return palette.colorAt(source.start + (source.end - source.start) * t);
      }
    }
  }

  private missingPaletteLogged: string | null = null;

  private reportMissingPalette(name: string): void {
    if (this.missingPaletteLogged === name) return;
    this.missingPaletteLogged = name;
    console.warn(`[LightSegment] Segment ${this.id} references missing palette "${name}", using fallback color`);
  }

  private constrain(position: number): number {
    if (!Number.isFinite(position)) {
      throw new RangeError(`Position must be finite, got ${position}`);
    }
    const [min, max] = this._movement.bounds;
    return ColorUtils.clamp(position, min, max);
  }
}

function validateLength(length: number): number {
  if (!Number.isInteger(length) || length < 1) {
    throw new RangeError(`Segment length must be an integer >= 1, got ${length}`);
  }
  return length;
}

function normalizeBounds([a, b]: [number, number]): [number, number] {
  if (!Number.isFinite(a) || !Number.isFinite(b)) {
    throw new RangeError(`Movement bounds must be finite, got [${a}, ${b}]`);
  }
  return [Math.min(a, b), Math.max(a, b)];
}

/**
 * Continuous loop over [min, max]: leaving past max re-enters at min and
 * leaving below min re-enters at max.
 */
function wrapInto(position: number, min: number, max: number): number {
  const span = max - min;
  if (span <= 0) return min;
  if (position > max) return min + ColorUtils.mod(position - max, span);
  if (position < min) return max - ColorUtils.mod(min - position, span);
  return position;
}
