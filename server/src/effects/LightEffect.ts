import { DuplicateIdError, NotFoundError } from '../errors';
import { DEFAULT_PALETTE, DEFAULT_PALETTE_NAME } from '../presets/defaultPalettes';
import type { LightSegment } from './LightSegment';
import type { Palette } from './Palette';
import { PaletteTransition } from './PaletteTransition';
import { BLACK, ColorUtils, type EffectOptions, type PaletteLibrary } from './types';
import type { LedBuffer, RGB } from '../types';

/**
 * An ordered set of segments rendered into one LED buffer.
 *
 * Insertion order is render order: later segments are composited over
 * earlier ones by their transparency, or added onto them when marked
 * additive.
 */
export class LightEffect {
  readonly id: string;
  /** Fixed at creation; bounds every segment */
  readonly ledCount: number;
  background: RGB;
  private segments: Map<string, LightSegment> = new Map();
  private _paletteName: string;
  private transition: PaletteTransition | null = null;

  constructor(options: EffectOptions) {
    if (!options.id) {
      throw new RangeError('Effect id must be a non-empty string');
    }
    if (!Number.isInteger(options.ledCount) || options.ledCount < 1) {
      throw new RangeError(`LED count must be an integer >= 1, got ${options.ledCount}`);
    }
    this.id = options.id;
    this.ledCount = options.ledCount;
    this._paletteName = options.palette ?? DEFAULT_PALETTE_NAME;
    this.background = options.background ? [...options.background] : [...BLACK];
  }

  get paletteName(): string {
    return this._paletteName;
  }

  /** The transition in flight, if any */
  get activeTransition(): PaletteTransition | null {
    return this.transition;
  }

  // ---------------------------------------------------------------------------
  // Segments
  // ---------------------------------------------------------------------------

  addSegment(segment: LightSegment): void {
    if (this.segments.has(segment.id)) {
      throw new DuplicateIdError('segment', segment.id);
    }
    if (segment.length > this.ledCount) {
      throw new RangeError(
        `Segment ${segment.id} length ${segment.length} exceeds effect ${this.id} LED count ${this.ledCount}`
      );
    }
    this.segments.set(segment.id, segment);
  }

  removeSegment(id: string): void {
    if (!this.segments.delete(id)) {
      throw new NotFoundError('segment', id);
    }
  }

  getSegment(id: string): LightSegment {
    const segment = this.segments.get(id);
    if (!segment) {
      throw new NotFoundError('segment', id);
    }
    return segment;
  }

  hasSegment(id: string): boolean {
    return this.segments.has(id);
  }

  /** Segments in render order */
  listSegments(): LightSegment[] {
    return [...this.segments.values()];
  }

  // ---------------------------------------------------------------------------
  // Palettes
  // ---------------------------------------------------------------------------

  /**
   * Switch palette immediately, cancelling any transition.
   */
  setPalette(name: string, palettes: PaletteLibrary): void {
    if (!palettes.has(name)) {
      throw new NotFoundError('palette', name);
    }
    this._paletteName = name;
    this.transition = null;
  }

  /**
   * Cross-fade from what is rendered now to the named palette.
   * Replaces a transition already in flight.
   * @param duration seconds; zero or less switches immediately
   */
  changePalette(name: string, duration: number, palettes: PaletteLibrary): void {
    const target = palettes.get(name);
    if (!target) {
      throw new NotFoundError('palette', name);
    }
    if (!(duration > 0)) {
      this.setPalette(name, palettes);
      return;
    }
    const source = this.effectivePalette(palettes);
    this.transition = new PaletteTransition(source, target, name, duration);
    this._paletteName = name;
  }

  /**
   * Point at another palette name without touching a transition in flight.
   * Used when the scene's library drops the palette this effect used.
   */
  adoptPalette(name: string): void {
    this._paletteName = name;
  }

  /**
   * The palette segments render with: the transition blend while one is in
   * flight, otherwise the named palette, falling back to the built-in default.
   */
  effectivePalette(palettes: PaletteLibrary): Palette {
    if (this.transition) {
      return this.transition.current();
    }
    return palettes.get(this._paletteName) ?? DEFAULT_PALETTE;
  }

  // ---------------------------------------------------------------------------
  // Frame
  // ---------------------------------------------------------------------------

  /**
   * Advance every segment and the palette transition.
   * Segments do not read each other, so order does not matter here.
   */
  update(dt: number): void {
    for (const segment of this.segments.values()) {
      segment.advance(dt);
    }
    if (this.transition) {
      this.transition.advance(dt);
      if (this.transition.isComplete()) {
        this.transition = null;
      }
    }
  }

  render(palettes: PaletteLibrary): LedBuffer {
    const buffer: LedBuffer = [];
    for (let i = 0; i < this.ledCount; i++) {
      buffer.push([this.background[0], this.background[1], this.background[2]]);
    }

    const effectPalette = this.effectivePalette(palettes);
    for (const segment of this.segments.values()) {
      const [first, end] = segment.coveredRange();
      const from = Math.max(0, first);
      const to = Math.min(this.ledCount, end);
      for (let i = from; i < to; i++) {
        const color = segment.colorAt(i, effectPalette, palettes);
        if (!color) continue;
        const alpha = segment.transparency;
        buffer[i] =
          segment.blend === 'additive'
            ? ColorUtils.addSaturating(buffer[i], ColorUtils.quantize(ColorUtils.scale(color, alpha)))
            : ColorUtils.quantize(ColorUtils.lerp(buffer[i], color, alpha));
      }
    }
    return buffer;
  }
}
