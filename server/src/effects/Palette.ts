import { ColorUtils } from './types';
import type { PaletteStop, RGB } from '../types';

const POSITION_EPSILON = 1e-9;

/**
 * Immutable color gradient defined by stops at normalized positions.
 * Stops are strictly increasing, the first sits at 0 and the last at 1.
 */
export class Palette {
  readonly stops: ReadonlyArray<Readonly<PaletteStop>>;

  constructor(stops: PaletteStop[]) {
    const problem = Palette.validate(stops);
    if (problem) {
      throw new RangeError(`Invalid palette: ${problem}`);
    }
    this.stops = Object.freeze(
      stops.map((stop) => Object.freeze({ position: stop.position, color: copyColor(stop.color) }))
    );
  }

  /**
   * Build a palette from a color list with evenly spaced stops.
   * A single color becomes a flat two-stop palette.
   */
  static fromColors(colors: RGB[]): Palette {
    if (colors.length === 0) {
      throw new RangeError('Invalid palette: at least one color is required');
    }
    if (colors.length === 1) {
      return new Palette([
        { position: 0, color: colors[0] },
        { position: 1, color: colors[0] },
      ]);
    }
    const last = colors.length - 1;
    return new Palette(colors.map((color, i) => ({ position: i / last, color })));
  }

  /**
   * Check stop ordering and ranges.
   * @returns a description of the first problem, or null when valid
   */
  static validate(stops: PaletteStop[]): string | null {
    if (stops.length < 2) {
      return 'at least two stops are required';
    }
    for (let i = 0; i < stops.length; i++) {
      const { position, color } = stops[i];
      if (!Number.isFinite(position) || position < 0 || position > 1) {
        return `stop ${i} position ${position} is outside [0, 1]`;
      }
      if (!ColorUtils.isRgb(color) || color.some((c) => c < 0 || c > 255)) {
        return `stop ${i} color must be three channels in 0-255`;
      }
      if (i > 0 && position <= stops[i - 1].position) {
        return `stop ${i} position ${position} is not above the previous stop`;
      }
    }
    if (Math.abs(stops[0].position) > POSITION_EPSILON) {
      return 'first stop must be at position 0';
    }
    if (Math.abs(stops[stops.length - 1].position - 1) > POSITION_EPSILON) {
      return 'last stop must be at position 1';
    }
    return null;
  }

  /**
   * Interpolated color at a position (clamped to [0, 1]).
   * Channels are floats; callers round when writing a frame.
   */
  colorAt(position: number): RGB {
    const x = ColorUtils.clamp(Number.isFinite(position) ? position : 0, 0, 1);
    const stops = this.stops;

    for (let i = 1; i < stops.length; i++) {
      const right = stops[i];
      if (x <= right.position) {
        const left = stops[i - 1];
        const t = (x - left.position) / (right.position - left.position);
        return ColorUtils.lerp(left.color, right.color, t);
      }
    }
    const last = stops[stops.length - 1].color;
    return [last[0], last[1], last[2]];
  }

  /** Stop positions in ascending order */
  positions(): number[] {
    return this.stops.map((stop) => stop.position);
  }

  equals(other: Palette): boolean {
    if (other.stops.length !== this.stops.length) return false;
    return this.stops.every((stop, i) => {
      const o = other.stops[i];
      return (
        stop.position === o.position &&
        stop.color[0] === o.color[0] &&
        stop.color[1] === o.color[1] &&
        stop.color[2] === o.color[2]
      );
    });
  }
}

function copyColor(color: RGB): RGB {
  return [color[0], color[1], color[2]];
}
