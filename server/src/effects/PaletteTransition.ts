import { Palette } from './Palette';
import { ColorUtils } from './types';

/**
 * Timed cross-fade between two palette snapshots.
 *
 * Both ends are captured when the transition starts, so replacing the
 * scene's palettes mid-way does not re-target it.
 */
export class PaletteTransition {
  readonly source: Palette;
  readonly target: Palette;
  readonly targetName: string;
  /** Seconds */
  readonly duration: number;
  private elapsedSeconds = 0;
  private positions: number[];
  private cached: { progress: number; palette: Palette } | null = null;

  constructor(source: Palette, target: Palette, targetName: string, duration: number) {
    if (!(duration > 0)) {
      throw new RangeError(`Transition duration must be positive, got ${duration}`);
    }
    this.source = source;
    this.target = target;
    this.targetName = targetName;
    this.duration = duration;
    this.positions = mergePositions(source.positions(), target.positions());
  }

  get elapsed(): number {
    return this.elapsedSeconds;
  }

  /** Blend weight of the target, clamp(elapsed / duration, 0, 1) */
  get progress(): number {
    return ColorUtils.clamp(this.elapsedSeconds / this.duration, 0, 1);
  }

  isComplete(): boolean {
    return this.elapsedSeconds >= this.duration;
  }

  /** Advance wall time. Negative deltas are ignored so progress never goes back. */
  advance(dt: number): void {
    if (dt > 0) {
      this.elapsedSeconds += dt;
    }
  }

  /** The palette to render with right now */
  current(): Palette {
    const progress = this.progress;
    if (progress <= 0) return this.source;
    if (progress >= 1) return this.target;
    if (this.cached?.progress === progress) return this.cached.palette;

    const palette = new Palette(
      this.positions.map((position) => ({
        position,
        color: ColorUtils.lerp(this.source.colorAt(position), this.target.colorAt(position), progress),
      }))
    );
    this.cached = { progress, palette };
    return palette;
  }
}

function mergePositions(a: number[], b: number[]): number[] {
  const merged = [...a, ...b].sort((x, y) => x - y);
  return merged.filter((position, i) => i === 0 || position - merged[i - 1] > 1e-9);
}
