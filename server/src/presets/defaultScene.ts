import { LightEffect } from '../effects/LightEffect';
import { DEFAULT_MOVE_SPEED, DEFAULT_SEGMENT_LENGTH, LightSegment } from '../effects/LightSegment';
import { LightScene } from '../effects/LightScene';

const PALETTE_COLOR_COUNT = 6;

/** Palette position of the n-th evenly spaced palette color */
function paletteIndex(n: number): number {
  return (n % PALETTE_COLOR_COUNT) / (PALETTE_COLOR_COUNT - 1);
}

/**
 * Scene created by `createScene`: one effect holding one segment that
 * bounces across the strip with the first colors of the palette.
 */
export function createDefaultScene(id: string, ledCount: number): LightScene {
  const scene = new LightScene({ id });
  const effect = new LightEffect({ id: '1', ledCount });
  effect.addSegment(createDefaultSegment('1', ledCount));
  scene.addEffect(effect);
  return scene;
}

/** Segment added when no settings are given */
export function createDefaultSegment(id: string, ledCount: number): LightSegment {
  return new LightSegment({
    id,
    position: 0,
    length: Math.min(DEFAULT_SEGMENT_LENGTH, ledCount),
    movement: { mode: 'bounce', speed: DEFAULT_MOVE_SPEED, bounds: [0, ledCount - 1] },
    color: { type: 'gradient', start: paletteIndex(0), end: paletteIndex(3) },
  });
}

/**
 * Startup scene: three effects of three segments each. Segments start
 * 30 LEDs apart around the centre, alternate direction, and each shows
 * one palette color.
 */
export function createStartupScene(id: string, ledCount: number, effectCount = 3, segmentCount = 3): LightScene {
  const scene = new LightScene({ id });
  const centre = Math.floor(ledCount / 2);

  for (let e = 1; e <= effectCount; e++) {
    const effect = new LightEffect({ id: String(e), ledCount });
    for (let s = 1; s <= segmentCount; s++) {
      effect.addSegment(
        new LightSegment({
          id: String(s),
          position: centre - 30 + s * 30,
          length: Math.min(DEFAULT_SEGMENT_LENGTH, ledCount),
          movement: {
            mode: 'bounce',
            speed: DEFAULT_MOVE_SPEED * (s % 2 === 0 ? 1 : -1),
            bounds: [0, ledCount - 1],
          },
          color: { type: 'gradient', start: paletteIndex(s), end: paletteIndex(s) },
        })
      );
    }
    scene.addEffect(effect);
  }
  return scene;
}
