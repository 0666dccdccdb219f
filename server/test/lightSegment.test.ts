import { afterEach, describe, expect, it, vi } from 'vitest';

import { LightSegment } from '../src/effects/LightSegment';
import { Palette } from '../src/effects/Palette';
import { FALLBACK_COLOR } from '../src/effects/types';

const palette = Palette.fromColors([
  [0, 0, 0],
  [250, 250, 250],
]);

afterEach(() => {
  vi.restoreAllMocks();
});

describe('LightSegment coverage', () => {
  it('covers indices from position up to position + length', () => {
    const segment = new LightSegment({ id: 's', position: 2.5, length: 3 });
    expect(segment.covers(2)).toBe(false);
    expect(segment.covers(3)).toBe(true);
    expect(segment.covers(5)).toBe(true);
    expect(segment.covers(6)).toBe(false);
    expect(segment.coveredRange()).toEqual([3, 6]);
  });

  it('maps the first and last LED to 0 and 1', () => {
    const segment = new LightSegment({ id: 's', position: 0, length: 10 });
    expect(segment.relativePosition(0)).toBe(0);
    expect(segment.relativePosition(9)).toBe(1);
    expect(new LightSegment({ id: 'one', length: 1 }).relativePosition(0)).toBe(0);
  });

  it('rejects bad lengths and clamps to the effect size', () => {
    expect(() => new LightSegment({ id: 's', length: 0 })).toThrow(RangeError);
    const segment = new LightSegment({ id: 's', length: 5 });
    segment.setLength(50, 20);
    expect(segment.length).toBe(20);
    expect(() => segment.setLength(2.5, 20)).toThrow(RangeError);
  });
});

describe('LightSegment movement', () => {
  it('stays put when static', () => {
    const segment = new LightSegment({ id: 's', position: 4, movement: { mode: 'static', speed: 50 } });
    segment.advance(1);
    expect(segment.position).toBe(4);
  });

  it('moves forward in linear mode and wraps past the upper bound', () => {
    const segment = new LightSegment({
      id: 's',
      position: 0,
      movement: { mode: 'linear', speed: 10, bounds: [0, 100] },
    });
    segment.advance(0.5);
    expect(segment.position).toBe(5);

    segment.setPosition(95);
    segment.advance(1);
    expect(segment.position).toBe(5);

    segment.setSpeed(-4);
    segment.advance(1);
    expect(segment.position).toBe(9);
  });

  it('wraps in both directions', () => {
    const segment = new LightSegment({
      id: 's',
      position: 2,
      movement: { mode: 'wrap', speed: -5, bounds: [0, 100] },
    });
    segment.advance(1);
    expect(segment.position).toBe(97);
  });

  it('reflects at the bounds and reverses speed when bouncing', () => {
    const segment = new LightSegment({
      id: 's',
      position: 95,
      movement: { mode: 'bounce', speed: 10, bounds: [0, 100] },
    });
    segment.advance(1);
    expect(segment.position).toBe(95);
    expect(segment.movement.speed).toBe(-10);

    segment.advance(1);
    expect(segment.position).toBe(85);
    expect(segment.movement.speed).toBe(-10);
  });

  it('never leaves its bounds while bouncing', () => {
    const segment = new LightSegment({
      id: 's',
      position: 20,
      movement: { mode: 'bounce', speed: 37, bounds: [10, 60] },
    });
    for (let i = 0; i < 500; i++) {
      segment.advance(0.37);
      expect(segment.position).toBeGreaterThanOrEqual(10);
      expect(segment.position).toBeLessThanOrEqual(60);
    }
  });

  it('orders bounds and pulls the position inside them', () => {
    const segment = new LightSegment({ id: 's', position: 0 });
    segment.setBounds(50, 10);
    expect(segment.movement.bounds).toEqual([10, 50]);
    expect(segment.position).toBe(10);
  });

  it('ignores non-positive time steps', () => {
    const segment = new LightSegment({
      id: 's',
      position: 10,
      movement: { mode: 'linear', speed: 10, bounds: [0, 100] },
    });
    segment.advance(0);
    segment.advance(-1);
    expect(segment.position).toBe(10);
    expect(segment.elapsed).toBe(0);
  });
});

describe('LightSegment color', () => {
  it('applies the dimmer', () => {
    const segment = new LightSegment({
      id: 's',
      length: 2,
      color: { type: 'solid', color: [200, 100, 50] },
      dimmer: 0.5,
    });
    expect(segment.colorAt(0, palette, new Map())).toEqual([100, 50, 25]);
    expect(segment.colorAt(5, palette, new Map())).toBeNull();
  });

  it('samples the effect palette across a gradient', () => {
    const segment = new LightSegment({
      id: 's',
      length: 3,
      color: { type: 'gradient', start: 0, end: 1 },
    });
    expect(segment.colorAt(1, palette, new Map())).toEqual([125, 125, 125]);
  });

  it('reads a named palette for a slice', () => {
    const red = Palette.fromColors([[255, 0, 0]]);
    const segment = new LightSegment({
      id: 's',
      length: 2,
      color: { type: 'slice', palette: 'red', start: 0, end: 1 },
    });
    expect(segment.colorAt(1, palette, new Map([['red', red]]))).toEqual([255, 0, 0]);
  });

  it('shows the fallback color for a missing slice palette and warns once', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const segment = new LightSegment({
      id: 's',
      length: 2,
      color: { type: 'slice', palette: 'gone', start: 0, end: 1 },
    });
    expect(segment.colorAt(0, palette, new Map())).toEqual(FALLBACK_COLOR);
    expect(segment.colorAt(1, palette, new Map())).toEqual(FALLBACK_COLOR);
    expect(warn).toHaveBeenCalledTimes(1);
  });
});

describe('LightSegment fade', () => {
  it('keeps in + out ratios within 1', () => {
    const segment = new LightSegment({ id: 's' });
    segment.setFadeRatios(0.7, 0.6);
    expect(segment.fade.inRatio).toBe(0.7);
    expect(segment.fade.outRatio).toBeCloseTo(0.3);
  });

  it('ramps brightness at the edges only when enabled', () => {
    const segment = new LightSegment({ id: 's', fade: { inRatio: 0.5, outRatio: 0.25 } });
    expect(segment.fadeMultiplier(0.25)).toBe(1);

    segment.setFadeEnabled(true);
    expect(segment.fadeMultiplier(0.25)).toBe(0.5);
    expect(segment.fadeMultiplier(0.6)).toBe(1);
    expect(segment.fadeMultiplier(0.875)).toBe(0.5);
  });
});

describe('LightSegment pulse', () => {
  it('follows the envelope over the cycle', () => {
    const segment = new LightSegment({
      id: 's',
      pulse: { fadeInStart: 0, fadeInEnd: 100, fadeOutStart: 200, fadeOutEnd: 300, cycle: 400, timeScale: 1 },
    });
    segment.advance(0.05);
    expect(segment.pulseMultiplier()).toBeCloseTo(0.5);
    segment.advance(0.1);
    expect(segment.pulseMultiplier()).toBeCloseTo(1);
    segment.advance(0.1);
    expect(segment.pulseMultiplier()).toBeCloseTo(0.5);
    segment.advance(0.1);
    expect(segment.pulseMultiplier()).toBe(0);
    segment.advance(0.1);
    expect(segment.pulseMultiplier()).toBeCloseTo(0.5);
  });

  it('stretches the envelope by the time scale', () => {
    const segment = new LightSegment({
      id: 's',
      pulse: { fadeInStart: 0, fadeInEnd: 100, fadeOutStart: 200, fadeOutEnd: 300, cycle: 400, timeScale: 1 },
    });
    segment.setPulseTimeScale(2);
    segment.advance(0.1);
    expect(segment.pulseMultiplier()).toBeCloseTo(0.5);
  });

  it('is always on without a pulse', () => {
    const segment = new LightSegment({ id: 's' });
    segment.advance(3);
    expect(segment.pulseMultiplier()).toBe(1);
  });
});
