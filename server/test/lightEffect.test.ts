import { describe, expect, it } from 'vitest';

import { DuplicateIdError, NotFoundError } from '../src/errors';
import { LightEffect } from '../src/effects/LightEffect';
import { LightScene } from '../src/effects/LightScene';
import { LightSegment } from '../src/effects/LightSegment';
import { Palette } from '../src/effects/Palette';
import { BUILTIN_PALETTES } from '../src/presets/defaultPalettes';
import type { RGB } from '../src/types';

function solid(id: string, position: number, length: number, color: RGB): LightSegment {
  return new LightSegment({ id, position, length, color: { type: 'solid', color } });
}

describe('LightEffect rendering', () => {
  it('fills the strip with a full-length segment', () => {
    const effect = new LightEffect({ id: 'fx', ledCount: 10 });
    effect.addSegment(solid('red', 0, 10, [255, 0, 0]));
    expect(effect.render(BUILTIN_PALETTES)).toEqual(Array.from({ length: 10 }, () => [255, 0, 0]));
  });

  it('lets later segments overwrite earlier ones', () => {
    const effect = new LightEffect({ id: 'fx', ledCount: 10 });
    effect.addSegment(solid('red', 0, 5, [255, 0, 0]));
    effect.addSegment(solid('blue', 3, 5, [0, 0, 255]));

    const frame = effect.render(BUILTIN_PALETTES);
    expect(frame.slice(0, 3)).toEqual([
      [255, 0, 0],
      [255, 0, 0],
      [255, 0, 0],
    ]);
    expect(frame.slice(3, 8)).toEqual(Array.from({ length: 5 }, () => [0, 0, 255]));
    expect(frame.slice(8)).toEqual([
      [0, 0, 0],
      [0, 0, 0],
    ]);
  });

  it('adds additive segments with saturation', () => {
    const effect = new LightEffect({ id: 'fx', ledCount: 2 });
    effect.addSegment(solid('base', 0, 2, [200, 100, 0]));
    const glow = solid('glow', 0, 2, [100, 100, 100]);
    glow.blend = 'additive';
    effect.addSegment(glow);
    expect(effect.render(BUILTIN_PALETTES)).toEqual([
      [255, 200, 100],
      [255, 200, 100],
    ]);
  });

  it('composites segments over earlier ones by their transparency', () => {
    const effect = new LightEffect({ id: 'fx', ledCount: 3 });
    effect.addSegment(solid('red', 0, 3, [255, 0, 0]));
    effect.addSegment(new LightSegment({ id: 'tint', position: 0, length: 2, color: { type: 'solid', color: [0, 0, 255] }, transparency: 0.25 }));
    expect(effect.render(BUILTIN_PALETTES)).toEqual([
      [191, 0, 64],
      [191, 0, 64],
      [255, 0, 0],
    ]);
  });

  it('scales additive segments by their transparency', () => {
    const effect = new LightEffect({ id: 'fx', ledCount: 1 });
    effect.addSegment(solid('base', 0, 1, [200, 100, 0]));
    effect.addSegment(
      new LightSegment({
        id: 'glow',
        position: 0,
        length: 1,
        color: { type: 'solid', color: [100, 100, 100] },
        blend: 'additive',
        transparency: 0.5,
      })
    );
    expect(effect.render(BUILTIN_PALETTES)).toEqual([[250, 150, 50]]);
  });

  it('fills uncovered LEDs with the background', () => {
    const effect = new LightEffect({ id: 'fx', ledCount: 3, background: [1, 2, 3] });
    effect.addSegment(solid('mid', 1, 1, [9, 9, 9]));
    expect(effect.render(BUILTIN_PALETTES)).toEqual([
      [1, 2, 3],
      [9, 9, 9],
      [1, 2, 3],
    ]);
  });

  it('clips segments that run past the end', () => {
    const effect = new LightEffect({ id: 'fx', ledCount: 10 });
    effect.addSegment(solid('tail', 8, 5, [0, 255, 0]));
    const frame = effect.render(BUILTIN_PALETTES);
    expect(frame).toHaveLength(10);
    expect(frame[7]).toEqual([0, 0, 0]);
    expect(frame[8]).toEqual([0, 255, 0]);
    expect(frame[9]).toEqual([0, 255, 0]);
  });

  it('maps a full gradient onto the palette stops', () => {
    const effect = new LightEffect({ id: 'fx', ledCount: 6 });
    effect.addSegment(
      new LightSegment({ id: 'g', position: 0, length: 6, color: { type: 'gradient', start: 0, end: 1 } })
    );
    expect(effect.render(BUILTIN_PALETTES)).toEqual([
      [255, 0, 0],
      [0, 255, 0],
      [0, 0, 255],
      [255, 255, 0],
      [0, 255, 255],
      [255, 0, 255],
    ]);
  });
});

describe('LightEffect segments', () => {
  it('rejects duplicate ids and oversized segments', () => {
    const effect = new LightEffect({ id: 'fx', ledCount: 4 });
    effect.addSegment(solid('a', 0, 2, [1, 1, 1]));
    expect(() => effect.addSegment(solid('a', 0, 2, [1, 1, 1]))).toThrow(DuplicateIdError);
    expect(() => effect.addSegment(solid('b', 0, 5, [1, 1, 1]))).toThrow(RangeError);
    expect(effect.listSegments().map((segment) => segment.id)).toEqual(['a']);
  });

  it('reports missing segments', () => {
    const effect = new LightEffect({ id: 'fx', ledCount: 4 });
    expect(() => effect.getSegment('nope')).toThrow(NotFoundError);
    expect(() => effect.removeSegment('nope')).toThrow(NotFoundError);
  });
});

describe('LightEffect palettes', () => {
  const palettes = new Map([
    ['dark', Palette.fromColors([[0, 0, 0]])],
    ['sunset', Palette.fromColors([[255, 255, 255]])],
  ]);

  function gradientEffect(): LightEffect {
    const effect = new LightEffect({ id: 'fx', ledCount: 2, palette: 'dark' });
    effect.addSegment(
      new LightSegment({ id: 'g', position: 0, length: 2, color: { type: 'gradient', start: 0, end: 1 } })
    );
    return effect;
  }

  it('switches palette immediately and idempotently', () => {
    const effect = gradientEffect();
    effect.setPalette('sunset', palettes);
    const once = effect.render(palettes);
    effect.setPalette('sunset', palettes);
    expect(effect.render(palettes)).toEqual(once);
    expect(once).toEqual([
      [255, 255, 255],
      [255, 255, 255],
    ]);
  });

  it('rejects unknown palette names without changing state', () => {
    const effect = gradientEffect();
    expect(() => effect.setPalette('missing', palettes)).toThrow(NotFoundError);
    expect(() => effect.changePalette('missing', 1, palettes)).toThrow(NotFoundError);
    expect(effect.paletteName).toBe('dark');
  });

  it('cross-fades to a new palette over the given duration', () => {
    const effect = gradientEffect();
    effect.changePalette('sunset', 2, palettes);
    expect(effect.paletteName).toBe('sunset');

    effect.update(1);
    expect(effect.effectivePalette(palettes).colorAt(0.5)).toEqual([127.5, 127.5, 127.5]);
    expect(effect.render(palettes)).toEqual([
      [128, 128, 128],
      [128, 128, 128],
    ]);

    effect.update(1);
    expect(effect.activeTransition).toBeNull();
    expect(effect.render(palettes)[0]).toEqual([255, 255, 255]);
  });

  it('starts a new transition from the blended palette', () => {
    const effect = gradientEffect();
    effect.changePalette('sunset', 2, palettes);
    effect.update(1);

    effect.changePalette('dark', 2, palettes);
    expect(effect.activeTransition?.source.colorAt(0)).toEqual([127.5, 127.5, 127.5]);

    effect.update(1);
    expect(effect.render(palettes)).toEqual([
      [64, 64, 64],
      [64, 64, 64],
    ]);
  });

  it('keeps the captured target when the scene library changes mid-transition', () => {
    const scene = new LightScene({ id: 'main', palettes, currentPalette: 'dark' });
    scene.addEffect(gradientEffect());
    scene.getEffect('fx').changePalette('sunset', 2, scene.paletteLibrary);

    scene.updatePalettes(
      new Map([
        ['dark', Palette.fromColors([[0, 0, 0]])],
        ['sunset', Palette.fromColors([[255, 0, 0]])],
      ])
    );

    scene.update(1);
    expect(scene.render()[0]).toEqual([128, 128, 128]);
    scene.update(0.5);
    expect(scene.render()[0]).toEqual([191, 191, 191]);

    // Once complete, the name resolves through the new library
    scene.update(0.5);
    expect(scene.getEffect('fx').activeTransition).toBeNull();
    expect(scene.render()[0]).toEqual([255, 0, 0]);
  });

  it('switches at once when the duration is zero', () => {
    const effect = gradientEffect();
    effect.changePalette('sunset', 0, palettes);
    expect(effect.activeTransition).toBeNull();
    expect(effect.render(palettes)[1]).toEqual([255, 255, 255]);
  });

  it('falls back to the default palette when its name is unknown', () => {
    const effect = new LightEffect({ id: 'fx', ledCount: 1, palette: 'nowhere' });
    effect.addSegment(new LightSegment({ id: 'g', position: 0, length: 1, color: { type: 'gradient', start: 0, end: 0 } }));
    expect(effect.render(new Map())).toEqual([[255, 0, 0]]);
  });
});
