import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { QueueOverflowError } from '../src/errors';
import { LightEffect } from '../src/effects/LightEffect';
import { LightScene } from '../src/effects/LightScene';
import { LightSegment } from '../src/effects/LightSegment';
import { SceneManager } from '../src/effects/SceneManager';
import { CommandQueue } from '../src/mapping/CommandQueue';
import { RenderLoop, type Intent } from '../src/streaming/RenderLoop';
import type { LedBuffer } from '../src/types';

let now = 0;
const clock = () => now;

function movingDotManager(): SceneManager {
  const manager = new SceneManager({ idleLedCount: 20 });
  const scene = new LightScene({ id: 'main' });
  const effect = new LightEffect({ id: 'dot', ledCount: 20 });
  effect.addSegment(
    new LightSegment({
      id: 'dot',
      position: 0,
      length: 1,
      movement: { mode: 'linear', speed: 10, bounds: [0, 19] },
      color: { type: 'solid', color: [255, 255, 255] },
    })
  );
  scene.addEffect(effect);
  manager.addScene(scene);
  return manager;
}

function createLoop(manager: SceneManager, capacity = 16, maxIntentsPerTick = 16): RenderLoop {
  const queue = new CommandQueue<Intent>({ capacity, overflow: 'drop-newest' });
  return new RenderLoop(manager, queue, { fps: 10, ledCount: 20, maxIntentsPerTick, clock });
}

beforeEach(() => {
  now = 0;
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
  vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  vi.spyOn(console, 'error').mockImplementation(() => undefined);
});

afterEach(() => {
  vi.useRealTimers();
  vi.restoreAllMocks();
});

describe('RenderLoop', () => {
  it('advances animation by the measured wall time', () => {
    const loop = createLoop(movingDotManager());

    const first = loop.tick();
    expect(first[0]).toEqual([255, 255, 255]);

    now = 500;
    const second = loop.tick();
    expect(second[0]).toEqual([0, 0, 0]);
    expect(second[5]).toEqual([255, 255, 255]);
    expect(loop.getStats().frames).toBe(2);
  });

  it('measures frame time on the monotonic clock by default', () => {
    const queue = new CommandQueue<Intent>({ capacity: 16, overflow: 'drop-newest' });
    vi.spyOn(performance, 'now').mockReturnValueOnce(1000).mockReturnValueOnce(1500);
    vi.spyOn(Date, 'now').mockReturnValue(0);
    const loop = new RenderLoop(movingDotManager(), queue, { fps: 10, ledCount: 20 });

    const frame = loop.tick();
    expect(frame[5]).toEqual([255, 255, 255]);
  });

  it('applies queued intents before rendering the frame', () => {
    const manager = movingDotManager();
    const loop = createLoop(manager);
    loop.enqueue({
      label: 'background',
      apply: (m) => {
        m.getScene('main').getEffect('dot').background = [0, 0, 9];
      },
    });
    expect(loop.tick()[10]).toEqual([0, 0, 9]);
  });

  it('resolves run() with the value computed inside the tick', async () => {
    const loop = createLoop(movingDotManager());
    const ids = loop.run('list', (manager) => manager.listScenes());
    loop.tick();
    await expect(ids).resolves.toEqual(['main']);
  });

  it('rejects run() when the work throws, and keeps rendering', async () => {
    const loop = createLoop(movingDotManager());
    const failing = loop.run('missing', (manager) => manager.getScene('nope'));
    const frame = loop.tick();
    await expect(failing).rejects.toMatchObject({ code: 'NOT_FOUND' });
    expect(frame).toHaveLength(20);
  });

  it('limits the intents applied per tick', () => {
    const loop = createLoop(movingDotManager(), 16, 2);
    const applied: string[] = [];
    for (const label of ['a', 'b', 'c']) {
      loop.enqueue({ label, apply: () => applied.push(label) });
    }
    loop.tick();
    expect(applied).toEqual(['a', 'b']);
    expect(loop.getStats().queued).toBe(1);
    loop.tick();
    expect(applied).toEqual(['a', 'b', 'c']);
  });

  it('rejects work dropped by a full queue', async () => {
    const loop = createLoop(movingDotManager(), 1);
    const kept = loop.run('kept', () => 'ok');
    const dropped = loop.run('dropped', () => 'never');
    await expect(dropped).rejects.toBeInstanceOf(QueueOverflowError);
    loop.tick();
    await expect(kept).resolves.toBe('ok');
    expect(loop.getStats().dropped).toBe(1);
  });

  it('pads the frame to the configured LED count', () => {
    const loop = createLoop(new SceneManager({ idleLedCount: 5 }));
    const frame = loop.tick();
    expect(frame).toHaveLength(20);
    expect(frame.every((color) => color[0] === 0 && color[1] === 0 && color[2] === 0)).toBe(true);
  });

  it('repeats the last frame when rendering fails', () => {
    const manager = movingDotManager();
    const loop = createLoop(manager);
    const good = loop.tick();

    const errors: Error[] = [];
    loop.on('tickError', (error: Error) => errors.push(error));
    vi.spyOn(manager, 'render').mockImplementation(() => {
      throw new Error('render exploded');
    });

    now = 500;
    expect(loop.tick()).toEqual(good);
    expect(errors.map((error) => error.message)).toEqual(['render exploded']);
  });

  it('delivers frames to sinks and reports sink failures', async () => {
    const loop = createLoop(movingDotManager());
    const received: LedBuffer[] = [];
    const sinkErrors: Error[] = [];
    loop.on('sinkError', (error: Error) => sinkErrors.push(error));
    loop.addSink((frame) => {
      received.push(frame);
    });
    loop.addSink(async () => {
      throw new Error('socket closed');
    });

    loop.tick();
    await new Promise((resolve) => setImmediate(resolve));

    expect(received).toHaveLength(1);
    expect(sinkErrors.map((error) => error.message)).toEqual(['socket closed']);
  });

  it('ticks on a timer at the configured rate', () => {
    vi.useFakeTimers();
    const loop = createLoop(movingDotManager());
    const frames: number[] = [];
    loop.on('frame', (_frame: LedBuffer, count: number) => frames.push(count));

    loop.start();
    vi.advanceTimersByTime(350);
    loop.stop();
    vi.advanceTimersByTime(500);

    expect(frames).toEqual([1, 2, 3]);
    expect(loop.isRunning()).toBe(false);
  });

  it('rejects a non-positive frame rate', () => {
    const queue = new CommandQueue<Intent>({ capacity: 1 });
    expect(() => new RenderLoop(new SceneManager(), queue, { fps: 0 })).toThrow(RangeError);
  });
});
