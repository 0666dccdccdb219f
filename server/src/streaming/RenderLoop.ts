/**
 * Render Loop
 *
 * Fixed-rate driver for the scene hierarchy. Every tick drains queued
 * intents, applies them, advances animation by the measured elapsed time,
 * renders one frame and hands it to the frame sinks.
 *
 * Nothing outside a tick touches the SceneManager; other code submits
 * work through `enqueue` or `run`.
 */

import { EventEmitter } from 'events';
import { toError, type QueueOverflowError } from '../errors';
import { DEFAULT_FPS, DEFAULT_LED_COUNT } from '../effects/types';
import { normalizeFrame } from './LedFrame';
import type { CommandQueue } from '../mapping/CommandQueue';
import type { SceneManager } from '../effects/SceneManager';
import type { LedBuffer } from '../types';

/** A deferred mutation applied inside a tick */
export interface Intent {
  /** Shown in logs, usually the OSC address */
  label: string;
  apply: (manager: SceneManager) => void;
  /** Called when apply throws or the intent is dropped from the queue */
  onError?: (error: Error) => void;
}

export type FrameSink = (frame: LedBuffer) => void | Promise<void>;

export interface RenderLoopOptions {
  fps?: number;
  ledCount?: number;
  maxIntentsPerTick?: number;
  /** Monotonic millisecond clock, injectable for tests */
  clock?: () => number;
}

export interface RenderLoopStats {
  running: boolean;
  fps: number;
  ledCount: number;
  frames: number;
  queued: number;
  dropped: number;
}

const DEFAULT_MAX_INTENTS_PER_TICK = 256;

export class RenderLoop extends EventEmitter {
  readonly fps: number;
  readonly ledCount: number;
  readonly maxIntentsPerTick: number;
  private manager: SceneManager;
  private queue: CommandQueue<Intent>;
  private clock: () => number;
  private timer: NodeJS.Timeout | null = null;
  private lastTick: number;
  private frameCount = 0;
  private sinks: Set<FrameSink> = new Set();
  private lastFrame: LedBuffer = [];

  constructor(manager: SceneManager, queue: CommandQueue<Intent>, options: RenderLoopOptions = {}) {
    super();
    this.manager = manager;
    this.queue = queue;
    this.fps = options.fps ?? DEFAULT_FPS;
    this.ledCount = options.ledCount ?? DEFAULT_LED_COUNT;
    this.maxIntentsPerTick = options.maxIntentsPerTick ?? DEFAULT_MAX_INTENTS_PER_TICK;
    this.clock = options.clock ?? (() => performance.now());
    this.lastTick = this.clock();

    if (!(this.fps > 0)) {
      throw new RangeError(`fps must be positive, got ${this.fps}`);
    }

    this.queue.on('overflow', (error: QueueOverflowError, intent: Intent) => {
      console.warn(`[RenderLoop] ${error.message}`);
      intent.onError?.(error);
    });
  }

  /**
   * Start ticking at 1000/fps ms
   */
  start(): void {
    if (this.timer) {
      console.log('[RenderLoop] Already running');
      return;
    }
    this.lastTick = this.clock();
    this.timer = setInterval(() => {
      this.tick();
    }, 1000 / this.fps);
    console.log(`[RenderLoop] Started at ${this.fps} fps, ${this.ledCount} LEDs`);
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
    console.log(`[RenderLoop] Stopped after ${this.frameCount} frames`);
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  /**
   * Queue an intent for the next tick
   * @returns false when the queue refused it
   */
  enqueue(intent: Intent): boolean {
    return this.queue.push(intent, intent.label);
  }

  /**
   * Run a function inside the next tick and resolve with its result
   */
  run<T>(label: string, fn: (manager: SceneManager) => T): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.enqueue({
        label,
        apply: (manager) => resolve(fn(manager)),
        onError: reject,
      });
    });
  }

  addSink(sink: FrameSink): void {
    this.sinks.add(sink);
  }

  getStats(): RenderLoopStats {
    return {
      running: this.isRunning(),
      fps: this.fps,
      ledCount: this.ledCount,
      frames: this.frameCount,
      queued: this.queue.size,
      dropped: this.queue.dropped,
    };
  }

  /**
   * Run one frame. Called by the timer; tests call it directly.
   */
  tick(): LedBuffer {
    const now = this.clock();
    const dt = Math.max(0, (now - this.lastTick) / 1000);
    this.lastTick = now;

    for (const intent of this.queue.drain(this.maxIntentsPerTick)) {
      this.applyIntent(intent);
    }

    let frame: LedBuffer;
    try {
      this.manager.update(dt);
      frame = normalizeFrame(this.manager.render(), this.ledCount);
    } catch (error) {
      // Keep the output alive with the previous frame
      console.error('[RenderLoop] Frame failed:', toError(error).message);
      this.emit('tickError', toError(error));
      frame = normalizeFrame(this.lastFrame, this.ledCount);
    }

    this.frameCount++;
    this.lastFrame = frame;
    this.emit('frame', frame, this.frameCount);
    for (const sink of this.sinks) {
      this.deliver(sink, frame);
    }
    return frame;
  }

  private applyIntent(intent: Intent): void {
    try {
      intent.apply(this.manager);
    } catch (error) {
      const reason = toError(error);
      if (intent.onError) {
        intent.onError(reason);
      } else {
        console.error(`[RenderLoop] ${intent.label} failed: ${reason.message}`);
      }
    }
  }

  private deliver(sink: FrameSink, frame: LedBuffer): void {
    try {
      const result = sink(frame);
      if (result) {
        result.catch((error: unknown) => this.reportSinkError(error));
      }
    } catch (error) {
      this.reportSinkError(error);
    }
  }

  private reportSinkError(error: unknown): void {
    const reason = toError(error);
    console.error('[RenderLoop] Frame sink failed:', reason.message);
    this.emit('sinkError', reason);
  }
}
