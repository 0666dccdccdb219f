import { EventEmitter } from 'events';
import { QueueOverflowError } from '../errors';
import type { QueueOverflowPolicy } from '../types';

export interface QueueOptions {
  capacity: number;
  overflow?: QueueOverflowPolicy;
}

interface QueueSlot<T> {
  item: T;
  label: string;
}

/**
 * Bounded FIFO ring buffer between the network side and the render loop.
 *
 * When full, `drop-oldest` evicts the head to make room and `drop-newest`
 * refuses the incoming item. Each drop increments `dropped` and emits
 * `overflow` (error: QueueOverflowError, item: T) with the lost item.
 */
export class CommandQueue<T> extends EventEmitter {
  readonly capacity: number;
  readonly overflow: QueueOverflowPolicy;
  private slots: Array<QueueSlot<T> | undefined>;
  private head = 0;
  private count = 0;
  private droppedCount = 0;

  constructor(options: QueueOptions) {
    super();
    if (!Number.isInteger(options.capacity) || options.capacity < 1) {
      throw new RangeError(`Queue capacity must be an integer >= 1, got ${options.capacity}`);
    }
    this.capacity = options.capacity;
    this.overflow = options.overflow ?? 'drop-oldest';
    this.slots = new Array<QueueSlot<T> | undefined>(this.capacity).fill(undefined);
  }

  get size(): number {
    return this.count;
  }

  /** Items lost to overflow since creation */
  get dropped(): number {
    return this.droppedCount;
  }

  /**
   * Append an item.
   * @param label names the item in overflow reports (the evicted item's
   * label is reported under drop-oldest)
   * @returns false when the incoming item itself was dropped
   */
  push(item: T, label = 'item'): boolean {
    if (this.count === this.capacity) {
      if (this.overflow === 'drop-newest') {
        this.reportDrop(label, item);
        return false;
      }
      const evicted = this.slots[this.head];
      this.slots[this.head] = undefined;
      this.head = (this.head + 1) % this.capacity;
      this.count--;
      if (evicted) {
        this.reportDrop(evicted.label, evicted.item);
      }
    }
    this.slots[(this.head + this.count) % this.capacity] = { item, label };
    this.count++;
    return true;
  }

  /** Labels of queued items, oldest first */
  labels(): string[] {
    const labels: string[] = [];
    for (let i = 0; i < this.count; i++) {
      const slot = this.slots[(this.head + i) % this.capacity];
      if (slot) labels.push(slot.label);
    }
    return labels;
  }

  /** Remove and return the oldest item */
  shift(): T | undefined {
    if (this.count === 0) return undefined;
    const slot = this.slots[this.head];
    this.slots[this.head] = undefined;
    this.head = (this.head + 1) % this.capacity;
    this.count--;
    return slot?.item;
  }

  /**
   * Remove up to max items in FIFO order
   */
  drain(max: number = this.capacity): T[] {
    const items: T[] = [];
    while (items.length < max && this.count > 0) {
      const slot = this.slots[this.head];
      this.slots[this.head] = undefined;
      this.head = (this.head + 1) % this.capacity;
      this.count--;
      if (slot) items.push(slot.item);
    }
    return items;
  }

  clear(): void {
    this.slots.fill(undefined);
    this.head = 0;
    this.count = 0;
  }

  private reportDrop(label: string, item: T): void {
    this.droppedCount++;
    this.emit('overflow', new QueueOverflowError(label, this.droppedCount), item);
  }
}
