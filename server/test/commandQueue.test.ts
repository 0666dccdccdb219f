import { describe, expect, it } from 'vitest';

import { QueueOverflowError } from '../src/errors';
import { CommandQueue } from '../src/mapping/CommandQueue';

describe('CommandQueue', () => {
  it('hands items out in FIFO order', () => {
    const queue = new CommandQueue<number>({ capacity: 4 });
    queue.push(1, 'one');
    queue.push(2, 'two');
    queue.push(3, 'three');
    expect(queue.labels()).toEqual(['one', 'two', 'three']);
    expect(queue.shift()).toBe(1);
    expect(queue.drain()).toEqual([2, 3]);
    expect(queue.size).toBe(0);
    expect(queue.shift()).toBeUndefined();
  });

  it('drains at most the requested number of items', () => {
    const queue = new CommandQueue<string>({ capacity: 8 });
    for (const item of ['a', 'b', 'c', 'd']) {
      queue.push(item);
    }
    expect(queue.drain(3)).toEqual(['a', 'b', 'c']);
    expect(queue.size).toBe(1);
  });

  it('evicts the oldest item when full under drop-oldest', () => {
    const queue = new CommandQueue<string>({ capacity: 2, overflow: 'drop-oldest' });
    const dropped: Array<{ error: QueueOverflowError; item: string }> = [];
    queue.on('overflow', (error: QueueOverflowError, item: string) => dropped.push({ error, item }));

    queue.push('a', '/first');
    queue.push('b', '/second');
    expect(queue.push('c', '/third')).toBe(true);

    expect(queue.drain()).toEqual(['b', 'c']);
    expect(queue.dropped).toBe(1);
    expect(dropped).toHaveLength(1);
    expect(dropped[0].item).toBe('a');
    expect(dropped[0].error.code).toBe('QUEUE_OVERFLOW');
    expect(dropped[0].error.message).toBe('Command queue full, dropped "/first" (1 dropped so far)');
  });

  it('refuses the incoming item when full under drop-newest', () => {
    const queue = new CommandQueue<string>({ capacity: 2, overflow: 'drop-newest' });
    const dropped: string[] = [];
    queue.on('overflow', (_error: QueueOverflowError, item: string) => dropped.push(item));

    queue.push('a');
    queue.push('b');
    expect(queue.push('c')).toBe(false);
    expect(dropped).toEqual(['c']);
    expect(queue.drain()).toEqual(['a', 'b']);
  });

  it('wraps around its ring buffer', () => {
    const queue = new CommandQueue<number>({ capacity: 3 });
    for (let round = 0; round < 5; round++) {
      queue.push(round * 2);
      queue.push(round * 2 + 1);
      expect(queue.drain()).toEqual([round * 2, round * 2 + 1]);
    }
    expect(queue.dropped).toBe(0);
  });

  it('clears without counting drops', () => {
    const queue = new CommandQueue<number>({ capacity: 3 });
    queue.push(1);
    queue.push(2);
    queue.clear();
    expect(queue.size).toBe(0);
    expect(queue.dropped).toBe(0);
  });

  it('requires a positive integer capacity', () => {
    expect(() => new CommandQueue<number>({ capacity: 0 })).toThrow(RangeError);
    expect(() => new CommandQueue<number>({ capacity: 1.5 })).toThrow(RangeError);
  });
});
