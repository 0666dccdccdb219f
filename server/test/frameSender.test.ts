import { EventEmitter } from 'events';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { encodeOscMessage } from '../src/osc/OscMessage';
import { FrameSender } from '../src/streaming/FrameSender';
import { buildFrameMessage } from '../src/streaming/LedFrame';
import type { LedBuffer } from '../src/types';

interface SentPacket {
  packet: Buffer;
  port: number;
  address: string;
}

class MockSocket extends EventEmitter {
  public sent: SentPacket[] = [];
  public failWith: Error | null = null;

  public send(packet: Buffer, port: number, address: string, callback: (error: Error | null) => void): void {
    this.sent.push({ packet, port, address });
    callback(this.failWith);
  }

  public close(callback?: () => void): void {
    callback?.();
  }
}

const sockets: MockSocket[] = [];

vi.mock('dgram', () => ({
  createSocket: vi.fn(() => {
    const socket = new MockSocket();
    sockets.push(socket);
    return socket;
  }),
}));

const frame: LedBuffer = [
  [255, 0, 0],
  [0, 255, 0],
];

beforeEach(() => {
  sockets.length = 0;
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
  vi.spyOn(console, 'error').mockImplementation(() => undefined);
});

afterEach(() => {
  for (const socket of sockets) {
    socket.removeAllListeners();
  }
  vi.restoreAllMocks();
});

describe('FrameSender', () => {
  it('sends each frame as an OSC blob to the output address', async () => {
    const sender = new FrameSender({ host: '192.168.1.50', port: 5005 });
    sender.start();

    const sent: Array<[number, number]> = [];
    sender.on('sent', (count: number, bytes: number) => sent.push([count, bytes]));
    await sender.sendFrame(frame);

    const expected = encodeOscMessage(buildFrameMessage(frame, '/light/serial'));
    expect(sockets[0].sent).toEqual([{ packet: expected, port: 5005, address: '192.168.1.50' }]);
    expect(sent).toEqual([[1, expected.length]]);
    expect(sender.getStats()).toEqual({ started: true, framesSent: 1 });
    await sender.stop();
  });

  it('uses a custom OSC address', async () => {
    const sender = new FrameSender({ host: '127.0.0.1', port: 7000, address: '/strip/left' });
    sender.start();
    await sender.sendFrame(frame);
    expect(sockets[0].sent[0].packet).toEqual(encodeOscMessage(buildFrameMessage(frame, '/strip/left')));
    await sender.stop();
  });

  it('rejects when the socket reports a send error', async () => {
    const sender = new FrameSender({ host: '127.0.0.1', port: 5005 });
    sender.start();
    sockets[0].failWith = new Error('EHOSTUNREACH');
    await expect(sender.sendFrame(frame)).rejects.toThrow('EHOSTUNREACH');
    expect(sender.getStats().framesSent).toBe(0);
    await sender.stop();
  });

  it('refuses to send before it is started', async () => {
    const sender = new FrameSender({ host: '127.0.0.1', port: 5005 });
    await expect(sender.sendFrame(frame)).rejects.toThrow('Frame sender is not started');
  });
});
