import { createSocket, type Socket } from 'dgram';
import { EventEmitter } from 'events';
import { encodeOscMessage } from '../osc/OscMessage';
import { buildFrameMessage, LED_FRAME_ADDRESS } from './LedFrame';
import type { LedBuffer } from '../types';

export interface FrameSenderOptions {
  host: string;
  port: number;
  /** OSC address of the frame message */
  address?: string;
}

/**
 * Sends rendered frames as OSC packets over UDP.
 *
 * Events:
 * - `sent` (frameNumber: number, bytes: number)
 * - `error` (error: Error) for socket failures
 */
export class FrameSender extends EventEmitter {
  private options: Required<FrameSenderOptions>;
  private socket: Socket | null = null;
  private frameCount = 0;

  constructor(options: FrameSenderOptions) {
    super();
    this.options = {
      address: LED_FRAME_ADDRESS,
      ...options,
    };
  }

  start(): void {
    if (this.socket) return;
    this.socket = createSocket('udp4');
    this.socket.on('error', (error: Error) => {
      console.error('[FrameSender] Socket error:', error.message);
      this.emit('error', error);
    });
    console.log(`[FrameSender] Sending frames to ${this.options.host}:${this.options.port} at ${this.options.address}`);
  }

  /**
   * Encode and send one frame
   */
  async sendFrame(frame: LedBuffer): Promise<void> {
    const socket = this.socket;
    if (!socket) {
      throw new Error('Frame sender is not started');
    }
    const packet = encodeOscMessage(buildFrameMessage(frame, this.options.address));
    await new Promise<void>((resolve, reject) => {
      socket.send(packet, this.options.port, this.options.host, (error) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });
    this.frameCount++;
    this.emit('sent', this.frameCount, packet.length);
  }

  async stop(): Promise<void> {
    const socket = this.socket;
    if (!socket) return;
    this.socket = null;
    await new Promise<void>((resolve) => socket.close(() => resolve()));
    console.log('[FrameSender] Stopped');
  }

  getStats(): { started: boolean; framesSent: number } {
    return { started: this.socket !== null, framesSent: this.frameCount };
  }
}
