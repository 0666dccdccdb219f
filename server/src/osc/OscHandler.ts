import { createSocket, type RemoteInfo, type Socket } from 'dgram';
import { EventEmitter } from 'events';
import { toError } from '../errors';
import { decodeOscPacket, encodeOscMessage, type OscMessage } from './OscMessage';

export interface OscHandlerOptions {
  host: string;
  port: number;
}

/** Where a message came from, used to address replies */
export interface OscSender {
  address: string;
  port: number;
}

/**
 * UDP endpoint for inbound OSC commands.
 *
 * Events:
 * - `message` (message: OscMessage, sender: OscSender) for every decoded message
 * - `packetError` (error: Error, sender: OscSender) for packets that fail to decode
 * - `error` (error: Error) for socket failures
 */
export class OscHandler extends EventEmitter {
  private options: OscHandlerOptions;
  private socket: Socket | null = null;
  private packetCount = 0;

  constructor(options: OscHandlerOptions) {
    super();
    this.options = options;
  }

  /**
   * Bind the socket and start receiving
   */
  async start(): Promise<void> {
    if (this.socket) {
      console.log('[OscHandler] Already listening');
      return;
    }

    const { host, port } = this.options;
    const socket = createSocket({ type: 'udp4', reuseAddr: true });
    this.socket = socket;

    socket.on('message', (packet: Buffer, rinfo: RemoteInfo) => {
      this.handlePacket(packet, { address: rinfo.address, port: rinfo.port });
    });

    await new Promise<void>((resolve, reject) => {
      const onBindError = (error: Error) => {
        this.socket = null;
        socket.close();
        reject(error);
      };
      socket.once('error', onBindError);
      socket.once('listening', () => {
        socket.off('error', onBindError);
        socket.on('error', (error: Error) => {
          console.error('[OscHandler] Socket error:', error.message);
          this.emit('error', error);
        });
        resolve();
      });
      socket.bind({ port, address: host });
    });

    console.log(`[OscHandler] Listening for OSC on ${host}:${port}`);
  }

  /**
   * Send a message from the listening socket (replies go back to the sender's port)
   */
  async send(message: OscMessage, target: OscSender): Promise<void> {
    const socket = this.socket;
    if (!socket) {
      throw new Error('OSC handler is not started');
    }
    const packet = encodeOscMessage(message);
    await new Promise<void>((resolve, reject) => {
      socket.send(packet, target.port, target.address, (error) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });
  }

  async stop(): Promise<void> {
    const socket = this.socket;
    if (!socket) return;
    this.socket = null;
    await new Promise<void>((resolve) => socket.close(() => resolve()));
    console.log('[OscHandler] Stopped');
  }

  isListening(): boolean {
    return this.socket !== null;
  }

  getStats(): { listening: boolean; packets: number } {
    return { listening: this.socket !== null, packets: this.packetCount };
  }

  private handlePacket(packet: Buffer, sender: OscSender): void {
    this.packetCount++;
    let messages: OscMessage[];
    try {
      messages = decodeOscPacket(packet);
    } catch (error) {
      const reason = toError(error);
      console.warn(`[OscHandler] Dropped packet from ${sender.address}:${sender.port}: ${reason.message}`);
      this.emit('packetError', reason, sender);
      return;
    }
    for (const message of messages) {
      this.emit('message', message, sender);
    }
  }
}
