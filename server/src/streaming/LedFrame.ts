/**
 * LED Frame Encoding
 *
 * Payload format:
 * - 3 bytes per LED, R then G then B, in ascending LED index
 * - No header and no length prefix
 *
 * The payload travels as the single blob argument of an OSC message
 * addressed to `/light/serial`.
 */

import { ColorUtils } from '../effects/types';
import { OscArgs, type OscMessage } from '../osc/OscMessage';
import type { LedBuffer } from '../types';

export const LED_FRAME_ADDRESS = '/light/serial';
const BYTES_PER_LED = 3;

/**
 * Pad with black or truncate so the frame holds exactly ledCount entries
 */
export function normalizeFrame(frame: LedBuffer, ledCount: number): LedBuffer {
  const normalized: LedBuffer = [];
  for (let i = 0; i < ledCount; i++) {
    const color = i < frame.length ? frame[i] : undefined;
    normalized.push(color ? ColorUtils.quantize(color) : [0, 0, 0]);
  }
  return normalized;
}

/**
 * Encode a frame as N x 3 bytes. Channels are rounded and clamped to 0-255.
 */
export function encodeLedFrame(frame: LedBuffer): Buffer {
  const buffer = Buffer.alloc(frame.length * BYTES_PER_LED);
  let offset = 0;
  for (const color of frame) {
    buffer.writeUInt8(ColorUtils.toByte(color[0]), offset++);
    buffer.writeUInt8(ColorUtils.toByte(color[1]), offset++);
    buffer.writeUInt8(ColorUtils.toByte(color[2]), offset++);
  }
  return buffer;
}

/** Inverse of encodeLedFrame; trailing bytes that do not fill an LED are ignored */
export function decodeLedFrame(payload: Buffer): LedBuffer {
  const frame: LedBuffer = [];
  for (let offset = 0; offset + BYTES_PER_LED <= payload.length; offset += BYTES_PER_LED) {
    frame.push([payload[offset], payload[offset + 1], payload[offset + 2]]);
  }
  return frame;
}

/** The outbound OSC message for a frame */
export function buildFrameMessage(frame: LedBuffer, address: string = LED_FRAME_ADDRESS): OscMessage {
  return { address, args: [OscArgs.blob(encodeLedFrame(frame))] };
}
