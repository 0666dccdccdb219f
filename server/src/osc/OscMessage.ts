/**
 * OSC 1.0 Packet Codec
 *
 * Message format:
 * - Address pattern: OSC-string ("/..." + NUL, padded to 4 bytes)
 * - Type tag string: OSC-string starting with ","
 * - Arguments, each 4-byte aligned:
 *   - i: int32 big-endian
 *   - f: float32 big-endian
 *   - d: float64 big-endian
 *   - s: OSC-string
 *   - b: int32 size + bytes, padded to 4
 *   - T / F / N: no payload
 *
 * Bundle format:
 * - "#bundle" OSC-string, 8-byte time tag
 * - Elements: int32 size + message or nested bundle
 */

import { ParseError } from '../errors';

export type OscArgument =
  | { type: 'i'; value: number }
  | { type: 'f'; value: number }
  | { type: 'd'; value: number }
  | { type: 's'; value: string }
  | { type: 'b'; value: Buffer }
  | { type: 'T'; value: true }
  | { type: 'F'; value: false }
  | { type: 'N'; value: null };

export type OscTypeTag = OscArgument['type'];

export interface OscMessage {
  address: string;
  args: OscArgument[];
}

const BUNDLE_TAG = '#bundle';
const TIME_TAG_LENGTH = 8;

/**
 * Encode one message into a packet
 */
export function encodeOscMessage(message: OscMessage): Buffer {
  if (!message.address.startsWith('/')) {
    throw new RangeError(`OSC address must start with "/", got "${message.address}"`);
  }
  const parts: Buffer[] = [
    encodeString(message.address),
    encodeString(',' + message.args.map((arg) => arg.type).join('')),
  ];
  for (const arg of message.args) {
    parts.push(encodeArgument(arg));
  }
  return Buffer.concat(parts);
}

/**
 * Decode a packet into its messages; bundles are flattened in order.
 * @throws ParseError on malformed input
 */
export function decodeOscPacket(packet: Buffer): OscMessage[] {
  const messages: OscMessage[] = [];
  decodeInto(packet, messages, 0);
  return messages;
}

/** Tag string of a message's arguments, without the leading comma */
export function typeTags(args: OscArgument[]): string {
  return args.map((arg) => arg.type).join('');
}

// ---------------------------------------------------------------------------
// Argument builders
// ---------------------------------------------------------------------------

export const OscArgs = {
  int(value: number): OscArgument {
    return { type: 'i', value };
  },
  float(value: number): OscArgument {
    return { type: 'f', value };
  },
  double(value: number): OscArgument {
    return { type: 'd', value };
  },
  string(value: string): OscArgument {
    return { type: 's', value };
  },
  blob(value: Buffer): OscArgument {
    return { type: 'b', value };
  },
  bool(value: boolean): OscArgument {
    return value ? { type: 'T', value: true } : { type: 'F', value: false };
  },
  nil(): OscArgument {
    return { type: 'N', value: null };
  },
};

// ---------------------------------------------------------------------------
// Encoding
// ---------------------------------------------------------------------------

function padding(length: number): number {
  return (4 - (length % 4)) % 4;
}

function encodeString(value: string): Buffer {
  const bytes = Buffer.from(value, 'utf-8');
  // At least one NUL terminator, then pad to a multiple of 4
  const buffer = Buffer.alloc(bytes.length + 1 + padding(bytes.length + 1));
  bytes.copy(buffer, 0);
  return buffer;
}

function encodeArgument(arg: OscArgument): Buffer {
  switch (arg.type) {
    case 'i': {
      const buffer = Buffer.alloc(4);
      buffer.writeInt32BE(arg.value | 0, 0);
      return buffer;
    }
    case 'f': {
      const buffer = Buffer.alloc(4);
      buffer.writeFloatBE(arg.value, 0);
      return buffer;
    }
    case 'd': {
      const buffer = Buffer.alloc(8);
      buffer.writeDoubleBE(arg.value, 0);
      return buffer;
    }
    case 's':
      return encodeString(arg.value);
    case 'b': {
      const buffer = Buffer.alloc(4 + arg.value.length + padding(arg.value.length));
      buffer.writeInt32BE(arg.value.length, 0);
      arg.value.copy(buffer, 4);
      return buffer;
    }
    case 'T':
    case 'F':
    case 'N':
      return Buffer.alloc(0);
  }
}

// ---------------------------------------------------------------------------
// Decoding
// ---------------------------------------------------------------------------

const MAX_BUNDLE_DEPTH = 8;

function decodeInto(packet: Buffer, messages: OscMessage[], depth: number): void {
  if (packet.length === 0 || packet.length % 4 !== 0) {
    throw new ParseError(`OSC packet length ${packet.length} is not a positive multiple of 4`);
  }
  const reader = new OscReader(packet);
  const head = reader.readString();

  if (head === BUNDLE_TAG) {
    if (depth >= MAX_BUNDLE_DEPTH) {
      throw new ParseError('OSC bundles nested too deeply');
    }
    reader.skip(TIME_TAG_LENGTH);
    while (!reader.done()) {
      const size = reader.readInt32();
      if (size <= 0) {
        throw new ParseError(`OSC bundle element has invalid size ${size}`);
      }
      decodeInto(reader.readBytes(size), messages, depth + 1);
    }
    return;
  }

  if (!head.startsWith('/')) {
    throw new ParseError(`OSC address must start with "/", got "${head}"`);
  }
  // A missing type tag string means no arguments
  const tags = reader.done() ? ',' : reader.readString();
  if (!tags.startsWith(',')) {
    throw new ParseError(`OSC type tag string must start with ",", got "${tags}"`);
  }

  const args: OscArgument[] = [];
  for (const tag of tags.slice(1)) {
    args.push(readArgument(reader, tag));
  }
  messages.push({ address: head, args });
}

function readArgument(reader: OscReader, tag: string): OscArgument {
  switch (tag) {
    case 'i':
      return { type: 'i', value: reader.readInt32() };
    case 'f':
      return { type: 'f', value: reader.readFloat32() };
    case 'd':
      return { type: 'd', value: reader.readFloat64() };
    case 's':
      return { type: 's', value: reader.readString() };
    case 'b': {
      const size = reader.readInt32();
      if (size < 0) {
        throw new ParseError(`OSC blob has negative size ${size}`);
      }
      const value = reader.readBytes(size);
      reader.skip(padding(size));
      return { type: 'b', value };
    }
    case 'T':
      return { type: 'T', value: true };
    case 'F':
      return { type: 'F', value: false };
    case 'N':
      return { type: 'N', value: null };
    default:
      throw new ParseError(`Unsupported OSC type tag "${tag}"`);
  }
}

class OscReader {
  private offset = 0;

  constructor(private readonly buffer: Buffer) {}

  done(): boolean {
    return this.offset >= this.buffer.length;
  }

  skip(bytes: number): void {
    this.ensure(bytes);
    this.offset += bytes;
  }

  readInt32(): number {
    this.ensure(4);
    const value = this.buffer.readInt32BE(this.offset);
    this.offset += 4;
    return value;
  }

  readFloat32(): number {
    this.ensure(4);
    const value = this.buffer.readFloatBE(this.offset);
    this.offset += 4;
    return value;
  }

  readFloat64(): number {
    this.ensure(8);
    const value = this.buffer.readDoubleBE(this.offset);
    this.offset += 8;
    return value;
  }

  readBytes(length: number): Buffer {
    this.ensure(length);
    const value = this.buffer.subarray(this.offset, this.offset + length);
    this.offset += length;
    return value;
  }

  readString(): string {
    const end = this.buffer.indexOf(0, this.offset);
    if (end < 0) {
      throw new ParseError(`Unterminated OSC string at byte ${this.offset}`);
    }
    const value = this.buffer.toString('utf-8', this.offset, end);
    const length = end - this.offset + 1;
    this.offset += length + padding(length);
    if (this.offset > this.buffer.length) {
      throw new ParseError('OSC string padding runs past the end of the packet');
    }
    return value;
  }

  private ensure(bytes: number): void {
    if (this.offset + bytes > this.buffer.length) {
      throw new ParseError(`OSC packet truncated: need ${bytes} bytes at ${this.offset}, have ${this.buffer.length - this.offset}`);
    }
  }
}
