/*
 * Minimal OSC 1.0 message encoding: padded strings, a type-tag string and
 * big-endian 32-bit arguments. Only the `i`, `f` and `s` tags are produced.
 */
import { Buffer } from 'node:buffer';

export type OscArgument =
  | { readonly type: 'i'; readonly value: number }
  | { readonly type: 'f'; readonly value: number }
  | { readonly type: 's'; readonly value: string };

export interface TelemetryMessage {
  readonly address: string;
  readonly args: readonly OscArgument[];
}

const INT32_MIN = -0x80000000;
const INT32_MAX = 0x7fffffff;

export function intArg(value: number): OscArgument {
  const truncated = Number.isFinite(value) ? Math.trunc(value) : 0;
  return { type: 'i', value: Math.max(INT32_MIN, Math.min(INT32_MAX, truncated)) };
}

export function floatArg(value: number): OscArgument {
  return { type: 'f', value };
}

export function stringArg(value: string): OscArgument {
  return { type: 's', value };
}

/** UTF-8 bytes plus a NUL terminator, zero-padded to a multiple of four. */
export function encodeOscString(value: string): Buffer {
  const bytes = Buffer.from(value, 'utf8');
  const padded = Buffer.alloc((Math.floor(bytes.length / 4) + 1) * 4);
  bytes.copy(padded);
  return padded;
}

export function encodeOscArgument(arg: OscArgument): Buffer {
  switch (arg.type) {
    case 'i': {
      const buffer = Buffer.alloc(4);
      buffer.writeInt32BE(arg.value, 0);
      return buffer;
    }
    case 'f': {
      const buffer = Buffer.alloc(4);
      buffer.writeFloatBE(arg.value, 0);
      return buffer;
    }
    case 's':
      return encodeOscString(arg.value);
  }
}

export function encodeTypeTags(args: readonly OscArgument[]): Buffer {
  return encodeOscString(`,${args.map((arg) => arg.type).join('')}`);
}

export function encodeOscMessage(message: TelemetryMessage): Buffer {
  return Buffer.concat([
    encodeOscString(message.address),
    encodeTypeTags(message.args),
    ...message.args.map((arg) => encodeOscArgument(arg))
  ]);
}
