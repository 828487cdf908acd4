import { WireFloat, WireLong } from '../utils/wireJson.js';
import type { WireValue } from '../utils/wireJson.js';

// OSC argument values in `{ type, value }` form, keyed by their OSC type tag.
export type OscTimeTag = { seconds: number; fraction: number };
export type OscColor = { red: number; green: number; blue: number; alpha: number };
export type OscMidi = { port: number; status: number; data1: number; data2: number };

export type OscValue =
  | { type: 'i'; value: number }
  | { type: 'f'; value: number }
  | { type: 'h'; value: bigint }
  | { type: 'd'; value: number }
  | { type: 's'; value: string }
  | { type: 'S'; value: string }
  | { type: 'c'; value: string }
  | { type: 'b'; value: Uint8Array }
  | { type: 't'; value: OscTimeTag }
  | { type: 'r'; value: OscColor }
  | { type: 'm'; value: OscMidi }
  | { type: 'T'; value: true }
  | { type: 'F'; value: false }
  | { type: 'N'; value: null }
  | { type: 'I'; value: null };

export const osc = {
  int: (value: number): OscValue => ({ type: 'i', value: Math.trunc(value) | 0 }),
  float: (value: number): OscValue => ({ type: 'f', value }),
  long: (value: bigint): OscValue => ({ type: 'h', value }),
  double: (value: number): OscValue => ({ type: 'd', value }),
  string: (value: string): OscValue => ({ type: 's', value }),
  symbol: (value: string): OscValue => ({ type: 'S', value }),
  char: (value: string): OscValue => ({ type: 'c', value: value.charAt(0) }),
  blob: (value: Uint8Array): OscValue => ({ type: 'b', value }),
  timetag: (seconds: number, fraction = 0): OscValue => ({ type: 't', value: { seconds, fraction } }),
  color: (red: number, green: number, blue: number, alpha = 255): OscValue => ({
    type: 'r',
    value: { red, green, blue, alpha },
  }),
  midi: (port: number, status: number, data1: number, data2: number): OscValue => ({
    type: 'm',
    value: { port, status, data1, data2 },
  }),
  bool: (value: boolean): OscValue => (value ? { type: 'T', value: true } : { type: 'F', value: false }),
  nil: (): OscValue => ({ type: 'N', value: null }),
  impulse: (): OscValue => ({ type: 'I', value: null }),
};

// TYPE string for a leaf: one tag per value slot, e.g. "f" or "iff".
export function typeTagOf(values: readonly OscValue[]): string {
  return values.map((v) => v.type).join('');
}

/**
 * Copy of a value that shares nothing with the caller. Object payloads come
 * back frozen; a blob gets its own byte buffer, since typed arrays cannot be frozen.
 */
export function copyValue(v: OscValue): OscValue {
  switch (v.type) {
    case 'b':
      return Object.freeze({ type: v.type, value: new Uint8Array(v.value) });
    case 't':
      return Object.freeze({ type: v.type, value: Object.freeze({ ...v.value }) });
    case 'r':
      return Object.freeze({ type: v.type, value: Object.freeze({ ...v.value }) });
    case 'm':
      return Object.freeze({ type: v.type, value: Object.freeze({ ...v.value }) });
    default:
      return Object.freeze({ ...v });
  }
}

function hexByte(n: number): string {
  return (n & 0xff).toString(16).padStart(2, '0');
}

export function encodeValue(v: OscValue): WireValue {
  switch (v.type) {
    case 'i':
      return v.value;
    case 'f':
    case 'd':
      return new WireFloat(v.value);
    case 'h':
      return new WireLong(v.value);
    case 's':
    case 'S':
    case 'c':
      return v.value;
    case 'b':
      return Array.from(v.value);
    case 't':
      return [v.value.seconds, v.value.fraction];
    case 'r': {
      const { red, green, blue, alpha } = v.value;
      return `#${hexByte(red)}${hexByte(green)}${hexByte(blue)}${hexByte(alpha)}`;
    }
    case 'm':
      return [v.value.port, v.value.status, v.value.data1, v.value.data2];
    case 'T':
    case 'F':
      return v.value;
    case 'N':
    case 'I':
      return null;
  }
}
