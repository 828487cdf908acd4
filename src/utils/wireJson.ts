// JSON writer for OSCQuery payloads. Plain JSON.stringify cannot tell a float
// slot holding 1 from an int slot holding 1, so floats travel as WireFloat and
// are written with a fractional part.

export class WireFloat {
  constructor(readonly value: number) {}

  toJSON(): number | null {
    return Number.isFinite(this.value) ? this.value : null;
  }
}

/**
 * 64-bit integer slot. stringifyWire writes it digit-exact; toJSON can only
 * hand JSON.stringify a number, which rounds above Number.MAX_SAFE_INTEGER.
 */
export class WireLong {
  constructor(readonly value: bigint) {}

  toJSON(): number {
    return Number(this.value);
  }
}

export type WireValue =
  | string
  | number
  | boolean
  | null
  | WireFloat
  | WireLong
  | WireValue[]
  | WireObject;

export interface WireObject {
  [key: string]: WireValue;
}

// Object whose keys are all own members, so a "__proto__" path segment stays a key.
export function wireObject(entries: Iterable<readonly [string, WireValue]>): WireObject {
  const out: WireObject = {};
  for (const [key, value] of entries) {
    Object.defineProperty(out, key, { value, enumerable: true, writable: true, configurable: true });
  }
  return out;
}

export function formatFloat(value: number): string {
  if (!Number.isFinite(value)) return 'null';
  if (Number.isInteger(value) && Math.abs(value) < 1e21) return value.toFixed(1);
  return String(value);
}

/**
 * Serializes a wire document to JSON text. Key order follows object insertion
 * order, which is how CONTENTS keeps the tree's sibling order.
 */
export function stringifyWire(value: WireValue): string {
  if (value === null) return 'null';
  if (value instanceof WireFloat) return formatFloat(value.value);
  if (value instanceof WireLong) return value.value.toString();
  if (Array.isArray(value)) return `[${value.map(stringifyWire).join(',')}]`;

  switch (typeof value) {
    case 'string':
      return JSON.stringify(value);
    case 'number':
      return Number.isFinite(value) ? String(value) : 'null';
    case 'boolean':
      return value ? 'true' : 'false';
    default: {
      const members = Object.entries(value).map(
        ([key, member]) => `${JSON.stringify(key)}:${stringifyWire(member)}`
      );
      return `{${members.join(',')}}`;
    }
  }
}
