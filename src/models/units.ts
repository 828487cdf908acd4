import { InvalidUnitError } from '../core/errors.js';

// Unit catalogue from the OSCQuery proposal, serialized as "<category>.<unit>".
export const UNIT_CATALOG = {
  distance: ['m', 'km', 'dm', 'cm', 'mm', 'um', 'nm', 'pm', 'inch', 'feet', 'mile', 'pixels'],
  angle: ['degree', 'radian'],
  gain: ['linear', 'midigain', 'db', 'db-raw'],
  time: ['second', 'bark', 'bpm', 'cents', 'hz', 'mel', 'midinote', 'ms', 'speed', 'samples'],
  speed: ['m/s', 'mph', 'km/h', 'knots', 'ft/s', 'ft/h', 'pix/s'],
} as const;

type Catalog = typeof UNIT_CATALOG;
export type UnitCategory = keyof Catalog;

export type OscUnit = {
  [C in UnitCategory]: `${C}.${Catalog[C][number]}`;
}[UnitCategory];

const KNOWN_UNITS: ReadonlySet<string> = new Set(
  Object.entries(UNIT_CATALOG).flatMap(([category, units]: [string, readonly string[]]) =>
    units.map((u) => `${category}.${u}`)
  )
);

export function isOscUnit(value: string): value is OscUnit {
  return KNOWN_UNITS.has(value);
}

export function parseUnit(value: string): OscUnit {
  if (!isOscUnit(value)) throw new InvalidUnitError(value);
  return value;
}

export function unitCategory(unit: OscUnit): UnitCategory {
  const category = unit.slice(0, unit.indexOf('.'));
  switch (category) {
    case 'distance':
    case 'angle':
    case 'gain':
    case 'time':
    case 'speed':
      return category;
    default:
      throw new InvalidUnitError(unit);
  }
}
