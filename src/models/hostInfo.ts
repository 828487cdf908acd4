import { z } from 'zod';
import { InvalidHostInfoError } from '../core/errors.js';
import { wireObject } from '../utils/wireJson.js';
import type { WireObject, WireValue } from '../utils/wireJson.js';

// Serialization order of HOST_INFO.EXTENSIONS.
export const EXTENSION_NAMES = [
  'ACCESS',
  'VALUE',
  'RANGE',
  'DESCRIPTION',
  'TAGS',
  'EXTENDED_TYPE',
  'UNIT',
  'CRITICAL',
  'CLIPMODE',
  'LISTEN',
  'PATH_CHANGED',
] as const;

export type ExtensionName = (typeof EXTENSION_NAMES)[number];

export function isExtensionName(value: string): value is ExtensionName {
  return (EXTENSION_NAMES as readonly string[]).includes(value);
}

/**
 * Capability flags a server advertises. Flags only describe what clients may
 * ask for; they do not control which fields the serializer writes.
 */
export class ExtensionSet {
  private readonly enabled = new Set<ExtensionName>();

  constructor(initial: Iterable<ExtensionName> = []) {
    for (const name of initial) this.enable(name);
  }

  enable(name: ExtensionName): this {
    this.enabled.add(name);
    return this;
  }

  has(name: ExtensionName): boolean {
    return this.enabled.has(name);
  }

  enableAccess = () => this.enable('ACCESS');
  enableValue = () => this.enable('VALUE');
  enableRange = () => this.enable('RANGE');
  enableDescription = () => this.enable('DESCRIPTION');
  enableTags = () => this.enable('TAGS');
  enableExtendedType = () => this.enable('EXTENDED_TYPE');
  enableUnit = () => this.enable('UNIT');
  enableCritical = () => this.enable('CRITICAL');
  enableClipmode = () => this.enable('CLIPMODE');
  enableListen = () => this.enable('LISTEN');
  enablePathChanged = () => this.enable('PATH_CHANGED');

  snapshot(): ExtensionFlags {
    const on = (name: ExtensionName) => this.enabled.has(name);
    return Object.freeze({
      ACCESS: on('ACCESS'),
      VALUE: on('VALUE'),
      RANGE: on('RANGE'),
      DESCRIPTION: on('DESCRIPTION'),
      TAGS: on('TAGS'),
      EXTENDED_TYPE: on('EXTENDED_TYPE'),
      UNIT: on('UNIT'),
      CRITICAL: on('CRITICAL'),
      CLIPMODE: on('CLIPMODE'),
      LISTEN: on('LISTEN'),
      PATH_CHANGED: on('PATH_CHANGED'),
    });
  }
}

export type ExtensionFlags = Readonly<Record<ExtensionName, boolean>>;

export type OscTransport = 'UDP' | 'TCP';

export interface HostInfo {
  readonly name: string;
  readonly oscIp: string;
  readonly oscPort: number;
  readonly oscTransport: OscTransport;
  readonly extensions: ExtensionSet;
}

const HostInfoSchema = z.object({
  name: z.string().min(1),
  oscIp: z.string().min(1),
  oscPort: z.number().int().min(0).max(65535),
  oscTransport: z.enum(['UDP', 'TCP']).default('UDP'),
  extensions: z.array(z.enum(EXTENSION_NAMES)).default([]),
});

export type HostInfoInput = z.input<typeof HostInfoSchema>;

export function createHostInfo(input: HostInfoInput): HostInfo {
  const parsed = HostInfoSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? issue.path.join('.') : 'input';
    throw new InvalidHostInfoError(`${where}: ${issue ? issue.message : 'invalid'}`);
  }
  const { name, oscIp, oscPort, oscTransport, extensions } = parsed.data;
  return { name, oscIp, oscPort, oscTransport, extensions: new ExtensionSet(extensions) };
}

// Host info as held by a published tree: extension flags are fixed.
export interface HostInfoSnapshot {
  readonly name: string;
  readonly oscIp: string;
  readonly oscPort: number;
  readonly oscTransport: OscTransport;
  readonly extensions: ExtensionFlags;
}

export function snapshotHostInfo(info: HostInfo): HostInfoSnapshot {
  return Object.freeze({
    name: info.name,
    oscIp: info.oscIp,
    oscPort: info.oscPort,
    oscTransport: info.oscTransport,
    extensions: info.extensions.snapshot(),
  });
}

export function hostInfoToWire(info: HostInfoSnapshot): WireObject {
  return wireObject([
    ['NAME', info.name],
    ['OSC_IP', info.oscIp],
    ['OSC_PORT', info.oscPort],
    ['OSC_TRANSPORT', info.oscTransport],
    ['EXTENSIONS', wireObject(EXTENSION_NAMES.map((name): [string, WireValue] => [name, info.extensions[name]]))],
  ]);
}
