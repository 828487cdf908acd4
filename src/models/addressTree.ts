import { InvalidPathError, PathConflictError, TreePublishedError } from '../core/errors.js';
import { logger } from '../utils/logger.js';
import { snapshotHostInfo } from './hostInfo.js';
import type { HostInfo, HostInfoSnapshot } from './hostInfo.js';
import { copyValue, typeTagOf } from './oscValue.js';
import type { OscValue } from './oscValue.js';
import type { OscUnit } from './units.js';

export enum OscAccess {
  NoValue = 0,
  ReadOnly = 1,
  WriteOnly = 2,
  ReadWrite = 3,
}

export interface RangeEntry {
  readonly min?: number;
  readonly max?: number;
  readonly vals?: readonly OscValue[];
}

export interface GroupNode {
  readonly kind: 'group';
  readonly fullPath: string;
  readonly description: string;
  readonly access: OscAccess.NoValue;
  readonly contents: ReadonlyMap<string, AddressNode>;
}

export interface LeafNode {
  readonly kind: 'leaf';
  readonly fullPath: string;
  readonly description: string;
  readonly access: OscAccess;
  readonly typeTag: string;
  readonly values: readonly OscValue[];
  readonly range?: readonly RangeEntry[];
  readonly unit?: readonly OscUnit[];
}

export type AddressNode = GroupNode | LeafNode;

export interface RootNode extends GroupNode {
  readonly fullPath: '/';
  readonly hostInfo?: HostInfoSnapshot;
}

// One endpoint to insert. Consumed by a single insert() call.
export interface EndpointDescriptor {
  path: string;
  value: OscValue;
  description?: string;
  min?: number;
  max?: number;
  allowedValues?: readonly OscValue[];
  access?: OscAccess;
  unit?: OscUnit;
}

// Builder-side group; its contents stay mutable until publish().
type DraftGroup = {
  kind: 'group';
  fullPath: string;
  contents: Map<string, DraftNode>;
};

type DraftNode = DraftGroup | LeafNode;

// OSC 1.0 forbids these characters inside an address part.
const RESERVED_SEGMENT_CHARS = /[ #*,?[\]{}]/;

export function splitPath(path: string): string[] {
  if (!path.startsWith('/')) {
    throw new InvalidPathError(path, 'must start with "/"');
  }
  const segments = path.slice(1).split('/');
  if (segments.some((segment) => segment === '')) {
    throw new InvalidPathError(path, 'contains an empty segment');
  }
  const reserved = segments.find((segment) => RESERVED_SEGMENT_CHARS.test(segment));
  if (reserved !== undefined) {
    throw new InvalidPathError(path, `segment "${reserved}" contains a reserved character`);
  }
  return segments;
}

export function childPath(parentPath: string, segment: string): string {
  return parentPath === '/' ? `/${segment}` : `${parentPath}/${segment}`;
}

function rangeOf(descriptor: EndpointDescriptor): RangeEntry | undefined {
  const { min, max, allowedValues } = descriptor;
  const bounded = min !== undefined && max !== undefined;
  if (!bounded && allowedValues === undefined) return undefined;
  const entry: RangeEntry = {
    ...(bounded ? { min, max } : {}),
    ...(allowedValues !== undefined ? { vals: Object.freeze(allowedValues.map(copyValue)) } : {}),
  };
  return Object.freeze(entry);
}

function createLeaf(descriptor: EndpointDescriptor, fullPath: string): LeafNode {
  const values: readonly OscValue[] = Object.freeze([copyValue(descriptor.value)]);
  const range = rangeOf(descriptor);
  const leaf: LeafNode = {
    kind: 'leaf',
    fullPath,
    description: descriptor.description ?? '',
    access: descriptor.access ?? OscAccess.ReadWrite,
    typeTag: typeTagOf(values),
    values,
    ...(range ? { range: Object.freeze([range]) } : {}),
    ...(descriptor.unit !== undefined ? { unit: Object.freeze([descriptor.unit]) } : {}),
  };
  return Object.freeze(leaf);
}

function publishGroup(draft: DraftGroup): GroupNode {
  const contents = new Map<string, AddressNode>();
  for (const [segment, child] of draft.contents) {
    contents.set(segment, child.kind === 'group' ? publishGroup(child) : child);
  }
  const group: GroupNode = {
    kind: 'group',
    fullPath: draft.fullPath,
    description: '',
    access: OscAccess.NoValue,
    contents,
  };
  return Object.freeze(group);
}

/**
 * Collects endpoints into an address tree. The tree is append-only while
 * building; publish() hands out an immutable copy and closes the builder.
 */
export class TreeBuilder {
  private readonly root: DraftGroup = { kind: 'group', fullPath: '/', contents: new Map() };
  private readonly hostInfo: HostInfo | undefined;
  private published = false;
  private endpointCount = 0;

  constructor(hostInfo?: HostInfo) {
    this.hostInfo = hostInfo;
  }

  get size(): number {
    return this.endpointCount;
  }

  /**
   * Inserts one endpoint, creating intermediate groups as needed.
   * Throws InvalidPathError or PathConflictError and leaves the tree
   * untouched when the descriptor cannot be placed.
   */
  insert(descriptor: EndpointDescriptor): LeafNode {
    if (this.published) throw new TreePublishedError();

    const segments = splitPath(descriptor.path);
    const parentDepth = segments.length - 1;
    const leafSegment = segments[parentDepth];

    // Check everything before touching the tree.
    let parent = this.root;
    let depth = 0;
    for (; depth < parentDepth; depth++) {
      const child = parent.contents.get(segments[depth]);
      if (child === undefined) break;
      if (child.kind === 'leaf') {
        throw new PathConflictError(descriptor.path, `"${child.fullPath}" is an endpoint, not a group`);
      }
      parent = child;
    }
    if (depth === parentDepth) {
      const existing = parent.contents.get(leafSegment);
      if (existing !== undefined) {
        const what = existing.kind === 'group' ? 'a group' : 'an endpoint';
        throw new PathConflictError(descriptor.path, `"${existing.fullPath}" is already ${what}`);
      }
    }

    for (; depth < parentDepth; depth++) {
      const segment = segments[depth];
      const group: DraftGroup = {
        kind: 'group',
        fullPath: childPath(parent.fullPath, segment),
        contents: new Map(),
      };
      parent.contents.set(segment, group);
      parent = group;
    }

    const leaf = createLeaf(descriptor, childPath(parent.fullPath, leafSegment));
    parent.contents.set(leafSegment, leaf);
    this.endpointCount++;
    logger.debug('Inserted OSC endpoint', { path: leaf.fullPath, type: leaf.typeTag });
    return leaf;
  }

  publish(): AddressTree {
    if (this.published) throw new TreePublishedError();
    this.published = true;

    const group = publishGroup(this.root);
    const root: RootNode = {
      ...group,
      fullPath: '/',
      ...(this.hostInfo ? { hostInfo: snapshotHostInfo(this.hostInfo) } : {}),
    };
    logger.info('Published OSCQuery address tree', { endpoints: this.endpointCount });
    return new AddressTree(Object.freeze(root));
  }
}

// Read-only handle over a published tree. Safe to share between requests.
export class AddressTree {
  constructor(readonly root: RootNode) {}

  get hostInfo(): HostInfoSnapshot | undefined {
    return this.root.hostInfo;
  }

  /**
   * Finds the node addressed by `path`, comparing segments exactly as they
   * were inserted. A trailing "/" is ignored.
   */
  lookup(path: string): AddressNode | undefined {
    if (!path.startsWith('/')) return undefined;
    const trimmed = path.replace(/\/+$/, '');
    if (trimmed === '') return this.root;

    let node: AddressNode = this.root;
    for (const segment of trimmed.slice(1).split('/')) {
      if (segment === '' || node.kind !== 'group') return undefined;
      const child: AddressNode | undefined = node.contents.get(segment);
      if (child === undefined) return undefined;
      node = child;
    }
    return node;
  }
}

export function createRoot(hostInfo?: HostInfo): TreeBuilder {
  return new TreeBuilder(hostInfo);
}
