import { hostInfoToWire } from '../models/hostInfo.js';
import type { HostInfoSnapshot } from '../models/hostInfo.js';
import type { AddressNode, GroupNode, LeafNode, RangeEntry, RootNode } from '../models/addressTree.js';
import { encodeValue } from '../models/oscValue.js';
import { WireFloat, wireObject } from '../utils/wireJson.js';
import type { WireObject, WireValue } from '../utils/wireJson.js';

// Attributes a node object can carry, in serialization order.
export const NODE_ATTRIBUTES = [
  'DESCRIPTION',
  'FULL_PATH',
  'ACCESS',
  'CONTENTS',
  'TYPE',
  'VALUE',
  'RANGE',
  'UNIT',
  'HOST_INFO',
] as const;

// Extension attributes this server never stores on a node.
export const UNSTORED_ATTRIBUTES = ['TAGS', 'EXTENDED_TYPE', 'CRITICAL', 'CLIPMODE'] as const;

export type NodeAttribute = (typeof NODE_ATTRIBUTES)[number];
export type QueryAttribute = NodeAttribute | (typeof UNSTORED_ATTRIBUTES)[number];

export function isQueryAttribute(value: string): value is QueryAttribute {
  return (
    (NODE_ATTRIBUTES as readonly string[]).includes(value) ||
    (UNSTORED_ATTRIBUTES as readonly string[]).includes(value)
  );
}

function rangeToWire(entry: RangeEntry): WireObject {
  const members: [string, WireValue][] = [];
  if (entry.min !== undefined) members.push(['MIN', new WireFloat(entry.min)]);
  if (entry.max !== undefined) members.push(['MAX', new WireFloat(entry.max)]);
  if (entry.vals !== undefined) members.push(['VALS', entry.vals.map(encodeValue)]);
  return wireObject(members);
}

function isRoot(node: AddressNode): node is RootNode {
  return node.kind === 'group' && node.fullPath === '/';
}

function contentsToWire(group: GroupNode): WireObject {
  return wireObject(
    Array.from(group.contents, ([segment, child]): [string, WireValue] => [segment, nodeToWire(child)])
  );
}

/**
 * Reads a single attribute off a node. Returns undefined when the node does
 * not carry it, which callers encode as an empty object.
 */
export function attributeOf(node: AddressNode, attribute: NodeAttribute): WireValue | undefined {
  switch (attribute) {
    case 'DESCRIPTION':
      return node.description;
    case 'FULL_PATH':
      return node.fullPath;
    case 'ACCESS':
      return node.access;
    case 'HOST_INFO':
      return isRoot(node) && node.hostInfo ? hostInfoToWire(node.hostInfo) : undefined;
  }

  switch (node.kind) {
    case 'group':
      return attribute === 'CONTENTS' ? contentsToWire(node) : undefined;
    case 'leaf':
      return leafAttribute(node, attribute);
  }
}

function leafAttribute(leaf: LeafNode, attribute: NodeAttribute): WireValue | undefined {
  switch (attribute) {
    case 'TYPE':
      return leaf.typeTag;
    case 'VALUE':
      return leaf.values.map(encodeValue);
    case 'RANGE':
      return leaf.range?.map(rangeToWire);
    case 'UNIT':
      return leaf.unit ? [...leaf.unit] : undefined;
    default:
      return undefined;
  }
}

// Full node object, recursing through CONTENTS in sibling insertion order.
export function nodeToWire(node: AddressNode): WireObject {
  const members: [string, WireValue][] = [];
  for (const attribute of NODE_ATTRIBUTES) {
    const value = attributeOf(node, attribute);
    if (value !== undefined) members.push([attribute, value]);
  }
  return wireObject(members);
}

export function hostInfoDocument(hostInfo: HostInfoSnapshot | undefined): WireObject {
  return hostInfo ? hostInfoToWire(hostInfo) : {};
}
