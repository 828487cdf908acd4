import { NotFoundError, UnknownAttributeError } from '../core/errors.js';
import type { AddressTree } from '../models/addressTree.js';
import { wireObject } from '../utils/wireJson.js';
import type { WireObject } from '../utils/wireJson.js';
import { attributeOf, hostInfoDocument, isQueryAttribute, nodeToWire } from './serializer.js';
import type { QueryAttribute } from './serializer.js';

export type QueryOutcome =
  | { ok: true; document: WireObject }
  | { ok: false; error: NotFoundError | UnknownAttributeError };

/**
 * Extracts the attribute filter from a raw query string such as "VALUE" or
 * "?VALUE". Only the first key counts; anything after "=" is ignored.
 */
export function attributeFromQuery(search: string): string | undefined {
  const query = search.startsWith('?') ? search.slice(1) : search;
  const key = query.split('&')[0].split('=')[0];
  if (key === '') return undefined;
  try {
    return decodeURIComponent(key);
  } catch {
    return key;
  }
}

/**
 * Answers one OSCQuery request against a published tree. Stateless: the
 * same tree can serve any number of concurrent calls.
 */
export function resolveQuery(tree: AddressTree, path: string, attribute?: string): QueryOutcome {
  if (attribute === 'HOST_INFO') {
    return { ok: true, document: hostInfoDocument(tree.hostInfo) };
  }
  let filter: QueryAttribute | undefined;
  if (attribute !== undefined) {
    if (!isQueryAttribute(attribute)) {
      return { ok: false, error: new UnknownAttributeError(attribute) };
    }
    filter = attribute;
  }

  const node = tree.lookup(path);
  if (node === undefined) {
    return { ok: false, error: new NotFoundError(path) };
  }

  switch (filter) {
    case undefined:
      return { ok: true, document: nodeToWire(node) };
    case 'TAGS':
    case 'EXTENDED_TYPE':
    case 'CRITICAL':
    case 'CLIPMODE':
      return { ok: true, document: {} };
    default: {
      const value = attributeOf(node, filter);
      return { ok: true, document: value === undefined ? {} : wireObject([[filter, value]]) };
    }
  }
}

export class QueryResolver {
  constructor(private readonly tree: AddressTree) {}

  resolve(path: string, attribute?: string): QueryOutcome {
    return resolveQuery(this.tree, path, attribute);
  }
}
