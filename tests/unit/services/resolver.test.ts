import { describe, it, expect } from 'vitest';
import { OscAccess } from '../../../src/models/addressTree.js';
import type { LeafNode } from '../../../src/models/addressTree.js';
import { osc, typeTagOf } from '../../../src/models/oscValue.js';
import { NotFoundError, UnknownAttributeError } from '../../../src/core/errors.js';
import { QueryResolver, attributeFromQuery, resolveQuery } from '../../../src/services/resolver.js';
import type { QueryOutcome } from '../../../src/services/resolver.js';
import { isQueryAttribute, nodeToWire } from '../../../src/services/serializer.js';
import { stringifyWire } from '../../../src/utils/wireJson.js';
import { buildTree, sampleTree } from '../../test-utils.js';

function body(outcome: QueryOutcome): string {
  if (!outcome.ok) throw outcome.error;
  return stringifyWire(outcome.document);
}

const HOST_INFO_JSON =
  '{"NAME":"Test Rig","OSC_IP":"127.0.0.1","OSC_PORT":6666,"OSC_TRANSPORT":"UDP",' +
  '"EXTENSIONS":{"ACCESS":true,"VALUE":true,"RANGE":true,"DESCRIPTION":true,"TAGS":false,' +
  '"EXTENDED_TYPE":false,"UNIT":false,"CRITICAL":false,"CLIPMODE":false,"LISTEN":false,"PATH_CHANGED":false}}';

const DISTANCE_JSON =
  '{"DESCRIPTION":"Distance sensor","FULL_PATH":"/group/distance","ACCESS":3,"TYPE":"f",' +
  '"VALUE":[1.0],"RANGE":[{"MIN":0.0,"MAX":10.0}],"UNIT":["distance.cm"]}';

describe('resolveQuery', () => {
  const tree = sampleTree();

  describe('full node objects', () => {
    it('should serialize a leaf with all of its metadata', () => {
      expect(body(resolveQuery(tree, '/group/distance'))).toBe(DISTANCE_JSON);
    });

    it('should omit RANGE and UNIT on leaves without them', () => {
      expect(body(resolveQuery(tree, '/group/label'))).toBe(
        '{"DESCRIPTION":"","FULL_PATH":"/group/label","ACCESS":1,"TYPE":"s","VALUE":["idle"]}'
      );
    });

    it('should serialize a group with CONTENTS in insertion order', () => {
      expect(body(resolveQuery(tree, '/group'))).toBe(
        '{"DESCRIPTION":"","FULL_PATH":"/group","ACCESS":0,"CONTENTS":{' +
          `"distance":${DISTANCE_JSON},` +
          '"label":{"DESCRIPTION":"","FULL_PATH":"/group/label","ACCESS":1,"TYPE":"s","VALUE":["idle"]}}}'
      );
    });

    it('should include HOST_INFO on the root only', () => {
      const outcome = resolveQuery(tree, '/');
      if (!outcome.ok) throw outcome.error;

      expect(Object.keys(outcome.document)).toEqual(['DESCRIPTION', 'FULL_PATH', 'ACCESS', 'CONTENTS', 'HOST_INFO']);
      expect(stringifyWire(outcome.document.HOST_INFO)).toBe(HOST_INFO_JSON);
      expect(body(resolveQuery(tree, '/group'))).not.toContain('HOST_INFO');
    });

    it('should map access modes to their integer values', () => {
      const access = (path: string) => JSON.parse(body(resolveQuery(tree, path, 'ACCESS'))).ACCESS;

      expect(access('/group/distance')).toBe(3);
      expect(access('/group/label')).toBe(1);
      expect(access('/trigger')).toBe(2);
      expect(access('/group')).toBe(0);
    });

    it('should emit an empty CONTENTS object for an empty root', () => {
      expect(body(resolveQuery(buildTree([], null), '/'))).toBe(
        '{"DESCRIPTION":"","FULL_PATH":"/","ACCESS":0,"CONTENTS":{}}'
      );
    });

    it('should keep a "__proto__" segment as a CONTENTS key', () => {
      const odd = buildTree(
        [
          { path: '/__proto__', value: osc.int(1) },
          { path: '/b', value: osc.int(2) },
        ],
        null
      );

      expect(body(resolveQuery(odd, '/'))).toBe(
        '{"DESCRIPTION":"","FULL_PATH":"/","ACCESS":0,"CONTENTS":{' +
          '"__proto__":{"DESCRIPTION":"","FULL_PATH":"/__proto__","ACCESS":3,"TYPE":"i","VALUE":[1]},' +
          '"b":{"DESCRIPTION":"","FULL_PATH":"/b","ACCESS":3,"TYPE":"i","VALUE":[2]}}}'
      );
      expect(body(resolveQuery(odd, '/__proto__', 'VALUE'))).toBe('{"VALUE":[1]}');
    });

    it('should resolve a segment holding "%" at its own FULL_PATH', () => {
      const gain = buildTree([{ path: '/gain%41', value: osc.float(0.5) }], null);

      expect(body(resolveQuery(gain, '/gain%41', 'FULL_PATH'))).toBe('{"FULL_PATH":"/gain%41"}');
      expect(resolveQuery(gain, '/gainA').ok).toBe(false);
    });

    it('should serve the value as inserted after the caller mutates it', () => {
      const color = osc.color(1, 2, 3);
      const published = buildTree([{ path: '/c', value: color }], null);

      if (color.type === 'r') color.value.red = 255;

      expect(body(resolveQuery(published, '/c', 'VALUE'))).toBe('{"VALUE":["#010203ff"]}');
    });
  });

  describe('attribute filters', () => {
    it('should return only the requested attribute', () => {
      expect(body(resolveQuery(tree, '/group/distance', 'VALUE'))).toBe('{"VALUE":[1.0]}');
      expect(body(resolveQuery(tree, '/group/distance', 'RANGE'))).toBe('{"RANGE":[{"MIN":0.0,"MAX":10.0}]}');
      expect(body(resolveQuery(tree, '/group/distance', 'UNIT'))).toBe('{"UNIT":["distance.cm"]}');
      expect(body(resolveQuery(tree, '/group/distance', 'TYPE'))).toBe('{"TYPE":"f"}');
      expect(body(resolveQuery(tree, '/trigger', 'VALUE'))).toBe('{"VALUE":[false]}');
    });

    it('should return an empty object for attributes a node does not carry', () => {
      expect(body(resolveQuery(tree, '/group/label', 'RANGE'))).toBe('{}');
      expect(body(resolveQuery(tree, '/group/label', 'UNIT'))).toBe('{}');
      expect(body(resolveQuery(tree, '/group', 'VALUE'))).toBe('{}');
      expect(body(resolveQuery(tree, '/group', 'TYPE'))).toBe('{}');
      expect(body(resolveQuery(tree, '/group/distance', 'CONTENTS'))).toBe('{}');
      expect(body(resolveQuery(tree, '/group/distance', 'TAGS'))).toBe('{}');
      expect(body(resolveQuery(tree, '/group', 'HOST_INFO'))).toBe(HOST_INFO_JSON);
    });

    it('should return CONTENTS alone for a group', () => {
      const outcome = resolveQuery(tree, '/', 'CONTENTS');
      if (!outcome.ok) throw outcome.error;

      expect(Object.keys(outcome.document)).toEqual(['CONTENTS']);
      expect(JSON.parse(stringifyWire(outcome.document)).CONTENTS.trigger.TYPE).toBe('F');
    });

    it('should answer HOST_INFO at any path, existing or not', () => {
      expect(body(resolveQuery(tree, '/', 'HOST_INFO'))).toBe(HOST_INFO_JSON);
      expect(body(resolveQuery(tree, '/group/distance', 'HOST_INFO'))).toBe(HOST_INFO_JSON);
      expect(body(resolveQuery(tree, '/does/not/exist', 'HOST_INFO'))).toBe(HOST_INFO_JSON);
    });

    it('should answer HOST_INFO with an empty object when none was given', () => {
      expect(body(resolveQuery(buildTree([], null), '/', 'HOST_INFO'))).toBe('{}');
    });
  });

  describe('errors', () => {
    it('should report unknown paths as not found', () => {
      const outcome = resolveQuery(tree, '/group/missing');

      expect(outcome.ok).toBe(false);
      if (outcome.ok) return;
      expect(outcome.error).toBeInstanceOf(NotFoundError);
      expect(outcome.error.status).toBe(404);
    });

    it('should reject unknown attribute names', () => {
      const outcome = resolveQuery(tree, '/group', 'value');

      expect(outcome.ok).toBe(false);
      if (outcome.ok) return;
      expect(outcome.error).toBeInstanceOf(UnknownAttributeError);
      expect(outcome.error.message).toBe('Unknown attribute "value"');
    });
  });

  it('should give the same answer through QueryResolver', () => {
    const resolver = new QueryResolver(tree);

    expect(body(resolver.resolve('/group/distance', 'VALUE'))).toBe('{"VALUE":[1.0]}');
  });
});

describe('nodeToWire', () => {
  it('should write one element per value slot on multi-value leaves', () => {
    const values = [osc.int(1), osc.float(0.5), osc.float(2)];
    const leaf: LeafNode = {
      kind: 'leaf',
      fullPath: '/xyz',
      description: 'position',
      access: OscAccess.ReadOnly,
      typeTag: typeTagOf(values),
      values,
      range: [{ min: 0, max: 1 }, { min: -1, max: 1 }, { vals: [osc.float(2), osc.float(4)] }],
      unit: ['distance.m', 'distance.m', 'angle.degree'],
    };

    expect(stringifyWire(nodeToWire(leaf))).toBe(
      '{"DESCRIPTION":"position","FULL_PATH":"/xyz","ACCESS":1,"TYPE":"iff","VALUE":[1,0.5,2.0],' +
        '"RANGE":[{"MIN":0.0,"MAX":1.0},{"MIN":-1.0,"MAX":1.0},{"VALS":[2.0,4.0]}],' +
        '"UNIT":["distance.m","distance.m","angle.degree"]}'
    );
  });
});

describe('attributeFromQuery', () => {
  it('should take the first query key', () => {
    expect(attributeFromQuery('VALUE')).toBe('VALUE');
    expect(attributeFromQuery('?RANGE')).toBe('RANGE');
    expect(attributeFromQuery('VALUE=1&TYPE')).toBe('VALUE');
    expect(attributeFromQuery('HOST%5FINFO')).toBe('HOST_INFO');
  });

  it('should treat an empty query as no filter', () => {
    expect(attributeFromQuery('')).toBeUndefined();
    expect(attributeFromQuery('?')).toBeUndefined();
  });
});

describe('isQueryAttribute', () => {
  it('should know node and extension attributes', () => {
    expect(isQueryAttribute('FULL_PATH')).toBe(true);
    expect(isQueryAttribute('CLIPMODE')).toBe(true);
    expect(isQueryAttribute('LISTEN')).toBe(false);
  });
});
