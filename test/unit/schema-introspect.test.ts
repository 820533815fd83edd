import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { ValuesCheckError } from '../../src/validator/errors.js';
import {
  EMPTY_SCHEMA_INTROSPECTION,
  findExternalReference,
  introspectSchema,
} from '../../src/validator/schema-introspect.js';

const SCHEMA = {
  properties: {
    replicas: { type: 'integer' },
    image: {
      type: 'object',
      properties: {
        tag: { type: ['string', 'null'] },
      },
    },
    legacyMode: { type: 'boolean', deprecated: true, description: 'use mode instead' },
    oldFlag: { deprecated: true },
    free: true,
  },
};

describe('introspectSchema', () => {
  it('returns the empty introspection when there is no schema', () => {
    assert.equal(introspectSchema(undefined), EMPTY_SCHEMA_INTROSPECTION);
    assert.equal(introspectSchema('  \n'), EMPTY_SCHEMA_INTROSPECTION);
  });

  it('collects property types, keys and deprecations', () => {
    const schema = introspectSchema(JSON.stringify(SCHEMA));

    assert.deepEqual(schema.document, SCHEMA);
    assert.deepEqual(
      schema.typesByPath,
      new Map<string, readonly string[]>([
        ['replicas', ['integer']],
        ['image', ['object']],
        ['image.tag', ['string', 'null']],
        ['legacyMode', ['boolean']],
      ]),
    );
    assert.deepEqual([...schema.keysByPath], ['replicas', 'image', 'image.tag', 'legacyMode', 'oldFlag', 'free']);
    assert.deepEqual(
      schema.deprecatedByPath,
      new Map<string, string | undefined>([
        ['legacyMode', 'use mode instead'],
        ['oldFlag', undefined],
      ]),
    );
    assert.equal(schema.blockedReference, undefined);
  });

  it('reads byte input', () => {
    const schema = introspectSchema(Buffer.from('{"properties":{"name":{"type":"string"}}}', 'utf8'));
    assert.deepEqual([...schema.keysByPath], ['name']);
  });

  it('keeps a boolean schema as the document', () => {
    const schema = introspectSchema('true');
    assert.equal(schema.document, true);
    assert.equal(schema.keysByPath.size, 0);
  });

  it('rejects bytes that are not JSON', () => {
    assert.throws(
      () => introspectSchema('{not json'),
      (error: unknown) => error instanceof ValuesCheckError && error.code === 'SCHEMA_PARSE_FAILED',
    );
  });

  it('rejects a root that is neither an object nor a boolean', () => {
    assert.throws(
      () => introspectSchema('[1, 2]'),
      (error: unknown) =>
        error instanceof ValuesCheckError &&
        error.code === 'SCHEMA_INVALID' &&
        error.message === 'Schema root must be a JSON object or boolean. context={"rootType":"array"}',
    );
  });

  it('keeps only declared keys for schemas with references outside the document', () => {
    const schema = introspectSchema(
      JSON.stringify({
        definitions: { port: { type: 'integer' } },
        properties: {
          port: { $ref: '#/definitions/port' },
          tls: { $ref: 'https://example.com/tls.json' },
        },
      }),
    );

    assert.equal(schema.blockedReference, 'https://example.com/tls.json');
    assert.deepEqual([...schema.keysByPath], ['port', 'tls']);
    assert.equal(schema.typesByPath.size, 0);
    assert.equal(schema.deprecatedByPath.size, 0);
  });

  it('allows same-document references', () => {
    const schema = introspectSchema(
      JSON.stringify({
        definitions: { port: { type: 'integer' } },
        properties: { port: { $ref: '#/definitions/port' } },
      }),
    );

    assert.equal(schema.blockedReference, undefined);
    assert.deepEqual([...schema.keysByPath], ['port']);
  });
});

describe('findExternalReference', () => {
  it('finds the first external reference in document order, including inside arrays', () => {
    assert.equal(
      findExternalReference({ allOf: [{ $ref: '#/a' }, { $ref: 'other.json#/b' }, { $ref: 'third.json' }] }),
      'other.json#/b',
    );
  });

  it('ignores non-string $ref values', () => {
    assert.equal(findExternalReference({ properties: { $ref: { type: 'string' } } }), undefined);
  });
});
