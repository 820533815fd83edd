import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { ValidationRunError } from '../../src/validator/errors.js';
import { validateValues } from '../../src/validator/validate.js';
import { assertNoFindings, summarize, testChart, yamlMapping } from '../helpers/values-fixtures.js';

const DEFAULTS = [
  'replicaCount: 1',
  'image:',
  '  repository: nginx',
  '  tag: latest',
  'service:',
  '  port: 80',
  'podAnnotations: {}',
  '',
].join('\n');

const SCHEMA = {
  properties: {
    replicaCount: { type: 'integer', minimum: 1 },
    legacy: { type: 'boolean', deprecated: true, description: 'use modern instead' },
  },
};

const USER = ['replicaCount: 0', 'image:', '  tga: v1', 'service:', '  port: "http"', 'legacy: true', ''].join('\n');

describe('validateValues', () => {
  it('reports nothing for values shaped like the defaults', () => {
    const result = validateValues({
      sourceId: 'values.yaml',
      values: yamlMapping(DEFAULTS),
      chart: testChart({ defaults: DEFAULTS, schema: SCHEMA }),
    });
    assertNoFindings(result.findings);
  });

  it('runs unknown-key, type and schema passes in order', () => {
    const result = validateValues({
      sourceId: 'values.yaml',
      values: yamlMapping(USER),
      chart: testChart({ defaults: DEFAULTS, schema: SCHEMA }),
    });

    assert.equal(result.sourceId, 'values.yaml');
    assert.equal(result.chartName, 'demo');
    assert.equal(result.chartVersion, '1.2.3');
    assert.deepEqual(summarize(result.findings), [
      'VALUES_UNKNOWN_KEY@image.tga:3',
      'VALUES_TYPE_MISMATCH@service.port:5',
      'VALUES_SCHEMA_VIOLATION@replicaCount:1',
      'VALUES_DEPRECATED_KEY@legacy:6',
    ]);
    assert.deepEqual(
      result.findings.map((finding) => finding.message),
      [
        'Unknown key "image.tga"',
        'Type mismatch at "service.port": expected int, got string ("http")',
        'Schema validation: must be >= 1',
        'Deprecated key "legacy" - use modern instead',
      ],
    );
    assert.equal(result.findings[0]?.suggestion, 'image.tag');
  });

  it('returns the same result on repeated runs', () => {
    const input = {
      sourceId: 'values.yaml',
      values: yamlMapping(USER),
      chart: testChart({ defaults: DEFAULTS, schema: SCHEMA }),
    };
    assert.deepEqual(validateValues(input), validateValues(input));
  });

  it('suppresses findings under ignore patterns in every pass', () => {
    const result = validateValues({
      sourceId: 'values.yaml',
      values: yamlMapping(USER),
      chart: testChart({ defaults: DEFAULTS, schema: SCHEMA }),
      ignorePatterns: ['image.*', 'service.**', 'legacy', 'replicaCount'],
    });
    assertNoFindings(result.findings);
  });

  it('checks keys without defaults against schema types', () => {
    const result = validateValues({
      sourceId: 'values.yaml',
      values: yamlMapping('legacy: "yes"\n'),
      chart: testChart({ defaults: DEFAULTS, schema: SCHEMA }),
    });

    assert.deepEqual(summarize(result.findings), ['VALUES_TYPE_MISMATCH@legacy:1', 'VALUES_DEPRECATED_KEY@legacy:1']);
    assert.equal(result.findings[0]?.message, 'Type mismatch at "legacy": expected bool, got string ("yes")');
  });

  it('reports a blocked schema reference while still accepting its declared keys', () => {
    const result = validateValues({
      sourceId: 'values.yaml',
      values: yamlMapping('extra: 1\nimage:\n  tga: v1\n'),
      chart: testChart({
        defaults: DEFAULTS,
        schema: { properties: { extra: { $ref: 'https://example.com/extra.json' } } },
      }),
    });

    assert.deepEqual(summarize(result.findings), ['VALUES_UNKNOWN_KEY@image.tga:3', 'VALUES_SCHEMA_REF_BLOCKED@:0']);
  });

  it('accepts an explicit null where the schema declares a non-null type', () => {
    const result = validateValues({
      sourceId: 'values.yaml',
      values: yamlMapping('replicaCount: ~\nlimit: null\n'),
      chart: testChart({
        defaults: DEFAULTS,
        schema: { properties: { ...SCHEMA.properties, limit: { type: 'integer' } } },
      }),
    });
    assertNoFindings(result.findings);
  });

  it('evaluates same-document references', () => {
    const result = validateValues({
      sourceId: 'values.yaml',
      values: yamlMapping('replicaCount: 0\n'),
      chart: testChart({
        defaults: DEFAULTS,
        schema: {
          definitions: { count: { minimum: 1 } },
          properties: { replicaCount: { $ref: '#/definitions/count' } },
        },
      }),
    });

    assert.deepEqual(summarize(result.findings), ['VALUES_SCHEMA_VIOLATION@replicaCount:1']);
  });

  it('keeps tree findings when the schema cannot be parsed', () => {
    const chart = { ...testChart({ defaults: DEFAULTS }), schemaBytes: '{broken' };

    assert.throws(
      () => validateValues({ sourceId: 'values.yaml', values: yamlMapping('extra: 1\n'), chart }),
      (error: unknown) => {
        assert.ok(error instanceof ValidationRunError);
        assert.equal(error.code, 'SCHEMA_PARSE_FAILED');
        assert.deepEqual(summarize(error.partial.findings), ['VALUES_UNKNOWN_KEY@extra:1']);
        return true;
      },
    );
  });

  it('keeps tree findings when the schema cannot be compiled', () => {
    const chart = testChart({ defaults: DEFAULTS, schema: { $ref: '#/definitions/missing' } });

    assert.throws(
      () => validateValues({ sourceId: 'values.yaml', values: yamlMapping('replicaCount: many\n'), chart }),
      (error: unknown) => {
        assert.ok(error instanceof ValidationRunError);
        assert.equal(error.code, 'SCHEMA_COMPILE_FAILED');
        assert.deepEqual(summarize(error.partial.findings), ['VALUES_TYPE_MISMATCH@replicaCount:1']);
        return true;
      },
    );
  });

  it('validates subcomponent sections against their own defaults', () => {
    const result = validateValues({
      sourceId: 'values.yaml',
      values: yamlMapping('redis:\n  prot: 6380\n  port: high\n'),
      chart: testChart({ defaults: DEFAULTS, subcomponents: { redis: 'port: 6379\n' } }),
    });

    assert.deepEqual(summarize(result.findings), ['VALUES_UNKNOWN_KEY@redis.prot:2', 'VALUES_TYPE_MISMATCH@redis.port:3']);
    assert.equal(result.findings[0]?.suggestion, 'redis.port');
  });
});
