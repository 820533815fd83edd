import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import {
  findLineForPath,
  getMappingValue,
  indexPath,
  joinPath,
  mappingKeys,
  nodeType,
  toPlainValue,
} from '../../src/tree/document-tree.js';
import { yamlMapping } from '../helpers/values-fixtures.js';

const SAMPLE = 'image:\n  tag: latest\ncontainers:\n  - name: app\n    ports:\n      - 80\n';

describe('document tree helpers', () => {
  it('joins dot and index paths', () => {
    assert.equal(joinPath('', 'image'), 'image');
    assert.equal(joinPath('image', 'tag'), 'image.tag');
    assert.equal(indexPath('containers', 2), 'containers[2]');
  });

  it('reports node types and mapping keys', () => {
    const root = yamlMapping(SAMPLE);
    assert.equal(nodeType(root), 'mapping');
    assert.deepEqual(mappingKeys(root), ['image', 'containers']);
    const containers = getMappingValue(root, 'containers');
    assert.equal(containers === undefined ? undefined : nodeType(containers), 'sequence');
    assert.equal(getMappingValue(root, 'missing'), undefined);
  });

  it('resolves lines for keys, indices and nested sequences', () => {
    const root = yamlMapping(SAMPLE);
    assert.equal(findLineForPath(root, ''), 1);
    assert.equal(findLineForPath(root, 'image.tag'), 2);
    assert.equal(findLineForPath(root, 'containers'), 3);
    assert.equal(findLineForPath(root, 'containers[0].name'), 4);
    assert.equal(findLineForPath(root, 'containers[0].ports[0]'), 6);
  });

  it('returns 0 for paths that are not present', () => {
    const root = yamlMapping(SAMPLE);
    assert.equal(findLineForPath(root, 'missing'), 0);
    assert.equal(findLineForPath(root, 'image.tag.deeper'), 0);
    assert.equal(findLineForPath(root, 'containers[3].name'), 0);
  });

  it('converts trees to plain data', () => {
    assert.deepEqual(toPlainValue(yamlMapping(SAMPLE)), {
      image: { tag: 'latest' },
      containers: [{ name: 'app', ports: [80] }],
    });
  });

  it('keeps __proto__ as an ordinary key', () => {
    const plain = toPlainValue(yamlMapping('__proto__: 1\n'));
    assert.deepEqual(Object.keys(plain ?? {}), ['__proto__']);
  });
});
