import { readFileSync, statSync } from 'node:fs';
import type { MappingNode } from '../tree/document-tree.js';
import { parseValuesDocument } from '../tree/parse-values.js';
import { ValuesCheckError } from '../validator/errors.js';

export interface LoadValuesFileOptions {
  readonly maxInputBytes?: number;
}

const DEFAULT_MAX_INPUT_BYTES = 10 * 1024 * 1024;

/**
 * Read and parse a user values file. The top level must be a mapping; an empty
 * file counts as an empty mapping.
 */
export function loadValuesFile(filePath: string, options: LoadValuesFileOptions = {}): MappingNode {
  const maxInputBytes = normalizeLimit(options.maxInputBytes, DEFAULT_MAX_INPUT_BYTES);

  const size = statSync(filePath).size;
  if (size > maxInputBytes) {
    throw new ValuesCheckError(
      'VALUES_FILE_TOO_LARGE',
      `Values file ${filePath} is too large (${size} bytes, max ${maxInputBytes}).`,
      { filePath, size, maxInputBytes },
    );
  }

  return parseValuesMapping(readFileSync(filePath, 'utf8'), filePath);
}

export function parseValuesMapping(text: string, sourceId: string): MappingNode {
  const root = parseValuesDocument(text, sourceId);
  if (root.kind !== 'mapping') {
    throw new ValuesCheckError('VALUES_NOT_MAPPING', `Values file ${sourceId}: expected a YAML mapping at top level.`, {
      sourceId,
      kind: root.kind,
    });
  }
  return root;
}

export function normalizeLimit(value: number | undefined, fallback: number): number {
  if (value === undefined || !Number.isFinite(value) || value <= 0) {
    return fallback;
  }
  return Math.floor(value);
}
