import { EMPTY_MAPPING, getMappingValue, joinPath, mappingKeys, type MappingNode, type TreeNode } from '../tree/document-tree.js';
import { createFinding, type Finding } from './findings.js';
import { isIgnoredPath } from './glob.js';
import { buildPathIndex, EMPTY_PATH_INDEX, type PathIndex } from './path-index.js';
import { suggestKey } from './suggest.js';

export interface UnknownKeyContext {
  /** Property paths declared in the schema; accepted even when defaults lack them. */
  readonly schemaKeys: ReadonlySet<string>;
  /** Subcomponent defaults by top-level key. */
  readonly subcomponents: ReadonlyMap<string, MappingNode>;
  readonly ignorePatterns: readonly string[];
  /** Deep-suggestion index over the current comparison root. */
  readonly pathIndex: PathIndex;
}

const NO_SCHEMA_KEYS: ReadonlySet<string> = new Set();
const NO_SUBCOMPONENTS: ReadonlyMap<string, MappingNode> = new Map();

/**
 * Report keys in `user` that neither the defaults tree nor the schema declares.
 *
 * Walks user keys in document order. An empty mapping in the defaults accepts any
 * structure beneath it. Non-mapping input yields no findings.
 */
export function detectUnknownKeys(
  user: TreeNode,
  defaults: TreeNode,
  context: UnknownKeyContext,
  pathPrefix = '',
): Finding[] {
  const findings: Finding[] = [];
  if (user.kind !== 'mapping') {
    return findings;
  }

  const defaultKeys = mappingKeys(defaults);
  const knownKeys = new Set(defaultKeys);

  for (const entry of user.entries) {
    const fullPath = joinPath(pathPrefix, entry.key);
    if (isIgnoredPath(fullPath, context.ignorePatterns)) {
      continue;
    }

    const subcomponent = pathPrefix === '' ? context.subcomponents.get(entry.key) : undefined;
    if (subcomponent !== undefined) {
      if (entry.value.kind === 'mapping') {
        findings.push(...detectUnknownKeys(entry.value, subcomponent, subcomponentContext(entry.key, subcomponent, context), fullPath));
      }
      continue;
    }

    if (!knownKeys.has(entry.key)) {
      if (context.schemaKeys.has(fullPath)) {
        if (entry.value.kind === 'mapping') {
          findings.push(...detectUnknownKeys(entry.value, EMPTY_MAPPING, context, fullPath));
        }
        continue;
      }

      findings.push(
        createFinding(
          'VALUES_UNKNOWN_KEY',
          'error',
          entry.keyLine,
          fullPath,
          `Unknown key ${JSON.stringify(fullPath)}`,
          suggestKey(entry.key, pathPrefix, defaultKeys, context.pathIndex),
        ),
      );
      continue;
    }

    const defaultValue = getMappingValue(defaults, entry.key);
    if (entry.value.kind === 'mapping' && defaultValue?.kind === 'mapping') {
      if (defaultValue.entries.length === 0) {
        continue;
      }
      findings.push(...detectUnknownKeys(entry.value, defaultValue, context, fullPath));
    }
  }

  return findings;
}

/** Context for sequence elements checked against a template: sibling suggestions only. */
export function templateContext(ignorePatterns: readonly string[]): UnknownKeyContext {
  return {
    schemaKeys: NO_SCHEMA_KEYS,
    subcomponents: NO_SUBCOMPONENTS,
    ignorePatterns,
    pathIndex: EMPTY_PATH_INDEX,
  };
}

function subcomponentContext(name: string, defaults: MappingNode, parent: UnknownKeyContext): UnknownKeyContext {
  return {
    schemaKeys: parent.schemaKeys,
    subcomponents: NO_SUBCOMPONENTS,
    ignorePatterns: parent.ignorePatterns,
    pathIndex: buildPathIndex(defaults, name),
  };
}
