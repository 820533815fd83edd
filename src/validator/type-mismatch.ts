import {
  EMPTY_MAPPING,
  getMappingValue,
  indexPath,
  isNullNode,
  joinPath,
  nodeType,
  type MappingNode,
  type SequenceNode,
  type TreeNode,
} from '../tree/document-tree.js';
import { createFinding, type Finding } from './findings.js';
import { isIgnoredPath } from './glob.js';
import type { SchemaTypeMap } from './schema-introspect.js';
import { compatibleWith, compatibleWithSchemaTypes, describeTypes, friendlyTypeName } from './type-compat.js';
import { detectUnknownKeys, templateContext } from './unknown-keys.js';

export interface TypeMismatchContext {
  readonly ignorePatterns: readonly string[];
  /** Fallback types for keys whose default is absent or null. */
  readonly schemaTypes: SchemaTypeMap;
  readonly subcomponents: ReadonlyMap<string, MappingNode>;
}

const NO_SUBCOMPONENTS: ReadonlyMap<string, MappingNode> = new Map();

/**
 * Report values whose type disagrees with the default at the same path.
 *
 * Keys missing from the defaults are left to the unknown-key pass, apart from the
 * schema type fallback. An explicit null in the user document is always accepted.
 */
export function detectTypeMismatches(
  user: TreeNode,
  defaults: TreeNode,
  context: TypeMismatchContext,
  pathPrefix = '',
): Finding[] {
  const findings: Finding[] = [];
  if (user.kind !== 'mapping' || defaults.kind !== 'mapping') {
    return findings;
  }

  for (const entry of user.entries) {
    const fullPath = joinPath(pathPrefix, entry.key);
    if (isIgnoredPath(fullPath, context.ignorePatterns)) {
      continue;
    }

    const value = entry.value;
    const subcomponent = pathPrefix === '' ? context.subcomponents.get(entry.key) : undefined;
    if (subcomponent !== undefined) {
      if (value.kind === 'mapping') {
        findings.push(...detectTypeMismatches(value, subcomponent, { ...context, subcomponents: NO_SUBCOMPONENTS }, fullPath));
      }
      continue;
    }

    const defaultValue = getMappingValue(defaults, entry.key);
    if (defaultValue === undefined || isNullNode(defaultValue)) {
      findings.push(...checkAgainstSchema(value, fullPath, context));
      continue;
    }

    if (isNullNode(value)) {
      continue;
    }

    if (defaultValue.kind === 'mapping' && value.kind === 'mapping') {
      if (defaultValue.entries.length === 0) {
        continue;
      }
      findings.push(...detectTypeMismatches(value, defaultValue, context, fullPath));
      continue;
    }

    if (defaultValue.kind === 'sequence' && value.kind === 'sequence') {
      findings.push(...checkSequence(value, defaultValue, fullPath, context));
      continue;
    }

    if (defaultValue.kind !== 'scalar' && value.kind !== 'scalar') {
      findings.push(
        createFinding(
          'VALUES_KIND_MISMATCH',
          'error',
          value.line,
          fullPath,
          `Kind mismatch at ${JSON.stringify(fullPath)}: expected ${friendlyTypeName(nodeType(defaultValue))}, got ${friendlyTypeName(nodeType(value))}`,
        ),
      );
      continue;
    }

    if (!compatibleWith(nodeType(value), nodeType(defaultValue), fullPath)) {
      findings.push(mismatchFinding(fullPath, value, friendlyTypeName(nodeType(defaultValue))));
    }
  }

  return findings;
}

function checkAgainstSchema(value: TreeNode, path: string, context: TypeMismatchContext): Finding[] {
  const schemaTypes = context.schemaTypes.get(path);
  if (schemaTypes !== undefined && !isNullNode(value)) {
    const check = compatibleWithSchemaTypes(nodeType(value), schemaTypes, path);
    if (!check.compatible) {
      return [mismatchFinding(path, value, describeTypes(check.allowed))];
    }
  }

  if (value.kind === 'mapping' && context.schemaTypes.size > 0) {
    return detectTypeMismatches(value, EMPTY_MAPPING, context, path);
  }
  return [];
}

/**
 * Check mapping elements of a user sequence against the first default element,
 * which acts as the template for every entry.
 */
function checkSequence(
  userSequence: SequenceNode,
  defaultSequence: SequenceNode,
  path: string,
  context: TypeMismatchContext,
): Finding[] {
  const template = defaultSequence.items[0];
  if (template === undefined || template.kind !== 'mapping' || template.entries.length === 0) {
    return [];
  }

  const elementContext: TypeMismatchContext = { ...context, subcomponents: NO_SUBCOMPONENTS };
  const findings: Finding[] = [];
  userSequence.items.forEach((item, index) => {
    if (item.kind !== 'mapping') {
      return;
    }
    const elementPath = indexPath(path, index);
    if (isIgnoredPath(elementPath, context.ignorePatterns)) {
      return;
    }
    findings.push(...detectUnknownKeys(item, template, templateContext(context.ignorePatterns), elementPath));
    findings.push(...detectTypeMismatches(item, template, elementContext, elementPath));
  });
  return findings;
}

function mismatchFinding(path: string, value: TreeNode, expected: string): Finding {
  const actual = friendlyTypeName(nodeType(value));
  const literal = value.kind === 'scalar' ? ` (${JSON.stringify(value.text)})` : '';
  return createFinding(
    'VALUES_TYPE_MISMATCH',
    'error',
    value.line,
    path,
    `Type mismatch at ${JSON.stringify(path)}: expected ${expected}, got ${actual}${literal}`,
  );
}
