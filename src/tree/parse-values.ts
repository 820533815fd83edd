import { isAlias, isMap, isScalar, isSeq, LineCounter, parseDocument, type Document, type Scalar } from 'yaml';
import { aliasCycleError, valuesParseError } from '../validator/errors.js';
import type { MappingEntry, MappingNode, ScalarNode, ScalarTag, TreeNode } from './document-tree.js';

const INTEGER_SOURCE_PATTERN = /^(?:[-+]?[0-9]+|0o[0-7]+|0x[0-9a-fA-F]+)$/;
const INTEGER_TAG = 'tag:yaml.org,2002:int';
const FLOAT_TAG = 'tag:yaml.org,2002:float';

interface BuildContext {
  readonly document: Document;
  readonly lineCounter: LineCounter;
  readonly sourceId: string;
  readonly converted: Map<unknown, TreeNode>;
  readonly inProgress: Set<unknown>;
}

/**
 * Parse YAML text into an alias-free document tree.
 *
 * Uses the YAML 1.2 core schema with unique keys. An empty document yields an
 * empty mapping. Throws `VALUES_PARSE_FAILED` on syntax errors and
 * `VALUES_ALIAS_CYCLE` on self-referential aliases.
 */
export function parseValuesDocument(text: string, sourceId = '<input>'): TreeNode {
  const lineCounter = new LineCounter();
  const document = parseDocument(text, {
    schema: 'core',
    strict: true,
    uniqueKeys: true,
    lineCounter,
  });

  const firstError = document.errors[0];
  if (firstError !== undefined) {
    const line = firstError.linePos?.[0]?.line;
    throw valuesParseError(
      line !== undefined
        ? `YAML parse error in ${sourceId} at line ${line}: ${firstError.message}`
        : `YAML parse error in ${sourceId}: ${firstError.message}`,
      { sourceId, yamlCode: firstError.code },
    );
  }

  if (document.contents === null) {
    return { kind: 'mapping', entries: [], line: 1 };
  }

  return buildNode(document.contents, {
    document,
    lineCounter,
    sourceId,
    converted: new Map(),
    inProgress: new Set(),
  }, 1);
}

function buildNode(node: unknown, context: BuildContext, fallbackLine: number): TreeNode {
  if (isAlias(node)) {
    const target = node.resolve(context.document);
    if (target === undefined) {
      throw valuesParseError(`Unresolved alias "*${node.source}" in ${context.sourceId}.`, {
        sourceId: context.sourceId,
      });
    }
    return buildNode(target, context, fallbackLine);
  }

  if (node === null || node === undefined) {
    return { kind: 'scalar', tag: 'null', value: null, text: '', line: fallbackLine };
  }

  const cached = context.converted.get(node);
  if (cached !== undefined) {
    return cached;
  }

  if (isScalar(node)) {
    const built = buildScalar(node, context, fallbackLine);
    context.converted.set(node, built);
    return built;
  }

  if (!isMap(node) && !isSeq(node)) {
    throw valuesParseError(`Unsupported YAML node in ${context.sourceId}.`, { sourceId: context.sourceId });
  }

  if (context.inProgress.has(node)) {
    throw aliasCycleError(`Alias refers to one of its own ancestors in ${context.sourceId}.`, {
      sourceId: context.sourceId,
      line: lineOf(node.range, context, fallbackLine),
    });
  }

  context.inProgress.add(node);
  const line = lineOf(node.range, context, fallbackLine);
  let built: TreeNode;
  if (isSeq(node)) {
    built = {
      kind: 'sequence',
      items: node.items.map((item) => buildNode(item, context, line)),
      line,
    };
  } else {
    const entries: MappingEntry[] = [];
    const seen = new Set<string>();
    for (const pair of node.items) {
      const keyNode = buildNode(pair.key, context, line);
      if (keyNode.kind !== 'scalar') {
        throw valuesParseError(`Complex mapping keys are not supported in ${context.sourceId} (line ${keyNode.line}).`, {
          sourceId: context.sourceId,
        });
      }
      if (seen.has(keyNode.text)) {
        throw valuesParseError(`Duplicate key "${keyNode.text}" in ${context.sourceId} (line ${keyNode.line}).`, {
          sourceId: context.sourceId,
        });
      }
      seen.add(keyNode.text);
      entries.push({
        key: keyNode.text,
        keyLine: keyNode.line,
        value: buildNode(pair.value, context, keyNode.line),
      });
    }
    built = { kind: 'mapping', entries, line } satisfies MappingNode;
  }
  context.inProgress.delete(node);
  context.converted.set(node, built);
  return built;
}

function buildScalar(node: Scalar, context: BuildContext, fallbackLine: number): ScalarNode {
  const line = lineOf(node.range, context, fallbackLine);
  const raw = node.value;
  const text = node.source ?? (raw === null || raw === undefined ? '' : String(raw));

  if (raw === null || raw === undefined) {
    return { kind: 'scalar', tag: 'null', value: null, text, line };
  }
  if (typeof raw === 'boolean') {
    return { kind: 'scalar', tag: 'boolean', value: raw, text, line };
  }
  if (typeof raw === 'number' || typeof raw === 'bigint') {
    return { kind: 'scalar', tag: numericTag(node, text), value: Number(raw), text, line };
  }
  if (typeof raw === 'string') {
    return { kind: 'scalar', tag: 'string', value: raw, text, line };
  }
  return { kind: 'scalar', tag: 'string', value: text, text, line };
}

function numericTag(node: Scalar, text: string): ScalarTag {
  if (node.tag === INTEGER_TAG) {
    return 'integer';
  }
  if (node.tag === FLOAT_TAG) {
    return 'float';
  }
  return INTEGER_SOURCE_PATTERN.test(text.trim()) ? 'integer' : 'float';
}

function lineOf(
  range: readonly [number, number, number] | null | undefined,
  context: BuildContext,
  fallbackLine: number,
): number {
  if (range === null || range === undefined) {
    return fallbackLine;
  }
  return context.lineCounter.linePos(range[0]).line;
}
