export type ScalarTag = 'string' | 'integer' | 'float' | 'boolean' | 'null';

export type ScalarValue = string | number | boolean | null;

export interface ScalarNode {
  readonly kind: 'scalar';
  readonly tag: ScalarTag;
  readonly value: ScalarValue;
  /** Literal text as written, after unquoting. */
  readonly text: string;
  readonly line: number;
}

export interface MappingEntry {
  readonly key: string;
  readonly keyLine: number;
  readonly value: TreeNode;
}

export interface MappingNode {
  readonly kind: 'mapping';
  readonly entries: readonly MappingEntry[];
  readonly line: number;
}

export interface SequenceNode {
  readonly kind: 'sequence';
  readonly items: readonly TreeNode[];
  readonly line: number;
}

/** Alias-free document tree; aliases are resolved when the tree is built. */
export type TreeNode = ScalarNode | MappingNode | SequenceNode;

export type NodeType = ScalarTag | 'mapping' | 'sequence';

export const EMPTY_MAPPING: MappingNode = { kind: 'mapping', entries: [], line: 0 };

export function nodeType(node: TreeNode): NodeType {
  switch (node.kind) {
    case 'scalar':
      return node.tag;
    case 'mapping':
      return 'mapping';
    case 'sequence':
      return 'sequence';
  }
}

export function isMappingNode(node: TreeNode | undefined): node is MappingNode {
  return node?.kind === 'mapping';
}

export function isNullNode(node: TreeNode): boolean {
  return node.kind === 'scalar' && node.tag === 'null';
}

export function findEntry(mapping: MappingNode, key: string): MappingEntry | undefined {
  return mapping.entries.find((entry) => entry.key === key);
}

export function getMappingValue(node: TreeNode, key: string): TreeNode | undefined {
  return node.kind === 'mapping' ? findEntry(node, key)?.value : undefined;
}

export function mappingKeys(node: TreeNode): readonly string[] {
  return node.kind === 'mapping' ? node.entries.map((entry) => entry.key) : [];
}

export function joinPath(parent: string, child: string): string {
  return parent === '' ? child : `${parent}.${child}`;
}

export function indexPath(parent: string, index: number): string {
  return `${parent}[${index}]`;
}

type PathStep = { readonly key: string } | { readonly index: number };

const SEGMENT_PATTERN = /^([^[]*)((?:\[\d+\])*)$/;

function parsePath(path: string): readonly PathStep[] {
  const steps: PathStep[] = [];
  for (const segment of path.split('.')) {
    const match = SEGMENT_PATTERN.exec(segment);
    if (match === null) {
      steps.push({ key: segment });
      continue;
    }

    const key = match[1] ?? '';
    const indices = match[2] ?? '';
    if (key !== '' || indices === '') {
      steps.push({ key });
    }
    for (const indexMatch of indices.matchAll(/\[(\d+)\]/g)) {
      steps.push({ index: Number(indexMatch[1]) });
    }
  }
  return steps;
}

/**
 * Resolve the source line of a dot-path (with `[i]` sequence suffixes) in a tree.
 * Mapping keys resolve to the key's line. Returns 0 when the path is absent.
 */
export function findLineForPath(root: TreeNode, path: string): number {
  if (path === '') {
    return root.line;
  }

  let current: TreeNode = root;
  let line = 0;
  for (const step of parsePath(path)) {
    if ('key' in step) {
      if (current.kind !== 'mapping') {
        return 0;
      }
      const entry = findEntry(current, step.key);
      if (entry === undefined) {
        return 0;
      }
      current = entry.value;
      line = entry.keyLine;
      continue;
    }

    if (current.kind !== 'sequence') {
      return 0;
    }
    const item = current.items[step.index];
    if (item === undefined) {
      return 0;
    }
    current = item;
    line = item.line;
  }

  return line;
}

export type PlainValue = ScalarValue | readonly PlainValue[] | { readonly [key: string]: PlainValue };

/** Convert a tree into plain JSON-compatible data. */
export function toPlainValue(node: TreeNode): PlainValue {
  switch (node.kind) {
    case 'scalar':
      return node.value;
    case 'sequence':
      return node.items.map((item) => toPlainValue(item));
    case 'mapping': {
      const out: Record<string, PlainValue> = {};
      for (const entry of node.entries) {
        // Keeps keys such as "__proto__" as own data properties.
        Object.defineProperty(out, entry.key, {
          value: toPlainValue(entry.value),
          enumerable: true,
          writable: true,
          configurable: true,
        });
      }
      return out;
    }
  }
}
