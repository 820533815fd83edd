import { joinPath, type TreeNode } from '../tree/document-tree.js';

/** Every mapping key in a tree, by full dot-path, mapped to its bare key name. */
export type PathIndex = ReadonlyMap<string, string>;

export const EMPTY_PATH_INDEX: PathIndex = new Map<string, string>();

export function buildPathIndex(tree: TreeNode, prefix = ''): PathIndex {
  const index = new Map<string, string>();
  collectPaths(tree, prefix, index);
  return index;
}

function collectPaths(node: TreeNode, prefix: string, index: Map<string, string>): void {
  if (node.kind !== 'mapping') {
    return;
  }

  for (const entry of node.entries) {
    const fullPath = joinPath(prefix, entry.key);
    index.set(fullPath, entry.key);
    if (entry.value.kind === 'mapping') {
      collectPaths(entry.value, fullPath, index);
    }
  }
}
