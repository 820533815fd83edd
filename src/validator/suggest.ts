import { joinPath } from '../tree/document-tree.js';
import type { PathIndex } from './path-index.js';

/** Suggestions are only offered below this edit distance. */
const MAX_SUGGESTION_DISTANCE = 4;

/** Edit distance between two key names, ignoring case. */
export function levenshteinDistance(left: string, right: string): number {
  const source = left.toLowerCase();
  const target = right.toLowerCase();
  const row = Array.from({ length: target.length + 1 }, (_unused, index) => index);

  for (let i = 1; i <= source.length; i += 1) {
    let diagonal = row[0] ?? 0;
    row[0] = i;
    for (let j = 1; j <= target.length; j += 1) {
      const above = row[j] ?? 0;
      const before = row[j - 1] ?? 0;
      const cost = source[i - 1] === target[j - 1] ? 0 : 1;
      row[j] = Math.min(above + 1, before + 1, diagonal + cost);
      diagonal = above;
    }
  }

  return row[target.length] ?? 0;
}

/**
 * Closest sibling key by case-insensitive edit distance. Candidates are visited in
 * lexicographic order and the first strict minimum wins.
 */
export function suggestSibling(key: string, siblings: readonly string[]): string | undefined {
  let best: string | undefined;
  let bestDistance = MAX_SUGGESTION_DISTANCE;

  for (const candidate of [...siblings].sort((left, right) => left.localeCompare(right))) {
    const distance = levenshteinDistance(key, candidate);
    if (distance < bestDistance) {
      bestDistance = distance;
      best = candidate;
    }
  }

  return best;
}

/**
 * Search the whole defaults tree for the key an unknown path most likely meant.
 *
 * Strategies, highest priority first:
 *  1. the same leaf name at another path (a relocated key), shortest path wins;
 *  2. a close edit-distance match on the leaf name;
 *  3. substring containment where the added or removed part is at most half the
 *     shorter name (e.g. `orgCreationDisabled` vs `userOrgCreationDisabled`).
 */
export function suggestDeep(
  unknownPath: string,
  index: PathIndex,
  leafName: string = lastSegment(unknownPath),
): string | undefined {
  const leaf = leafName.toLowerCase();

  let exactMatch: string | undefined;
  let nearMatch: string | undefined;
  let nearDistance = MAX_SUGGESTION_DISTANCE;
  let containMatch: string | undefined;
  let containDiff = Number.POSITIVE_INFINITY;

  for (const [path, pathLeaf] of index) {
    if (path === unknownPath) {
      continue;
    }
    const candidate = pathLeaf.toLowerCase();

    if (candidate === leaf) {
      if (exactMatch === undefined || path.length < exactMatch.length) {
        exactMatch = path;
      }
      continue;
    }

    const distance = levenshteinDistance(leaf, candidate);
    if (distance < nearDistance) {
      nearDistance = distance;
      nearMatch = path;
    }

    if (candidate.includes(leaf) || leaf.includes(candidate)) {
      const shorter = Math.min(leaf.length, candidate.length);
      const diff = Math.abs(candidate.length - leaf.length);
      if (diff <= Math.floor(shorter / 2) && diff < containDiff) {
        containDiff = diff;
        containMatch = path;
      }
    }
  }

  return exactMatch ?? nearMatch ?? containMatch;
}

/**
 * Sibling suggestions always take precedence over the deep search, even when a
 * deep candidate is a closer match.
 */
export function suggestKey(
  key: string,
  parentPath: string,
  siblings: readonly string[],
  index: PathIndex,
): string | undefined {
  const sibling = suggestSibling(key, siblings);
  if (sibling !== undefined) {
    return joinPath(parentPath, sibling);
  }
  return suggestDeep(joinPath(parentPath, key), index, key);
}

function lastSegment(path: string): string {
  const segments = path.split('.');
  return segments[segments.length - 1] ?? '';
}
