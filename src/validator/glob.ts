/**
 * Dot-path glob matching for ignore patterns.
 *
 * `*` matches exactly one segment and `**` matches zero or more segments at any
 * position. Literal segments compare case-sensitively.
 */
export function matchesGlob(pattern: string, path: string): boolean {
  if (pattern === path) {
    return true;
  }
  return matchSegments(pattern.split('.'), 0, path.split('.'), 0);
}

export function isIgnoredPath(path: string, patterns: readonly string[]): boolean {
  return patterns.some((pattern) => matchesGlob(pattern, path));
}

function matchSegments(
  pattern: readonly string[],
  patternIndex: number,
  path: readonly string[],
  pathIndex: number,
): boolean {
  let pi = patternIndex;
  let pa = pathIndex;

  while (pi < pattern.length) {
    const segment = pattern[pi];
    if (segment === '**') {
      if (pi === pattern.length - 1) {
        return true;
      }
      for (let start = pa; start <= path.length; start += 1) {
        if (matchSegments(pattern, pi + 1, path, start)) {
          return true;
        }
      }
      return false;
    }

    if (pa >= path.length) {
      return false;
    }
    if (segment !== '*' && segment !== path[pa]) {
      return false;
    }
    pi += 1;
    pa += 1;
  }

  return pa === path.length;
}
