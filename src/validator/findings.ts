export type FindingSeverity = 'error' | 'warning';

export type FindingCode =
  | 'VALUES_UNKNOWN_KEY'
  | 'VALUES_TYPE_MISMATCH'
  | 'VALUES_KIND_MISMATCH'
  | 'VALUES_SCHEMA_VIOLATION'
  | 'VALUES_DEPRECATED_KEY'
  | 'VALUES_SCHEMA_REF_BLOCKED';

/**
 * One reported issue in a values document.
 *
 * `line` is 1-based; 0 means no source location could be resolved for `path`
 * (a synthesized path, or a finding about the schema as a whole).
 */
export interface Finding {
  readonly code: FindingCode;
  readonly severity: FindingSeverity;
  readonly line: number;
  readonly path: string;
  readonly message: string;
  readonly suggestion?: string;
}

export function createFinding(
  code: FindingCode,
  severity: FindingSeverity,
  line: number,
  path: string,
  message: string,
  suggestion?: string,
): Finding {
  return Object.freeze({
    code,
    severity,
    line,
    path,
    message,
    ...(suggestion !== undefined ? { suggestion } : {}),
  });
}

export function formatFinding(finding: Finding): string {
  const base = `line ${finding.line}: ${finding.message}`;
  return finding.suggestion === undefined ? base : `${base} (did you mean ${JSON.stringify(finding.suggestion)}?)`;
}
