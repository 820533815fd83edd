import type { Finding } from './findings.js';

export interface ValidationResult {
  readonly sourceId: string;
  readonly chartName: string;
  readonly chartVersion: string;
  readonly findings: readonly Finding[];
}

export function errorFindings(result: ValidationResult): readonly Finding[] {
  return result.findings.filter((finding) => finding.severity === 'error');
}

export function warningFindings(result: ValidationResult): readonly Finding[] {
  return result.findings.filter((finding) => finding.severity === 'warning');
}

export function hasErrors(result: ValidationResult): boolean {
  return result.findings.some((finding) => finding.severity === 'error');
}

export function hasWarnings(result: ValidationResult): boolean {
  return result.findings.some((finding) => finding.severity === 'warning');
}

export function chartLabel(result: ValidationResult): string {
  return result.chartVersion === '' ? result.chartName : `${result.chartName}@${result.chartVersion}`;
}
