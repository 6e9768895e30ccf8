/**
 * Shared shapes for the findings each analyzer produces.
 */

export const FindingSeverity = {
  CRITICAL: 'critical',
  ERROR: 'error',
  WARNING: 'warning',
  INFO: 'info',
} as const;

export type FindingSeverity = (typeof FindingSeverity)[keyof typeof FindingSeverity];

export const FindingCategory = {
  STRUCTURE: 'structure',
  HEADING: 'heading',
  READING_ORDER: 'reading-order',
  TABLE: 'table',
} as const;

export type FindingCategory = (typeof FindingCategory)[keyof typeof FindingCategory];

/** Extra details attached to a finding. Values are preformatted strings. */
export type FindingContext = Record<string, string>;

export interface SeverityCounts {
  critical: number;
  error: number;
  warning: number;
  info: number;
  total: number;
}

export const isBlockingSeverity = (severity: FindingSeverity): boolean =>
  severity === FindingSeverity.CRITICAL || severity === FindingSeverity.ERROR;

export function countBySeverity(findings: readonly { severity: FindingSeverity }[]): SeverityCounts {
  const counts: SeverityCounts = { critical: 0, error: 0, warning: 0, info: 0, total: findings.length };
  for (const finding of findings) {
    counts[finding.severity]++;
  }
  return counts;
}

/**
 * Deterministic id source. Each analyzer run creates its own sequence so
 * identical input always yields identical ids.
 */
export function createIdSequence(prefix: string): () => string {
  let counter = 0;
  return () => `${prefix}-${++counter}`;
}

export const formatFixed = (value: number, digits = 2): string => value.toFixed(digits);

export const formatPercent = (ratio: number): string => `${(ratio * 100).toFixed(1)}%`;
