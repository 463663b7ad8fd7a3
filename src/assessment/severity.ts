/**
 * Finding severity with an explicit total order.
 *
 * All aggregation (worst finding, "any critical", penalty lookups) goes through
 * the rank table below instead of comparing raw strings.
 */

export const SEVERITY_LEVELS = ['info', 'low', 'medium', 'high', 'critical'] as const;

export type Severity = typeof SEVERITY_LEVELS[number];

const SEVERITY_RANK: Record<Severity, number> = {
  info: 0,
  low: 1,
  medium: 2,
  high: 3,
  critical: 4,
};

/**
 * Positive when `a` is more severe than `b`, negative when less, 0 when equal.
 */
export function compareSeverity(a: Severity, b: Severity): number {
  return SEVERITY_RANK[a] - SEVERITY_RANK[b];
}

export function isAtLeast(severity: Severity, threshold: Severity): boolean {
  return SEVERITY_RANK[severity] >= SEVERITY_RANK[threshold];
}

/**
 * Highest severity in the list, or null for an empty list.
 */
export function maxSeverity(severities: Iterable<Severity>): Severity | null {
  let worst: Severity | null = null;
  for (const severity of severities) {
    if (worst === null || compareSeverity(severity, worst) > 0) {
      worst = severity;
    }
  }
  return worst;
}

/** Upper-case label used in serialized decision output. */
export function formatSeverity(severity: Severity): Uppercase<Severity> {
  switch (severity) {
    case 'info':
      return 'INFO';
    case 'low':
      return 'LOW';
    case 'medium':
      return 'MEDIUM';
    case 'high':
      return 'HIGH';
    case 'critical':
      return 'CRITICAL';
  }
}
