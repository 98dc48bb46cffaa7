/**
 * Compatibility impact of one difference, ordered by increasing impact.
 *
 * - `ForwardsIncompatible`: code written against the new interfaces may not
 *   work against the old ones (something was added).
 * - `BackwardsIncompatible`: code written against the old interfaces may not
 *   work against the new ones.
 */
export const Severity = {
  Info: 0,
  ForwardsIncompatible: 1,
  BackwardsIncompatible: 2
} as const;

export type Severity = (typeof Severity)[keyof typeof Severity];

/** User-facing names for enabling or disabling each severity. */
export type WarningCategory = 'info' | 'forwards-compatibility' | 'backwards-compatibility';

export const WARNING_CATEGORIES: readonly WarningCategory[] = [
  'info',
  'backwards-compatibility',
  'forwards-compatibility'
];

const CATEGORY_BY_SEVERITY: Readonly<Record<Severity, WarningCategory>> = {
  [Severity.Info]: 'info',
  [Severity.ForwardsIncompatible]: 'forwards-compatibility',
  [Severity.BackwardsIncompatible]: 'backwards-compatibility'
};

export function categoryOf(severity: Severity): WarningCategory {
  return CATEGORY_BY_SEVERITY[severity];
}

export function isWarningCategory(value: string): value is WarningCategory {
  return value === 'info' || value === 'forwards-compatibility' || value === 'backwards-compatibility';
}

/** Fixed-width label used when printing a diff entry. */
export function formatSeverity(severity: Severity): string {
  switch (severity) {
    case Severity.Info:
      return ' INFO';
    case Severity.ForwardsIncompatible:
      return ' WARN';
    case Severity.BackwardsIncompatible:
      return 'ERROR';
  }
}
