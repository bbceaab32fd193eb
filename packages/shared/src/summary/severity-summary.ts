/**
 * Severity Summary Builder
 *
 * Aggregates extracted rule records into counts per severity,
 * suitable for a one-line CLI report or a JSON export.
 */

import type { RuleRecord, RuleSeverity } from '@stig-extract/contracts';

/**
 * Options for building a severity summary
 */
export interface SeveritySummaryOptions {
  /**
   * Maximum number of rule ids listed per severity.
   * @default 10
   */
  maxRuleIdsPerSeverity?: number;
}

/**
 * Aggregated severity summary
 */
export interface SeveritySummary {
  /**
   * Counts for the three DISA severities
   */
  totalBySeverity: Record<RuleSeverity, number>;

  /**
   * Records whose severity is missing or outside the DISA set
   */
  unclassified: number;

  /**
   * Rule ids per severity, in document order, cut to the configured limit
   */
  ruleIdsBySeverity: Record<RuleSeverity, string[]>;

  /**
   * Whether any of the rule id lists was cut
   */
  truncated: boolean;

  /**
   * Total number of records processed
   */
  totalCount: number;
}

const DEFAULT_OPTIONS: Required<SeveritySummaryOptions> = {
  maxRuleIdsPerSeverity: 10,
};

/**
 * Build a severity summary from rule records.
 *
 * Severity matching is case-insensitive; anything else counts as
 * unclassified. Records without a rule id are counted but not listed.
 *
 * @example
 * const summary = buildSeveritySummary(result.records);
 * console.log(summary.totalBySeverity.high); // 3
 */
export function buildSeveritySummary(
  records: readonly RuleRecord[],
  options?: SeveritySummaryOptions,
): SeveritySummary {
  const opts = { ...DEFAULT_OPTIONS, ...options };

  const totalBySeverity: Record<RuleSeverity, number> = { high: 0, medium: 0, low: 0 };
  const ruleIdsBySeverity: Record<RuleSeverity, string[]> = { high: [], medium: [], low: [] };
  let unclassified = 0;
  let truncated = false;

  for (const record of records) {
    const severity = toRuleSeverity(record.severity);
    if (!severity) {
      unclassified++;
      continue;
    }

    totalBySeverity[severity]++;

    if (record.ruleId === null) {
      continue;
    }
    const ids = ruleIdsBySeverity[severity];
    if (ids.length < opts.maxRuleIdsPerSeverity) {
      ids.push(record.ruleId);
    } else {
      truncated = true;
    }
  }

  return {
    totalBySeverity,
    unclassified,
    ruleIdsBySeverity,
    truncated,
    totalCount: records.length,
  };
}

/**
 * Normalize a raw severity attribute to a DISA severity
 */
export function toRuleSeverity(value: string | null): RuleSeverity | null {
  switch (value?.trim().toLowerCase()) {
    case 'high':
      return 'high';
    case 'medium':
      return 'medium';
    case 'low':
      return 'low';
    default:
      return null;
  }
}
