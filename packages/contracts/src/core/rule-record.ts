/**
 * Severity values DISA assigns to STIG rules.
 *
 * The `severity` field of a record is not checked against this set;
 * it is the attribute value as written in the document.
 */
export type RuleSeverity = 'high' | 'medium' | 'low';

/**
 * Placeholder for text fields whose element is missing from the rule.
 */
export const NOT_AVAILABLE = 'N/A';

/**
 * One STIG rule as read from an XCCDF document.
 */
export interface RuleRecord {
  /**
   * Legacy finding-format identifier (e.g. "V-220719"), or `NOT_AVAILABLE`
   */
  stigId: string;

  /**
   * `id` attribute of the Rule element (e.g. "SV-220719r569187_rule").
   * Not checked for uniqueness.
   */
  ruleId: string | null;

  /**
   * `severity` attribute of the Rule element, verbatim
   */
  severity: string | null;

  /**
   * Rule title, or `NOT_AVAILABLE`
   */
  title: string;

  /**
   * Paragraphs of the description joined by newlines, the description's
   * own text when it has no paragraphs, or an empty string
   */
  description: string;

  /**
   * Manual check procedure, or `NOT_AVAILABLE`
   */
  checkContent: string;

  /**
   * Remediation text, or `NOT_AVAILABLE`
   */
  fixText: string;

  /**
   * `id` attribute of the enclosing Group (the V-number in DISA documents)
   */
  groupId: string | null;

  /**
   * STIG rule version (e.g. "WN11-00-000005")
   */
  version: string | null;

  /**
   * CCI references attached to the rule, in document order
   */
  cciRefs: string[];
}

/**
 * Identification of the benchmark a set of rules was read from.
 */
export interface BenchmarkInfo {
  id: string | null;
  title: string | null;
  version: string | null;
}
