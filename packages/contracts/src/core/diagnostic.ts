/**
 * Severity levels for diagnostics
 */
export type DiagnosticSeverity = 'error' | 'warning' | 'info';

/**
 * A single diagnostic message produced while reading a document
 */
export interface Diagnostic {
  /**
   * Unique code for this diagnostic type
   * Examples: 'XCCDF-MALFORMED', 'XCCDF-NS-UNDECLARED'
   */
  code: string;

  /**
   * Human-readable message
   */
  message: string;

  /**
   * Severity level
   */
  severity: DiagnosticSeverity;

  /**
   * Component that generated this diagnostic
   */
  source: string;

  /**
   * Location in the source document (path, or "line:column")
   */
  location?: string;

  /**
   * Additional context (e.g., the namespace URI that was found)
   */
  context?: Record<string, unknown>;
}
