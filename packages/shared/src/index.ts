/**
 * @stig-extract/shared
 *
 * Shared utilities for STIG extraction.
 *
 * @packageDocumentation
 */

export { createLogger, isLogLevel, LOG_LEVELS, type Logger, type LogLevel, type LoggerOptions, type LogWriter } from './logging/logger.js';
export {
  StigExtractError,
  DocumentNotFoundError,
  MalformedDocumentError,
  ExtractionFailedError,
  ConfigurationError,
  errorMessage,
} from './errors/errors.js';
export { canonicalStringify, computeHash, parseHash, shortHash } from './crypto/canonical-hash.js';

// Severity summary
export {
  buildSeveritySummary,
  toRuleSeverity,
  type SeveritySummary,
  type SeveritySummaryOptions,
} from './summary/severity-summary.js';
