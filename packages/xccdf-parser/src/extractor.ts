/**
 * STIG Rule Extractor
 *
 * Reads an XCCDF document from disk and returns its rule records.
 *
 * Never throws. Every failure becomes an ExtractionFailure:
 * - 'not-found': the path does not exist
 * - 'malformed': the document is not well-formed XML
 * - 'unexpected': anything else (unreadable file, fault during the walk)
 *
 * No records are returned on any failure path; the walk builds its
 * output in a local array that is only handed back on success.
 */

import { existsSync, readFileSync } from 'fs';
import type { Diagnostic, RuleRecord } from '@stig-extract/contracts';
import {
  computeHash,
  createLogger,
  DocumentNotFoundError,
  errorMessage,
  ExtractionFailedError,
  MalformedDocumentError,
} from '@stig-extract/shared';
import { parseXccdfRules } from './parse-xccdf.js';
import type { ExtractionFailure, ExtractionResult, ExtractOptions } from './types.js';
import { XCCDF_PARSER_SOURCE } from './types.js';

/**
 * Extract rule records from an XCCDF document, reporting why on failure.
 *
 * @example
 * ```typescript
 * const result = extractRules('./U_MS_Windows_11_STIG_V2R3_Manual-xccdf.xml');
 * if (result.ok) {
 *   console.log(`${result.records.length} rules`);
 * } else if (result.kind === 'malformed') {
 *   console.error(result.error.line, result.error.message);
 * }
 * ```
 */
export function extractRules(path: string, options: ExtractOptions = {}): ExtractionResult {
  const logger = (options.logger ?? createLogger({ prefix: XCCDF_PARSER_SOURCE })).child({ path });

  if (!existsSync(path)) {
    const error = new DocumentNotFoundError(path);
    logger.error(error.message);
    return failure(path, error);
  }

  try {
    const xml = readFileSync(path, 'utf-8');
    const output = parseXccdfRules(xml);

    for (const diagnostic of output.diagnostics) {
      logger.warn(diagnostic.message, { code: diagnostic.code });
    }
    logger.info(`Parsed ${output.records.length} STIG rules`, { namespace: output.namespace });

    return {
      ok: true,
      path,
      ...output,
      fingerprint: computeHash(output.records),
    };
  } catch (error) {
    if (error instanceof MalformedDocumentError) {
      logger.error(error.message, error.line !== undefined ? { line: error.line, column: error.column } : undefined);
      return failure(path, error);
    }

    const wrapped = new ExtractionFailedError(
      `An unexpected error occurred during parsing: ${errorMessage(error)}`,
      error,
      { path },
    );
    logger.error(wrapped.message);
    return failure(path, wrapped);
  }
}

/**
 * Extract rule records from an XCCDF document.
 *
 * Returns an empty array when the document is missing or cannot be
 * parsed; use `extractRules` to tell those cases from a document
 * without rules.
 */
export function extract(path: string, options: ExtractOptions = {}): RuleRecord[] {
  const result = extractRules(path, options);
  return result.ok ? result.records : [];
}

function failure(
  path: string,
  error: DocumentNotFoundError | MalformedDocumentError | ExtractionFailedError,
): ExtractionFailure {
  const diagnostic = (code: string): Diagnostic[] => [
    {
      code,
      message: error.message,
      severity: 'error',
      source: XCCDF_PARSER_SOURCE,
      location: path,
    },
  ];

  if (error instanceof DocumentNotFoundError) {
    return { ok: false, kind: 'not-found', path, error, diagnostics: diagnostic('XCCDF-NOT-FOUND') };
  }
  if (error instanceof MalformedDocumentError) {
    return { ok: false, kind: 'malformed', path, error, diagnostics: diagnostic('XCCDF-MALFORMED') };
  }
  return { ok: false, kind: 'unexpected', path, error, diagnostics: diagnostic('XCCDF-UNEXPECTED') };
}
