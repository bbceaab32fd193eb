/**
 * Types for the XCCDF parser
 */

import type { BenchmarkInfo, Diagnostic, RuleRecord } from '@stig-extract/contracts';
import type {
  DocumentNotFoundError,
  ExtractionFailedError,
  Logger,
  MalformedDocumentError,
} from '@stig-extract/shared';

/**
 * XCCDF schema versions recognised by namespace URI
 */
export type XccdfVersion = '1.1' | '1.2';

/**
 * Namespace the rule walk matches element names against
 */
export interface NamespaceBinding {
  /**
   * Bound namespace URI, or null when the document declares none
   */
  uri: string | null;

  /**
   * XCCDF version implied by the URI
   */
  version: XccdfVersion | null;

  /**
   * Prefix the root element uses for the bound namespace ('' for a default namespace)
   */
  prefix: string | null;

  /**
   * Any warnings during detection
   */
  warnings: Diagnostic[];
}

/**
 * Output of a single parse pass over XCCDF text
 */
export interface XccdfParseOutput {
  records: RuleRecord[];
  namespace: string | null;
  benchmark: BenchmarkInfo;
  diagnostics: Diagnostic[];
}

/**
 * Why a document could not be read
 */
export type ExtractionFailureKind = 'not-found' | 'malformed' | 'unexpected';

/**
 * Successful extraction. `records` may be empty for a valid document without rules.
 */
export interface ExtractionSuccess extends XccdfParseOutput {
  ok: true;
  path: string;

  /**
   * Canonical hash of `records` ("sha256:<hex>")
   */
  fingerprint: string;
}

/**
 * Failed extraction. No records are returned on any failure path.
 */
export type ExtractionFailure =
  | { ok: false; kind: 'not-found'; path: string; error: DocumentNotFoundError; diagnostics: Diagnostic[] }
  | { ok: false; kind: 'malformed'; path: string; error: MalformedDocumentError; diagnostics: Diagnostic[] }
  | { ok: false; kind: 'unexpected'; path: string; error: ExtractionFailedError; diagnostics: Diagnostic[] };

export type ExtractionResult = ExtractionSuccess | ExtractionFailure;

/**
 * Options for the extractor
 */
export interface ExtractOptions {
  /**
   * Logger for failures and progress (default: console logger prefixed "xccdf-parser")
   */
  logger?: Logger;
}

/**
 * XML namespace constants for XCCDF documents
 */
export const XCCDF_NAMESPACES = {
  XCCDF_1_1: 'http://checklists.nist.gov/xccdf/1.1',
  XCCDF_1_2: 'http://checklists.nist.gov/xccdf/1.2',
  XSI: 'http://www.w3.org/2001/XMLSchema-instance',
  DC: 'http://purl.org/dc/elements/1.1/',
  CPE: 'http://cpe.mitre.org/language/2.0',
  XHTML: 'http://www.w3.org/1999/xhtml',
} as const;

/**
 * `system` attribute values of ident elements
 */
export const IDENT_SYSTEMS = {
  LEGACY_FINDING_FORMAT: 'http://cyber.mil/legacy/findingformat/',
  CCI: 'http://cyber.mil/cci',
} as const;

/**
 * Source name used on diagnostics and log lines
 */
export const XCCDF_PARSER_SOURCE = 'xccdf-parser';
