/**
 * @stig-extract/xccdf-parser
 *
 * DISA STIG rule extraction from XCCDF documents.
 *
 * This package provides:
 * - XCCDF namespace detection (1.1 / 1.2, default or prefixed)
 * - XCCDF parsing to RuleRecord
 * - File-level extraction with typed failure results
 *
 * @packageDocumentation
 */

// Extraction (main entry points)
export { extract, extractRules } from './extractor.js';

// Parsing function (for in-memory content)
export { parseXccdfRules } from './parse-xccdf.js';

// Detection function (for direct use)
export { detectXccdfNamespace } from './detect-namespace.js';
export { parseXmlTree, type XmlElement, type XmlNode, type XmlText } from './xml-tree.js';

// Types
export type {
  XccdfVersion,
  NamespaceBinding,
  XccdfParseOutput,
  ExtractionFailureKind,
  ExtractionSuccess,
  ExtractionFailure,
  ExtractionResult,
  ExtractOptions,
} from './types.js';

// Constants (for testing and extension)
export { XCCDF_NAMESPACES, IDENT_SYSTEMS, XCCDF_PARSER_SOURCE } from './types.js';
