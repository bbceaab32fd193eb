/**
 * XCCDF to RuleRecord Parser
 *
 * Walks every Group of an XCCDF benchmark and turns each of its
 * immediate Rule children into a RuleRecord. Tolerant of missing
 * elements: a missing field yields its placeholder, never an error.
 */

import { NOT_AVAILABLE } from '@stig-extract/contracts';
import type { BenchmarkInfo, Diagnostic, RuleRecord } from '@stig-extract/contracts';
import { detectXccdfNamespace } from './detect-namespace.js';
import { IDENT_SYSTEMS, XCCDF_NAMESPACES, XCCDF_PARSER_SOURCE } from './types.js';
import type { XccdfParseOutput } from './types.js';
import {
  childElements,
  descendantElements,
  directText,
  firstChild,
  getAttribute,
  isElement,
  parseXmlTree,
  type XmlElement,
} from './xml-tree.js';

/**
 * Parse XCCDF content into rule records
 *
 * Output order is group order, then rule order within the group.
 * Groups are found anywhere below the root; rules only as immediate
 * children of a group.
 *
 * @param xml - Raw XML content
 * @returns Records, bound namespace, benchmark info and warnings
 * @throws MalformedDocumentError when the content is not well-formed XML
 */
export function parseXccdfRules(xml: string): XccdfParseOutput {
  const root = parseXmlTree(xml);
  const binding = detectXccdfNamespace(root);
  const ns = binding.uri;
  const diagnostics: Diagnostic[] = [...binding.warnings];

  if (root.localName !== 'Benchmark') {
    diagnostics.push({
      code: 'XCCDF-ROOT',
      message: `Root element is ${root.qualifiedName}, expected Benchmark`,
      severity: 'warning',
      source: XCCDF_PARSER_SOURCE,
    });
  }

  const records: RuleRecord[] = [];
  for (const group of descendantElements(root, ns, 'Group')) {
    const groupId = getAttribute(group, 'id');
    for (const rule of childElements(group, ns, 'Rule')) {
      records.push(parseRule(rule, ns, groupId));
    }
  }

  return {
    records,
    namespace: ns,
    benchmark: parseBenchmarkInfo(root, ns),
    diagnostics,
  };
}

/**
 * Build one record from a Rule element
 */
function parseRule(rule: XmlElement, ns: string | null, groupId: string | null): RuleRecord {
  const idents = childElements(rule, ns, 'ident');

  return {
    stigId: findIdent(idents, IDENT_SYSTEMS.LEGACY_FINDING_FORMAT) ?? NOT_AVAILABLE,
    ruleId: getAttribute(rule, 'id'),
    severity: getAttribute(rule, 'severity'),
    title: childText(rule, ns, 'title') ?? NOT_AVAILABLE,
    description: parseDescription(firstChild(rule, ns, 'description'), ns),
    checkContent: parseCheckContent(firstChild(rule, ns, 'check'), ns) ?? NOT_AVAILABLE,
    fixText: childText(rule, ns, 'fix') ?? NOT_AVAILABLE,
    groupId,
    version: childText(rule, ns, 'version'),
    cciRefs: idents
      .filter((ident) => getAttribute(ident, 'system') === IDENT_SYSTEMS.CCI)
      .map((ident) => directText(ident).trim())
      .filter((text) => text.length > 0),
  };
}

/**
 * Paragraphs joined by newlines; the container's own text when there are none.
 * Paragraphs may be in the XCCDF or the XHTML namespace.
 */
function parseDescription(description: XmlElement | null, ns: string | null): string {
  if (!description) {
    return '';
  }

  const paragraphs = childElementsAnyOf(description, [ns, XCCDF_NAMESPACES.XHTML], 'p')
    .map((p) => directText(p).trim())
    .filter((text) => text.length > 0);

  const joined = paragraphs.join('\n').trim();
  if (joined) {
    return joined;
  }

  return directText(description).trim();
}

/**
 * Text of check/check-content, one level down from the check element
 */
function parseCheckContent(check: XmlElement | null, ns: string | null): string | null {
  if (!check) {
    return null;
  }
  return childText(check, ns, 'check-content');
}

/**
 * Trimmed text of the first ident carrying the given system attribute,
 * empty when that ident has no text
 */
function findIdent(idents: XmlElement[], system: string): string | null {
  const match = idents.find((ident) => getAttribute(ident, 'system') === system);
  if (!match) {
    return null;
  }
  return directText(match).trim();
}

function parseBenchmarkInfo(root: XmlElement, ns: string | null): BenchmarkInfo {
  return {
    id: getAttribute(root, 'id'),
    title: childText(root, ns, 'title'),
    version: childText(root, ns, 'version'),
  };
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Trimmed direct text of the first matching child; null when the child
 * is missing or has no text
 */
function childText(element: XmlElement, ns: string | null, localName: string): string | null {
  const child = firstChild(element, ns, localName);
  if (!child) {
    return null;
  }
  return nonEmpty(directText(child).trim());
}

/**
 * Immediate children matching the local name in any of the namespaces, in document order
 */
function childElementsAnyOf(
  element: XmlElement,
  namespaces: (string | null)[],
  localName: string,
): XmlElement[] {
  return element.children.filter(
    (child): child is XmlElement =>
      isElement(child) && child.localName === localName && namespaces.includes(child.namespaceUri),
  );
}

function nonEmpty(value: string): string | null {
  return value.length > 0 ? value : null;
}
