/**
 * Order-preserving XML tree
 *
 * Wraps fast-xml-parser's `preserveOrder` output in a small typed element
 * model. Each element carries its namespace URI, resolved from the
 * `xmlns` declarations in scope where it appears, so callers match on
 * (namespace, local name) and never on the prefix a document happens to use.
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { MalformedDocumentError, errorMessage } from '@stig-extract/shared';

export interface XmlText {
  kind: 'text';
  text: string;
}

export interface XmlElement {
  kind: 'element';
  /** Name as written, e.g. "xccdf:Rule" */
  qualifiedName: string;
  /** Prefix as written ('' when unprefixed) */
  prefix: string;
  localName: string;
  /** Resolved namespace URI, or null when the element is in no namespace */
  namespaceUri: string | null;
  /** Attributes by name as written, xmlns declarations included */
  attributes: Record<string, string>;
  /** Namespace declarations in scope for this element, by prefix ('' = default) */
  namespaces: ReadonlyMap<string, string>;
  children: XmlNode[];
}

export type XmlNode = XmlElement | XmlText;

const ATTRIBUTE_PREFIX = '@_';
const ATTRIBUTES_KEY = ':@';
const TEXT_KEY = '#text';
const CDATA_KEY = '#cdata';

const PREDEFINED_ENTITIES: Readonly<Record<string, string>> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
};

const REFERENCE_PATTERN = /&(#x[0-9a-fA-F]+|#[0-9]+|[A-Za-z][\w.-]*);/g;

/**
 * Parse XML text into an element tree.
 *
 * @throws MalformedDocumentError when the text is not well-formed
 */
export function parseXmlTree(xml: string): XmlElement {
  const content = xml.startsWith('\uFEFF') ? xml.slice(1) : xml;

  const verdict = XMLValidator.validate(content);
  if (verdict !== true) {
    throw new MalformedDocumentError(
      `Error parsing XML file: ${verdict.err.msg} (line ${verdict.err.line}, column ${verdict.err.col})`,
      { line: verdict.err.line, column: verdict.err.col },
      { code: verdict.err.code },
    );
  }

  const parser = new XMLParser({
    preserveOrder: true,
    ignoreAttributes: false,
    attributeNamePrefix: ATTRIBUTE_PREFIX,
    removeNSPrefix: false, // Namespaces are resolved below
    parseTagValue: false,
    parseAttributeValue: false,
    trimValues: false,
    ignoreDeclaration: true,
    ignorePiTags: true,
    // References are decoded in a single pass below; CDATA stays raw
    processEntities: false,
    cdataPropName: CDATA_KEY,
  });

  let parsed: unknown;
  try {
    parsed = parser.parse(content);
  } catch (error) {
    throw new MalformedDocumentError(
      `Error parsing XML file: ${errorMessage(error)}`,
    );
  }

  const roots = toNodes(parsed, new Map()).filter(isElement);
  const root = roots[0];
  if (!root) {
    throw new MalformedDocumentError('Error parsing XML file: no root element found');
  }
  return root;
}

/**
 * Convert a preserveOrder node list, resolving namespaces against the parent scope
 */
function toNodes(value: unknown, scope: ReadonlyMap<string, string>): XmlNode[] {
  if (!Array.isArray(value)) {
    return [];
  }

  const nodes: XmlNode[] = [];
  for (const entry of value) {
    if (!isRecord(entry)) {
      continue;
    }

    const name = Object.keys(entry).find((key) => key !== ATTRIBUTES_KEY);
    if (name === undefined) {
      continue;
    }

    if (name === TEXT_KEY) {
      const text = scalarText(entry[TEXT_KEY]);
      if (text !== null) {
        nodes.push({ kind: 'text', text: decodeReferences(text) });
      }
      continue;
    }

    if (name === CDATA_KEY) {
      nodes.push({ kind: 'text', text: cdataText(entry[CDATA_KEY]) });
      continue;
    }

    nodes.push(toElement(name, entry[name], entry[ATTRIBUTES_KEY], scope));
  }
  return nodes;
}

function toElement(
  qualifiedName: string,
  childValue: unknown,
  rawAttributes: unknown,
  parentScope: ReadonlyMap<string, string>,
): XmlElement {
  const attributes: Record<string, string> = {};
  if (isRecord(rawAttributes)) {
    for (const [key, attrValue] of Object.entries(rawAttributes)) {
      if (!key.startsWith(ATTRIBUTE_PREFIX)) {
        continue;
      }
      attributes[key.slice(ATTRIBUTE_PREFIX.length)] = decodeReferences(String(attrValue));
    }
  }

  const namespaces = declareNamespaces(parentScope, attributes);
  const { prefix, localName } = splitQualifiedName(qualifiedName);

  return {
    kind: 'element',
    qualifiedName,
    prefix,
    localName,
    namespaceUri: namespaces.get(prefix) ?? null,
    attributes,
    namespaces,
    children: toNodes(childValue, namespaces),
  };
}

/**
 * Extend the inherited scope with this element's xmlns declarations.
 * `xmlns=""` removes the default namespace.
 */
function declareNamespaces(
  parentScope: ReadonlyMap<string, string>,
  attributes: Record<string, string>,
): ReadonlyMap<string, string> {
  let scope: Map<string, string> | null = null;

  for (const [name, uri] of Object.entries(attributes)) {
    let prefix: string;
    if (name === 'xmlns') {
      prefix = '';
    } else if (name.startsWith('xmlns:')) {
      prefix = name.slice('xmlns:'.length);
    } else {
      continue;
    }

    scope ??= new Map(parentScope);
    if (uri === '') {
      scope.delete(prefix);
    } else {
      scope.set(prefix, uri);
    }
  }

  return scope ?? parentScope;
}

/**
 * Replace character references and the predefined entities with the
 * characters they stand for. Unknown entities and out-of-range code
 * points are left as written.
 */
export function decodeReferences(text: string): string {
  if (!text.includes('&')) {
    return text;
  }
  return text.replace(REFERENCE_PATTERN, (reference: string, body: string) => {
    if (body.startsWith('#')) {
      const codePoint = body.startsWith('#x') ? Number.parseInt(body.slice(2), 16) : Number.parseInt(body.slice(1), 10);
      return codePoint <= 0x10ffff ? String.fromCodePoint(codePoint) : reference;
    }
    return PREDEFINED_ENTITIES[body] ?? reference;
  });
}

function scalarText(value: unknown): string | null {
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return null;
}

/**
 * Raw content of a CDATA section (`{ '#cdata': [{ '#text': ... }] }`)
 */
function cdataText(value: unknown): string {
  if (!Array.isArray(value)) {
    return '';
  }
  let text = '';
  for (const part of value) {
    if (isRecord(part)) {
      text += scalarText(part[TEXT_KEY]) ?? '';
    }
  }
  return text;
}

export function splitQualifiedName(name: string): { prefix: string; localName: string } {
  const colon = name.indexOf(':');
  if (colon === -1) {
    return { prefix: '', localName: name };
  }
  return { prefix: name.slice(0, colon), localName: name.slice(colon + 1) };
}

// ============================================================================
// Navigation helpers
// ============================================================================

export function isElement(node: XmlNode): node is XmlElement {
  return node.kind === 'element';
}

/**
 * Test whether an element has the given local name in the given namespace
 * (null = no namespace)
 */
export function isNamed(element: XmlElement, namespaceUri: string | null, localName: string): boolean {
  return element.localName === localName && element.namespaceUri === namespaceUri;
}

/**
 * Immediate element children with the given name, in document order
 */
export function childElements(element: XmlElement, namespaceUri: string | null, localName: string): XmlElement[] {
  return element.children.filter(
    (child): child is XmlElement => isElement(child) && isNamed(child, namespaceUri, localName),
  );
}

/**
 * First immediate element child with the given name
 */
export function firstChild(element: XmlElement, namespaceUri: string | null, localName: string): XmlElement | null {
  for (const child of element.children) {
    if (isElement(child) && isNamed(child, namespaceUri, localName)) {
      return child;
    }
  }
  return null;
}

/**
 * Every descendant element with the given name, in document order.
 * The element itself is not included.
 */
export function descendantElements(
  element: XmlElement,
  namespaceUri: string | null,
  localName: string,
): XmlElement[] {
  const found: XmlElement[] = [];
  const stack: XmlElement[] = element.children.filter(isElement).reverse();

  while (stack.length > 0) {
    const current = stack.pop();
    if (current === undefined) {
      break;
    }
    if (isNamed(current, namespaceUri, localName)) {
      found.push(current);
    }
    const children = current.children.filter(isElement);
    for (let i = children.length - 1; i >= 0; i--) {
      const child = children[i];
      if (child !== undefined) {
        stack.push(child);
      }
    }
  }

  return found;
}

/**
 * Text that precedes the element's first child element, untrimmed
 */
export function directText(element: XmlElement): string {
  let text = '';
  for (const child of element.children) {
    if (isElement(child)) {
      break;
    }
    text += child.text;
  }
  return text;
}

export function getAttribute(element: XmlElement, name: string): string | null {
  return Object.prototype.hasOwnProperty.call(element.attributes, name) ? (element.attributes[name] ?? null) : null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
