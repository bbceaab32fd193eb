/**
 * XCCDF Namespace Detection
 *
 * Decides, once per document, which namespace URI the rule walk matches
 * element names against. Documents declare XCCDF either as the default
 * namespace or under a prefix (usually "xccdf"); both resolve to the
 * same binding here.
 */

import type { Diagnostic } from '@stig-extract/contracts';
import type { NamespaceBinding, XccdfVersion } from './types.js';
import { XCCDF_NAMESPACES, XCCDF_PARSER_SOURCE } from './types.js';
import type { XmlElement } from './xml-tree.js';

const KNOWN_XCCDF_URIS: ReadonlyMap<string, XccdfVersion> = new Map([
  [XCCDF_NAMESPACES.XCCDF_1_2, '1.2'],
  [XCCDF_NAMESPACES.XCCDF_1_1, '1.1'],
]);

/**
 * Detects the XCCDF namespace from the root element.
 *
 * Detection rules:
 * 1. The root element's own namespace, when it is a known XCCDF URI
 * 2. A known XCCDF URI declared on the root under any prefix (1.2 before 1.1)
 * 3. The root element's own namespace, when it looks like XCCDF but the
 *    version is unknown (warning)
 * 4. No namespace: un-namespaced names are matched (warning)
 *
 * @param root - Root element of the parsed document
 * @returns NamespaceBinding for the rule walk
 */
export function detectXccdfNamespace(root: XmlElement): NamespaceBinding {
  const warnings: Diagnostic[] = [];

  const rootUri = root.namespaceUri;
  if (rootUri !== null) {
    const version = KNOWN_XCCDF_URIS.get(rootUri);
    if (version) {
      return { uri: rootUri, version, prefix: root.prefix, warnings };
    }
  }

  for (const [uri, version] of KNOWN_XCCDF_URIS) {
    const prefix = findPrefix(root, uri);
    if (prefix !== null) {
      return { uri, version, prefix, warnings };
    }
  }

  if (rootUri !== null && /xccdf/i.test(rootUri)) {
    warnings.push({
      code: 'XCCDF-NS-UNKNOWN-VERSION',
      message: `Unrecognised XCCDF namespace version: ${rootUri}`,
      severity: 'warning',
      source: XCCDF_PARSER_SOURCE,
      context: { namespace: rootUri },
    });
    return { uri: rootUri, version: null, prefix: root.prefix, warnings };
  }

  warnings.push({
    code: 'XCCDF-NS-UNDECLARED',
    message: 'No XCCDF namespace declared on the root element - matching un-namespaced elements',
    severity: 'warning',
    source: XCCDF_PARSER_SOURCE,
    ...(rootUri !== null ? { context: { namespace: rootUri } } : {}),
  });
  return { uri: null, version: null, prefix: null, warnings };
}

/**
 * Prefix under which the root element declares a namespace URI
 */
function findPrefix(root: XmlElement, uri: string): string | null {
  for (const [prefix, declared] of root.namespaces) {
    if (declared === uri) {
      return prefix;
    }
  }
  return null;
}
