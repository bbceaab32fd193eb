/**
 * Tests for XCCDF namespace detection
 */

import { describe, it, expect } from 'vitest';
import { detectXccdfNamespace } from './detect-namespace.js';
import { XCCDF_NAMESPACES } from './types.js';
import { parseXmlTree } from './xml-tree.js';

describe('detectXccdfNamespace', () => {
  describe('known XCCDF namespaces', () => {
    it('should bind XCCDF 1.1 declared as the default namespace', () => {
      const root = parseXmlTree(`<Benchmark xmlns="${XCCDF_NAMESPACES.XCCDF_1_1}"/>`);
      const binding = detectXccdfNamespace(root);

      expect(binding.uri).toBe(XCCDF_NAMESPACES.XCCDF_1_1);
      expect(binding.version).toBe('1.1');
      expect(binding.prefix).toBe('');
      expect(binding.warnings).toHaveLength(0);
    });

    it('should bind XCCDF 1.2 declared under a prefix', () => {
      const root = parseXmlTree(`<xccdf:Benchmark xmlns:xccdf="${XCCDF_NAMESPACES.XCCDF_1_2}"/>`);
      const binding = detectXccdfNamespace(root);

      expect(binding.uri).toBe(XCCDF_NAMESPACES.XCCDF_1_2);
      expect(binding.version).toBe('1.2');
      expect(binding.prefix).toBe('xccdf');
    });

    it('should prefer the root element namespace over other declarations', () => {
      const root = parseXmlTree(
        `<Benchmark xmlns="${XCCDF_NAMESPACES.XCCDF_1_1}" xmlns:x12="${XCCDF_NAMESPACES.XCCDF_1_2}"/>`,
      );

      expect(detectXccdfNamespace(root).uri).toBe(XCCDF_NAMESPACES.XCCDF_1_1);
    });

    it('should find an XCCDF declaration when the root is in another namespace', () => {
      const root = parseXmlTree(
        `<ds:collection xmlns:ds="urn:test:datastream" xmlns:x="${XCCDF_NAMESPACES.XCCDF_1_2}"/>`,
      );
      const binding = detectXccdfNamespace(root);

      expect(binding.uri).toBe(XCCDF_NAMESPACES.XCCDF_1_2);
      expect(binding.prefix).toBe('x');
    });
  });

  describe('fallbacks', () => {
    it('should bind an unknown XCCDF version with a warning', () => {
      const uri = 'http://checklists.nist.gov/xccdf/2.0';
      const root = parseXmlTree(`<Benchmark xmlns="${uri}"/>`);
      const binding = detectXccdfNamespace(root);

      expect(binding.uri).toBe(uri);
      expect(binding.version).toBeNull();
      expect(binding.warnings.map((w) => w.code)).toEqual(['XCCDF-NS-UNKNOWN-VERSION']);
    });

    it('should bind no namespace when none is declared', () => {
      const binding = detectXccdfNamespace(parseXmlTree('<Benchmark/>'));

      expect(binding.uri).toBeNull();
      expect(binding.prefix).toBeNull();
      expect(binding.warnings).toHaveLength(1);
      expect(binding.warnings[0]?.code).toBe('XCCDF-NS-UNDECLARED');
      expect(binding.warnings[0]?.severity).toBe('warning');
    });
  });
});
