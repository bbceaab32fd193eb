/**
 * Tests for the order-preserving XML tree
 */

import { describe, it, expect } from 'vitest';
import { MalformedDocumentError } from '@stig-extract/shared';
import {
  childElements,
  decodeReferences,
  descendantElements,
  directText,
  firstChild,
  getAttribute,
  parseXmlTree,
  splitQualifiedName,
} from './xml-tree.js';

const NS_A = 'urn:test:a';
const NS_B = 'urn:test:b';

describe('parseXmlTree', () => {
  it('should resolve the default namespace on descendants', () => {
    const root = parseXmlTree(`<root xmlns="${NS_A}"><child/></root>`);

    expect(root.namespaceUri).toBe(NS_A);
    expect(root.children[0]).toMatchObject({ kind: 'element', localName: 'child', namespaceUri: NS_A });
  });

  it('should resolve prefixed names and keep the prefix as written', () => {
    const root = parseXmlTree(`<a:root xmlns:a="${NS_A}"><a:child/><child/></a:root>`);

    expect(root.prefix).toBe('a');
    expect(root.localName).toBe('root');
    expect(root.namespaceUri).toBe(NS_A);
    expect(firstChild(root, NS_A, 'child')?.qualifiedName).toBe('a:child');
    expect(firstChild(root, null, 'child')?.qualifiedName).toBe('child');
  });

  it('should honour nested redeclarations and xmlns=""', () => {
    const root = parseXmlTree(
      `<root xmlns="${NS_A}"><inner xmlns="${NS_B}"><leaf/></inner><plain xmlns=""><leaf/></plain></root>`,
    );

    const inner = firstChild(root, NS_B, 'inner');
    const plain = firstChild(root, null, 'plain');
    expect(inner && firstChild(inner, NS_B, 'leaf')).not.toBeNull();
    expect(plain && firstChild(plain, null, 'leaf')).not.toBeNull();
  });

  it('should decode entities in text and attributes', () => {
    const root = parseXmlTree('<root note="a &amp; b">&lt;VulnDiscussion&gt;x&lt;/VulnDiscussion&gt;</root>');

    expect(getAttribute(root, 'note')).toBe('a & b');
    expect(directText(root)).toBe('<VulnDiscussion>x</VulnDiscussion>');
  });

  it('should skip the XML declaration and a byte order mark', () => {
    const root = parseXmlTree('\uFEFF<?xml version="1.0" encoding="utf-8"?>\n<root id="r"/>');

    expect(root.localName).toBe('root');
    expect(getAttribute(root, 'id')).toBe('r');
  });

  it('should throw MalformedDocumentError with a position for an unclosed tag', () => {
    let caught: unknown;
    try {
      parseXmlTree('<root>\n  <child>\n</root>');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(MalformedDocumentError);
    if (caught instanceof MalformedDocumentError) {
      expect(caught.code).toBe('MALFORMED_DOCUMENT');
      expect(caught.line).toBeTypeOf('number');
      expect(caught.message).toMatch(/^Error parsing XML file: /);
    }
  });

  it('should reject empty content', () => {
    expect(() => parseXmlTree('')).toThrow(MalformedDocumentError);
  });
});

describe('navigation helpers', () => {
  const root = parseXmlTree(
    '<root><g id="1"><r id="a"/><g id="2"><r id="b"/></g><r id="c"/></g><g id="3"/></root>',
  );

  it('should list descendants in document order, excluding the element itself', () => {
    const ids = descendantElements(root, null, 'g').map((g) => getAttribute(g, 'id'));
    expect(ids).toEqual(['1', '2', '3']);
    expect(descendantElements(root, null, 'root')).toEqual([]);
  });

  it('should list immediate children only', () => {
    const first = firstChild(root, null, 'g');
    expect(first).not.toBeNull();
    if (first) {
      expect(childElements(first, null, 'r').map((r) => getAttribute(r, 'id'))).toEqual(['a', 'c']);
    }
  });

  it('should return only the text before the first child element', () => {
    const mixed = parseXmlTree('<d>  Intro <b>bold</b> tail</d>');
    expect(directText(mixed)).toBe('  Intro ');
  });

  it('should return null for a missing attribute', () => {
    expect(getAttribute(root, 'missing')).toBeNull();
  });
});

describe('splitQualifiedName', () => {
  it('should split on the first colon', () => {
    expect(splitQualifiedName('xccdf:Rule')).toEqual({ prefix: 'xccdf', localName: 'Rule' });
    expect(splitQualifiedName('Rule')).toEqual({ prefix: '', localName: 'Rule' });
  });
});

describe('decodeReferences', () => {
  it('should decode character references and predefined entities', () => {
    expect(decodeReferences('&#65;&#x62;&#X;&lt;&gt;&quot;&apos;&amp;')).toBe('Ab&#X;<>"\'&');
  });

  it('should leave unknown entities and out-of-range code points as written', () => {
    expect(decodeReferences('&nbsp;&#x110000;')).toBe('&nbsp;&#x110000;');
  });
});
