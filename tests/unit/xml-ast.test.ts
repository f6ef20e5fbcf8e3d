import { describe, expect, it } from 'vitest';

import { parseXml, XmlParseError } from '../../src/converters/xml-ast.js';
import { childrenOf, escapeXml, firstChild, parseOptionalInt, textOf } from '../../src/converters/xml-utils.js';

describe('parseXml', () => {
  it('builds an element tree with indexed paths', () => {
    const root = parseXml('<root xmlns="urn:test"><a k="1">hi</a><b/><a>there &amp; back</a></root>');

    expect(root.name).toBe('root');
    expect(root.attributes).toEqual({});
    expect(root.children.map((child) => child.name)).toEqual(['a', 'b', 'a']);
    expect(root.children[0]?.attributes).toEqual({ k: '1' });
    expect(root.children[2]?.path).toBe('/root[1]/a[2]');
    expect(root.children[2]?.text).toBe('there & back');
  });

  it('strips namespace prefixes from elements and attributes', () => {
    const root = parseXml('<tc:TextCorpus xmlns:tc="urn:tc" tc:lang="et"><tc:text>Tere</tc:text></tc:TextCorpus>');

    expect(root.name).toBe('TextCorpus');
    expect(root.attributes).toEqual({ lang: 'et' });
    expect(textOf(firstChild(root, 'text'))).toBe('Tere');
  });

  it('records the line of each start tag', () => {
    const root = parseXml('<root>\n  <child/>\n  <child/>\n</root>');
    expect(childrenOf(root, 'child').map((child) => child.location.line)).toEqual([2, 3]);
  });

  it('throws XmlParseError on malformed input', () => {
    expect(() => parseXml('<root><a></root>')).toThrow(XmlParseError);
    let caught: unknown;
    try {
      parseXml('<root>');
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(XmlParseError);
    expect(caught).toMatchObject({ code: 'XML_NOT_WELL_FORMED' });
  });
});

describe('xml helpers', () => {
  it('parses integer attributes strictly', () => {
    expect(parseOptionalInt('12')).toBe(12);
    expect(parseOptionalInt(' 7 ')).toBe(7);
    expect(parseOptionalInt('1.5')).toBeUndefined();
    expect(parseOptionalInt(undefined)).toBeUndefined();
  });

  it('treats whitespace-only text as absent', () => {
    const root = parseXml('<root><empty>   </empty></root>');
    expect(textOf(firstChild(root, 'empty'))).toBeUndefined();
    expect(textOf(firstChild(root, 'missing'))).toBeUndefined();
  });

  it('escapes markup characters', () => {
    expect(escapeXml(`a<b & "c" 'd'>`)).toBe('a&lt;b &amp; &quot;c&quot; &apos;d&apos;&gt;');
  });
});
