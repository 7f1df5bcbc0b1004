import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { findChild, findChildren, iterElements, parseXml, XmlParseError } from '../xml-tree.js';

describe('parseXml', () => {
  it('keeps sibling order, attributes and text as strings', () => {
    const root = parseXml(
      '<?xml version="1.0"?><song id="7"><author>B</author><ccli>0042</ccli><author>A</author></song>'
    );

    assert.strictEqual(root.name, 'song');
    assert.deepStrictEqual(root.attributes, { id: '7' });
    assert.deepStrictEqual(findChildren(root, 'author').map(a => a.text), ['B', 'A']);
    assert.strictEqual(findChild(root, 'ccli')?.text, '0042');
  });

  it('decodes entities', () => {
    const root = parseXml('<title>Tom &amp; Jerry &lt;live&gt;</title>');
    assert.strictEqual(root.text, 'Tom & Jerry <live>');
  });

  it('decodes decimal and hexadecimal character references', () => {
    const root = parseXml('<body>&#8216;Twas grace&#8217;s &#x201C;song&#x201D;</body>');
    assert.strictEqual(root.text, '\u2018Twas grace\u2019s \u201Csong\u201D');
  });

  it('keeps leading and trailing whitespace in text', () => {
    const root = parseXml('<body>  indented\nline </body>');
    assert.strictEqual(root.text, '  indented\nline ');
  });

  it('leaves text undefined for empty elements', () => {
    const root = parseXml('<slide><title/></slide>');
    assert.strictEqual(findChild(root, 'title')?.text, undefined);
  });

  it('throws XmlParseError for malformed documents', () => {
    assert.throws(() => parseXml('<slide><title>Open</slide>'), XmlParseError);
  });

  it('throws XmlParseError for plain text', () => {
    assert.throws(() => parseXml('Not found'), XmlParseError);
  });
});

describe('iterElements', () => {
  it('walks depth-first in document order starting at the element', () => {
    const root = parseXml('<a><b><c/></b><d/></a>');
    assert.deepStrictEqual([...iterElements(root)].map(e => e.name), ['a', 'b', 'c', 'd']);
  });
});
