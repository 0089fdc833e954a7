/**
 * Tests for the parsed document adapter
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { parseHtml } from '../src/utils/document.js';

describe('parseHtml', () => {
  const html = `
    <html>
      <body>
        <main>
          <h2>Second</h2>
          <section>
            <h1>First</h1>
            <label for="q">Search</label>
            <label><span><input id="nested" type="text"></span></label>
          </section>
          <p style="color: red">Styled</p>
        </main>
      </body>
    </html>
  `;
  const doc = parseHtml(html);

  it('should find elements of several tags in document order', () => {
    const headings = doc.findAll(['h1', 'h2']);
    assert.deepStrictEqual(headings.map(h => h.tagName), ['h2', 'h1']);
    assert.deepStrictEqual(headings.map(h => h.textContent()), ['Second', 'First']);
  });

  it('should match tag names case-insensitively', () => {
    const upper = parseHtml('<DIV><IMG SRC="a.png"></DIV>');
    const images = upper.findAll(['img']);
    assert.strictEqual(images.length, 1);
    assert.strictEqual(images[0].tagName, 'img');
    assert.strictEqual(images[0].getAttribute('src'), 'a.png');
  });

  it('should return undefined for missing attributes', () => {
    const [input] = doc.findAll(['input']);
    assert.strictEqual(input.getAttribute('name'), undefined);
    assert.strictEqual(input.hasAttribute('name'), false);
    assert.strictEqual(input.hasAttribute('id'), true);
  });

  it('should list ancestors nearest first', () => {
    const [input] = doc.findAll(['input']);
    assert.deepStrictEqual(
      input.ancestors().map(a => a.tagName),
      ['span', 'label', 'section', 'main', 'body', 'html']
    );
  });

  it('should find the first element matching a predicate', () => {
    const label = doc.find('label', el => el.getAttribute('for') === 'q');
    assert.ok(label);
    assert.strictEqual(label.textContent(), 'Search');
    assert.strictEqual(doc.find('label', el => el.getAttribute('for') === 'missing'), undefined);
  });

  it('should filter elements of any tag', () => {
    const styled = doc.filter(el => el.hasAttribute('style'));
    assert.deepStrictEqual(styled.map(el => el.tagName), ['p']);
  });

  it('should parse markup inside pre and noscript', () => {
    const raw = parseHtml('<pre><a href="/x">click here</a></pre><noscript><img src="t.gif"></noscript>');
    assert.deepStrictEqual(raw.findAll(['a', 'img']).map(el => el.tagName), ['a', 'img']);
  });

  it('should keep script and style contents as text', () => {
    const raw = parseHtml('<script>const s = "<a href=\'/x\'>x</a>";</script><style>a { color: #fff }</style>');
    assert.strictEqual(raw.findAll(['a']).length, 0);
  });

  it('should search beneath an element', () => {
    const [section] = doc.findAll(['section']);
    assert.deepStrictEqual(section.findAll(['h1', 'h2', 'input']).map(el => el.tagName), ['h1', 'input']);
  });
});
