/**
 * Tests for the individual accessibility checkers
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { parseHtml } from '../src/utils/document.js';
import {
  checkAltText,
  checkHeadingStructure,
  checkDescriptiveLinks,
  checkFormLabels,
  checkSemanticStructure,
  checkColorContrast,
  classifyColor,
  LIMITED_CHECK_NOTICE,
} from '../src/checks/index.js';

function assertClose(actual: number, expected: number): void {
  assert.ok(Math.abs(actual - expected) < 1e-9, `expected ${actual} to be close to ${expected}`);
}

describe('checkAltText', () => {
  it('should score 1 when there are no images', () => {
    assert.deepStrictEqual(checkAltText(parseHtml('<p>No images</p>')), { score: 1, issues: [] });
  });

  it('should penalize missing alt fully and empty alt by half', () => {
    const doc = parseHtml(`
      <img src="a.png" alt="A chart">
      <img src="b.png">
      <img src="c.png" alt="  ">
      <img src="d.png" alt="" role="presentation">
    `);
    const result = checkAltText(doc);
    assert.strictEqual(result.score, 0.625);
    assert.deepStrictEqual(result.issues, [
      'Image missing alt attribute: b.png',
      'Image has empty alt text: c.png',
    ]);
  });

  it('should check images inside noscript', () => {
    const result = checkAltText(parseHtml('<noscript><img src="t.gif"></noscript>'));
    assert.strictEqual(result.score, 0);
    assert.deepStrictEqual(result.issues, ['Image missing alt attribute: t.gif']);
  });

  it('should fall back to "unknown" when src is missing', () => {
    const result = checkAltText(parseHtml('<img>'));
    assert.strictEqual(result.score, 0);
    assert.deepStrictEqual(result.issues, ['Image missing alt attribute: unknown']);
  });
});

describe('checkHeadingStructure', () => {
  it('should score 0 when there are no headings', () => {
    assert.deepStrictEqual(checkHeadingStructure(parseHtml('<p>Text</p>')), {
      score: 0,
      issues: ['No headings found on page'],
    });
  });

  it('should give full marks to a single h1 with nested levels', () => {
    const result = checkHeadingStructure(parseHtml('<h1>A</h1><h2>B</h2><h3>C</h3><h2>D</h2>'));
    assert.deepStrictEqual(result, { score: 1, issues: [] });
  });

  it('should penalize a skipped level', () => {
    const result = checkHeadingStructure(parseHtml('<h1>Title</h1><h3>Sub</h3>'));
    assert.strictEqual(result.score, 0.9);
    assert.deepStrictEqual(result.issues, ['Heading level skip from h1 to h3']);
  });

  it('should penalize a missing h1', () => {
    const result = checkHeadingStructure(parseHtml('<h2>A</h2><h3>B</h3>'));
    assert.strictEqual(result.score, 0.5);
    assert.deepStrictEqual(result.issues, ['No H1 heading found']);
  });

  it('should penalize multiple h1 headings and skips together', () => {
    const result = checkHeadingStructure(parseHtml('<h1>A</h1><h1>B</h1><h2>C</h2><h4>D</h4>'));
    assertClose(result.score, 0.6);
    assert.deepStrictEqual(result.issues, [
      'Multiple H1 headings found (2)',
      'Heading level skip from h2 to h4',
    ]);
  });

  it('should cap the skip penalty', () => {
    const html = '<h1>A</h1><h3>B</h3>' + '<h2>C</h2><h4>D</h4>'.repeat(5);
    const result = checkHeadingStructure(parseHtml(html));
    assert.strictEqual(result.issues.length, 6);
    assert.strictEqual(result.score, 0.5);
  });
});

describe('checkDescriptiveLinks', () => {
  it('should score 1 when there are no links', () => {
    assert.deepStrictEqual(checkDescriptiveLinks(parseHtml('<p>None</p>')), { score: 1, issues: [] });
  });

  it('should flag generic link text', () => {
    const doc = parseHtml(`
      <a href="/a">Click Here</a>
      <a href="/b"> read more </a>
      <a href="/pricing">Pricing plans</a>
      <a href="/docs">Documentation</a>
      <a href="/contact">Contact us</a>
    `);
    const result = checkDescriptiveLinks(doc);
    assert.strictEqual(result.score, 0.6);
    assert.deepStrictEqual(result.issues, [
      "Non-descriptive link text: 'click here' for /a",
      "Non-descriptive link text: 'read more' for /b",
    ]);
  });

  it('should flag empty and very short link text', () => {
    const result = checkDescriptiveLinks(parseHtml('<a href="/x"></a><a>Go</a>'));
    assert.strictEqual(result.score, 0);
    assert.deepStrictEqual(result.issues, [
      'Empty link text: /x',
      "Non-descriptive link text: 'go' for unknown",
    ]);
  });

  it('should check links inside pre', () => {
    const result = checkDescriptiveLinks(parseHtml('<pre><a href="/x">click here</a></pre>'));
    assert.strictEqual(result.score, 0);
    assert.deepStrictEqual(result.issues, ["Non-descriptive link text: 'click here' for /x"]);
  });

  it('should skip image links without penalizing them', () => {
    const doc = parseHtml('<a href="/"><img src="logo.png" alt="Home"></a><a href="/about">About us</a>');
    assert.deepStrictEqual(checkDescriptiveLinks(doc), { score: 1, issues: [] });
  });
});

describe('checkFormLabels', () => {
  it('should score 1 when there are no form controls', () => {
    assert.deepStrictEqual(checkFormLabels(parseHtml('<form></form>')), { score: 1, issues: [] });
  });

  it('should accept label[for], a wrapping label and aria-label', () => {
    const doc = parseHtml(`
      <form>
        <label for="name">Name</label>
        <input id="name" type="text" name="name">
        <label>City <input name="city"></label>
        <input type="text" name="email" aria-label="Email">
        <input type="text" name="phone">
      </form>
    `);
    const result = checkFormLabels(doc);
    assert.strictEqual(result.score, 0.75);
    assert.deepStrictEqual(result.issues, ['Form control missing label: phone text']);
  });

  it('should ignore hidden and button-like inputs', () => {
    const doc = parseHtml(`
      <input type="hidden" name="token">
      <input type="SUBMIT" value="Send">
      <input type="button" value="Cancel">
      <input type="image" src="go.png">
    `);
    assert.deepStrictEqual(checkFormLabels(doc), { score: 1, issues: [] });
  });

  it('should report selects and textareas by tag and treat blank aria-label as missing', () => {
    const doc = parseHtml(`
      <select></select>
      <textarea name="notes" aria-label="  "></textarea>
      <input type="email" name="mail" aria-label="Mail">
    `);
    const result = checkFormLabels(doc);
    assertClose(result.score, 1 / 3);
    assert.deepStrictEqual(result.issues, [
      'Form control missing label: unnamed select',
      'Form control missing label: notes textarea',
    ]);
  });
});

describe('checkSemanticStructure', () => {
  it('should score 0 without landmarks', () => {
    assert.deepStrictEqual(checkSemanticStructure(parseHtml('<div>Plain</div>')), {
      score: 0,
      issues: ['No semantic HTML elements found', 'No <main> element found'],
    });
  });

  it('should give full marks to three landmarks including main', () => {
    const doc = parseHtml('<header></header><main></main><footer></footer>');
    assert.deepStrictEqual(checkSemanticStructure(doc), { score: 1, issues: [] });
  });

  it('should penalize a missing main element', () => {
    const doc = parseHtml('<header></header><nav></nav><footer></footer>');
    const result = checkSemanticStructure(doc);
    assertClose(result.score, 0.7);
    assert.deepStrictEqual(result.issues, ['No <main> element found']);
  });

  it('should give partial credit for fewer landmarks', () => {
    const result = checkSemanticStructure(parseHtml('<main><p>Body</p></main>'));
    assertClose(result.score, 1 / 3);
    assert.deepStrictEqual(result.issues, []);
  });
});

describe('classifyColor', () => {
  it('should classify hex colors by every channel', () => {
    assert.strictEqual(classifyColor('#e0e0e0'), 'light');
    assert.strictEqual(classifyColor('#FFF'), 'light');
    assert.strictEqual(classifyColor('#dfe0e0'), null);
    assert.strictEqual(classifyColor('#2f2f2f'), 'dark');
    assert.strictEqual(classifyColor('#000000cc'), 'dark');
    assert.strictEqual(classifyColor('#303030'), null);
  });

  it('should classify rgb colors by the red channel', () => {
    assert.strictEqual(classifyColor('rgb(240, 10, 10)'), 'light');
    assert.strictEqual(classifyColor('rgba(10, 200, 200, 0.5)'), 'dark');
    assert.strictEqual(classifyColor('rgb(128, 128, 128)'), null);
  });

  it('should ignore named colors', () => {
    assert.strictEqual(classifyColor('white'), null);
  });
});

describe('checkColorContrast', () => {
  it('should report the limited-check notice when nothing is flagged', () => {
    const doc = parseHtml('<p>Plain</p><p style="color: #777">Grey</p>');
    assert.deepStrictEqual(checkColorContrast(doc), { score: 1, issues: [LIMITED_CHECK_NOTICE] });
  });

  it('should flag one light inline color', () => {
    const result = checkColorContrast(parseHtml('<p style="color: #EEE">Faint</p>'));
    assert.strictEqual(result.score, 0.9);
    assert.deepStrictEqual(result.issues, ['Potential low contrast light text (<p>)']);
  });

  it('should flag light and dark colors per element and cap the penalty', () => {
    const doc = parseHtml(`
      <p style="color: #eeeeee">One</p>
      <span style="color:#111">Two</span>
      <div style="color: rgb(240, 240, 240)">Three</div>
      <p style="color:#fff; background-color:#000">Four</p>
      <em style="color: #fafafa">Five</em>
    `);
    const result = checkColorContrast(doc);
    assert.strictEqual(result.score, 0.5);
    assert.deepStrictEqual(result.issues, [
      'Potential low contrast light text (<p>)',
      'Potential low contrast dark text (<span>)',
      'Potential low contrast light text (<div>)',
      'Potential low contrast light text (<p>)',
      'Potential low contrast dark text (<p>)',
      'Potential low contrast light text (<em>)',
    ]);
  });
});
