import { describe, expect, it } from 'vitest';
import { extractBullets } from '../src/extraction/bullets.js';
import { DEFAULT_RESPONSIBILITY_HEADINGS } from '../src/extraction/patterns.js';

describe('extractBullets', () => {
  it('returns the list under a heading and stops at the next section', () => {
    const html =
      '<p><strong>Key Responsibilities:</strong></p><ul><li>Design circuits</li><li>Run tests</li></ul>' +
      '<p><strong>Qualifications</strong></p><ul><li>BSEE</li></ul>';

    expect(extractBullets(html, DEFAULT_RESPONSIBILITY_HEADINGS)).toBe('Design circuits\nRun tests');
  });

  it('stops at an uppercase next-section heading', () => {
    const html =
      '<P><B>Key Responsibilities:</B></P><UL><LI>Design circuits</LI></UL>' +
      '<P><B>Qualifications</B></P><UL><LI>BSEE</LI></UL>';

    expect(extractBullets(html, ['Key\\s+Responsibilities\\s*:?'])).toBe('Design circuits');
  });

  it('drops a trailing line break left by the length cap', () => {
    const html = `<p><strong>Key Responsibilities</strong></p><ul><li>${'a'.repeat(4999)}</li><li>Run tests</li></ul>`;
    expect(extractBullets(html, ['Key\\s+Responsibilities'])).toBe('a'.repeat(4999));
  });

  it('matches headings split across tags', () => {
    const html = '<p><b>Key</b> <b>Responsibilities</b></p><ul><li>Layout review</li></ul>';
    expect(extractBullets(html, ['Key\\s+Responsibilities\\s*:?'])).toBe('Layout review');
  });

  it('takes items from the start of the fragment for the loose heading', () => {
    const html = '<ul><li>Own the test plan</li><li>Debug silicon</li></ul>';
    expect(extractBullets(html, ['^'])).toBe('Own the test plan\nDebug silicon');
  });

  it('returns undefined when the heading is missing', () => {
    expect(extractBullets('<p>No list here</p>', ['Key\\s+Responsibilities'])).toBeUndefined();
  });

  it('returns undefined when the heading has no list', () => {
    const html = '<p><strong>Key Responsibilities</strong> design things</p>';
    expect(extractBullets(html, ['Key\\s+Responsibilities'])).toBeUndefined();
  });

  it('tolerates malformed markup', () => {
    expect(extractBullets('<div><p><strong>Key Responsibilities</strong', ['Key\\s+Responsibilities'])).toBeUndefined();
  });

  it('reads unclosed list items without crossing into the next section', () => {
    const html =
      '<p><strong>Key Responsibilities:</strong></p><ul><li>Design circuits<li>Run tests' +
      '<p><strong>Qualifications</strong></p><ul><li>BSEE</li';

    expect(extractBullets(html, ['Key\\s+Responsibilities\\s*:?'])).toBe('Design circuits\nRun tests');
  });

  it('ignores a list item cut off inside its tag', () => {
    const html = '<p><strong>Key Responsibilities</strong></p><ul><li>Design circuits</li><li';
    expect(extractBullets(html, ['Key\\s+Responsibilities'])).toBe('Design circuits');
  });

  it('returns undefined for absent input', () => {
    expect(extractBullets(undefined, DEFAULT_RESPONSIBILITY_HEADINGS)).toBeUndefined();
    expect(extractBullets(null, DEFAULT_RESPONSIBILITY_HEADINGS)).toBeUndefined();
    expect(extractBullets('', DEFAULT_RESPONSIBILITY_HEADINGS)).toBeUndefined();
  });
});
