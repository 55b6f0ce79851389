import * as cheerio from 'cheerio';
import { normalizeWhitespace, stripTags, truncate } from '../utils/text.js';
import { compilePattern } from './patterns.js';
import type { PatternLike } from './patterns.js';

const INLINE_GAP = '(?:\\s|&nbsp;|<[^>]*>)';

// Emphasized runs such as `<strong>Qualifications`; tag names in any case.
const EMPHASIZED_RUN = /<(?:strong|b)(?:\s[^>]*)?>\s*([^<]+)/gi;

/** Offset of the next emphasized run that starts with a capital letter. */
function nextSectionIndex(fragment: string): number | undefined {
  for (const match of fragment.matchAll(EMPHASIZED_RUN)) {
    if (/^[A-Z]/.test(match[1])) {
      return match.index;
    }
  }
  return undefined;
}

function patternSource(value: PatternLike): string {
  return typeof value === 'string' ? value : value.source;
}

/**
 * Lets the whitespace inside a heading also absorb markup, so that
 * `<b>Key</b> <b>Responsibilities</b>` still matches `Key\s+Responsibilities`.
 * The gaps are lazy so a trailing `\s*` never swallows the list markup that
 * follows the heading.
 */
export function tagTolerant(source: string): string {
  return source
    .replace(/\\s\+/g, `${INLINE_GAP}+?`)
    .replace(/\\s\*/g, `${INLINE_GAP}*?`)
    .replace(/ /g, `${INLINE_GAP}+?`);
}

function splitStrategies(heading: string): RegExp[] {
  const tolerant = `(?:${tagTolerant(heading)})`;
  const sources = [
    `(?:<[^>]*>\\s*)*${tolerant}\\s*(?:</[^>]*>\\s*)*(?:&nbsp;)?\\s*(?:</[^>]*>)*`,
    `${tolerant}\\s*(?:&nbsp;)?\\s*(?:</[^>]*>\\s*)*`,
  ];

  const compiled: RegExp[] = [];
  for (const source of sources) {
    const pattern = compilePattern(source);
    if (pattern) {
      compiled.push(pattern);
    }
  }
  return compiled;
}

function listItemsIn(fragment: string): string[] {
  try {
    const $ = cheerio.load(`<div>${fragment}</div>`);
    return $('li')
      .map((_, item) => normalizeWhitespace($(item).text()))
      .get()
      .filter((text) => text.length > 0);
  } catch {
    return [];
  }
}

function bulletsAfterHeading(html: string, heading: PatternLike): string | undefined {
  const headingCheck = compilePattern(heading);
  if (!headingCheck || !headingCheck.test(stripTags(html))) {
    return undefined;
  }

  for (const splitter of splitStrategies(patternSource(heading))) {
    const match = splitter.exec(html);
    if (!match) {
      continue;
    }

    let afterHeading = html.slice(match.index + match[0].length);
    const nextSection = nextSectionIndex(afterHeading);
    if (nextSection !== undefined) {
      afterHeading = afterHeading.slice(0, nextSection);
    }

    const items = listItemsIn(afterHeading);
    if (items.length > 0) {
      return truncate(items.join('\n')).trimEnd();
    }
  }

  return undefined;
}

/**
 * Finds the first heading (in list order) that is followed by a bulleted list
 * and returns the list items, one per line.
 */
export function extractBullets(
  html: string | undefined | null,
  headingPatterns: readonly PatternLike[],
): string | undefined {
  if (!html) {
    return undefined;
  }

  for (const heading of headingPatterns) {
    const bullets = bulletsAfterHeading(html, heading);
    if (bullets !== undefined) {
      return bullets;
    }
  }

  return undefined;
}
