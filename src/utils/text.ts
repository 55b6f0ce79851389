import * as cheerio from 'cheerio';

export const MAX_FIELD_LENGTH = 5000;
export const MIN_FIELD_LENGTH = 3;

const CONTROL_CHARS = /[\x00-\x1F\x7F]/g;

export function normalizeWhitespace(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

/** Cuts to `maxLength` code points, never inside a surrogate pair. */
export function truncate(value: string, maxLength = MAX_FIELD_LENGTH): string {
  if (value.length <= maxLength) {
    return value;
  }
  const codePoints = Array.from(value);
  return codePoints.length > maxLength ? codePoints.slice(0, maxLength).join('') : value;
}

/**
 * Normalizes an extracted field value. Anything that is empty, or shorter
 * than three characters once squished, comes back as `undefined`.
 */
export function cleanText(raw: string | undefined | null): string | undefined {
  if (!raw) {
    return undefined;
  }

  const squished = normalizeWhitespace(raw.replace(CONTROL_CHARS, ' '));
  const capped = truncate(squished).trimEnd();
  if (capped.length < MIN_FIELD_LENGTH) {
    return undefined;
  }
  return capped;
}

export function sanitizeText(value: string | undefined | null): string | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  return normalizeWhitespace(value.replace(/\x00/g, '').replace(CONTROL_CHARS, ' '));
}

export function stripTags(html: string): string {
  return normalizeWhitespace(html.replace(/<[^>]+>/g, ' ').replace(/&[a-zA-Z]+;/g, ' '));
}

const BLOCK_ELEMENTS = 'p,div,li,ul,ol,h1,h2,h3,h4,h5,h6,tr,td,th,section,article';

export function htmlToText(html: string): string {
  const $ = cheerio.load(html);
  $('br').replaceWith(' ');
  $(BLOCK_ELEMENTS).each((_, element) => {
    $(element).append(' ');
  });
  return normalizeWhitespace($.root().text());
}

export function safeFilename(name: string): string {
  return name
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/_+/g, '_')
    .replace(/^_|_$/g, '');
}
