import * as cheerio from 'cheerio';
import { normalizeWhitespace, truncate } from '../utils/text.js';
import { compilePattern, DEFAULT_BOILERPLATE } from './patterns.js';
import type { BoilerplateRules, PatternLike } from './patterns.js';

const MIN_PARAGRAPH_LENGTH = 20;
const MIN_RESULT_LENGTH = 30;

function compileAll(patterns: readonly PatternLike[], extraFlags = ''): RegExp[] {
  return patterns
    .map((candidate) => compilePattern(candidate, extraFlags))
    .filter((pattern): pattern is RegExp => pattern !== null);
}

function paragraphsOf(html: string): string[] {
  try {
    const $ = cheerio.load(`<div>${html}</div>`);
    return $('p, div > span, li')
      .map((_, element) => normalizeWhitespace($(element).text()))
      .get()
      .filter((text) => text.length > 0);
  } catch {
    return [];
  }
}

/**
 * Role description prose for postings that have no bulleted responsibilities.
 * Boilerplate phrases are cut out of paragraphs; boilerplate paragraphs and
 * short fragments are dropped.
 */
export function extractProse(
  html: string | undefined | null,
  boilerplate: BoilerplateRules = DEFAULT_BOILERPLATE,
): string | undefined {
  if (!html) {
    return undefined;
  }

  const phrases = compileAll(boilerplate.phrases, 'g');
  const discards = compileAll(boilerplate.paragraphs);

  const paragraphs = paragraphsOf(html)
    .map((paragraph) => normalizeWhitespace(phrases.reduce((text, phrase) => text.replace(phrase, ''), paragraph)))
    .filter((paragraph) => !discards.some((pattern) => pattern.test(paragraph)))
    .filter((paragraph) => paragraph.length >= MIN_PARAGRAPH_LENGTH);

  if (paragraphs.length === 0) {
    return undefined;
  }

  const result = truncate(paragraphs.join('\n\n'));
  return result.length < MIN_RESULT_LENGTH ? undefined : result;
}
