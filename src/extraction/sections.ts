import { cleanText, normalizeWhitespace } from '../utils/text.js';
import { compilePattern, DEFAULT_SECTION_PATTERNS } from './patterns.js';
import type { PatternLike, SectionPatterns } from './patterns.js';

export interface JobSections {
  responsibilities?: string;
  minEducation?: string;
  minExperience?: string;
  preferredQualifications?: string;
  salaryRange?: string;
}

/**
 * Returns the first pattern's match, in list order. A pattern with a capture
 * group that participated yields the group; otherwise the whole match.
 */
export function extractSection(text: string, patterns: readonly PatternLike[]): string | undefined {
  if (!text) {
    return undefined;
  }

  for (const candidate of patterns) {
    const pattern = compilePattern(candidate);
    if (!pattern) {
      continue;
    }

    const match = pattern.exec(text);
    if (!match) {
      continue;
    }

    const captured = match[1];
    return (captured ?? match[0]).trim();
  }

  return undefined;
}

export function extractJobSections(
  descriptionText: string | undefined,
  patterns: SectionPatterns = DEFAULT_SECTION_PATTERNS,
): JobSections {
  if (!descriptionText) {
    return {};
  }

  const text = normalizeWhitespace(descriptionText);
  return {
    responsibilities: cleanText(extractSection(text, patterns.responsibilities)),
    minEducation: cleanText(extractSection(text, patterns.education)),
    minExperience: cleanText(extractSection(text, patterns.experience)),
    preferredQualifications: cleanText(extractSection(text, patterns.preferredQualifications)),
    salaryRange: cleanText(extractSection(text, patterns.salary)),
  };
}
