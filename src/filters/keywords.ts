import type { ScrapedJob } from '../types.js';

export const SEMICONDUCTOR_KEYWORDS: readonly string[] = [
  'semiconductor',
  'wafer',
  'fab',
  'lithography',
  'etching',
  'deposition',
  'CMP',
  'metrology',
  'yield',
  'process engineer',
  'device',
  'IC',
  'chip',
  'ASIC',
  'analog',
  'digital',
  'mixed-signal',
  'CMOS',
  'BiCMOS',
  'memory',
  'logic',
  'power semiconductor',
];

function normalizeValue(value: string): string {
  return value
    .toLowerCase()
    .replace(/['’`]/g, '')
    .replace(/[^a-z0-9]+/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/** Whole-word keyword matching over normalized text. */
export class KeywordMatcher {
  private readonly keywords: string[];

  constructor(keywords: readonly string[] = SEMICONDUCTOR_KEYWORDS) {
    const normalized = keywords.map(normalizeValue).filter((keyword) => keyword.length > 0);
    this.keywords = [...new Set(normalized)].sort((a, b) => b.length - a.length);
  }

  match(text: string): string[] {
    const normalizedText = ` ${normalizeValue(text)} `;
    if (!normalizedText.trim()) {
      return [];
    }
    return this.keywords.filter((keyword) => normalizedText.includes(` ${keyword} `));
  }

  matchesJob(job: Pick<ScrapedJob, 'title' | 'responsibilities'>): boolean {
    return this.match(`${job.title} ${job.responsibilities ?? ''}`).length > 0;
  }
}

export function filterJobsByKeywords(jobs: ScrapedJob[], matcher: KeywordMatcher = new KeywordMatcher()): ScrapedJob[] {
  return jobs.filter((job) => matcher.matchesJob(job));
}
