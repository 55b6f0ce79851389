import type { ScraperConfig } from '../config.js';
import type { ExtractionProfile } from '../extraction/patterns.js';
import type { CompanyRecord, ExtractedJobFields, JobListing, ScrapedJob } from '../types.js';
import { HttpClient } from '../utils/http.js';
import type { Logger } from '../utils/logger.js';
import { normalizeWhitespace } from '../utils/text.js';
import { cleanUrl } from '../utils/url.js';

export interface ScrapeContext {
  httpClient: HttpClient;
  logger: Logger;
  config: ScraperConfig;
  profile: ExtractionProfile;
  fetchDetails: boolean;
  maxPages: number;
}

export type CompanyScraper = (company: CompanyRecord, context: ScrapeContext) => Promise<ScrapedJob[]>;

export type DetailFetcher = (listing: JobListing) => Promise<ExtractedJobFields>;

/** Applies the configured title bounds; `undefined` drops the listing. */
export function normalizeTitle(
  rawTitle: string | undefined,
  config: Pick<ScraperConfig, 'minJobTitleLength' | 'maxJobTitleLength'>,
): string | undefined {
  const title = normalizeWhitespace(rawTitle ?? '');
  if (title.length < config.minJobTitleLength) {
    return undefined;
  }
  return title.slice(0, config.maxJobTitleLength);
}

export function dedupeListings(listings: JobListing[]): JobListing[] {
  const seen = new Set<string>();
  const out: JobListing[] = [];
  for (const listing of listings) {
    const key = cleanUrl(listing.url);
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);
    out.push({ ...listing, url: key });
  }
  return out;
}

export function mergeJob(listing: JobListing, fields: ExtractedJobFields): ScrapedJob {
  return {
    ...fields,
    title: listing.title,
    url: listing.url,
    location: listing.location,
    postingDate: listing.postingDate,
  };
}

export function hasAnyField(fields: ExtractedJobFields): boolean {
  return Object.values(fields).some((value) => value !== undefined);
}

/**
 * Fetches details one listing at a time. A listing whose detail fetch throws
 * is kept with empty fields.
 */
export async function attachDetails(
  listings: JobListing[],
  context: ScrapeContext,
  fetchDetail: DetailFetcher,
): Promise<ScrapedJob[]> {
  if (!context.fetchDetails) {
    return listings.map((listing) => mergeJob(listing, {}));
  }

  await context.logger.info(`Fetching details for ${listings.length} jobs`);
  const jobs: ScrapedJob[] = [];
  for (const [index, listing] of listings.entries()) {
    let fields: ExtractedJobFields = {};
    try {
      fields = await fetchDetail(listing);
    } catch (error) {
      await context.logger.warn(`Error fetching details for ${listing.url}: ${String(error)}`);
    }

    if (!hasAnyField(fields)) {
      await context.logger.debug(`No description fields extracted for ${listing.url}`);
    }
    jobs.push(mergeJob(listing, fields));

    if ((index + 1) % 25 === 0) {
      await context.logger.info(`  Details fetched: ${index + 1}/${listings.length}`);
    }
  }
  return jobs;
}
