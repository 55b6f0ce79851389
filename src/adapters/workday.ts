import * as cheerio from 'cheerio';
import { parseDate } from '../extraction/dates.js';
import { extractJobSections } from '../extraction/sections.js';
import type { CompanyRecord, ExtractedJobFields, JobListing, ScrapedJob } from '../types.js';
import { isRecord, parseJsonMaybe, readNumber, readRecords, readString } from '../utils/json.js';
import type { JsonRecord } from '../utils/json.js';
import { htmlToText, normalizeWhitespace } from '../utils/text.js';
import { cleanUrl, joinUrl, toAbsoluteUrl } from '../utils/url.js';
import { attachDetails, dedupeListings, normalizeTitle } from './common.js';
import type { ScrapeContext } from './common.js';

const WORKDAY_SELECTORS = {
  jobItem: "li[data-automation-id='jobPostingItem']",
  jobItemFallback: 'div.jobs-list-item',
  jobTitle: "[data-automation-id='jobTitle']",
  jobLocation: "[data-automation-id='locations']",
  jobLink: "a[data-automation-id='jobTitle']",
  nextPage: "button[data-uxi-widget-type='paginationNext']",
  jobDescription: "[data-automation-id='jobPostingDescription']",
  jobDescriptionFallback: 'div.job-description, div.jobdescription',
  postingDate: "[data-automation-id='postedOn']",
} as const;

const LOCALE_SEGMENT = /^[a-z]{2}-[A-Z]{2}$/;

/**
 * `https://acme.wd1.myworkdayjobs.com/en-US/External` →
 * `https://acme.wd1.myworkdayjobs.com/wday/cxs/acme/External/jobs`
 */
export function deriveWorkdayApiEndpoint(careersUrl: string): string | null {
  let parsed: URL;
  try {
    parsed = new URL(careersUrl);
  } catch {
    return null;
  }

  const tenant = parsed.hostname.match(/^([^.]+)\.wd\d+\.myworkdayjobs\.com$/i)?.[1];
  const site = parsed.pathname
    .split('/')
    .filter((segment) => segment.length > 0 && !LOCALE_SEGMENT.test(segment))[0];
  if (!tenant || !site) {
    return null;
  }
  return `${parsed.origin}/wday/cxs/${tenant.toLowerCase()}/${site}/jobs`;
}

export function extractWorkdayApiEndpoint(html: string, baseUrl: string): string | null {
  const absoluteMatch = html.match(/https?:\/\/[^"']+\/wday\/cxs\/[^"']+\/jobs/i)?.[0];
  if (absoluteMatch) {
    return cleanUrl(absoluteMatch);
  }

  const relativeMatch = html.match(/\/wday\/cxs\/[^"']+\/jobs/i)?.[0];
  if (!relativeMatch) {
    return null;
  }
  return cleanUrl(toAbsoluteUrl(relativeMatch, baseUrl));
}

export function parseWorkdayPostings(
  payload: JsonRecord,
  careersUrl: string,
  context: Pick<ScrapeContext, 'config'>,
  today: Date = new Date(),
): JobListing[] {
  const listings: JobListing[] = [];
  for (const item of readRecords(payload, 'jobPostings')) {
    const title = normalizeTitle(readString(item, 'title'), context.config);
    const externalPath = readString(item, 'externalPath');
    if (!title || !externalPath) {
      continue;
    }

    listings.push({
      title,
      url: cleanUrl(joinUrl(careersUrl, externalPath)),
      location: normalizeWhitespace(readString(item, 'locationsText') ?? '') || undefined,
      postingDate: parseDate(readString(item, 'postedOn'), today),
      detailKey: externalPath,
    });
  }
  return listings;
}

async function fetchWorkdayApiPage(
  endpoint: string,
  offset: number,
  context: ScrapeContext,
): Promise<JsonRecord | null> {
  const response = await context.httpClient.requestMaybe(endpoint, {
    method: 'POST',
    body: JSON.stringify({
      appliedFacets: {},
      limit: context.config.jobsPerPage,
      offset,
      searchText: '',
    }),
    headers: {
      'content-type': 'application/json',
      accept: 'application/json,text/plain,*/*',
    },
  });
  if (!response || !response.body) {
    return null;
  }

  const parsed = parseJsonMaybe(response.body);
  return isRecord(parsed) ? parsed : null;
}

async function scrapeWorkdayApi(
  endpoint: string,
  company: CompanyRecord,
  context: ScrapeContext,
): Promise<JobListing[]> {
  const listings: JobListing[] = [];
  let offset = 0;
  let page = 1;
  let total = Number.MAX_SAFE_INTEGER;

  while (offset < total && page <= context.maxPages) {
    await context.logger.info(`Scraping page ${page} for ${company.company_name} (offset: ${offset})`);
    const payload = await fetchWorkdayApiPage(endpoint, offset, context);
    if (!payload) {
      await context.logger.warn(`Failed to fetch page ${page} - stopping`);
      break;
    }

    const postings = readRecords(payload, 'jobPostings');
    total = readNumber(payload, 'total') ?? total;
    if (postings.length === 0) {
      await context.logger.info(`No jobs found on page ${page} - stopping`);
      break;
    }

    listings.push(...parseWorkdayPostings(payload, company.careers_url, context));
    offset += postings.length;
    page += 1;
  }

  return listings;
}

export function parseWorkdayListingHtml(html: string, baseUrl: string, today: Date = new Date()): JobListing[] {
  const $ = cheerio.load(html);
  let items = $(WORKDAY_SELECTORS.jobItem);
  if (items.length === 0) {
    items = $(WORKDAY_SELECTORS.jobItemFallback);
  }

  const listings: JobListing[] = [];
  items.each((_, item) => {
    const row = $(item);
    const title = normalizeWhitespace(row.find(WORKDAY_SELECTORS.jobTitle).first().text());
    const href = row.find(WORKDAY_SELECTORS.jobLink).first().attr('href');
    if (!title || !href) {
      return;
    }

    const location = normalizeWhitespace(row.find(WORKDAY_SELECTORS.jobLocation).first().text());
    const posted = normalizeWhitespace(row.find(WORKDAY_SELECTORS.postingDate).first().text());
    listings.push({
      title,
      url: cleanUrl(toAbsoluteUrl(href, baseUrl)),
      location: location || undefined,
      postingDate: parseDate(posted, today),
    });
  });
  return listings;
}

export function hasNextWorkdayPage(html: string): boolean {
  const $ = cheerio.load(html);
  const next = $(WORKDAY_SELECTORS.nextPage).first();
  return next.length > 0 && next.attr('disabled') === undefined;
}

export function workdayPageUrl(baseUrl: string, page: number, jobsPerPage: number): string {
  const offset = (page - 1) * jobsPerPage;
  const separator = baseUrl.includes('?') ? '&' : '?';
  return `${baseUrl}${separator}offset=${offset}`;
}

async function scrapeWorkdayHtml(company: CompanyRecord, context: ScrapeContext): Promise<JobListing[]> {
  const listings: JobListing[] = [];
  for (let page = 1; page <= context.maxPages; page += 1) {
    await context.logger.info(`Scraping page ${page} for ${company.company_name}`);
    const response = await context.httpClient.requestMaybe(
      workdayPageUrl(company.careers_url, page, context.config.jobsPerPage),
    );
    if (!response) {
      await context.logger.warn(`Failed to fetch page ${page} - stopping`);
      break;
    }

    const pageListings = parseWorkdayListingHtml(response.body, company.careers_url);
    if (pageListings.length === 0) {
      await context.logger.info(`No jobs found on page ${page} - stopping`);
      break;
    }
    listings.push(...pageListings);

    if (!hasNextWorkdayPage(response.body)) {
      break;
    }
  }
  return listings;
}

export function workdayDetailUrl(endpoint: string, externalPath: string): string {
  return joinUrl(endpoint.replace(/\/jobs$/, ''), externalPath);
}

function descriptionFromDetailPayload(body: string): string | undefined {
  const parsed = parseJsonMaybe(body);
  if (!isRecord(parsed) || !isRecord(parsed.jobPostingInfo)) {
    return undefined;
  }
  return readString(parsed.jobPostingInfo, 'jobDescription');
}

export function descriptionFromDetailHtml(html: string): string | undefined {
  const $ = cheerio.load(html);
  let description = $(WORKDAY_SELECTORS.jobDescription).first();
  if (description.length === 0) {
    description = $(WORKDAY_SELECTORS.jobDescriptionFallback).first();
  }
  return description.length > 0 ? (description.html() ?? undefined) : undefined;
}

async function fetchWorkdayDetail(
  listing: JobListing,
  endpoint: string | null,
  context: ScrapeContext,
): Promise<ExtractedJobFields> {
  await context.logger.debug(`Fetching job details: ${listing.url}`);

  let descriptionHtml: string | undefined;
  if (endpoint && listing.detailKey) {
    const response = await context.httpClient.requestMaybe(workdayDetailUrl(endpoint, listing.detailKey), {
      headers: { accept: 'application/json' },
    });
    descriptionHtml = response ? descriptionFromDetailPayload(response.body) : undefined;
  }

  if (!descriptionHtml) {
    const response = await context.httpClient.requestMaybe(listing.url);
    descriptionHtml = response ? descriptionFromDetailHtml(response.body) : undefined;
  }

  if (!descriptionHtml) {
    return {};
  }
  return extractJobSections(htmlToText(descriptionHtml), context.profile.sectionPatterns);
}

async function resolveEndpoint(company: CompanyRecord, context: ScrapeContext): Promise<string | null> {
  const derived = deriveWorkdayApiEndpoint(company.careers_url);
  if (derived) {
    return derived;
  }

  const landing = await context.httpClient.requestMaybe(company.careers_url);
  return landing ? extractWorkdayApiEndpoint(landing.body, landing.url) : null;
}

export async function scrapeWorkday(company: CompanyRecord, context: ScrapeContext): Promise<ScrapedJob[]> {
  await context.logger.info(`Starting Workday scrape for ${company.company_name}`);

  const endpoint = await resolveEndpoint(company, context);
  let listings = endpoint ? await scrapeWorkdayApi(endpoint, company, context) : [];
  if (listings.length === 0) {
    listings = await scrapeWorkdayHtml(company, context);
  }

  listings = dedupeListings(listings);
  if (listings.length === 0) {
    await context.logger.warn(`No jobs found for ${company.company_name}`);
    return [];
  }
  await context.logger.info(`Found ${listings.length} total jobs for ${company.company_name}`);

  return attachDetails(listings, context, (listing) => fetchWorkdayDetail(listing, endpoint, context));
}
