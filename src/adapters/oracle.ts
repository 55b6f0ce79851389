import { buildOracleDetailFields } from '../extraction/chain.js';
import type { OracleRequisitionDetail } from '../extraction/chain.js';
import { parseDate } from '../extraction/dates.js';
import type { CompanyRecord, ExtractedJobFields, JobListing, ScrapedJob } from '../types.js';
import { isRecord, parseJsonMaybe, readNumber, readRecords, readString } from '../utils/json.js';
import type { JsonRecord } from '../utils/json.js';
import type { Logger } from '../utils/logger.js';
import { normalizeWhitespace } from '../utils/text.js';
import { joinUrl, originOf } from '../utils/url.js';
import { attachDetails, dedupeListings, normalizeTitle } from './common.js';
import type { ScrapeContext } from './common.js';

const LIST_ENDPOINT = '/hcmRestApi/resources/latest/recruitingCEJobRequisitions';
const DETAIL_ENDPOINT = '/hcmRestApi/resources/latest/recruitingCEJobRequisitionDetails';
const DEFAULT_SITE_NUMBER = 'CX';

const JSON_HEADERS = { accept: 'application/json' };

export function extractOracleApiBase(careersUrl: string): string | null {
  return originOf(careersUrl);
}

export async function extractOracleSiteNumber(careersUrl: string, logger: Logger): Promise<string> {
  const siteNumber = careersUrl.match(/\/sites\/([^/?#]+)/)?.[1];
  if (!siteNumber) {
    await logger.warn(`Could not extract site number from URL, defaulting to '${DEFAULT_SITE_NUMBER}'`);
    return DEFAULT_SITE_NUMBER;
  }
  return siteNumber;
}

export function buildOracleListUrl(apiBase: string, siteNumber: string, offset: number, limit: number): string {
  return (
    `${apiBase}${LIST_ENDPOINT}?onlyData=true` +
    '&expand=requisitionList.secondaryLocations,requisitionList.workLocation' +
    `&finder=findReqs;siteNumber=${siteNumber},limit=${limit},offset=${offset}`
  );
}

export function buildOracleDetailUrl(apiBase: string, requisitionId: string): string {
  return `${apiBase}${DETAIL_ENDPOINT}/${encodeURIComponent(requisitionId)}?onlyData=true&expand=all`;
}

/** First US work location as "City, State"; `undefined` when the job has none. */
export function usLocationOf(job: JsonRecord): string | undefined {
  for (const workLocation of readRecords(job, 'workLocation')) {
    if (readString(workLocation, 'Country') !== 'US') {
      continue;
    }
    const city = normalizeWhitespace(readString(workLocation, 'TownOrCity') ?? '');
    const state = normalizeWhitespace(readString(workLocation, 'Region2') ?? '');
    if (city && state) {
      return `${city}, ${state}`;
    }
    return city || state || 'United States';
  }
  return undefined;
}

export function parseOracleJob(
  job: JsonRecord,
  careersUrl: string,
  context: Pick<ScrapeContext, 'config'>,
  today: Date = new Date(),
): JobListing | undefined {
  const location = usLocationOf(job);
  if (!location) {
    return undefined;
  }

  const requisitionId = readString(job, 'Id');
  const title = normalizeTitle(readString(job, 'Title'), context.config);
  if (!requisitionId || !title) {
    return undefined;
  }

  return {
    title,
    url: joinUrl(careersUrl, requisitionId),
    location,
    postingDate: parseDate(readString(job, 'PostedDate'), today),
    detailKey: requisitionId,
  };
}

async function fetchJson(url: string, context: ScrapeContext): Promise<JsonRecord | null> {
  const response = await context.httpClient.requestMaybe(url, { headers: JSON_HEADERS });
  if (!response) {
    return null;
  }
  const parsed = parseJsonMaybe(response.body);
  return isRecord(parsed) ? parsed : null;
}

async function scrapeOracleListings(
  apiBase: string,
  siteNumber: string,
  company: CompanyRecord,
  context: ScrapeContext,
): Promise<JobListing[]> {
  const limit = context.config.oraclePageSize;
  const listings: JobListing[] = [];
  let total: number | undefined;
  let offset = 0;

  for (let page = 1; page <= context.maxPages; page += 1) {
    await context.logger.info(`Scraping page ${page} for ${company.company_name} (offset: ${offset})`);
    const payload = await fetchJson(buildOracleListUrl(apiBase, siteNumber, offset, limit), context);
    if (!payload) {
      await context.logger.warn('Failed to fetch page - stopping');
      break;
    }

    const top = readRecords(payload, 'items')[0];
    if (!top) {
      await context.logger.info('No items in API response - stopping');
      break;
    }

    if (total === undefined) {
      total = readNumber(top, 'TotalJobsCount');
      if (total !== undefined) {
        await context.logger.info(`Total jobs reported by API: ${total}`);
      }
    }

    const requisitions = readRecords(top, 'requisitionList');
    if (requisitions.length === 0) {
      await context.logger.info('No more jobs in requisitionList - stopping');
      break;
    }

    const pageListings = requisitions
      .map((job) => parseOracleJob(job, company.careers_url, context))
      .filter((listing): listing is JobListing => listing !== undefined);
    if (pageListings.length > 0) {
      listings.push(...pageListings);
      await context.logger.info(
        `  Found ${pageListings.length} US jobs on this page (${listings.length} total US)`,
      );
    }

    const fetchedSoFar = offset + requisitions.length;
    if (total !== undefined && fetchedSoFar >= total) {
      await context.logger.info(`Reached all ${total} jobs`);
      break;
    }
    if (requisitions.length < limit) {
      await context.logger.info('Last page (fewer results than limit)');
      break;
    }
    offset += limit;
  }

  return listings;
}

function optionalString(record: JsonRecord, key: string): string | undefined {
  const value = readString(record, key);
  return value && value.length > 0 ? value : undefined;
}

/** Detail payloads sometimes arrive wrapped in a single-item `items` array. */
export function toOracleDetail(payload: JsonRecord): OracleRequisitionDetail {
  const record = readRecords(payload, 'items')[0] ?? payload;
  return {
    Id: optionalString(record, 'Id'),
    Category: optionalString(record, 'Category'),
    StudyLevel: optionalString(record, 'StudyLevel'),
    OrganizationDescriptionStr: optionalString(record, 'OrganizationDescriptionStr'),
    ExternalDescriptionStr: optionalString(record, 'ExternalDescriptionStr'),
    ExternalResponsibilitiesStr: optionalString(record, 'ExternalResponsibilitiesStr'),
    ExternalQualificationsStr: optionalString(record, 'ExternalQualificationsStr'),
  };
}

async function fetchOracleDetail(
  listing: JobListing,
  apiBase: string,
  context: ScrapeContext,
): Promise<ExtractedJobFields> {
  if (!listing.detailKey) {
    return {};
  }
  await context.logger.debug(`Fetching Oracle CX job details: ID ${listing.detailKey}`);

  const payload = await fetchJson(buildOracleDetailUrl(apiBase, listing.detailKey), context);
  if (!payload) {
    return {};
  }
  return buildOracleDetailFields(toOracleDetail(payload), context.profile);
}

export async function scrapeOracle(company: CompanyRecord, context: ScrapeContext): Promise<ScrapedJob[]> {
  await context.logger.info(`Starting Oracle CX API scrape for ${company.company_name} (US only)`);

  const apiBase = extractOracleApiBase(company.careers_url);
  if (!apiBase) {
    throw new Error(`Invalid careers URL for ${company.company_name}: ${company.careers_url}`);
  }
  const siteNumber = await extractOracleSiteNumber(company.careers_url, context.logger);

  const listings = dedupeListings(await scrapeOracleListings(apiBase, siteNumber, company, context));
  if (listings.length === 0) {
    await context.logger.warn(`No US jobs found for ${company.company_name}`);
    return [];
  }
  await context.logger.info(`Found ${listings.length} US jobs for ${company.company_name}`);

  return attachDetails(listings, context, (listing) => fetchOracleDetail(listing, apiBase, context));
}
