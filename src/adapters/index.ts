import type { CompanyRecord, Platform, ScrapedJob } from '../types.js';
import type { CompanyScraper, ScrapeContext } from './common.js';
import { scrapeOracle } from './oracle.js';
import { scrapeWorkday } from './workday.js';

const SCRAPER_BY_PLATFORM: Record<Platform, CompanyScraper> = {
  workday: scrapeWorkday,
  oracle: scrapeOracle,
  custom: async (company, context) => {
    await context.logger.warn(`Custom scraper not implemented for ${company.company_name}`);
    return [];
  },
};

export function scraperFor(platform: Platform): CompanyScraper {
  return SCRAPER_BY_PLATFORM[platform];
}

export async function runScraper(company: CompanyRecord, context: ScrapeContext): Promise<ScrapedJob[]> {
  return scraperFor(company.platform)(company, context);
}
