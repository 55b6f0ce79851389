import { describe, expect, it } from 'vitest';
import { runScraper, scraperFor } from '../src/adapters/index.js';
import { scrapeOracle } from '../src/adapters/oracle.js';
import { scrapeWorkday } from '../src/adapters/workday.js';
import type { CompanyRecord } from '../src/types.js';
import { recordingLogger, testContext } from './helpers.js';

describe('scraper registry', () => {
  it('maps platforms to scrapers', () => {
    expect(scraperFor('workday')).toBe(scrapeWorkday);
    expect(scraperFor('oracle')).toBe(scrapeOracle);
  });

  it('returns nothing for custom platforms', async () => {
    const logger = recordingLogger();
    const company: CompanyRecord = {
      company_name: 'Delta Devices',
      careers_url: 'https://delta.example.com',
      platform: 'custom',
      active: true,
    };

    expect(await runScraper(company, testContext({ logger }))).toEqual([]);
    expect(logger.lines).toEqual(['[WARN] Custom scraper not implemented for Delta Devices']);
  });
});
