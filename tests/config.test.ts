import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { DEFAULT_USER_AGENT, loadExtractionOverrides, loadScraperConfig } from '../src/config.js';
import { DEFAULT_EXTRACTION_PROFILE, mergeProfile } from '../src/extraction/patterns.js';
import { readCompaniesCsv } from '../src/utils/csv.js';

const REPO_CONFIG_DIR = fileURLToPath(new URL('../config/', import.meta.url));

describe('loadScraperConfig', () => {
  it('applies defaults under the project root', () => {
    const config = loadScraperConfig({}, '/srv/scraper');

    expect(config).toMatchObject({
      delayBetweenRequestsMs: 3000,
      delayBetweenCompaniesMs: 10000,
      maxRetries: 3,
      requestTimeoutMs: 30000,
      userAgent: DEFAULT_USER_AGENT,
      maxPagesPerCompany: 50,
      jobsPerPage: 20,
      oraclePageSize: 25,
      logLevel: 'INFO',
      respectRobotsTxt: true,
      filterByKeywords: false,
      dataDir: '/srv/scraper/data',
      logDir: '/srv/scraper/logs',
      exportDir: '/srv/scraper/data/exports',
      configDir: '/srv/scraper/config',
      dbPath: '/srv/scraper/data/semiconductor_jobs.db',
    });
    expect(config.email).toMatchObject({ sendOnCompletion: false, sendOnError: true });
  });

  it('reads overrides from the environment', () => {
    const config = loadScraperConfig(
      {
        SCRAPER_MAX_PAGES: '5',
        SCRAPER_RESPECT_ROBOTS: 'false',
        SCRAPER_LOG_LEVEL: 'debug',
        SCRAPER_DB_PATH: '/var/jobs.db',
        SMTP_HOST: 'smtp.test',
      },
      '/srv/scraper',
    );

    expect(config.maxPagesPerCompany).toBe(5);
    expect(config.respectRobotsTxt).toBe(false);
    expect(config.logLevel).toBe('DEBUG');
    expect(config.dbPath).toBe('/var/jobs.db');
    expect(config.email.host).toBe('smtp.test');
  });

  it('rejects numbers it cannot read', () => {
    expect(() => loadScraperConfig({ SCRAPER_MAX_RETRIES: 'abc' }, '/srv/scraper')).toThrow(
      'Invalid numeric value for SCRAPER_MAX_RETRIES: abc',
    );
  });
});

describe('loadExtractionOverrides', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'jobs-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('returns no overrides when the file is missing', async () => {
    expect((await loadExtractionOverrides(join(dir, 'missing.json'))).size).toBe(0);
  });

  it('merges an override over the default profile', async () => {
    const filePath = join(dir, 'overrides.json');
    await writeFile(
      filePath,
      JSON.stringify({
        'Acme Semi': {
          responsibilityHeadings: ['What\\s+you\\s+will\\s+do'],
          sectionPatterns: { salary: ['Pay:(.+)'] },
          boilerplate: { phrases: ['Acme is hiring\\.'] },
        },
      }),
      'utf8',
    );

    const override = (await loadExtractionOverrides(filePath)).get('Acme Semi');
    const profile = mergeProfile(DEFAULT_EXTRACTION_PROFILE, override);

    expect(profile.responsibilityHeadings).toEqual(['What\\s+you\\s+will\\s+do']);
    expect(profile.sectionPatterns.salary).toEqual(['Pay:(.+)']);
    expect(profile.sectionPatterns.education).toBe(DEFAULT_EXTRACTION_PROFILE.sectionPatterns.education);
    expect(profile.boilerplate.phrases).toEqual(['Acme is hiring\\.']);
    expect(profile.boilerplate.paragraphs).toBe(DEFAULT_EXTRACTION_PROFILE.boilerplate.paragraphs);
  });

  it('rejects malformed overrides', async () => {
    const filePath = join(dir, 'overrides.json');
    await writeFile(filePath, JSON.stringify({ Acme: { responsibilityHeadings: 'Duties' } }), 'utf8');

    await expect(loadExtractionOverrides(filePath)).rejects.toThrow(
      'Acme.responsibilityHeadings must be an array of strings',
    );
  });
});

describe('bundled configuration', () => {
  it('lists the tracked companies', async () => {
    const companies = await readCompaniesCsv(join(REPO_CONFIG_DIR, 'companies.csv'));
    expect(companies.map((company) => [company.company_name, company.platform])).toEqual([
      ['Applied Materials', 'workday'],
      ['NXP Semiconductors', 'workday'],
      ['Texas Instruments', 'oracle'],
    ]);
  });

  it('parses the shipped extraction overrides', async () => {
    const overrides = await loadExtractionOverrides(join(REPO_CONFIG_DIR, 'extraction_overrides.json'));
    expect([...overrides.keys()]).toEqual(['NXP Semiconductors']);
  });
});
