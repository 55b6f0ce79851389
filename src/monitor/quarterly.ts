import { join } from 'node:path';
import { runScraper } from '../adapters/index.js';
import type { CompanyScraper, ScrapeContext } from '../adapters/common.js';
import { loadExtractionOverrides, loadScraperConfig } from '../config.js';
import type { ScraperConfig } from '../config.js';
import { JobsDatabase } from '../db/sqlite.js';
import { sendSummaryEmail } from '../email/summary.js';
import { DEFAULT_EXTRACTION_PROFILE, mergeProfile } from '../extraction/patterns.js';
import type { ExtractionProfileOverride } from '../extraction/patterns.js';
import { filterJobsByKeywords, KeywordMatcher } from '../filters/keywords.js';
import { isScrapingAllowed } from '../net/robots.js';
import { COMBINED_EXPORT_NAME, compactDate, writeJobsCsv } from '../storage/exports.js';
import type { CompanyRecord, ScrapedJob } from '../types.js';
import { sleep } from '../utils/concurrency.js';
import { readCompaniesCsv } from '../utils/csv.js';
import { HttpClient } from '../utils/http.js';
import { RunLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';
import type { CompanyRunResult, QuarterLabel, QuarterlyRunOptions, QuarterlyRunSummary } from './types.js';

const BANNER = '========================================';

export interface QuarterlyDependencies {
  config?: ScraperConfig;
  /** Used as is; a `RunLogger` under the log directory is opened otherwise. */
  logger?: Logger;
  httpClient?: HttpClient;
  scrape?: CompanyScraper;
  now?: () => Date;
  sendEmail?: typeof sendSummaryEmail;
}

export function getCurrentQuarter(date: Date = new Date()): QuarterLabel {
  const quarter = Math.floor(date.getMonth() / 3) + 1;
  const year = date.getFullYear();
  return { quarter, year, label: `Q${quarter}_${year}` };
}

function isAllCompanies(target: string): boolean {
  return target.trim().toLowerCase() === 'all';
}

export function selectCompanies(companies: CompanyRecord[], target: string): CompanyRecord[] {
  if (isAllCompanies(target)) {
    return companies;
  }
  const wanted = target.trim().toLowerCase();
  const selected = companies.filter((company) => company.company_name.toLowerCase() === wanted);
  if (selected.length === 0) {
    throw new Error(`Company not found: ${target}`);
  }
  return selected;
}

interface CompanyRunEnv {
  db: JobsDatabase;
  config: ScraperConfig;
  logger: Logger;
  httpClient: HttpClient;
  scrape: CompanyScraper;
  overrides: Map<string, ExtractionProfileOverride>;
  keywordMatcher: KeywordMatcher | null;
  options: QuarterlyRunOptions;
  now: () => Date;
}

async function scrapeCompany(company: CompanyRecord, env: CompanyRunEnv): Promise<CompanyRunResult> {
  const { db, config, logger, httpClient } = env;
  const base: CompanyRunResult = {
    companyName: company.company_name,
    platform: company.platform,
    status: 'completed',
    jobsFound: 0,
    jobsNew: 0,
    jobsUpdated: 0,
  };

  await logger.info(BANNER);
  await logger.info(`Starting scrape for: ${company.company_name}`);
  await logger.info(BANNER);

  const runId = db.startScrapeRun(company.company_name, env.now());

  if (config.respectRobotsTxt && !(await isScrapingAllowed(company.careers_url, httpClient, logger))) {
    const errorMessage = 'Skipped: robots.txt disallows the careers path';
    db.completeScrapeRun(runId, { jobsFound: 0, jobsNew: 0, jobsUpdated: 0, errorMessage }, env.now());
    return { ...base, runId, status: 'skipped', errorMessage };
  }

  const context: ScrapeContext = {
    httpClient,
    logger,
    config,
    profile: mergeProfile(DEFAULT_EXTRACTION_PROFILE, env.overrides.get(company.company_name)),
    fetchDetails: env.options.fetchDetails,
    maxPages: env.options.maxPages ?? config.maxPagesPerCompany,
  };

  let jobs: ScrapedJob[];
  try {
    jobs = await env.scrape(company, context);
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    await logger.error(`Error scraping ${company.company_name}: ${errorMessage}`);
    db.completeScrapeRun(
      runId,
      { jobsFound: 0, jobsNew: 0, jobsUpdated: 0, status: 'failed', errorMessage },
      env.now(),
    );
    return { ...base, runId, status: 'failed', errorMessage };
  }

  if (env.keywordMatcher) {
    const before = jobs.length;
    jobs = filterJobsByKeywords(jobs, env.keywordMatcher);
    await logger.info(`Keyword filter kept ${jobs.length} of ${before} jobs`);
  }

  const saved = db.saveJobs(jobs, company.company_name, runId);
  await logger.info(`Saved ${saved.new} new jobs and updated ${saved.updated} existing jobs`);
  db.completeScrapeRun(
    runId,
    { jobsFound: jobs.length, jobsNew: saved.new, jobsUpdated: saved.updated },
    env.now(),
  );

  const exportPath = await writeJobsCsv(
    config.exportDir,
    company.company_name,
    db.getJobsForExport({ companyName: company.company_name, runIds: [runId] }),
    env.now(),
  );
  if (exportPath) {
    await logger.info(`Exported jobs to: ${exportPath}`);
  }

  await logger.info(`Completed scrape for: ${company.company_name}`);
  return {
    ...base,
    runId,
    jobsFound: jobs.length,
    jobsNew: saved.new,
    jobsUpdated: saved.updated,
    exportPath: exportPath ?? undefined,
  };
}

export async function runQuarterlyScrape(
  options: QuarterlyRunOptions,
  deps: QuarterlyDependencies = {},
): Promise<QuarterlyRunSummary> {
  const now = deps.now ?? (() => new Date());
  const config = deps.config ?? loadScraperConfig();
  const startedAt = now();
  const quarter = getCurrentQuarter(startedAt);

  let logger: Logger;
  let runLogger: RunLogger | null = null;
  if (deps.logger) {
    logger = deps.logger;
  } else {
    runLogger = new RunLogger(join(config.logDir, `scrape_${compactDate(startedAt)}.log`), {
      runLabel: `Quarterly scrape ${quarter.label}`,
      minLevel: config.logLevel,
      verbose: config.verbose,
    });
    await runLogger.init();
    logger = runLogger;
  }

  const httpClient = deps.httpClient ?? new HttpClient({ ...config, logger });
  const db = await JobsDatabase.open(config.dbPath);

  try {
    await logger.info(BANNER);
    await logger.info(isAllCompanies(options.target) ? 'STARTING QUARTERLY SCRAPE' : 'STARTING SCRAPE');
    await logger.info(`Quarter: ${quarter.label}`);
    await logger.info(BANNER);

    const companies = await readCompaniesCsv(join(config.configDir, 'companies.csv'));
    const overrides = await loadExtractionOverrides(join(config.configDir, 'extraction_overrides.json'));
    const added = db.syncCompanies(companies);
    await logger.info(`Loaded ${companies.length} active companies (${added} new in database)`);

    const selected = selectCompanies(companies, options.target);
    const env: CompanyRunEnv = {
      db,
      config,
      logger,
      httpClient,
      scrape: deps.scrape ?? runScraper,
      overrides,
      keywordMatcher: config.filterByKeywords ? new KeywordMatcher() : null,
      options,
      now,
    };

    const results: CompanyRunResult[] = [];
    for (const [index, company] of selected.entries()) {
      results.push(await scrapeCompany(company, env));
      await db.save();

      if (index < selected.length - 1 && config.delayBetweenCompaniesMs > 0) {
        await logger.info(`Waiting ${config.delayBetweenCompaniesMs / 1000} seconds before next company...`);
        await sleep(config.delayBetweenCompaniesMs);
      }
    }

    let combinedExportPath: string | null = null;
    if (isAllCompanies(options.target)) {
      const runIds = results
        .map((result) => result.runId)
        .filter((runId): runId is number => runId !== undefined);
      combinedExportPath = await writeJobsCsv(
        config.exportDir,
        COMBINED_EXPORT_NAME,
        db.getJobsForExport({ runIds }),
        now(),
      );
      if (combinedExportPath) {
        await logger.info(`Exported jobs to: ${combinedExportPath}`);
      }
    }

    const finishedAt = now();
    const durationMinutes = (finishedAt.getTime() - startedAt.getTime()) / 60_000;
    const summary: QuarterlyRunSummary = {
      quarter,
      startedAt: startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      durationMinutes,
      companies: results,
      totalJobs: results.reduce((sum, result) => sum + result.jobsFound, 0),
      combinedExportPath: combinedExportPath ?? undefined,
    };

    await logger.info(BANNER);
    await logger.info('SCRAPING COMPLETED');
    await logger.info(`Total duration: ${durationMinutes.toFixed(2)} minutes`);
    await logger.info(`Total jobs: ${summary.totalJobs}`);
    await logger.info(BANNER);

    try {
      const emailResult = await (deps.sendEmail ?? sendSummaryEmail)(config.email, summary);
      if (emailResult.sent) {
        await logger.info('Summary email sent.');
      } else {
        await logger.debug(`Summary email not sent: ${emailResult.reason ?? 'unknown reason'}`);
      }
    } catch (error) {
      await logger.warn(`Summary email failed: ${String(error)}`);
    }

    return summary;
  } catch (error) {
    await logger.error(`Quarterly scrape failed: ${String(error)}`);
    throw error;
  } finally {
    await db.save();
    db.close();
    if (runLogger) {
      await runLogger.close();
    }
  }
}
