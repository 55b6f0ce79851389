import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { ExtractionProfileOverride, PatternLike, SectionPatterns } from './extraction/patterns.js';
import { isRecord } from './utils/json.js';
import type { JsonRecord } from './utils/json.js';
import type { LogLevel } from './utils/logger.js';

export interface EmailSettings {
  host?: string;
  port?: string;
  user?: string;
  pass?: string;
  from?: string;
  to?: string;
  sendOnCompletion: boolean;
  sendOnError: boolean;
}

export interface ScraperConfig {
  delayBetweenRequestsMs: number;
  delayBetweenCompaniesMs: number;
  maxRetries: number;
  retryBaseDelayMs: number;
  requestTimeoutMs: number;
  userAgent: string;
  maxPagesPerCompany: number;
  jobsPerPage: number;
  oraclePageSize: number;
  minJobTitleLength: number;
  maxJobTitleLength: number;
  logLevel: LogLevel;
  verbose: boolean;
  respectRobotsTxt: boolean;
  filterByKeywords: boolean;
  dataDir: string;
  logDir: string;
  exportDir: string;
  configDir: string;
  dbPath: string;
  email: EmailSettings;
}

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36 SemiconductorJobsScraper/1.0';

type Env = Record<string, string | undefined>;

function envNumber(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new Error(`Invalid numeric value for ${key}: ${raw}`);
  }
  return parsed;
}

function envFlag(env: Env, key: string, fallback: boolean): boolean {
  const raw = env[key]?.trim().toLowerCase();
  if (!raw) {
    return fallback;
  }
  return raw === '1' || raw === 'true' || raw === 'yes';
}

function envLogLevel(env: Env): LogLevel {
  const raw = env.SCRAPER_LOG_LEVEL?.trim().toUpperCase();
  if (raw === 'DEBUG' || raw === 'INFO' || raw === 'WARN' || raw === 'ERROR') {
    return raw;
  }
  return 'INFO';
}

export function loadScraperConfig(env: Env = process.env, projectRoot = process.cwd()): ScraperConfig {
  const dataDir = env.SCRAPER_DATA_DIR ?? join(projectRoot, 'data');
  const configDir = env.SCRAPER_CONFIG_DIR ?? join(projectRoot, 'config');

  return {
    delayBetweenRequestsMs: envNumber(env, 'SCRAPER_REQUEST_DELAY_MS', 3000),
    delayBetweenCompaniesMs: envNumber(env, 'SCRAPER_COMPANY_DELAY_MS', 10000),
    maxRetries: envNumber(env, 'SCRAPER_MAX_RETRIES', 3),
    retryBaseDelayMs: envNumber(env, 'SCRAPER_RETRY_DELAY_MS', 6000),
    requestTimeoutMs: envNumber(env, 'SCRAPER_REQUEST_TIMEOUT_MS', 30000),
    userAgent: env.SCRAPER_USER_AGENT ?? DEFAULT_USER_AGENT,
    maxPagesPerCompany: envNumber(env, 'SCRAPER_MAX_PAGES', 50),
    jobsPerPage: envNumber(env, 'SCRAPER_JOBS_PER_PAGE', 20),
    oraclePageSize: envNumber(env, 'SCRAPER_ORACLE_PAGE_SIZE', 25),
    minJobTitleLength: 3,
    maxJobTitleLength: 200,
    logLevel: envLogLevel(env),
    verbose: envFlag(env, 'SCRAPER_VERBOSE', true),
    respectRobotsTxt: envFlag(env, 'SCRAPER_RESPECT_ROBOTS', true),
    filterByKeywords: envFlag(env, 'SCRAPER_FILTER_KEYWORDS', false),
    dataDir,
    logDir: env.SCRAPER_LOG_DIR ?? join(projectRoot, 'logs'),
    exportDir: join(dataDir, 'exports'),
    configDir,
    dbPath: env.SCRAPER_DB_PATH ?? join(dataDir, 'semiconductor_jobs.db'),
    email: {
      host: env.SMTP_HOST,
      port: env.SMTP_PORT,
      user: env.SMTP_USER,
      pass: env.SMTP_PASS,
      from: env.EMAIL_FROM,
      to: env.EMAIL_TO,
      sendOnCompletion: envFlag(env, 'EMAIL_SEND_ON_COMPLETION', false),
      sendOnError: envFlag(env, 'EMAIL_SEND_ON_ERROR', true),
    },
  };
}

const LIST_KEYS = [
  'responsibilityHeadings',
  'looseResponsibilityHeadings',
  'minimumRequirementHeadings',
  'preferredQualificationHeadings',
] as const;

const SECTION_KEYS: ReadonlyArray<keyof SectionPatterns> = [
  'responsibilities',
  'education',
  'experience',
  'preferredQualifications',
  'salary',
];

function requireStrings(record: JsonRecord, key: string, where: string): PatternLike[] | undefined {
  const value = record[key];
  if (value === undefined) {
    return undefined;
  }
  if (!Array.isArray(value) || !value.every((item) => typeof item === 'string')) {
    throw new Error(`${where}.${key} must be an array of strings`);
  }
  return value.filter((item): item is string => typeof item === 'string');
}

function requireString(record: JsonRecord, key: string, where: string): string | undefined {
  const value = record[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new Error(`${where}.${key} must be a string`);
  }
  return value;
}

export function parseProfileOverride(value: unknown, where: string): ExtractionProfileOverride {
  if (!isRecord(value)) {
    throw new Error(`${where} must be an object`);
  }

  const override: ExtractionProfileOverride = {};
  for (const key of LIST_KEYS) {
    const list = requireStrings(value, key, where);
    if (list) {
      override[key] = list;
    }
  }

  const salaryRangePattern = requireString(value, 'salaryRangePattern', where);
  if (salaryRangePattern !== undefined) {
    override.salaryRangePattern = salaryRangePattern;
  }
  const exportControlPattern = requireString(value, 'exportControlPattern', where);
  if (exportControlPattern !== undefined) {
    override.exportControlPattern = exportControlPattern;
  }

  const sectionPatterns = value.sectionPatterns;
  if (sectionPatterns !== undefined) {
    if (!isRecord(sectionPatterns)) {
      throw new Error(`${where}.sectionPatterns must be an object`);
    }
    const sections: Partial<SectionPatterns> = {};
    for (const key of SECTION_KEYS) {
      const list = requireStrings(sectionPatterns, key, `${where}.sectionPatterns`);
      if (list) {
        sections[key] = list;
      }
    }
    override.sectionPatterns = sections;
  }

  const boilerplate = value.boilerplate;
  if (boilerplate !== undefined) {
    if (!isRecord(boilerplate)) {
      throw new Error(`${where}.boilerplate must be an object`);
    }
    const phrases = requireStrings(boilerplate, 'phrases', `${where}.boilerplate`);
    const paragraphs = requireStrings(boilerplate, 'paragraphs', `${where}.boilerplate`);
    override.boilerplate = {
      ...(phrases ? { phrases } : {}),
      ...(paragraphs ? { paragraphs } : {}),
    };
  }

  return override;
}

/**
 * Reads per-company extraction overrides keyed by company name. A missing
 * file means no overrides.
 */
export async function loadExtractionOverrides(filePath: string): Promise<Map<string, ExtractionProfileOverride>> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf8');
  } catch (error) {
    if (isRecord(error) && error.code === 'ENOENT') {
      return new Map();
    }
    throw error;
  }

  const parsed: unknown = JSON.parse(content);
  if (!isRecord(parsed)) {
    throw new Error(`Extraction overrides in ${filePath} must be an object keyed by company name`);
  }

  const overrides = new Map<string, ExtractionProfileOverride>();
  for (const [companyName, value] of Object.entries(parsed)) {
    overrides.set(companyName, parseProfileOverride(value, companyName));
  }
  return overrides;
}
