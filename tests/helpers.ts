import { vi } from 'vitest';
import type { ScrapeContext } from '../src/adapters/common.js';
import { loadScraperConfig } from '../src/config.js';
import type { ScraperConfig } from '../src/config.js';
import { DEFAULT_EXTRACTION_PROFILE } from '../src/extraction/patterns.js';
import { HttpClient } from '../src/utils/http.js';
import type { Logger } from '../src/utils/logger.js';

export const FAST_ENV = {
  SCRAPER_REQUEST_DELAY_MS: '0',
  SCRAPER_COMPANY_DELAY_MS: '0',
  SCRAPER_RETRY_DELAY_MS: '0',
  SCRAPER_MAX_RETRIES: '0',
};

export function testConfig(env: Record<string, string> = {}, root = '/srv/scraper'): ScraperConfig {
  return loadScraperConfig({ ...FAST_ENV, ...env }, root);
}

export interface RecordingLogger extends Logger {
  lines: string[];
}

export function recordingLogger(): RecordingLogger {
  const lines: string[] = [];
  const record = (level: string) => async (message: string) => {
    lines.push(`[${level}] ${message}`);
  };
  return {
    lines,
    debug: record('DEBUG'),
    info: record('INFO'),
    warn: record('WARN'),
    error: record('ERROR'),
  };
}

export function testContext(overrides: Partial<ScrapeContext> = {}): ScrapeContext {
  const config = overrides.config ?? testConfig();
  const logger = overrides.logger ?? recordingLogger();
  return {
    config,
    logger,
    httpClient: new HttpClient({ ...config, logger }),
    profile: DEFAULT_EXTRACTION_PROFILE,
    fetchDetails: true,
    maxPages: config.maxPagesPerCompany,
    ...overrides,
  };
}

function urlOf(input: string | URL | Request): string {
  if (typeof input === 'string') {
    return input;
  }
  return input instanceof URL ? input.toString() : input.url;
}

/** Replaces the global fetch; unmatched requests get a 404. */
export function stubFetch(handler: (url: string, init: RequestInit | undefined) => Response | undefined) {
  const fetchMock = vi.fn(async (input: string | URL | Request, init?: RequestInit) => {
    const url = urlOf(input);
    return handler(url, init) ?? new Response('not found', { status: 404 });
  });
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

export function jsonResponse(payload: unknown, status = 200): Response {
  return new Response(JSON.stringify(payload), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

export function htmlResponse(html: string, status = 200): Response {
  return new Response(html, { status, headers: { 'content-type': 'text/html' } });
}

export function requestedUrls(fetchMock: ReturnType<typeof stubFetch>): string[] {
  return fetchMock.mock.calls.map(([input]) => urlOf(input));
}
