import { URL } from 'node:url';
import type { ScraperConfig } from '../config.js';
import type { FetchResult } from '../types.js';
import { sleep } from './concurrency.js';
import { nullLogger } from './logger.js';
import type { Logger } from './logger.js';
import { cleanUrl } from './url.js';

type HttpMethod = 'GET' | 'POST';

export interface RequestOptions {
  method?: HttpMethod;
  body?: string;
  timeoutMs?: number;
  /** Response text beyond this many characters is dropped. */
  maxChars?: number;
  retries?: number;
  headers?: Record<string, string>;
}

export type HttpClientOptions = Pick<
  ScraperConfig,
  'requestTimeoutMs' | 'userAgent' | 'delayBetweenRequestsMs' | 'maxRetries' | 'retryBaseDelayMs'
> & { logger?: Logger };

const RETRYABLE_STATUSES = new Set([408, 429]);
const MAX_REDIRECTS = 8;
const DEFAULT_ACCEPT = 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8';

function isRetryableStatus(status: number): boolean {
  return RETRYABLE_STATUSES.has(status) || (status >= 500 && status <= 599);
}

function isRedirect(status: number): boolean {
  return status >= 300 && status < 400;
}

function lowerCaseKeys(entries: Iterable<[string, string]>): Record<string, string> {
  return Object.fromEntries([...entries].map(([key, value]) => [key.toLowerCase(), value]));
}

/** Serializes requests per host and keeps a fixed gap between them. */
class DomainRateLimiter {
  private readonly tailByDomain = new Map<string, Promise<void>>();
  private readonly nextAllowedByDomain = new Map<string, number>();

  constructor(private readonly intervalMs: number) {}

  schedule<T>(domain: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tailByDomain.get(domain) ?? Promise.resolve();
    const run = previous.then(async () => {
      const waitMs = Math.max(0, (this.nextAllowedByDomain.get(domain) ?? 0) - Date.now());
      if (waitMs > 0) {
        await sleep(waitMs);
      }
      try {
        return await task();
      } finally {
        this.nextAllowedByDomain.set(domain, Date.now() + this.intervalMs);
      }
    });

    this.tailByDomain.set(
      domain,
      run.then(
        () => undefined,
        () => undefined,
      ),
    );
    return run;
  }
}

export class HttpClient {
  private readonly limiter: DomainRateLimiter;
  private readonly logger: Logger;

  constructor(private readonly options: HttpClientOptions) {
    this.limiter = new DomainRateLimiter(options.delayBetweenRequestsMs);
    this.logger = options.logger ?? nullLogger;
  }

  async request(rawUrl: string, options: RequestOptions = {}): Promise<FetchResult> {
    const retries = options.retries ?? this.options.maxRetries;
    const cleaned = cleanUrl(rawUrl);

    let lastError: unknown;
    for (let attempt = 0; attempt <= retries; attempt += 1) {
      try {
        const result = await this.requestWithRedirects(cleaned, options);
        if (isRetryableStatus(result.status) && attempt < retries) {
          await this.logger.warn(`HTTP ${result.status} for ${cleaned} (attempt ${attempt + 1})`);
          await sleep(this.backoffMs(attempt));
          continue;
        }
        return result;
      } catch (error) {
        lastError = error;
        await this.logger.warn(`Attempt ${attempt + 1} failed for ${cleaned}: ${String(error)}`);
        if (attempt >= retries) {
          break;
        }
        await sleep(this.backoffMs(attempt));
      }
    }

    throw new Error(`Request failed for ${cleaned}: ${String(lastError)}`);
  }

  /**
   * Returns `null` when the request cannot be completed or ends in an error
   * status, after retries.
   */
  async requestMaybe(rawUrl: string, options: RequestOptions = {}): Promise<FetchResult | null> {
    try {
      const result = await this.request(rawUrl, options);
      if (result.status >= 400) {
        await this.logger.warn(`HTTP ${result.status} for ${rawUrl}`);
        return null;
      }
      return result;
    } catch (error) {
      await this.logger.error(`Failed to fetch after retries: ${rawUrl}: ${String(error)}`);
      return null;
    }
  }

  private backoffMs(attempt: number): number {
    return this.options.retryBaseDelayMs * 2 ** attempt + Math.floor(Math.random() * 200);
  }

  private async requestWithRedirects(startUrl: string, options: RequestOptions): Promise<FetchResult> {
    let target = startUrl;
    let method: HttpMethod = options.method ?? 'GET';
    let body = options.body;

    for (let hops = 0; hops <= MAX_REDIRECTS; hops += 1) {
      const host = new URL(target).hostname.toLowerCase();
      const current = target;
      const result = await this.limiter.schedule(host, () => this.send(current, method, body, options));

      const location = result.headers.location;
      if (!location || !isRedirect(result.status)) {
        return result;
      }
      target = new URL(location, target).toString();
      // 303 always continues as a body-less GET.
      if (result.status === 303) {
        method = 'GET';
        body = undefined;
      }
    }

    throw new Error(`Too many redirects for ${startUrl}`);
  }

  private async send(
    url: string,
    method: HttpMethod,
    body: string | undefined,
    options: RequestOptions,
  ): Promise<FetchResult> {
    const headers = lowerCaseKeys([
      ['user-agent', this.options.userAgent],
      ['accept', DEFAULT_ACCEPT],
      ['accept-language', 'en-US,en;q=0.5'],
      ...Object.entries(options.headers ?? {}),
    ]);

    const response = await fetch(url, {
      method,
      headers,
      body: method === 'POST' ? body : undefined,
      redirect: 'manual',
      signal: AbortSignal.timeout(options.timeoutMs ?? this.options.requestTimeoutMs),
    });

    const responseHeaders = lowerCaseKeys(response.headers.entries());
    const text = await response.text();
    const limit = options.maxChars ?? 2_000_000;

    return {
      status: response.status,
      url: response.url || url,
      headers: responseHeaders,
      body: text.length > limit ? text.slice(0, limit) : text,
      contentType: responseHeaders['content-type'] ?? '',
    };
  }
}
