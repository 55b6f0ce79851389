import { afterEach, describe, expect, it, vi } from 'vitest';
import { isPathDisallowed, isScrapingAllowed, wildcardDisallowRules } from '../src/net/robots.js';
import { HttpClient } from '../src/utils/http.js';
import { recordingLogger, requestedUrls, stubFetch, testConfig } from './helpers.js';

const ROBOTS = [
  'User-agent: Googlebot',
  'Disallow: /search',
  '',
  'User-agent: *',
  'Disallow: /hcmUI/   # candidate pages',
  'Disallow:',
  'Allow: /public',
].join('\n');

const CAREERS_URL = 'https://edbz.fa.us2.oraclecloud.com/hcmUI/CandidateExperience/en/sites/CX/jobs';

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('robots rules', () => {
  it('collects disallow rules for the wildcard agent only', () => {
    expect(wildcardDisallowRules(ROBOTS)).toEqual(['/hcmUI/']);
  });

  it('matches paths by prefix', () => {
    expect(isPathDisallowed(ROBOTS, '/hcmUI/CandidateExperience/en/sites/CX/jobs')).toBe(true);
    expect(isPathDisallowed(ROBOTS, '/private')).toBe(false);
    expect(isPathDisallowed('User-agent: *\nDisallow: /jobs*', '/jobs/123')).toBe(true);
  });

  it('compares paths case-sensitively', () => {
    expect(isPathDisallowed(ROBOTS, '/hcmui/CandidateExperience')).toBe(false);
  });

  it('expands wildcards and honours the end anchor', () => {
    const robots = 'User-agent: *\nDisallow: /*/apply\nDisallow: /*.pdf$';
    expect(isPathDisallowed(robots, '/en-US/apply')).toBe(true);
    expect(isPathDisallowed(robots, '/en-US/jobs')).toBe(false);
    expect(isPathDisallowed(robots, '/files/brochure.pdf')).toBe(true);
    expect(isPathDisallowed(robots, '/files/brochure.pdf?v=2')).toBe(false);
  });
});

describe('isScrapingAllowed', () => {
  it('refuses a disallowed careers path', async () => {
    const fetchMock = stubFetch((url) => (url.endsWith('/robots.txt') ? new Response(ROBOTS) : undefined));
    const logger = recordingLogger();
    const httpClient = new HttpClient({ ...testConfig(), logger });

    expect(await isScrapingAllowed(CAREERS_URL, httpClient, logger)).toBe(false);
    expect(requestedUrls(fetchMock)).toEqual(['https://edbz.fa.us2.oraclecloud.com/robots.txt']);
    expect(logger.lines).toContain('[WARN] robots.txt disallows scraping /hcmUI/CandidateExperience/en/sites/CX/jobs');
  });

  it('allows scraping when robots.txt is missing', async () => {
    stubFetch(() => undefined);
    const logger = recordingLogger();
    const httpClient = new HttpClient({ ...testConfig(), logger });

    expect(await isScrapingAllowed(CAREERS_URL, httpClient, logger)).toBe(true);
    expect(logger.lines).toContain('[DEBUG] Could not fetch robots.txt for https://edbz.fa.us2.oraclecloud.com');
  });
});
