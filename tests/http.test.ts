import { afterEach, describe, expect, it, vi } from 'vitest';
import { HttpClient } from '../src/utils/http.js';
import { recordingLogger, requestedUrls, stubFetch, testConfig } from './helpers.js';

function client(env: Record<string, string> = {}) {
  const logger = recordingLogger();
  return { logger, httpClient: new HttpClient({ ...testConfig(env), logger }) };
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('HttpClient', () => {
  it('retries retryable statuses', async () => {
    let calls = 0;
    const fetchMock = stubFetch(() => {
      calls += 1;
      return calls === 1 ? new Response('busy', { status: 503 }) : new Response('ok');
    });
    const { httpClient, logger } = client({ SCRAPER_MAX_RETRIES: '1' });

    const result = await httpClient.request('https://example.com/jobs');

    expect(result.status).toBe(200);
    expect(result.body).toBe('ok');
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(logger.lines).toEqual(['[WARN] HTTP 503 for https://example.com/jobs (attempt 1)']);
  });

  it('returns null from requestMaybe for error statuses', async () => {
    stubFetch(() => new Response('missing', { status: 404 }));
    const { httpClient, logger } = client();

    expect(await httpClient.requestMaybe('https://example.com/missing')).toBeNull();
    expect(logger.lines).toEqual(['[WARN] HTTP 404 for https://example.com/missing']);
  });

  it('wraps network failures once retries run out', async () => {
    stubFetch(() => {
      throw new Error('socket hang up');
    });
    const { httpClient } = client();

    await expect(httpClient.request('https://example.com/x')).rejects.toThrow(
      'Request failed for https://example.com/x: Error: socket hang up',
    );
    expect(await httpClient.requestMaybe('https://example.com/x')).toBeNull();
  });

  it('follows redirects', async () => {
    const fetchMock = stubFetch((url) =>
      url === 'https://example.com/old'
        ? new Response(null, { status: 301, headers: { location: '/new' } })
        : new Response('moved here'),
    );
    const { httpClient } = client();

    const result = await httpClient.request('https://example.com/old');

    expect(result.url).toBe('https://example.com/new');
    expect(result.body).toBe('moved here');
    expect(requestedUrls(fetchMock)).toEqual(['https://example.com/old', 'https://example.com/new']);
  });

  it('cleans tracking parameters before requesting', async () => {
    const fetchMock = stubFetch(() => new Response('ok'));
    const { httpClient } = client();

    await httpClient.request('https://Example.com/jobs/?utm_source=mail&team=fab#top');

    expect(requestedUrls(fetchMock)).toEqual(['https://example.com/jobs?team=fab']);
  });

  it('sends the body and headers of a POST', async () => {
    const fetchMock = stubFetch(() => new Response('{}'));
    const { httpClient } = client();

    await httpClient.request('https://example.com/api', {
      method: 'POST',
      body: '{"q":1}',
      headers: { 'Content-Type': 'application/json' },
    });

    const init = fetchMock.mock.calls[0][1];
    expect(init?.method).toBe('POST');
    expect(init?.body).toBe('{"q":1}');
    expect(init?.headers).toMatchObject({ 'content-type': 'application/json', 'user-agent': testConfig().userAgent });
  });
});
