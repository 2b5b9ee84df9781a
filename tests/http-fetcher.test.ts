import { describe, expect, it, vi } from 'vitest';
import { classifyStatus, HttpFetcher } from '../packages/crawler/src/fetcher/http-fetcher';
import { fakeFetch, testContext } from './helpers';

const URL_UNDER_TEST = 'https://news.example.com/news/articles/abc123';

describe('classifyStatus', () => {
  it('treats 200 as success', () => {
    expect(classifyStatus(200, true)).toBe('success');
  });

  it('accepts 301 and 302 only when redirects are not followed', () => {
    expect(classifyStatus(301, false)).toBe('success');
    expect(classifyStatus(302, false)).toBe('success');
    expect(classifyStatus(301, true)).toBe('retryable');
  });

  it('never retries 403, 404 or 410', () => {
    expect(classifyStatus(403, true)).toBe('permanent');
    expect(classifyStatus(404, true)).toBe('permanent');
    expect(classifyStatus(410, false)).toBe('permanent');
  });

  it('retries everything else', () => {
    expect(classifyStatus(429, true)).toBe('retryable');
    expect(classifyStatus(500, true)).toBe('retryable');
    expect(classifyStatus(204, true)).toBe('retryable');
  });
});

describe('HttpFetcher', () => {
  it('returns the response on the third attempt after two 503s', async () => {
    const fetchImpl = fakeFetch({
      [URL_UNDER_TEST]: [{ status: 503 }, { status: 503 }, { status: 200, body: '<html>ok</html>' }],
    });
    const context = testContext(fetchImpl);

    const page = await new HttpFetcher(context).fetch(URL_UNDER_TEST);

    expect(page?.status).toBe(200);
    expect(page?.body).toBe('<html>ok</html>');
    expect(fetchImpl).toHaveBeenCalledTimes(3);
    // 1.5^0 + 0.5 seconds, then 1.5^1 + 0.5 seconds
    expect(context.sleep.mock.calls.map(call => call[0])).toEqual([1500, 2000]);
  });

  it('returns null immediately on 404 without retrying', async () => {
    const fetchImpl = fakeFetch({ [URL_UNDER_TEST]: { status: 404 } });
    const context = testContext(fetchImpl);

    const page = await new HttpFetcher(context).fetch(URL_UNDER_TEST);

    expect(page).toBeNull();
    expect(fetchImpl).toHaveBeenCalledTimes(1);
    expect(context.sleep).not.toHaveBeenCalled();
  });

  it('gives up after the retry ceiling without sleeping after the last attempt', async () => {
    const fetchImpl = fakeFetch({ [URL_UNDER_TEST]: { status: 500 } });
    const context = testContext(fetchImpl);

    const page = await new HttpFetcher(context).fetch(URL_UNDER_TEST);

    expect(page).toBeNull();
    expect(fetchImpl).toHaveBeenCalledTimes(3);
    expect(context.sleep).toHaveBeenCalledTimes(2);
  });

  it('retries network errors', async () => {
    const fetchImpl = fakeFetch({
      [URL_UNDER_TEST]: [new Error('socket hang up'), { status: 200, body: 'recovered' }],
    });
    const context = testContext(fetchImpl);

    const page = await new HttpFetcher(context).fetch(URL_UNDER_TEST);

    expect(page?.body).toBe('recovered');
    expect(fetchImpl).toHaveBeenCalledTimes(2);
    expect(context.sleep.mock.calls.map(call => call[0])).toEqual([1500]);
  });

  it('honours a custom retry ceiling', async () => {
    const fetchImpl = fakeFetch({ [URL_UNDER_TEST]: { status: 502 } });
    const context = testContext(fetchImpl, { maxRetries: 5 });

    await new HttpFetcher(context).fetch(URL_UNDER_TEST);

    expect(fetchImpl).toHaveBeenCalledTimes(5);
  });

  it('returns redirects as-is when redirects are not followed', async () => {
    const fetchImpl = fakeFetch({ [URL_UNDER_TEST]: { status: 301 } });
    const context = testContext(fetchImpl);

    const page = await new HttpFetcher(context).fetch(URL_UNDER_TEST, { allowRedirects: false });

    expect(page?.status).toBe(301);
    expect(fetchImpl.mock.calls[0]?.[1]?.redirect).toBe('manual');
  });

  it('sends a user agent from the pool and the language preference', async () => {
    const fetchImpl = fakeFetch({ [URL_UNDER_TEST]: { status: 200 } });
    const context = testContext(fetchImpl, {
      userAgents: ['agent-a', 'agent-b'],
      acceptLanguage: 'fr-FR,fr;q=0.8',
    });

    await new HttpFetcher(context).fetch(URL_UNDER_TEST);

    const init = fetchImpl.mock.calls[0]?.[1];
    const headers = new Headers(init?.headers);
    // random() is 0.5, so index 1 of 2
    expect(headers.get('User-Agent')).toBe('agent-b');
    expect(headers.get('Accept-Language')).toBe('fr-FR,fr;q=0.8');
    expect(init?.redirect).toBe('follow');
  });

  it('times out a body that stalls after the headers arrive', async () => {
    const fetchImpl = vi.fn(async (_url: string, init?: RequestInit): Promise<Response> => {
      const body = new ReadableStream<Uint8Array>({
        start(controller) {
          controller.enqueue(new TextEncoder().encode('<html>'));
          init?.signal?.addEventListener('abort', () =>
            controller.error(Object.assign(new Error('The operation was aborted'), { name: 'AbortError' }))
          );
        },
      });
      return new Response(body, { status: 200 });
    });
    const context = testContext(fetchImpl, { requestTimeoutMs: 20, maxRetries: 2 });

    const page = await new HttpFetcher(context).fetch(URL_UNDER_TEST);

    expect(page).toBeNull();
    expect(fetchImpl).toHaveBeenCalledTimes(2);
    expect(context.sleep).toHaveBeenCalledTimes(1);
  });

  it('cancels the body of a response it does not use', async () => {
    const cancelled = vi.fn();
    const fetchImpl = vi.fn(
      async (_url: string, _init?: RequestInit): Promise<Response> =>
        new Response(new ReadableStream<Uint8Array>({ cancel: cancelled }), { status: 404 })
    );
    const context = testContext(fetchImpl);

    const page = await new HttpFetcher(context).fetch(URL_UNDER_TEST);

    expect(page).toBeNull();
    expect(cancelled).toHaveBeenCalledTimes(1);
  });
});
