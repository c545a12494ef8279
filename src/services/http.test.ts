import { afterEach, describe, expect, it, vi } from 'vitest';
import { FetchError } from '../errors.js';
import { FetchHttpClient, fetchText, parseHeaderLines } from './http.js';

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('FetchHttpClient', () => {
  it('returns the body and sends the configured headers', async () => {
    const fetchMock = vi.fn(async () => new Response('#EXTM3U\n', { status: 200 }));
    vi.stubGlobal('fetch', fetchMock);
    const http = new FetchHttpClient({ 'user-agent': 'test-agent' });

    const text = await fetchText(http, 'https://h/live.m3u8');

    expect(text).toBe('#EXTM3U\n');
    expect(fetchMock).toHaveBeenCalledWith('https://h/live.m3u8', {
      method: 'GET',
      redirect: 'follow',
      headers: { 'user-agent': 'test-agent' },
    });
  });

  it('rejects a non-2xx response with a FetchError', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('gone', { status: 404 })));

    const err = await new FetchHttpClient().get('https://h/seg1.ts').catch((e: unknown) => e);

    expect(err).toBeInstanceOf(FetchError);
    expect(err).toMatchObject({ kind: 'fetch_failure', status: 404, url: 'https://h/seg1.ts', bodySnippet: 'gone' });
  });

  it('wraps transport errors', async () => {
    const cause = new TypeError('fetch failed');
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => {
        throw cause;
      }),
    );

    const err = await new FetchHttpClient().get('https://h/seg1.ts').catch((e: unknown) => e);

    expect(err).toBeInstanceOf(FetchError);
    expect(err).toMatchObject({ kind: 'fetch_failure', cause, message: 'Request to https://h/seg1.ts failed: fetch failed' });
  });
});

describe('parseHeaderLines', () => {
  it('splits on the first colon and lower-cases names', () => {
    expect(parseHeaderLines(['Referer: https://example.com/', 'X-Token:abc'])).toEqual({
      referer: 'https://example.com/',
      'x-token': 'abc',
    });
  });

  it('rejects a line without a header name', () => {
    expect(() => parseHeaderLines(['no-colon'])).toThrowError(/Invalid header/);
    expect(() => parseHeaderLines([': value'])).toThrowError(/Invalid header/);
  });
});
