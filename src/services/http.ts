import { FetchError, describeError } from '../errors.js';

export interface HttpClient {
  /** Resolves with the full response body, or rejects with a `FetchError`. */
  get(url: string, signal?: AbortSignal): Promise<Uint8Array>;
}

export class FetchHttpClient implements HttpClient {
  public constructor(private readonly headers: Record<string, string> = {}) {}

  async get(url: string, signal?: AbortSignal): Promise<Uint8Array> {
    const init: RequestInit = {
      method: 'GET',
      redirect: 'follow',
      headers: this.headers,
    };
    if (signal) init.signal = signal;

    let resp: Response;
    try {
      resp = await fetch(url, init);
    } catch (e) {
      throw new FetchError({ url, message: `Request to ${url} failed: ${describeError(e)}`, cause: e });
    }

    if (!resp.ok) {
      const body = await resp.text().catch(() => '');
      throw new FetchError({
        url,
        status: resp.status,
        message: `GET ${url} returned HTTP ${resp.status}`,
        bodySnippet: body.slice(0, 500),
      });
    }

    try {
      return new Uint8Array(await resp.arrayBuffer());
    } catch (e) {
      throw new FetchError({ url, message: `Reading body of ${url} failed: ${describeError(e)}`, cause: e });
    }
  }
}

const decoder = new TextDecoder('utf-8');

export async function fetchText(http: HttpClient, url: string, signal?: AbortSignal): Promise<string> {
  return decoder.decode(await http.get(url, signal));
}

/** Parses `Name: value` header flags. Throws on a line without a colon or name. */
export function parseHeaderLines(lines: readonly string[]): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const line of lines) {
    const idx = line.indexOf(':');
    const name = idx >= 0 ? line.slice(0, idx).trim() : '';
    if (!name) throw new Error(`Invalid header "${line}", expected "Name: value"`);
    headers[name.toLowerCase()] = line.slice(idx + 1).trim();
  }
  return headers;
}
