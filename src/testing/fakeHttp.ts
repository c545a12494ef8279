import { setTimeout as delay } from 'node:timers/promises';
import { FetchError } from '../errors.js';
import type { HttpClient } from '../services/http.js';

export type FakeResponse = string | Error | (() => string | Error);

/**
 * In-process HttpClient. Each URL answers from a queue of responses; the last
 * one repeats. Tracks call counts and the peak number of concurrent requests.
 */
export class FakeHttpClient implements HttpClient {
  inFlight = 0;
  maxInFlight = 0;
  readonly calls = new Map<string, number>();
  private readonly routes = new Map<string, FakeResponse[]>();
  private readonly encoder = new TextEncoder();

  public constructor(private readonly latencyMs = 0) {}

  route(url: string, ...responses: FakeResponse[]): this {
    this.routes.set(url, responses);
    return this;
  }

  callsTo(url: string): number {
    return this.calls.get(url) ?? 0;
  }

  async get(url: string): Promise<Uint8Array> {
    const n = this.callsTo(url);
    this.calls.set(url, n + 1);
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      if (this.latencyMs > 0) await delay(this.latencyMs);

      const queue = this.routes.get(url) ?? [];
      const picked = queue[Math.min(n, queue.length - 1)];
      const response = typeof picked === 'function' ? picked() : picked;
      if (response === undefined) {
        throw new FetchError({ url, status: 404, message: `GET ${url} returned HTTP 404` });
      }
      if (response instanceof Error) throw response;
      return this.encoder.encode(response);
    } finally {
      this.inFlight--;
    }
  }
}
