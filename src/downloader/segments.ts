import path from 'node:path';
import { HlsError, describeError } from '../errors.js';
import type { HttpClient } from '../services/http.js';
import { mapPool, sleep } from '../utils/async.js';
import { fileExists, writeFileAtomic } from '../utils/fs.js';
import type { Logger } from '../utils/log.js';
import { segmentFileName } from './naming.js';

export type SegmentDownloadOptions = {
  outputDir: string;
  /** Maximum transfers in flight. */
  concurrency: number;
  /** Total attempts per segment, first one included. */
  maxAttempts: number;
  /** Attempt `i` (0-indexed) that fails is followed by a `(i + 1) * retryDelayMs` wait. */
  retryDelayMs: number;
  http: HttpClient;
  logger: Logger;
  now?: () => Date;
  signal?: AbortSignal;
};

export type SegmentOutcome = {
  url: string;
  filePath: string;
  /** False when the file was already on disk and no transfer happened. */
  transferred: boolean;
  attempts: number;
};

export type BatchResult = {
  outcomes: SegmentOutcome[];
  skipped: number;
};

/**
 * Downloads a batch of segment URLs into `outputDir`. Resolves once every
 * segment is on disk; if any segment exhausts its attempts, rejects with an
 * `exhausted_retries` error after the rest of the batch has settled.
 */
export async function downloadSegments(urls: readonly string[], opts: SegmentDownloadOptions): Promise<BatchResult> {
  const fetchedAt = (opts.now ?? (() => new Date()))();

  const settled = await mapPool(urls, opts.concurrency, async (url, index) => {
    const filePath = path.join(opts.outputDir, segmentFileName(url, index, fetchedAt));
    return await downloadWithRetry(url, filePath, opts);
  });

  const outcomes: SegmentOutcome[] = [];
  let firstFailure: unknown;
  let failures = 0;

  settled.forEach((result, index) => {
    if (result.status === 'fulfilled') {
      outcomes.push(result.value);
      opts.logger.debug(`Saved ${path.basename(result.value.filePath)}`);
      return;
    }
    failures++;
    firstFailure ??= result.reason;
    opts.logger.error(`Segment ${index} failed: ${describeError(result.reason)}`);
  });

  if (failures > 0) {
    throw firstFailure instanceof HlsError
      ? firstFailure
      : new HlsError('exhausted_retries', describeError(firstFailure), { cause: firstFailure });
  }

  return { outcomes, skipped: outcomes.filter((o) => !o.transferred).length };
}

async function downloadWithRetry(url: string, filePath: string, opts: SegmentDownloadOptions): Promise<SegmentOutcome> {
  if (await fileExists(filePath)) {
    return { url, filePath, transferred: false, attempts: 0 };
  }

  let lastError: unknown;
  for (let attempt = 0; attempt < opts.maxAttempts; attempt++) {
    try {
      // eslint-disable-next-line no-await-in-loop
      const body = await opts.http.get(url, opts.signal);
      // eslint-disable-next-line no-await-in-loop
      await writeFileAtomic(filePath, body);
      return { url, filePath, transferred: true, attempts: attempt + 1 };
    } catch (e) {
      lastError = e;
      if (opts.signal?.aborted) break;
      opts.logger.debug(`Attempt ${attempt + 1}/${opts.maxAttempts} for ${url} failed: ${describeError(e)}`);
    }

    if (attempt < opts.maxAttempts - 1) {
      // eslint-disable-next-line no-await-in-loop
      await sleep((attempt + 1) * opts.retryDelayMs, opts.signal);
    }
  }

  throw new HlsError(
    'exhausted_retries',
    `Giving up on ${url} after ${opts.maxAttempts} attempt(s): ${describeError(lastError)}`,
    { cause: lastError },
  );
}
