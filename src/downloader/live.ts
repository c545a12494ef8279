import path from 'node:path';
import type { DownloaderConfig } from '../config.js';
import { HlsError, describeError, isHlsError } from '../errors.js';
import { parsePlaylist } from '../playlist/parser.js';
import { deriveSegmentId } from '../playlist/segmentId.js';
import { fetchText, type HttpClient } from '../services/http.js';
import { sleep } from '../utils/async.js';
import { ensureDir } from '../utils/fs.js';
import type { Logger } from '../utils/log.js';
import { SegmentLedger } from './ledger.js';
import { deriveOutputDirName } from './naming.js';
import { downloadSegments, type SegmentOutcome } from './segments.js';

const DEFAULT_MAX_REDIRECTS = 5;

export type FilterStats = {
  total: number;
  fresh: number;
  invalidUrl: number;
  invalidName: number;
  alreadyDownloaded: number;
};

export type FilterResult = {
  urls: string[];
  stats: FilterStats;
};

export type CycleReport = {
  /** The media playlist the segments came from, after any master redirect. */
  playlistUrl: string;
  stats: FilterStats;
  downloaded: SegmentOutcome[];
};

export class LiveHlsDownloader {
  private readonly ledger = new SegmentLedger();
  private readonly config: DownloaderConfig;
  private readonly http: HttpClient;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly maxRedirects: number;

  public constructor(params: {
    config: DownloaderConfig;
    http: HttpClient;
    logger: Logger;
    now?: () => Date;
    maxRedirects?: number;
  }) {
    this.config = params.config;
    this.http = params.http;
    this.logger = params.logger;
    this.now = params.now ?? (() => new Date());
    this.maxRedirects = params.maxRedirects ?? DEFAULT_MAX_REDIRECTS;
  }

  get downloadedCount(): number {
    return this.ledger.size;
  }

  /**
   * Creates the output directory and polls `playlistUrl` until `signal`
   * aborts. Rejects only when the output directory cannot be set up.
   * Resolves with the output directory.
   */
  async start(playlistUrl: string, opts: { signal?: AbortSignal } = {}): Promise<string> {
    const outputDir = await this.prepareOutputDir(playlistUrl);

    this.logger.info(`Polling HLS stream: ${playlistUrl}`);
    this.logger.info(`Saving segments to: ${outputDir}`);

    while (!opts.signal?.aborted) {
      try {
        // eslint-disable-next-line no-await-in-loop
        await this.runCycle(playlistUrl, outputDir, opts.signal);
      } catch (e) {
        if (opts.signal?.aborted) break;
        this.logger.error(
          `Cycle failed: ${describeError(e)}; retrying in ${this.config.pollIntervalMs} ms`,
        );
      }
      // eslint-disable-next-line no-await-in-loop
      await sleep(this.config.pollIntervalMs, opts.signal);
    }

    this.logger.info(`Stopped after ${this.ledger.size} segment(s).`);
    return outputDir;
  }

  async prepareOutputDir(playlistUrl: string): Promise<string> {
    let outputDir: string;
    try {
      outputDir = path.join(this.config.outputRoot, deriveOutputDirName(playlistUrl));
    } catch (e) {
      throw new HlsError('setup_failure', `Cannot determine output directory: ${describeError(e)}`, { cause: e });
    }

    try {
      await ensureDir(outputDir);
    } catch (e) {
      throw new HlsError('setup_failure', `Cannot create output directory ${outputDir}: ${describeError(e)}`, {
        cause: e,
      });
    }
    return outputDir;
  }

  /** One fetch → parse → filter → download pass. */
  async runCycle(playlistUrl: string, outputDir: string, signal?: AbortSignal): Promise<CycleReport> {
    return await this.processPlaylist(playlistUrl, outputDir, 0, signal);
  }

  private async processPlaylist(
    playlistUrl: string,
    outputDir: string,
    depth: number,
    signal?: AbortSignal,
  ): Promise<CycleReport> {
    const text = await fetchText(this.http, playlistUrl, signal);
    const playlist = parsePlaylist(text, playlistUrl, this.logger);

    if (playlist.isMaster) {
      const selected = playlist.entries[0];
      if (selected === undefined) {
        throw new HlsError('no_variants', `Master playlist lists no media playlists: ${playlistUrl}`);
      }
      if (depth >= this.maxRedirects) {
        throw new HlsError('too_many_redirects', `Gave up after ${depth} nested master playlists at ${playlistUrl}`);
      }
      this.logger.info(`Master playlist found; switching to media playlist: ${selected}`);
      return await this.processPlaylist(selected, outputDir, depth + 1, signal);
    }

    const { urls, stats } = this.filterNewSegments(playlist.entries, playlist.sequence);
    if (urls.length === 0) {
      this.logger.info('No new segments; waiting for the next poll.');
      return { playlistUrl, stats, downloaded: [] };
    }

    this.logger.info(`Downloading ${urls.length} new segment(s).`);
    const batch = await downloadSegments(urls, {
      outputDir,
      concurrency: this.config.maxConcurrency,
      maxAttempts: this.config.maxAttempts,
      retryDelayMs: this.config.retryDelayMs,
      http: this.http,
      logger: this.logger.child('download'),
      now: this.now,
      ...(signal ? { signal } : {}),
    });
    return { playlistUrl, stats, downloaded: batch.outcomes };
  }

  /**
   * Picks the segments not dispatched before and marks them in the ledger.
   * A segment is marked even if its download later fails.
   */
  filterNewSegments(entries: readonly string[], sequence: bigint | number): FilterResult {
    const urls: string[] = [];
    const stats: FilterStats = { total: entries.length, fresh: 0, invalidUrl: 0, invalidName: 0, alreadyDownloaded: 0 };

    entries.forEach((url, index) => {
      let id: string;
      try {
        id = deriveSegmentId(url, sequence, index);
      } catch (e) {
        if (isHlsError(e, 'invalid_filename')) {
          stats.invalidName++;
          this.logger.warn(`Skipping segment with no file name [${index}]: ${url}`);
        } else {
          stats.invalidUrl++;
          this.logger.warn(`Skipping invalid segment URL [${index}]: ${url} (${describeError(e)})`);
        }
        return;
      }

      if (!this.ledger.shouldDownload(id)) {
        stats.alreadyDownloaded++;
        return;
      }
      urls.push(url);
    });

    stats.fresh = urls.length;
    this.logger.info(
      `Filtered segments: total=${stats.total} new=${stats.fresh} invalidUrl=${stats.invalidUrl} ` +
        `invalidName=${stats.invalidName} alreadyDownloaded=${stats.alreadyDownloaded}`,
    );
    return { urls, stats };
  }
}
