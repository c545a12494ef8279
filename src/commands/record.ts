import type { DownloaderConfig } from '../config.js';
import { LiveHlsDownloader } from '../downloader/live.js';
import type { HttpClient } from '../services/http.js';
import type { Logger } from '../utils/log.js';

export async function recordCommand(params: {
  playlistUrl: string;
  config: DownloaderConfig;
  http: HttpClient;
  once: boolean;
  logger: Logger;
  signal?: AbortSignal;
}): Promise<{ outputDir: string; segments: number }> {
  const downloader = new LiveHlsDownloader({ config: params.config, http: params.http, logger: params.logger });

  if (params.once) {
    const outputDir = await downloader.prepareOutputDir(params.playlistUrl);
    const report = await downloader.runCycle(params.playlistUrl, outputDir, params.signal);
    params.logger.info(`Saved ${report.downloaded.length} segment(s) from ${report.playlistUrl} to ${outputDir}`);
    return { outputDir, segments: report.downloaded.length };
  }

  const outputDir = await downloader.start(params.playlistUrl, params.signal ? { signal: params.signal } : {});
  return { outputDir, segments: downloader.downloadedCount };
}
