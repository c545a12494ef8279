#!/usr/bin/env node

import { Command } from 'commander';
import { applyOverrides, loadConfig } from './config.js';
import { recordCommand } from './commands/record.js';
import { describeError } from './errors.js';
import { FetchHttpClient, parseHeaderLines } from './services/http.js';
import { Logger } from './utils/log.js';

const program = new Command();

program
  .name('hls-archiver')
  .description('Poll a live HLS playlist and save every new segment exactly once')
  .version('1.0.0')
  .argument('<playlist-url>', 'Master or media playlist URL (.m3u8)')
  .option('--output <path>', 'Directory under which the <name>_hls_segments directory is created')
  .option('--log-level <level>', 'silent|error|warn|info|debug')
  .option('--concurrency <n>', 'Maximum simultaneous segment downloads')
  .option('--interval <ms>', 'Delay between playlist polls in milliseconds')
  .option('--attempts <n>', 'Attempts per segment before giving up')
  .option('--retry-delay <ms>', 'Base retry delay in milliseconds (grows linearly per attempt)')
  .option('--header <line>', 'Extra request header "Name: value" (repeatable)', (v, acc: string[]) => {
    acc.push(v);
    return acc;
  }, [])
  .option('--once', 'Run a single poll cycle and exit', false)
  .action(async (playlistUrl: string, cmd: Record<string, unknown>) => {
    const cfg = applyOverrides(loadConfig(), {
      outputRoot: cmd.output,
      logLevel: cmd.logLevel,
      maxConcurrency: cmd.concurrency,
      pollIntervalMs: cmd.interval,
      maxAttempts: cmd.attempts,
      retryDelayMs: cmd.retryDelay,
    });
    const logger = new Logger(cfg.logLevel);

    const headerLines = Array.isArray(cmd.header) ? cmd.header.map(String) : [];
    const http = new FetchHttpClient({ 'user-agent': cfg.userAgent, ...parseHeaderLines(headerLines) });

    const controller = new AbortController();
    const stop = (signal: NodeJS.Signals): void => {
      logger.info(`Received ${signal}; stopping after the current cycle.`);
      controller.abort();
    };
    process.once('SIGINT', stop);
    process.once('SIGTERM', stop);

    await recordCommand({
      playlistUrl,
      config: cfg,
      http,
      once: Boolean(cmd.once),
      logger,
      signal: controller.signal,
    });
  });

try {
  await program.parseAsync(process.argv);
} catch (e) {
  console.error(`hls-archiver: ${describeError(e)}`);
  process.exitCode = 1;
}
