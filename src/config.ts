import dotenv from 'dotenv';
import path from 'node:path';
import { z } from 'zod';
import { LOG_LEVELS, type LogLevel } from './utils/log.js';

dotenv.config();

const positiveInt = z.coerce.number().int().positive();
const nonNegativeInt = z.coerce.number().int().nonnegative();

const EnvSchema = z
  .object({
    OUTPUT_DIR: z.string().optional(),
    LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
    HLS_MAX_CONCURRENCY: positiveInt.optional(),
    HLS_POLL_INTERVAL_MS: nonNegativeInt.optional(),
    HLS_MAX_ATTEMPTS: positiveInt.optional(),
    HLS_RETRY_DELAY_MS: nonNegativeInt.optional(),
    HLS_USER_AGENT: z.string().optional(),
  })
  .passthrough();

/** Fixed for the life of a downloader; there is no live reconfiguration. */
export type DownloaderConfig = {
  /** Directory under which the per-stream segment directory is created. */
  outputRoot: string;
  maxConcurrency: number;
  pollIntervalMs: number;
  maxAttempts: number;
  retryDelayMs: number;
};

export type AppConfig = DownloaderConfig & {
  logLevel: LogLevel;
  userAgent: string;
};

export const DEFAULT_CONFIG = {
  maxConcurrency: 8,
  pollIntervalMs: 5_000,
  maxAttempts: 3,
  retryDelayMs: 1_000,
  userAgent: 'hls-live-archiver/1.0',
} as const;

export const ConfigOverridesSchema = z.object({
  outputRoot: z.string().min(1).optional(),
  logLevel: z.enum(LOG_LEVELS).optional(),
  maxConcurrency: positiveInt.optional(),
  pollIntervalMs: nonNegativeInt.optional(),
  maxAttempts: positiveInt.optional(),
  retryDelayMs: nonNegativeInt.optional(),
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.parse(env);

  return {
    outputRoot: parsed.OUTPUT_DIR ? path.resolve(parsed.OUTPUT_DIR) : path.resolve('downloads'),
    logLevel: parsed.LOG_LEVEL ?? 'info',
    maxConcurrency: parsed.HLS_MAX_CONCURRENCY ?? DEFAULT_CONFIG.maxConcurrency,
    pollIntervalMs: parsed.HLS_POLL_INTERVAL_MS ?? DEFAULT_CONFIG.pollIntervalMs,
    maxAttempts: parsed.HLS_MAX_ATTEMPTS ?? DEFAULT_CONFIG.maxAttempts,
    retryDelayMs: parsed.HLS_RETRY_DELAY_MS ?? DEFAULT_CONFIG.retryDelayMs,
    userAgent: parsed.HLS_USER_AGENT?.trim() || DEFAULT_CONFIG.userAgent,
  };
}

/** Applies CLI flag values over the environment-derived config. */
export function applyOverrides(base: AppConfig, raw: unknown): AppConfig {
  const o = ConfigOverridesSchema.parse(raw);
  return {
    ...base,
    ...(o.outputRoot !== undefined ? { outputRoot: path.resolve(o.outputRoot) } : {}),
    ...(o.logLevel !== undefined ? { logLevel: o.logLevel } : {}),
    ...(o.maxConcurrency !== undefined ? { maxConcurrency: o.maxConcurrency } : {}),
    ...(o.pollIntervalMs !== undefined ? { pollIntervalMs: o.pollIntervalMs } : {}),
    ...(o.maxAttempts !== undefined ? { maxAttempts: o.maxAttempts } : {}),
    ...(o.retryDelayMs !== undefined ? { retryDelayMs: o.retryDelayMs } : {}),
  };
}
