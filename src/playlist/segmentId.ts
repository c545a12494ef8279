import path from 'node:path';
import { HlsError } from '../errors.js';
import { parseInt64 } from '../utils/int.js';

const TRAILING_DIGITS_RE = /(\d+)$/;

export function parseUrl(url: string): URL {
  try {
    return new URL(url);
  } catch (e) {
    throw new HlsError('invalid_url', `Invalid URL: ${url}`, { cause: e });
  }
}

export function decodePath(pathname: string): string {
  try {
    return decodeURIComponent(pathname);
  } catch {
    return pathname;
  }
}

/** Basename of the decoded URL path; trailing slashes are ignored. */
export function urlBasename(url: URL): string {
  return path.posix.basename(decodePath(url.pathname));
}

/**
 * Derives the dedup key of a segment. Encoders usually number their segment
 * files, so a trailing number in the file name is the key; otherwise the key
 * is `{sequence}_{index}`, which is only stable while the segment keeps its
 * position in the playlist window.
 */
export function deriveSegmentId(url: string, sequence: bigint | number, index: number): string {
  const baseName = urlBasename(parseUrl(url));
  if (baseName === '' || baseName === '.' || baseName === '/') {
    throw new HlsError('invalid_filename', `Segment URL has no file name: ${url}`);
  }

  const stem = baseName.slice(0, baseName.length - path.posix.extname(baseName).length);
  const digits = TRAILING_DIGITS_RE.exec(stem)?.[1];
  if (digits) {
    const n = parseInt64(digits);
    if (n !== undefined) return n.toString();
  }
  return `${sequence}_${index}`;
}
