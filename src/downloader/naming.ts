import path from 'node:path';
import { safeBasename } from '../utils/fs.js';
import { decodePath, parseUrl, urlBasename } from '../playlist/segmentId.js';

const OUTPUT_DIR_SUFFIX = '_hls_segments';
const SEGMENT_EXT = '.ts';

const pad = (n: number, width = 2): string => String(n).padStart(width, '0');

/** Local time as `YYYYMMDD_HHMMSS`. */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export function deriveOutputDirName(playlistUrl: string): string {
  const url = parseUrl(playlistUrl);
  const decoded = decodePath(url.pathname);
  const fileName = decoded.slice(decoded.lastIndexOf('/') + 1);

  const baseName = fileName
    ? fileName.slice(0, fileName.length - path.posix.extname(fileName).length)
    : url.host.replaceAll('.', '_');

  return `${baseName.replaceAll(/[^A-Za-z0-9_-]/g, '_')}${OUTPUT_DIR_SUFFIX}`;
}

/**
 * `{timestamp}_{index:05d}_{basename}`. Zero-padding keeps directory listing
 * order equal to playlist order regardless of completion order.
 */
export function segmentFileName(segmentUrl: string, batchIndex: number, fetchedAt: Date): string {
  const raw = urlBasename(parseUrl(segmentUrl));
  let baseName = raw ? safeBasename(raw) : 'segment';
  if (!baseName.toLowerCase().endsWith(SEGMENT_EXT)) baseName += SEGMENT_EXT;
  return `${formatTimestamp(fetchedAt)}_${pad(batchIndex, 5)}_${baseName}`;
}
