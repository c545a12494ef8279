import { HlsError, describeError } from '../errors.js';
import { parseInt64 } from '../utils/int.js';
import type { Logger } from '../utils/log.js';

export type Playlist = {
  /** Absolute URLs in document order: variant playlists for a master, segments otherwise. */
  entries: string[];
  isMaster: boolean;
  sequence: bigint;
};

const STREAM_INF_TAG = '#EXT-X-STREAM-INF';
const SEGMENT_TAG = '#EXTINF';
const MEDIA_SEQUENCE_RE = /#EXT-X-MEDIA-SEQUENCE:(\d+)/;

export function parsePlaylist(text: string, baseUrl: string, logger?: Logger): Playlist {
  let isMaster = text.includes(STREAM_INF_TAG);
  const isMedia = text.includes(SEGMENT_TAG);

  if (isMaster && isMedia) {
    logger?.warn(`Playlist ${baseUrl} carries both variant and segment tags; treating it as a media playlist`);
    isMaster = false;
  } else if (!isMaster && !isMedia) {
    throw new HlsError('unrecognized_format', `Unrecognized playlist format: ${baseUrl}`);
  }

  let base: URL;
  try {
    base = new URL(baseUrl);
  } catch (e) {
    throw new HlsError('invalid_url', `Invalid playlist URL: ${baseUrl}`, { cause: e });
  }

  const entries: string[] = [];
  for (const raw of text.split(/\r?\n/)) {
    const line = raw.trim();
    if (!line || line.startsWith('#')) continue;

    try {
      entries.push(resolveReference(line, base));
    } catch (e) {
      logger?.warn(`Skipping unresolvable playlist entry "${line}": ${describeError(e)}`);
    }
  }

  return { entries, isMaster, sequence: extractMediaSequence(text) };
}

export function extractMediaSequence(text: string): bigint {
  const match = MEDIA_SEQUENCE_RE.exec(text);
  if (!match?.[1]) return 0n;
  return parseInt64(match[1]) ?? 0n;
}

/**
 * Resolves `ref` against `base`. When the result has no query string it
 * inherits the base's, so token-bearing playlist URLs carry over to segments.
 */
export function resolveReference(ref: string, base: URL): string {
  const resolved = new URL(ref, base);
  if (!resolved.search && base.search) {
    resolved.search = base.search;
  }
  return resolved.toString();
}
