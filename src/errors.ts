export type HlsErrorKind =
  | 'unrecognized_format'
  | 'invalid_url'
  | 'invalid_filename'
  | 'fetch_failure'
  | 'exhausted_retries'
  | 'no_variants'
  | 'too_many_redirects'
  | 'setup_failure';

export class HlsError extends Error {
  public constructor(
    public readonly kind: HlsErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'HlsError';
  }
}

export class FetchError extends HlsError {
  public readonly url: string;
  public readonly status?: number;
  public readonly bodySnippet?: string;

  public constructor(params: { url: string; message: string; status?: number; bodySnippet?: string; cause?: unknown }) {
    super('fetch_failure', params.message, params.cause === undefined ? undefined : { cause: params.cause });
    this.name = 'FetchError';
    this.url = params.url;
    if (params.status !== undefined) this.status = params.status;
    if (params.bodySnippet !== undefined) this.bodySnippet = params.bodySnippet;
  }
}

export function isHlsError(e: unknown, kind?: HlsErrorKind): e is HlsError {
  return e instanceof HlsError && (kind === undefined || e.kind === kind);
}

export function describeError(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
