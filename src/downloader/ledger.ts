/**
 * Identities of segments already dispatched for download. Lives as long as the
 * process and is never pruned; only the polling loop touches it.
 */
export class SegmentLedger {
  private readonly seen = new Set<string>();

  /** Returns true at most once per identity, marking it dispatched. */
  shouldDownload(id: string): boolean {
    if (this.seen.has(id)) return false;
    this.seen.add(id);
    return true;
  }

  get size(): number {
    return this.seen.size;
  }
}
