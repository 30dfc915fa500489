import type { PostingRecord } from '../record/record.js';
import type { SourceName } from '../shared/config.js';

/**
 * Result of a source fetch operation.
 */
export interface FetchResult {
  records: PostingRecord[];
  /** Identifiers seen so far, including the ones passed in and the ones skipped. */
  seen: Set<string>;
  /** Records dropped because they predate the watermark. */
  skippedOld: number;
}

/**
 * Source adapter interface. Implement for each source type.
 *
 * `since` is the stored watermark; records strictly older than it are
 * skipped, records at exactly the watermark are kept unless already seen.
 */
export interface SourceAdapter {
  readonly name: SourceName;
  fetch(since: string | null, existing: ReadonlySet<string>): Promise<FetchResult>;
}

/**
 * Incremental filter shared by every adapter. Feed it candidates in arrival
 * order; it records each identifier as seen and reports whether the
 * candidate should be emitted.
 */
export class IncrementalFilter {
  readonly seen: Set<string>;
  skippedOld = 0;

  constructor(
    private readonly since: string | null,
    existing: ReadonlySet<string>,
  ) {
    this.seen = new Set(existing);
  }

  accept(uri: string, createdAt: string): boolean {
    if (this.seen.has(uri)) return false;
    this.seen.add(uri);

    if (this.since !== null && createdAt < this.since) {
      this.skippedOld++;
      return false;
    }
    return true;
  }
}
