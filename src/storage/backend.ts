import type { PostingRecord } from '../record/record.js';

export interface DedupCandidate {
  uri: string;
  message: string;
  created_at: string;
}

/** Extra capabilities a backend needs before duplicates can be resolved. */
export interface DedupOperations {
  /** Verified-job records that are not themselves marked as duplicates. */
  canonicalRecordsForDedup(): DedupCandidate[];
  /**
   * Mark `oldUri` as superseded by `newUri`. Returns false when `oldUri`
   * is unknown.
   */
  markDuplicate(oldUri: string, newUri: string): boolean;
}

export type StorageKind = 'sqlite' | 'csv';

export interface StorageBackend {
  readonly kind: StorageKind;
  /** Insert or replace by `uri`; an existing `duplicate_of` is kept. Returns rows written. */
  upsert(records: readonly PostingRecord[]): number;
  existingIdentifiers(source?: string): Set<string>;
  /** Greatest stored `created_at`, or null when nothing is stored. */
  lastTimestamp(source?: string): string | null;
  /** null when the backend cannot resolve duplicates. */
  readonly dedup: DedupOperations | null;
  close(): void;
}
