import fs from 'node:fs';
import { z } from 'zod';
import { logger } from '../shared/logger.js';
import { errorMessage } from '../shared/errors.js';
import { nowISO, resolvePath, writeFileAtomic } from '../shared/utils.js';

export const STATE_VERSION = 2;
export const LEGACY_SOURCE = 'bluesky';

export interface SourceSyncState {
  lastTimestamp: string | null;
  seenIdentifiers: Set<string>;
}

const SourceEntrySchema = z.object({
  last_timestamp: z.string().nullable().default(null),
  seen_uris: z.array(z.string()).default([]),
  updated_at: z.string().nullable().optional(),
});

const StateDocumentSchema = z.object({
  version: z.literal(STATE_VERSION),
  updated_at: z.string().optional(),
  sources: z.record(SourceEntrySchema).default({}),
});

// Single-source layout written before per-source tracking existed.
const LegacyDocumentSchema = z.object({
  version: z.number().int().max(1).optional(),
  last_timestamp: z.string().nullable().optional(),
  seen_uris: z.array(z.string()).optional(),
  updated_at: z.string().nullable().optional(),
});

type StateDocument = z.infer<typeof StateDocumentSchema>;

function emptyDocument(): StateDocument {
  return { version: STATE_VERSION, sources: {} };
}

/**
 * Per-source watermark + seen-identifier store backed by one JSON file.
 * Every mutation is written through immediately.
 */
export class SyncStateStore {
  private doc: StateDocument;

  constructor(private readonly filePath: string) {
    this.filePath = resolvePath(filePath);
    this.doc = this.load();
  }

  get path(): string {
    return this.filePath;
  }

  getState(source: string): SourceSyncState {
    const entry = this.doc.sources[source];
    return {
      lastTimestamp: entry?.last_timestamp ?? null,
      seenIdentifiers: new Set(entry?.seen_uris ?? []),
    };
  }

  hasState(source: string): boolean {
    return source in this.doc.sources;
  }

  updateState(source: string, lastTimestamp: string | null, seenIdentifiers: Iterable<string>): void {
    const seen = [...seenIdentifiers];
    this.doc.sources[source] = {
      last_timestamp: lastTimestamp,
      seen_uris: seen,
      updated_at: nowISO(),
    };
    this.save();
    logger.debug({ source, seen: seen.length, lastTimestamp }, 'Sync state updated');
  }

  listSources(): string[] {
    return Object.keys(this.doc.sources);
  }

  clearSource(source: string): boolean {
    if (!(source in this.doc.sources)) return false;
    delete this.doc.sources[source];
    this.save();
    logger.info({ source }, 'Sync state cleared');
    return true;
  }

  private load(): StateDocument {
    if (!fs.existsSync(this.filePath)) return emptyDocument();

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(this.filePath, 'utf-8')) as unknown;
    } catch (err) {
      logger.warn({ path: this.filePath, error: errorMessage(err) }, 'Could not load sync state, starting fresh');
      return emptyDocument();
    }

    const current = StateDocumentSchema.safeParse(raw);
    if (current.success) return current.data;

    const legacy = LegacyDocumentSchema.safeParse(raw);
    if (legacy.success) {
      logger.info({ path: this.filePath }, 'Migrating legacy sync state');
      this.doc = {
        version: STATE_VERSION,
        sources: {
          [LEGACY_SOURCE]: {
            last_timestamp: legacy.data.last_timestamp ?? null,
            seen_uris: legacy.data.seen_uris ?? [],
            updated_at: legacy.data.updated_at ?? null,
          },
        },
      };
      this.save();
      return this.doc;
    }

    logger.warn({ path: this.filePath }, 'Sync state has an unknown layout, starting fresh');
    return emptyDocument();
  }

  private save(): void {
    this.doc.updated_at = nowISO();
    writeFileAtomic(this.filePath, JSON.stringify(this.doc, null, 2));
  }
}
