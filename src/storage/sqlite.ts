import { z } from 'zod';
import type { Db } from '../db/db.js';
import { openDb } from '../db/db.js';
import { StorageError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { DISCIPLINES, POSITION_TYPES } from '../classify/taxonomy.js';
import type { PostingRecord } from '../record/record.js';
import type { DedupCandidate, DedupOperations, StorageBackend } from './backend.js';

interface PostingRow {
  uri: string;
  message: string;
  url: string;
  user_handle: string;
  created_at: string;
  source: string;
  country: string | null;
  disciplines_json: string | null;
  position_type_json: string | null;
  is_verified_job: number | null;
  duplicate_of: string | null;
}

const DisciplineListSchema = z.array(z.enum(DISCIPLINES));
const PositionTypeListSchema = z.array(z.enum(POSITION_TYPES));

function decodeList<T>(schema: z.ZodType<T[], z.ZodTypeDef, unknown>, raw: string | null): T[] {
  if (!raw) return [];
  try {
    const parsed = schema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : [];
  } catch {
    return [];
  }
}

function encodeList(values: readonly string[]): string | null {
  return values.length > 0 ? JSON.stringify(values) : null;
}

export function rowToRecord(row: PostingRow): PostingRecord {
  return {
    uri: row.uri,
    message: row.message,
    url: row.url,
    user_handle: row.user_handle,
    created_at: row.created_at,
    source: row.source,
    country: row.country,
    disciplines: decodeList(DisciplineListSchema, row.disciplines_json),
    position_type: decodeList(PositionTypeListSchema, row.position_type_json),
    is_verified_job: row.is_verified_job === null ? null : row.is_verified_job === 1,
    duplicate_of: row.duplicate_of,
  };
}

export class SqliteStorage implements StorageBackend {
  readonly kind = 'sqlite' as const;
  readonly dedup: DedupOperations;

  constructor(private readonly db: Db) {
    this.dedup = {
      canonicalRecordsForDedup: () => this.canonicalRecordsForDedup(),
      markDuplicate: (oldUri, newUri) => this.markDuplicate(oldUri, newUri),
    };
  }

  static open(dbPath: string): SqliteStorage {
    return new SqliteStorage(openDb(dbPath));
  }

  upsert(records: readonly PostingRecord[]): number {
    if (records.length === 0) return 0;

    const stmt = this.db.prepare(`
      INSERT INTO postings
        (uri, message, url, user_handle, created_at, source, country,
         disciplines_json, position_type_json, is_verified_job, duplicate_of)
      VALUES
        (@uri, @message, @url, @user_handle, @created_at, @source, @country,
         @disciplines_json, @position_type_json, @is_verified_job, @duplicate_of)
      ON CONFLICT(uri) DO UPDATE SET
        message            = excluded.message,
        url                = excluded.url,
        user_handle        = excluded.user_handle,
        created_at         = excluded.created_at,
        source             = excluded.source,
        country            = excluded.country,
        disciplines_json   = excluded.disciplines_json,
        position_type_json = excluded.position_type_json,
        is_verified_job    = excluded.is_verified_job,
        duplicate_of       = COALESCE(postings.duplicate_of, excluded.duplicate_of),
        indexed_at         = strftime('%Y-%m-%dT%H:%M:%fZ', 'now')
    `);

    const writeAll = this.db.transaction((batch: readonly PostingRecord[]) => {
      let written = 0;
      for (const r of batch) {
        written += stmt.run({
          uri: r.uri,
          message: r.message,
          url: r.url,
          user_handle: r.user_handle,
          created_at: r.created_at,
          source: r.source,
          country: r.country,
          disciplines_json: encodeList(r.disciplines),
          position_type_json: encodeList(r.position_type),
          is_verified_job: r.is_verified_job === null ? null : r.is_verified_job ? 1 : 0,
          duplicate_of: r.duplicate_of,
        }).changes;
      }
      return written;
    });

    try {
      const written = writeAll(records);
      logger.debug({ written }, 'Postings upserted');
      return written;
    } catch (err) {
      throw new StorageError(`Failed to upsert ${records.length} postings`, { cause: errorMessage(err) });
    }
  }

  existingIdentifiers(source?: string): Set<string> {
    const rows = (
      source === undefined
        ? this.db.prepare('SELECT uri FROM postings').all()
        : this.db.prepare('SELECT uri FROM postings WHERE source = ?').all(source)
    ) as Array<{ uri: string }>;
    return new Set(rows.map((r) => r.uri));
  }

  lastTimestamp(source?: string): string | null {
    const row = (
      source === undefined
        ? this.db.prepare('SELECT MAX(created_at) AS ts FROM postings').get()
        : this.db.prepare('SELECT MAX(created_at) AS ts FROM postings WHERE source = ?').get(source)
    ) as { ts: string | null } | undefined;
    return row?.ts ?? null;
  }

  getRecord(uri: string): PostingRecord | null {
    const row = this.db.prepare('SELECT * FROM postings WHERE uri = ?').get(uri) as PostingRow | undefined;
    return row ? rowToRecord(row) : null;
  }

  listRecords(source?: string): PostingRecord[] {
    const rows = (
      source === undefined
        ? this.db.prepare('SELECT * FROM postings ORDER BY created_at DESC').all()
        : this.db.prepare('SELECT * FROM postings WHERE source = ? ORDER BY created_at DESC').all(source)
    ) as PostingRow[];
    return rows.map(rowToRecord);
  }

  count(): number {
    const row = this.db.prepare('SELECT COUNT(*) AS n FROM postings').get() as { n: number };
    return row.n;
  }

  private canonicalRecordsForDedup(): DedupCandidate[] {
    return this.db
      .prepare(
        `SELECT uri, message, created_at FROM postings
         WHERE is_verified_job = 1 AND duplicate_of IS NULL
         ORDER BY created_at ASC, uri ASC`,
      )
      .all() as DedupCandidate[];
  }

  /**
   * Chains are flattened: the target resolves to its own canonical record,
   * and anything already pointing at `oldUri` is re-pointed.
   */
  private markDuplicate(oldUri: string, newUri: string): boolean {
    const lookup = this.db.prepare('SELECT duplicate_of FROM postings WHERE uri = ?');

    const mark = this.db.transaction((): boolean => {
      if (lookup.get(oldUri) === undefined) return false;

      let target = newUri;
      const seen = new Set<string>([oldUri]);
      for (;;) {
        const row = lookup.get(target) as { duplicate_of: string | null } | undefined;
        if (!row?.duplicate_of || seen.has(row.duplicate_of)) break;
        seen.add(target);
        target = row.duplicate_of;
      }
      if (target === oldUri) return false;

      this.db.prepare('UPDATE postings SET duplicate_of = ? WHERE uri = ?').run(target, oldUri);
      this.db.prepare('UPDATE postings SET duplicate_of = ? WHERE duplicate_of = ?').run(target, oldUri);
      return true;
    });

    try {
      return mark();
    } catch (err) {
      throw new StorageError(`Failed to mark ${oldUri} as duplicate`, { cause: errorMessage(err) });
    }
  }

  close(): void {
    this.db.close();
  }
}
