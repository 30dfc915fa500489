import fs from 'node:fs';
import { z } from 'zod';
import { StorageError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { resolvePath, writeFileAtomic } from '../shared/utils.js';
import { DISCIPLINES, POSITION_TYPES } from '../classify/taxonomy.js';
import type { PostingRecord } from '../record/record.js';
import type { StorageBackend } from './backend.js';

export const CSV_COLUMNS = [
  'uri',
  'message',
  'url',
  'user_handle',
  'created_at',
  'source',
  'country',
  'disciplines',
  'position_type',
  'is_verified_job',
  'duplicate_of',
] as const;

type CsvColumn = (typeof CSV_COLUMNS)[number];

function quoteField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function formatCsvRow(fields: readonly string[]): string {
  return fields.map(quoteField).join(',');
}

/**
 * RFC 4180 reader: quoted fields may hold commas, doubled quotes and line
 * breaks. Accepts LF or CRLF row endings.
 */
export function parseCsv(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let inQuotes = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (inQuotes) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        field += ch;
      }
      continue;
    }

    if (ch === '"') {
      inQuotes = true;
    } else if (ch === ',') {
      row.push(field);
      field = '';
    } else if (ch === '\n' || ch === '\r') {
      if (ch === '\r' && text[i + 1] === '\n') i++;
      row.push(field);
      rows.push(row);
      row = [];
      field = '';
    } else {
      field += ch;
    }
  }

  if (field !== '' || row.length > 0) {
    row.push(field);
    rows.push(row);
  }
  return rows;
}

const DisciplineList = z.array(z.enum(DISCIPLINES));
const PositionTypeList = z.array(z.enum(POSITION_TYPES));

function decodeJsonList<T>(schema: z.ZodType<T[], z.ZodTypeDef, unknown>, raw: string): T[] {
  if (!raw) return [];
  try {
    const parsed = schema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : [];
  } catch {
    return [];
  }
}

function decodeTriState(raw: string): boolean | null {
  const v = raw.trim().toLowerCase();
  if (v === 'true') return true;
  if (v === 'false') return false;
  return null;
}

function recordToFields(r: PostingRecord): string[] {
  const values: Record<CsvColumn, string> = {
    uri: r.uri,
    message: r.message,
    url: r.url,
    user_handle: r.user_handle,
    created_at: r.created_at,
    source: r.source,
    country: r.country ?? '',
    disciplines: r.disciplines.length > 0 ? JSON.stringify(r.disciplines) : '',
    position_type: r.position_type.length > 0 ? JSON.stringify(r.position_type) : '',
    is_verified_job: r.is_verified_job === null ? '' : String(r.is_verified_job),
    duplicate_of: r.duplicate_of ?? '',
  };
  return CSV_COLUMNS.map((c) => values[c]);
}

function fieldsToRecord(header: readonly string[], fields: readonly string[]): PostingRecord | null {
  const get = (column: CsvColumn): string => {
    const idx = header.indexOf(column);
    return idx === -1 ? '' : (fields[idx] ?? '');
  };
  const uri = get('uri');
  if (!uri) return null;
  return {
    uri,
    message: get('message'),
    url: get('url'),
    user_handle: get('user_handle'),
    created_at: get('created_at'),
    source: get('source'),
    country: get('country') || null,
    disciplines: decodeJsonList(DisciplineList, get('disciplines')),
    position_type: decodeJsonList(PositionTypeList, get('position_type')),
    is_verified_job: decodeTriState(get('is_verified_job')),
    duplicate_of: get('duplicate_of') || null,
  };
}

/**
 * Flat-file backend. Every upsert rewrites the whole file; it cannot
 * resolve duplicates.
 */
export class CsvStorage implements StorageBackend {
  readonly kind = 'csv' as const;
  readonly dedup = null;
  private readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = resolvePath(filePath);
  }

  readAll(): PostingRecord[] {
    if (!fs.existsSync(this.filePath)) return [];
    let text: string;
    try {
      text = fs.readFileSync(this.filePath, 'utf-8');
    } catch (err) {
      throw new StorageError(`Failed to read ${this.filePath}`, { cause: errorMessage(err) });
    }
    const [header, ...rows] = parseCsv(text.replace(/^\uFEFF/, ''));
    if (!header) return [];
    return rows.map((fields) => fieldsToRecord(header, fields)).filter((r): r is PostingRecord => r !== null);
  }

  upsert(records: readonly PostingRecord[]): number {
    if (records.length === 0) return 0;

    const merged = new Map<string, PostingRecord>();
    for (const r of this.readAll()) merged.set(r.uri, r);
    for (const r of records) {
      const previous = merged.get(r.uri);
      merged.set(r.uri, { ...r, duplicate_of: previous?.duplicate_of ?? r.duplicate_of });
    }

    const lines = [formatCsvRow(CSV_COLUMNS), ...[...merged.values()].map((r) => formatCsvRow(recordToFields(r)))];
    try {
      writeFileAtomic(this.filePath, lines.join('\n') + '\n');
    } catch (err) {
      throw new StorageError(`Failed to write ${this.filePath}`, { cause: errorMessage(err) });
    }
    logger.debug({ path: this.filePath, written: records.length, total: merged.size }, 'CSV upserted');
    return records.length;
  }

  existingIdentifiers(source?: string): Set<string> {
    return new Set(
      this.readAll()
        .filter((r) => source === undefined || r.source === source)
        .map((r) => r.uri),
    );
  }

  lastTimestamp(source?: string): string | null {
    let latest: string | null = null;
    for (const r of this.readAll()) {
      if (source !== undefined && r.source !== source) continue;
      if (r.created_at && (latest === null || r.created_at > latest)) latest = r.created_at;
    }
    return latest;
  }

  close(): void {
    // Nothing held open between calls.
  }
}
