import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { CsvStorage, formatCsvRow, parseCsv } from '../csv.js';
import { makeRecord } from './fixtures.js';

let dir: string;
let csvPath: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'scholarsync-csv-'));
  csvPath = path.join(dir, 'postings.csv');
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe('csv codec', () => {
  it('quotes commas, quotes and newlines', () => {
    expect(formatCsvRow(['plain', 'a,b', 'say "hi"', 'two\nlines'])).toBe(
      'plain,"a,b","say ""hi""","two\nlines"',
    );
  });

  it('parses quoted fields back', () => {
    expect(parseCsv('x,y\r\n"a,b","say ""hi"""\n"two\nlines",\n')).toEqual([
      ['x', 'y'],
      ['a,b', 'say "hi"'],
      ['two\nlines', ''],
    ]);
  });
});

describe('CsvStorage', () => {
  it('writes a header and JSON-encoded list columns', () => {
    const storage = new CsvStorage(csvPath);
    storage.upsert([
      makeRecord('at://a', {
        is_verified_job: true,
        disciplines: ['Biology', 'Physics'],
        position_type: ['Postdoc'],
        country: 'Italy',
      }),
    ]);

    const [header, row] = parseCsv(fs.readFileSync(csvPath, 'utf-8'));
    expect(header).toEqual([
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
    ]);
    expect(row[7]).toBe('["Biology","Physics"]');
    expect(row[9]).toBe('true');
  });

  it('round-trips records', () => {
    const storage = new CsvStorage(csvPath);
    const record = makeRecord('at://a', {
      message: 'PhD, fully funded\n"apply now"',
      is_verified_job: true,
      disciplines: ['Biology', 'Chemistry & Materials Science', 'Medicine'],
      position_type: ['PhD Student', 'Postdoc'],
      country: 'USA',
    });
    storage.upsert([record]);
    expect(storage.readAll()).toEqual([record]);
  });

  it('leaves country and lists empty when absent', () => {
    const storage = new CsvStorage(csvPath);
    storage.upsert([makeRecord('at://a')]);
    const [stored] = storage.readAll();
    expect(stored.country).toBeNull();
    expect(stored.disciplines).toEqual([]);
    expect(stored.is_verified_job).toBeNull();
  });

  it('merges by uri instead of overwriting the file', () => {
    const storage = new CsvStorage(csvPath);
    storage.upsert([makeRecord('at://a', { message: 'first' }), makeRecord('at://b')]);
    storage.upsert([makeRecord('at://a', { message: 'second' })]);

    const records = storage.readAll();
    expect(records.map((r) => r.uri)).toEqual(['at://a', 'at://b']);
    expect(records[0].message).toBe('second');
  });

  it('answers identifier and timestamp queries', () => {
    const storage = new CsvStorage(csvPath);
    expect(storage.lastTimestamp()).toBeNull();
    storage.upsert([
      makeRecord('at://a', { created_at: '2025-01-02T00:00:00Z' }),
      makeRecord('scholarshipdb://1', { source: 'scholarshipdb', created_at: '2025-02-02T00:00:00Z' }),
    ]);
    expect([...storage.existingIdentifiers('bluesky')]).toEqual(['at://a']);
    expect(storage.lastTimestamp('bluesky')).toBe('2025-01-02T00:00:00Z');
    expect(storage.lastTimestamp()).toBe('2025-02-02T00:00:00Z');
  });

  it('returns 0 for an empty batch and is not dedup-capable', () => {
    const storage = new CsvStorage(csvPath);
    expect(storage.upsert([])).toBe(0);
    expect(storage.dedup).toBeNull();
    expect(fs.existsSync(csvPath)).toBe(false);
  });
});
