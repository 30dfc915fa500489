import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { SqliteStorage } from '../sqlite.js';
import { makeRecord } from './fixtures.js';

let storage: SqliteStorage;

beforeEach(() => {
  storage = SqliteStorage.open(':memory:');
});

afterEach(() => {
  storage.close();
});

describe('SqliteStorage.upsert', () => {
  it('round-trips list and tri-state fields', () => {
    storage.upsert([
      makeRecord('at://a', {
        is_verified_job: true,
        country: 'Germany',
        disciplines: ['Biology', 'Medicine'],
        position_type: ['PhD Student', 'Postdoc'],
      }),
      makeRecord('at://b'),
    ]);

    const a = storage.getRecord('at://a');
    expect(a?.disciplines).toEqual(['Biology', 'Medicine']);
    expect(a?.position_type).toEqual(['PhD Student', 'Postdoc']);
    expect(a?.is_verified_job).toBe(true);
    expect(a?.country).toBe('Germany');

    const b = storage.getRecord('at://b');
    expect(b?.is_verified_job).toBeNull();
    expect(b?.disciplines).toEqual([]);
  });

  it('keeps one row reflecting the second write', () => {
    storage.upsert([makeRecord('at://a', { message: 'first' })]);
    storage.upsert([makeRecord('at://a', { message: 'second', is_verified_job: false })]);

    expect(storage.count()).toBe(1);
    expect(storage.getRecord('at://a')?.message).toBe('second');
    expect(storage.getRecord('at://a')?.is_verified_job).toBe(false);
  });

  it('keeps duplicate_of across re-upserts', () => {
    storage.upsert([makeRecord('at://old', { is_verified_job: true }), makeRecord('at://new', { is_verified_job: true })]);
    storage.dedup.markDuplicate('at://old', 'at://new');
    storage.upsert([makeRecord('at://old', { is_verified_job: true, message: 'refetched' })]);

    expect(storage.getRecord('at://old')?.duplicate_of).toBe('at://new');
  });

  it('returns 0 for an empty batch', () => {
    expect(storage.upsert([])).toBe(0);
  });
});

describe('SqliteStorage queries', () => {
  beforeEach(() => {
    storage.upsert([
      makeRecord('at://a', { created_at: '2025-03-01T10:00:00.000Z' }),
      makeRecord('at://b', { created_at: '2025-03-05T10:00:00.000Z' }),
      makeRecord('scholarshipdb://1', { source: 'scholarshipdb', created_at: '2025-04-01T00:00:00Z' }),
    ]);
  });

  it('lists identifiers per source', () => {
    expect([...storage.existingIdentifiers('bluesky')].sort()).toEqual(['at://a', 'at://b']);
    expect(storage.existingIdentifiers().size).toBe(3);
  });

  it('reports the latest timestamp per source', () => {
    expect(storage.lastTimestamp('bluesky')).toBe('2025-03-05T10:00:00.000Z');
    expect(storage.lastTimestamp()).toBe('2025-04-01T00:00:00Z');
    expect(storage.lastTimestamp('nowhere')).toBeNull();
  });
});

describe('SqliteStorage dedup operations', () => {
  it('offers only canonical verified jobs', () => {
    storage.upsert([
      makeRecord('at://job', { is_verified_job: true }),
      makeRecord('at://nojob', { is_verified_job: false }),
      makeRecord('at://unknown'),
      makeRecord('at://dup', { is_verified_job: true, duplicate_of: 'at://job' }),
    ]);

    expect(storage.dedup.canonicalRecordsForDedup().map((r) => r.uri)).toEqual(['at://job']);
  });

  it('returns false for an unknown record', () => {
    expect(storage.dedup.markDuplicate('at://missing', 'at://x')).toBe(false);
  });

  it('flattens chains to one hop', () => {
    storage.upsert([
      makeRecord('at://a', { is_verified_job: true }),
      makeRecord('at://b', { is_verified_job: true }),
      makeRecord('at://c', { is_verified_job: true }),
    ]);

    expect(storage.dedup.markDuplicate('at://a', 'at://b')).toBe(true);
    expect(storage.dedup.markDuplicate('at://b', 'at://c')).toBe(true);

    expect(storage.getRecord('at://a')?.duplicate_of).toBe('at://c');
    expect(storage.getRecord('at://b')?.duplicate_of).toBe('at://c');
    expect(storage.getRecord('at://c')?.duplicate_of).toBeNull();
  });

  it('resolves a target that is itself a duplicate', () => {
    storage.upsert([
      makeRecord('at://a', { is_verified_job: true }),
      makeRecord('at://b', { is_verified_job: true, duplicate_of: 'at://c' }),
      makeRecord('at://c', { is_verified_job: true }),
    ]);

    storage.dedup.markDuplicate('at://a', 'at://b');
    expect(storage.getRecord('at://a')?.duplicate_of).toBe('at://c');
  });
});
