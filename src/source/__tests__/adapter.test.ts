import { describe, it, expect } from 'vitest';
import { IncrementalFilter } from '../adapter.js';

describe('IncrementalFilter', () => {
  it('accepts everything without a watermark', () => {
    const filter = new IncrementalFilter(null, new Set());
    expect(filter.accept('a', '2020-01-01T00:00:00Z')).toBe(true);
    expect(filter.skippedOld).toBe(0);
  });

  it('keeps records at exactly the watermark and skips older ones', () => {
    const filter = new IncrementalFilter('2025-03-01T00:00:00Z', new Set());
    expect(filter.accept('at', '2025-03-01T00:00:00Z')).toBe(true);
    expect(filter.accept('older', '2025-02-28T23:59:59Z')).toBe(false);
    expect(filter.skippedOld).toBe(1);
  });

  it('skips identifiers already seen, including repeats within one fetch', () => {
    const filter = new IncrementalFilter(null, new Set(['known']));
    expect(filter.accept('known', '2025-03-02T00:00:00Z')).toBe(false);
    expect(filter.accept('fresh', '2025-03-02T00:00:00Z')).toBe(true);
    expect(filter.accept('fresh', '2025-03-02T00:00:00Z')).toBe(false);
  });

  it('adds skipped identifiers to the seen set without touching the input', () => {
    const existing = new Set(['known']);
    const filter = new IncrementalFilter('2025-03-01T00:00:00Z', existing);
    filter.accept('older', '2025-02-01T00:00:00Z');
    expect([...filter.seen].sort()).toEqual(['known', 'older']);
    expect(existing.size).toBe(1);
  });
});
