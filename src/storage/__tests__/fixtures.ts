import { createRecord, type RecordInput, type PostingRecord } from '../../record/record.js';

export function makeRecord(uri: string, overrides: Partial<RecordInput> = {}): PostingRecord {
  return createRecord({
    uri,
    message: `Posting ${uri}`,
    url: `https://example.test/${encodeURIComponent(uri)}`,
    user_handle: 'lab.test',
    created_at: '2025-03-01T10:00:00.000Z',
    source: 'bluesky',
    ...overrides,
  });
}
