import { z } from 'zod';
import { RecordError } from '../shared/errors.js';
import {
  DISCIPLINES,
  POSITION_TYPES,
  MAX_DISCIPLINES,
  MAX_POSITION_TYPES,
  type Discipline,
  type PositionType,
} from '../classify/taxonomy.js';

export const RecordSchema = z.object({
  uri: z.string().min(1),
  message: z.string().min(1),
  url: z.string(),
  user_handle: z.string(),
  created_at: z.string(),
  source: z.string().min(1),
  country: z.string().nullable(),
  disciplines: z.array(z.enum(DISCIPLINES)),
  position_type: z.array(z.enum(POSITION_TYPES)),
  is_verified_job: z.boolean().nullable(),
  duplicate_of: z.string().nullable(),
});

export interface PostingRecord {
  uri: string;
  message: string;
  url: string;
  user_handle: string;
  /** ISO-8601; ordered by plain string comparison. */
  created_at: string;
  source: string;
  country: string | null;
  disciplines: Discipline[];
  position_type: PositionType[];
  /** null means nobody has decided yet. */
  is_verified_job: boolean | null;
  duplicate_of: string | null;
}

export type RecordInput = Pick<PostingRecord, 'uri' | 'message' | 'url' | 'user_handle' | 'created_at' | 'source'> &
  Partial<Pick<PostingRecord, 'country' | 'disciplines' | 'position_type' | 'is_verified_job' | 'duplicate_of'>>;

function uniqueCapped<T>(values: readonly T[], cap: number): T[] {
  return [...new Set(values)].slice(0, cap);
}

export function normalizeRecord(record: PostingRecord): PostingRecord {
  if (record.is_verified_job === false) {
    return { ...record, country: null, disciplines: [], position_type: [] };
  }
  return {
    ...record,
    disciplines: uniqueCapped(record.disciplines, MAX_DISCIPLINES),
    position_type: uniqueCapped(record.position_type, MAX_POSITION_TYPES),
  };
}

export function createRecord(input: RecordInput): PostingRecord {
  const result = RecordSchema.safeParse({
    country: null,
    disciplines: [],
    position_type: [],
    is_verified_job: null,
    duplicate_of: null,
    ...input,
  });
  if (!result.success) {
    throw new RecordError('Invalid record', {
      uri: input.uri,
      errors: result.error.flatten().fieldErrors,
    });
  }
  return normalizeRecord(result.data);
}

/** Like createRecord, but returns null instead of throwing. */
export function tryCreateRecord(input: RecordInput): PostingRecord | null {
  try {
    return createRecord(input);
  } catch (err) {
    if (err instanceof RecordError) return null;
    throw err;
  }
}
