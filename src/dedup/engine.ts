import { z } from 'zod';
import type { PostingRecord } from '../record/record.js';
import type { DedupOperations } from '../storage/backend.js';
import type { ClassificationOracle } from '../llm/oracle.js';
import { DUPLICATE_CHECK_PROMPT, buildDuplicateCheckInput } from '../llm/prompts.js';
import { parseJsonReply } from '../llm/parse.js';
import { LlmError, LlmUnavailableError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { sleep as realSleep } from '../shared/utils.js';
import { normalizeForDedup } from './normalize.js';
import { tfidfMatrix, cosine } from './tfidf.js';

export interface DedupOptions {
  lowThreshold: number;
  highThreshold: number;
  maxFeatures: number;
  oracleDelayMs: number;
  /**
   * Sources whose new records are checked. Job-board listings carry only a
   * title, so identical titles would otherwise mark distinct positions.
   */
  sources?: readonly string[];
  sleep?: (ms: number) => Promise<void>;
}

export const DEFAULT_DEDUP_SOURCES: readonly string[] = ['bluesky'];

// Only the boolean decides; confidence and reason are informational.
const DuplicateVerdictSchema = z.object({
  duplicate: z.boolean(),
  confidence: z.unknown().optional(),
  reason: z.unknown().optional(),
});

export type DuplicateVerdict = z.infer<typeof DuplicateVerdictSchema>;

export function parseDuplicateVerdict(raw: string): DuplicateVerdict | null {
  return parseJsonReply(DuplicateVerdictSchema, raw);
}

async function confirmWithOracle(
  oracle: ClassificationOracle,
  existingText: string,
  newText: string,
): Promise<boolean> {
  let reply: string;
  try {
    reply = await oracle.classify(buildDuplicateCheckInput(existingText, newText), DUPLICATE_CHECK_PROMPT);
  } catch (err) {
    if (err instanceof LlmUnavailableError) throw err;
    if (err instanceof LlmError) {
      logger.warn({ error: errorMessage(err) }, 'Duplicate check failed, treating as distinct');
      return false;
    }
    throw err;
  }

  const verdict = parseDuplicateVerdict(reply);
  if (!verdict) {
    logger.warn({ reply: reply.slice(0, 80) }, 'Unparseable duplicate verdict, treating as distinct');
    return false;
  }
  logger.debug({ duplicate: verdict.duplicate, confidence: verdict.confidence, reason: verdict.reason }, 'Duplicate verdict');
  return verdict.duplicate;
}

interface Candidate {
  uri: string;
  text: string;
}

/**
 * Mark stored postings that the newly stored ones supersede. The newer
 * posting always stays canonical; the older one gets `duplicate_of`.
 *
 * Scores below `lowThreshold` are ignored, scores at or above
 * `highThreshold` are marked outright, and the band in between goes to the
 * oracle when one is configured. Returns the number of records marked.
 */
export async function markOldDuplicates(
  newRecords: readonly PostingRecord[],
  ops: DedupOperations,
  oracle: ClassificationOracle | null,
  options: DedupOptions,
): Promise<number> {
  const sleep = options.sleep ?? realSleep;
  const newUris = new Set(newRecords.map((r) => r.uri));
  const sources = new Set(options.sources ?? DEFAULT_DEDUP_SOURCES);

  const incoming: Candidate[] = newRecords
    .filter((r) => r.is_verified_job === true && sources.has(r.source))
    .map((r) => ({ uri: r.uri, text: normalizeForDedup(r.message) }))
    .filter((c) => c.text.length > 0);

  const existing: Candidate[] = ops
    .canonicalRecordsForDedup()
    .filter((r) => !newUris.has(r.uri))
    .map((r) => ({ uri: r.uri, text: normalizeForDedup(r.message) }))
    .filter((c) => c.text.length > 0);

  if (incoming.length === 0 || existing.length === 0) return 0;

  const rows = tfidfMatrix(
    [...existing.map((c) => c.text), ...incoming.map((c) => c.text)],
    options.maxFeatures,
  );
  const existingRows = rows.slice(0, existing.length);
  const incomingRows = rows.slice(existing.length);

  const marked = new Set<number>();
  let count = 0;

  for (const [i, candidate] of incoming.entries()) {
    let best = -1;
    let score = 0;
    for (const [j, row] of existingRows.entries()) {
      const s = cosine(incomingRows[i], row);
      if (s > score) {
        score = s;
        best = j;
      }
    }
    if (best === -1 || score < options.lowThreshold) continue;
    // Best match already superseded in this pass; a weaker runner-up is not considered.
    if (marked.has(best)) {
      logger.debug({ new: candidate.uri, match: existing[best].uri }, 'Best match already marked, skipping');
      continue;
    }

    const match = existing[best];
    let isDuplicate: boolean;
    if (score >= options.highThreshold) {
      isDuplicate = true;
    } else if (oracle) {
      isDuplicate = await confirmWithOracle(oracle, match.text, candidate.text);
      await sleep(options.oracleDelayMs);
    } else {
      continue;
    }
    if (!isDuplicate) continue;

    if (ops.markDuplicate(match.uri, candidate.uri)) {
      marked.add(best);
      count++;
      logger.info({ old: match.uri, new: candidate.uri, score: Number(score.toFixed(3)) }, 'Marked duplicate');
    }
  }

  return count;
}
