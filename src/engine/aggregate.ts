import type { Config } from '../shared/config.js';
import type { SourceAdapter } from '../source/adapter.js';
import type { StorageBackend } from '../storage/backend.js';
import type { SyncStateStore } from '../state/syncState.js';
import type { ClassificationOracle } from '../llm/oracle.js';
import type { PostingRecord } from '../record/record.js';
import { markOldDuplicates } from '../dedup/engine.js';
import { LlmUnavailableError, StorageError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { generateId, sleep as realSleep } from '../shared/utils.js';

export interface AggregationDeps {
  adapters: readonly SourceAdapter[];
  storage: StorageBackend;
  stateStore: SyncStateStore;
  /** Used for duplicate confirmation; classification is wired into the adapters. */
  oracle: ClassificationOracle | null;
  config: Pick<Config, 'dedup' | 'sync'>;
  sleep?: (ms: number) => Promise<void>;
}

export interface AggregationOptions {
  /** Ignore stored watermarks and seen sets for this run. */
  fullSync?: boolean;
  /** Overrides `sync.seed_from_storage`. */
  seedFromStorage?: boolean;
}

export interface AggregationStats {
  runId: string;
  sourcesProcessed: number;
  sourcesFailed: number;
  recordsFetched: number;
  recordsStored: number;
  duplicatesMarked: number;
  errors: Array<{ source: string; message: string }>;
  aborted: boolean;
  durationMs: number;
}

interface ProposedState {
  source: string;
  lastTimestamp: string | null;
  seen: Set<string>;
}

/** Greater of the previous watermark and the newest fetched timestamp. */
export function advanceWatermark(previous: string | null, records: readonly PostingRecord[]): string | null {
  let watermark = previous;
  for (const record of records) {
    if (watermark === null || record.created_at > watermark) watermark = record.created_at;
  }
  return watermark;
}

function maxTimestamp(a: string | null, b: string | null): string | null {
  if (a === null) return b;
  if (b === null) return a;
  return a > b ? a : b;
}

/**
 * One aggregation run: fetch every source in order, store the batch once,
 * resolve duplicates, then persist sync state for the sources that
 * succeeded. State is only written after the batch is safely stored.
 *
 * Throws StorageError when the batch cannot be stored. An unavailable
 * oracle aborts the run without storing anything further; the returned
 * stats then carry `aborted: true`.
 */
export async function runAggregation(
  deps: AggregationDeps,
  options: AggregationOptions = {},
): Promise<AggregationStats> {
  const { adapters, storage, stateStore, oracle, config } = deps;
  const started = Date.now();
  const runId = generateId(8);
  const log = logger.child({ runId });
  const seedFromStorage = options.seedFromStorage ?? config.sync.seed_from_storage;

  const stats: AggregationStats = {
    runId,
    sourcesProcessed: 0,
    sourcesFailed: 0,
    recordsFetched: 0,
    recordsStored: 0,
    duplicatesMarked: 0,
    errors: [],
    aborted: false,
    durationMs: 0,
  };
  const finish = (): AggregationStats => {
    stats.durationMs = Date.now() - started;
    return stats;
  };
  const abort = (err: LlmUnavailableError): AggregationStats => {
    log.error({ error: err.message }, 'Classification service unavailable, aborting run without saving state');
    stats.aborted = true;
    return finish();
  };

  const batch: PostingRecord[] = [];
  const proposed: ProposedState[] = [];

  for (const adapter of adapters) {
    const source = adapter.name;
    const stored = stateStore.hasState(source) ? stateStore.getState(source) : null;
    let since: string | null = null;
    let existing: ReadonlySet<string> = new Set<string>();

    if (options.fullSync) {
      log.info({ source }, 'Full sync, ignoring stored state');
    } else if (stored) {
      since = stored.lastTimestamp;
      existing = stored.seenIdentifiers;
    } else if (seedFromStorage) {
      since = storage.lastTimestamp(source);
      existing = storage.existingIdentifiers(source);
      log.info({ source, since, seeded: existing.size }, 'No sync state, seeding from storage');
    }

    log.info({ source, since }, 'Fetching source');
    try {
      const result = await adapter.fetch(since, existing);
      batch.push(...result.records);
      // A full sync never moves the watermark backwards or forgets seen identifiers.
      const seen = new Set([...(stored?.seenIdentifiers ?? []), ...result.seen]);
      proposed.push({
        source,
        lastTimestamp: advanceWatermark(maxTimestamp(since, stored?.lastTimestamp ?? null), result.records),
        seen,
      });
      stats.sourcesProcessed++;
      stats.recordsFetched += result.records.length;
      log.info({ source, count: result.records.length, skippedOld: result.skippedOld }, 'Source fetched');
    } catch (err) {
      if (err instanceof LlmUnavailableError) return abort(err);
      stats.sourcesFailed++;
      stats.errors.push({ source, message: errorMessage(err) });
      log.warn({ source, error: errorMessage(err) }, 'Source failed, continuing with the rest');
    }
  }

  if (batch.length > 0) {
    try {
      stats.recordsStored = storage.upsert(batch);
    } catch (err) {
      log.error({ error: errorMessage(err), records: batch.length }, 'Failed to store records, sync state not saved');
      throw err instanceof StorageError ? err : new StorageError(errorMessage(err), { records: batch.length });
    }
    log.info({ stored: stats.recordsStored, backend: storage.kind }, 'Records stored');

    if (storage.dedup && config.dedup.enabled) {
      try {
        stats.duplicatesMarked = await markOldDuplicates(batch, storage.dedup, oracle, {
          lowThreshold: config.dedup.low_threshold,
          highThreshold: config.dedup.high_threshold,
          maxFeatures: config.dedup.max_features,
          oracleDelayMs: config.dedup.oracle_delay_ms,
          sources: config.dedup.sources,
          sleep: deps.sleep ?? realSleep,
        });
      } catch (err) {
        if (err instanceof LlmUnavailableError) return abort(err);
        throw err;
      }
      log.info({ marked: stats.duplicatesMarked }, 'Duplicates resolved');
    } else if (!storage.dedup) {
      log.debug({ backend: storage.kind }, 'Backend cannot resolve duplicates, skipping dedup');
    }
  }

  for (const state of proposed) {
    stateStore.updateState(state.source, state.lastTimestamp, state.seen);
  }

  const result = finish();
  log.info(
    {
      processed: result.sourcesProcessed,
      failed: result.sourcesFailed,
      fetched: result.recordsFetched,
      stored: result.recordsStored,
      duplicates: result.duplicatesMarked,
      durationMs: result.durationMs,
    },
    'Aggregation finished',
  );
  return result;
}
