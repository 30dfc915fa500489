#!/usr/bin/env node

import { Command, Option } from 'commander';
import fs from 'node:fs';
import { z } from 'zod';
import {
  loadConfig,
  writeDefaultConfig,
  getDefaultConfigPath,
  SOURCE_NAMES,
  STORAGE_BACKENDS,
  type Config,
} from '../shared/config.js';
import { resolvePath } from '../shared/utils.js';
import { StorageError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { openDb } from '../db/db.js';
import { createOracle } from '../llm/client.js';
import { JobClassifier } from '../classify/classifier.js';
import { createAdapters } from '../source/registry.js';
import { openStorage } from '../storage/factory.js';
import { SyncStateStore } from '../state/syncState.js';
import { runAggregation, type AggregationStats } from '../engine/aggregate.js';

const RunOptionsSchema = z.object({
  source: z.array(z.enum(SOURCE_NAMES)).optional(),
  fullSync: z.boolean().default(false),
  llm: z.boolean().default(true),
  storage: z.enum(STORAGE_BACKENDS).optional(),
});

const program = new Command();

program
  .name('scholarsync')
  .description('Aggregate academic job postings from Bluesky and ScholarshipDB')
  .version('0.1.0');

// === init ===
program
  .command('init')
  .description('Create the default config and the SQLite database')
  .action(async () => {
    const configPath = getDefaultConfigPath();
    if (!fs.existsSync(configPath)) {
      writeDefaultConfig(configPath);
      log(`✓ ${configPath} created`);
    } else {
      log(`✓ ${configPath} already exists`);
    }

    const config = await loadConfig();
    const dbPath = resolvePath(config.storage.sqlite_path);
    const existed = fs.existsSync(dbPath);
    openDb(dbPath).close();
    log(existed ? `✓ ${dbPath} already up to date` : `✓ ${dbPath} created`);
  });

// === run ===
program
  .command('run')
  .description('Fetch new postings, store them and resolve duplicates')
  .addOption(new Option('--source <name...>', 'Only run these sources').choices(SOURCE_NAMES))
  .option('--full-sync', 'Ignore stored sync state for this run', false)
  .option('--no-llm', 'Skip classification and duplicate confirmation')
  .addOption(new Option('--storage <backend>', 'Override the configured backend').choices(STORAGE_BACKENDS))
  .action(async (rawOpts: unknown) => {
    const opts = RunOptionsSchema.parse(rawOpts);
    const config = await loadConfig();

    const oracle = opts.llm ? createOracle(config.llm) : null;
    if (!oracle) {
      log(opts.llm ? '⚠ No LLM API key configured, postings stay unclassified' : 'LLM disabled for this run');
    }
    const adapters = createAdapters(config.sources, oracle ? new JobClassifier(oracle) : null, opts.source);
    if (adapters.length === 0) {
      log('No enabled sources to run.');
      return;
    }

    const storage = openStorage(config.storage, opts.storage);
    const stateStore = new SyncStateStore(config.sync.state_file);

    let stats: AggregationStats;
    try {
      stats = await runAggregation(
        { adapters, storage, stateStore, oracle, config },
        { fullSync: opts.fullSync },
      );
    } catch (err) {
      if (err instanceof StorageError) {
        log(`✗ Could not store postings: ${err.message}`);
        log('  Sync state was not updated; the next run will fetch them again.');
        process.exitCode = 1;
        return;
      }
      throw err;
    } finally {
      storage.close();
    }

    if (stats.aborted) {
      log('⚠ The classification service is unavailable. Run aborted, nothing further saved.');
      log('  Sync state is unchanged; try again later.');
      return;
    }

    log(`✓ Run ${stats.runId} finished in ${(stats.durationMs / 1000).toFixed(1)}s`);
    log(`  Sources:    ${stats.sourcesProcessed} ok, ${stats.sourcesFailed} failed`);
    log(`  Fetched:    ${stats.recordsFetched}`);
    log(`  Stored:     ${stats.recordsStored} (${storage.kind})`);
    log(`  Duplicates: ${stats.duplicatesMarked}`);
    for (const e of stats.errors) {
      log(`  ✗ ${e.source}: ${e.message}`);
    }
  });

// === state ===
const stateCmd = program.command('state').description('Inspect or reset per-source sync state');

stateCmd
  .command('show')
  .description('Show the watermark and seen count for each source')
  .action(async () => {
    const config = await loadConfig();
    const store = new SyncStateStore(config.sync.state_file);
    const sources = store.listSources();
    if (sources.length === 0) {
      log(`No sync state in ${store.path}`);
      return;
    }
    for (const source of sources) {
      const state = store.getState(source);
      log(`${source.padEnd(15)} ${(state.lastTimestamp ?? '-').padEnd(26)} ${state.seenIdentifiers.size} seen`);
    }
  });

stateCmd
  .command('clear <source>')
  .description('Forget the sync state of one source')
  .action(async (source: string) => {
    const config = await loadConfig();
    const store = new SyncStateStore(config.sync.state_file);
    if (store.clearSource(source)) {
      log(`✓ Cleared sync state for ${source}`);
    } else {
      log(`No sync state for ${source}`);
      process.exitCode = 1;
    }
  });

// === doctor ===
program
  .command('doctor')
  .description('Check config, storage, LLM and sync state')
  .action(async () => {
    let config: Config;
    try {
      config = await loadConfig();
    } catch (err) {
      log(`✗ Config: error (${errorMessage(err)})`);
      process.exitCode = 1;
      return;
    }

    const results: string[] = ['Config: ok'];
    results.push(checkStorage(config));
    results.push(config.llm.api_key ? `LLM: configured (${config.llm.provider}, ${config.llm.model})` : 'LLM: (unconfigured)');

    const { bluesky } = config.sources;
    if (bluesky.enabled) {
      results.push(bluesky.handle && bluesky.password ? 'Bluesky: credentials set' : 'Bluesky: missing credentials');
    }

    const store = new SyncStateStore(config.sync.state_file);
    results.push(`State: ${store.listSources().length} sources tracked`);

    log(`✓ ${results.join(' | ')}`);
  });

function checkStorage(config: Config): string {
  if (config.storage.backend === 'csv') {
    const csvPath = resolvePath(config.storage.csv_path);
    return fs.existsSync(csvPath) ? 'Storage: csv ok' : 'Storage: csv (not written yet)';
  }
  const dbPath = resolvePath(config.storage.sqlite_path);
  if (!fs.existsSync(dbPath)) return 'Storage: sqlite missing (run scholarsync init)';
  try {
    openDb(dbPath).close();
    return 'Storage: sqlite ok';
  } catch (err) {
    return `Storage: sqlite error (${errorMessage(err)})`;
  }
}

function log(msg: string): void {
  // eslint-disable-next-line no-console
  console.log(msg);
}

program.parseAsync().catch((err: unknown) => {
  logger.error({ error: errorMessage(err) }, 'Command failed');
  process.exitCode = 1;
});
