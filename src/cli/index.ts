#!/usr/bin/env node

import { Command } from 'commander';
import fs from 'node:fs';
import path from 'node:path';
import type Database from 'better-sqlite3';
import { loadConfig, writeDefaultConfig, type Config } from '../shared/config.js';
import { getTributaryDir, resolvePath, VERSION } from '../shared/utils.js';
import { errorMessage } from '../shared/errors.js';
import { createSessionFactory, openDb, MEMORY_DB } from '../db/db.js';
import { runMigrations } from '../db/migrate.js';
import { Orchestrator, type OrchestratorSummary } from '../engine/orchestrator.js';
import { CheckpointManager } from '../engine/checkpoint.js';
import { RunTracker } from '../engine/runTracker.js';
import { SchemaDriftDetector } from '../engine/schemaDrift.js';
import { Scheduler } from '../schedule/scheduler.js';
import { startServer } from '../api/server.js';
import { SOURCE_TYPES, type SourceType } from '../source/adapter.js';

const program = new Command();

program
  .name('tributary')
  .description('Incremental multi-source ingestion pipeline')
  .version(VERSION);

// === init ===
program
  .command('init')
  .description('Create the config file and database')
  .action(async () => {
    const configPath = path.join(getTributaryDir(), 'config.yaml');

    if (!fs.existsSync(configPath)) {
      writeDefaultConfig(configPath);
      log(`✓ ${configPath} created`);
    } else {
      log(`✓ ${configPath} already exists`);
    }

    const config = await loadConfig();
    const db = openDb(config.db.path);
    const { applied } = runMigrations(db);
    if (applied.length > 0) {
      log(`✓ ${resolvePath(config.db.path)} created (${applied.length} migrations applied)`);
    } else {
      log(`✓ ${resolvePath(config.db.path)} already up to date`);
    }
    db.close();
  });

// === run ===
program
  .command('run')
  .description('Run the enabled (or given) sources once')
  .option('-s, --source <types...>', `Sources to run (${SOURCE_TYPES.join(', ')})`)
  .option('-p, --parallel', 'Run sources concurrently')
  .option('--fail-fast', 'Stop at the first failed source')
  .action(async (opts: { source?: string[]; parallel?: boolean; failFast?: boolean }) => {
    const sources = opts.source ? parseSourceTypes(opts.source) : undefined;
    const { orchestrator, cleanup } = await getContext();
    try {
      const summary = await orchestrator.runAll(sources, {
        parallel: opts.parallel,
        failOnError: opts.failFast,
      });
      printSummary(summary);
      if (summary.failed > 0) process.exitCode = 1;
    } catch (err) {
      log(`Run aborted: ${errorMessage(err)}`);
      process.exitCode = 1;
    } finally {
      cleanup();
    }
  });

// === schedule ===
program
  .command('schedule')
  .description('Run all enabled sources on a cron schedule')
  .option('-c, --cron <expr>', 'Cron expression (defaults to schedule.cron)')
  .action(async (opts: { cron?: string }) => {
    const { config, orchestrator, cleanup } = await getContext();
    const scheduler = new Scheduler(orchestrator, opts.cron ?? config.schedule.cron);
    scheduler.start();
    log(`Scheduler running (${scheduler.expression}). Press Ctrl+C to stop.`);

    const stop = async (): Promise<void> => {
      await scheduler.stop();
      cleanup();
      process.exit(0);
    };
    process.once('SIGINT', () => void stop());
    process.once('SIGTERM', () => void stop());
  });

// === serve ===
program
  .command('serve')
  .description('Start the reporting API')
  .option('-p, --port <port>', 'Port (defaults to server.port)')
  .option('--with-scheduler', 'Also run the cron scheduler')
  .action(async (opts: { port?: string; withScheduler?: boolean }) => {
    await startServer({
      port: opts.port ? parseInt(opts.port, 10) : undefined,
      withScheduler: opts.withScheduler,
    });
  });

// === checkpoint ===
const checkpointCmd = program.command('checkpoint').description('Inspect and reset checkpoints');

checkpointCmd
  .command('list')
  .description('Show the checkpoint of every source')
  .action(async () => {
    const { db, cleanup } = await getDb();
    try {
      const checkpoints = new CheckpointManager(db).getAllCheckpoints();
      if (checkpoints.length === 0) {
        log('No checkpoints yet.');
        return;
      }
      for (const cp of checkpoints) {
        log(
          `${cp.source_type.padEnd(6)} last: ${(cp.last_source_id ?? '-').padEnd(40)} offset: ${String(cp.last_offset).padStart(6)}  at: ${cp.last_processed_at ?? 'never'}`,
        );
      }
    } finally {
      cleanup();
    }
  });

checkpointCmd
  .command('reset <type>')
  .description('Forget progress so the next run starts from the beginning')
  .action(async (type: string) => {
    const [sourceType] = parseSourceTypes([type]);
    const { db, cleanup } = await getDb();
    try {
      new CheckpointManager(db).resetCheckpoint(sourceType);
      log(`✓ Checkpoint for ${sourceType} reset`);
    } finally {
      cleanup();
    }
  });

// === runs ===
const runsCmd = program.command('runs').description('Run history');

runsCmd
  .command('list')
  .description('Show recent runs')
  .option('-s, --source <type>', 'Only this source')
  .option('-l, --limit <n>', 'Max runs', '10')
  .action(async (opts: { source?: string; limit: string }) => {
    const sourceType = opts.source ? parseSourceTypes([opts.source])[0] : undefined;
    const { db, cleanup } = await getDb();
    try {
      const runs = new RunTracker(db).listRuns({ sourceType, limit: parseInt(opts.limit, 10) });
      if (runs.length === 0) {
        log('No runs yet.');
        return;
      }
      for (const r of runs) {
        const duration = r.duration_seconds === null ? '-' : `${r.duration_seconds.toFixed(1)}s`;
        log(
          `${r.run_id}  ${r.source_type.padEnd(6)} ${r.status.padEnd(8)} loaded ${String(r.records_loaded).padStart(5)}  skipped ${String(r.records_skipped).padStart(5)}  failed ${String(r.records_failed).padStart(4)}  ${duration.padStart(8)}  ${r.started_at}`,
        );
      }
    } finally {
      cleanup();
    }
  });

runsCmd
  .command('compare <a> <b>')
  .description('Compare two runs (b is the later one)')
  .action(async (a: string, b: string) => {
    const { db, cleanup } = await getDb();
    try {
      const comparison = new RunTracker(db).compareRuns(a, b);
      if (!comparison) {
        log('Run not found.');
        process.exitCode = 1;
        return;
      }
      log(JSON.stringify(comparison, null, 2));
    } finally {
      cleanup();
    }
  });

// === drift ===
const driftCmd = program.command('drift').description('Schema drift');

driftCmd
  .command('list')
  .description('Show unresolved drifts')
  .option('-s, --source <type>', 'Only this source')
  .option('-a, --all', 'Include resolved drifts')
  .action(async (opts: { source?: string; all?: boolean }) => {
    const sourceType = opts.source ? parseSourceTypes([opts.source])[0] : undefined;
    const { db, cleanup } = await getDb();
    try {
      const drifts = new SchemaDriftDetector(db).listDrifts({
        sourceType,
        resolved: opts.all ? undefined : false,
      });
      if (drifts.length === 0) {
        log('No drifts.');
        return;
      }
      for (const d of drifts) {
        const types = `${d.expected_type ?? '-'} → ${d.actual_type ?? '-'}`;
        log(
          `#${String(d.id).padEnd(5)} ${d.source_type.padEnd(6)} ${d.field_name.padEnd(24)} ${d.drift_type.padEnd(13)} ${types.padEnd(20)} ${d.confidence_score.toFixed(2)}${d.resolved ? '  (resolved)' : ''}`,
        );
      }
    } finally {
      cleanup();
    }
  });

driftCmd
  .command('resolve <id>')
  .description('Mark a drift as resolved')
  .action(async (id: string) => {
    const { db, cleanup } = await getDb();
    try {
      if (new SchemaDriftDetector(db).resolveDrift(parseInt(id, 10))) {
        log(`✓ Drift #${id} resolved`);
      } else {
        log(`Drift not found: ${id}`);
        process.exitCode = 1;
      }
    } finally {
      cleanup();
    }
  });

// === inject-failure ===
program
  .command('inject-failure <type>')
  .description('Run one source and abort it at the given record, to test recovery')
  .requiredOption('--at <n>', 'Record number (1-based) at which to fail')
  .action(async (type: string, opts: { at: string }) => {
    const [sourceType] = parseSourceTypes([type]);
    const atRecord = parseInt(opts.at, 10);
    if (!Number.isInteger(atRecord) || atRecord < 1) {
      log(`Invalid record number: ${opts.at}`);
      process.exitCode = 1;
      return;
    }

    const { orchestrator, cleanup } = await getContext();
    try {
      const result = await orchestrator.runWithFailureInjection(sourceType, atRecord);
      log(`Status:                 ${result.status}`);
      log(`Records before failure: ${result.recordsBeforeFailure}`);
      log(`Run:                    ${result.runId ?? '-'}`);
      if (result.error) log(`Error:                  ${result.error}`);
      log(`\nRun "tributary run --source ${sourceType}" to verify recovery.`);
    } finally {
      cleanup();
    }
  });

function parseSourceTypes(values: string[]): [SourceType, ...SourceType[]] {
  const out: SourceType[] = [];
  for (const value of values) {
    const match = SOURCE_TYPES.find((t) => t === value);
    if (!match) {
      log(`Unknown source type: ${value} (expected one of ${SOURCE_TYPES.join(', ')})`);
      process.exit(1);
    }
    out.push(match);
  }
  const [first, ...rest] = out;
  if (!first) {
    log('No source type given');
    process.exit(1);
  }
  return [first, ...rest];
}

function printSummary(summary: OrchestratorSummary): void {
  for (const r of summary.results) {
    const counters = r.counters
      ? `loaded ${r.counters.loaded}, skipped ${r.counters.skipped}, failed ${r.counters.failed}`
      : r.error ?? '';
    log(`  ${r.sourceType.padEnd(6)} ${r.status.padEnd(8)} ${counters}`);
  }
  log(`\nRun complete in ${summary.durationSeconds.toFixed(1)}s:`);
  log(`  Sources processed: ${summary.sourcesProcessed}`);
  log(`  Successful:        ${summary.successful}`);
  log(`  Partial:           ${summary.partial}`);
  log(`  Failed:            ${summary.failed}`);
}

// === Helpers to get DB connection ===
async function getDb(): Promise<{
  db: Database.Database;
  config: Config;
  cleanup: () => void;
}> {
  const config = await loadConfig();

  if (config.db.path !== MEMORY_DB && !fs.existsSync(resolvePath(config.db.path))) {
    log('Database not found. Run tributary init first.');
    process.exit(1);
  }

  const db = openDb(config.db.path);
  runMigrations(db);

  return { db, config, cleanup: () => db.close() };
}

async function getContext(): Promise<{
  db: Database.Database;
  config: Config;
  orchestrator: Orchestrator;
  cleanup: () => void;
}> {
  const { db, config, cleanup } = await getDb();
  const orchestrator = new Orchestrator(config, { sessions: createSessionFactory(config.db.path, db) });
  return { db, config, orchestrator, cleanup };
}

function log(msg: string): void {
  // eslint-disable-next-line no-console
  console.log(msg);
}

program.parseAsync().catch((err: unknown) => {
  log(`Error: ${errorMessage(err)}`);
  process.exitCode = 1;
});
