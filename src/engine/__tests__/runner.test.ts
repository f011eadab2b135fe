import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { runMigrations } from '../../db/migrate.js';
import { ExtractionRunner } from '../runner.js';
import { RateLimiter } from '../rateLimiter.js';
import { ExpectedSchemaRegistry, SchemaDriftDetector } from '../schemaDrift.js';
import { CheckpointManager } from '../checkpoint.js';
import { RunTracker } from '../runTracker.js';
import { countUnifiedRecords } from '../../source/recordDb.js';
import { ExtractionError } from '../../shared/errors.js';
import { ListExtractor, items, type ListExtractorOptions, type ListItem } from './listExtractor.js';

let db: Database.Database;
let limiter: RateLimiter;

function makeRunner(list: ListItem[], options: ListExtractorOptions = {}, detector: SchemaDriftDetector | null = null) {
  const extractor = new ListExtractor(list, options);
  const runner = new ExtractionRunner(extractor, { db, limiter, driftDetector: detector });
  return { extractor, runner };
}

function rawCount(): number {
  const row = db.prepare('SELECT COUNT(*) AS n FROM raw_records').get() as { n: number };
  return row.n;
}

beforeEach(() => {
  db = new Database(':memory:');
  runMigrations(db);
  limiter = new RateLimiter({ requestsPerMinute: 60, maxRetries: 3, backoffBase: 2 });
});

afterEach(() => {
  db.close();
});

describe('ExtractionRunner.run', () => {
  it('loads every record and checkpoints the last id', async () => {
    const { runner, extractor } = makeRunner(items('a', 'b', 'c'));

    const result = await runner.run();

    expect(result.status).toBe('success');
    expect(result.counters).toEqual({ extracted: 3, transformed: 3, loaded: 3, skipped: 0, failed: 0 });
    expect(result.checkpointId).toBe('c');
    expect(extractor.loaded).toEqual(['a', 'b', 'c']);

    const checkpoint = new CheckpointManager(db).getCheckpoint('file');
    expect(checkpoint?.last_source_id).toBe('c');
    expect(checkpoint?.metadata).toEqual({ records_processed: 3 });

    const run = new RunTracker(db).getRun(result.runId);
    expect(run?.status).toBe('success');
    expect(run?.records_loaded).toBe(3);
    expect(run?.metadata_json).toBe('{"checkpoint":null}');
  });

  it('skips everything on an unchanged rerun', async () => {
    await makeRunner(items('a', 'b', 'c')).runner.run();

    const result = await makeRunner(items('a', 'b', 'c')).runner.run();

    expect(result.status).toBe('success');
    expect(result.counters).toEqual({ extracted: 0, transformed: 0, loaded: 0, skipped: 3, failed: 0 });
    expect(result.checkpointId).toBeNull();
    expect(new CheckpointManager(db).getLastSourceId('file')).toBe('c');
    expect(rawCount()).toBe(3);
  });

  it('picks up only newer ids after the checkpoint', async () => {
    await makeRunner(items('a', 'b')).runner.run();

    const result = await makeRunner(items('a', 'b', 'c', 'd')).runner.run();

    expect(result.counters.loaded).toBe(2);
    expect(result.counters.skipped).toBe(2);
    expect(result.checkpointId).toBe('d');
  });

  it('reprocesses in place after a checkpoint reset', async () => {
    await makeRunner(items('a', 'b', 'c')).runner.run();
    new CheckpointManager(db).resetCheckpoint('file');

    const result = await makeRunner(items('a', 'b', 'c')).runner.run();

    expect(result.counters.loaded).toBe(3);
    expect(rawCount()).toBe(3);
    expect(countUnifiedRecords(db)).toBe(3);
  });

  it('counts record failures and finishes partial', async () => {
    const { runner, extractor } = makeRunner(items('a', 'b', 'c'), { badIds: ['b'] });

    const result = await runner.run();

    expect(result.status).toBe('partial');
    expect(result.counters).toEqual({ extracted: 3, transformed: 2, loaded: 2, skipped: 0, failed: 1 });
    expect(result.checkpointId).toBe('c');
    expect(extractor.loaded).toEqual(['a', 'c']);
    // the raw payload was stored before the transform failed
    expect(rawCount()).toBe(3);
    expect(countUnifiedRecords(db)).toBe(2);
  });

  it('counts records the extractor drops as skipped', async () => {
    const result = await makeRunner(items('a', 'b', 'c'), { dropIds: ['b'] }).runner.run();

    expect(result.counters).toEqual({ extracted: 2, transformed: 2, loaded: 2, skipped: 1, failed: 0 });
  });

  it('saves progress, fails the run and rethrows on a source failure', async () => {
    const started: string[] = [];
    const runner = new ExtractionRunner(
      new ListExtractor(items('a', 'b', 'c', 'd'), { failAfter: 2 }),
      { db, limiter },
      { onRunStarted: (id) => started.push(id) },
    );

    await expect(runner.run()).rejects.toBeInstanceOf(ExtractionError);

    expect(new CheckpointManager(db).getLastSourceId('file')).toBe('b');
    const run = new RunTracker(db).getLastRun({ sourceType: 'file' });
    expect(started).toEqual([run?.run_id]);
    expect(run?.status).toBe('failed');
    expect(run?.error_message).toBe('source down');
    expect(run?.error_trace).toContain('source down');
    expect(run?.records_loaded).toBe(2);
  });

  it('resumes after a source failure without duplicates', async () => {
    await expect(makeRunner(items('a', 'b', 'c', 'd'), { failAfter: 2 }).runner.run()).rejects.toThrow('source down');

    const result = await makeRunner(items('a', 'b', 'c', 'd')).runner.run();

    expect(result.counters.loaded).toBe(2);
    expect(result.counters.skipped).toBe(2);
    expect(rawCount()).toBe(4);
    expect(new CheckpointManager(db).getLastSourceId('file')).toBe('d');
  });

  it('keeps the newest id for stop-at-seen sources', async () => {
    const result = await makeRunner(items('c', 'b', 'a'), { sourceType: 'feed', incremental: 'stop-at-seen' }).runner.run();

    expect(result.counters.loaded).toBe(3);
    expect(result.checkpointId).toBe('c');
    expect(new CheckpointManager(db).getLastSourceId('feed')).toBe('c');
  });

  it('leaves a stop-at-seen marker alone when the pass fails', async () => {
    const failing = makeRunner(items('c', 'b', 'a'), { sourceType: 'feed', incremental: 'stop-at-seen', failAfter: 1 });

    await expect(failing.runner.run()).rejects.toThrow('source down');

    expect(failing.extractor.loaded).toEqual(['c']);
    expect(new CheckpointManager(db).getLastSourceId('feed')).toBeNull();
    const failed = new RunTracker(db).getLastRun({ sourceType: 'feed' });
    expect(failed?.checkpoint_json).toBe('{"last_source_id":null}');

    const result = await makeRunner(items('c', 'b', 'a'), { sourceType: 'feed', incremental: 'stop-at-seen' }).runner.run();

    expect(result.counters.loaded).toBe(3);
    expect(result.checkpointId).toBe('c');
    expect(rawCount()).toBe(3);
  });

  it('records a checkpoint write failure on the failed run', async () => {
    async function* dropCheckpointsOnError<T>(stream: AsyncIterable<T>): AsyncIterable<T> {
      try {
        yield* stream;
      } catch (err) {
        db.exec('DROP TABLE checkpoints');
        throw err;
      }
    }
    const runner = new ExtractionRunner(
      new ListExtractor(items('a', 'b', 'c'), { failAfter: 2 }),
      { db, limiter },
      { wrapStream: dropCheckpointsOnError },
    );

    await expect(runner.run()).rejects.toThrow('source down');

    const run = new RunTracker(db).getLastRun({ sourceType: 'file' });
    expect(run?.status).toBe('failed');
    expect(run?.error_message).toBe('source down');
    expect(JSON.parse(run?.checkpoint_json ?? '{}')).toEqual({
      last_source_id: null,
      checkpoint_error: 'Failed to update checkpoint for file: no such table: checkpoints',
    });
  });

  it('records the starting checkpoint in the run metadata', async () => {
    await makeRunner(items('a')).runner.run();
    const checkpoint = new CheckpointManager(db).getCheckpoint('file');

    const result = await makeRunner(items('a')).runner.run();

    const run = new RunTracker(db).getRun(result.runId);
    expect(JSON.parse(run?.metadata_json ?? '{}')).toEqual({
      checkpoint: {
        last_source_id: 'a',
        last_offset: 0,
        last_processed_at: checkpoint?.last_processed_at,
      },
    });
  });
});

describe('ExtractionRunner drift detection', () => {
  function detector(): SchemaDriftDetector {
    return new SchemaDriftDetector(db, {
      schemas: new ExpectedSchemaRegistry({ file: { id: 'str', value: 'int' } }),
    });
  }

  it('records drift on upstream fields and still loads the record', async () => {
    const list: ListItem[] = [
      { id: 'a', value: 1, _seq: 0 },
      { id: 'b', value: true, _seq: 1 },
    ];
    const d = detector();

    const result = await makeRunner(list, {}, d).runner.run();

    expect(result.counters.loaded).toBe(2);
    const drifts = d.getUnresolvedDrifts('file');
    expect(drifts).toHaveLength(1);
    expect(drifts[0]?.field_name).toBe('value');
    expect(drifts[0]?.drift_type).toBe('type_change');
    expect(drifts[0]?.expected_type).toBe('int');
    expect(drifts[0]?.actual_type).toBe('bool');
  });

  it('skips detection when no detector is given', async () => {
    await makeRunner([{ id: 'a', value: true }]).runner.run();

    expect(db.prepare('SELECT COUNT(*) AS n FROM schema_drifts').get()).toEqual({ n: 0 });
  });
});

describe('ExtractionRunner.processRecord', () => {
  it('reports skipped records without touching the store', () => {
    const { runner } = makeRunner([]);
    const checkpoint = new CheckpointManager(db).updateCheckpoint('file', { lastSourceId: 'm' });

    expect(runner.processRecord({ id: 'b', value: 1 }, checkpoint)).toEqual({
      kind: 'skipped',
      sourceId: 'b',
      reason: 'already processed',
    });
    expect(rawCount()).toBe(0);
  });

  it('reports the failing stage', () => {
    const { runner } = makeRunner([], { badIds: ['x'] });

    expect(runner.processRecord({ id: 'x', value: 1 }, null)).toEqual({
      kind: 'failed',
      sourceId: 'x',
      stage: 'transform',
      error: 'cannot transform x',
    });
  });

  it('shouldProcess compares ids as text', () => {
    const { runner } = makeRunner([]);
    const checkpoint = new CheckpointManager(db).updateCheckpoint('file', { lastSourceId: 'test:50' });

    expect(runner.shouldProcess('test:6', checkpoint)).toBe(true);
    expect(runner.shouldProcess('test:100', checkpoint)).toBe(false);
    expect(runner.shouldProcess('anything', null)).toBe(true);
  });
});
