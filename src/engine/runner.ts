import type Database from 'better-sqlite3';
import type { Checkpoint, ExtractScope, Extractor, JsonValue, RawPayload, RunStatus, SourceType } from '../source/adapter.js';
import type { RateLimiter } from './rateLimiter.js';
import type { SchemaDriftDetector } from './schemaDrift.js';
import type { RunCounters } from './runTracker.js';
import { RunTracker } from './runTracker.js';
import { CheckpointManager } from './checkpoint.js';
import { loadRaw, loadUnified } from '../source/recordDb.js';
import { errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

/** Stage a record had reached when it failed. */
export type RecordStage = 'identify' | 'load_raw' | 'transform' | 'load_unified';

export type RecordOutcome =
  | { kind: 'loaded'; sourceId: string; rawId: number; unifiedId: number }
  | { kind: 'skipped'; sourceId: string; reason: string }
  | { kind: 'failed'; sourceId: string | null; stage: RecordStage; error: string };

export interface RunnerDeps {
  db: Database.Database;
  limiter: RateLimiter;
  /** Null turns drift detection off. */
  driftDetector?: SchemaDriftDetector | null;
  now?: () => Date;
}

export interface RunnerOptions {
  /** Wraps the extractor's sequence before it is consumed. */
  wrapStream?: <T>(stream: AsyncIterable<T>) => AsyncIterable<T>;
  onRunStarted?: (runId: string) => void;
}

export interface RunResult {
  runId: string;
  sourceType: SourceType;
  status: Exclude<RunStatus, 'running'>;
  counters: RunCounters;
  /** The id written to the checkpoint, if any record was loaded. */
  checkpointId: string | null;
  durationSeconds: number | null;
}

function emptyCounters(): RunCounters {
  return { extracted: 0, transformed: 0, loaded: 0, skipped: 0, failed: 0 };
}

function checkpointSnapshot(checkpoint: Checkpoint | null): JsonValue {
  if (!checkpoint) return null;
  return {
    last_source_id: checkpoint.last_source_id,
    last_offset: checkpoint.last_offset,
    last_processed_at: checkpoint.last_processed_at,
  };
}

/** Fields an upstream sent, without the `_`-prefixed fetch metadata. */
function upstreamFields(raw: RawPayload): RawPayload {
  return Object.fromEntries(Object.entries(raw).filter(([key]) => !key.startsWith('_')));
}

/**
 * Drives one extractor through a tracked run: per-record dedup against the
 * checkpoint, drift detection, the raw/unified dual write, and the final
 * checkpoint and run bookkeeping.
 *
 * Record-level failures are counted and the run continues. A failure of the
 * source itself advances a cursor checkpoint to the last loaded record,
 * marks the run failed and rethrows.
 */
export class ExtractionRunner<Raw extends RawPayload = RawPayload> {
  readonly checkpoints: CheckpointManager;
  readonly tracker: RunTracker;

  private readonly db: Database.Database;
  private readonly limiter: RateLimiter;
  private readonly driftDetector: SchemaDriftDetector | null;

  constructor(
    private readonly extractor: Extractor<Raw>,
    deps: RunnerDeps,
    private readonly options: RunnerOptions = {},
  ) {
    this.db = deps.db;
    this.limiter = deps.limiter;
    this.driftDetector = deps.driftDetector ?? null;
    this.checkpoints = new CheckpointManager(deps.db);
    this.tracker = new RunTracker(deps.db, deps.now);
  }

  get sourceType(): SourceType {
    return this.extractor.sourceType;
  }

  /**
   * Cursor-mode sources compare ids against the checkpoint; stop-at-seen
   * sources end their own sequence and process everything they yield.
   */
  shouldProcess(sourceId: string, checkpoint: Checkpoint | null): boolean {
    if (this.extractor.incremental === 'stop-at-seen') return true;
    return this.checkpoints.shouldProcess(this.sourceType, sourceId, checkpoint);
  }

  processRecord(raw: Raw, checkpoint: Checkpoint | null): RecordOutcome {
    const sourceType = this.sourceType;

    let sourceId: string;
    try {
      sourceId = this.extractor.getSourceId(raw);
    } catch (err) {
      logger.error({ sourceType, err: errorMessage(err) }, 'Could not identify record');
      return { kind: 'failed', sourceId: null, stage: 'identify', error: errorMessage(err) };
    }

    if (!this.shouldProcess(sourceId, checkpoint)) {
      return { kind: 'skipped', sourceId, reason: 'already processed' };
    }

    if (this.driftDetector) {
      try {
        const drifts = this.driftDetector.detectDrift(sourceType, upstreamFields(raw));
        this.driftDetector.recordDrifts(sourceType, drifts);
      } catch (err) {
        logger.warn({ sourceType, sourceId, err: errorMessage(err) }, 'Drift detection failed');
      }
    }

    let stage: RecordStage = 'load_raw';
    try {
      const rawId = loadRaw(this.db, {
        sourceType,
        sourceId,
        payload: this.extractor.storedPayload(raw),
        origin: this.extractor.originOf(raw),
      });

      stage = 'transform';
      const record = this.extractor.transform(raw);

      stage = 'load_unified';
      const unifiedId = loadUnified(this.db, { sourceType, rawId, record });

      return { kind: 'loaded', sourceId, rawId, unifiedId };
    } catch (err) {
      logger.error({ sourceType, sourceId, stage, err: errorMessage(err) }, 'Record failed');
      return { kind: 'failed', sourceId, stage, error: errorMessage(err) };
    }
  }

  async run(): Promise<RunResult> {
    const sourceType = this.sourceType;
    const checkpoint = this.checkpoints.getCheckpoint(sourceType);
    const run = this.tracker.startRun(sourceType, { checkpoint: checkpointSnapshot(checkpoint) });
    this.options.onRunStarted?.(run.run_id);

    const counters = emptyCounters();
    let firstLoaded: string | null = null;
    let lastLoaded: string | null = null;

    const scope: ExtractScope = {
      checkpoint,
      limiter: this.limiter,
      checkpoints: this.checkpoints,
      skip: (reason) => {
        counters.skipped++;
        logger.debug({ sourceType, reason }, 'Record skipped by extractor');
      },
    };

    // Returns the id written, or null when nothing moved. A stop-at-seen
    // marker (the newest item) only moves after a complete pass.
    const saveCheckpoint = (completed: boolean): string | null => {
      const target = this.extractor.incremental === 'stop-at-seen' ? (completed ? firstLoaded : null) : lastLoaded;
      if (target === null) return null;
      this.checkpoints.updateCheckpoint(sourceType, {
        lastSourceId: target,
        metadata: { records_processed: counters.loaded },
      });
      return target;
    };

    const stream = this.extractor.extract(scope);
    const wrapped = this.options.wrapStream ? this.options.wrapStream(stream) : stream;

    let checkpointId: string | null;
    try {
      for await (const raw of wrapped) {
        const outcome = this.processRecord(raw, checkpoint);

        switch (outcome.kind) {
          case 'loaded':
            counters.extracted++;
            counters.transformed++;
            counters.loaded++;
            firstLoaded ??= outcome.sourceId;
            lastLoaded = outcome.sourceId;
            this.extractor.onRecordLoaded?.(raw, scope);
            break;
          case 'skipped':
            counters.skipped++;
            break;
          case 'failed':
            if (outcome.stage !== 'identify') counters.extracted++;
            if (outcome.stage === 'load_unified') counters.transformed++;
            counters.failed++;
            break;
        }
      }

      checkpointId = saveCheckpoint(true);
    } catch (err) {
      logger.error({ sourceType, runId: run.run_id, err: errorMessage(err) }, 'Extraction failed');

      const checkpointData: Record<string, JsonValue> = { last_source_id: null };
      try {
        checkpointData['last_source_id'] = saveCheckpoint(false);
      } catch (checkpointErr) {
        logger.error(
          { sourceType, runId: run.run_id, err: errorMessage(checkpointErr) },
          'Could not save checkpoint after failure',
        );
        checkpointData['checkpoint_error'] = errorMessage(checkpointErr);
      }

      this.tracker.completeRun(run.run_id, {
        status: 'failed',
        counters,
        error: err,
        checkpointData,
      });
      throw err;
    }

    const status = counters.failed === 0 ? 'success' : 'partial';
    const completed = this.tracker.completeRun(run.run_id, {
      status,
      counters,
      checkpointData: { last_source_id: checkpointId },
    });

    return {
      runId: run.run_id,
      sourceType,
      status,
      counters,
      checkpointId,
      durationSeconds: completed.duration_seconds,
    };
  }
}
