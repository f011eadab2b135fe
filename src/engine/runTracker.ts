import type Database from 'better-sqlite3';
import type { JsonValue, RunStatus, SourceType } from '../source/adapter.js';
import { RunTrackingError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { generateId } from '../shared/utils.js';

export interface RunRow {
  id: number;
  run_id: string;
  source_type: SourceType;
  status: RunStatus;
  started_at: string;
  completed_at: string | null;
  duration_seconds: number | null;
  records_extracted: number;
  records_transformed: number;
  records_loaded: number;
  records_skipped: number;
  records_failed: number;
  error_message: string | null;
  error_trace: string | null;
  checkpoint_json: string | null;
  metadata_json: string | null;
}

export interface RunCounters {
  extracted: number;
  transformed: number;
  loaded: number;
  skipped: number;
  failed: number;
}

export interface CompleteRunInput {
  status: Exclude<RunStatus, 'running'>;
  counters: RunCounters;
  error?: unknown;
  checkpointData?: Record<string, JsonValue> | null;
}

export interface RunStats {
  totalRecordsProcessed: number;
  recordsBySource: Partial<Record<SourceType, number>>;
  runsInPeriod: number;
  successRate: number;
  averageDurationSeconds: number;
  lastSuccess: string | null;
  lastFailure: string | null;
  periodHours: number;
}

export type Severity = 'low' | 'medium' | 'high';

export interface RunAnomaly {
  type: 'record_count_anomaly' | 'duration_anomaly' | 'status_change';
  description: string;
  severity: Severity;
}

interface RunSummary {
  runId: string;
  sourceType: SourceType;
  status: RunStatus;
  recordsLoaded: number;
  durationSeconds: number | null;
  startedAt: string;
}

export interface RunComparison {
  run1: RunSummary;
  run2: RunSummary;
  differences: {
    recordsLoaded?: { absolute: number; percentage: number };
    duration?: { absolute: number; percentage: number };
  };
  anomalies: RunAnomaly[];
}

function summarize(run: RunRow): RunSummary {
  return {
    runId: run.run_id,
    sourceType: run.source_type,
    status: run.status,
    recordsLoaded: run.records_loaded,
    durationSeconds: run.duration_seconds,
    startedAt: run.started_at,
  };
}

/**
 * Run history: one row per extractor execution.
 */
export class RunTracker {
  constructor(
    private readonly db: Database.Database,
    private readonly now: () => Date = () => new Date(),
  ) {}

  startRun(sourceType: SourceType, metadata: Record<string, JsonValue> = {}): RunRow {
    const runId = generateId();
    this.db
      .prepare(
        `INSERT INTO runs (run_id, source_type, status, started_at, metadata_json)
         VALUES (?, ?, 'running', ?, ?)`,
      )
      .run(runId, sourceType, this.now().toISOString(), JSON.stringify(metadata));

    logger.info({ runId, sourceType }, 'Run started');
    return this.requireRun(runId);
  }

  /**
   * Finalize a running run. A run completes exactly once.
   *
   * @throws RunTrackingError if the run is missing or already completed
   */
  completeRun(runId: string, input: CompleteRunInput): RunRow {
    const existing = this.requireRun(runId);
    const completedAt = this.now();
    const duration = (completedAt.getTime() - new Date(existing.started_at).getTime()) / 1000;
    const { counters } = input;

    let errorMessage: string | null = null;
    let errorTrace: string | null = null;
    if (input.error !== undefined) {
      errorMessage = input.error instanceof Error ? input.error.message : String(input.error);
      errorTrace = input.error instanceof Error ? input.error.stack ?? null : null;
    }

    const result = this.db
      .prepare(
        `UPDATE runs SET
           status = ?, completed_at = ?, duration_seconds = ?,
           records_extracted = ?, records_transformed = ?, records_loaded = ?,
           records_skipped = ?, records_failed = ?,
           error_message = ?, error_trace = ?, checkpoint_json = ?
         WHERE run_id = ? AND status = 'running'`,
      )
      .run(
        input.status,
        completedAt.toISOString(),
        duration,
        counters.extracted,
        counters.transformed,
        counters.loaded,
        counters.skipped,
        counters.failed,
        errorMessage,
        errorTrace,
        input.checkpointData ? JSON.stringify(input.checkpointData) : null,
        runId,
      );

    if (result.changes === 0) {
      throw new RunTrackingError(`Run ${runId} is already completed`, { runId, status: existing.status });
    }

    logger.info(
      {
        runId,
        sourceType: existing.source_type,
        status: input.status,
        durationSeconds: duration,
        recordsLoaded: counters.loaded,
      },
      'Run completed',
    );

    return this.requireRun(runId);
  }

  getRun(runId: string): RunRow | null {
    const row = this.db.prepare('SELECT * FROM runs WHERE run_id = ?').get(runId) as RunRow | undefined;
    return row ?? null;
  }

  private requireRun(runId: string): RunRow {
    const run = this.getRun(runId);
    if (!run) throw new RunTrackingError(`Run not found: ${runId}`, { runId });
    return run;
  }

  getLastRun(opts: { sourceType?: SourceType; status?: RunStatus } = {}): RunRow | null {
    return this.listRuns({ ...opts, limit: 1 })[0] ?? null;
  }

  listRuns(
    opts: { sourceType?: SourceType; status?: RunStatus; since?: string; limit?: number; offset?: number } = {},
  ): RunRow[] {
    const conditions: string[] = [];
    const params: Array<string | number> = [];

    if (opts.sourceType) {
      conditions.push('source_type = ?');
      params.push(opts.sourceType);
    }
    if (opts.status) {
      conditions.push('status = ?');
      params.push(opts.status);
    }
    if (opts.since) {
      conditions.push('started_at >= ?');
      params.push(opts.since);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    params.push(opts.limit ?? 10, opts.offset ?? 0);

    return this.db
      .prepare(`SELECT * FROM runs ${where} ORDER BY started_at DESC, id DESC LIMIT ? OFFSET ?`)
      .all(...params) as RunRow[];
  }

  getStats(hours = 24): RunStats {
    const cutoff = new Date(this.now().getTime() - hours * 3600 * 1000).toISOString();

    const bySource = this.db
      .prepare('SELECT source_type, COUNT(*) AS count FROM unified_records GROUP BY source_type')
      .all() as Array<{ source_type: SourceType; count: number }>;

    const recordsBySource: Partial<Record<SourceType, number>> = {};
    let totalRecordsProcessed = 0;
    for (const row of bySource) {
      recordsBySource[row.source_type] = row.count;
      totalRecordsProcessed += row.count;
    }

    const period = this.db
      .prepare(
        `SELECT
           COUNT(*) AS total,
           SUM(CASE WHEN status = 'success' THEN 1 ELSE 0 END) AS successful,
           AVG(duration_seconds) AS avg_duration
         FROM runs WHERE started_at >= ?`,
      )
      .get(cutoff) as { total: number; successful: number | null; avg_duration: number | null };

    return {
      totalRecordsProcessed,
      recordsBySource,
      runsInPeriod: period.total,
      successRate: period.total > 0 ? (period.successful ?? 0) / period.total : 0,
      averageDurationSeconds: period.avg_duration ?? 0,
      lastSuccess: this.getLastRun({ status: 'success' })?.completed_at ?? null,
      lastFailure: this.getLastRun({ status: 'failed' })?.completed_at ?? null,
      periodHours: hours,
    };
  }

  /**
   * Diff two runs, treating `runId2` as the later one. Returns null if either
   * run does not exist.
   */
  compareRuns(runId1: string, runId2: string): RunComparison | null {
    const run1 = this.getRun(runId1);
    const run2 = this.getRun(runId2);
    if (!run1 || !run2) return null;

    const comparison: RunComparison = {
      run1: summarize(run1),
      run2: summarize(run2),
      differences: {},
      anomalies: [],
    };

    if (run1.records_loaded && run2.records_loaded) {
      const absolute = run2.records_loaded - run1.records_loaded;
      const percentage = (absolute * 100) / run1.records_loaded;
      comparison.differences.recordsLoaded = { absolute, percentage };

      if (Math.abs(percentage) > 50) {
        comparison.anomalies.push({
          type: 'record_count_anomaly',
          description: `Record count changed by ${percentage.toFixed(1)}%`,
          severity: Math.abs(percentage) > 90 ? 'high' : 'medium',
        });
      }
    }

    if (run1.duration_seconds && run2.duration_seconds) {
      const absolute = run2.duration_seconds - run1.duration_seconds;
      const percentage = (absolute * 100) / run1.duration_seconds;
      comparison.differences.duration = { absolute, percentage };

      if (percentage > 100) {
        comparison.anomalies.push({
          type: 'duration_anomaly',
          description: `Run took ${percentage.toFixed(1)}% longer`,
          severity: 'medium',
        });
      }
    }

    if (run1.status !== run2.status) {
      comparison.anomalies.push({
        type: 'status_change',
        description: `Status changed from ${run1.status} to ${run2.status}`,
        severity: run2.status === 'failed' ? 'high' : 'low',
      });
    }

    return comparison;
  }
}
