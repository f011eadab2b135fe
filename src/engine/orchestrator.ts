import type { Config } from '../shared/config.js';
import type { SessionFactory } from '../db/db.js';
import type { Extractor, SourceType } from '../source/adapter.js';
import { SOURCE_TYPES } from '../source/adapter.js';
import { ApiSource } from '../source/apiSource.js';
import { FeedSource } from '../source/feedSource.js';
import { FileSource } from '../source/fileSource.js';
import { RateLimiter } from './rateLimiter.js';
import { ExpectedSchemaRegistry, SchemaDriftDetector } from './schemaDrift.js';
import { ExtractionRunner, type RunResult, type RunnerOptions } from './runner.js';
import type { RunCounters } from './runTracker.js';
import { InjectedFailureError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

export interface SourceResult {
  sourceType: SourceType;
  status: RunResult['status'];
  runId: string | null;
  counters: RunCounters | null;
  durationSeconds: number | null;
  error: string | null;
}

export interface OrchestratorSummary {
  durationSeconds: number;
  sourcesProcessed: number;
  successful: number;
  partial: number;
  failed: number;
  /** In completion order. */
  results: SourceResult[];
}

export interface RunAllOptions {
  parallel?: boolean;
  failOnError?: boolean;
}

export interface InjectionResult {
  sourceType: SourceType;
  status: RunResult['status'] | 'failed_injection';
  recordsBeforeFailure: number;
  runId: string | null;
  error: string | null;
}

export type ExtractorFactory = () => Extractor;

export interface OrchestratorDeps {
  sessions: SessionFactory;
  limiter?: RateLimiter;
  schemas?: ExpectedSchemaRegistry;
  /** Replace the built-in extractor for a source type. */
  extractors?: Partial<Record<SourceType, ExtractorFactory>>;
  now?: () => Date;
}

/**
 * Bounded worker pool. Stops taking new items once `shouldStop` is true.
 */
async function withConcurrency<T>(
  items: T[],
  concurrency: number,
  fn: (item: T) => Promise<void>,
  shouldStop: () => boolean = () => false,
): Promise<void> {
  const queue = [...items];
  const workers: Promise<void>[] = [];

  for (let i = 0; i < Math.min(concurrency, queue.length); i++) {
    workers.push(
      (async () => {
        while (queue.length > 0 && !shouldStop()) {
          const item = queue.shift();
          if (item !== undefined) {
            await fn(item);
          }
        }
      })(),
    );
  }

  await Promise.all(workers);
}

/**
 * Counts records pulled through it and throws on the `failAt`-th, before
 * that record reaches the runner.
 */
export function failAt<T>(
  stream: AsyncIterable<T>,
  atRecord: number,
  progress: { pulled: number },
): AsyncIterable<T> {
  return (async function* () {
    for await (const item of stream) {
      progress.pulled++;
      if (progress.pulled === atRecord) throw new InjectedFailureError(atRecord);
      yield item;
    }
  })();
}

/**
 * Runs the enabled sources, each on its own database session, sharing one
 * rate limiter and one expected-schema registry.
 */
export class Orchestrator {
  readonly limiter: RateLimiter;
  readonly schemas: ExpectedSchemaRegistry;

  private readonly sessions: SessionFactory;
  private readonly extractorFactories: Partial<Record<SourceType, ExtractorFactory>>;
  private readonly now: () => Date;

  constructor(
    private readonly config: Config,
    deps: OrchestratorDeps,
  ) {
    this.sessions = deps.sessions;
    this.limiter = deps.limiter ?? RateLimiter.fromConfig(config.rate_limit);
    this.schemas = deps.schemas ?? ExpectedSchemaRegistry.fromConfig(config.schema_drift);
    this.extractorFactories = deps.extractors ?? {};
    this.now = deps.now ?? (() => new Date());
  }

  enabledSources(): SourceType[] {
    return SOURCE_TYPES.filter((type) => this.config.sources[type].enabled);
  }

  createExtractor(sourceType: SourceType): Extractor {
    const factory = this.extractorFactories[sourceType];
    if (factory) return factory();

    switch (sourceType) {
      case 'api':
        return new ApiSource(this.config.sources.api, this.config.http, { now: this.now });
      case 'file':
        return new FileSource(this.config.sources.file);
      case 'feed':
        return new FeedSource(this.config.sources.feed, this.config.http);
    }
  }

  /**
   * One tracked run of one source. Source-level failures propagate.
   */
  async runSource(sourceType: SourceType, options: RunnerOptions = {}): Promise<RunResult> {
    const session = this.sessions();
    try {
      const drift = this.config.schema_drift;
      const runner = new ExtractionRunner(
        this.createExtractor(sourceType),
        {
          db: session.db,
          limiter: this.limiter,
          driftDetector: drift.enabled
            ? new SchemaDriftDetector(session.db, {
                confidenceThreshold: drift.confidence_threshold,
                schemas: this.schemas,
              })
            : null,
          now: this.now,
        },
        options,
      );
      return await runner.run();
    } finally {
      session.close();
    }
  }

  async runAll(sourceTypes?: SourceType[], options: RunAllOptions = {}): Promise<OrchestratorSummary> {
    const startedAt = Date.now();
    const types = sourceTypes ?? this.enabledSources();
    const parallel = options.parallel ?? this.config.orchestrator.parallel;
    const failOnError = options.failOnError ?? this.config.orchestrator.fail_on_error;
    const results: SourceResult[] = [];
    const abort: { raised: boolean; error?: unknown } = { raised: false };

    logger.info({ sources: types, parallel }, 'Starting run for all sources');

    const runOne = async (sourceType: SourceType): Promise<void> => {
      let runId: string | null = null;
      try {
        const result = await this.runSource(sourceType, {
          onRunStarted: (id) => {
            runId = id;
          },
        });
        results.push({
          sourceType,
          status: result.status,
          runId: result.runId,
          counters: result.counters,
          durationSeconds: result.durationSeconds,
          error: null,
        });
      } catch (err) {
        logger.error({ sourceType, err: errorMessage(err) }, 'Source run failed');
        if (failOnError) {
          if (!abort.raised) {
            abort.raised = true;
            abort.error = err;
          }
          return;
        }
        results.push({
          sourceType,
          status: 'failed',
          runId,
          counters: null,
          durationSeconds: null,
          error: errorMessage(err),
        });
      }
    };

    if (parallel) {
      await withConcurrency(types, this.config.orchestrator.max_workers, runOne, () => abort.raised);
    } else {
      for (const type of types) {
        await runOne(type);
        if (abort.raised) break;
      }
    }

    if (abort.raised) throw abort.error;

    const summary: OrchestratorSummary = {
      durationSeconds: (Date.now() - startedAt) / 1000,
      sourcesProcessed: results.length,
      successful: results.filter((r) => r.status === 'success').length,
      partial: results.filter((r) => r.status === 'partial').length,
      failed: results.filter((r) => r.status === 'failed').length,
      results,
    };

    logger.info(
      {
        durationSeconds: summary.durationSeconds,
        sourcesProcessed: summary.sourcesProcessed,
        successful: summary.successful,
        partial: summary.partial,
        failed: summary.failed,
      },
      'Run for all sources completed',
    );

    return summary;
  }

  /**
   * Test recovery: abort the run when the `atRecord`-th record is pulled.
   * Records before it are loaded and checkpointed as usual.
   */
  async runWithFailureInjection(sourceType: SourceType, atRecord: number): Promise<InjectionResult> {
    logger.warn({ sourceType, atRecord }, 'Running with failure injection');

    const progress = { pulled: 0 };
    let runId: string | null = null;

    try {
      const result = await this.runSource(sourceType, {
        wrapStream: (stream) => failAt(stream, atRecord, progress),
        onRunStarted: (id) => {
          runId = id;
        },
      });
      return {
        sourceType,
        status: result.status,
        recordsBeforeFailure: progress.pulled,
        runId: result.runId,
        error: null,
      };
    } catch (err) {
      if (!(err instanceof InjectedFailureError)) throw err;
      logger.info({ sourceType, atRecord }, 'Injected failure triggered');
      return {
        sourceType,
        status: 'failed_injection',
        recordsBeforeFailure: progress.pulled - 1,
        runId,
        error: err.message,
      };
    }
  }
}
