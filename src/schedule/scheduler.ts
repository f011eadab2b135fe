/**
 * Scheduler — node-cron job for recurring runs of every enabled source.
 * Started by `tributary schedule` and `tributary serve --with-scheduler`.
 */

import cron from 'node-cron';
import type { Orchestrator, OrchestratorSummary } from '../engine/orchestrator.js';
import { ConfigError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

export type ScheduledJob = Pick<Orchestrator, 'runAll'>;

export class Scheduler {
  private task: cron.ScheduledTask | null = null;
  private current: Promise<OrchestratorSummary | null> | null = null;

  constructor(
    private readonly job: ScheduledJob,
    readonly expression: string,
  ) {
    if (!cron.validate(expression)) {
      throw new ConfigError(`Invalid cron expression: ${expression}`, { expression });
    }
  }

  get busy(): boolean {
    return this.current !== null;
  }

  start(): void {
    if (this.task) return;
    this.task = cron.schedule(this.expression, () => {
      void this.tick();
    });
    logger.info({ cron: this.expression }, 'Scheduler started');
  }

  /**
   * Run once unless a run is still in flight, in which case the tick is
   * dropped and null returned.
   */
  tick(): Promise<OrchestratorSummary | null> {
    if (this.current) {
      logger.warn({ cron: this.expression }, 'Previous run still in progress, skipping tick');
      return Promise.resolve(null);
    }

    const current = this.execute().finally(() => {
      this.current = null;
    });
    this.current = current;
    return current;
  }

  private async execute(): Promise<OrchestratorSummary | null> {
    logger.info('Scheduled run starting');
    try {
      const summary = await this.job.runAll();
      logger.info(
        { successful: summary.successful, partial: summary.partial, failed: summary.failed },
        'Scheduled run complete',
      );
      return summary;
    } catch (err) {
      logger.error({ err: errorMessage(err) }, 'Scheduled run failed');
      return null;
    }
  }

  /**
   * Stop scheduling and wait for the in-flight run, if any, to finish.
   */
  async stop(): Promise<void> {
    this.task?.stop();
    this.task = null;
    if (this.current) {
      logger.info('Waiting for the in-flight run to finish');
      await this.current;
    }
    logger.info('Scheduler stopped');
  }
}
