import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { serve } from '@hono/node-server';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import type Database from 'better-sqlite3';
import type { Config } from '../shared/config.js';
import { TributaryError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { createSessionFactory, openDb } from '../db/db.js';
import { runMigrations } from '../db/migrate.js';
import { loadConfig } from '../shared/config.js';
import { Orchestrator } from '../engine/orchestrator.js';
import { Scheduler } from '../schedule/scheduler.js';
import { systemRoutes } from './routes/system.js';
import { runRoutes } from './routes/runs.js';
import { checkpointRoutes } from './routes/checkpoints.js';
import { driftRoutes } from './routes/drifts.js';
import { recordRoutes } from './routes/records.js';
import { ingestRoutes } from './routes/ingest.js';

export interface AppContext {
  db: Database.Database;
  config: Config;
  orchestrator: Orchestrator;
}

export function createApp(ctx: AppContext): Hono {
  const app = new Hono();

  // Middleware
  app.use('*', cors());

  // Mount route groups
  app.route('/api', systemRoutes(ctx));
  app.route('/api', runRoutes(ctx));
  app.route('/api', checkpointRoutes(ctx));
  app.route('/api', driftRoutes(ctx));
  app.route('/api', recordRoutes(ctx));
  app.route('/api', ingestRoutes(ctx));

  // Global error handler
  app.onError((err, c) => {
    if (err instanceof TributaryError) {
      const status = errorCodeToHttpStatus(err.code);
      if (status >= 500) {
        logger.error({ code: err.code, error: err.message }, 'Request failed');
      }
      return c.json({ error: err.message, code: err.code, details: err.details }, status);
    }
    logger.error({ error: err.message, stack: err.stack }, 'Unhandled error');
    return c.json({ error: 'Internal server error' }, 500);
  });

  // 404 handler
  app.notFound((c) => {
    return c.json({ error: 'Not found' }, 404);
  });

  return app;
}

export function errorCodeToHttpStatus(code: string): ContentfulStatusCode {
  switch (code) {
    case 'CONFIG_ERROR':
    case 'VALIDATION_ERROR':
    case 'SCHEMA_DRIFT_ERROR':
      return 400;
    case 'RUN_TRACKING_ERROR':
      return 409;
    case 'RATE_LIMIT_ERROR':
      return 429;
    case 'EXTRACTION_ERROR':
    case 'AUTH_ERROR':
      return 502;
    default:
      return 500;
  }
}

export async function startServer(opts: { port?: number; withScheduler?: boolean } = {}): Promise<void> {
  const config = await loadConfig();
  const port = opts.port ?? config.server.port;
  const host = config.server.host;

  const db = openDb(config.db.path);
  runMigrations(db);

  const orchestrator = new Orchestrator(config, { sessions: createSessionFactory(config.db.path, db) });
  const app = createApp({ db, config, orchestrator });

  logger.info({ port, host }, 'Starting Tributary server');

  const server = serve({ fetch: app.fetch, port, hostname: host }, (info) => {
    logger.info({ url: `http://${host}:${info.port}` }, 'Server listening');
  });

  const scheduler = opts.withScheduler ? new Scheduler(orchestrator, config.schedule.cron) : null;
  scheduler?.start();

  // Handle graceful shutdown
  let stopping = false;
  const shutdown = async (): Promise<void> => {
    if (stopping) return;
    stopping = true;
    logger.info('Shutting down...');
    server.close();
    await scheduler?.stop();
    db.close();
    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown());
  process.on('SIGTERM', () => void shutdown());
}
