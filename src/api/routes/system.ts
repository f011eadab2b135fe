import { Hono } from 'hono';
import { z } from 'zod';
import type { AppContext } from '../server.js';
import { RunTracker } from '../../engine/runTracker.js';
import { parseInput } from '../params.js';
import { errorMessage } from '../../shared/errors.js';
import { logger } from '../../shared/logger.js';
import { VERSION } from '../../shared/utils.js';

const StatsQuery = z.object({
  hours: z.coerce.number().positive().max(24 * 365).default(24),
});

export function systemRoutes(ctx: AppContext): Hono {
  const app = new Hono();

  // GET /api/health — process and database liveness
  app.get('/health', (c) => {
    try {
      ctx.db.prepare('SELECT 1').get();
    } catch (err) {
      logger.warn({ err: errorMessage(err) }, 'Health check: database unreachable');
      return c.json({ status: 'degraded', database: 'error', error: errorMessage(err) }, 503);
    }
    return c.json({
      status: 'ok',
      database: 'ok',
      version: VERSION,
      uptime: process.uptime(),
    });
  });

  // GET /api/stats?hours= — record totals and run health for the period
  app.get('/stats', (c) => {
    const { hours } = parseInput(StatsQuery, c.req.query(), 'query');
    return c.json(new RunTracker(ctx.db).getStats(hours));
  });

  return app;
}
