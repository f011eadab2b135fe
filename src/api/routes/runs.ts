import { Hono } from 'hono';
import { z } from 'zod';
import type { AppContext } from '../server.js';
import { RUN_STATUSES } from '../../source/adapter.js';
import { RunTracker } from '../../engine/runTracker.js';
import { SourceTypeParam, pageQuery, parseInput } from '../params.js';

const ListQuery = pageQuery(10).extend({
  source_type: SourceTypeParam.optional(),
  status: z.enum(RUN_STATUSES).optional(),
});

const CompareQuery = z.object({
  a: z.string().min(1),
  b: z.string().min(1),
});

export function runRoutes(ctx: AppContext): Hono {
  const app = new Hono();

  // GET /api/runs — newest first
  app.get('/runs', (c) => {
    const query = parseInput(ListQuery, c.req.query(), 'query');
    const runs = new RunTracker(ctx.db).listRuns({
      sourceType: query.source_type,
      status: query.status,
      limit: query.limit,
      offset: query.offset,
    });
    return c.json(runs);
  });

  // GET /api/runs/compare?a=&b= — b is treated as the later run
  app.get('/runs/compare', (c) => {
    const { a, b } = parseInput(CompareQuery, c.req.query(), 'query');
    const comparison = new RunTracker(ctx.db).compareRuns(a, b);
    if (!comparison) {
      return c.json({ error: 'Run not found' }, 404);
    }
    return c.json(comparison);
  });

  app.get('/runs/:runId', (c) => {
    const run = new RunTracker(ctx.db).getRun(c.req.param('runId'));
    if (!run) {
      return c.json({ error: 'Run not found' }, 404);
    }
    return c.json(run);
  });

  return app;
}
