import { Hono } from 'hono';
import { z } from 'zod';
import type { AppContext } from '../server.js';
import type { OrchestratorSummary } from '../../engine/orchestrator.js';
import { SourceTypeParam, parseInput } from '../params.js';

const IngestBody = z.object({
  sources: z.array(SourceTypeParam).nonempty().optional(),
  parallel: z.boolean().optional(),
});

export function ingestRoutes(ctx: AppContext): Hono {
  const app = new Hono();
  let lastSummary: OrchestratorSummary | null = null;

  // POST /api/ingest — run the given (default: enabled) sources now
  app.post('/ingest', async (c) => {
    const raw: unknown = await c.req.json().catch(() => ({}));
    const body = parseInput(IngestBody, raw, 'body');

    const summary = await ctx.orchestrator.runAll(body.sources, { parallel: body.parallel, failOnError: false });

    lastSummary = summary;
    return c.json(summary);
  });

  // GET /api/ingest/status — summary of the last run triggered here
  app.get('/ingest/status', (c) => {
    if (!lastSummary) {
      return c.json({ message: 'No ingest has been run yet' }, 404);
    }
    return c.json(lastSummary);
  });

  return app;
}
