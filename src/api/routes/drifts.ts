import { Hono } from 'hono';
import { z } from 'zod';
import type { AppContext } from '../server.js';
import { SchemaDriftDetector } from '../../engine/schemaDrift.js';
import { BooleanParam, SourceTypeParam, pageQuery, parseInput } from '../params.js';

const ListQuery = pageQuery(100).extend({
  source_type: SourceTypeParam.optional(),
  resolved: BooleanParam.optional(),
});

const SchemaBody = z.record(z.string(), z.unknown());

export function driftRoutes(ctx: AppContext): Hono {
  const app = new Hono();
  const detector = () => new SchemaDriftDetector(ctx.db, { schemas: ctx.orchestrator.schemas });

  app.get('/drifts', (c) => {
    const query = parseInput(ListQuery, c.req.query(), 'query');
    return c.json(
      detector().listDrifts({
        sourceType: query.source_type,
        resolved: query.resolved,
        limit: query.limit,
        offset: query.offset,
      }),
    );
  });

  // POST /api/drifts/:id/resolve — operator acknowledges a drift
  app.post('/drifts/:id/resolve', (c) => {
    const id = parseInput(z.coerce.number().int().positive(), c.req.param('id'), 'drift id');
    if (!detector().resolveDrift(id)) {
      return c.json({ error: 'Drift not found' }, 404);
    }
    return c.json({ ok: true, id });
  });

  app.get('/drifts/schemas/:sourceType', (c) => {
    const sourceType = parseInput(SourceTypeParam, c.req.param('sourceType'), 'source type');
    return c.json(detector().getExpectedSchema(sourceType));
  });

  // PUT /api/drifts/schemas/:sourceType — replace the expected schema
  app.put('/drifts/schemas/:sourceType', async (c) => {
    const sourceType = parseInput(SourceTypeParam, c.req.param('sourceType'), 'source type');
    const raw: unknown = await c.req.json().catch(() => null);
    const body = parseInput(SchemaBody, raw, 'schema');
    return c.json(detector().updateExpectedSchema(sourceType, body));
  });

  return app;
}
