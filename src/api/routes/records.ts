import { Hono } from 'hono';
import { z } from 'zod';
import type { AppContext } from '../server.js';
import { countUnifiedRecords, getRawRecord, getUnifiedRecord, listUnifiedRecords } from '../../source/recordDb.js';
import { SourceTypeParam, pageQuery, parseInput } from '../params.js';

const ListQuery = pageQuery(50).extend({
  source_type: SourceTypeParam.optional(),
  category: z.string().min(1).optional(),
});

export function recordRoutes(ctx: AppContext): Hono {
  const app = new Hono();

  app.get('/records', (c) => {
    const query = parseInput(ListQuery, c.req.query(), 'query');
    const records = listUnifiedRecords(ctx.db, {
      sourceType: query.source_type,
      category: query.category,
      limit: query.limit,
      offset: query.offset,
    });
    return c.json({ records, total: countUnifiedRecords(ctx.db, query.source_type) });
  });

  // GET /api/records/:id — unified record with the raw payload it came from
  app.get('/records/:id', (c) => {
    const id = parseInput(z.coerce.number().int().positive(), c.req.param('id'), 'record id');
    const record = getUnifiedRecord(ctx.db, id);
    if (!record) {
      return c.json({ error: 'Record not found' }, 404);
    }
    const raw = getRawRecord(ctx.db, record.raw_id);
    const payload: unknown = raw ? JSON.parse(raw.payload_json) : null;
    return c.json({ ...record, raw: raw ? { source_id: raw.source_id, origin: raw.origin, payload } : null });
  });

  return app;
}
