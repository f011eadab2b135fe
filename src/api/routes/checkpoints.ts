import { Hono } from 'hono';
import type { AppContext } from '../server.js';
import { CheckpointManager } from '../../engine/checkpoint.js';
import { SourceTypeParam, parseInput } from '../params.js';

export function checkpointRoutes(ctx: AppContext): Hono {
  const app = new Hono();

  app.get('/checkpoints', (c) => {
    return c.json(new CheckpointManager(ctx.db).getAllCheckpoints());
  });

  app.get('/checkpoints/:sourceType', (c) => {
    const sourceType = parseInput(SourceTypeParam, c.req.param('sourceType'), 'source type');
    const checkpoint = new CheckpointManager(ctx.db).getCheckpoint(sourceType);
    if (!checkpoint) {
      return c.json({ error: `No checkpoint for ${sourceType}` }, 404);
    }
    return c.json(checkpoint);
  });

  // POST /api/checkpoints/:sourceType/reset — next run starts from the beginning
  app.post('/checkpoints/:sourceType/reset', (c) => {
    const sourceType = parseInput(SourceTypeParam, c.req.param('sourceType'), 'source type');
    new CheckpointManager(ctx.db).resetCheckpoint(sourceType);
    return c.json({ ok: true, source_type: sourceType });
  });

  return app;
}
