import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import type { Hono } from 'hono';
import { runMigrations } from '../../db/migrate.js';
import { sharedSession } from '../../db/db.js';
import { ConfigSchema } from '../../shared/config.js';
import { Orchestrator } from '../../engine/orchestrator.js';
import { RunTracker } from '../../engine/runTracker.js';
import { SchemaDriftDetector } from '../../engine/schemaDrift.js';
import { listUnifiedRecords } from '../../source/recordDb.js';
import { ListExtractor, items } from '../../engine/__tests__/listExtractor.js';
import { createApp, errorCodeToHttpStatus } from '../server.js';

let db: Database.Database;
let orchestrator: Orchestrator;
let app: Hono;

function post(path: string, body?: unknown): Promise<Response> {
  return Promise.resolve(
    app.request(path, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: body === undefined ? undefined : JSON.stringify(body),
    }),
  );
}

function ingestFile(): Promise<Response> {
  return post('/api/ingest', { sources: ['file'] });
}

beforeEach(() => {
  db = new Database(':memory:');
  runMigrations(db);
  const config = ConfigSchema.parse({});
  orchestrator = new Orchestrator(config, {
    sessions: sharedSession(db),
    extractors: {
      file: () => new ListExtractor(items('a', 'b', 'c')),
      feed: () => new ListExtractor(items('x'), { sourceType: 'feed', failAfter: 0 }),
    },
  });
  app = createApp({ db, config, orchestrator });
});

afterEach(() => {
  db.close();
});

describe('system routes', () => {
  it('reports health', async () => {
    const res = await app.request('/api/health');

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: 'ok', database: 'ok', version: '0.1.0' });
  });

  it('reports stats for the period', async () => {
    await ingestFile();

    const res = await app.request('/api/stats?hours=24');

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      totalRecordsProcessed: 3,
      recordsBySource: { file: 3 },
      runsInPeriod: 1,
      successRate: 1,
      periodHours: 24,
    });
  });

  it('rejects a bad hours value', async () => {
    const res = await app.request('/api/stats?hours=abc');

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ code: 'VALIDATION_ERROR', error: 'Invalid query' });
  });

  it('answers unknown paths with 404', async () => {
    const res = await app.request('/api/nope');

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'Not found' });
  });
});

describe('ingest routes', () => {
  it('has no status before the first ingest', async () => {
    expect((await app.request('/api/ingest/status')).status).toBe(404);
  });

  it('runs the requested sources and keeps the summary', async () => {
    const res = await ingestFile();

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ sourcesProcessed: 1, successful: 1, failed: 0 });

    const status = await app.request('/api/ingest/status');
    expect(status.status).toBe(200);
    expect(await status.json()).toMatchObject({ sourcesProcessed: 1, successful: 1 });
  });

  it('reports failed sources without failing the request', async () => {
    const res = await post('/api/ingest', { sources: ['file', 'feed'] });

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ sourcesProcessed: 2, successful: 1, failed: 1 });
  });

  it('rejects unknown source types', async () => {
    const res = await post('/api/ingest', { sources: ['ftp'] });

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ code: 'VALIDATION_ERROR', error: 'Invalid body' });
  });
});

describe('run routes', () => {
  it('lists runs and fetches one', async () => {
    await ingestFile();
    const run = new RunTracker(db).getLastRun();

    const list = await app.request('/api/runs?source_type=file');
    expect(await list.json()).toMatchObject([{ run_id: run?.run_id, source_type: 'file', status: 'success' }]);

    const one = await app.request(`/api/runs/${run?.run_id}`);
    expect(one.status).toBe(200);
    expect(await one.json()).toMatchObject({ run_id: run?.run_id, records_loaded: 3 });
  });

  it('returns 404 for an unknown run', async () => {
    expect((await app.request('/api/runs/missing')).status).toBe(404);
  });

  it('rejects an unknown status filter', async () => {
    expect((await app.request('/api/runs?status=done')).status).toBe(400);
  });

  it('compares two runs', async () => {
    await ingestFile();
    await ingestFile();
    const [later, earlier] = new RunTracker(db).listRuns();

    const res = await app.request(`/api/runs/compare?a=${earlier?.run_id}&b=${later?.run_id}`);

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      run1: { runId: earlier?.run_id, recordsLoaded: 3 },
      run2: { runId: later?.run_id, recordsLoaded: 0 },
    });
  });

  it('returns 404 when a compared run is missing', async () => {
    await ingestFile();
    const run = new RunTracker(db).getLastRun();

    expect((await app.request(`/api/runs/compare?a=${run?.run_id}&b=missing`)).status).toBe(404);
  });
});

describe('checkpoint routes', () => {
  it('lists checkpoints and resets one', async () => {
    await ingestFile();

    const list = await app.request('/api/checkpoints');
    expect(await list.json()).toMatchObject([{ source_type: 'file', last_source_id: 'c' }]);

    const reset = await post('/api/checkpoints/file/reset');
    expect(await reset.json()).toEqual({ ok: true, source_type: 'file' });

    const after = await app.request('/api/checkpoints/file');
    expect(await after.json()).toMatchObject({ source_type: 'file', last_source_id: null, last_offset: 0 });
  });

  it('returns 404 for a source without a checkpoint', async () => {
    expect((await app.request('/api/checkpoints/api')).status).toBe(404);
  });

  it('rejects an unknown source type', async () => {
    expect((await post('/api/checkpoints/ftp/reset')).status).toBe(400);
  });
});

describe('drift routes', () => {
  function recordDrift(): number {
    const detector = new SchemaDriftDetector(db);
    detector.recordDrifts('file', [
      {
        fieldName: 'value',
        driftType: 'type_change',
        expectedType: 'float',
        actualType: 'str',
        confidenceScore: 0.9,
        sampleValue: 'n/a',
      },
    ]);
    return detector.listDrifts()[0]?.id ?? 0;
  }

  it('lists and resolves drifts', async () => {
    const id = recordDrift();

    const open = await app.request('/api/drifts?source_type=file&resolved=false');
    expect(await open.json()).toMatchObject([{ id, field_name: 'value', drift_type: 'type_change' }]);

    const resolved = await post(`/api/drifts/${id}/resolve`);
    expect(await resolved.json()).toEqual({ ok: true, id });

    const after = await app.request('/api/drifts?resolved=false');
    expect(await after.json()).toEqual([]);
  });

  it('returns 404 when resolving an unknown drift', async () => {
    expect((await post('/api/drifts/999/resolve')).status).toBe(404);
  });

  it('rejects a non-numeric drift id', async () => {
    expect((await post('/api/drifts/abc/resolve')).status).toBe(400);
  });

  it('replaces the expected schema for later runs', async () => {
    const res = await app.request('/api/drifts/schemas/file', {
      method: 'PUT',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ id: 'str', value: 'int' }),
    });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ id: 'str', value: 'int' });
    expect(orchestrator.schemas.get('file')).toEqual({ id: 'str', value: 'int' });

    const get = await app.request('/api/drifts/schemas/file');
    expect(await get.json()).toEqual({ id: 'str', value: 'int' });
  });

  it('rejects an unknown type name in a schema', async () => {
    const res = await app.request('/api/drifts/schemas/file', {
      method: 'PUT',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ id: 'string' }),
    });

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ code: 'SCHEMA_DRIFT_ERROR' });
  });
});

describe('record routes', () => {
  it('pages through unified records with a total', async () => {
    await ingestFile();

    const res = await app.request('/api/records?source_type=file&limit=2');
    const body: unknown = await res.json();

    expect(body).toMatchObject({ total: 3 });
    expect(body).toHaveProperty('records.length', 2);
  });

  it('returns a record with its raw payload', async () => {
    await ingestFile();
    const record = listUnifiedRecords(db).find((r) => r.source_id === 'a');

    const res = await app.request(`/api/records/${record?.id}`);

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      source_id: 'a',
      title: 'a',
      raw: { source_id: 'a', origin: 'memory', payload: { id: 'a', value: 0 } },
    });
  });

  it('returns 404 for an unknown record', async () => {
    expect((await app.request('/api/records/42')).status).toBe(404);
  });
});

describe('errorCodeToHttpStatus', () => {
  it('maps error codes to statuses', () => {
    expect(errorCodeToHttpStatus('VALIDATION_ERROR')).toBe(400);
    expect(errorCodeToHttpStatus('RUN_TRACKING_ERROR')).toBe(409);
    expect(errorCodeToHttpStatus('RATE_LIMIT_ERROR')).toBe(429);
    expect(errorCodeToHttpStatus('AUTH_ERROR')).toBe(502);
    expect(errorCodeToHttpStatus('DB_ERROR')).toBe(500);
  });
});
