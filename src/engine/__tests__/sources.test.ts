import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import Database from 'better-sqlite3';
import { runMigrations } from '../../db/migrate.js';
import { sharedSession } from '../../db/db.js';
import { ConfigSchema } from '../../shared/config.js';
import { Orchestrator } from '../orchestrator.js';
import { RateLimiter } from '../rateLimiter.js';
import { CheckpointManager } from '../checkpoint.js';
import { countUnifiedRecords } from '../../source/recordDb.js';
import type { SourceType } from '../../source/adapter.js';

// Full runs through the built-in sources, with upstreams served in process.

const NOW = new Date('2024-01-15T12:30:00.000Z');
const API_BASE = 'https://api.test/v1';
const FEED_URL = 'https://example.com/feed';

const COINS = [
  { id: 'btc-bitcoin', name: 'Bitcoin', symbol: 'BTC', rank: 1, is_active: true },
  { id: 'eth-ethereum', name: 'Ethereum', symbol: 'ETH', rank: 2, is_active: true },
  { id: 'xrp-xrp', name: 'XRP', symbol: 'XRP', rank: 3, is_active: true },
];

const CSV = ['title,category,value', 'First,news,1', 'Second,news,2', 'Third,sports,3', ''].join('\n');

let db: Database.Database;
let tmpDir: string;
let csvPath: string;
let feedGuids: string[];
const originalFetch = globalThis.fetch;

function jsonResponse(body: unknown): Response {
  return new Response(JSON.stringify(body), { headers: { 'Content-Type': 'application/json' } });
}

function feedXml(guids: string[]): string {
  const entries = guids
    .map((guid) => `<item><title>${guid}</title><link>https://example.com/${guid}</link><guid>${guid}</guid></item>`)
    .join('');
  return `<?xml version="1.0" encoding="UTF-8"?><rss version="2.0"><channel><title>Test</title>${entries}</channel></rss>`;
}

function upstream(url: string): Response {
  if (url === `${API_BASE}/coins`) return jsonResponse(COINS);
  if (url.startsWith(`${API_BASE}/tickers/`)) {
    const id = url.slice(`${API_BASE}/tickers/`.length);
    return jsonResponse({ id, last_updated: '2024-01-15T12:00:00Z', quotes: { USD: { price: 1 } } });
  }
  if (url === FEED_URL) return new Response(feedXml(feedGuids), { headers: { 'Content-Type': 'application/rss+xml' } });
  return new Response('not found', { status: 404 });
}

function makeOrchestrator(): Orchestrator {
  const config = ConfigSchema.parse({
    sources: {
      api: { base_url: API_BASE },
      file: { path: csvPath },
      feed: { url: FEED_URL },
    },
  });
  return new Orchestrator(config, {
    sessions: sharedSession(db),
    limiter: new RateLimiter({
      requestsPerMinute: 60,
      maxRetries: 2,
      backoffBase: 2,
      sleep: vi.fn().mockResolvedValue(undefined),
    }),
    now: () => NOW,
  });
}

function rawCount(sourceType: SourceType): number {
  const row = db.prepare('SELECT COUNT(*) AS n FROM raw_records WHERE source_type = ?').get(sourceType) as {
    n: number;
  };
  return row.n;
}

beforeEach(() => {
  db = new Database(':memory:');
  runMigrations(db);
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'tributary-test-'));
  csvPath = path.join(tmpDir, 'data.csv');
  fs.writeFileSync(csvPath, CSV, 'utf-8');
  feedGuids = ['g3', 'g2', 'g1'];
  globalThis.fetch = vi.fn().mockImplementation((url: string) => Promise.resolve(upstream(url)));
});

afterEach(() => {
  globalThis.fetch = originalFetch;
  db.close();
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe('api source', () => {
  it('loads nothing new on a second run', async () => {
    const orchestrator = makeOrchestrator();

    const first = await orchestrator.runSource('api');
    const second = await orchestrator.runSource('api');

    expect(first.counters.loaded).toBe(3);
    expect(first.checkpointId).toBe('coinpaprika:xrp-xrp:2024-01-15');
    expect(second.status).toBe('success');
    expect(second.counters.loaded).toBe(0);
    expect(second.counters.skipped).toBe(3);
    expect(countUnifiedRecords(db, 'api')).toBe(3);
  });

  it('resumes after an injected failure without duplicates', async () => {
    const orchestrator = makeOrchestrator();

    const injected = await orchestrator.runWithFailureInjection('api', 2);

    expect(injected.status).toBe('failed_injection');
    expect(injected.recordsBeforeFailure).toBe(1);
    expect(new CheckpointManager(db).getLastSourceId('api')).toBe('coinpaprika:btc-bitcoin:2024-01-15');

    const resumed = await orchestrator.runSource('api');

    expect(resumed.counters.loaded).toBe(2);
    expect(resumed.counters.skipped).toBe(1);
    expect(rawCount('api')).toBe(3);
    expect(countUnifiedRecords(db, 'api')).toBe(3);
  });
});

describe('file source', () => {
  it('skips rows behind the stored offset on a second run', async () => {
    const orchestrator = makeOrchestrator();

    await orchestrator.runSource('file');
    const second = await orchestrator.runSource('file');

    expect(second.counters.loaded).toBe(0);
    expect(second.counters.skipped).toBe(3);
    const checkpoint = new CheckpointManager(db).getCheckpoint('file');
    expect(checkpoint?.last_source_id).toBe('data.csv:00000003');
    expect(checkpoint?.last_offset).toBe(3);
    expect(countUnifiedRecords(db, 'file')).toBe(3);
  });

  it('picks up rows appended since the last run', async () => {
    const orchestrator = makeOrchestrator();
    await orchestrator.runSource('file');
    fs.appendFileSync(csvPath, 'Fourth,news,4\n', 'utf-8');

    const second = await orchestrator.runSource('file');

    expect(second.counters.loaded).toBe(1);
    expect(second.checkpointId).toBe('data.csv:00000004');
    expect(new CheckpointManager(db).getCheckpoint('file')?.last_offset).toBe(4);
    expect(countUnifiedRecords(db, 'file')).toBe(4);
  });

  it('resumes after an injected failure from the saved offset', async () => {
    const orchestrator = makeOrchestrator();

    const injected = await orchestrator.runWithFailureInjection('file', 2);

    expect(injected.status).toBe('failed_injection');
    const checkpoint = new CheckpointManager(db).getCheckpoint('file');
    expect(checkpoint?.last_source_id).toBe('data.csv:00000001');
    expect(checkpoint?.last_offset).toBe(1);

    const resumed = await orchestrator.runSource('file');

    expect(resumed.counters.loaded).toBe(2);
    expect(resumed.counters.skipped).toBe(1);
    expect(rawCount('file')).toBe(3);
    expect(countUnifiedRecords(db, 'file')).toBe(3);
  });
});

describe('feed source', () => {
  it('stops at the newest seen item on a second run', async () => {
    const orchestrator = makeOrchestrator();

    const first = await orchestrator.runSource('feed');
    const second = await orchestrator.runSource('feed');

    expect(first.checkpointId).toBe('g3');
    expect(second.status).toBe('success');
    expect(second.counters.loaded).toBe(0);
    expect(new CheckpointManager(db).getLastSourceId('feed')).toBe('g3');
    expect(countUnifiedRecords(db, 'feed')).toBe(3);
  });

  it('loads only items published since the last run', async () => {
    const orchestrator = makeOrchestrator();
    await orchestrator.runSource('feed');
    feedGuids = ['g5', 'g4', 'g3', 'g2', 'g1'];

    const second = await orchestrator.runSource('feed');

    expect(second.counters.loaded).toBe(2);
    expect(second.checkpointId).toBe('g5');
    expect(countUnifiedRecords(db, 'feed')).toBe(5);
  });

  it('rereads the whole feed after an injected failure', async () => {
    const orchestrator = makeOrchestrator();

    const injected = await orchestrator.runWithFailureInjection('feed', 2);

    expect(injected.status).toBe('failed_injection');
    expect(injected.recordsBeforeFailure).toBe(1);
    expect(new CheckpointManager(db).getLastSourceId('feed')).toBeNull();

    const resumed = await orchestrator.runSource('feed');

    expect(resumed.counters.loaded).toBe(3);
    expect(resumed.checkpointId).toBe('g3');
    expect(rawCount('feed')).toBe(3);
    expect(countUnifiedRecords(db, 'feed')).toBe(3);
  });
});
