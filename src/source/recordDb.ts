import type Database from 'better-sqlite3';
import type {
  JsonValue,
  NormalizedRecord,
  RawPayload,
  RawRecordRow,
  SourceType,
  UnifiedRecord,
  UnifiedRecordRow,
} from './adapter.js';
import { DbError, errorMessage } from '../shared/errors.js';
import { nowISO, sha256, stableStringify } from '../shared/utils.js';

// ================================================================
// Raw records
// ================================================================

/**
 * Order-independent content hash of a raw payload.
 */
export function computeChecksum(payload: RawPayload): string {
  return sha256(stableStringify(payload));
}

/**
 * Insert or overwrite the raw payload for (sourceType, sourceId).
 * Returns the raw row id, which is stable across reprocessing.
 */
export function loadRaw(
  db: Database.Database,
  opts: { sourceType: SourceType; sourceId: string; payload: RawPayload; origin?: string | null },
): number {
  try {
    const row = db
      .prepare(
        `INSERT INTO raw_records (source_type, source_id, origin, payload_json, checksum, ingested_at)
         VALUES (?, ?, ?, ?, ?, ?)
         ON CONFLICT (source_type, source_id) DO UPDATE SET
           origin = excluded.origin,
           payload_json = excluded.payload_json,
           checksum = excluded.checksum,
           ingested_at = excluded.ingested_at
         RETURNING id`,
      )
      .get(
        opts.sourceType,
        opts.sourceId,
        opts.origin ?? null,
        stableStringify(opts.payload),
        computeChecksum(opts.payload),
        nowISO(),
      ) as { id: number };
    return row.id;
  } catch (err) {
    throw new DbError(`Failed to store raw record: ${errorMessage(err)}`, {
      sourceType: opts.sourceType,
      sourceId: opts.sourceId,
    });
  }
}

export function getRawRecord(db: Database.Database, id: number): RawRecordRow | undefined {
  return db.prepare('SELECT * FROM raw_records WHERE id = ?').get(id) as RawRecordRow | undefined;
}

// ================================================================
// Unified records
// ================================================================

/**
 * Insert or update the normalized record linked 1:1 to a raw row. The
 * unified source_id is the raw row id, so reprocessing updates in place.
 */
export function loadUnified(
  db: Database.Database,
  opts: { sourceType: SourceType; rawId: number; record: NormalizedRecord },
): number {
  const { record } = opts;
  const now = nowISO();

  try {
    const row = db
      .prepare(
        `INSERT INTO unified_records
           (source_type, source_id, raw_id, title, description, content, author, category,
            tags_json, url, published_at, extra_data_json, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
         ON CONFLICT (source_type, source_id) DO UPDATE SET
           raw_id = excluded.raw_id,
           title = excluded.title,
           description = excluded.description,
           content = excluded.content,
           author = excluded.author,
           category = excluded.category,
           tags_json = excluded.tags_json,
           url = excluded.url,
           published_at = excluded.published_at,
           extra_data_json = excluded.extra_data_json,
           updated_at = excluded.updated_at
         RETURNING id`,
      )
      .get(
        opts.sourceType,
        String(opts.rawId),
        opts.rawId,
        record.title,
        record.description,
        record.content,
        record.author,
        record.category,
        record.tags ? JSON.stringify(record.tags) : null,
        record.url,
        record.published_at ? record.published_at.toISOString() : null,
        record.extra_data ? JSON.stringify(record.extra_data) : null,
        now,
        now,
      ) as { id: number };
    return row.id;
  } catch (err) {
    throw new DbError(`Failed to store unified record: ${errorMessage(err)}`, {
      sourceType: opts.sourceType,
      rawId: opts.rawId,
    });
  }
}

function parseTags(json: string | null): string[] | null {
  if (!json) return null;
  const parsed: unknown = JSON.parse(json);
  return Array.isArray(parsed) ? parsed.filter((t): t is string => typeof t === 'string') : null;
}

function parseExtra(json: string | null): Record<string, JsonValue> | null {
  if (!json) return null;
  const parsed: unknown = JSON.parse(json);
  if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) return null;
  return Object.fromEntries(Object.entries(parsed));
}

export function toUnifiedRecord(row: UnifiedRecordRow): UnifiedRecord {
  const { tags_json, extra_data_json, ...rest } = row;
  return { ...rest, tags: parseTags(tags_json), extra_data: parseExtra(extra_data_json) };
}

export function getUnifiedRecord(db: Database.Database, id: number): UnifiedRecord | undefined {
  const row = db.prepare('SELECT * FROM unified_records WHERE id = ?').get(id) as UnifiedRecordRow | undefined;
  return row ? toUnifiedRecord(row) : undefined;
}

export function listUnifiedRecords(
  db: Database.Database,
  opts: { sourceType?: SourceType; category?: string; limit?: number; offset?: number } = {},
): UnifiedRecord[] {
  const conditions: string[] = [];
  const params: Array<string | number> = [];

  if (opts.sourceType) {
    conditions.push('source_type = ?');
    params.push(opts.sourceType);
  }
  if (opts.category) {
    conditions.push('category = ?');
    params.push(opts.category);
  }

  const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
  params.push(opts.limit ?? 50, opts.offset ?? 0);

  const rows = db
    .prepare(`SELECT * FROM unified_records ${where} ORDER BY created_at DESC, id DESC LIMIT ? OFFSET ?`)
    .all(...params) as UnifiedRecordRow[];
  return rows.map(toUnifiedRecord);
}

export function countUnifiedRecords(db: Database.Database, sourceType?: SourceType): number {
  const row = (
    sourceType
      ? db.prepare('SELECT COUNT(*) AS count FROM unified_records WHERE source_type = ?').get(sourceType)
      : db.prepare('SELECT COUNT(*) AS count FROM unified_records').get()
  ) as { count: number };
  return row.count;
}
