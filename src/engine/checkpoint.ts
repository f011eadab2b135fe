import type Database from 'better-sqlite3';
import type { Checkpoint, JsonValue, SourceType } from '../source/adapter.js';
import { CheckpointError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { nowISO } from '../shared/utils.js';

interface CheckpointRow {
  source_type: SourceType;
  last_source_id: string | null;
  last_offset: number;
  last_processed_at: string | null;
  metadata_json: string | null;
  updated_at: string;
}

export interface CheckpointUpdate {
  lastSourceId?: string | null;
  lastOffset?: number;
  metadata?: Record<string, JsonValue> | null;
}

function toCheckpoint(row: CheckpointRow): Checkpoint {
  return {
    source_type: row.source_type,
    last_source_id: row.last_source_id,
    last_offset: row.last_offset,
    last_processed_at: row.last_processed_at,
    metadata: row.metadata_json ? parseMetadata(row.metadata_json) : null,
    updated_at: row.updated_at,
  };
}

function parseMetadata(json: string): Record<string, JsonValue> | null {
  const parsed: unknown = JSON.parse(json);
  if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) return null;
  return Object.fromEntries(Object.entries(parsed));
}

/**
 * Persistent per-source progress markers, one row per source type.
 */
export class CheckpointManager {
  constructor(private readonly db: Database.Database) {}

  getCheckpoint(sourceType: SourceType): Checkpoint | null {
    try {
      const row = this.db
        .prepare('SELECT * FROM checkpoints WHERE source_type = ?')
        .get(sourceType) as CheckpointRow | undefined;
      return row ? toCheckpoint(row) : null;
    } catch (err) {
      throw new CheckpointError(`Failed to read checkpoint for ${sourceType}: ${errorMessage(err)}`, err, {
        sourceType,
      });
    }
  }

  /**
   * Create or patch the checkpoint. Only the fields given are written;
   * last_processed_at is always stamped.
   */
  updateCheckpoint(sourceType: SourceType, update: CheckpointUpdate = {}): Checkpoint {
    const now = nowISO();

    const upsert = this.db.transaction((): CheckpointRow => {
      const existing = this.db
        .prepare('SELECT * FROM checkpoints WHERE source_type = ?')
        .get(sourceType) as CheckpointRow | undefined;

      const metadataJson =
        update.metadata === undefined
          ? existing?.metadata_json ?? null
          : update.metadata === null
            ? null
            : JSON.stringify(update.metadata);

      const next: CheckpointRow = {
        source_type: sourceType,
        last_source_id:
          update.lastSourceId === undefined ? existing?.last_source_id ?? null : update.lastSourceId,
        last_offset: update.lastOffset ?? existing?.last_offset ?? 0,
        last_processed_at: now,
        metadata_json: metadataJson,
        updated_at: now,
      };

      if (existing) {
        this.db
          .prepare(
            `UPDATE checkpoints
             SET last_source_id = ?, last_offset = ?, last_processed_at = ?, metadata_json = ?, updated_at = ?
             WHERE source_type = ?`,
          )
          .run(
            next.last_source_id,
            next.last_offset,
            next.last_processed_at,
            next.metadata_json,
            next.updated_at,
            sourceType,
          );
      } else {
        this.db
          .prepare(
            `INSERT INTO checkpoints (source_type, last_source_id, last_offset, last_processed_at, metadata_json, updated_at)
             VALUES (?, ?, ?, ?, ?, ?)`,
          )
          .run(
            sourceType,
            next.last_source_id,
            next.last_offset,
            next.last_processed_at,
            next.metadata_json,
            next.updated_at,
          );
      }

      return next;
    });

    try {
      const row = upsert();
      logger.debug(
        { sourceType, lastSourceId: row.last_source_id, lastOffset: row.last_offset },
        'Checkpoint updated',
      );
      return toCheckpoint(row);
    } catch (err) {
      throw new CheckpointError(`Failed to update checkpoint for ${sourceType}: ${errorMessage(err)}`, err, {
        sourceType,
      });
    }
  }

  /** Forget progress so the next run starts from the beginning. */
  resetCheckpoint(sourceType: SourceType): void {
    let changes: number;
    try {
      changes = this.db
        .prepare(
          `UPDATE checkpoints
           SET last_source_id = NULL, last_offset = 0, last_processed_at = NULL, metadata_json = NULL, updated_at = ?
           WHERE source_type = ?`,
        )
        .run(nowISO(), sourceType).changes;
    } catch (err) {
      throw new CheckpointError(`Failed to reset checkpoint for ${sourceType}: ${errorMessage(err)}`, err, {
        sourceType,
      });
    }

    if (changes > 0) {
      logger.info({ sourceType }, 'Checkpoint reset');
    }
  }

  getLastSourceId(sourceType: SourceType): string | null {
    return this.getCheckpoint(sourceType)?.last_source_id ?? null;
  }

  getLastOffset(sourceType: SourceType): number {
    return this.getCheckpoint(sourceType)?.last_offset ?? 0;
  }

  getAllCheckpoints(): Checkpoint[] {
    try {
      const rows = this.db
        .prepare('SELECT * FROM checkpoints ORDER BY source_type')
        .all() as CheckpointRow[];
      return rows.map(toCheckpoint);
    } catch (err) {
      throw new CheckpointError(`Failed to list checkpoints: ${errorMessage(err)}`, err);
    }
  }

  /**
   * Strict lexicographic comparison against the checkpoint's last_source_id.
   * Ids are compared as strings, so numeric ids without padding order
   * as text ("6" sorts after "50").
   */
  shouldProcess(sourceType: SourceType, sourceId: string, checkpoint?: Checkpoint | null): boolean {
    const cp = checkpoint === undefined ? this.getCheckpoint(sourceType) : checkpoint;
    if (!cp?.last_source_id) return true;
    return sourceId > cp.last_source_id;
  }
}
