import type { RateLimiter } from '../engine/rateLimiter.js';
import type { CheckpointManager } from '../engine/checkpoint.js';

export const SOURCE_TYPES = ['api', 'file', 'feed'] as const;
export type SourceType = (typeof SOURCE_TYPES)[number];

export const RUN_STATUSES = ['running', 'success', 'failed', 'partial'] as const;
export type RunStatus = (typeof RUN_STATUSES)[number];

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

/**
 * A record as an extractor yields it, before any normalization.
 */
export type RawPayload = Record<string, unknown>;

/**
 * The canonical fields every source maps onto.
 */
export interface NormalizedRecord {
  title: string | null;
  description: string | null;
  content: string | null;
  author: string | null;
  category: string | null;
  tags: string[] | null;
  url: string | null;
  published_at: Date | null;
  extra_data: Record<string, JsonValue> | null;
}

/**
 * Database row shape for the raw_records table.
 */
export interface RawRecordRow {
  id: number;
  source_type: SourceType;
  source_id: string;
  origin: string | null;
  payload_json: string;
  checksum: string;
  ingested_at: string;
}

/**
 * Database row shape for the unified_records table.
 */
export interface UnifiedRecordRow {
  id: number;
  source_type: SourceType;
  source_id: string;
  raw_id: number;
  title: string | null;
  description: string | null;
  content: string | null;
  author: string | null;
  category: string | null;
  tags_json: string | null;
  url: string | null;
  published_at: string | null;
  extra_data_json: string | null;
  created_at: string;
  updated_at: string;
}

export interface UnifiedRecord extends Omit<UnifiedRecordRow, 'tags_json' | 'extra_data_json'> {
  tags: string[] | null;
  extra_data: Record<string, JsonValue> | null;
}

export interface Checkpoint {
  source_type: SourceType;
  last_source_id: string | null;
  last_offset: number;
  last_processed_at: string | null;
  metadata: Record<string, JsonValue> | null;
  updated_at: string;
}

/**
 * How an extractor avoids reprocessing on the next run.
 *
 * - `cursor`: every record goes through `shouldProcess`, a lexicographic
 *   comparison against the checkpoint's last_source_id, and the checkpoint
 *   keeps the last processed id.
 * - `stop-at-seen`: the extractor itself stops when it meets the checkpoint's
 *   id and the checkpoint keeps the first (newest) processed id.
 */
export type IncrementalMode = 'cursor' | 'stop-at-seen';

/**
 * What an extractor can see and touch while its sequence is being consumed.
 */
export interface ExtractScope {
  readonly checkpoint: Checkpoint | null;
  readonly limiter: RateLimiter;
  readonly checkpoints: CheckpointManager;
  /** Count a record the extractor dropped before yielding it. */
  skip(reason: string): void;
}

/**
 * Source extractor contract. Implement once per source type; the shared
 * ExtractionRunner drives the lifecycle.
 */
export interface Extractor<Raw extends RawPayload = RawPayload> {
  readonly sourceType: SourceType;
  readonly incremental: IncrementalMode;
  /** Finite, pull-based sequence of raw records in source order. */
  extract(scope: ExtractScope): AsyncIterable<Raw>;
  /** Deterministic identity of a record within its source type. */
  getSourceId(raw: Raw): string;
  /** Pure and total: absent fields become null, never an exception. */
  transform(raw: Raw): NormalizedRecord;
  /** The payload persisted to raw_records. */
  storedPayload(raw: Raw): RawPayload;
  /** Where the record came from (file name, feed URL, endpoint). */
  originOf(raw: Raw): string | null;
  /** Called after a record has been dual-written. */
  onRecordLoaded?(raw: Raw, scope: ExtractScope): void;
}
