import type Database from 'better-sqlite3';
import type { z } from 'zod';
import { TypeTagSchema, type Config } from '../shared/config.js';
import { SOURCE_TYPES, type RawPayload, type SourceType } from '../source/adapter.js';
import { SchemaDriftError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { nowISO } from '../shared/utils.js';
import { bestMatch } from './similarity.js';

export type TypeTag = z.infer<typeof TypeTagSchema>;

export type ExpectedSchema = Record<string, TypeTag>;

export const DRIFT_TYPES = ['new_field', 'missing_field', 'type_change', 'renamed_field'] as const;
export type DriftType = (typeof DRIFT_TYPES)[number];

export interface DriftResult {
  fieldName: string;
  driftType: DriftType;
  expectedType: TypeTag | null;
  actualType: TypeTag | null;
  confidenceScore: number;
  sampleValue: string | null;
}

export interface SchemaDriftRecord {
  id: number;
  source_type: SourceType;
  field_name: string;
  drift_type: DriftType;
  expected_type: string | null;
  actual_type: string | null;
  confidence_score: number;
  sample_value: string | null;
  detected_at: string;
  resolved: number;
  resolved_at: string | null;
}

export const DEFAULT_CONFIDENCE_THRESHOLD = 0.8;
export const SAMPLE_VALUE_MAX_LENGTH = 200;

/**
 * Pairs treated as compatible in either direction. Heuristic; override per
 * detector if a source needs stricter checking.
 */
export const DEFAULT_COMPATIBLE_TYPES: ReadonlyArray<readonly [TypeTag, TypeTag]> = [
  ['int', 'float'],
  ['str', 'int'],
  ['str', 'float'],
  ['datetime', 'str'],
  ['list', 'str'],
];

/** Seed expectations, one per source type. */
export const DEFAULT_EXPECTED_SCHEMAS: Record<SourceType, ExpectedSchema> = {
  api: {
    id: 'str',
    name: 'str',
    symbol: 'str',
    rank: 'int',
    is_active: 'bool',
    is_new: 'bool',
    type: 'str',
    circulating_supply: 'int',
    total_supply: 'int',
    max_supply: 'int',
    beta_value: 'float',
    first_data_at: 'datetime',
    quotes: 'dict',
    last_updated: 'datetime',
  },
  file: {
    id: 'str',
    name: 'str',
    description: 'str',
    category: 'str',
    value: 'float',
    date: 'datetime',
    active: 'bool',
  },
  feed: {
    guid: 'str',
    title: 'str',
    link: 'str',
    description: 'str',
    content: 'str',
    pubDate: 'datetime',
    author: 'str',
    categories: 'list',
  },
};

/**
 * Runtime type tag of a decoded value.
 */
export function classifyValue(value: unknown): TypeTag {
  if (value === null || value === undefined) return 'null';
  if (typeof value === 'boolean') return 'bool';
  if (typeof value === 'number') return Number.isInteger(value) ? 'int' : 'float';
  if (typeof value === 'bigint') return 'int';
  if (typeof value === 'string') return 'str';
  if (Array.isArray(value)) return 'list';
  if (value instanceof Date) return 'datetime';
  if (typeof value === 'object' && Object.getPrototypeOf(value) === Object.prototype) return 'dict';
  if (typeof value === 'object' && Object.getPrototypeOf(value) === null) return 'dict';
  return 'other';
}

function sampleOf(value: unknown): string | null {
  if (value === null || value === undefined || value === '') return null;
  const text =
    typeof value === 'string'
      ? value
      : value instanceof Date
        ? value.toISOString()
        : typeof value === 'object'
          ? JSON.stringify(value)
          : String(value);
  return text.slice(0, SAMPLE_VALUE_MAX_LENGTH);
}

function parseSchema(sourceType: string, schema: Record<string, unknown>): ExpectedSchema {
  const out: ExpectedSchema = {};
  for (const [field, typeName] of Object.entries(schema)) {
    const parsed = TypeTagSchema.safeParse(typeName);
    if (!parsed.success) {
      throw new SchemaDriftError(`Invalid type "${String(typeName)}" for field "${field}"`, {
        sourceType,
        field,
        allowed: TypeTagSchema.options,
      });
    }
    out[field] = parsed.data;
  }
  return out;
}

/**
 * Expected schemas, shared by every detector in the process so that an
 * operator update applies to subsequent runs.
 */
export class ExpectedSchemaRegistry {
  private readonly schemas = new Map<SourceType, ExpectedSchema>();

  constructor(overrides: Partial<Record<string, Record<string, TypeTag>>> = {}) {
    for (const sourceType of SOURCE_TYPES) {
      this.schemas.set(sourceType, { ...(overrides[sourceType] ?? DEFAULT_EXPECTED_SCHEMAS[sourceType]) });
    }
  }

  static fromConfig(config: Config['schema_drift']): ExpectedSchemaRegistry {
    return new ExpectedSchemaRegistry(config.expected_schemas);
  }

  get(sourceType: SourceType): ExpectedSchema {
    return { ...(this.schemas.get(sourceType) ?? {}) };
  }

  /**
   * Replace the expected schema for a source type.
   *
   * @throws SchemaDriftError when a field names an unknown type
   */
  set(sourceType: SourceType, schema: Record<string, unknown>): ExpectedSchema {
    const parsed = parseSchema(sourceType, schema);
    this.schemas.set(sourceType, parsed);
    logger.info({ sourceType, fields: Object.keys(parsed).length }, 'Expected schema updated');
    return { ...parsed };
  }
}

export interface SchemaDriftDetectorOptions {
  confidenceThreshold?: number;
  compatibleTypes?: ReadonlyArray<readonly [TypeTag, TypeTag]>;
  schemas?: ExpectedSchemaRegistry;
}

export class SchemaDriftDetector {
  readonly confidenceThreshold: number;
  readonly schemas: ExpectedSchemaRegistry;
  private readonly compatibleTypes: ReadonlyArray<readonly [TypeTag, TypeTag]>;

  constructor(
    private readonly db: Database.Database,
    options: SchemaDriftDetectorOptions = {},
  ) {
    this.confidenceThreshold = options.confidenceThreshold ?? DEFAULT_CONFIDENCE_THRESHOLD;
    this.compatibleTypes = options.compatibleTypes ?? DEFAULT_COMPATIBLE_TYPES;
    this.schemas = options.schemas ?? new ExpectedSchemaRegistry();
  }

  typesCompatible(expected: TypeTag, actual: TypeTag): boolean {
    if (expected === actual) return true;
    return this.compatibleTypes.some(
      ([a, b]) => (a === expected && b === actual) || (a === actual && b === expected),
    );
  }

  detectDrift(sourceType: SourceType, record: RawPayload): DriftResult[] {
    const schema = this.schemas.get(sourceType);
    const expectedFields = Object.keys(schema);
    const actualFields = Object.keys(record);
    const expectedSet = new Set(expectedFields);
    const actualSet = new Set(actualFields);
    const drifts: DriftResult[] = [];

    for (const field of actualFields) {
      if (expectedSet.has(field)) continue;
      const { match, score } = bestMatch(field, expectedFields);
      const value = record[field];

      if (score >= this.confidenceThreshold && match !== null) {
        drifts.push({
          fieldName: field,
          driftType: 'renamed_field',
          expectedType: schema[match] ?? null,
          actualType: classifyValue(value),
          confidenceScore: score,
          sampleValue: sampleOf(value),
        });
      } else {
        drifts.push({
          fieldName: field,
          driftType: 'new_field',
          expectedType: null,
          actualType: classifyValue(value),
          confidenceScore: match !== null ? 1 - score : 1,
          sampleValue: sampleOf(value),
        });
      }
    }

    for (const field of expectedFields) {
      if (actualSet.has(field)) continue;
      const { match, score } = bestMatch(field, actualFields);

      if (score < this.confidenceThreshold) {
        drifts.push({
          fieldName: field,
          driftType: 'missing_field',
          expectedType: schema[field] ?? null,
          actualType: null,
          confidenceScore: match !== null ? 1 - score : 1,
          sampleValue: null,
        });
      }
    }

    for (const field of expectedFields) {
      if (!actualSet.has(field)) continue;
      const expectedType = schema[field];
      if (expectedType === undefined) continue;
      const value = record[field];
      const actualType = classifyValue(value);

      if (!this.typesCompatible(expectedType, actualType)) {
        drifts.push({
          fieldName: field,
          driftType: 'type_change',
          expectedType,
          actualType,
          confidenceScore: 1,
          sampleValue: sampleOf(value),
        });
      }
    }

    return drifts;
  }

  /**
   * Persist drifts and log each one. A storage failure is logged and
   * swallowed; drift detection never aborts an extraction.
   */
  recordDrifts(sourceType: SourceType, drifts: DriftResult[]): number {
    if (drifts.length === 0) return 0;

    for (const drift of drifts) {
      logger.warn(
        {
          sourceType,
          field: drift.fieldName,
          driftType: drift.driftType,
          expected: drift.expectedType,
          actual: drift.actualType,
          confidence: Number(drift.confidenceScore.toFixed(2)),
        },
        'Schema drift detected',
      );
    }

    try {
      const insert = this.db.prepare(
        `INSERT INTO schema_drifts
           (source_type, field_name, drift_type, expected_type, actual_type, confidence_score, sample_value, detected_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
      );
      const detectedAt = nowISO();
      this.db.transaction(() => {
        for (const d of drifts) {
          insert.run(
            sourceType,
            d.fieldName,
            d.driftType,
            d.expectedType,
            d.actualType,
            d.confidenceScore,
            d.sampleValue,
            detectedAt,
          );
        }
      })();
      return drifts.length;
    } catch (err) {
      logger.error({ sourceType, err: errorMessage(err) }, 'Failed to record schema drifts');
      return 0;
    }
  }

  getUnresolvedDrifts(sourceType?: SourceType): SchemaDriftRecord[] {
    return this.listDrifts({ sourceType, resolved: false, limit: -1 });
  }

  listDrifts(
    opts: { sourceType?: SourceType; resolved?: boolean; limit?: number; offset?: number } = {},
  ): SchemaDriftRecord[] {
    const conditions: string[] = [];
    const params: Array<string | number> = [];

    if (opts.sourceType) {
      conditions.push('source_type = ?');
      params.push(opts.sourceType);
    }
    if (opts.resolved !== undefined) {
      conditions.push('resolved = ?');
      params.push(opts.resolved ? 1 : 0);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    params.push(opts.limit ?? 100, opts.offset ?? 0);

    return this.db
      .prepare(`SELECT * FROM schema_drifts ${where} ORDER BY detected_at DESC, id DESC LIMIT ? OFFSET ?`)
      .all(...params) as SchemaDriftRecord[];
  }

  /** Operator action. Returns false if no drift has that id. */
  resolveDrift(id: number): boolean {
    const result = this.db
      .prepare('UPDATE schema_drifts SET resolved = 1, resolved_at = ? WHERE id = ?')
      .run(nowISO(), id);
    return result.changes > 0;
  }

  getExpectedSchema(sourceType: SourceType): ExpectedSchema {
    return this.schemas.get(sourceType);
  }

  updateExpectedSchema(sourceType: SourceType, schema: Record<string, unknown>): ExpectedSchema {
    return this.schemas.set(sourceType, schema);
  }
}
