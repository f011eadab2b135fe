import type { JsonValue } from './adapter.js';

/**
 * Strip HTML tags and decode common entities.
 */
export function stripHtml(html: string): string {
  // Remove script/style blocks
  let text = html.replace(/<(script|style)[^>]*>[\s\S]*?<\/\1>/gi, '');
  // Remove all HTML tags
  text = text.replace(/<[^>]+>/g, ' ');
  // Decode common entities
  text = text
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&#39;/g, "'")
    .replace(/&apos;/g, "'")
    .replace(/&nbsp;/g, ' ')
    .replace(/&#(\d+);/g, (_, code: string) => String.fromCodePoint(Number(code)))
    .replace(/&amp;/g, '&');
  // Collapse whitespace
  return text.replace(/\s+/g, ' ').trim();
}

export function truncate(text: string, max: number): string {
  return text.length > max ? text.slice(0, max) : text;
}

// ================================================================
// Tolerant accessors for loosely shaped payloads
// ================================================================

/** Non-empty string form of a scalar, otherwise null. */
export function textOf(value: unknown): string | null {
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : null;
  }
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  if (typeof value === 'boolean') return String(value);
  return null;
}

export function numberOf(value: unknown): number | null {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

export function recordOf(value: unknown): Record<string, unknown> | null {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) return null;
  return Object.fromEntries(Object.entries(value));
}

/** First key holding a usable text value. */
export function firstText(data: Record<string, unknown>, keys: readonly string[]): string | null {
  for (const key of keys) {
    const text = textOf(data[key]);
    if (text !== null) return text;
  }
  return null;
}

/**
 * Coerce an arbitrary decoded value into JSON, dropping what JSON cannot hold.
 */
export function toJsonValue(value: unknown): JsonValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'boolean') return value;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? null : value.toISOString();
  if (Array.isArray(value)) return value.map(toJsonValue);
  const obj = recordOf(value);
  if (obj) {
    const out: Record<string, JsonValue> = {};
    for (const [k, v] of Object.entries(obj)) {
      if (v !== undefined) out[k] = toJsonValue(v);
    }
    return out;
  }
  return String(value);
}

// ================================================================
// Dates
// ================================================================

type DatePart = 'Y' | 'm' | 'd' | 'H' | 'M' | 'S';

interface DateFormat {
  pattern: RegExp;
  parts: readonly DatePart[];
}

const YMD = /^(\d{4})-(\d{1,2})-(\d{1,2})$/;
const YMD_HMS = /^(\d{4})-(\d{1,2})-(\d{1,2})[ T](\d{1,2}):(\d{2}):(\d{2})$/;

/** Tried in order; the first that yields a real calendar date wins. */
export const TABULAR_DATE_FORMATS: readonly DateFormat[] = [
  { pattern: YMD, parts: ['Y', 'm', 'd'] },
  { pattern: YMD_HMS, parts: ['Y', 'm', 'd', 'H', 'M', 'S'] },
  { pattern: /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/, parts: ['d', 'm', 'Y'] },
  { pattern: /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/, parts: ['m', 'd', 'Y'] },
  { pattern: /^(\d{4})\/(\d{1,2})\/(\d{1,2})$/, parts: ['Y', 'm', 'd'] },
  { pattern: /^(\d{1,2})-(\d{1,2})-(\d{4})$/, parts: ['d', 'm', 'Y'] },
];

function applyFormat(text: string, format: DateFormat): Date | null {
  const match = format.pattern.exec(text);
  if (!match) return null;

  const fields: Record<DatePart, number> = { Y: 0, m: 1, d: 1, H: 0, M: 0, S: 0 };
  format.parts.forEach((part, i) => {
    fields[part] = Number(match[i + 1]);
  });

  const date = new Date(Date.UTC(fields.Y, fields.m - 1, fields.d, fields.H, fields.M, fields.S));
  // Reject rollovers such as month 15 or 31 February.
  if (
    date.getUTCFullYear() !== fields.Y ||
    date.getUTCMonth() !== fields.m - 1 ||
    date.getUTCDate() !== fields.d ||
    date.getUTCHours() !== fields.H ||
    date.getUTCMinutes() !== fields.M ||
    date.getUTCSeconds() !== fields.S
  ) {
    return null;
  }
  return date;
}

/**
 * Parse a date cell from a flat file. Zone-less values are read as UTC.
 */
export function parseTabularDate(value: unknown, formats: readonly DateFormat[] = TABULAR_DATE_FORMATS): Date | null {
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? null : value;
  const text = textOf(value);
  if (!text) return null;

  for (const format of formats) {
    const date = applyFormat(text, format);
    if (date) return date;
  }
  return null;
}

/**
 * Parse a syndication date: zone-less `YYYY-MM-DD HH:MM:SS` (as UTC), then
 * RFC 2822 and ISO 8601.
 */
export function parseFeedDate(value: unknown): Date | null {
  const text = textOf(value);
  if (!text) return null;

  const naive = applyFormat(text, { pattern: YMD_HMS, parts: ['Y', 'm', 'd', 'H', 'M', 'S'] });
  if (naive) return naive;

  const ms = Date.parse(text);
  return Number.isNaN(ms) ? null : new Date(ms);
}

/** `YYYY-MM-DD` of the instant, in UTC. */
export function utcDateStamp(date: Date): string {
  return date.toISOString().slice(0, 10);
}
