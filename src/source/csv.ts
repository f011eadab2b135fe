/**
 * Delimited-text helpers: encoding trial, delimiter sniffing, an incremental
 * row parser and cell cleaning.
 */

export const CANDIDATE_DELIMITERS = [',', ';', '\t', '|'] as const;

export type CellValue = string | number | boolean | null;

const NULL_SENTINELS = new Set(['', 'null', 'none', 'n/a', 'na', '-']);
const INT_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * First candidate encoding that decodes the sample without error. A sample
 * cut in the middle of a multi-byte sequence still counts as valid.
 */
export function detectEncoding(sample: Uint8Array, encodings: readonly string[]): string {
  for (const encoding of encodings) {
    try {
      new TextDecoder(encoding, { fatal: true }).decode(sample, { stream: true });
      return encoding;
    } catch (err) {
      if (err instanceof RangeError) continue; // unknown label
      if (err instanceof TypeError) continue; // undecodable bytes
      throw err;
    }
  }
  return encodings[0] ?? 'utf-8';
}

function countOutsideQuotes(line: string, delimiter: string, quote: string): number {
  let count = 0;
  let inQuotes = false;
  for (const ch of line) {
    if (ch === quote) inQuotes = !inQuotes;
    else if (ch === delimiter && !inQuotes) count++;
  }
  return count;
}

/**
 * Pick the delimiter that splits every sampled line into the same, non-zero
 * number of fields. Among consistent candidates the one with the most fields
 * wins, then list order. Falls back to a comma.
 *
 * @param truncated the sample stops mid-file, so its last line may be partial
 */
export function sniffDelimiter(
  sample: string,
  opts: { candidates?: readonly string[]; truncated?: boolean; quote?: string } = {},
): string {
  const candidates = opts.candidates ?? CANDIDATE_DELIMITERS;
  const quote = opts.quote ?? '"';

  let lines = sample.split(/\r\n|\n|\r/);
  if (opts.truncated && lines.length > 1) lines = lines.slice(0, -1);
  lines = lines.filter((l) => l.trim() !== '').slice(0, 10);
  if (lines.length === 0) return ',';

  let best: { delimiter: string; count: number } | null = null;
  for (const delimiter of candidates) {
    const counts = lines.map((l) => countOutsideQuotes(l, delimiter, quote));
    const first = counts[0] ?? 0;
    if (first === 0 || counts.some((c) => c !== first)) continue;
    if (!best || first > best.count) best = { delimiter, count: first };
  }

  return best?.delimiter ?? ',';
}

/**
 * Incremental RFC 4180-style parser. Feed decoded text with `push`, collect
 * complete rows, and call `flush` at end of input. Quoted fields may contain
 * delimiters, doubled quotes and line breaks; blank lines are skipped.
 */
export class CsvRowParser {
  private row: string[] = [];
  private field = '';
  private inQuotes = false;
  private quotePending = false;
  private atFieldStart = true;
  private skipLineFeed = false;

  constructor(
    private readonly delimiter: string = ',',
    private readonly quote: string = '"',
  ) {}

  push(text: string): string[][] {
    const rows: string[][] = [];

    for (const ch of text) {
      if (this.skipLineFeed) {
        this.skipLineFeed = false;
        if (ch === '\n') continue;
      }

      if (this.inQuotes) {
        if (this.quotePending) {
          this.quotePending = false;
          if (ch === this.quote) {
            this.field += ch;
            continue;
          }
          this.inQuotes = false;
          // fall through: ch follows the closing quote
        } else if (ch === this.quote) {
          this.quotePending = true;
          continue;
        } else {
          this.field += ch;
          continue;
        }
      }

      if (ch === this.quote && this.atFieldStart) {
        this.inQuotes = true;
        this.atFieldStart = false;
      } else if (ch === this.delimiter) {
        this.endField();
      } else if (ch === '\r' || ch === '\n') {
        this.endRow(rows);
        this.skipLineFeed = ch === '\r';
      } else {
        this.field += ch;
        this.atFieldStart = false;
      }
    }

    return rows;
  }

  flush(): string[][] {
    const rows: string[][] = [];
    this.inQuotes = false;
    this.quotePending = false;
    if (this.row.length > 0 || !this.atFieldStart) this.endRow(rows);
    return rows;
  }

  private endField(): void {
    this.row.push(this.field);
    this.field = '';
    this.atFieldStart = true;
  }

  private endRow(rows: string[][]): void {
    const blank = this.row.length === 0 && this.atFieldStart;
    this.endField();
    if (!blank) rows.push(this.row);
    this.row = [];
  }
}

/**
 * Pair a data row with the header. Missing trailing cells are undefined;
 * cells beyond the header are dropped.
 */
export function rowToObject(header: readonly string[], row: readonly string[]): Record<string, string | undefined> {
  const out: Record<string, string | undefined> = {};
  header.forEach((name, i) => {
    out[name] = row[i];
  });
  return out;
}

/**
 * Trim, map null sentinels to null, and coerce numeric and boolean-looking
 * text. A value with a decimal point becomes a float; digits alone an int,
 * unless the int would not be exact, in which case the text is kept.
 */
export function cleanValue(raw: string | undefined | null): CellValue {
  if (raw === undefined || raw === null) return null;

  const value = raw.trim();
  const lowered = value.toLowerCase();
  if (NULL_SENTINELS.has(lowered)) return null;

  if (value.includes('.')) {
    if (FLOAT_PATTERN.test(value)) return Number(value);
  } else if (INT_PATTERN.test(value)) {
    const n = Number(value);
    if (Number.isSafeInteger(n)) return n;
    return value;
  }

  if (lowered === 'true' || lowered === 'yes') return true;
  if (lowered === 'false' || lowered === 'no') return false;

  return value;
}
