import { open, type FileHandle } from 'node:fs/promises';
import path from 'node:path';
import type { Config } from '../shared/config.js';
import type { ExtractScope, Extractor, JsonValue, NormalizedRecord, RawPayload } from './adapter.js';
import { CsvRowParser, cleanValue, detectEncoding, rowToObject, sniffDelimiter, type CellValue } from './csv.js';
import { firstText, parseTabularDate } from './normalize.js';
import { ExtractionError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { resolvePath } from '../shared/utils.js';

export type FileRow = Record<string, CellValue> & {
  _row_number: number;
  _source_file: string;
};

const READ_CHUNK_BYTES = 64 * 1024;
const ROW_ID_WIDTH = 8;

const TITLE_FIELDS = ['title', 'name', 'headline', 'subject'] as const;
const DESCRIPTION_FIELDS = ['description', 'summary', 'desc', 'abstract'] as const;
const CONTENT_FIELDS = ['content', 'body', 'text', 'message'] as const;
const AUTHOR_FIELDS = ['author', 'creator', 'user', 'writer', 'by'] as const;
const CATEGORY_FIELDS = ['category', 'type', 'group', 'section'] as const;
const URL_FIELDS = ['url', 'link', 'href'] as const;
const DATE_FIELDS = ['date', 'created_at', 'timestamp', 'published_at', 'created_date'] as const;

const MAPPED_FIELDS = new Set<string>([
  ...TITLE_FIELDS,
  ...DESCRIPTION_FIELDS,
  ...CONTENT_FIELDS,
  ...AUTHOR_FIELDS,
  ...CATEGORY_FIELDS,
  ...URL_FIELDS,
  ...DATE_FIELDS,
  'tags',
]);

function isMetaField(key: string): boolean {
  return key.startsWith('_');
}

function parseTags(value: CellValue | undefined): string[] | null {
  if (typeof value !== 'string') return null;
  const tags = value
    .split(',')
    .map((t) => t.trim())
    .filter((t) => t.length > 0);
  return tags.length > 0 ? tags : null;
}

/**
 * Delimited flat file with a header row. Resumes after the row offset stored
 * in the checkpoint.
 *
 * Row ids are zero-padded (`data.csv:00000042`) so that the lexicographic
 * cursor comparison orders rows correctly up to 10^8 rows.
 */
export class FileSource implements Extractor<FileRow> {
  readonly sourceType = 'file';
  readonly incremental = 'cursor';

  private readonly filePath: string;
  private readonly fileName: string;

  constructor(private readonly config: Config['sources']['file']) {
    this.filePath = resolvePath(config.path);
    this.fileName = path.basename(this.filePath);
  }

  async *extract(scope: ExtractScope): AsyncIterable<FileRow> {
    const lastRow = scope.checkpoint?.last_offset ?? 0;

    let handle: FileHandle;
    try {
      handle = await open(this.filePath, 'r');
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        logger.warn({ path: this.filePath }, 'Source file not found');
        return;
      }
      throw new ExtractionError(`Cannot open ${this.filePath}: ${errorMessage(err)}`, { path: this.filePath }, {
        cause: err,
      });
    }

    try {
      const sampleBuffer = Buffer.alloc(this.config.sample_bytes);
      const { bytesRead: sampleSize } = await handle.read(sampleBuffer, 0, sampleBuffer.length, 0);
      const sample = sampleBuffer.subarray(0, sampleSize);

      const encoding = detectEncoding(sample, this.config.encodings);
      const delimiter = sniffDelimiter(new TextDecoder(encoding).decode(sample, { stream: true }), {
        truncated: sampleSize === sampleBuffer.length,
      });
      logger.info({ path: this.filePath, encoding, delimiter, resumeAfterRow: lastRow }, 'Reading source file');

      const decoder = new TextDecoder(encoding);
      const parser = new CsvRowParser(delimiter);
      const chunk = Buffer.alloc(READ_CHUNK_BYTES);
      let header: string[] | null = null;
      let rowNumber = 0;
      let position = 0;

      for (;;) {
        const { bytesRead } = await handle.read(chunk, 0, chunk.length, position);
        position += bytesRead;
        const done = bytesRead === 0;
        const rows = done
          ? [...parser.push(decoder.decode()), ...parser.flush()]
          : parser.push(decoder.decode(chunk.subarray(0, bytesRead), { stream: true }));

        for (const cells of rows) {
          if (header === null) {
            header = cells.map((h) => h.trim());
            continue;
          }
          rowNumber++;
          if (rowNumber <= lastRow) {
            scope.skip('before checkpoint offset');
            continue;
          }
          yield this.toRow(header, cells, rowNumber);
        }

        if (done) break;
      }
    } catch (err) {
      if (err instanceof ExtractionError) throw err;
      throw new ExtractionError(`Reading ${this.filePath} failed: ${errorMessage(err)}`, { path: this.filePath }, {
        cause: err,
      });
    } finally {
      await handle.close();
    }
  }

  private toRow(header: readonly string[], cells: readonly string[], rowNumber: number): FileRow {
    const cleaned: Record<string, CellValue> = {};
    for (const [key, value] of Object.entries(rowToObject(header, cells))) {
      if (key === '') continue;
      cleaned[key] = cleanValue(value);
    }
    return { ...cleaned, _row_number: rowNumber, _source_file: this.fileName };
  }

  getSourceId(row: FileRow): string {
    return `${row._source_file}:${String(row._row_number).padStart(ROW_ID_WIDTH, '0')}`;
  }

  storedPayload(row: FileRow): RawPayload {
    return Object.fromEntries(Object.entries(row).filter(([key]) => !isMetaField(key)));
  }

  originOf(row: FileRow): string {
    return row._source_file;
  }

  transform(row: FileRow): NormalizedRecord {
    const data: Record<string, CellValue> = {};
    for (const [key, value] of Object.entries(row)) {
      if (!isMetaField(key)) data[key] = value;
    }

    let publishedAt: Date | null = null;
    for (const field of DATE_FIELDS) {
      publishedAt = parseTabularDate(data[field]);
      if (publishedAt) break;
    }

    const extra: Record<string, JsonValue> = {};
    for (const [key, value] of Object.entries(data)) {
      if (!MAPPED_FIELDS.has(key.toLowerCase())) extra[key] = value;
    }

    return {
      title: firstText(data, TITLE_FIELDS),
      description: firstText(data, DESCRIPTION_FIELDS),
      content: firstText(data, CONTENT_FIELDS),
      author: firstText(data, AUTHOR_FIELDS),
      category: firstText(data, CATEGORY_FIELDS),
      tags: parseTags(data['tags']),
      url: firstText(data, URL_FIELDS),
      published_at: publishedAt,
      extra_data: Object.keys(extra).length > 0 ? extra : null,
    };
  }

  onRecordLoaded(row: FileRow, scope: ExtractScope): void {
    scope.checkpoints.updateCheckpoint(this.sourceType, { lastOffset: row._row_number });
  }
}
