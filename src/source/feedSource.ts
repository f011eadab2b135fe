import Parser from 'rss-parser';
import type { Config } from '../shared/config.js';
import type { RateLimiter } from '../engine/rateLimiter.js';
import type { ExtractScope, Extractor, NormalizedRecord, RawPayload } from './adapter.js';
import { computeChecksum } from './recordDb.js';
import { parseFeedDate, stripHtml, textOf, truncate } from './normalize.js';
import { ExtractionError, TributaryError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

const DESCRIPTION_MAX_LENGTH = 500;

export type FeedItem = {
  guid: string;
  title: string | null;
  link: string | null;
  description: string | null;
  content: string | null;
  pubDate: string | null;
  author: string | null;
  categories: string[];
};

type ParsedItem = {
  contentEncoded?: string;
  id?: string;
  author?: string;
  summary?: string;
};

const parser = new Parser<Record<string, unknown>, ParsedItem>({
  customFields: {
    item: [['content:encoded', 'contentEncoded']],
  },
});

/** Category values come through as strings, or `{ _: text }` when the element has attributes. */
function categoryText(value: unknown): string | null {
  if (typeof value === 'string') return textOf(value);
  if (value !== null && typeof value === 'object' && '_' in value) return textOf(value._);
  return null;
}

function guidText(value: unknown): string | null {
  return categoryText(value);
}

/**
 * RSS 2.0 / Atom feed. Items arrive newest first, so extraction stops at the
 * first item already recorded in the checkpoint.
 */
export class FeedSource implements Extractor<FeedItem> {
  readonly sourceType = 'feed';
  readonly incremental = 'stop-at-seen';

  constructor(
    private readonly config: Config['sources']['feed'],
    private readonly http: Config['http'],
  ) {}

  async *extract(scope: ExtractScope): AsyncIterable<FeedItem> {
    const lastGuid = scope.checkpoint?.last_source_id ?? null;
    const xml = await this.fetchFeed(scope.limiter);

    let items: Awaited<ReturnType<typeof parser.parseString>>['items'];
    try {
      items = (await parser.parseString(xml)).items ?? [];
    } catch (err) {
      throw new ExtractionError(`Feed parsing failed: ${errorMessage(err)}`, { url: this.config.url }, { cause: err });
    }

    logger.debug({ url: this.config.url, count: items.length }, 'Feed parsed');

    for (const entry of items) {
      const title = textOf(entry.title);
      const link = textOf(entry.link);
      const guid =
        guidText(entry.guid) ?? textOf(entry.id) ?? link ?? computeChecksum({ title, link });

      if (lastGuid !== null && guid === lastGuid) {
        logger.info({ guid }, 'Reached last processed feed item');
        return;
      }

      const categories: string[] = [];
      const rawCategories: unknown = entry.categories;
      if (Array.isArray(rawCategories)) {
        for (const c of rawCategories) {
          const text = categoryText(c);
          if (text) categories.push(text);
        }
      }

      yield {
        guid,
        title,
        link,
        description: textOf(entry.content) ?? textOf(entry.summary),
        content: textOf(entry.contentEncoded),
        pubDate: textOf(entry.pubDate) ?? textOf(entry.isoDate),
        author: textOf(entry.creator) ?? textOf(entry.author),
        categories,
      };
    }
  }

  private async fetchFeed(limiter: RateLimiter): Promise<string> {
    const key = this.config.rate_limit_key;
    await limiter.acquire(key);

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.http.timeout_ms);

    try {
      const response = await fetch(this.config.url, {
        headers: {
          'User-Agent': this.http.user_agent,
          Accept: 'application/rss+xml, application/atom+xml, application/xml, text/xml, */*',
        },
        signal: controller.signal,
        redirect: 'follow',
      });

      if (!response.ok) {
        throw new ExtractionError(`Feed fetch failed: ${response.status}`, {
          url: this.config.url,
          status: response.status,
        });
      }

      const body = await response.text();
      limiter.recordSuccess(key);
      return body;
    } catch (err) {
      if (err instanceof TributaryError) throw err;
      if (err instanceof Error && err.name === 'AbortError') {
        throw new ExtractionError(`Feed fetch timed out after ${this.http.timeout_ms}ms`, {
          url: this.config.url,
          timeout: this.http.timeout_ms,
        });
      }
      throw new ExtractionError(`Feed fetch failed: ${errorMessage(err)}`, { url: this.config.url }, { cause: err });
    } finally {
      clearTimeout(timer);
    }
  }

  getSourceId(item: FeedItem): string {
    return item.guid;
  }

  storedPayload(item: FeedItem): RawPayload {
    return item;
  }

  originOf(): string {
    return this.config.url;
  }

  transform(item: FeedItem): NormalizedRecord {
    const description = stripHtml(item.description ?? '');
    const content = stripHtml(item.content ?? '') || description;
    const tags = item.categories.length > 0 ? item.categories : null;

    return {
      title: item.title,
      description: description ? truncate(description, DESCRIPTION_MAX_LENGTH) : null,
      content: content || null,
      author: item.author,
      category: tags?.[0] ?? null,
      tags,
      url: item.link,
      published_at: parseFeedDate(item.pubDate),
      extra_data: { guid: item.guid, feed_url: this.config.url },
    };
  }
}
