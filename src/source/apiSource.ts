import type { Config } from '../shared/config.js';
import type { RateLimiter } from '../engine/rateLimiter.js';
import type { ExtractScope, Extractor, JsonValue, NormalizedRecord, RawPayload } from './adapter.js';
import { numberOf, recordOf, textOf, toJsonValue, utcDateStamp } from './normalize.js';
import { AuthenticationError, ExtractionError, RateLimitError, TributaryError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

const DEFAULT_RETRY_AFTER_SECONDS = 60;

/** List entry merged with its detail record, plus fetch metadata. */
export type ApiRecord = Record<string, unknown> & {
  id: string;
  _fetched_at: string;
  _source: string;
};

export interface ApiSourceOptions {
  now?: () => Date;
}

function parseRetryAfter(header: string | null): number {
  if (header === null) return DEFAULT_RETRY_AFTER_SECONDS;
  const seconds = Number(header);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds : DEFAULT_RETRY_AFTER_SECONDS;
}

const fixedFormat = (digits: number) =>
  new Intl.NumberFormat('en-US', { minimumFractionDigits: digits, maximumFractionDigits: digits });

const PRICE_FORMAT = fixedFormat(6);
const WHOLE_FORMAT = fixedFormat(0);

function signed(value: number): string {
  return `${value >= 0 ? '+' : ''}${value.toFixed(2)}`;
}

/**
 * Paginated market-data API (CoinPaprika-shaped): one list request, then a
 * rate-limited detail request per active entry.
 */
export class ApiSource implements Extractor<ApiRecord> {
  readonly sourceType = 'api';
  readonly incremental = 'cursor';

  private readonly now: () => Date;

  constructor(
    private readonly config: Config['sources']['api'],
    private readonly http: Config['http'],
    options: ApiSourceOptions = {},
  ) {
    this.now = options.now ?? (() => new Date());
    if (!config.api_key) {
      logger.info({ provider: config.provider }, 'No API key configured, using the free tier');
    }
  }

  async *extract(scope: ExtractScope): AsyncIterable<ApiRecord> {
    const entries = await this.request(this.config.list_path, scope.limiter);

    if (!Array.isArray(entries)) {
      logger.error({ path: this.config.list_path }, 'Unexpected list response format');
      return;
    }

    const active = entries
      .map(recordOf)
      .filter((e): e is Record<string, unknown> => e !== null && e['is_active'] === true)
      .slice(0, this.config.max_entries);

    for (const entry of active) {
      const id = textOf(entry['id']);
      if (!id) continue;

      let detail: Record<string, unknown> | null;
      try {
        detail = recordOf(await this.request(this.config.detail_path.replace('{id}', encodeURIComponent(id)), scope.limiter));
      } catch (err) {
        if (err instanceof AuthenticationError || err instanceof RateLimitError) throw err;
        logger.warn({ id, err: errorMessage(err) }, 'Detail request failed, skipping entry');
        scope.skip('detail request failed');
        continue;
      }
      if (!detail) {
        scope.skip('empty detail record');
        continue;
      }

      yield {
        ...entry,
        ...detail,
        id,
        _fetched_at: this.now().toISOString(),
        _source: this.config.provider,
      };
    }
  }

  /**
   * GET a JSON document. Waits for a rate-limit slot before every attempt and
   * retries on 429 until the limiter's retry budget runs out.
   */
  private async request(path: string, limiter: RateLimiter): Promise<unknown> {
    const url = `${this.config.base_url}${path}`;
    const key = this.config.rate_limit_key;
    const headers: Record<string, string> = {
      Accept: 'application/json',
      'User-Agent': this.http.user_agent,
    };
    if (this.config.api_key) {
      headers['Authorization'] = `Bearer ${this.config.api_key}`;
    }

    for (;;) {
      await limiter.acquire(key);

      const controller = new AbortController();
      const timer = setTimeout(() => controller.abort(), this.http.timeout_ms);

      try {
        const response = await fetch(url, { headers, signal: controller.signal });

        if (response.status === 401) {
          throw new AuthenticationError('API authentication failed', { url });
        }

        if (response.status === 429) {
          const retryAfter = parseRetryAfter(response.headers.get('retry-after'));
          const backoff = limiter.recordFailure(key);
          const wait = Math.max(backoff, retryAfter);
          logger.warn({ url, waitSeconds: wait }, 'Rate limited by upstream, backing off');
          await limiter.pause(wait);
          continue;
        }

        if (!response.ok) {
          throw new ExtractionError(`API request failed: ${response.status}`, { url, status: response.status });
        }

        const body: unknown = await response.json();
        limiter.recordSuccess(key);
        return body;
      } catch (err) {
        if (err instanceof TributaryError) throw err;
        if (err instanceof Error && err.name === 'AbortError') {
          throw new ExtractionError(`API request timed out after ${this.http.timeout_ms}ms`, { url });
        }
        throw new ExtractionError(`API request failed: ${errorMessage(err)}`, { url }, { cause: err });
      } finally {
        clearTimeout(timer);
      }
    }
  }

  /** Embeds the UTC day, so reruns on the same day update in place. */
  getSourceId(record: ApiRecord): string {
    return `${this.config.provider}:${record.id}:${utcDateStamp(this.now())}`;
  }

  storedPayload(record: ApiRecord): RawPayload {
    return record;
  }

  originOf(): string {
    return this.config.base_url;
  }

  transform(record: ApiRecord): NormalizedRecord {
    const lastUpdated = textOf(record['last_updated']);
    const parsed = lastUpdated ? new Date(lastUpdated) : null;
    const publishedAt = parsed && !Number.isNaN(parsed.getTime()) ? parsed : this.now();

    const usdQuote = recordOf(recordOf(record['quotes'])?.['USD']) ?? {};
    const price = numberOf(usdQuote['price']) ?? 0;
    const marketCap = numberOf(usdQuote['market_cap']) ?? 0;
    const volume24h = numberOf(usdQuote['volume_24h']) ?? 0;
    const change24h = numberOf(usdQuote['percent_change_24h']) ?? 0;
    const change7d = numberOf(usdQuote['percent_change_7d']) ?? 0;
    const change30d = numberOf(usdQuote['percent_change_30d']) ?? 0;

    const description =
      `Current Price: $${PRICE_FORMAT.format(price)} | ` +
      `24h Change: ${signed(change24h)}% | ` +
      `Market Cap: $${WHOLE_FORMAT.format(marketCap)} | ` +
      `24h Volume: $${WHOLE_FORMAT.format(volume24h)}`;

    const tags: string[] = [];
    const rank = numberOf(record['rank']);
    if (rank) tags.push(`rank-${rank}`);
    if (change24h > 0) tags.push('bullish');
    else if (change24h < 0) tags.push('bearish');
    if (record['is_new'] === true) tags.push('new-listing');

    const name = textOf(record['name']) ?? 'Unknown';
    const symbol = (textOf(record['symbol']) ?? '').toUpperCase();

    const extra: Record<string, JsonValue> = {
      coin_id: record.id,
      symbol: toJsonValue(record['symbol']),
      rank,
      current_price: price,
      market_cap: marketCap,
      volume_24h: volume24h,
      percent_change_1h: numberOf(usdQuote['percent_change_1h']),
      percent_change_24h: change24h,
      percent_change_7d: change7d,
      percent_change_30d: change30d,
      circulating_supply: numberOf(record['circulating_supply']),
      total_supply: numberOf(record['total_supply']),
      max_supply: numberOf(record['max_supply']),
      ath_price: numberOf(usdQuote['ath_price']),
      ath_date: textOf(usdQuote['ath_date']),
      is_active: toJsonValue(record['is_active']),
      is_new: toJsonValue(record['is_new']),
    };

    return {
      title: `${name} (${symbol})`,
      description,
      content: JSON.stringify(toJsonValue(record)),
      author: this.config.provider,
      category: 'cryptocurrency',
      tags: tags.length > 0 ? tags : null,
      url: `${this.config.site_url}/coin/${record.id}`,
      published_at: publishedAt,
      extra_data: extra,
    };
  }
}
