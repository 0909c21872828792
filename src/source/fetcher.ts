import type { Config } from '../shared/config.js';
import type { SourcePage, TargetKind } from '../shared/types.js';
import type { CacheStore } from './cache.js';
import { CacheError, FetchError, type FetchFailureReason } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { sleep as defaultSleep } from '../shared/utils.js';

export interface PageFetcherOptions {
  baseUrl: string;
  userAgent: string;
  timeoutMs: number;
  maxAttempts: number;
  backoffBaseMs: number;
  minIntervalMs: number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

export interface FetcherStats {
  cacheHits: number;
  networkRequests: number;
}

type AttemptOutcome =
  | { ok: true; content: string }
  | {
      ok: false;
      retryable: boolean;
      reason: FetchFailureReason;
      status?: number;
      message: string;
    };

export function pageUrl(baseUrl: string, kind: TargetKind, identifier: number): string {
  return `${baseUrl.replace(/\/+$/, '')}/${kind}=${identifier}`;
}

export function fetcherOptionsFromConfig(source: Config['source']): PageFetcherOptions {
  return {
    baseUrl: source.base_url,
    userAgent: source.user_agent,
    timeoutMs: source.timeout_ms,
    maxAttempts: source.max_attempts,
    backoffBaseMs: source.backoff_base_ms,
    minIntervalMs: source.min_interval_ms,
  };
}

/**
 * Retrieves pages one at a time: cache first, then the network with a
 * bounded retry loop. Successful downloads are spaced at least
 * minIntervalMs apart and written through to the cache.
 */
export class PageFetcher {
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;
  private lastSuccessAt: number | null = null;
  readonly stats: FetcherStats = { cacheHits: 0, networkRequests: 0 };

  constructor(
    private readonly cache: CacheStore,
    private readonly options: PageFetcherOptions,
  ) {
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
  }

  async fetch(kind: TargetKind, identifier: number): Promise<SourcePage> {
    const cached = await this.cache.get(kind, identifier);
    if (cached !== null) {
      this.stats.cacheHits++;
      logger.debug({ kind, identifier }, 'Cache hit');
      return { kind, identifier, content: cached, fromCache: true };
    }

    const url = pageUrl(this.options.baseUrl, kind, identifier);
    logger.info({ kind, identifier, url }, 'Fetching page');

    for (let attempt = 1; ; attempt++) {
      await this.throttle();
      const outcome = await this.attempt(url);

      if (outcome.ok) {
        this.lastSuccessAt = this.now();
        if (attempt > 1) {
          logger.info({ kind, identifier, attempt }, 'Fetched on retry');
        }
        await this.store(kind, identifier, outcome.content);
        return { kind, identifier, content: outcome.content, fromCache: false };
      }

      const details = { kind, identifier, url, attempts: attempt, status: outcome.status };

      if (!outcome.retryable) {
        throw new FetchError(`Fetch failed for ${kind} ${identifier}: ${outcome.message}`, outcome.reason, details);
      }

      // backoff also follows the final failed attempt
      const delayMs = this.options.backoffBaseMs * 2 ** (attempt - 1);
      logger.warn(
        { kind, identifier, attempt, maxAttempts: this.options.maxAttempts, delayMs, reason: outcome.reason },
        outcome.message,
      );
      await this.sleep(delayMs);

      if (attempt >= this.options.maxAttempts) {
        throw new FetchError(
          `Fetch failed for ${kind} ${identifier} after ${attempt} attempts: ${outcome.message}`,
          outcome.reason,
          details,
        );
      }
    }
  }

  private async throttle(): Promise<void> {
    if (this.lastSuccessAt === null) return;
    const waitMs = this.options.minIntervalMs - (this.now() - this.lastSuccessAt);
    if (waitMs > 0) {
      await this.sleep(waitMs);
    }
  }

  private async attempt(url: string): Promise<AttemptOutcome> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.options.timeoutMs);
    this.stats.networkRequests++;

    try {
      const response = await fetch(url, {
        headers: {
          'User-Agent': this.options.userAgent,
          Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
          'Accept-Language': 'en-US,en;q=0.5',
        },
        signal: controller.signal,
        redirect: 'follow',
      });

      if (response.ok) {
        return { ok: true, content: await response.text() };
      }

      const status = response.status;
      if (status === 429) {
        return { ok: false, retryable: true, reason: 'rate_limited', status, message: 'Rate limited (HTTP 429)' };
      }
      if (status === 404 || status === 410) {
        return { ok: false, retryable: false, reason: 'not_found', status, message: `HTTP ${status}` };
      }
      return {
        ok: false,
        retryable: status >= 500,
        reason: 'network_error',
        status,
        message: `HTTP ${status}`,
      };
    } catch (err) {
      const message =
        err instanceof Error && err.name === 'AbortError'
          ? `Request timed out after ${this.options.timeoutMs}ms`
          : `Network error: ${err instanceof Error ? err.message : String(err)}`;
      return { ok: false, retryable: true, reason: 'network_error', message };
    } finally {
      clearTimeout(timer);
    }
  }

  private async store(kind: TargetKind, identifier: number, content: string): Promise<void> {
    try {
      await this.cache.put(kind, identifier, content);
    } catch (err) {
      if (!(err instanceof CacheError)) throw err;
      logger.warn({ kind, identifier, error: err.message }, 'Page not cached');
    }
  }
}
