/**
 * Page Fetcher
 * Rate-limited, concurrency-bounded, retrying GET shared by every task of a crawl
 */

import pLimit from 'p-limit';
import { RateLimitManager, Sleeper, defaultSleep } from '../rate-limit';
import {
  CrawlError,
  CrawlErrorType,
  FetchErrorClassification,
  FetchFailureReason,
  classifyFetchError,
  describeError,
} from '../crawling/crawl.errors';
import { undiciHttpClient } from './http-client';
import {
  FetcherConfig,
  FetchOutcome,
  FetchStatistics,
  HttpClient,
  HttpResponse,
  PageSource,
} from './fetching.types';

type AttemptResult =
  | { ok: true; body: string }
  | { ok: false; failure: FetchErrorClassification };

export class PageFetcher implements PageSource {
  private readonly limit: ReturnType<typeof pLimit>;
  private readonly rateLimiter: RateLimitManager;
  private readonly maxAttempts: number;
  private stats: FetchStatistics = {
    logicalFetches: 0,
    attempts: 0,
    succeeded: 0,
    failed: 0,
    retries: 0,
    rateLimited: 0,
  };

  constructor(
    private readonly config: FetcherConfig,
    private readonly httpClient: HttpClient = undiciHttpClient,
    private readonly sleep: Sleeper = defaultSleep,
    private readonly random: () => number = Math.random
  ) {
    this.limit = pLimit(Math.max(1, config.concurrency));
    this.rateLimiter = new RateLimitManager(
      { windowMs: 1000, maxRequests: Math.max(1, config.requestsPerSecond) },
      sleep
    );
    this.maxAttempts = Math.max(1, config.maxRetries);
  }

  /**
   * Fetch a URL; retries are handled here and never surface on success
   */
  async fetch(url: string): Promise<FetchOutcome> {
    this.stats.logicalFetches++;
    let lastFailure: FetchErrorClassification | null = null;

    for (let attempt = 0; attempt < this.maxAttempts; attempt++) {
      if (attempt > 0) {
        this.stats.retries++;
      }

      await this.rateLimiter.acquire();
      const result = await this.limit(() => this.attempt(url));
      this.stats.attempts++;

      if (result.ok) {
        this.stats.succeeded++;
        return { ok: true, url, body: result.body, attempts: attempt + 1 };
      }

      lastFailure = result.failure;

      if (!lastFailure.retryable) {
        console.warn(`Status ${lastFailure.statusCode} for ${url}`);
        this.stats.failed++;
        return {
          ok: false,
          url,
          error: new CrawlError(CrawlErrorType.FETCH_FAILURE, lastFailure.message, url, {
            reason: lastFailure.reason,
            statusCode: lastFailure.statusCode,
            attempts: attempt + 1,
          }),
        };
      }

      const retryCount = attempt + 1;
      let delay: number;
      if (lastFailure.reason === FetchFailureReason.RATE_LIMITED) {
        this.stats.rateLimited++;
        delay = this.config.rateLimitedBackoff + attempt * this.config.rateLimitedBackoffStep;
        console.warn(`Rate limited on ${url}, waiting ${delay}ms before retrying`);
      } else {
        delay = this.config.backoffBase * Math.pow(2, retryCount);
        console.warn(`${lastFailure.message} for ${url}, attempt ${retryCount}/${this.maxAttempts}`);
      }

      if (retryCount < this.maxAttempts) {
        await this.sleep(delay);
      }
    }

    console.error(`Giving up on ${url} after ${this.maxAttempts} attempts`);
    this.stats.failed++;
    return {
      ok: false,
      url,
      error: new CrawlError(
        CrawlErrorType.FETCH_FAILURE,
        `Failed after ${this.maxAttempts} attempts: ${lastFailure?.message ?? 'unknown error'}`,
        url,
        {
          reason: FetchFailureReason.RETRIES_EXHAUSTED,
          statusCode: lastFailure?.statusCode,
          attempts: this.maxAttempts,
        }
      ),
    };
  }

  getStats(): FetchStatistics {
    return { ...this.stats };
  }

  /**
   * Single attempt, run inside a concurrency slot
   */
  private async attempt(url: string): Promise<AttemptResult> {
    // Jitter spreads out bursts released by the rate limiter
    const jitter = this.random() * this.config.jitterMax;
    if (jitter > 0) {
      await this.sleep(jitter);
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.config.timeout);

    try {
      const response = await this.httpClient(url, {
        signal: controller.signal,
        headers: { 'User-Agent': this.config.userAgent },
      });

      if (response.status === 200) {
        return { ok: true, body: await response.text() };
      }

      await this.discardBody(url, response);
      return { ok: false, failure: classifyFetchError(null, response.status) };
    } catch (error) {
      return { ok: false, failure: classifyFetchError(error) };
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private async discardBody(url: string, response: HttpResponse): Promise<void> {
    try {
      await response.discard();
    } catch (error) {
      console.warn(`Could not release response body for ${url}: ${describeError(error)}`);
    }
  }
}
