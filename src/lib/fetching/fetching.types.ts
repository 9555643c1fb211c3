/**
 * Fetching Types
 * Contracts for the rate-limited page fetcher
 */

import { CrawlError } from '../crawling/crawl.errors';

/**
 * Minimal response surface the fetcher needs
 */
export interface HttpResponse {
  status: number;
  text(): Promise<string>;
  /** Release an unread body so the connection can be reused */
  discard(): Promise<void>;
}

export interface HttpRequestOptions {
  signal: AbortSignal;
  headers: Record<string, string>;
}

/**
 * Transport used by the fetcher (undici in production, a fake in tests)
 */
export type HttpClient = (url: string, options: HttpRequestOptions) => Promise<HttpResponse>;

export interface FetcherConfig {
  concurrency: number;
  requestsPerSecond: number;
  timeout: number;
  maxRetries: number;
  jitterMax: number;
  backoffBase: number;
  rateLimitedBackoff: number;
  rateLimitedBackoffStep: number;
  userAgent: string;
}

export type FetchOutcome =
  | { ok: true; url: string; body: string; attempts: number }
  | { ok: false; url: string; error: CrawlError };

export interface FetchStatistics {
  logicalFetches: number;
  attempts: number;
  succeeded: number;
  failed: number;
  retries: number;
  rateLimited: number;
}

/**
 * Anything the crawl can pull markup from
 */
export interface PageSource {
  fetch(url: string): Promise<FetchOutcome>;
}
