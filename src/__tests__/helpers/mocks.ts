/**
 * Shared Mocks
 * In-process stand-ins for the network
 */

import { FetcherConfig, HttpClient, HttpRequestOptions, HttpResponse, PageFetcher } from '../../lib/fetching';
import { Sleeper } from '../../lib/rate-limit';
import { MappingConfig } from '../../lib/crawling';
import { normalizeUrl } from '../../lib/crawling/url-normalizer';

export type FakeRoute =
  | { status: number; body?: string }
  | { error: string; name?: string };

/**
 * Fake transport answering from a URL map; a list of routes is served one
 * call at a time and its last entry repeats. Unknown URLs answer 404.
 */
export function createFakeHttpClient(routes: Record<string, FakeRoute | FakeRoute[]>) {
  const table = new Map<string, FakeRoute[]>();
  for (const [url, route] of Object.entries(routes)) {
    table.set(normalizeUrl(url), Array.isArray(route) ? [...route] : [route]);
  }

  return jest.fn<Promise<HttpResponse>, [string, HttpRequestOptions]>(async (url: string) => {
    const queue = table.get(normalizeUrl(url));
    const route = queue && queue.length > 1 ? queue.shift() : queue?.[0];

    if (!route) {
      return { status: 404, text: async () => 'Not found', discard: async () => undefined };
    }

    if ('error' in route) {
      const error = new Error(route.error);
      if (route.name) {
        error.name = route.name;
      }
      throw error;
    }

    const body = route.body ?? '';
    return { status: route.status, text: async () => body, discard: async () => undefined };
  });
}

/**
 * Sleeper that resolves immediately and records requested delays
 */
export function createInstantSleep() {
  return jest.fn<Promise<void>, [number]>(async () => undefined);
}

export const testFetcherConfig: FetcherConfig = {
  concurrency: 4,
  requestsPerSecond: 1000,
  timeout: 5000,
  maxRetries: 3,
  jitterMax: 0,
  backoffBase: 1000,
  rateLimitedBackoff: 5000,
  rateLimitedBackoffStep: 2000,
  userAgent: 'test-agent',
};

export const testMappingConfig: MappingConfig = {
  concurrency: 4,
  requestsPerSecond: 1000,
  testMode: false,
  pageLimit: 30,
  maxLinkDepth: 10,
  rootLabel: 'Raiz',
  govDomainSuffixes: ['.df.gov.br'],
};

export function createTestFetcher(
  client: HttpClient,
  sleep: Sleeper = createInstantSleep(),
  config: Partial<FetcherConfig> = {}
): PageFetcher {
  return new PageFetcher({ ...testFetcherConfig, ...config }, client, sleep, () => 0);
}

/**
 * Silence crawler logging for the current test file
 */
export function silenceConsole(): void {
  jest.spyOn(console, 'log').mockImplementation(() => undefined);
  jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  jest.spyOn(console, 'error').mockImplementation(() => undefined);
}
