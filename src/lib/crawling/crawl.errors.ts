/**
 * Crawl Error Handling
 * Error taxonomy for the mapping engine and fetch retry guidance
 */

export enum CrawlErrorType {
  FETCH_FAILURE = 'FETCH_FAILURE',
  PARSE_FAILURE = 'PARSE_FAILURE',
  CLASSIFICATION_AMBIGUOUS = 'CLASSIFICATION_AMBIGUOUS',
  FATAL = 'FATAL',
}

export enum FetchFailureReason {
  TIMEOUT = 'TIMEOUT',
  NETWORK_ERROR = 'NETWORK_ERROR',
  RATE_LIMITED = 'RATE_LIMITED',
  HTTP_STATUS = 'HTTP_STATUS',
  RETRIES_EXHAUSTED = 'RETRIES_EXHAUSTED',
}

export class CrawlError extends Error {
  constructor(
    public readonly type: CrawlErrorType,
    message: string,
    public readonly url?: string,
    public readonly details: {
      reason?: FetchFailureReason;
      statusCode?: number;
      attempts?: number;
    } = {}
  ) {
    super(message);
    this.name = 'CrawlError';
  }
}

export interface FetchErrorClassification {
  reason: FetchFailureReason;
  message: string;
  statusCode?: number;
  retryable: boolean;
}

/**
 * Classify a failed attempt and decide whether it may be retried
 */
export function classifyFetchError(error: unknown, statusCode?: number): FetchErrorClassification {
  if (statusCode !== undefined) {
    if (statusCode === 429) {
      return {
        reason: FetchFailureReason.RATE_LIMITED,
        message: 'Rate limited by server',
        statusCode,
        retryable: true,
      };
    }

    // Anything other than 200 or 429 is final for this URL
    return {
      reason: FetchFailureReason.HTTP_STATUS,
      message: `Unexpected status ${statusCode}`,
      statusCode,
      retryable: false,
    };
  }

  const name = error instanceof Error ? error.name : '';
  const message = error instanceof Error ? error.message : String(error);

  if (
    name === 'AbortError' ||
    name === 'TimeoutError' ||
    message.includes('timeout') ||
    message.includes('ETIMEDOUT') ||
    message.includes('aborted')
  ) {
    return {
      reason: FetchFailureReason.TIMEOUT,
      message: 'Request timed out',
      retryable: true,
    };
  }

  return {
    reason: FetchFailureReason.NETWORK_ERROR,
    message: message || 'Network connection failed',
    retryable: true,
  };
}

/**
 * Error message for logs
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
