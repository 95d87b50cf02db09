/**
 * Crawl Error Handling
 * Error taxonomy for page failures and retry guidance for the fetcher
 */

export enum CrawlErrorType {
  FETCH_ERROR = 'FETCH_ERROR',
  PARSE_ERROR = 'PARSE_ERROR',
}

export enum FetchFailureReason {
  NETWORK_ERROR = 'NETWORK_ERROR',
  TIMEOUT = 'TIMEOUT',
  RATE_LIMITED = 'RATE_LIMITED',
  NOT_FOUND = 'NOT_FOUND',
  FORBIDDEN = 'FORBIDDEN',
  SERVER_ERROR = 'SERVER_ERROR',
  HTTP_ERROR = 'HTTP_ERROR',
  ABORTED = 'ABORTED',
  UNKNOWN = 'UNKNOWN',
}

/**
 * Base class for every per-page failure. A CrawlError never aborts a crawl;
 * the page is dropped and listed in the result's failures.
 */
export class CrawlError extends Error {
  readonly type: CrawlErrorType;
  readonly url: string;
  readonly statusCode?: number;
  readonly retryable: boolean;

  constructor(
    type: CrawlErrorType,
    url: string,
    message: string,
    options: { statusCode?: number; retryable?: boolean; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = 'CrawlError';
    this.type = type;
    this.url = url;
    this.statusCode = options.statusCode;
    this.retryable = options.retryable ?? false;
  }
}

export class FetchError extends CrawlError {
  readonly reason: FetchFailureReason;
  readonly retryAfter?: number; // milliseconds

  constructor(
    url: string,
    message: string,
    options: {
      reason?: FetchFailureReason;
      statusCode?: number;
      retryable?: boolean;
      retryAfter?: number;
      cause?: unknown;
    } = {}
  ) {
    super(CrawlErrorType.FETCH_ERROR, url, message, options);
    this.name = 'FetchError';
    this.reason = options.reason ?? FetchFailureReason.UNKNOWN;
    this.retryAfter = options.retryAfter;
  }
}

export class ParseError extends CrawlError {
  constructor(url: string, message: string, cause?: unknown) {
    super(CrawlErrorType.PARSE_ERROR, url, message, { retryable: false, cause });
    this.name = 'ParseError';
  }
}

/**
 * Raised for invalid crawl settings before any page is fetched
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Map an HTTP status to a FetchError
 */
export function fetchErrorFromStatus(
  url: string,
  statusCode: number,
  statusText = '',
  retryAfterHeader: string | null = null
): FetchError {
  const suffix = statusText ? ` ${statusText}` : '';

  if (statusCode === 429) {
    return new FetchError(url, `HTTP 429${suffix}`, {
      reason: FetchFailureReason.RATE_LIMITED,
      statusCode,
      retryable: true,
      retryAfter: parseRetryAfter(retryAfterHeader),
    });
  }

  if (statusCode === 404 || statusCode === 410) {
    return new FetchError(url, `HTTP ${statusCode}${suffix}`, {
      reason: FetchFailureReason.NOT_FOUND,
      statusCode,
      retryable: false,
    });
  }

  if (statusCode === 401 || statusCode === 403) {
    return new FetchError(url, `HTTP ${statusCode}${suffix}`, {
      reason: FetchFailureReason.FORBIDDEN,
      statusCode,
      retryable: false,
    });
  }

  if (statusCode >= 500) {
    return new FetchError(url, `HTTP ${statusCode}${suffix}`, {
      reason: FetchFailureReason.SERVER_ERROR,
      statusCode,
      retryable: true,
      retryAfter: statusCode === 503 ? parseRetryAfter(retryAfterHeader) : undefined,
    });
  }

  return new FetchError(url, `HTTP ${statusCode}${suffix}`, {
    reason: FetchFailureReason.HTTP_ERROR,
    statusCode,
    retryable: false,
  });
}

/**
 * Classify an unknown failure for a URL. CrawlErrors pass through unchanged.
 */
export function classifyError(error: unknown, url: string): CrawlError {
  if (error instanceof CrawlError) {
    return error;
  }

  // Errors raised by fetch may come from another realm, so fields are read by shape
  const name = readStringField(error, 'name');
  const message = readStringField(error, 'message') || String(error);
  const causeCode = readCauseCode(error);
  const haystack = `${message} ${causeCode}`;

  if (name === 'AbortError' || name === 'TimeoutError' || /timeout|ETIMEDOUT|ESOCKETTIMEDOUT/i.test(haystack)) {
    return new FetchError(url, 'Request timed out', {
      reason: name === 'AbortError' ? FetchFailureReason.ABORTED : FetchFailureReason.TIMEOUT,
      retryable: name !== 'AbortError',
      cause: error,
    });
  }

  if (/ECONNREFUSED|ECONNRESET|ENOTFOUND|EAI_AGAIN|fetch failed|network/i.test(haystack)) {
    return new FetchError(url, 'Network connection failed', {
      reason: FetchFailureReason.NETWORK_ERROR,
      retryable: true,
      cause: error,
    });
  }

  return new FetchError(url, message || 'Unknown error', {
    reason: FetchFailureReason.UNKNOWN,
    retryable: false,
    cause: error,
  });
}

/**
 * Determine if we should retry based on error
 */
export function shouldRetry(error: CrawlError, attemptCount: number, maxRetries: number): boolean {
  if (attemptCount >= maxRetries) return false;
  return error.retryable;
}

/**
 * Calculate retry delay with exponential backoff
 */
export function calculateRetryDelay(error: CrawlError, attemptCount: number, baseDelay: number = 1000): number {
  if (error instanceof FetchError && error.retryAfter !== undefined) {
    return error.retryAfter;
  }

  return Math.min(baseDelay * Math.pow(2, attemptCount), 60000); // Max 1 minute
}

/**
 * Retry wrapper for async functions. Every failure is classified; the last
 * classified error is rethrown once attempts run out.
 */
export async function withRetry<T>(
  url: string,
  fn: () => Promise<T>,
  options: {
    maxRetries?: number;
    baseDelay?: number;
    onRetry?: (error: CrawlError, attempt: number) => void;
    signal?: AbortSignal;
  } = {}
): Promise<T> {
  const { maxRetries = 2, baseDelay = 1000, onRetry, signal } = options;
  let attempt = 0;

  for (;;) {
    try {
      return await fn();
    } catch (error) {
      const classified = classifyError(error, url);
      attempt++;

      if (!shouldRetry(classified, attempt, maxRetries)) {
        throw classified;
      }

      if (onRetry) {
        onRetry(classified, attempt);
      }

      await sleep(calculateRetryDelay(classified, attempt - 1, baseDelay), signal);
      if (signal?.aborted) {
        throw classified;
      }
    }
  }
}

/**
 * Resolves after `ms`, or as soon as `signal` aborts
 */
function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }

    const done = (): void => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal?.addEventListener('abort', done, { once: true });
  });
}

/**
 * Retry-After as milliseconds: delta-seconds or an HTTP date
 */
export function parseRetryAfter(header: string | null, now: number = Date.now()): number | undefined {
  if (header === null || header.trim() === '') {
    return undefined;
  }

  const value = header.trim();
  if (/^\d+$/.test(value)) {
    return parseInt(value, 10) * 1000;
  }

  const date = Date.parse(value);
  return Number.isNaN(date) ? undefined : Math.max(0, date - now);
}

function readStringField(value: unknown, field: string): string {
  if (typeof value !== 'object' || value === null) {
    return '';
  }
  const fieldValue: unknown = Reflect.get(value, field);
  return typeof fieldValue === 'string' ? fieldValue : '';
}

function readCauseCode(error: unknown): string {
  if (typeof error !== 'object' || error === null) {
    return '';
  }
  return readStringField(Reflect.get(error, 'cause'), 'code');
}
