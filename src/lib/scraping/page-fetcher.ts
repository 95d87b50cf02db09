/**
 * Page Fetcher
 * Downloads raw HTML with native fetch, a hard timeout, and retry with backoff
 */

import { FetchError, FetchFailureReason, fetchErrorFromStatus, withRetry } from './errors';

/**
 * Fetches the raw markup of one page. Implementations reject with a
 * FetchError (or any error, which the engine classifies) on failure.
 */
export interface PageFetcher {
  fetch(url: string, signal?: AbortSignal): Promise<string>;
}

export interface HttpPageFetcherOptions {
  timeout: number;
  maxRetries: number;
  retryBackoffBase: number;
  userAgent: string;
}

export class HttpPageFetcher implements PageFetcher {
  constructor(private readonly options: HttpPageFetcherOptions) {}

  async fetch(url: string, signal?: AbortSignal): Promise<string> {
    return withRetry(url, () => this.fetchOnce(url, signal), {
      maxRetries: this.options.maxRetries,
      baseDelay: this.options.retryBackoffBase,
      signal,
      onRetry: (error, attempt) => {
        console.log(`🔁 Retry ${attempt}/${this.options.maxRetries - 1} for ${url}: ${error.message}`);
      },
    });
  }

  private async fetchOnce(url: string, signal?: AbortSignal): Promise<string> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => {
      controller.abort(
        new FetchError(url, `Request timed out after ${this.options.timeout}ms`, {
          reason: FetchFailureReason.TIMEOUT,
          retryable: true,
        })
      );
    }, this.options.timeout);

    const forwardAbort = (): void => controller.abort(signal?.reason);
    if (signal?.aborted) {
      forwardAbort();
    } else {
      signal?.addEventListener('abort', forwardAbort, { once: true });
    }

    try {
      const response = await fetch(url, {
        method: 'GET',
        headers: {
          'User-Agent': this.options.userAgent,
          Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
        },
        redirect: 'follow',
        signal: controller.signal,
      });

      if (!response.ok) {
        throw fetchErrorFromStatus(url, response.status, response.statusText, response.headers.get('retry-after'));
      }

      return await response.text();
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', forwardAbort);
    }
  }
}
