/**
 * Crawl Engine
 * Drives fetch → parse → extract → enqueue until the frontier is empty.
 * Each URL is processed at most once; a URL that fails is dropped for the
 * rest of the run.
 */

import { PageExtractor } from '../extraction/page-extractor';
import { classifyError } from '../scraping/errors';
import { HtmlDocument, parseHtml } from '../scraping/html-parser';
import type { PageFetcher } from '../scraping/page-fetcher';
import { CrawlFailure, CrawlingConfig, CrawlOutcome, PageHandler, PageStatus } from './crawling.types';
import { CrawlingFrontier } from './crawling-frontier';
import { CrawlingStatisticsTracker } from './crawling-statistics';
import { VisitedSet } from './visited-set';

export class CrawlEngine {
  constructor(
    private readonly config: CrawlingConfig,
    private readonly fetcher: PageFetcher,
    private readonly extractor: PageExtractor
  ) {
    if (!Number.isInteger(config.concurrency) || config.concurrency < 1) {
      throw new RangeError(`concurrency must be a positive integer, got ${config.concurrency}`);
    }
  }

  /**
   * Crawl from `seedUrl`. `onPage` receives every processed page once, in
   * completion order. Aborting `signal` stops dequeuing, aborts in-flight
   * fetches and resolves with `cancelled: true`.
   */
  async crawl(seedUrl: string, onPage: PageHandler, signal?: AbortSignal): Promise<CrawlOutcome> {
    const run = new CrawlRun(this.config, this.fetcher, this.extractor, onPage, signal);
    return run.execute(seedUrl);
  }
}

/**
 * State of one crawl. Everything here is mutated from the event loop only, so
 * claiming a URL is a synchronous check-and-set.
 */
class CrawlRun {
  private readonly frontier = new CrawlingFrontier();
  private readonly visited = new VisitedSet();
  private readonly status = new Map<string, PageStatus>();
  private readonly failures: CrawlFailure[] = [];
  private readonly statistics = new CrawlingStatisticsTracker();

  constructor(
    private readonly config: CrawlingConfig,
    private readonly fetcher: PageFetcher,
    private readonly extractor: PageExtractor,
    private readonly onPage: PageHandler,
    private readonly signal?: AbortSignal
  ) {}

  async execute(seedUrl: string): Promise<CrawlOutcome> {
    const inFlight = new Set<Promise<void>>();

    this.frontier.push(seedUrl);
    this.status.set(seedUrl, 'pending');

    while (!this.signal?.aborted) {
      while (inFlight.size < this.config.concurrency) {
        const url = this.frontier.pop();
        if (url === null) break;

        if (!this.claim(url)) {
          this.statistics.recordSkipped();
          continue;
        }

        const task: Promise<void> = this.visit(url).finally(() => {
          inFlight.delete(task);
        });
        inFlight.add(task);
      }

      if (inFlight.size === 0) break;
      await Promise.race(inFlight);
    }

    // Drain whatever is still running after a cancellation
    await Promise.all(inFlight);

    return {
      visitedUrls: this.visited.toSet(),
      failures: [...this.failures],
      statistics: this.statistics.getStatistics(),
      cancelled: this.signal?.aborted ?? false,
    };
  }

  /**
   * Pending → Fetching. Fails for URLs already processed, failed or in flight.
   */
  private claim(url: string): boolean {
    const current = this.status.get(url);
    if (current !== undefined && current !== 'pending') {
      return false;
    }
    this.status.set(url, 'fetching');
    return true;
  }

  private async visit(url: string): Promise<void> {
    const startedAt = Date.now();
    console.log(`🕷️  Crawling ${url}`);

    let html: string;
    let document: HtmlDocument;
    try {
      html = await this.fetcher.fetch(url, this.signal);
      document = parseHtml(html, url);
    } catch (error) {
      if (!this.signal?.aborted) {
        this.fail(url, error);
      }
      return;
    }

    // A page whose fetch finished after cancellation contributes nothing
    if (this.signal?.aborted || !this.visited.claim(url)) {
      return;
    }
    this.status.set(url, 'processed');

    const extraction = this.extractor.extract(document, html);
    this.onPage(url, extraction);

    let enqueued = 0;
    for (const link of extraction.links) {
      if (this.visited.has(link) || this.status.get(link) === 'failed') continue;
      this.frontier.push(link);
      if (!this.status.has(link)) {
        this.status.set(link, 'pending');
      }
      enqueued++;
    }

    this.statistics.recordLinkDiscovery(extraction.links.size);
    this.statistics.recordPageVisit(Date.now() - startedAt);
    console.log(`✅ ${url}: ${extraction.links.size} link(s), ${enqueued} queued`);
  }

  /**
   * Fetching → FetchFailed. The URL is never retried in this run.
   */
  private fail(url: string, error: unknown): void {
    const crawlError = classifyError(error, url);
    this.status.set(url, 'failed');
    this.statistics.recordFailed();
    const failure: CrawlFailure = { url, type: crawlError.type, message: crawlError.message };
    if (crawlError.statusCode !== undefined) {
      failure.statusCode = crawlError.statusCode;
    }
    this.failures.push(failure);
    console.error(`❌ Failed to crawl ${url}: ${crawlError.message}`);
  }
}
