/**
 * Crawl Service
 * Wires fetcher, extractor, engine, aggregator and analyzer for one run
 */

import { CrawlAggregator, CrawlEngine, CrawlResult, LinkDiscoverer } from '../../lib/crawling';
import { PageExtractor } from '../../lib/extraction';
import { LexicalAnalyzer, LexicalFilter } from '../../lib/processing';
import { HttpPageFetcher, PageFetcher } from '../../lib/scraping';
import { PipelineConfig } from './crawl.types';

export interface CrawlRunResult {
  result: CrawlResult;
  /** True when the run was aborted before the frontier emptied */
  cancelled: boolean;
}

export class CrawlService {
  private readonly engine: CrawlEngine;
  private readonly analyzer: LexicalAnalyzer;

  constructor(
    private readonly pipeline: PipelineConfig,
    fetcher?: PageFetcher
  ) {
    const { settings, patterns } = pipeline;

    const pageFetcher =
      fetcher ??
      new HttpPageFetcher({
        timeout: settings.fetchTimeout,
        maxRetries: settings.maxRetries,
        retryBackoffBase: settings.retryBackoffBase,
        userAgent: settings.userAgent,
      });
    const extractor = new PageExtractor(new LinkDiscoverer(pipeline.isInDomain, settings.baseUrl), patterns);

    this.engine = new CrawlEngine({ concurrency: settings.concurrency }, pageFetcher, extractor);
    this.analyzer = new LexicalAnalyzer(
      pipeline.toolkit,
      new LexicalFilter(pipeline.stopwords, patterns),
      settings.frequencyMode
    );
  }

  /**
   * Crawl from the configured seed until the frontier is empty, then build the result
   */
  async run(signal?: AbortSignal): Promise<CrawlRunResult> {
    const aggregator = new CrawlAggregator();
    const outcome = await this.engine.crawl(
      this.pipeline.settings.seedUrl,
      (url, extraction) => aggregator.record(url, extraction),
      signal
    );

    if (!outcome.cancelled) {
      console.log(`🔤 Analyzing text from ${outcome.visitedUrls.size} page(s)...`);
    }

    return {
      result: aggregator.finalize(outcome, this.analyzer),
      cancelled: outcome.cancelled,
    };
  }
}
