/**
 * Crawl Aggregator
 * Merges page extractions into the running result and builds the final,
 * frozen CrawlResult once traversal ends
 */

import type { PageExtraction } from '../extraction/extraction.types';
import type { LexicalAnalyzer } from '../processing/lexical-analyzer';
import type { LexicalProfile } from '../processing/processing.types';
import { CrawlOutcome, CrawlResult } from './crawling.types';

export class CrawlAggregator {
  private readonly imageUrls = new Set<string>();
  private readonly phoneNumbers = new Set<string>();
  private readonly zipCodes = new Set<string>();
  private readonly texts: string[] = [];
  private readonly recorded = new Set<string>();

  /**
   * Merge one page. A URL recorded twice is a traversal bug and throws.
   */
  record(url: string, extraction: PageExtraction): void {
    if (this.recorded.has(url)) {
      throw new Error(`Page already aggregated: ${url}`);
    }
    this.recorded.add(url);

    addAll(this.imageUrls, extraction.imageUrls);
    addAll(this.phoneNumbers, extraction.phoneNumbers);
    addAll(this.zipCodes, extraction.zipCodes);
    this.texts.push(extraction.text);
  }

  /**
   * Page texts in record order, newline-joined
   */
  getText(): string {
    return this.texts.join('\n');
  }

  /**
   * Run the lexical analysis once over all text and assemble the result.
   * A cancelled crawl gets an empty lexical profile.
   */
  finalize(outcome: CrawlOutcome, analyzer: LexicalAnalyzer): CrawlResult {
    const profile = outcome.cancelled ? emptyProfile() : analyzer.analyze(this.getText());

    return Object.freeze({
      uniqueUrls: new Set(outcome.visitedUrls),
      imageUrls: new Set(this.imageUrls),
      phoneNumbers: new Set(this.phoneNumbers),
      zipCodes: new Set(this.zipCodes),
      vocabulary: profile.vocabulary,
      verbs: profile.verbs,
      nouns: profile.nouns,
      verbFrequencies: profile.verbFrequencies,
      nounFrequencies: profile.nounFrequencies,
      failures: Object.freeze([...outcome.failures]),
      statistics: Object.freeze({ ...outcome.statistics }),
    });
  }
}

function addAll<T>(target: Set<T>, source: Iterable<T>): void {
  for (const item of source) {
    target.add(item);
  }
}

function emptyProfile(): LexicalProfile {
  return {
    vocabulary: new Set<string>(),
    verbs: new Set<string>(),
    nouns: new Set<string>(),
    verbFrequencies: new Map<string, number>(),
    nounFrequencies: new Map<string, number>(),
  };
}
