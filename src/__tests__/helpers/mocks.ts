/**
 * Shared Mocks
 * In-process stand-ins for the network and the language toolkit
 */

import type { PageFetcher } from '../../lib/scraping/page-fetcher';
import { fetchErrorFromStatus } from '../../lib/scraping/errors';
import type { LanguageToolkit, TaggedToken } from '../../lib/processing/processing.types';

/**
 * Serves pages from a URL → HTML map. Unknown URLs fail with HTTP 404.
 * Records every fetch so tests can assert visit counts and order.
 */
export class InMemorySiteFetcher implements PageFetcher {
  readonly requests: string[] = [];

  constructor(private readonly pages: Record<string, string>) {}

  async fetch(url: string): Promise<string> {
    this.requests.push(url);
    await Promise.resolve();

    const html = this.pages[url];
    if (html === undefined) {
      throw fetchErrorFromStatus(url, 404, 'Not Found');
    }
    return html;
  }

  countRequests(url: string): number {
    return this.requests.filter((requested) => requested === url).length;
  }
}

/**
 * Whitespace tokenizer with a fixed tag/lemma dictionary. Words missing from
 * the dictionary are tagged `DT` and lemmatize to themselves.
 */
export class ScriptedLanguageToolkit implements LanguageToolkit {
  constructor(private readonly dictionary: Record<string, { tag: string; lemma?: string }> = {}) {}

  tokenize(text: string): string[] {
    return text.split(/\s+/).filter((token) => token.length > 0);
  }

  tag(tokens: string[]): TaggedToken[] {
    return tokens.map((token) => ({ token, tag: this.dictionary[token]?.tag ?? 'DT' }));
  }

  lemmatize(word: string): string {
    const entry = Object.entries(this.dictionary).find(([token]) => token.toLowerCase() === word);
    return entry?.[1].lemma ?? word;
  }
}

export const TEST_STOPWORDS: ReadonlySet<string> = new Set(['the', 'a', 'and', 'is', 'of', 'to', 'we', 'us', 'at', 'or', 'be']);
