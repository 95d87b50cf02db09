/**
 * Lexical Filter
 * Drops tokens that carry no natural-language content
 */

import type { TextPattern } from '../extraction/patterns';

const PUNCTUATION_ONLY = /^[!"#$%&'()*+,\-./:;<=>?@[\\\]^_`{|}~]+$/;
const NUMERIC_ONLY = /^\p{N}+$/u;
const URL_PREFIX = /^(?:http|\/\/)/i;

export interface LexicalFilterPatterns {
  dimensionNoise: TextPattern;
  hashNoise: TextPattern;
}

export class LexicalFilter {
  constructor(
    private readonly stopwords: ReadonlySet<string>,
    private readonly patterns: LexicalFilterPatterns
  ) {}

  /**
   * Whether a token survives filtering
   */
  isContentWord(token: string): boolean {
    return !(
      this.isStopword(token) ||
      this.patterns.dimensionNoise.matchesStart(token) ||
      this.patterns.hashNoise.matchesStart(token) ||
      PUNCTUATION_ONLY.test(token) ||
      NUMERIC_ONLY.test(token) ||
      URL_PREFIX.test(token) ||
      token.includes('=')
    );
  }

  /**
   * Keep content words, preserving order and duplicates
   */
  filter(tokens: readonly string[]): string[] {
    return tokens.filter((token) => this.isContentWord(token));
  }

  isStopword(word: string): boolean {
    return this.stopwords.has(word.toLowerCase());
  }
}
