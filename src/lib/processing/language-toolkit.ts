/**
 * Natural Language Toolkit
 * Treebank tokenization and Brill part-of-speech tagging from `natural`,
 * POS-aware lemmatization from `wink-lemmatizer`
 */

import * as natural from 'natural';
import * as winkLemmatizer from 'wink-lemmatizer';
import { LanguageToolkit, TaggedToken } from './processing.types';

const LANGUAGE = 'EN';
const DEFAULT_CATEGORY = 'NN';
const DEFAULT_CATEGORY_CAPITALIZED = 'NNP';

// "end. Next" -> "end . Next": the treebank tokenizer only splits a period at end of input
const SENTENCE_PERIOD = /([^.\s])\.(?=\s)/g;

// URLs and key=value runs stay single tokens so the lexical filter sees them whole
const UNSPLIT_RUN = /=|:\/\//;

export class NaturalLanguageToolkit implements LanguageToolkit {
  private readonly tokenizer = new natural.TreebankWordTokenizer();
  private readonly tagger: natural.BrillPOSTagger;

  constructor() {
    const lexicon = new natural.Lexicon(LANGUAGE, DEFAULT_CATEGORY, DEFAULT_CATEGORY_CAPITALIZED);
    const ruleSet = new natural.RuleSet(LANGUAGE);
    this.tagger = new natural.BrillPOSTagger(lexicon, ruleSet);
  }

  tokenize(text: string): string[] {
    const tokens: string[] = [];
    let pending: string[] = [];

    const flush = (): void => {
      if (pending.length > 0) {
        tokens.push(...this.tokenizer.tokenize(pending.join(' ').replace(SENTENCE_PERIOD, '$1 .')));
        pending = [];
      }
    };

    for (const run of text.split(/\s+/)) {
      if (run.length === 0) continue;
      if (UNSPLIT_RUN.test(run)) {
        flush();
        tokens.push(run);
      } else {
        pending.push(run);
      }
    }
    flush();

    return tokens;
  }

  tag(tokens: string[]): TaggedToken[] {
    if (tokens.length === 0) {
      return [];
    }
    return this.tagger.tag(tokens).taggedWords.map(({ token, tag }) => ({ token, tag }));
  }

  lemmatize(word: string, tag: string): string {
    if (tag.startsWith('VB')) {
      return winkLemmatizer.verb(word);
    }
    if (tag.startsWith('JJ')) {
      return winkLemmatizer.adjective(word);
    }
    return winkLemmatizer.noun(word);
  }
}

/**
 * English stopword list shipped with `natural`
 */
export function loadStopwords(): Set<string> {
  return new Set(natural.stopwords.map((word) => word.toLowerCase()));
}
