/**
 * Lexical Analyzer
 * Vocabulary and noun/verb profile of the accumulated crawl text
 */

import { LexicalFilter } from './lexical-filter';
import { FrequencyMode, LanguageToolkit, LexicalProfile, VerbNounProfile } from './processing.types';

export class LexicalAnalyzer {
  constructor(
    private readonly toolkit: LanguageToolkit,
    private readonly filter: LexicalFilter,
    private readonly frequencyMode: FrequencyMode = 'occurrences'
  ) {}

  analyze(text: string): LexicalProfile {
    return {
      vocabulary: this.extractVocabulary(text),
      ...this.extractVerbsAndNouns(text),
    };
  }

  /**
   * Unique lower-cased content words
   */
  extractVocabulary(text: string): Set<string> {
    const tokens = this.toolkit.tokenize(text.toLowerCase());
    return new Set(this.filter.filter(tokens));
  }

  /**
   * Verb and noun lemmas with their frequencies. Tagging runs on the
   * original-case text; lemmas are taken from the lower-cased tokens.
   */
  extractVerbsAndNouns(text: string): VerbNounProfile {
    const tagged = this.toolkit.tag(this.toolkit.tokenize(text));
    const verbCandidates: string[] = [];
    const nounCandidates: string[] = [];

    for (const { token, tag } of tagged) {
      const lemma = this.toolkit.lemmatize(token.toLowerCase(), tag);
      if (this.filter.isStopword(lemma)) continue;

      if (tag.startsWith('VB')) {
        verbCandidates.push(lemma);
      } else if (tag.startsWith('NN')) {
        nounCandidates.push(lemma);
      }
    }

    const verbFrequencies = this.countFiltered(verbCandidates);
    const nounFrequencies = this.countFiltered(nounCandidates);

    return {
      verbs: new Set(verbFrequencies.keys()),
      nouns: new Set(nounFrequencies.keys()),
      verbFrequencies,
      nounFrequencies,
    };
  }

  /**
   * Filter candidates and count survivors, keyed in first-occurrence order
   */
  private countFiltered(candidates: string[]): Map<string, number> {
    const counted = this.frequencyMode === 'distinct' ? [...new Set(candidates)] : candidates;
    const frequencies = new Map<string, number>();

    for (const lemma of this.filter.filter(counted)) {
      frequencies.set(lemma, (frequencies.get(lemma) ?? 0) + 1);
    }

    return frequencies;
  }
}
