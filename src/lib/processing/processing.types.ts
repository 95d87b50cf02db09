/**
 * Processing Types
 * Contracts for the language toolkit and the lexical profile of a crawl
 */

/**
 * A token with its Penn Treebank part-of-speech tag (NN, NNS, VB, VBD, ...)
 */
export interface TaggedToken {
  token: string;
  tag: string;
}

/**
 * Tokenizer, part-of-speech tagger and lemmatizer
 */
export interface LanguageToolkit {
  tokenize(text: string): string[];
  tag(tokens: string[]): TaggedToken[];
  /**
   * Dictionary base form of a lower-cased word, given its tag
   */
  lemmatize(word: string, tag: string): string;
}

/**
 * How noun/verb frequencies are counted.
 * - `occurrences`: every tagged occurrence that survives filtering counts
 * - `distinct`: lemmas are collapsed to a set before filtering, so every count is 1
 */
export type FrequencyMode = 'occurrences' | 'distinct';

export interface VerbNounProfile {
  verbs: Set<string>;
  nouns: Set<string>;
  verbFrequencies: Map<string, number>;
  nounFrequencies: Map<string, number>;
}

export interface LexicalProfile extends VerbNounProfile {
  vocabulary: Set<string>;
}
