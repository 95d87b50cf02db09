/**
 * Lexical Analyzer Tests
 */

import { compilePatterns } from '../../extraction/patterns';
import { NaturalLanguageToolkit } from '../language-toolkit';
import { LexicalAnalyzer } from '../lexical-analyzer';
import { LexicalFilter } from '../lexical-filter';
import { ScriptedLanguageToolkit, TEST_STOPWORDS } from '../../../__tests__/helpers/mocks';

const dictionary = {
  Cats: { tag: 'NNS', lemma: 'cat' },
  run: { tag: 'VB' },
  running: { tag: 'VBG', lemma: 'run' },
  dog: { tag: 'NN' },
  is: { tag: 'VBZ', lemma: 'be' },
  '12px': { tag: 'NN' },
  cats: { tag: 'NNS', lemma: 'cat' },
};

const text = 'Cats run and the dog is running\ncats 12px =foo http://x';

describe('LexicalAnalyzer', () => {
  const filter = new LexicalFilter(TEST_STOPWORDS, compilePatterns());
  const toolkit = new ScriptedLanguageToolkit(dictionary);

  it('should build the vocabulary from lower-cased content words', () => {
    const analyzer = new LexicalAnalyzer(toolkit, filter);
    expect([...analyzer.extractVocabulary(text)]).toEqual(['cats', 'run', 'dog', 'running']);
  });

  it('should count every surviving occurrence by default', () => {
    const profile = new LexicalAnalyzer(toolkit, filter).analyze(text);

    expect([...profile.verbs]).toEqual(['run']);
    expect([...profile.nouns]).toEqual(['cat', 'dog']);
    expect([...profile.verbFrequencies]).toEqual([['run', 2]]);
    expect([...profile.nounFrequencies]).toEqual([
      ['cat', 2],
      ['dog', 1],
    ]);
  });

  it('should count each lemma once in distinct mode', () => {
    const profile = new LexicalAnalyzer(toolkit, filter, 'distinct').analyze(text);

    expect([...profile.verbFrequencies]).toEqual([['run', 1]]);
    expect([...profile.nounFrequencies]).toEqual([
      ['cat', 1],
      ['dog', 1],
    ]);
  });

  it('should keep the frequency keys equal to the lemma sets', () => {
    const profile = new LexicalAnalyzer(toolkit, filter).analyze(text);

    expect(new Set(profile.verbFrequencies.keys())).toEqual(profile.verbs);
    expect(new Set(profile.nounFrequencies.keys())).toEqual(profile.nouns);
  });

  it('should drop lemmas that are stopwords', () => {
    const profile = new LexicalAnalyzer(toolkit, filter).analyze('is');

    expect(profile.verbs.size).toBe(0);
  });

  it('should return empty results for empty text', () => {
    const profile = new LexicalAnalyzer(toolkit, filter).analyze('');

    expect(profile.vocabulary.size).toBe(0);
    expect(profile.verbs.size).toBe(0);
    expect(profile.nouns.size).toBe(0);
  });
});

describe('LexicalAnalyzer with the natural toolkit', () => {
  const analyzer = new LexicalAnalyzer(
    new NaturalLanguageToolkit(),
    new LexicalFilter(TEST_STOPWORDS, compilePatterns())
  );

  it('should keep URL and query-string fragments out of the vocabulary', () => {
    const vocabulary = analyzer.extractVocabulary('Visit http://x and HTTPS://a/b?c=d or =foo today');

    expect([...vocabulary]).toEqual(['visit', 'today']);
    for (const fragment of ['http', 'https', 'c', 'd', 'foo']) {
      expect(vocabulary.has(fragment)).toBe(false);
    }
  });

  it('should keep URL fragments out of the noun and verb lemmas', () => {
    const profile = analyzer.analyze('Read https://example.test/page?id=7 now');

    for (const fragment of ['http', 'https', 'id', 'page']) {
      expect(profile.nouns.has(fragment)).toBe(false);
      expect(profile.verbs.has(fragment)).toBe(false);
    }
  });
});
