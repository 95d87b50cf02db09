/**
 * Lexical Filter Tests
 */

import { compilePatterns } from '../../extraction/patterns';
import { LexicalFilter } from '../lexical-filter';
import { TEST_STOPWORDS } from '../../../__tests__/helpers/mocks';

describe('LexicalFilter', () => {
  let filter: LexicalFilter;

  beforeEach(() => {
    filter = new LexicalFilter(TEST_STOPWORDS, compilePatterns());
  });

  it('should drop every kind of noise token', () => {
    const tokens = [
      'The',
      'cat',
      '12px',
      'd41d8cd98f00b204e9800998ecf8427e',
      '...',
      '2024',
      'http://x',
      'HTTPS://Y',
      '//cdn',
      'a=b',
      '=foo',
      'dog',
      'cat',
    ];

    expect(filter.filter(tokens)).toEqual(['cat', 'dog', 'cat']);
  });

  it('should drop any token starting with http', () => {
    expect(filter.filter(['http', 'HTTPS', 'httpd', 'web', 'https://a/b?c=d'])).toEqual(['web']);
  });

  it('should keep mixed tokens that are not wholly punctuation or digits', () => {
    expect(filter.filter(['3.5', "don't", 'co-op', 'x2'])).toEqual(['3.5', "don't", 'co-op', 'x2']);
  });

  it('should treat non-ASCII digits as numeric', () => {
    expect(filter.isContentWord('٣٤')).toBe(false);
  });

  it('should match stopwords case-insensitively', () => {
    expect(filter.isStopword('AND')).toBe(true);
    expect(filter.isStopword('cat')).toBe(false);
  });

  it('should be idempotent', () => {
    const once = filter.filter(['Hello', 'the', '=x', 'world', '10em', 'world']);
    expect(filter.filter(once)).toEqual(once);
  });
});
