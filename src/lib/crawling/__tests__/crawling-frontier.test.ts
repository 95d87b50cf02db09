/**
 * Crawling Frontier Tests
 */

import { CrawlingFrontier } from '../crawling-frontier';

describe('CrawlingFrontier', () => {
  let frontier: CrawlingFrontier;

  beforeEach(() => {
    frontier = new CrawlingFrontier();
  });

  it('should start empty', () => {
    expect(frontier.pop()).toBeNull();
  });

  it('should pop the most recently pushed URL first', () => {
    frontier.push('https://example.test/a');
    frontier.push('https://example.test/b');

    expect(frontier.pop()).toBe('https://example.test/b');
    expect(frontier.pop()).toBe('https://example.test/a');
    expect(frontier.pop()).toBeNull();
  });

  it('should keep duplicates', () => {
    frontier.push('https://example.test/a');
    frontier.push('https://example.test/a');

    expect([frontier.pop(), frontier.pop(), frontier.pop()]).toEqual([
      'https://example.test/a',
      'https://example.test/a',
      null,
    ]);
  });
});
