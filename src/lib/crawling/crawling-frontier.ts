/**
 * Crawling Frontier
 * Depth-first stack of URLs waiting for a visit
 */

export class CrawlingFrontier {
  private readonly stack: string[] = [];

  /**
   * Add a URL. Duplicates are allowed; the visited set filters them at pop time.
   */
  push(url: string): void {
    this.stack.push(url);
  }

  /**
   * Get the most recently added URL (LIFO)
   */
  pop(): string | null {
    return this.stack.pop() ?? null;
  }
}
