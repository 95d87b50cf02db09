/**
 * Visited Set
 * URLs whose content has been processed. Membership is exact string equality.
 */

export class VisitedSet {
  private readonly urls: Set<string> = new Set();

  /**
   * Claim a URL for processing. Returns false when it was already claimed,
   * in which case the caller must drop its copy.
   */
  claim(url: string): boolean {
    if (this.urls.has(url)) {
      return false;
    }
    this.urls.add(url);
    return true;
  }

  /**
   * Check if URL has already been visited
   */
  has(url: string): boolean {
    return this.urls.has(url);
  }

  /**
   * Visited URLs in visit order
   */
  toSet(): ReadonlySet<string> {
    return new Set(this.urls);
  }
}
