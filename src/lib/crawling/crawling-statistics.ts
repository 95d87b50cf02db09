/**
 * Crawling Statistics Tracker
 * Track crawl progress counters and timings
 */

import { CrawlingStatistics } from './crawling.types';

export class CrawlingStatisticsTracker {
  private readonly startTime: number;
  private pagesVisited: number = 0;
  private pagesSkipped: number = 0;
  private pagesFailed: number = 0;
  private linksDiscovered: number = 0;
  private readonly pageTimes: number[] = [];

  constructor(private readonly now: () => number = Date.now) {
    this.startTime = this.now();
  }

  /**
   * Record a processed page
   */
  recordPageVisit(time: number): void {
    this.pagesVisited++;
    this.pageTimes.push(time);
  }

  /**
   * Record a frontier entry discarded as already handled
   */
  recordSkipped(): void {
    this.pagesSkipped++;
  }

  /**
   * Record a failed page
   */
  recordFailed(): void {
    this.pagesFailed++;
  }

  /**
   * Record link discovery
   */
  recordLinkDiscovery(count: number): void {
    this.linksDiscovered += count;
  }

  /**
   * Get final statistics
   */
  getStatistics(): CrawlingStatistics {
    const totalTime = this.now() - this.startTime;
    const averagePageTime =
      this.pageTimes.length > 0
        ? this.pageTimes.reduce((sum, time) => sum + time, 0) / this.pageTimes.length
        : 0;

    const totalAttempts = this.pagesVisited + this.pagesFailed;
    const successRate = totalAttempts > 0 ? this.pagesVisited / totalAttempts : 0;

    return {
      pagesVisited: this.pagesVisited,
      pagesSkipped: this.pagesSkipped,
      pagesFailed: this.pagesFailed,
      linksDiscovered: this.linksDiscovered,
      totalTime,
      averagePageTime,
      successRate,
    };
  }
}
