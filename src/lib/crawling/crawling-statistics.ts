/**
 * Crawling Statistics Tracker
 * Counters collected while mapping a site
 */

import { CrawlingStatistics, PageRecord } from './crawling.types';

export class CrawlingStatisticsTracker {
  private startTime: number;
  private pagesSkipped: number = 0;
  private pagesFailed: number = 0;
  private newsPagesIgnored: number = 0;

  constructor(private readonly now: () => number = Date.now) {
    this.startTime = now();
  }

  /**
   * Page fetched but not recorded (no breadcrumb, limit reached, ...)
   */
  recordSkipped(): void {
    this.pagesSkipped++;
  }

  recordFailed(): void {
    this.pagesFailed++;
  }

  recordNewsIgnored(): void {
    this.newsPagesIgnored++;
  }

  /**
   * Final statistics for the given records
   */
  getStatistics(records: PageRecord[], duplicatesDetected: number): CrawlingStatistics {
    const pagesByType: Record<string, number> = {};
    const pagesByLayout: Record<string, number> = {};

    for (const record of records) {
      pagesByType[record.pageType] = (pagesByType[record.pageType] || 0) + 1;
      pagesByLayout[record.layout] = (pagesByLayout[record.layout] || 0) + 1;
    }

    return {
      pagesMapped: records.length,
      pagesSkipped: this.pagesSkipped,
      pagesFailed: this.pagesFailed,
      duplicatesDetected,
      newsPagesIgnored: this.newsPagesIgnored,
      pagesByType,
      pagesByLayout,
      totalTime: this.now() - this.startTime,
    };
  }

  reset(): void {
    this.startTime = this.now();
    this.pagesSkipped = 0;
    this.pagesFailed = 0;
    this.newsPagesIgnored = 0;
  }
}
