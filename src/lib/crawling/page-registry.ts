/**
 * Page Registry
 * Normalized-URL registry of mapped pages plus the visited set.
 *
 * Every method is synchronous: a check and the insert that follows it run
 * without yielding to the event loop, so concurrent crawl tasks cannot
 * interleave between them.
 */

import { PageRecord } from './crawling.types';
import { normalizeUrl } from './url-normalizer';

export class PageRegistry {
  private pages: Map<string, PageRecord> = new Map();
  private visitedUrls: Set<string> = new Set();
  private pendingUrls: Set<string> = new Set();
  private duplicatesCount: number = 0;

  /**
   * Mark a URL as dispatched. Returns false when it was already visited or mapped.
   */
  claim(url: string): boolean {
    const normalized = normalizeUrl(url);

    if (this.visitedUrls.has(normalized) || this.pages.has(normalized)) {
      this.duplicatesCount++;
      return false;
    }

    this.visitedUrls.add(normalized);
    this.pendingUrls.add(normalized);
    return true;
  }

  /**
   * Settle a claim that ended without a record; the URL stays visited
   */
  release(url: string): void {
    this.pendingUrls.delete(normalizeUrl(url));
  }

  /**
   * Add a record. Returns false (and keeps the first record) on a duplicate URL.
   */
  register(record: PageRecord): boolean {
    const normalized = normalizeUrl(record.url);

    if (this.pages.has(normalized)) {
      this.duplicatesCount++;
      return false;
    }

    this.pages.set(normalized, record);
    this.visitedUrls.add(normalized);
    this.pendingUrls.delete(normalized);
    return true;
  }

  isVisited(url: string): boolean {
    return this.visitedUrls.has(normalizeUrl(url));
  }

  isMapped(url: string): boolean {
    return this.pages.has(normalizeUrl(url));
  }

  get(url: string): PageRecord | undefined {
    return this.pages.get(normalizeUrl(url));
  }

  records(): PageRecord[] {
    return Array.from(this.pages.values());
  }

  size(): number {
    return this.pages.size;
  }

  /**
   * Claimed pages still being fetched or analyzed
   */
  pendingCount(): number {
    return this.pendingUrls.size;
  }

  getStats(): { mapped: number; visited: number; pending: number; duplicates: number } {
    return {
      mapped: this.pages.size,
      visited: this.visitedUrls.size,
      pending: this.pendingUrls.size,
      duplicates: this.duplicatesCount,
    };
  }

  clear(): void {
    this.pages.clear();
    this.visitedUrls.clear();
    this.pendingUrls.clear();
    this.duplicatesCount = 0;
  }
}
