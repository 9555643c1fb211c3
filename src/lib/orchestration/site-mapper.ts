/**
 * Site Mapper
 * Phased crawl of a government site: site name, primary menu, sitemap, then
 * hierarchy finalization. Every fetch goes through one shared PageSource.
 */

import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import {
  CrawlError,
  CrawlErrorType,
  CrawlPhase,
  CrawlProgressListener,
  CrawlResult,
  CrawlingStatisticsTracker,
  DiscoveredLink,
  DiscoverySource,
  LinkDiscoverer,
  MappingConfig,
  PageRecord,
  PageRegistry,
  PageType,
  UrlClassifier,
  createPageRecord,
  describeError,
  effectiveHierarchy,
  extractDomain,
  normalizeUrl,
  sitemapUrlFor,
} from '../crawling';
import {
  MenuItem,
  analyzeContent,
  extractBreadcrumb,
  extractMenuItems,
  extractSiteName,
  findPrimaryMenu,
  parseSitemapLocations,
} from '../analysis';
import { PageTree } from '../hierarchy';
import { sortRecords } from '../export';
import { PageSource } from '../fetching';

const MAX_SITEMAP_BATCH = 20;

export class SiteMapper {
  private readonly startUrl: string;
  private readonly classifier: UrlClassifier;
  private readonly registry = new PageRegistry();
  private readonly tree: PageTree;
  private readonly stats = new CrawlingStatisticsTracker();
  private readonly linkDiscoverer: LinkDiscoverer;
  private siteName: string;
  private homepageHtml: string | null = null;
  private phase: CrawlPhase = CrawlPhase.SITE_NAME;
  private limitReached = false;
  private started = false;

  constructor(
    startUrl: string,
    private readonly config: MappingConfig,
    private readonly source: PageSource,
    private readonly onProgress?: CrawlProgressListener
  ) {
    const domain = extractDomain(startUrl);
    if (!domain || !/^https?:\/\//i.test(startUrl.trim())) {
      throw new CrawlError(CrawlErrorType.FATAL, `Invalid start URL: ${startUrl}`, startUrl);
    }

    this.startUrl = startUrl.trim();
    this.classifier = new UrlClassifier(domain, config.govDomainSuffixes);
    this.linkDiscoverer = new LinkDiscoverer(this.classifier, this.startUrl);
    this.siteName = config.rootLabel;
    this.tree = new PageTree(config.rootLabel);
  }

  /**
   * Run all phases and return the ordered records.
   * Rejects with a FATAL CrawlError when the homepage cannot be fetched.
   */
  async map(): Promise<CrawlResult> {
    if (this.started) {
      throw new Error('A SiteMapper runs a single crawl');
    }
    this.started = true;
    this.stats.reset();

    console.log(`Mapping ${this.startUrl}${this.config.testMode ? ' (test mode)' : ''}`);

    await this.discoverSiteName();

    this.report(CrawlPhase.MENU, 'Processing primary menu');
    await this.mapMenu();

    this.report(CrawlPhase.SITEMAP, 'Processing sitemap');
    await this.mapSitemap();

    this.report(CrawlPhase.HIERARCHY, 'Updating hierarchies');
    this.tree.updateHierarchies();

    const records = sortRecords(this.registry.records(), this.siteName);
    const statistics = this.stats.getStatistics(records, this.registry.getStats().duplicates);

    console.log(`Mapping of ${this.startUrl} finished: ${records.length} pages in ${statistics.totalTime}ms`);
    for (const [pageType, count] of Object.entries(statistics.pagesByType)) {
      console.log(`- ${pageType}: ${count}`);
    }

    this.report(CrawlPhase.DONE, `Mapped ${records.length} pages`);

    return {
      siteName: this.siteName,
      records,
      statistics,
      limitReached: this.limitReached,
    };
  }

  getSiteName(): string {
    return this.siteName;
  }

  /**
   * Phase 0: root label from the homepage <title>
   */
  private async discoverSiteName(): Promise<void> {
    this.report(CrawlPhase.SITE_NAME, 'Discovering site name');

    const html = await this.fetchPage(this.startUrl);
    if (!html) {
      console.warn(`Could not read site name, keeping "${this.siteName}"`);
      return;
    }

    this.homepageHtml = html;
    const siteName = extractSiteName(html);
    if (siteName) {
      this.siteName = siteName;
      this.tree.reset(siteName);
      console.log(`Site name: ${siteName}`);
    } else {
      console.warn(`Homepage has no usable <title>, keeping "${this.siteName}"`);
    }
  }

  /**
   * Phase 1: homepage record and every page linked from the primary menu
   */
  private async mapMenu(): Promise<void> {
    const html = this.homepageHtml ?? (await this.fetchPage(this.startUrl));
    this.homepageHtml = null;

    if (!html) {
      throw new CrawlError(
        CrawlErrorType.FATAL,
        `Homepage unreachable: ${this.startUrl}`,
        this.startUrl
      );
    }

    const $ = cheerio.load(html);
    this.registerHomepage($);

    const menu = findPrimaryMenu($);
    if (!menu) {
      console.error(`Primary menu not found on ${this.startUrl}`);
      return;
    }

    const items = extractMenuItems($, menu, this.startUrl, this.siteName, this.classifier);
    const tasks: Promise<void>[] = [];

    for (const item of items) {
      if (this.shouldStop()) break;
      if (!this.classifier.isValidUrl(item.url)) continue;
      if (!this.registry.claim(item.url)) continue;

      tasks.push(this.processMenuItem(item));
    }

    await this.settle(tasks, 'menu item');
  }

  private registerHomepage($: CheerioAPI): void {
    const record = createPageRecord(this.startUrl, [this.siteName], {
      source: DiscoverySource.HOMEPAGE,
      pageType: PageType.HOME,
    });

    analyzeContent($, this.startUrl, record, this.classifier);

    if (this.registry.register(record)) {
      this.tree.attachRoot(this.startUrl, record);
      this.pageMapped(record);
    }
  }

  private async processMenuItem(item: MenuItem): Promise<void> {
    try {
      await this.mapMenuPage(item);
    } finally {
      this.registry.release(item.url);
    }
  }

  private async mapMenuPage(item: MenuItem): Promise<void> {
    console.log(`Processing menu item: ${item.title} -> ${item.url}`);

    const html = await this.fetchPage(item.url);
    if (!html) return;

    const $ = cheerio.load(html);
    const breadcrumb = extractBreadcrumb($, this.siteName);

    const record = createPageRecord(item.url, item.hierarchy, {
      source: DiscoverySource.MENU,
      breadcrumbHierarchy: breadcrumb ?? item.hierarchy,
    });

    analyzeContent($, item.url, record, this.classifier);

    if (!this.registry.register(record)) return;

    if (breadcrumb) {
      this.tree.addContentPage(item.url, record, breadcrumb);
    } else {
      this.tree.addMenuPage(item.hierarchy, item.url, record);
    }
    this.pageMapped(record);

    if (item.hierarchy.length > 2) {
      await this.followLinks($, item.url, effectiveHierarchy(record), 1);
    }
  }

  /**
   * Phase 2: sitemap index, its sub-sitemaps, then their pages in batches
   */
  private async mapSitemap(): Promise<void> {
    if (this.shouldStop()) {
      console.log('Page limit reached, skipping sitemap');
      return;
    }

    const sitemapUrl = sitemapUrlFor(this.startUrl);
    const xml = await this.fetchPage(sitemapUrl);
    if (!xml) {
      console.error(`Could not read sitemap at ${sitemapUrl}`);
      return;
    }

    const subSitemaps = this.readLocations(xml, sitemapUrl);
    console.log(`Found ${subSitemaps.length} sitemaps`);

    const tasks: Promise<void>[] = [];
    for (const subSitemap of subSitemaps) {
      if (this.shouldStop()) break;
      tasks.push(this.processSubSitemap(subSitemap));
    }

    await this.settle(tasks, 'sub-sitemap');
  }

  private async processSubSitemap(sitemapUrl: string): Promise<void> {
    if (this.shouldStop()) return;

    const xml = await this.fetchPage(sitemapUrl);
    if (!xml) {
      console.error(`Could not read sub-sitemap at ${sitemapUrl}`);
      return;
    }

    const pageUrls = this.readLocations(xml, sitemapUrl).filter(
      (url) => this.classifier.isValidUrl(url) && !this.classifier.isNewsUrl(url)
    );
    console.log(`Processing ${pageUrls.length} URLs from ${sitemapUrl}`);

    const batchSize = Math.max(1, Math.min(this.config.concurrency * 2, MAX_SITEMAP_BATCH));

    for (let i = 0; i < pageUrls.length; i += batchSize) {
      const batch: Promise<void>[] = [];
      for (const url of pageUrls.slice(i, i + batchSize)) {
        if (this.shouldStop()) break;
        batch.push(this.processSitemapPage(url));
      }

      await this.settle(batch, 'sitemap page');
      if (this.shouldStop()) return;
    }
  }

  private async processSitemapPage(url: string): Promise<void> {
    if (!this.registry.claim(url)) return;

    try {
      await this.mapSitemapPage(url);
    } finally {
      this.registry.release(url);
    }
  }

  private async mapSitemapPage(url: string): Promise<void> {
    const html = await this.fetchPage(url);
    if (!html) return;

    const $ = cheerio.load(html);
    const breadcrumb = extractBreadcrumb($, this.siteName);

    if (!breadcrumb) {
      this.stats.recordSkipped();
      console.log(`No breadcrumb on ${url}, skipping`);
      return;
    }

    if (this.classifier.isNewsBreadcrumb(breadcrumb)) {
      this.stats.recordNewsIgnored();
      console.log(`Skipping news page ${url}`);
      return;
    }

    const record = createPageRecord(url, breadcrumb, {
      source: DiscoverySource.SITEMAP,
      breadcrumbHierarchy: breadcrumb,
    });

    analyzeContent($, url, record, this.classifier);

    if (!this.registry.register(record)) return;

    this.tree.addContentPage(url, record, breadcrumb);
    this.pageMapped(record);

    if (breadcrumb.length !== 2) {
      await this.followLinks($, url, breadcrumb, 1);
    }
  }

  /**
   * Follow internal links of a page; shared by the menu and sitemap phases
   */
  private async followLinks(
    $: CheerioAPI,
    pageUrl: string,
    hierarchy: string[],
    depth: number
  ): Promise<void> {
    if (depth > this.config.maxLinkDepth) {
      console.warn(`Link depth cap reached at ${pageUrl}`);
      return;
    }
    if (this.shouldStop()) return;

    const links = this.linkDiscoverer.discoverLinks($, pageUrl, (url) =>
      this.registry.isVisited(url)
    );

    const tasks: Promise<void>[] = [];
    for (const link of links) {
      if (this.shouldStop()) break;
      if (!this.registry.claim(link.url)) continue;

      console.log(`Internal link found: ${link.title} -> ${link.url}`);
      tasks.push(this.processInternalLink(link, [...hierarchy, link.title], depth));
    }

    await this.settle(tasks, 'internal link');
  }

  private async processInternalLink(
    link: DiscoveredLink,
    hierarchy: string[],
    depth: number
  ): Promise<void> {
    try {
      await this.mapLinkedPage(link, hierarchy, depth);
    } finally {
      this.registry.release(link.url);
    }
  }

  private async mapLinkedPage(
    link: DiscoveredLink,
    hierarchy: string[],
    depth: number
  ): Promise<void> {
    const html = await this.fetchPage(link.url);
    if (!html) return;

    const $ = cheerio.load(html);
    const breadcrumb = extractBreadcrumb($, this.siteName);

    if (breadcrumb && this.classifier.isNewsBreadcrumb(breadcrumb)) {
      this.stats.recordNewsIgnored();
      console.log(`Skipping news link ${link.url}`);
      return;
    }

    const record = createPageRecord(link.url, hierarchy, {
      source: DiscoverySource.INTERNAL_LINK,
      breadcrumbHierarchy: breadcrumb ?? hierarchy,
    });

    analyzeContent($, link.url, record, this.classifier);

    if (!this.registry.register(record)) return;

    this.tree.addContentPage(link.url, record, record.breadcrumbHierarchy);
    this.pageMapped(record);

    await this.followLinks($, link.url, effectiveHierarchy(record), depth + 1);
  }

  private readLocations(xml: string, sitemapUrl: string): string[] {
    try {
      return parseSitemapLocations(xml, sitemapUrl);
    } catch (error) {
      console.error(`Could not parse ${sitemapUrl}: ${describeError(error)}`);
      return [];
    }
  }

  private async fetchPage(url: string): Promise<string | null> {
    const outcome = await this.source.fetch(url);
    if (outcome.ok) {
      return outcome.body;
    }

    this.stats.recordFailed();
    console.warn(`Fetch failed for ${url}: ${outcome.error.message}`);
    return null;
  }

  /**
   * Soft cap in test mode: checked before each dispatch, in-flight work finishes.
   * Claimed pages still in flight count toward the cap.
   */
  private shouldStop(): boolean {
    const committed = this.registry.size() + this.registry.pendingCount();
    if (!this.config.testMode || committed < this.config.pageLimit) {
      return false;
    }

    if (!this.limitReached) {
      this.limitReached = true;
      console.log(`Page limit of ${this.config.pageLimit} reached, no new pages will be dispatched`);
    }
    return true;
  }

  private async settle(tasks: Promise<void>[], label: string): Promise<void> {
    if (tasks.length === 0) return;

    const results = await Promise.allSettled(tasks);
    for (const result of results) {
      if (result.status === 'rejected') {
        this.stats.recordFailed();
        console.error(`Error processing ${label}: ${describeError(result.reason)}`);
      }
    }
  }

  private pageMapped(record: PageRecord): void {
    this.report(this.phase, `Mapped ${normalizeUrl(record.url)}`);
  }

  private report(phase: CrawlPhase, message: string): void {
    this.phase = phase;
    if (this.onProgress) {
      this.onProgress({ phase, message, pagesMapped: this.registry.size() });
    }
  }
}
