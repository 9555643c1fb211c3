/**
 * Crawling Types
 * Type definitions for the site mapping engine
 */

/**
 * Page classification used by the migration plan
 */
export enum PageType {
  HOME = 'Página Inicial',
  DEFINED_PAGE = 'Página Definida',
  WIDGET_PAGE = 'Página de Widget',
}

export enum PageLayout {
  UNSET = '-',
  ONE_COLUMN = '1 Coluna',
  THIRTY_SEVENTY = '30/70',
}

/**
 * Attention points, mutually exclusive (first match wins)
 */
export enum AttentionFlag {
  NONE = '-',
  HAS_COLLAPSIBLE = 'Página com Colapsável',
  HAS_TABS = 'Página com Abas',
  HAS_FORM = 'Página com Formulário',
  HAS_COMPLEX_TABLES = 'Página com Tabelas Complexas',
}

/**
 * Where a page was first discovered
 */
export enum DiscoverySource {
  HOMEPAGE = 'homepage',
  MENU = 'menu',
  SITEMAP = 'sitemap',
  INTERNAL_LINK = 'internal_link',
}

/**
 * One mapped page
 */
export interface PageRecord {
  /**
   * Canonical fetch address
   */
  url: string;

  /**
   * Section titles from the root label down to this page
   */
  hierarchy: string[];

  /**
   * Hierarchy read from the page's breadcrumb trail (preferred when non-empty)
   */
  breadcrumbHierarchy: string[];

  isVisible: boolean;
  pageType: PageType;
  layout: PageLayout;
  attentionFlag: AttentionFlag;

  /**
   * Content blocks found in the main region, clamped to [0, MAX_CONTENT_COUNT]
   */
  contentCount: number;

  /**
   * Internal file links seen in the main region (duplicates counted)
   */
  fileCount: number;

  internalFileUrls: Set<string>;
  externalGovFileUrls: Set<string>;

  /**
   * Title of the side menu, "-" when absent
   */
  sideMenuTitle: string;

  source: DiscoverySource;
  discoveredAt: Date;

  // Migration plan columns filled in later by the migration team
  targetUrl: string;
  migrationType: string;
  vocabulary: string;
  category: string;
  socialNetworks: string;
  linkedPageName: string;
  redirectLink: string;
  complexity: string;
}

/**
 * Site mapping configuration
 */
export interface MappingConfig {
  /**
   * Maximum simultaneous in-flight requests
   */
  concurrency: number;

  /**
   * Maximum requests started per second
   */
  requestsPerSecond: number;

  /**
   * Stop admitting new pages once the registry reaches pageLimit
   */
  testMode: boolean;

  /**
   * Soft cap applied in test mode
   */
  pageLimit: number;

  /**
   * Safety cap on recursive link following
   */
  maxLinkDepth: number;

  /**
   * Label used until the site name is discovered, and as the display root
   */
  rootLabel: string;

  /**
   * Host suffixes identifying other government sites
   */
  govDomainSuffixes: string[];
}

/**
 * Crawl statistics
 */
export interface CrawlingStatistics {
  pagesMapped: number;
  pagesSkipped: number;
  pagesFailed: number;
  duplicatesDetected: number;
  newsPagesIgnored: number;
  pagesByType: Record<string, number>;
  pagesByLayout: Record<string, number>;
  totalTime: number;
}

/**
 * Outcome of a full crawl
 */
export interface CrawlResult {
  siteName: string;
  records: PageRecord[];
  statistics: CrawlingStatistics;
  limitReached: boolean;
}

/**
 * Progress notification emitted while crawling
 */
export interface CrawlProgress {
  phase: CrawlPhase;
  message: string;
  pagesMapped: number;
}

export enum CrawlPhase {
  SITE_NAME = 'site_name',
  MENU = 'menu',
  SITEMAP = 'sitemap',
  HIERARCHY = 'hierarchy',
  DONE = 'done',
}

export type CrawlProgressListener = (progress: CrawlProgress) => void;
