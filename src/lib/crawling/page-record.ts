/**
 * Page Record helpers
 */

import {
  AttentionFlag,
  DiscoverySource,
  PageLayout,
  PageRecord,
  PageType,
} from './crawling.types';

export const MAX_CONTENT_COUNT = 20;

export interface CreatePageRecordOptions {
  source: DiscoverySource;
  breadcrumbHierarchy?: string[];
  pageType?: PageType;
  discoveredAt?: Date;
}

export function createPageRecord(
  url: string,
  hierarchy: string[],
  options: CreatePageRecordOptions
): PageRecord {
  if (hierarchy.length === 0) {
    throw new Error(`Empty hierarchy for ${url}`);
  }

  const record: PageRecord = {
    url,
    hierarchy: [...hierarchy],
    breadcrumbHierarchy: options.breadcrumbHierarchy ? [...options.breadcrumbHierarchy] : [],
    isVisible: false,
    pageType: PageType.WIDGET_PAGE,
    layout: PageLayout.UNSET,
    attentionFlag: AttentionFlag.NONE,
    contentCount: 0,
    fileCount: 0,
    internalFileUrls: new Set(),
    externalGovFileUrls: new Set(),
    sideMenuTitle: '-',
    source: options.source,
    discoveredAt: options.discoveredAt ?? new Date(),
    targetUrl: '',
    migrationType: 'Manual',
    vocabulary: '',
    category: '-',
    socialNetworks: '-',
    linkedPageName: '-',
    redirectLink: '-',
    complexity: '-',
  };

  if (options.pageType === PageType.HOME) {
    record.pageType = PageType.HOME;
    record.isVisible = true;
  } else {
    classifyByDepth(record);
  }

  return record;
}

/**
 * Breadcrumb hierarchy wins whenever it is non-empty
 */
export function effectiveHierarchy(record: PageRecord): string[] {
  return record.breadcrumbHierarchy.length > 0 ? record.breadcrumbHierarchy : record.hierarchy;
}

/**
 * Depth <= 2 is a menu-visible defined page, anything deeper a hidden widget page.
 * Home pages keep their type.
 */
export function classifyByDepth(record: PageRecord): void {
  if (record.pageType === PageType.HOME) {
    record.isVisible = true;
    return;
  }

  if (effectiveHierarchy(record).length <= 2) {
    record.pageType = PageType.DEFINED_PAGE;
    record.isVisible = true;
  } else {
    record.pageType = PageType.WIDGET_PAGE;
    record.isVisible = false;
  }
}

export function clampContentCount(count: number): number {
  return Math.min(Math.max(0, count), MAX_CONTENT_COUNT);
}
