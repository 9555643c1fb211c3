/**
 * Crawling System
 * Main export file for the site mapping engine
 */

export * from './crawling.types';
export * from './crawl.errors';
export * from './url-normalizer';
export * from './url-classifier';
export * from './page-record';
export * from './page-registry';
export * from './link-discoverer';
export * from './crawling-statistics';
