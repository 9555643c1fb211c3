/**
 * Page Analysis
 * Markup extractors and content heuristics
 */

export * from './markup-node';
export * from './site-name';
export * from './breadcrumb-extractor';
export * from './menu-extractor';
export * from './content-analyzer';
export * from './sitemap-parser';
