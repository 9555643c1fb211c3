/**
 * Orchestration
 * Entry point for running a site mapping crawl
 */

export * from './site-mapper';
