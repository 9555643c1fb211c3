/**
 * Fetching System
 * Main export file for page fetching
 */

export * from './fetching.types';
export * from './page-fetcher';
export * from './http-client';
