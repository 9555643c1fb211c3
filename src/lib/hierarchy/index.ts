/**
 * Hierarchy System
 * Main export file for the page tree and hierarchy display
 */

export * from './page-tree';
export * from './hierarchy-display';
