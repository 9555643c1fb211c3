/**
 * Mapper Module Types
 * Mapping jobs, API payloads and socket events
 */

import { CrawlPhase, CrawlingStatistics, PageRecord } from '../../lib/crawling';
import { FetchStatistics } from '../../lib/fetching';

// ============================================================================
// Enums
// ============================================================================

export enum MappingStatus {
  QUEUED = 'queued',
  RUNNING = 'running',
  COMPLETED = 'completed',
  FAILED = 'failed',
}

// ============================================================================
// Core Interfaces
// ============================================================================

export interface IMappingOptions {
  /**
   * Stop admitting pages after the test-mode limit
   */
  testMode: boolean;
  concurrency: number;
  requestsPerSecond: number;
}

export interface IMappingJob {
  id: string;
  url: string;
  status: MappingStatus;
  options: IMappingOptions;

  // Results
  siteName?: string;
  pagesMapped: number;
  limitReached: boolean;
  statistics?: CrawlingStatistics;
  fetchStatistics?: FetchStatistics;
  outputFile?: string;
  error?: string;

  /**
   * Ordered records, filled when the job completes
   */
  records: PageRecord[];

  // Timestamps
  createdAt: Date;
  startedAt?: Date;
  completedAt?: Date;
}

/**
 * Job as returned by the API (records are served separately)
 */
export type IMappingJobSummary = Omit<IMappingJob, 'records'>;

// ============================================================================
// Request/Response Interfaces
// ============================================================================

export interface ICreateMappingRequest {
  url?: unknown;
  testMode?: unknown;
  concurrency?: unknown;
  requestsPerSecond?: unknown;
}

export interface IMappingJobResponse {
  success: boolean;
  job: IMappingJobSummary;
}

export interface IMappingListResponse {
  success: boolean;
  jobs: IMappingJobSummary[];
  total: number;
}

export interface IMappingRecordsResponse {
  success: boolean;
  jobId: string;
  headers: string[];
  rows: string[][];
}

export interface IMappingExport {
  fileName: string;
  content: string;
}

// ============================================================================
// Socket Events
// ============================================================================

export interface IMappingProgressEvent {
  jobId: string;
  status: MappingStatus;
  phase?: CrawlPhase;
  message: string;
  pagesMapped: number;
}
