/**
 * Mapper Service
 * Runs mapping jobs in the background and publishes their progress
 */

import path from 'path';
import { mappingRepository, MappingRepository } from './mapper.repository';
import { getIO, isSocketInitialized } from '../../lib/socket';
import { ApiError } from '../../middleware/error-handler';
import { env } from '../../config/env';
import { CrawlProgress, MappingConfig, describeError } from '../../lib/crawling';
import { FetcherConfig, PageFetcher } from '../../lib/fetching';
import { SiteMapper } from '../../lib/orchestration';
import {
  RECORD_HEADERS,
  RowOptions,
  buildOutputPath,
  renderRecordsCsv,
  toRows,
  writeRecordsCsv,
} from '../../lib/export';
import {
  IMappingExport,
  IMappingJob,
  IMappingJobSummary,
  IMappingOptions,
  IMappingProgressEvent,
  MappingStatus,
} from './mapper.types';

/**
 * Builds the fetcher a job crawls through
 */
export type FetcherFactory = (options: IMappingOptions) => PageFetcher;

export const buildFetcherConfig = (options: IMappingOptions): FetcherConfig => ({
  concurrency: options.concurrency,
  requestsPerSecond: options.requestsPerSecond,
  timeout: env.CONNECTION_TIMEOUT,
  maxRetries: env.MAX_RETRIES,
  jitterMax: env.REQUEST_JITTER_MAX,
  backoffBase: env.RETRY_BACKOFF_BASE,
  rateLimitedBackoff: env.RATE_LIMITED_BACKOFF,
  rateLimitedBackoffStep: env.RATE_LIMITED_BACKOFF_STEP,
  userAgent: env.USER_AGENT,
});

export const buildMappingConfig = (options: IMappingOptions): MappingConfig => ({
  concurrency: options.concurrency,
  requestsPerSecond: options.requestsPerSecond,
  testMode: options.testMode,
  pageLimit: env.TEST_MODE_PAGE_LIMIT,
  maxLinkDepth: env.MAX_LINK_DEPTH,
  rootLabel: env.ROOT_LABEL,
  govDomainSuffixes: [...env.GOV_DOMAIN_SUFFIXES],
});

const defaultFetcherFactory: FetcherFactory = (options) =>
  new PageFetcher(buildFetcherConfig(options));

export const toJobSummary = (job: IMappingJob): IMappingJobSummary => {
  const { records: _records, ...summary } = job;
  return summary;
};

export class MappingService {
  private running: Map<string, Promise<void>> = new Map();

  constructor(
    private readonly repository: MappingRepository = mappingRepository,
    private readonly createFetcher: FetcherFactory = defaultFetcherFactory,
    private readonly outputDir: string = env.OUTPUT_DIR
  ) {}

  /**
   * Create a mapping job and start it in the background
   */
  async createJob(url: string, options: Partial<IMappingOptions> = {}): Promise<IMappingJob> {
    const job = await this.repository.create(url, {
      testMode: options.testMode ?? false,
      concurrency: options.concurrency ?? env.CONCURRENT_REQUESTS,
      requestsPerSecond: options.requestsPerSecond ?? env.REQUESTS_PER_SECOND,
    });

    this.emitProgress(job.id, {
      jobId: job.id,
      status: MappingStatus.QUEUED,
      message: 'Job created and queued',
      pagesMapped: 0,
    });

    // The run updates the stored job in place from its first step
    const queued: IMappingJob = { ...job, options: { ...job.options }, records: [] };

    const execution = this.executeJob(job.id)
      .catch((error) => {
        console.error(`Error executing job ${job.id}:`, error);
      })
      .finally(() => {
        this.running.delete(job.id);
      });
    this.running.set(job.id, execution);

    return queued;
  }

  async getJob(jobId: string): Promise<IMappingJob | null> {
    return await this.repository.findById(jobId);
  }

  async listJobs(limit?: number): Promise<IMappingJob[]> {
    return await this.repository.findAll(limit);
  }

  /**
   * Resolves once the job's background run has settled
   */
  async waitForJob(jobId: string): Promise<void> {
    await this.running.get(jobId);
  }

  /**
   * Ordered table rows of a completed job
   */
  async getRecordRows(jobId: string): Promise<string[][]> {
    const job = await this.requireCompletedJob(jobId);
    return toRows(job.records, this.rowOptions());
  }

  getRecordHeaders(): string[] {
    return [...RECORD_HEADERS];
  }

  /**
   * CSV download of a completed job
   */
  async getExport(jobId: string): Promise<IMappingExport> {
    const job = await this.requireCompletedJob(jobId);
    const fileName = job.outputFile
      ? path.basename(job.outputFile)
      : path.basename(buildOutputPath(this.outputDir, job.url, job.completedAt));

    return {
      fileName,
      content: renderRecordsCsv(job.records, this.rowOptions()),
    };
  }

  /**
   * Delete a finished job; running jobs cannot be removed
   */
  async deleteJob(jobId: string): Promise<boolean> {
    const job = await this.repository.findById(jobId);
    if (!job) {
      return false;
    }

    if (job.status === MappingStatus.QUEUED || job.status === MappingStatus.RUNNING) {
      throw new ApiError(409, 'Job is still running');
    }

    return await this.repository.delete(jobId);
  }

  private async requireCompletedJob(jobId: string): Promise<IMappingJob> {
    const job = await this.repository.findById(jobId);
    if (!job) {
      throw new ApiError(404, 'Mapping job not found');
    }
    if (job.status !== MappingStatus.COMPLETED) {
      throw new ApiError(409, `Mapping job is ${job.status}`);
    }
    return job;
  }

  private rowOptions(): RowOptions {
    return {
      rootLabel: env.ROOT_LABEL,
      formulaSeparator: env.CSV_FORMULA_SEPARATOR,
    };
  }

  /**
   * Run the crawl, then write the CSV
   */
  private async executeJob(jobId: string): Promise<void> {
    const job = await this.repository.updateStatus(jobId, MappingStatus.RUNNING);
    if (!job) {
      throw new Error('Job not found');
    }

    this.emitProgress(jobId, {
      jobId,
      status: MappingStatus.RUNNING,
      message: 'Starting mapping...',
      pagesMapped: 0,
    });

    try {
      const fetcher = this.createFetcher(job.options);
      const mapper = new SiteMapper(
        job.url,
        buildMappingConfig(job.options),
        fetcher,
        (progress: CrawlProgress) => {
          this.emitProgress(jobId, {
            jobId,
            status: MappingStatus.RUNNING,
            phase: progress.phase,
            message: progress.message,
            pagesMapped: progress.pagesMapped,
          });
        }
      );

      const result = await mapper.map();
      console.log(`Job ${jobId}: ✓ Mapped ${result.records.length} pages of ${result.siteName}`);

      let outputFile: string | undefined = buildOutputPath(this.outputDir, job.url);
      let exportError: string | undefined;
      try {
        await writeRecordsCsv(result.records, outputFile, this.rowOptions());
        console.log(`Job ${jobId}: CSV written to ${outputFile}`);
      } catch (error) {
        exportError = `Export failed: ${describeError(error)}`;
        console.error(`Job ${jobId}: ${exportError}`);
        outputFile = undefined;
      }

      await this.repository.updateStatus(jobId, MappingStatus.COMPLETED, {
        siteName: result.siteName,
        pagesMapped: result.records.length,
        limitReached: result.limitReached,
        statistics: result.statistics,
        fetchStatistics: fetcher.getStats(),
        records: result.records,
        outputFile,
        error: exportError,
      });

      this.emit('mapping:completed', jobId, {
        jobId,
        status: MappingStatus.COMPLETED,
        message: `Mapped ${result.records.length} pages`,
        pagesMapped: result.records.length,
      });
    } catch (error) {
      const message = describeError(error);
      console.error(`Job ${jobId}: ✗ Mapping failed: ${message}`);

      await this.repository.updateStatus(jobId, MappingStatus.FAILED, {
        error: message,
        pagesMapped: 0,
        records: [],
      });

      this.emit('mapping:failed', jobId, {
        jobId,
        status: MappingStatus.FAILED,
        message,
        pagesMapped: 0,
      });
    }
  }

  private emitProgress(jobId: string, event: IMappingProgressEvent): void {
    this.emit('mapping:progress', jobId, event);
  }

  /**
   * Emit to the job room via Socket.IO (no-op before the server starts)
   */
  private emit(eventName: string, jobId: string, event: IMappingProgressEvent): void {
    if (!isSocketInitialized()) return;

    try {
      getIO().to(`job:${jobId}`).emit(eventName, event);
    } catch (error) {
      console.error('Error emitting progress:', error);
    }
  }
}

export const mappingService = new MappingService();
