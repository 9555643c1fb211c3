/**
 * Mapper Repository
 * In-memory store for mapping jobs
 */

import { randomUUID } from 'crypto';
import { IMappingJob, IMappingOptions, MappingStatus } from './mapper.types';

export class MappingRepository {
  private jobs: Map<string, IMappingJob> = new Map();

  /**
   * Create a new queued job
   */
  async create(url: string, options: IMappingOptions): Promise<IMappingJob> {
    const job: IMappingJob = {
      id: randomUUID(),
      url,
      status: MappingStatus.QUEUED,
      options,
      pagesMapped: 0,
      limitReached: false,
      records: [],
      createdAt: new Date(),
    };

    this.jobs.set(job.id, job);
    return job;
  }

  async findById(id: string): Promise<IMappingJob | null> {
    return this.jobs.get(id) ?? null;
  }

  /**
   * Jobs, newest first
   */
  async findAll(limit?: number): Promise<IMappingJob[]> {
    // Map iteration follows insertion order
    const jobs = Array.from(this.jobs.values()).reverse();
    return limit !== undefined ? jobs.slice(0, limit) : jobs;
  }

  /**
   * Update job status, stamping start and completion times
   */
  async updateStatus(
    id: string,
    status: MappingStatus,
    metadata?: Partial<Omit<IMappingJob, 'id' | 'status'>>
  ): Promise<IMappingJob | null> {
    const job = this.jobs.get(id);
    if (!job) {
      console.error(`Repository: Failed to update job ${id} - job not found`);
      return null;
    }

    job.status = status;
    if (status === MappingStatus.RUNNING) {
      job.startedAt = new Date();
    } else if (status === MappingStatus.COMPLETED || status === MappingStatus.FAILED) {
      job.completedAt = new Date();
    }

    if (metadata) {
      Object.assign(job, metadata);
    }

    return job;
  }

  async delete(id: string): Promise<boolean> {
    return this.jobs.delete(id);
  }

  async count(): Promise<number> {
    return this.jobs.size;
  }

  clear(): void {
    this.jobs.clear();
  }
}

export const mappingRepository = new MappingRepository();
