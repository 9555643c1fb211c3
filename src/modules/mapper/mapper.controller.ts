/**
 * Mapper Controller
 * HTTP request/response handling for mapping endpoints
 */

import { Request, Response } from 'express';
import { mappingService, toJobSummary } from './mapper.service';
import { asyncHandler, ApiError } from '../../middleware/error-handler';
import {
  ICreateMappingRequest,
  IMappingJobResponse,
  IMappingListResponse,
  IMappingOptions,
  IMappingRecordsResponse,
} from './mapper.types';

const MAX_CONCURRENCY = 50;
const MAX_REQUESTS_PER_SECOND = 50;

/**
 * Optional positive integer option, bounded above
 */
const parseBoundedInteger = (value: unknown, name: string, max: number): number | undefined => {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 1 || value > max) {
    throw new ApiError(400, `${name} must be an integer between 1 and ${max}`);
  }
  return value;
};

const parseMappingUrl = (value: unknown): string => {
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new ApiError(400, 'URL is required');
  }

  let parsed: URL;
  try {
    parsed = new URL(value.trim());
  } catch {
    throw new ApiError(400, 'Invalid URL format');
  }

  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new ApiError(400, 'URL must use http or https');
  }

  return value.trim();
};

const jobIdOf = (req: Request): string => req.params.id;

export class MapperController {
  /**
   * POST /api/mappings
   * Start a new mapping job
   */
  createJob = asyncHandler(async (req: Request, res: Response) => {
    const body: ICreateMappingRequest = req.body ?? {};

    const url = parseMappingUrl(body.url);

    if (body.testMode !== undefined && typeof body.testMode !== 'boolean') {
      throw new ApiError(400, 'testMode must be a boolean');
    }

    const options: Partial<IMappingOptions> = {
      testMode: body.testMode,
      concurrency: parseBoundedInteger(body.concurrency, 'concurrency', MAX_CONCURRENCY),
      requestsPerSecond: parseBoundedInteger(
        body.requestsPerSecond,
        'requestsPerSecond',
        MAX_REQUESTS_PER_SECOND
      ),
    };

    const job = await mappingService.createJob(url, options);

    const response: IMappingJobResponse = {
      success: true,
      job: toJobSummary(job),
    };

    res.status(201).json(response);
  });

  /**
   * GET /api/mappings
   * List jobs, newest first
   */
  getJobs = asyncHandler(async (req: Request, res: Response) => {
    const limit = typeof req.query.limit === 'string' ? parseInt(req.query.limit, 10) : NaN;
    const jobs = await mappingService.listJobs(Number.isNaN(limit) || limit < 1 ? undefined : limit);

    const response: IMappingListResponse = {
      success: true,
      jobs: jobs.map(toJobSummary),
      total: jobs.length,
    };

    res.json(response);
  });

  /**
   * GET /api/mappings/:id
   */
  getJob = asyncHandler(async (req: Request, res: Response) => {
    const job = await mappingService.getJob(jobIdOf(req));

    if (!job) {
      throw new ApiError(404, 'Mapping job not found');
    }

    const response: IMappingJobResponse = {
      success: true,
      job: toJobSummary(job),
    };

    res.json(response);
  });

  /**
   * GET /api/mappings/:id/records
   * Ordered table rows; 409 until the job completes
   */
  getRecords = asyncHandler(async (req: Request, res: Response) => {
    const jobId = jobIdOf(req);
    const rows = await mappingService.getRecordRows(jobId);

    const response: IMappingRecordsResponse = {
      success: true,
      jobId,
      headers: mappingService.getRecordHeaders(),
      rows,
    };

    res.json(response);
  });

  /**
   * GET /api/mappings/:id/export
   * CSV download; 409 until the job completes
   */
  exportJob = asyncHandler(async (req: Request, res: Response) => {
    const { fileName, content } = await mappingService.getExport(jobIdOf(req));

    res.setHeader('Content-Type', 'text/csv; charset=utf-8');
    res.setHeader('Content-Disposition', `attachment; filename="${fileName}"`);
    res.send(content);
  });

  /**
   * DELETE /api/mappings/:id
   */
  deleteJob = asyncHandler(async (req: Request, res: Response) => {
    const deleted = await mappingService.deleteJob(jobIdOf(req));

    if (!deleted) {
      throw new ApiError(404, 'Mapping job not found');
    }

    res.json({
      success: true,
      message: 'Job deleted successfully',
    });
  });
}

export const mapperController = new MapperController();
