/**
 * Mapper Router
 * Route definitions for mapping endpoints
 */

import { Router } from 'express';
import { mapperController } from './mapper.controller';

const router = Router();

/**
 * @route   POST /api/mappings
 * @desc    Start a new mapping job
 */
router.post('/', mapperController.createJob);

/**
 * @route   GET /api/mappings
 * @desc    List mapping jobs
 */
router.get('/', mapperController.getJobs);

/**
 * @route   GET /api/mappings/:id
 * @desc    Get a mapping job
 */
router.get('/:id', mapperController.getJob);

/**
 * @route   GET /api/mappings/:id/records
 * @desc    Ordered rows of a completed job
 */
router.get('/:id/records', mapperController.getRecords);

/**
 * @route   GET /api/mappings/:id/export
 * @desc    Download the CSV of a completed job
 */
router.get('/:id/export', mapperController.exportJob);

/**
 * @route   DELETE /api/mappings/:id
 * @desc    Delete a finished job
 */
router.delete('/:id', mapperController.deleteJob);

export default router;
