/**
 * Mapper Socket Handlers
 * Real-time WebSocket event handlers for mapping jobs
 */

import { Socket } from 'socket.io';
import { mappingService, toJobSummary } from './mapper.service';
import { describeError } from '../../lib/crawling';

/**
 * Register mapper socket event handlers
 */
export const registerMapperSocketHandlers = (socket: Socket): void => {
  /**
   * Join a job room for real-time updates
   */
  socket.on('mapping:join', (jobId: string) => {
    socket.join(`job:${jobId}`);
    console.log(`Socket ${socket.id} joined job room: ${jobId}`);
  });

  /**
   * Leave a job room
   */
  socket.on('mapping:leave', (jobId: string) => {
    socket.leave(`job:${jobId}`);
    console.log(`Socket ${socket.id} left job room: ${jobId}`);
  });

  /**
   * Request current job status
   */
  socket.on('mapping:status', async (jobId: string) => {
    try {
      const job = await mappingService.getJob(jobId);

      if (job) {
        socket.emit('mapping:status:response', {
          success: true,
          job: toJobSummary(job),
        });
      } else {
        socket.emit('mapping:status:response', {
          success: false,
          error: 'Job not found',
        });
      }
    } catch (error) {
      socket.emit('mapping:status:response', {
        success: false,
        error: describeError(error),
      });
    }
  });
};
