/**
 * Server Entry Point
 * Initializes the Express server and Socket.IO
 */

import { createServer } from 'http';
import { createApp } from './app';
import { initializeSocket } from './lib/socket';
import { closeHttpClient } from './lib/fetching';
import { registerMapperSocketHandlers } from './modules/mapper/mapper.socket';
import { env } from './config/env';

const startServer = async (): Promise<void> => {
  try {
    // Create Express app
    const app = createApp();

    // Create HTTP server
    const httpServer = createServer(app);

    // Initialize Socket.IO
    const io = initializeSocket(httpServer);

    // Register Socket.IO handlers
    io.on('connection', (socket) => {
      console.log(`✅ Socket connected: ${socket.id}`);

      registerMapperSocketHandlers(socket);

      socket.on('disconnect', () => {
        console.log(`❌ Socket disconnected: ${socket.id}`);
      });
    });

    // Start server
    httpServer.listen(env.PORT, () => {
      console.log('');
      console.log('🚀 ═══════════════════════════════════════════════════════');
      console.log(`🚀 Site Mapper Server is running`);
      console.log(`🚀 Environment: ${env.NODE_ENV}`);
      console.log(`🚀 Port: ${env.PORT}`);
      console.log(`🚀 Concurrency: ${env.CONCURRENT_REQUESTS} requests, ${env.REQUESTS_PER_SECOND}/s`);
      console.log(`🚀 Output: ${env.OUTPUT_DIR}`);
      console.log(`🚀 API: http://localhost:${env.PORT}/health`);
      console.log(`🚀 Socket.IO: ws://localhost:${env.PORT}`);
      console.log('🚀 ═══════════════════════════════════════════════════════');
      console.log('');
    });

    // Graceful shutdown
    const shutdown = (signal: string): void => {
      console.log(`${signal} signal received: closing HTTP server`);
      // Closes the HTTP server as well
      io.close(() => {
        console.log('HTTP server closed');
        closeHttpClient()
          .then(() => {
            console.log('HTTP client pool closed');
            process.exit(0);
          })
          .catch((error) => {
            console.error('Failed to close HTTP client pool:', error);
            process.exit(1);
          });
      });
    };

    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));
  } catch (error) {
    console.error('Failed to start server:', error);
    process.exit(1);
  }
};

// Start the server
void startServer();
