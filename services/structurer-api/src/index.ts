/**
 * Structurer API - process entry point
 */

import { logger, config } from '@doc-structurer/shared';
import { createApp } from './app';

const app = createApp();

// Start server
const server = app.listen(config.port, () => {
  logger.info('Structurer API started', { port: config.port, model: config.llmModel });
});

// Graceful shutdown
function shutdown(signal: string) {
  logger.info(`${signal} received, shutting down`);
  server.close((error) => {
    if (error) {
      logger.error('Error while closing HTTP server', error);
      process.exit(1);
    }
    process.exit(0);
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
