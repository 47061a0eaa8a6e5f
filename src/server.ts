import { Server } from 'http';
import { createApp } from './app';
import { env } from './config/env';
import { logger } from './utils/logger';

function startServer(): Server {
  const app = createApp();

  const server = app.listen(env.PORT, () => {
    logger.info(`Server running on port ${env.PORT}`);
    logger.info(`Environment: ${env.NODE_ENV}`);
    logger.info('=== Skill Matcher Started ===');
  });

  server.on('error', (error) => {
    logger.error('Failed to start server', error);
    process.exit(1);
  });

  return server;
}

function shutdown(server: Server, signal: NodeJS.Signals) {
  logger.info(`Received ${signal}, shutting down gracefully...`);
  server.close((error) => {
    if (error) {
      logger.error('Error during shutdown', error);
      process.exit(1);
    }
    process.exit(0);
  });
}

// Start the server
if (require.main === module) {
  const server = startServer();

  // Handle graceful shutdown
  process.on('SIGINT', () => shutdown(server, 'SIGINT'));
  process.on('SIGTERM', () => shutdown(server, 'SIGTERM'));
}
