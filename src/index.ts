import { startServer } from './server.js';
import { logger } from './utils/logger.js';

function main() {
  logger.info('Starting Product Verdict Agent...');

  const server = startServer();

  const shutdown = (signal: string) => {
    logger.info(`${signal} received, shutting down...`);
    server.close(() => process.exit(0));
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

try {
  main();
} catch (error) {
  logger.error('Failed to start Product Verdict Agent', { error });
  process.exit(1);
}
