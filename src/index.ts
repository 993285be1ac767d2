/**
 * Main Entry Point
 * Start the API server
 */

import { startServer } from './api/server.js';
import { bootstrap } from './bootstrap.js';
import { createLogger } from './monitoring/logger.js';

const logger = createLogger('index');

async function main() {
  logger.info('Starting analysis pipeline orchestrator...');

  try {
    const orchestrator = await bootstrap();
    const server = await startServer(orchestrator);

    const stop = async (signal: string) => {
      logger.info({ signal }, 'Shutting down');
      await server.close();
      orchestrator.shutdown();
      process.exit(0);
    };
    process.once('SIGINT', (signal) => void stop(signal));
    process.once('SIGTERM', (signal) => void stop(signal));
  } catch (error) {
    logger.error({ err: error }, 'Failed to start server');
    process.exit(1);
  }
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
