/**
 * API Server Entry Point
 * 
 * Fastify server in front of the media operations engine with:
 * - Multipart uploads with size limits
 * - Rate limiting
 * - Scratch-space sweep at startup and cleanup on exit
 */

import { MediaOperations } from '@mediakit/processing';
import { createServer } from './server.js';
import { config } from './config/index.js';
import { logger } from './lib/logger.js';

async function main(): Promise<void> {
  try {
    const operations = MediaOperations.fromEnvironment();
    operations.scratch.installExitHook();

    const swept = await operations.scratch.sweepOrphans(operations.engine.scratchMaxAgeMs);
    if (swept.length > 0) {
      logger.info({ count: swept.length }, 'Removed orphaned scratch directories');
    }

    const server = await createServer({ operations });

    // Graceful shutdown
    const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
      logger.info({ signal }, 'Received shutdown signal');
      
      try {
        await server.close();
        logger.info('Server closed gracefully');
        process.exit(0);
      } catch (err) {
        logger.error({ err }, 'Error during shutdown');
        process.exit(1);
      }
    };

    const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];
    for (const signal of signals) {
      process.once(signal, () => void shutdown(signal));
    }

    // Start server
    await server.listen({
      host: config.host,
      port: config.port,
    });

    logger.info({
      port: config.port,
      env: config.nodeEnv,
    }, 'API server started');

  } catch (err) {
    logger.fatal({ err }, 'Failed to start server');
    process.exit(1);
  }
}

void main();
