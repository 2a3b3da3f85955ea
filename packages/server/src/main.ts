import { describeError, logger } from '@step-relay/shared';
import { loadServerConfig } from './config/serverConfig.js';
import { StepServer } from './server.js';

async function main(): Promise<void> {
  const config = loadServerConfig();

  logger.info('Starting step server...');

  const server = new StepServer(config);
  await server.start();

  // Graceful shutdown
  const shutdown = (signal: string) => {
    logger.info(`${signal} received, shutting down...`);
    server.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error('Shutdown failed', { error: describeError(error) });
        process.exit(1);
      }
    );
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch((error: unknown) => {
  logger.error('Step server failed to start', { error: describeError(error) });
  process.exit(1);
});
