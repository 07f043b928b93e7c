import * as dotenv from 'dotenv';
import { CheckInServer } from './api';
import { loadConfig } from './config';
import { errorMessage } from './errors';
import { logger } from './logging';
import { createServices } from './services';

dotenv.config();

async function main(): Promise<void> {
  const config = loadConfig();
  logger.setLevel(config.logLevel);

  logger.info('Main', 'Starting check-in service', {
    storage: config.storage,
    dataDir: config.storage === 'file' ? config.dataDir : undefined,
    tokenPrefix: config.tokenPrefix,
  });

  const services = createServices(config);
  const server = new CheckInServer(services);
  await server.start(config.port);

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info('Main', 'Shutting down', { signal });
    try {
      await server.stop();
      await services.store.close();
      process.exit(0);
    } catch (err) {
      logger.error('Main', 'Shutdown failed', { error: errorMessage(err) });
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
}

main().catch((err: unknown) => {
  logger.error('Main', 'Fatal error', { error: errorMessage(err) });
  process.exit(1);
});
