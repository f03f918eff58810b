#!/usr/bin/env node
import { loadClassifierConfig } from './config/index.js';
import { createClassifier } from './bootstrap.js';
import { startApiServer, shutdownApiServer } from './api/server.js';
import { logger } from './utils/logger.js';

async function main(): Promise<void> {
  const config = loadClassifierConfig();
  const classifier = await createClassifier(config);

  const { server } = await startApiServer(
    { service: classifier.service },
    {
      port: config.server.port,
      host: config.server.host,
      requireApiKey: config.server.requireApiKey,
      apiKeys: config.server.apiKeys,
      batchConcurrency: config.concurrency,
    }
  );

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`Received ${signal}`);
    try {
      await shutdownApiServer(server);
      await classifier.close();
      process.exit(0);
    } catch (error) {
      logger.error('Shutdown failed', error);
      process.exit(1);
    }
  };

  process.on('SIGINT', signal => void shutdown(signal));
  process.on('SIGTERM', signal => void shutdown(signal));
}

main().catch(error => {
  logger.error('Failed to start pole classifier', error);
  process.exit(1);
});
