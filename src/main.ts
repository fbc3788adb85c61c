import type { FastifyInstance } from 'fastify';

import { config } from './config/config.service.js';
import { DatabaseService } from './database/database.service.js';
import { ChannelLimitPrompt, CommandDownloadExecutor, DownloadQueueService } from './jobs/index.js';
import { createControlServer } from './server/control-server.js';
import {
  ChannelRuleAuthoring,
  ClassifierService,
  FileSystemInputReader,
  FilterService,
  IngestionService,
} from './services/index.js';
import { StoreCorruptionError } from './utils/errors.js';
import { logger } from './utils/logger/logger.service.js';

let database: DatabaseService | null = null;
let downloads: DownloadQueueService | null = null;
let server: FastifyInstance | null = null;

async function bootstrap(): Promise<void> {
  logger.info('Starting link-triage...');

  database = new DatabaseService(config.storage.dataDir);
  try {
    await database.open();
  } catch (error) {
    if (error instanceof StoreCorruptionError) {
      logger.error(`Refusing to start: ${error.message}`);
      process.exit(1);
    }
    throw error;
  }

  const authoring = new ChannelRuleAuthoring();
  const limitPrompt = new ChannelLimitPrompt();

  authoring.channel.onRequest((request) => {
    logger.info(`No filter matches ${request.payload.url}; waiting for a new filter (decision ${request.id})`);
  });
  limitPrompt.channel.onRequest((request) => {
    logger.info(`Limit reached for ${request.payload.url} (${request.payload.reason}); decision ${request.id}`);
  });

  const classifier = new ClassifierService(database.links, database.filters, authoring, {
    trimTrailingClosers: config.ingestion.trimTrailingClosers,
  });
  const filters = new FilterService({
    filters: database.filters,
    links: database.links,
    lock: database.lock,
    classifier,
  });
  const ingestion = new IngestionService({
    classifier,
    batches: database.batches,
    reader: new FileSystemInputReader(),
    linkFilesDir: config.storage.linkFilesDir,
  });

  const executor = new CommandDownloadExecutor({
    command: config.downloads.command,
    args: config.downloads.args,
  });
  downloads = new DownloadQueueService(database.links, executor, limitPrompt, {
    slots: config.downloads.slots,
    maxRetries: config.downloads.maxRetries,
    stopPolicy: config.downloads.stopPolicy,
    limits: {
      maxItems: config.limits.maxItems,
      maxBytes: config.limits.maxBytes,
      maxElapsedMs: config.limits.maxElapsedMs,
    },
    limitSampleIntervalMs: config.limits.sampleIntervalMs,
  });

  const health = database.healthCheck();
  logger.info(`Loaded ${health.links} links, ${health.filters} filters, ${health.batches} batches`);

  if (config.server.enabled) {
    server = createControlServer({ database, filters, ingestion, downloads, authoring, limitPrompt });
    await server.listen({ port: config.server.port, host: config.server.host });
    logger.info(`Control API listening on ${config.server.host}:${config.server.port}`);
  }

  if (config.downloads.autoStart) {
    downloads.start();
  }

  logger.info('link-triage is ready');
}

let shutdownInProgress = false;
const gracefulShutdown = async () => {
  if (shutdownInProgress) {
    logger.warn('Shutdown already in progress');
    return;
  }

  shutdownInProgress = true;
  logger.info('Shutting down gracefully...');
  try {
    if (server) {
      await server.close();
    }
    if (downloads) {
      await downloads.close();
    }
    if (database) {
      logger.info('Store state', database.healthCheck());
    }
    logger.info('Shutdown completed successfully');
  } catch (error) {
    logger.error('Error during shutdown:', error);
    process.exit(1);
  }
  process.exit(0);
};

process.once('SIGINT', gracefulShutdown);
process.once('SIGTERM', gracefulShutdown);

bootstrap().catch((error) => {
  logger.error('Failed to start application:', error);
  process.exit(1);
});
