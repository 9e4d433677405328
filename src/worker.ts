import { describeLoadedEnv, loadEnv } from './config/env';
const loadedEnv = loadEnv();

import { logger } from './config/logger';
import redisConnection, { createQueueEvents, QUEUE_NAMES } from './config/redis';
import createRedactionWorker from './jobs/redaction.worker';

logger.info('Environment loaded', describeLoadedEnv(loadedEnv));

const worker = createRedactionWorker();
const queueEvents = createQueueEvents(QUEUE_NAMES.AUDIO_REDACTION);

const shutdown = async (signal: string) => {
  logger.info(`${signal} received, shutting down redaction worker`);
  try {
    await worker.close();
    await queueEvents.close();
    await redisConnection.quit();
    process.exit(0);
  } catch (error) {
    logger.error('Error during shutdown:', error);
    process.exit(1);
  }
};

process.on('SIGINT', () => void shutdown('SIGINT'));
process.on('SIGTERM', () => void shutdown('SIGTERM'));
