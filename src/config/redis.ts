import { Queue, QueueEvents } from 'bullmq';
import Redis from 'ioredis';
import { logger } from './logger';
import { getRedactionConfig } from './redaction.config';
import type { RedactionJobData, RedactionJobResult } from '../jobs/redaction.processor';

const { queue } = getRedactionConfig();

// BullMQ requires maxRetriesPerRequest: null on worker connections
const redisConnection = new Redis(queue.redisUrl, {
  maxRetriesPerRequest: null,
  enableReadyCheck: false,
});

redisConnection.on('connect', () => {
  logger.info('Redis connected successfully');
});

redisConnection.on('error', (error) => {
  logger.error('Redis connection error:', error);
});

export const QUEUE_NAMES = {
  AUDIO_REDACTION: 'audio-redaction',
} as const;

export const audioRedactionQueue = new Queue<RedactionJobData, RedactionJobResult>(
  QUEUE_NAMES.AUDIO_REDACTION,
  {
    connection: redisConnection,
    defaultJobOptions: {
      attempts: 3,
      backoff: {
        type: 'exponential',
        delay: 2000,
      },
      removeOnComplete: {
        count: 100, // Keep last 100 completed jobs
        age: 24 * 3600, // Keep for 24 hours
      },
      removeOnFail: {
        count: 200,
      },
    },
  }
);

export function createQueueEvents(queueName: string): QueueEvents {
  const queueEvents = new QueueEvents(queueName, { connection: redisConnection });

  queueEvents.on('completed', ({ jobId }) => {
    logger.info(`Job ${jobId} in queue ${queueName} completed`);
  });

  queueEvents.on('failed', ({ jobId, failedReason }) => {
    logger.error(`Job ${jobId} in queue ${queueName} failed:`, failedReason);
  });

  queueEvents.on('progress', ({ jobId, data }) => {
    logger.debug(`Job ${jobId} in queue ${queueName} progress:`, data);
  });

  return queueEvents;
}

export default redisConnection;
