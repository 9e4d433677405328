import { Worker } from 'bullmq';
import { logger } from '../config/logger';
import { getRedactionConfig } from '../config/redaction.config';
import redisConnection, { QUEUE_NAMES } from '../config/redis';
import ffmpegService from '../services/audio/ffmpeg.service';
import { OpenAISensitiveContentDetector } from '../services/detection/openai-detector';
import { RedactionPipeline } from '../services/redaction-pipeline.service';
import { OpenAITranscriber } from '../services/transcription/openai-transcriber';
import { createRedactionProcessor, type RedactionJobData, type RedactionJobResult } from './redaction.processor';

/**
 * Create and start the audio redaction worker
 */
export const createRedactionWorker = () => {
  const config = getRedactionConfig();

  const pipeline = new RedactionPipeline({
    audio: ffmpegService,
    transcriber: new OpenAITranscriber({
      apiKey: config.openai.apiKey,
      model: config.openai.transcriptionModel,
    }),
    detector: new OpenAISensitiveContentDetector({
      apiKey: config.openai.apiKey,
      model: config.openai.model,
    }),
    engineOptions: config.engine,
    sampleRate: config.sampleRate,
    defaultFormat: config.outputFormat,
  });

  const worker = new Worker<RedactionJobData, RedactionJobResult>(
    QUEUE_NAMES.AUDIO_REDACTION,
    createRedactionProcessor(pipeline),
    {
      connection: redisConnection,
      // Redaction is CPU-bound; keep concurrency low per process
      concurrency: config.queue.concurrency,
    }
  );

  worker.on('completed', (job) => {
    logger.info(`Redaction job ${job.id} completed successfully`);
  });

  worker.on('failed', (job, err) => {
    logger.error(`Redaction job ${job?.id} failed:`, {
      error: err.message,
      attempts: job?.attemptsMade,
    });
  });

  worker.on('error', (err) => {
    logger.error('Redaction worker error:', err);
  });

  logger.info('Audio redaction worker started', { concurrency: config.queue.concurrency });

  return worker;
};

export default createRedactionWorker;
