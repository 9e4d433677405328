import { UnrecoverableError, type Job } from 'bullmq';
import { logger } from '../config/logger';
import type { OutputFormat } from '../config/redaction.config';
import { errorMessage, isFatalRedactionError, ProviderError } from '../errors/redaction.errors';
import type { RedactionPipeline } from '../services/redaction-pipeline.service';
import type { RedactionReport } from '../types/redaction.types';

export interface RedactionJobData {
  inputPath: string;
  outputPath?: string;
  /** Skip detection and redact exactly these phrases */
  phrases?: string[];
  format?: OutputFormat;
}

export interface RedactionJobResult {
  success: true;
  outputPath: string;
  report: RedactionReport;
}

type RedactionJob = Pick<Job<RedactionJobData>, 'id' | 'data' | 'attemptsMade' | 'updateProgress'>;

/**
 * Job processor for the redaction queue. Fatal redaction errors fail the job
 * without retry; provider failures go through the queue's backoff.
 */
export function createRedactionProcessor(pipeline: RedactionPipeline) {
  return async (job: RedactionJob): Promise<RedactionJobResult> => {
    const { inputPath, outputPath, phrases, format } = job.data;

    logger.info(`Processing redaction job ${job.id}`, {
      inputPath,
      phraseCount: phrases?.length,
      attempt: job.attemptsMade + 1,
    });

    try {
      const result = await pipeline.redactFile(
        { inputPath, outputPath, phrases, format },
        async ({ progress }) => {
          await job.updateProgress(progress);
        }
      );

      return { success: true, outputPath: result.outputPath, report: result.report };
    } catch (error) {
      logger.error(`Redaction failed for job ${job.id}:`, {
        error: errorMessage(error),
        stack: error instanceof Error ? error.stack : undefined,
      });

      if (isFatalRedactionError(error) && !(error instanceof ProviderError)) {
        throw new UnrecoverableError(`${error.name}: ${error.message}`);
      }
      throw error;
    }
  };
}
