/**
 * Redact one file in-process, without the queue.
 *
 *   node dist/scripts/redact-file.js <input> [output] [--phrases "name one,555 1234"]
 *
 * Without --phrases the OpenAI detector decides what to remove.
 */
import { describeLoadedEnv, loadEnv } from '../config/env';
const loadedEnv = loadEnv();

import { logger } from '../config/logger';
import { getRedactionConfig } from '../config/redaction.config';
import ffmpegService from '../services/audio/ffmpeg.service';
import { OpenAISensitiveContentDetector } from '../services/detection/openai-detector';
import { RedactionPipeline } from '../services/redaction-pipeline.service';
import { OpenAITranscriber } from '../services/transcription/openai-transcriber';
import { parseScriptArgs } from './script-args';

async function main(): Promise<void> {
  logger.debug('Environment loaded', describeLoadedEnv(loadedEnv));
  const args = parseScriptArgs(process.argv.slice(2));
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

  const result = await pipeline.redactFile(
    { inputPath: args.inputPath, outputPath: args.outputPath, phrases: args.phrases },
    ({ stage, progress, message }) => {
      logger.info(`[${progress}%] ${stage}: ${message}`);
    }
  );

  console.log(JSON.stringify({ outputPath: result.outputPath, report: result.report }, null, 2));
}

main().catch((error: unknown) => {
  logger.error('Redaction script failed:', error);
  process.exit(1);
});
