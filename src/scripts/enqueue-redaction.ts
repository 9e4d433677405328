/**
 * Queue a file for the redaction worker.
 *
 *   node dist/scripts/enqueue-redaction.js <input> [output] [--phrases "a,b"]
 */
import { describeLoadedEnv, loadEnv } from '../config/env';
const loadedEnv = loadEnv();

import { logger } from '../config/logger';
import redisConnection, { audioRedactionQueue } from '../config/redis';
import { parseScriptArgs } from './script-args';

async function main(): Promise<void> {
  logger.debug('Environment loaded', describeLoadedEnv(loadedEnv));
  const args = parseScriptArgs(process.argv.slice(2));

  const job = await audioRedactionQueue.add('redact', {
    inputPath: args.inputPath,
    outputPath: args.outputPath,
    phrases: args.phrases,
  });

  logger.info(`Queued redaction job ${job.id}`, { inputPath: args.inputPath });
  await audioRedactionQueue.close();
  await redisConnection.quit();
}

main().catch((error: unknown) => {
  logger.error('Failed to enqueue redaction:', error);
  process.exit(1);
});
