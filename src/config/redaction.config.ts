import { z } from 'zod';
import { ConfigError } from '../errors/redaction.errors';
import type { EngineOptions } from '../types/redaction.types';

export const OUTPUT_FORMATS = ['mp3', 'wav', 'flac'] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

const EnvSchema = z.object({
  REDACTION_PAD_MS: z.coerce.number().min(0).max(5000).default(150),
  REDACTION_MIN_GAP_MS: z.coerce.number().min(0).max(5000).default(50),
  FUZZY_MATCH_THRESHOLD: z.coerce.number().gt(0).max(1).default(0.8),
  MATCH_WINDOW_SLACK: z.coerce.number().int().min(0).max(10).default(2),
  FUZZY_MIN_PHRASE_LENGTH: z.coerce.number().int().min(0).max(50).default(4),
  TIMELINE_ORDER_TOLERANCE_MS: z.coerce.number().min(0).default(250),
  MASK_TONE_FREQUENCY_HZ: z.coerce.number().positive().max(20000).default(1000),
  MASK_TONE_AMPLITUDE: z.coerce.number().min(0).max(1).default(0.5),
  MASK_TONE_FADE_MS: z.coerce.number().min(0).max(1000).default(10),
  REDACTION_SAMPLE_RATE: z.coerce.number().int().min(8000).max(192000).default(44100),
  REDACTION_OUTPUT_FORMAT: z.enum(OUTPUT_FORMATS).default('mp3'),
  OPENAI_API_KEY: z.string().default(''),
  OPENAI_MODEL: z.string().min(1).default('gpt-4o-mini'),
  OPENAI_TRANSCRIPTION_MODEL: z.string().min(1).default('whisper-1'),
  REDIS_URL: z.string().min(1).default('redis://localhost:6379'),
  REDACTION_WORKER_CONCURRENCY: z.coerce.number().int().min(1).max(32).default(2),
});

export interface RedactionConfig {
  engine: EngineOptions;
  sampleRate: number;
  outputFormat: OutputFormat;
  openai: {
    apiKey: string;
    model: string;
    transcriptionModel: string;
  };
  queue: {
    redisUrl: string;
    concurrency: number;
  };
}

/**
 * Read redaction settings from the environment.
 * Millisecond variables are converted to the seconds the engine works in.
 */
export function getRedactionConfig(env: NodeJS.ProcessEnv = process.env): RedactionConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join('.')}: ${i.message}`)
      .join('; ');
    throw new ConfigError(`Invalid redaction configuration: ${issues}`);
  }

  const e = result.data;
  return {
    engine: {
      matcher: {
        fuzzyThreshold: e.FUZZY_MATCH_THRESHOLD,
        windowSlack: e.MATCH_WINDOW_SLACK,
        minFuzzyLength: e.FUZZY_MIN_PHRASE_LENGTH,
      },
      padSeconds: e.REDACTION_PAD_MS / 1000,
      minGapSeconds: e.REDACTION_MIN_GAP_MS / 1000,
      timeline: {
        orderToleranceSeconds: e.TIMELINE_ORDER_TOLERANCE_MS / 1000,
      },
      tone: {
        frequencyHz: e.MASK_TONE_FREQUENCY_HZ,
        amplitude: e.MASK_TONE_AMPLITUDE,
        fadeSeconds: e.MASK_TONE_FADE_MS / 1000,
      },
    },
    sampleRate: e.REDACTION_SAMPLE_RATE,
    outputFormat: e.REDACTION_OUTPUT_FORMAT,
    openai: {
      apiKey: e.OPENAI_API_KEY,
      model: e.OPENAI_MODEL,
      transcriptionModel: e.OPENAI_TRANSCRIPTION_MODEL,
    },
    queue: {
      redisUrl: e.REDIS_URL,
      concurrency: e.REDACTION_WORKER_CONCURRENCY,
    },
  };
}
