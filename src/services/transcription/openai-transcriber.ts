import axios from 'axios';
import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { logger } from '../../config/logger';
import { ProviderError } from '../../errors/redaction.errors';
import type { TranscribedWord } from '../../types/redaction.types';
import { OPENAI_API_BASE, OPENAI_PROVIDER, toProviderError } from '../openai/openai-http';
import type { Transcriber } from './transcriber.interface';

const VerboseTranscriptionSchema = z.object({
  text: z.string().optional(),
  duration: z.number().optional(),
  words: z
    .array(
      z.object({
        word: z.string(),
        start: z.number(),
        end: z.number(),
      })
    )
    .default([]),
});

export interface OpenAITranscriberOptions {
  apiKey: string;
  model?: string;
  /** ISO-639-1 hint, e.g. "en" */
  language?: string;
  timeoutMs?: number;
}

/**
 * Whisper transcription with word-level timestamps
 * (verbose_json + timestamp_granularities[]=word).
 */
export class OpenAITranscriber implements Transcriber {
  readonly provider = OPENAI_PROVIDER;
  private readonly apiUrl = `${OPENAI_API_BASE}/audio/transcriptions`;
  private readonly model: string;

  constructor(private readonly options: OpenAITranscriberOptions) {
    this.model = options.model || 'whisper-1';
    if (!options.apiKey) {
      logger.warn('OpenAI API key not configured; transcription will fail');
    }
  }

  async transcribe(audioPath: string): Promise<TranscribedWord[]> {
    if (!this.options.apiKey) {
      throw new ProviderError('OpenAI API key not configured', this.provider);
    }

    logger.info('Transcribing audio with OpenAI', { model: this.model, audioPath });

    try {
      const form = new FormData();
      form.append('file', await fs.openAsBlob(audioPath), path.basename(audioPath));
      form.append('model', this.model);
      form.append('response_format', 'verbose_json');
      form.append('timestamp_granularities[]', 'word');
      if (this.options.language) {
        form.append('language', this.options.language);
      }

      const response = await axios.post(this.apiUrl, form, {
        headers: { Authorization: `Bearer ${this.options.apiKey}` },
        timeout: this.options.timeoutMs ?? 300000,
        maxBodyLength: Infinity,
      });

      const parsed = VerboseTranscriptionSchema.safeParse(response.data);
      if (!parsed.success) {
        throw new ProviderError(
          `Unexpected transcription response: ${parsed.error.issues.map((i) => i.message).join('; ')}`,
          this.provider
        );
      }

      logger.info('Transcription complete', {
        words: parsed.data.words.length,
        duration: parsed.data.duration,
      });
      return parsed.data.words;
    } catch (error) {
      throw toProviderError(error, 'transcribe audio');
    }
  }
}
