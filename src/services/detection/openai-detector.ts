import axios from 'axios';
import { z } from 'zod';
import { logger } from '../../config/logger';
import { ProviderError } from '../../errors/redaction.errors';
import { OPENAI_API_BASE, OPENAI_PROVIDER, toProviderError } from '../openai/openai-http';
import type { SensitiveContentDetector } from './detector.interface';

const DetectionResponseSchema = z.object({
  phrases: z.array(z.string()),
});

const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable() }),
      })
    )
    .min(1),
  usage: z.object({ total_tokens: z.number() }).optional(),
});

interface OpenAIMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface OpenAIDetectorOptions {
  apiKey: string;
  model?: string;
  /** Extra categories to flag besides the defaults */
  categories?: string[];
  timeoutMs?: number;
}

const DEFAULT_CATEGORIES = [
  'personal names',
  'phone numbers',
  'email addresses',
  'street addresses',
  'account, card and ID numbers',
  'passwords and security answers',
];

/**
 * Asks a chat model for the sensitive spans of a transcript, quoted verbatim.
 */
export class OpenAISensitiveContentDetector implements SensitiveContentDetector {
  readonly provider = OPENAI_PROVIDER;
  private readonly apiUrl = `${OPENAI_API_BASE}/chat/completions`;
  private readonly model: string;
  private readonly categories: string[];

  constructor(private readonly options: OpenAIDetectorOptions) {
    this.model = options.model || 'gpt-4o-mini';
    this.categories = [...DEFAULT_CATEGORIES, ...(options.categories ?? [])];
    if (!options.apiKey) {
      logger.warn('OpenAI API key not configured; detection will fail');
    }
  }

  async detect(text: string): Promise<string[]> {
    if (!text.trim()) return [];
    if (!this.options.apiKey) {
      throw new ProviderError('OpenAI API key not configured', this.provider);
    }

    const messages: OpenAIMessage[] = [
      { role: 'system', content: this.buildSystemPrompt() },
      { role: 'user', content: text },
    ];

    logger.info('Detecting sensitive content with OpenAI', {
      model: this.model,
      characters: text.length,
    });

    try {
      const response = await axios.post(
        this.apiUrl,
        {
          model: this.model,
          messages,
          temperature: 0,
          response_format: { type: 'json_object' },
        },
        {
          headers: {
            'Content-Type': 'application/json',
            Authorization: `Bearer ${this.options.apiKey}`,
          },
          timeout: this.options.timeoutMs ?? 60000,
        }
      );

      const phrases = this.parseResponse(response.data);
      logger.info('Sensitive content detected', { phrases: phrases.length });
      return phrases;
    } catch (error) {
      throw toProviderError(error, 'detect sensitive content');
    }
  }

  /** Parse a chat completion body into a deduplicated phrase list. */
  parseResponse(body: unknown): string[] {
    const completion = ChatCompletionSchema.safeParse(body);
    if (!completion.success) {
      throw new ProviderError('Unexpected chat completion response', this.provider);
    }

    const content = completion.data.choices[0].message.content?.trim();
    if (!content) {
      throw new ProviderError('No content generated from OpenAI', this.provider);
    }

    let json: unknown;
    try {
      json = JSON.parse(content);
    } catch (error) {
      throw new ProviderError(
        `Detector returned invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
        this.provider
      );
    }

    const result = DetectionResponseSchema.safeParse(json);
    if (!result.success) {
      const issues = result.error.issues
        .map((i) => `${i.path.join('.')}: ${i.message}`)
        .join('; ');
      throw new ProviderError(`Detector response validation failed: ${issues}`, this.provider);
    }

    return [...new Set(result.data.phrases.map((p) => p.trim()).filter(Boolean))];
  }

  private buildSystemPrompt(): string {
    return [
      'You review call and meeting transcripts for sensitive spoken content.',
      `Flag every span that contains: ${this.categories.join('; ')}.`,
      'Quote each span exactly as it appears in the transcript, word for word.',
      'List a span once even if it is repeated.',
      'Respond with JSON only: {"phrases": ["..."]}. Use an empty array when nothing is sensitive.',
    ].join('\n');
  }
}
