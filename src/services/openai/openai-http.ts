import axios from 'axios';
import { logger } from '../../config/logger';
import { ProviderError, errorMessage } from '../../errors/redaction.errors';

export const OPENAI_API_BASE = 'https://api.openai.com/v1';
export const OPENAI_PROVIDER = 'openai';

/**
 * Map an axios failure to a ProviderError with a readable message.
 */
export function toProviderError(error: unknown, action: string): ProviderError {
  if (error instanceof ProviderError) return error;

  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    logger.error(`OpenAI ${action} failed:`, {
      message: error.message,
      status,
      response: error.response?.data,
    });

    if (status === 401) {
      return new ProviderError('Invalid OpenAI API key', OPENAI_PROVIDER, status);
    }
    if (status === 429) {
      return new ProviderError('OpenAI rate limit exceeded. Please try again later.', OPENAI_PROVIDER, status);
    }
    if (status !== undefined && status >= 500) {
      return new ProviderError('OpenAI service error. Please try again later.', OPENAI_PROVIDER, status);
    }
    return new ProviderError(`Failed to ${action}: ${error.message}`, OPENAI_PROVIDER, status);
  }

  logger.error(`OpenAI ${action} failed:`, { message: errorMessage(error) });
  return new ProviderError(`Failed to ${action}: ${errorMessage(error)}`, OPENAI_PROVIDER);
}
