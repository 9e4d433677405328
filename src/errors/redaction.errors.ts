export type RedactionErrorCode =
  | 'INVALID_TIMELINE'
  | 'EMPTY_PHRASE'
  | 'AUDIO_READ'
  | 'PROVIDER'
  | 'CONFIG';

/**
 * Base class for every error raised by the redaction stack.
 * `fatal` errors abort the job; the audio must not be released.
 */
export class RedactionError extends Error {
  public readonly code: RedactionErrorCode;
  public readonly fatal: boolean;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: RedactionErrorCode,
    fatal: boolean,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.fatal = fatal;
    this.details = details;
  }
}

/** Malformed transcript input: a word with bad timestamps or an unsortable sequence. */
export class InvalidTimelineError extends RedactionError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'INVALID_TIMELINE', true, details);
  }
}

/** A phrase that is empty once normalized. Recovered per phrase. */
export class EmptyPhraseError extends RedactionError {
  constructor(public readonly phrase: string) {
    super(`Phrase "${phrase}" is empty after normalization`, 'EMPTY_PHRASE', false, { phrase });
  }
}

/** Audio that cannot be read, or is shorter than the ranges it must cover. */
export class AudioReadError extends RedactionError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'AUDIO_READ', true, details);
  }
}

/** A hosted transcriber or detector failed. */
export class ProviderError extends RedactionError {
  constructor(
    message: string,
    public readonly provider: string,
    public readonly status?: number
  ) {
    super(message, 'PROVIDER', true, { provider, status });
  }
}

export class ConfigError extends RedactionError {
  constructor(message: string) {
    super(message, 'CONFIG', true);
  }
}

export function isFatalRedactionError(error: unknown): error is RedactionError {
  return error instanceof RedactionError && error.fatal;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
