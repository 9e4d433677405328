import type { TranscribedWord } from '../../types/redaction.types';

/**
 * Speech-to-text boundary. Implementations return every word with its
 * start/end in seconds; the engine never sees the model behind it.
 */
export interface Transcriber {
  /** Provider identifier, used in logs and errors */
  readonly provider: string;

  transcribe(audioPath: string): Promise<TranscribedWord[]>;
}
