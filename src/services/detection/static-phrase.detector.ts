import type { SensitiveContentDetector } from './detector.interface';

/** Returns a caller-supplied word list, e.g. names a user asked to remove. */
export class StaticPhraseDetector implements SensitiveContentDetector {
  readonly provider = 'static';
  private readonly phrases: string[];

  constructor(phrases: ReadonlyArray<string>) {
    this.phrases = [...new Set(phrases.map((p) => p.trim()).filter(Boolean))];
  }

  async detect(): Promise<string[]> {
    return [...this.phrases];
  }
}
