import { InvalidTimelineError } from '../../errors/redaction.errors';
import type { TimelineOptions, TranscribedWord, Word } from '../../types/redaction.types';
import { normalizeText } from '../../utils/text-normalize';

export const DEFAULT_TIMELINE_OPTIONS: TimelineOptions = {
  orderToleranceSeconds: 0.25,
};

function toWord(input: TranscribedWord | Word, index: number): Word {
  const text = 'word' in input ? input.word : input.text;
  const { start, end } = input;

  if (!Number.isFinite(start) || !Number.isFinite(end)) {
    throw new InvalidTimelineError(`Word ${index} ("${text}") has a non-finite timestamp`, {
      index,
      start,
      end,
    });
  }
  if (start < 0) {
    throw new InvalidTimelineError(`Word ${index} ("${text}") starts before 0s`, { index, start });
  }
  if (start > end) {
    throw new InvalidTimelineError(
      `Word ${index} ("${text}") starts after it ends (${start}s > ${end}s)`,
      { index, start, end }
    );
  }

  return { text, start, end };
}

/**
 * Ordered, immutable word timeline for one transcription job.
 *
 * Transcribers occasionally emit a word a few milliseconds before its
 * predecessor; those are re-sorted (stable, by start). A word displaced by
 * more than `orderToleranceSeconds` means the transcript is corrupt.
 */
export class WordTimeline {
  private readonly items: ReadonlyArray<Word>;
  private readonly normalized: ReadonlyArray<string>;

  private constructor(words: Word[]) {
    this.items = Object.freeze(words.map((w) => Object.freeze({ ...w })));
    this.normalized = Object.freeze(words.map((w) => normalizeText(w.text)));
  }

  static fromTranscript(
    input: ReadonlyArray<TranscribedWord | Word>,
    options: TimelineOptions = DEFAULT_TIMELINE_OPTIONS
  ): WordTimeline {
    const words = input.map(toWord);

    let sorted = true;
    for (let i = 1; i < words.length; i++) {
      const displacement = words[i - 1].start - words[i].start;
      if (displacement <= 0) continue;

      sorted = false;
      if (displacement > options.orderToleranceSeconds) {
        throw new InvalidTimelineError(
          `Word ${i} ("${words[i].text}") starts ${displacement.toFixed(3)}s before its predecessor`,
          { index: i, displacement, tolerance: options.orderToleranceSeconds }
        );
      }
    }

    // Array.prototype.sort is stable, so equal starts keep transcript order
    return new WordTimeline(sorted ? words : [...words].sort((a, b) => a.start - b.start));
  }

  get length(): number {
    return this.items.length;
  }

  get words(): ReadonlyArray<Word> {
    return this.items;
  }

  /** End of the last word; 0 for an empty timeline. */
  get duration(): number {
    return this.items.reduce((max, w) => Math.max(max, w.end), 0);
  }

  /** Raw transcript text, as handed to a detector. */
  get text(): string {
    return this.items.map((w) => w.text.trim()).filter(Boolean).join(' ');
  }

  at(index: number): Word {
    const word = this.items[index];
    if (!word) {
      throw new RangeError(`Word index ${index} out of bounds (0..${this.items.length - 1})`);
    }
    return word;
  }

  /** Normalized concatenation of words [from, to). Words that normalize to nothing are skipped. */
  normalizedText(from: number, to: number): string {
    if (from < 0 || to > this.items.length || from > to) {
      throw new RangeError(`Invalid word span [${from}, ${to}) for ${this.items.length} words`);
    }
    return this.normalized.slice(from, to).filter(Boolean).join(' ');
  }

  /** Words whose [start, end] intersects [start, end]. */
  wordsIntersecting(start: number, end: number): Word[] {
    if (start > end) return [];
    return this.items.filter((w) => w.start <= end && w.end >= start);
  }
}
