import { ratio } from 'fuzzball';
import { logger } from '../../config/logger';
import { EmptyPhraseError } from '../../errors/redaction.errors';
import type { CandidateRange, MatchOutcome, MatcherOptions } from '../../types/redaction.types';
import { normalizeText, tokenize, toSpokenForm } from '../../utils/text-normalize';
import type { WordTimeline } from './word-timeline';

export const DEFAULT_MATCHER_OPTIONS: MatcherOptions = {
  fuzzyThreshold: 0.8,
  windowSlack: 2,
  minFuzzyLength: 4,
};

interface NormalizedPhrase {
  text: string;
  spoken: string;
  tokenCount: number;
}

export interface WindowMatch {
  first: number;
  /** Exclusive */
  last: number;
  kind: 'EXACT' | 'FUZZY';
  score: number;
}

/** Levenshtein similarity in 0–1 over already-normalized strings. */
export function similarity(a: string, b: string): number {
  if (!a || !b) return 0;
  return ratio(a, b, { full_process: false }) / 100;
}

/** True when `needle` occurs in `haystack` starting on a word boundary. */
function containsAtWordStart(haystack: string, needle: string): boolean {
  let from = 0;
  for (;;) {
    const idx = haystack.indexOf(needle, from);
    if (idx === -1) return false;
    if (idx === 0 || haystack[idx - 1] === ' ') return true;
    from = idx + 1;
  }
}

/**
 * Compare a normalized window against a normalized phrase.
 * FUZZY covers plural/possessive tails ("secrets" for "secret") and
 * transcription variants whose spoken form is close ("5 5 5" for "five five five").
 * Short phrases ("an", "al") match exactly or not at all.
 */
export function classifyWindow(
  windowText: string,
  phrase: NormalizedPhrase,
  fuzzyThreshold: number,
  minFuzzyLength = DEFAULT_MATCHER_OPTIONS.minFuzzyLength
): MatchOutcome {
  if (!windowText) return { kind: 'NONE' };
  if (windowText === phrase.text) return { kind: 'EXACT', score: 1 };
  if (phrase.spoken.length < minFuzzyLength) return { kind: 'NONE' };

  const score = similarity(toSpokenForm(windowText), phrase.spoken);
  if (containsAtWordStart(windowText, phrase.text)) {
    return { kind: 'FUZZY', score: Math.max(score, fuzzyThreshold) };
  }
  if (score >= fuzzyThreshold) {
    return { kind: 'FUZZY', score };
  }
  return { kind: 'NONE' };
}

/**
 * Preference order between overlapping windows. Negative when `a` wins.
 * Score ranks before width, so a partial window that clears the threshold
 * ("alexandr hamilton" for "alexander hamilton smith") never displaces the
 * window covering the whole occurrence.
 */
export function compareMatches(a: WindowMatch, b: WindowMatch): number {
  if (a.kind !== b.kind) return a.kind === 'EXACT' ? -1 : 1;
  if (a.score !== b.score) return b.score - a.score;
  const widthA = a.last - a.first;
  const widthB = b.last - b.first;
  if (widthA !== widthB) return widthA - widthB;
  return a.first - b.first;
}

function overlaps(a: WindowMatch, b: WindowMatch): boolean {
  return a.first < b.last && b.first < a.last;
}

export class PhraseMatcher {
  private readonly options: MatcherOptions;

  constructor(private readonly timeline: WordTimeline, options: Partial<MatcherOptions> = {}) {
    this.options = { ...DEFAULT_MATCHER_OPTIONS, ...options };
  }

  /**
   * Every occurrence of `phrase` in the timeline, ordered by time.
   * @throws EmptyPhraseError when the phrase has no letters or digits
   */
  match(phrase: string): CandidateRange[] {
    const text = normalizeText(phrase);
    if (!text) {
      throw new EmptyPhraseError(phrase);
    }

    const normalized: NormalizedPhrase = {
      text,
      spoken: toSpokenForm(text),
      tokenCount: tokenize(text).length,
    };

    const accepted = this.resolveOverlaps(this.scanWindows(normalized));

    const candidates = accepted.map((m): CandidateRange => ({
      start: this.timeline.at(m.first).start,
      end: this.timeline.at(m.last - 1).end,
      matchedPhrase: phrase,
      confidence: m.kind,
      firstWord: m.first,
      lastWord: m.last - 1,
      score: m.score,
    }));

    for (const c of candidates) {
      logger.debug('Phrase matched', {
        phrase,
        confidence: c.confidence,
        score: Number(c.score.toFixed(3)),
        start: c.start,
        end: c.end,
      });
    }

    return candidates;
  }

  private scanWindows(phrase: NormalizedPhrase): WindowMatch[] {
    const total = this.timeline.length;
    const maxWidth = Math.min(total, phrase.tokenCount + this.options.windowSlack);
    const matches: WindowMatch[] = [];

    for (let width = 1; width <= maxWidth; width++) {
      for (let first = 0; first + width <= total; first++) {
        const last = first + width;
        const outcome = classifyWindow(
          this.timeline.normalizedText(first, last),
          phrase,
          this.options.fuzzyThreshold,
          this.options.minFuzzyLength
        );
        if (outcome.kind !== 'NONE') {
          matches.push({ first, last, kind: outcome.kind, score: outcome.score });
        }
      }
    }

    return matches;
  }

  /** Greedy pick by preference; accepted windows never share a word. */
  private resolveOverlaps(matches: WindowMatch[]): WindowMatch[] {
    const accepted: WindowMatch[] = [];
    for (const candidate of [...matches].sort(compareMatches)) {
      if (!accepted.some((a) => overlaps(a, candidate))) {
        accepted.push(candidate);
      }
    }
    return accepted.sort((a, b) => a.first - b.first);
  }
}
