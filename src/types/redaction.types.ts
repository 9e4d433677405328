/**
 * Shared shapes for the redaction engine: transcript words in, candidate and
 * merged ranges in the middle, redacted PCM plus an audit report out.
 */

/** Word as delivered by a transcriber (seconds). */
export interface TranscribedWord {
  word: string;
  start: number;
  end: number;
}

export interface Word {
  text: string;
  start: number;
  end: number;
}

export type MatchType = 'EXACT' | 'FUZZY';

/** Outcome of comparing one window against one phrase. */
export type MatchOutcome =
  | { kind: 'EXACT'; score: 1 }
  | { kind: 'FUZZY'; score: number }
  | { kind: 'NONE' };

export interface CandidateRange {
  start: number;
  end: number;
  matchedPhrase: string;
  confidence: MatchType;
  /** Index of the first matched word */
  firstWord: number;
  /** Index of the last matched word (inclusive) */
  lastWord: number;
  /** Similarity 0–1 (1 for exact matches) */
  score: number;
}

export interface TimeRange {
  start: number;
  end: number;
}

export interface RedactionRange extends TimeRange {
  /** Phrases whose candidates were merged into this range */
  sources: string[];
}

export interface PhraseRange extends TimeRange {
  matchType: MatchType;
}

export interface PhraseReportEntry {
  phrase: string;
  matched: boolean;
  ranges: PhraseRange[];
  /** FUZZY when any occurrence was fuzzy; null when unmatched */
  matchType: MatchType | null;
  /** Set when the phrase was not matched at all */
  skipped?: 'empty';
}

export interface RedactionReport {
  phrases: PhraseReportEntry[];
  appliedRanges: RedactionRange[];
  matchedCount: number;
  unmatchedCount: number;
  /** Total seconds of audio replaced by the masking tone */
  redactedSeconds: number;
}

/** De-interleaved float PCM, one array per channel, samples in [-1, 1]. */
export interface PcmAudio {
  sampleRate: number;
  channels: Float32Array[];
}

export interface MaskingToneOptions {
  frequencyHz: number;
  amplitude: number;
  /** Linear fade in/out length in seconds */
  fadeSeconds: number;
}

export interface MatcherOptions {
  /** Minimum similarity (0–1) for a fuzzy match */
  fuzzyThreshold: number;
  /** Extra words allowed beyond the phrase's own token count */
  windowSlack: number;
  /** Phrases whose spoken form is shorter than this only match exactly */
  minFuzzyLength: number;
}

export interface MergeOptions {
  padSeconds: number;
  minGapSeconds: number;
  totalDuration: number;
}

export interface TimelineOptions {
  /** How far (seconds) a word may start before its predecessor and still be re-sorted */
  orderToleranceSeconds: number;
}

export interface EngineOptions {
  matcher: MatcherOptions;
  padSeconds: number;
  minGapSeconds: number;
  timeline: TimelineOptions;
  tone: MaskingToneOptions;
}

export interface RedactionInput {
  words: ReadonlyArray<TranscribedWord | Word>;
  phrases: ReadonlyArray<string>;
  audio: PcmAudio;
}

export interface RedactionResult {
  redactedAudio: PcmAudio;
  sampleRate: number;
  report: RedactionReport;
}
