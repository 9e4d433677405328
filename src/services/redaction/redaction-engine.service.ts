import { logger } from '../../config/logger';
import { AudioReadError, EmptyPhraseError } from '../../errors/redaction.errors';
import type {
  CandidateRange,
  EngineOptions,
  PhraseReportEntry,
  RedactionInput,
  RedactionReport,
  RedactionResult,
} from '../../types/redaction.types';
import { assertPcmShape, pcmDuration, redactPcm } from './audio-redactor.service';
import { DEFAULT_TONE } from './masking-tone';
import { DEFAULT_MATCHER_OPTIONS, PhraseMatcher } from './phrase-matcher.service';
import { DEFAULT_MIN_GAP_SECONDS, DEFAULT_PAD_SECONDS, mergeRanges, totalCoverage } from './range-merger.service';
import { DEFAULT_TIMELINE_OPTIONS, WordTimeline } from './word-timeline';

export const DEFAULT_ENGINE_OPTIONS: EngineOptions = {
  matcher: DEFAULT_MATCHER_OPTIONS,
  padSeconds: DEFAULT_PAD_SECONDS,
  minGapSeconds: DEFAULT_MIN_GAP_SECONDS,
  timeline: DEFAULT_TIMELINE_OPTIONS,
  tone: DEFAULT_TONE,
};

function reportEntry(phrase: string, candidates: CandidateRange[]): PhraseReportEntry {
  if (candidates.length === 0) {
    return { phrase, matched: false, ranges: [], matchType: null };
  }
  return {
    phrase,
    matched: true,
    ranges: candidates.map((c) => ({ start: c.start, end: c.end, matchType: c.confidence })),
    matchType: candidates.some((c) => c.confidence === 'FUZZY') ? 'FUZZY' : 'EXACT',
  };
}

/**
 * Runs one redaction job: timeline → matcher → merger → redactor.
 * Synchronous and free of shared state; each call owns everything it creates.
 */
export class RedactionEngine {
  private readonly options: EngineOptions;

  constructor(options: Partial<EngineOptions> = {}) {
    this.options = { ...DEFAULT_ENGINE_OPTIONS, ...options };
  }

  get timelineOptions(): EngineOptions['timeline'] {
    return this.options.timeline;
  }

  redact(input: RedactionInput): RedactionResult {
    const { audio } = input;
    assertPcmShape(audio);
    const timeline = WordTimeline.fromTranscript(input.words, this.options.timeline);
    const matcher = new PhraseMatcher(timeline, this.options.matcher);

    const entries: PhraseReportEntry[] = [];
    const candidates: CandidateRange[] = [];

    for (const phrase of input.phrases) {
      try {
        const found = matcher.match(phrase);
        candidates.push(...found);
        entries.push(reportEntry(phrase, found));
      } catch (error) {
        if (!(error instanceof EmptyPhraseError)) throw error;
        logger.warn('Skipping empty phrase', { phrase });
        entries.push({ phrase, matched: false, ranges: [], matchType: null, skipped: 'empty' });
      }
    }

    const duration = pcmDuration(audio);
    const requiredDuration = candidates.reduce((max, c) => Math.max(max, c.end), 0);
    if (requiredDuration > duration) {
      throw new AudioReadError(
        `Transcript reaches ${requiredDuration.toFixed(3)}s but audio is only ${duration.toFixed(3)}s`,
        { duration, requiredDuration }
      );
    }

    const appliedRanges = mergeRanges(candidates, {
      padSeconds: this.options.padSeconds,
      minGapSeconds: this.options.minGapSeconds,
      totalDuration: duration,
    });

    const redactedAudio = redactPcm(audio, appliedRanges, this.options.tone);

    const matchedCount = entries.filter((e) => e.matched).length;
    const report: RedactionReport = {
      phrases: entries,
      appliedRanges,
      matchedCount,
      unmatchedCount: entries.length - matchedCount,
      redactedSeconds: totalCoverage(appliedRanges),
    };

    for (const entry of entries) {
      if (!entry.matched && !entry.skipped) {
        logger.warn('Sensitive phrase not found in transcript', { phrase: entry.phrase });
      } else if (entry.matchType === 'FUZZY') {
        logger.info('Sensitive phrase matched fuzzily', {
          phrase: entry.phrase,
          occurrences: entry.ranges.length,
        });
      }
    }

    logger.info('Redaction complete', {
      words: timeline.length,
      phrases: entries.length,
      matched: matchedCount,
      ranges: appliedRanges.length,
      redactedSeconds: Number(report.redactedSeconds.toFixed(3)),
      duration: Number(duration.toFixed(3)),
    });

    return { redactedAudio, sampleRate: redactedAudio.sampleRate, report };
  }
}
