import type { CandidateRange, MergeOptions, RedactionRange, TimeRange } from '../../types/redaction.types';

export const DEFAULT_PAD_SECONDS = 0.15;
export const DEFAULT_MIN_GAP_SECONDS = 0.05;

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/**
 * Pad every candidate, then fold the sorted list into disjoint ranges.
 * Ranges closer than `minGapSeconds` are joined so the listener hears one
 * continuous tone instead of a stutter of short beeps.
 */
export function mergeRanges(
  candidates: ReadonlyArray<Pick<CandidateRange, 'start' | 'end' | 'matchedPhrase'>>,
  options: MergeOptions
): RedactionRange[] {
  const { padSeconds, minGapSeconds, totalDuration } = options;

  const padded = candidates
    .map((c) => ({
      start: clamp(c.start - padSeconds, 0, totalDuration),
      end: clamp(c.end + padSeconds, 0, totalDuration),
      sources: [c.matchedPhrase],
    }))
    .filter((r) => r.end > r.start)
    .sort((a, b) => a.start - b.start || a.end - b.end);

  const merged: RedactionRange[] = [];
  for (const range of padded) {
    const current = merged[merged.length - 1];
    if (current && range.start <= current.end + minGapSeconds) {
      current.end = Math.max(current.end, range.end);
      for (const source of range.sources) {
        if (!current.sources.includes(source)) current.sources.push(source);
      }
    } else {
      merged.push({ ...range, sources: [...range.sources] });
    }
  }

  return merged;
}

/** Sum of range lengths in seconds. */
export function totalCoverage(ranges: ReadonlyArray<TimeRange>): number {
  return ranges.reduce((sum, r) => sum + (r.end - r.start), 0);
}

/** Sorted and pairwise non-overlapping. */
export function isDisjointSorted(ranges: ReadonlyArray<TimeRange>): boolean {
  for (let i = 1; i < ranges.length; i++) {
    if (ranges[i - 1].end > ranges[i].start) return false;
  }
  return ranges.every((r) => r.start <= r.end);
}
