import { isDisjointSorted, mergeRanges, totalCoverage } from '../services/redaction/range-merger.service';

const candidate = (start: number, end: number, matchedPhrase = 'p') => ({ start, end, matchedPhrase });

describe('RangeMerger', () => {
  const options = { padSeconds: 0.15, minGapSeconds: 0.05, totalDuration: 10 };

  it('should pad a single range on both sides', () => {
    const [range] = mergeRanges([candidate(2.0, 2.5, 'secret')], options);

    expect(range.start).toBeCloseTo(1.85, 10);
    expect(range.end).toBeCloseTo(2.65, 10);
    expect(range.sources).toEqual(['secret']);
  });

  it('should clamp padded ranges to the audio bounds', () => {
    const ranges = mergeRanges([candidate(0.05, 0.4), candidate(9.9, 10.0)], options);

    expect(ranges).toHaveLength(2);
    expect(ranges[0].start).toBe(0);
    expect(ranges[1].end).toBe(10);
  });

  it('should merge ranges whose padding overlaps', () => {
    const ranges = mergeRanges([candidate(1.0, 1.2, 'a'), candidate(1.4, 1.6, 'b')], options);

    expect(ranges).toHaveLength(1);
    expect(ranges[0].start).toBeCloseTo(0.85, 10);
    expect(ranges[0].end).toBeCloseTo(1.75, 10);
    expect(ranges[0].sources).toEqual(['a', 'b']);
  });

  it('should merge ranges separated by less than the minimum gap', () => {
    const ranges = mergeRanges([candidate(1.0, 1.2), candidate(1.24, 1.5)], {
      padSeconds: 0,
      minGapSeconds: 0.05,
      totalDuration: 10,
    });

    expect(ranges).toEqual([{ start: 1.0, end: 1.5, sources: ['p'] }]);
  });

  it('should keep ranges apart when the gap is large enough', () => {
    const ranges = mergeRanges([candidate(1.0, 1.2), candidate(2.0, 2.2)], options);
    expect(ranges).toHaveLength(2);
  });

  it('should absorb a range contained in another', () => {
    const ranges = mergeRanges(
      [candidate(1.0, 3.0, 'long'), candidate(1.5, 1.8, 'short')],
      { padSeconds: 0, minGapSeconds: 0, totalDuration: 10 }
    );

    expect(ranges).toEqual([{ start: 1.0, end: 3.0, sources: ['long', 'short'] }]);
  });

  it('should drop ranges that are empty after clamping', () => {
    const ranges = mergeRanges([candidate(4.0, 4.0)], { padSeconds: 0, minGapSeconds: 0, totalDuration: 10 });
    expect(ranges).toEqual([]);
  });

  it('should return nothing for no candidates', () => {
    expect(mergeRanges([], options)).toEqual([]);
  });

  it('should produce sorted disjoint output for shuffled and duplicated input', () => {
    // deterministic pseudo-random candidates
    let seed = 42;
    const next = () => {
      seed = (seed * 16807) % 2147483647;
      return seed / 2147483647;
    };

    const base = Array.from({ length: 40 }, (_, i) => {
      const start = next() * 9.5;
      return candidate(start, start + next() * 0.5, `phrase-${i % 5}`);
    });

    const shuffled = [...base, ...base.slice(0, 15)];
    for (let i = shuffled.length - 1; i > 0; i--) {
      const j = Math.floor(next() * (i + 1));
      [shuffled[i], shuffled[j]] = [shuffled[j], shuffled[i]];
    }

    const fromBase = mergeRanges(base, options);
    const fromShuffled = mergeRanges(shuffled, options);

    expect(isDisjointSorted(fromShuffled)).toBe(true);
    expect(fromShuffled.map((r) => [r.start, r.end])).toEqual(fromBase.map((r) => [r.start, r.end]));
    for (let i = 1; i < fromShuffled.length; i++) {
      expect(fromShuffled[i].start - fromShuffled[i - 1].end).toBeGreaterThan(0);
    }
    for (const range of fromShuffled) {
      expect(range.start).toBeGreaterThanOrEqual(0);
      expect(range.end).toBeLessThanOrEqual(options.totalDuration);
    }
  });

  describe('isDisjointSorted', () => {
    it('should accept touching ranges and reject overlaps', () => {
      expect(isDisjointSorted([{ start: 0, end: 1 }, { start: 1, end: 2 }])).toBe(true);
      expect(isDisjointSorted([{ start: 0, end: 1.5 }, { start: 1, end: 2 }])).toBe(false);
    });
  });

  describe('totalCoverage', () => {
    it('should sum range lengths', () => {
      expect(totalCoverage([{ start: 0, end: 1 }, { start: 2, end: 2.5 }])).toBe(1.5);
    });
  });
});
