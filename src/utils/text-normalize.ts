/**
 * Text normalization for phrase matching.
 *
 * Transcripts and detector phrases disagree on casing and punctuation
 * ("Shiprocket," vs "shiprocket"), so both sides are reduced to lowercase
 * letters, digits and single spaces before comparison.
 */

const DIGIT_WORDS = ['zero', 'one', 'two', 'three', 'four', 'five', 'six', 'seven', 'eight', 'nine'];

/** Lowercase, drop punctuation, collapse whitespace. */
export function normalizeText(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, '')
    .replace(/\s+/g, ' ')
    .trim();
}

export function tokenize(normalized: string): string[] {
  return normalized ? normalized.split(' ') : [];
}

/**
 * Spoken form of normalized text: every digit spelled out as its own word,
 * so "5 5 5" and "555" both read "five five five".
 */
export function toSpokenForm(normalized: string): string {
  return normalized
    .replace(/\d/g, (digit) => ` ${DIGIT_WORDS[Number(digit)]} `)
    .replace(/\s+/g, ' ')
    .trim();
}
