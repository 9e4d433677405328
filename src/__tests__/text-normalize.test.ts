import { normalizeText, tokenize, toSpokenForm } from '../utils/text-normalize';

describe('text-normalize', () => {
  describe('normalizeText', () => {
    it('should lowercase, strip punctuation and collapse whitespace', () => {
      expect(normalizeText('  Call  SHIPROCKET, now!! ')).toBe('call shiprocket now');
    });

    it('should drop apostrophes inside words', () => {
      expect(normalizeText("John's")).toBe('johns');
    });

    it('should keep digits and non-latin letters', () => {
      expect(normalizeText('Müller: 555-1234')).toBe('müller 5551234');
    });

    it('should return an empty string for punctuation only', () => {
      expect(normalizeText(' ... ?! ')).toBe('');
    });
  });

  describe('tokenize', () => {
    it('should split normalized text on spaces', () => {
      expect(tokenize('my phone number')).toEqual(['my', 'phone', 'number']);
    });

    it('should return no tokens for empty text', () => {
      expect(tokenize('')).toEqual([]);
    });
  });

  describe('toSpokenForm', () => {
    it('should spell out each digit as a word', () => {
      expect(toSpokenForm('5 5 5')).toBe('five five five');
      expect(toSpokenForm('555')).toBe('five five five');
    });

    it('should leave words untouched', () => {
      expect(toSpokenForm('call 911 now')).toBe('call nine one one now');
    });
  });
});
