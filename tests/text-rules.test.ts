import { describe, it, expect } from 'vitest';
import { applyWindow, extractFirstNumber, extractRating, parseDecimal } from '../src/profiles/text-rules.js';

describe('text-rules', () => {
  describe('applyWindow', () => {
    it('keeps the text after the start marker', () => {
      expect(applyWindow('Number: 1234', 'Number:')).toBe(' 1234');
    });

    it('stops at the end marker', () => {
      expect(applyWindow('Rating: 8 Confidence: 4', 'Rating:', 'Confidence:')).toBe(' 8 ');
    });

    it('keeps the rest when the end marker is missing', () => {
      expect(applyWindow('Rating: 8', 'Rating:', 'Confidence:')).toBe(' 8');
    });

    it('returns null when the start marker is missing', () => {
      expect(applyWindow('Summary: fine', 'Rating:')).toBeNull();
    });

    it('returns the whole text without markers', () => {
      expect(applyWindow('  7  ')).toBe('  7  ');
    });
  });

  describe('parseDecimal', () => {
    it('parses trimmed decimals', () => {
      expect(parseDecimal(' 8 ')).toBe(8);
      expect(parseDecimal('6.5')).toBe(6.5);
      expect(parseDecimal('-1')).toBe(-1);
    });

    it('returns null for empty or non-numeric text', () => {
      expect(parseDecimal('')).toBeNull();
      expect(parseDecimal('   ')).toBeNull();
      expect(parseDecimal('8: accept')).toBeNull();
      expect(parseDecimal('N/A')).toBeNull();
    });
  });

  describe('extractFirstNumber', () => {
    it('finds the first number in free text', () => {
      expect(extractFirstNumber(' 8: accept, good paper (score 10)')).toBe(8);
      expect(extractFirstNumber('about 3.5 stars')).toBe(3.5);
    });

    it('returns null without digits', () => {
      expect(extractFirstNumber('no score yet')).toBeNull();
    });
  });

  describe('extractRating', () => {
    it('is undefined when the slot does not carry the field', () => {
      expect(extractRating('Comment: thanks', { startText: 'Rating:', extractMethod: 'firstNumber' })).toBeUndefined();
    });

    it('is null when the marker has no number', () => {
      expect(extractRating('Rating: pending', { startText: 'Rating:', extractMethod: 'firstNumber' })).toBeNull();
    });

    it('applies the configured method', () => {
      const text = 'Rating: 6: marginally above\nConfidence: 4';
      expect(extractRating(text, { startText: 'Rating:', endText: 'Confidence:', extractMethod: 'firstNumber' })).toBe(6);
      expect(extractRating(text, { startText: 'Confidence:', extractMethod: 'decimal' })).toBe(4);
      expect(extractRating(text, { startText: 'Rating:', extractMethod: 'decimal' })).toBeNull();
    });
  });
});
