import { describe, it, expect } from '@jest/globals';
import { parseGrowth, parseRecurrence, RecurrenceSyntaxError } from '../src/analysis/recurrence-parser';
import { GOLDEN_RATIO, growth, renderGrowth } from '../src/analysis/growth';

describe('recurrence parser', () => {
  describe('parseGrowth', () => {
    it('should read polynomial and logarithmic terms', () => {
      expect(parseGrowth('n log n')).toEqual(growth(1, 1));
      expect(parseGrowth('n^2')).toEqual(growth(2));
      expect(parseGrowth('(log n)^2')).toEqual(growth(0, 2));
      expect(parseGrowth('log^3 n')).toEqual(growth(0, 3));
      expect(parseGrowth('lg n')).toEqual(growth(0, 1));
    });

    it('should read constants and coefficients', () => {
      expect(parseGrowth('5')).toEqual(growth());
      expect(parseGrowth('c')).toEqual(growth());
      expect(parseGrowth('3n')).toEqual(growth(1));
    });

    it('should read exponential and factorial terms', () => {
      expect(parseGrowth('2^n')).toEqual(growth(0, 0, 2));
      expect(parseGrowth('φ^n').expBase).toBeCloseTo(GOLDEN_RATIO);
      expect(parseGrowth('n!')).toEqual(growth(0, 0, 1, true));
    });

    it('should strip a bound symbol', () => {
      expect(renderGrowth(parseGrowth('Θ(n^2)'))).toBe('n^2');
      expect(renderGrowth(parseGrowth('O(1)'))).toBe('1');
    });

    it('should reject unknown terms', () => {
      expect(() => parseGrowth('xyz')).toThrow('Cannot read the growth term "xyz"');
    });
  });

  describe('parseRecurrence', () => {
    it('should parse a divide-and-conquer recurrence', () => {
      const relation = parseRecurrence('T(n) = 2T(n/2) + n');

      expect(relation.terms).toEqual([
        { coefficient: 2, transform: { kind: 'divide', divisor: 2, text: 'n/2', assumed: false } },
      ]);
      expect(relation.localCost).toEqual(growth(1));
      expect(relation.equation).toBe('T(n) = 2T(n/2) + n');
      expect(relation.baseCase).toBe('T(1) = 1');
      expect(relation.explanation).toBe('Recurrence read from "T(n) = 2T(n/2) + n".');
    });

    it('should parse several subtractive terms', () => {
      const relation = parseRecurrence('T(n) = T(n-1) + T(n-2) + 1');
      expect(relation.terms.map(term => term.transform.text)).toEqual(['n-1', 'n-2']);
      expect(relation.equation).toBe('T(n) = T(n-1) + T(n-2) + 1');
    });

    it('should merge repeated terms and accept explicit multiplication', () => {
      expect(parseRecurrence('T(n) = T(n/2) + T(n/2) + n log n').equation).toBe('T(n) = 2T(n/2) + n log n');
      expect(parseRecurrence('T(n) = 3 * T(n/4) + n^2').equation).toBe('T(n) = 3T(n/4) + n^2');
    });

    it('should default the local cost to constant', () => {
      expect(parseRecurrence('T(n) = T(n-1)').equation).toBe('T(n) = T(n-1) + 1');
    });

    it('should reject malformed equations', () => {
      expect(() => parseRecurrence('S(n) = S(n-1) + 1')).toThrow(RecurrenceSyntaxError);
      expect(() => parseRecurrence('T(n) = n^2')).toThrow('"T(n) = n^2" has no recursive T(...) term');
      expect(() => parseRecurrence('T(n) = T(n/1) + 1')).toThrow('Term "T(n/1)" does not shrink the input');
      expect(() => parseRecurrence('T(n) = T(n-0) + 1')).toThrow('Term "T(n-0)" does not shrink the input');
    });

    it('should keep the rejected input on the error', () => {
      try {
        parseRecurrence('T(n) + 1');
        throw new Error('expected a RecurrenceSyntaxError');
      } catch (error) {
        expect(error).toBeInstanceOf(RecurrenceSyntaxError);
        if (error instanceof RecurrenceSyntaxError) {
          expect(error.input).toBe('T(n) + 1');
        }
      }
    });
  });
});
