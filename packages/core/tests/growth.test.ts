import { describe, it, expect } from '@jest/globals';
import {
  branchCases,
  compareGrowth,
  CONSTANT,
  EXPONENTIAL,
  FACTORIAL,
  formatNumber,
  GOLDEN_RATIO,
  growth,
  isPolylog,
  isUniform,
  LINEAR,
  LINEARITHMIC,
  LOGARITHMIC,
  maxGrowth,
  minGrowth,
  multiplyGrowth,
  notation,
  QUADRATIC,
  renderGrowth,
  scaleCases,
  sequenceCases,
  uniformCases,
} from '../src/analysis/growth';

describe('growth', () => {
  describe('renderGrowth', () => {
    it('should render the common classes', () => {
      expect(renderGrowth(CONSTANT)).toBe('1');
      expect(renderGrowth(LOGARITHMIC)).toBe('log n');
      expect(renderGrowth(LINEAR)).toBe('n');
      expect(renderGrowth(LINEARITHMIC)).toBe('n log n');
      expect(renderGrowth(QUADRATIC)).toBe('n^2');
      expect(renderGrowth(EXPONENTIAL)).toBe('2^n');
      expect(renderGrowth(FACTORIAL)).toBe('n!');
    });

    it('should render powers of logarithms and fractional degrees', () => {
      expect(renderGrowth(growth(0, 2))).toBe('(log n)^2');
      expect(renderGrowth(growth(1.5))).toBe('n^1.5');
      expect(renderGrowth(growth(Math.log2(3)))).toBe('n^1.58');
    });

    it('should render the golden ratio as φ', () => {
      expect(renderGrowth(growth(0, 0, GOLDEN_RATIO))).toBe('φ^n');
    });

    it('should wrap a growth in a bound symbol', () => {
      expect(notation('Θ', LINEARITHMIC)).toBe('Θ(n log n)');
      expect(notation('Ω', CONSTANT)).toBe('Ω(1)');
    });
  });

  describe('formatNumber', () => {
    it('should keep at most two decimals', () => {
      expect(formatNumber(2)).toBe('2');
      expect(formatNumber(2.5)).toBe('2.5');
      expect(formatNumber(0.25)).toBe('0.25');
      expect(formatNumber(GOLDEN_RATIO)).toBe('1.62');
    });
  });

  describe('ordering', () => {
    it('should order the hierarchy of classes', () => {
      const ordered = [CONSTANT, LOGARITHMIC, LINEAR, LINEARITHMIC, QUADRATIC, EXPONENTIAL, FACTORIAL];
      for (let i = 1; i < ordered.length; i++) {
        const lower = ordered[i - 1];
        const higher = ordered[i];
        if (!lower || !higher) continue;
        expect(compareGrowth(lower, higher)).toBeLessThan(0);
      }
    });

    it('should pick the larger and smaller growth', () => {
      expect(maxGrowth(LINEAR, QUADRATIC, LOGARITHMIC)).toEqual(QUADRATIC);
      expect(maxGrowth()).toEqual(CONSTANT);
      expect(minGrowth(LINEAR, LOGARITHMIC)).toEqual(LOGARITHMIC);
    });

    it('should multiply growth rates', () => {
      expect(multiplyGrowth(LINEAR, LOGARITHMIC)).toEqual(LINEARITHMIC);
      expect(renderGrowth(multiplyGrowth(QUADRATIC, LINEAR))).toBe('n^3');
    });

    it('should treat exponentials and factorials as non-polylogarithmic', () => {
      expect(isPolylog(LINEARITHMIC)).toBe(true);
      expect(isPolylog(EXPONENTIAL)).toBe(false);
      expect(isPolylog(FACTORIAL)).toBe(false);
    });
  });

  describe('case combination', () => {
    it('should let the slower part dominate a sequence', () => {
      const cases = sequenceCases(uniformCases(LINEAR), { best: CONSTANT, worst: QUADRATIC, average: QUADRATIC });
      expect(cases).toEqual({ best: LINEAR, worst: QUADRATIC, average: QUADRATIC });
    });

    it('should take the cheaper branch for the best case and the costlier one otherwise', () => {
      const cases = branchCases(uniformCases(LINEAR), uniformCases(CONSTANT));
      expect(cases).toEqual({ best: CONSTANT, worst: LINEAR, average: LINEAR });
      expect(isUniform(cases)).toBe(false);
    });

    it('should scale every case by a loop factor', () => {
      const cases = scaleCases({ best: CONSTANT, worst: LINEAR, average: LINEAR }, uniformCases(LINEAR));
      expect(cases).toEqual({ best: LINEAR, worst: QUADRATIC, average: QUADRATIC });
    });
  });
});
