import { describe, it, expect } from '@jest/globals';
import { RecurrenceSolver, solveRecurrence } from '../src/analysis/recurrence-solver';
import type { SolverOutcome } from '../src/analysis/recurrence-solver';
import { parseRecurrence } from '../src/analysis/recurrence-parser';
import type { RecurrenceRelation } from '../src/analysis/recurrence-extractor';
import { CONSTANT, GOLDEN_RATIO, renderGrowth } from '../src/analysis/growth';
import { subtractTransform } from '../src/analysis/self-calls';

function solve(equation: string): SolverOutcome {
  return solveRecurrence(parseRecurrence(equation));
}

function boundOf(outcome: SolverOutcome): string {
  if (!outcome.solved) {
    throw new Error(`expected a solution, got: ${outcome.reason}`);
  }
  return renderGrowth(outcome.bound);
}

describe('RecurrenceSolver', () => {
  describe('master theorem', () => {
    it('should solve case 2 with its derivation', () => {
      const outcome = solve('T(n) = 2T(n/2) + n');

      expect(boundOf(outcome)).toBe('n log n');
      expect(outcome.solved && outcome.method).toBe('master-theorem');
      expect(outcome.solved && outcome.caseNumber).toBe(2);
      expect(outcome.mathSteps).toEqual([
        { label: 'Identify coefficients', value: 'a = 2, b = 2, f(n) = n' },
        { label: 'Critical exponent', value: 'c = log_2(2) = 1' },
        { label: 'Compare', value: 'f(n) = n matches n^1 up to (log n)^0' },
        { label: 'Conclusion', value: 'Case 2: Θ(n log n)' },
      ]);
      expect(outcome.solved && outcome.justification).toBe(
        'Master theorem case 2: a = 2, b = 2, f(n) = n gives Θ(n log n)'
      );
    });

    it('should solve binary search as case 2', () => {
      const outcome = solve('T(n) = T(n/2) + 1');

      expect(boundOf(outcome)).toBe('log n');
      expect(outcome.mathSteps[1]).toEqual({ label: 'Critical exponent', value: 'c = log_2(1) = 0' });
    });

    it('should solve case 1', () => {
      const outcome = solve('T(n) = 4T(n/2) + n');

      expect(boundOf(outcome)).toBe('n^2');
      expect(outcome.mathSteps[2]).toEqual({ label: 'Compare', value: 'f(n) = n grows slower than n^2' });
    });

    it('should keep a fractional critical exponent', () => {
      const outcome = solve('T(n) = 7T(n/2) + n^2');

      expect(boundOf(outcome)).toBe('n^2.81');
      expect(outcome.mathSteps[1]).toEqual({ label: 'Critical exponent', value: 'c = log_2(7) = 2.81' });
    });

    it('should solve case 3 and record the regularity assumption', () => {
      const outcome = solve('T(n) = 2T(n/2) + n^2');

      expect(boundOf(outcome)).toBe('n^2');
      expect(outcome.mathSteps.map(step => step.label)).toEqual([
        'Identify coefficients',
        'Critical exponent',
        'Compare',
        'Regularity condition',
        'Conclusion',
      ]);
      expect(outcome.solved && outcome.annotations.map(annotation => annotation.kind)).toEqual(['regularity-assumed']);
    });

    it('should give up on a non-polynomial f(n)', () => {
      const outcome = solve('T(n) = 2T(n/2) + 2^n');

      expect(outcome.solved).toBe(false);
      expect(!outcome.solved && outcome.reason).toBe(
        'f(n) = 2^n is not polynomial, so the master theorem does not apply'
      );
    });
  });

  describe('subtractive recurrences', () => {
    it('should unroll a single chain', () => {
      const outcome = solve('T(n) = T(n-1) + 1');

      expect(boundOf(outcome)).toBe('n');
      expect(outcome.mathSteps).toEqual([
        { label: 'Unroll', value: 'T(n) = T(n-1) + 1 = T(n-2) + 2·1 = ...' },
        { label: 'Depth', value: 'n/1 levels before the base case' },
        { label: 'Sum', value: 'n/1 · 1' },
        { label: 'Conclusion', value: 'Θ(n)' },
      ]);
    });

    it('should sum linear work along a chain', () => {
      const outcome = solve('T(n) = T(n-1) + n');

      expect(boundOf(outcome)).toBe('n^2');
      expect(outcome.solved && outcome.justification).toBe('Each of the n/1 levels does n work, so T(n) = Θ(n^2)');
    });

    it('should recognise Fibonacci', () => {
      const outcome = solve('T(n) = T(n-1) + T(n-2) + 1');

      expect(outcome.solved && outcome.method).toBe('fibonacci-pattern');
      expect(outcome.solved && outcome.bound.expBase).toBeCloseTo(GOLDEN_RATIO);
      expect(boundOf(outcome)).toBe('φ^n');
      expect(outcome.mathSteps[1]).toEqual({ label: 'Characteristic equation', value: 'x^2 = x + 1' });
    });

    it('should find the dominant root of a branching chain', () => {
      const outcome = solve('T(n) = 2T(n-1) + 1');

      expect(boundOf(outcome)).toBe('2^n');
      expect(outcome.solved && outcome.method).toBe('linear-recurrence');
      expect(outcome.mathSteps).toEqual([
        { label: 'Identify terms', value: '2·T(n-1)' },
        { label: 'Characteristic equation', value: '2x^-1 = 1' },
        { label: 'Dominant root', value: 'x ≈ 2' },
        { label: 'Conclusion', value: 'Θ(2^n)' },
      ]);
    });
  });

  describe('substitution', () => {
    it('should fit uneven divisions numerically', () => {
      const outcome = solve('T(n) = T(n/2) + T(n/4) + n');

      expect(boundOf(outcome)).toBe('n');
      expect(outcome.solved && outcome.method).toBe('substitution');
      expect(outcome.mathSteps[1]).toEqual({ label: 'Ratio test', value: 'T(n) / n stays within a factor of 1.01' });
    });

    it('should read exponential growth from mixed terms', () => {
      const outcome = solve('T(n) = 2T(n-1) + T(n/2) + 1');

      expect(boundOf(outcome)).toBe('2^n');
      expect(outcome.mathSteps[1]).toEqual({ label: 'Ratio test', value: 'T(n) / T(n-1) settles near 2' });
    });

    it('should give up when consecutive ratios keep drifting', () => {
      const outcome = solve('T(n) = T(n-1) + T(n/2) + 1');

      expect(outcome.solved).toBe(false);
      expect(!outcome.solved && outcome.reason).toBe('consecutive values do not settle on a constant ratio');
    });
  });

  describe('unsupported shapes', () => {
    it('should refuse a symbolic size transform', () => {
      const relation: RecurrenceRelation = {
        procedure: 'Skip',
        equation: 'T(n) = T(n-k) + 1',
        terms: [{ coefficient: 1, transform: { kind: 'subtract-symbolic', text: 'n-k' } }],
        localCost: CONSTANT,
        baseCase: 'T(1) = 1',
        notes: [],
        explanation: '',
        transforms: [],
      };
      const outcome = new RecurrenceSolver().solve(relation);

      expect(outcome).toEqual({
        solved: false,
        reason: 'size transform n-k is not a constant shrink',
        mathSteps: [{ label: 'Identify terms', value: 'T(n) = T(n-k) + 1' }],
      });
    });

    it.each([1, 2])('should refuse a subtraction that does not shrink with %i branches', coefficient => {
      const relation: RecurrenceRelation = {
        procedure: 'Stall',
        equation: `T(n) = ${coefficient > 1 ? coefficient : ''}T(n-0) + 1`,
        terms: [{ coefficient, transform: subtractTransform(0) }],
        localCost: CONSTANT,
        baseCase: 'T(1) = 1',
        notes: [],
        explanation: '',
        transforms: [],
      };

      const outcome = solveRecurrence(relation);

      expect(outcome.solved).toBe(false);
      expect(!outcome.solved && outcome.reason).toBe('size transform n-0 does not shrink the input');
    });
  });
});
