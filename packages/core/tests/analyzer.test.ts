import { describe, it, expect, jest } from '@jest/globals';
import { analyze, analyzeWithCorrection } from '../src/pipeline/analyzer';
import type { GrammarCorrector } from '../src/pipeline/analyzer';
import { serializeReport } from '../src/pipeline/report-serializer';
import { LexError, ParseError } from '../src/parsing/errors';
import { loadFixture } from './helpers';

describe('analyze', () => {
  describe('recursive programs', () => {
    it('should solve merge sort with the master theorem', () => {
      const report = analyze(loadFixture('merge-sort.txt'));

      expect(report.solution.mainResult).toBe('Θ(n log n)');
      expect(report.solution.cases).toEqual({
        best: 'Ω(n log n)',
        average: 'Θ(n log n)',
        worst: 'O(n log n)',
      });
      expect(report.solution.method).toBe('master-theorem');
      expect(report.solution.mathSteps).toHaveLength(7);
      expect(report.extraction.equation).toBe('T(n) = 2T(n/2) + n');
      expect(report.extraction.baseCase).toBe('T(n) = 1 for low >= high');
      expect(report.extraction.explanation).toBe(
        'MergeSort calls itself 2 times on its most expensive path (T(n/2)) and does n work outside the recursive calls.'
      );
      expect(report.annotations.map(annotation => annotation.message)).toEqual([
        'MergeSort recurses on a subrange of size n/2',
        'MergeSort: divide and conquer (several calls on equal fractions)',
      ]);
      expect(report.recursionTree?.totalCost).toBe('7·n');
      expect(report.recursionTree?.truncated).toBe(true);
    });

    it('should recognise the Fibonacci recurrence', () => {
      const report = analyze(loadFixture('fibonacci.txt'));

      expect(report.solution.mainResult).toBe('Θ(φ^n)');
      expect(report.solution.method).toBe('fibonacci-pattern');
      expect(report.annotations.map(annotation => annotation.kind)).toContain('fibonacci-pattern');
      expect(report.annotations.map(annotation => annotation.kind)).toContain('recursion-pattern');
    });

    it('should solve recursive binary search', () => {
      const report = analyze(loadFixture('binary-search.txt'));

      expect(report.solution.mainResult).toBe('Θ(log n)');
      expect(report.solution.cases).toEqual({ best: 'Ω(1)', average: 'Θ(log n)', worst: 'O(log n)' });
    });

    it('should unroll a countdown', () => {
      const report = analyze(loadFixture('count-down.txt'));

      expect(report.solution.mainResult).toBe('Θ(n)');
      expect(report.solution.method).toBe('linear-recurrence');
    });

    it('should keep the quicksort worst case apart from its average', () => {
      const report = analyze(loadFixture('quick-sort.txt'));

      expect(report.solution.mainResult).toBe('Θ(n log n) average');
      expect(report.solution.cases).toEqual({ best: 'Ω(n log n)', average: 'Θ(n log n)', worst: 'O(n^2)' });
      expect(report.solution.method).toBe('master-theorem');
    });

    it('should fall back to structure when the recurrence has a symbolic shrink', () => {
      const report = analyze(loadFixture('permutations.txt'));

      expect(report.solution.mainResult).toBe('Θ(2^n)');
      expect(report.solution.method).toBe('structural-analysis');
      expect(report.extraction.equation).toBe('T(n) = T(k+1) + n');
      expect(report.annotations.map(annotation => annotation.kind)).toContain('recurrence-unsolved');
      expect(report.recursionTree).toBeNull();
    });
  });

  describe('recursion that never shrinks', () => {
    it.each([
      ['return Stall(n - 0) + Stall(n - 0)', 'T(n) = 2T(n-0) + 1'],
      ['return Stall(n - 0) + 1', 'T(n) = T(n-0) + 1'],
    ])('should still report on %s', (body, equation) => {
      const report = analyze(`Stall(n)\nbegin\n  if n <= 1 then\n    return 1\n  end\n  ${body}\nend`);

      expect(report.extraction.equation).toBe(equation);
      expect(report.extraction.notes).toContain('argument n-0 does not shrink n; the recursion may not terminate');
      expect(report.solution.method).toBe('structural-analysis');
      expect(report.annotations).toContainEqual({
        kind: 'recurrence-unsolved',
        message: `Recurrence ${equation} could not be solved: size transform n-0 is not a constant shrink; using the structural bound`,
        assumption: true,
        procedure: 'Stall',
      });
      expect(report.recursionTree).toBeNull();
    });
  });

  describe('iterative programs', () => {
    it('should report bubble sort from its loops', () => {
      const report = analyze(loadFixture('bubble-sort.txt'));

      expect(report.solution.mainResult).toBe('O(n^2)');
      expect(report.solution.method).toBe('structural-analysis');
      expect(report.solution.cases).toEqual({ best: 'Ω(n)', average: 'Θ(n^2)', worst: 'O(n^2)' });
      expect(report.solution.justification).toBe(
        'UnresolvedProgress on line 3: swapped is a flag; the number of passes depends on the data; assuming a linear number of passes; Loop on line 3 can stop after its first pass; best case counts one pass'
      );
      expect(report.extraction.equation).toBe('T(n) = n^2');
      expect(report.extraction.baseCase).toBe('not applicable');
      expect(report.recursionTree).toBeNull();
    });

    it('should bound an iterative binary search by its halving loop', () => {
      const report = analyze(loadFixture('iterative-binary-search.txt'));

      expect(report.solution.mainResult).toBe('O(log n)');
      expect(report.solution.method).toBe('structural-analysis');
      expect(report.solution.cases).toEqual({ best: 'Ω(1)', average: 'Θ(log n)', worst: 'O(log n)' });
      expect(report.solution.justification).toBe(
        'Loop on line 5 runs O(log n) times: the interval around low is halved each pass; Loop on line 5 can stop after its first pass; best case counts one pass'
      );
      expect(report.extraction.equation).toBe('T(n) = log n');
      expect(report.recurrences).toEqual([]);
      expect(report.recursionTree).toBeNull();
    });

    it('should explain a plain loop by its nesting', () => {
      const report = analyze(loadFixture('sum-loop.txt'));

      expect(report.solution.mainResult).toBe('Θ(n)');
      expect(report.solution.justification).toBe('Loop nesting and branches give a worst case of O(n)');
    });

    it('should charge swap, print and field reads as constant work', () => {
      const report = analyze(
        'begin\n  declare s\n  for i <- 1 to A.length do\n    swap A[i] with A[1]\n    print A[i]\n  end\nend'
      );

      expect(report.solution.mainResult).toBe('Θ(n)');
      expect(report.solution.justification).toBe('Loop nesting and branches give a worst case of O(n)');
    });

    it('should assume linear passes for an update it cannot classify', () => {
      const report = analyze('begin\n  i <- n\n  while i > 0 do\n    i <- i - A[i]\n  end\nend');

      expect(report.solution.mainResult).toBe('Θ(n)');
      expect(report.annotations.map(annotation => annotation.message)).toContain(
        'UnresolvedProgress on line 3: cannot classify the update i <- i - A[i]; assuming a linear number of passes'
      );
    });
  });

  describe('options', () => {
    it('should skip the recursion tree when asked', () => {
      const report = analyze(loadFixture('merge-sort.txt'), { tree: false });

      expect(report.recursionTree).toBeNull();
    });

    it('should pass tree limits through', () => {
      const report = analyze(loadFixture('merge-sort.txt'), { tree: { maxDepth: 1 } });

      expect(report.recursionTree?.levels).toHaveLength(2);
      expect(report.recursionTree?.totalCost).toBe('2·n');
    });
  });

  it('should produce the same report for the same source', () => {
    const source = loadFixture('quick-sort.txt');

    expect(serializeReport(analyze(source))).toEqual(serializeReport(analyze(source)));
  });

  it('should throw lexical and syntax errors', () => {
    expect(() => analyze('begin\n  x <- $\nend')).toThrow(LexError);
    expect(() => analyze('begin\n  x <- 1\n')).toThrow(ParseError);
  });
});

describe('analyzeWithCorrection', () => {
  const broken = 'begin\n  x <- 1\n';

  function corrector(result: { source: string; explanation: string } | null) {
    const correct = jest.fn<GrammarCorrector['correct']>().mockResolvedValue(result);
    return { correct };
  }

  it('should analyse the repaired source and annotate the correction', async () => {
    const fixer = corrector({ source: 'begin\n  x <- 1\nend', explanation: 'added the missing end' });

    const report = await analyzeWithCorrection(broken, fixer);

    expect(fixer.correct).toHaveBeenCalledTimes(1);
    expect(report.solution.mainResult).toBe('Θ(1)');
    expect(report.correction).toEqual({ originalSource: broken, explanation: 'added the missing end' });
    expect(report.annotations[report.annotations.length - 1]).toEqual({
      kind: 'grammar-corrected',
      message: 'Source was corrected before analysis: added the missing end',
      assumption: true,
    });
  });

  it('should not call the corrector for valid source', async () => {
    const fixer = corrector(null);

    const report = await analyzeWithCorrection('begin\n  x <- 1\nend', fixer);

    expect(fixer.correct).not.toHaveBeenCalled();
    expect(report.correction).toBeUndefined();
  });

  it('should rethrow the parse error when no repair is offered', async () => {
    await expect(analyzeWithCorrection(broken, corrector(null))).rejects.toThrow(ParseError);
  });

  it('should rethrow the original error when the repair is also broken', async () => {
    let original: unknown;
    try {
      analyze(broken);
    } catch (error) {
      original = error;
    }
    const fixer = corrector({ source: 'begin\n  x <-\nend', explanation: 'attempted fix' });

    await expect(analyzeWithCorrection(broken, fixer)).rejects.toThrow(
      original instanceof Error ? original.message : 'unreachable'
    );
  });

  it('should leave lexical errors to the caller', async () => {
    const fixer = corrector(null);

    await expect(analyzeWithCorrection('begin\n  x <- $\nend', fixer)).rejects.toThrow(LexError);
    expect(fixer.correct).not.toHaveBeenCalled();
  });
});
