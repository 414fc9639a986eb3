import { describe, it, expect } from '@jest/globals';
import { selfCallPaths, selfCallSites } from '../src/analysis/self-calls';
import { loadFixture, parseSource, procedureNamed } from './helpers';

function sitesOf(source: string, name: string) {
  return selfCallSites(procedureNamed(parseSource(source), name));
}

describe('self-calls', () => {
  describe('selfCallSites', () => {
    it('should read a midpoint split as n/2', () => {
      const sites = sitesOf(loadFixture('merge-sort.txt'), 'MergeSort');

      expect(sites.map(site => site.transform)).toEqual([
        { kind: 'divide', divisor: 2, text: 'n/2', assumed: false },
        { kind: 'divide', divisor: 2, text: 'n/2', assumed: false },
      ]);
      expect(sites.map(site => site.line)).toEqual([6, 7]);
      expect(sites.every(site => !site.insideLoop)).toBe(true);
    });

    it('should assume a balanced split around a computed pivot', () => {
      const [first] = sitesOf(loadFixture('quick-sort.txt'), 'QuickSort');

      expect(first?.transform).toEqual({ kind: 'divide', divisor: 2, text: 'n/2', assumed: true });
      expect(first?.note).toBe('split point p comes from Partition(); a balanced split is assumed');
    });

    it('should read constant subtraction', () => {
      const sites = sitesOf(loadFixture('fibonacci.txt'), 'Fib');
      expect(sites.map(site => site.transform.text)).toEqual(['n-1', 'n-2']);
    });

    it('should sum chained subtractions', () => {
      const [site] = sitesOf('Walk(n)\nbegin\n  return Walk(n - 1 - 2)\nend', 'Walk');
      expect(site?.transform).toEqual({ kind: 'subtract', amount: 3, text: 'n-3' });
    });

    it('should read a shrinking array slice', () => {
      const [site] = sitesOf('Rest(A)\nbegin\n  return Rest(A[2..n])\nend', 'Rest');
      expect(site?.transform).toEqual({ kind: 'subtract', amount: 1, text: 'n-1' });
    });

    it('should keep a symbolic shrink with a note', () => {
      const [site] = sitesOf('Skip(A, n, k)\nbegin\n  return Skip(A, n - k, k)\nend', 'Skip');

      expect(site?.transform).toEqual({ kind: 'subtract-symbolic', text: 'n-k' });
      expect(site?.note).toBe('size shrinks by a non-constant amount (k)');
    });

    it('should read a split of a length field as n/2', () => {
      const [site] = sitesOf('Half(A, lo)\nbegin\n  mid <- B.length div 2\n  return Half(A, mid)\nend', 'Half');

      expect(site?.transform).toEqual({ kind: 'divide', divisor: 2, text: 'n/2', assumed: false });
    });

    it('should not read other fields as the input size', () => {
      const [site] = sitesOf('Half(A, lo)\nbegin\n  mid <- B.count div 2\n  return Half(A, mid)\nend', 'Half');

      expect(site?.transform).toEqual({ kind: 'unknown', text: 'n' });
      expect(site?.note).toBe('call to Half on line 4 does not shrink any parameter');
    });

    it('should flag a call that does not shrink its input', () => {
      const [site] = sitesOf('Spin(n)\nbegin\n  Spin(n)\nend', 'Spin');

      expect(site?.transform).toEqual({ kind: 'unknown', text: 'n' });
      expect(site?.note).toBe('call to Spin on line 3 does not shrink any parameter');
    });

    it.each([
      ['n - 0', 'n-0'],
      ['n - -1', 'n--1'],
    ])('should not treat %s as a shrinking call', (argument, text) => {
      const [site] = sitesOf(`Stall(n)\nbegin\n  return Stall(${argument})\nend`, 'Stall');

      expect(site?.transform).toEqual({ kind: 'unknown', text });
      expect(site?.note).toBe(`argument ${text} does not shrink n; the recursion may not terminate`);
    });

    it('should mark calls nested in loops', () => {
      const [site] = sitesOf(loadFixture('permutations.txt'), 'Permute');

      expect(site?.insideLoop).toBe(true);
      expect(site?.transform).toEqual({ kind: 'unknown', text: 'k+1' });
    });

    it('should match procedure names case-insensitively', () => {
      const sites = sitesOf('Down(n)\nbegin\n  return DOWN(n - 1)\nend', 'Down');
      expect(sites).toHaveLength(1);
    });
  });

  describe('selfCallPaths', () => {
    it('should count both calls of merge sort on one path', () => {
      const program = parseSource(loadFixture('merge-sort.txt'));
      expect(selfCallPaths(procedureNamed(program, 'MergeSort'))).toEqual({ min: 0, max: 2 });
    });

    it('should count exclusive branches once', () => {
      const program = parseSource(loadFixture('binary-search.txt'));
      expect(selfCallPaths(procedureNamed(program, 'BinarySearch'))).toEqual({ min: 0, max: 1 });
    });

    it('should stop counting after a return', () => {
      const program = parseSource(loadFixture('fibonacci.txt'));
      expect(selfCallPaths(procedureNamed(program, 'Fib'))).toEqual({ min: 0, max: 2 });
    });
  });
});
