import { describe, it, expect } from '@jest/globals';
import { analyze } from '../src/pipeline/analyzer';
import { serializeReport } from '../src/pipeline/report-serializer';
import { loadFixture } from './helpers';

describe('serializeReport', () => {
  it('should emit the wire shape for a straight-line program', () => {
    const serialized = serializeReport(analyze('begin\n  x <- 1\nend'));

    expect(serialized.lexer.tokens).toEqual([
      { type: 'keyword', value: 'begin', line: 1, column: 1 },
      { type: 'identifier', value: 'x', line: 2, column: 3 },
      { type: 'operator', value: '<-', line: 2, column: 5 },
      { type: 'number', value: '1', line: 2, column: 8 },
      { type: 'keyword', value: 'end', line: 3, column: 1 },
    ]);
    expect(serialized.line_costs.rows).toEqual([{ line: 2, code: 'x <- 1', cost: '1' }]);
    expect(serialized.parser.ast_dump).toBe('Program\n  Main\n    Block\n      Assignment x <- 1 @2');
    expect(serialized.solution.main_result).toBe('Θ(1)');
    expect(serialized.recursion_tree).toBeUndefined();
  });

  it('should flatten the recursion tree', () => {
    const serialized = serializeReport(analyze(loadFixture('merge-sort.txt')));
    const tree = serialized.recursion_tree;

    expect(tree?.levels[0]).toEqual({ level: 0, nodes: 1, cost: 'n' });
    expect(tree?.total_cost).toBe('7·n');
    expect(tree?.structure.label).toBe('T(n)');
    expect(tree?.structure.children[0]?.label).toBe('T(n/2)');
    expect(tree?.structure.children[0]?.cost).toBe('n/2');
    expect(serialized.solution.method_used).toBe('master-theorem');
    expect(serialized.extraction.base_case).toBe('T(n) = 1 for low >= high');
  });
});
