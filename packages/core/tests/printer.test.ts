import { describe, it, expect } from '@jest/globals';
import { dumpAst } from '../src/parsing/printer';
import { loadFixture, parseSource } from './helpers';

describe('dumpAst', () => {
  it('should dump procedures with indentation and line numbers', () => {
    const dump = dumpAst(parseSource(loadFixture('merge-sort.txt')));

    expect(dump.split('\n')).toEqual([
      'Program',
      '  ProcedureDecl MergeSort(A, low, high) @1',
      '    Block',
      '      IfElse low < high @3',
      '        Block',
      '          Assignment mid <- (low + high) div 2 @5',
      '          Call MergeSort(A, low, mid) @6',
      '          Call MergeSort(A, mid + 1, high) @7',
      '          Call Merge(A, low, mid, high) @8',
      '  ProcedureDecl Merge(A, low, mid, high) @12',
      '    Block',
      '      ForLoop k <- low to high @14',
      '        Block (implicit)',
      '          Assignment B[k] <- A[k] @15',
    ]);
  });

  it('should dump loop control of conditional loops', () => {
    const dump = dumpAst(parseSource('begin\n  while low <= high do\n    low <- low + 1\n  end\nend'));

    expect(dump.split('\n')).toEqual([
      'Program',
      '  Main',
      '    Block',
      '      WhileLoop low <= high [control=low bound=high] @2',
      '        Block (implicit)',
      '          Assignment low <- low + 1 @3',
    ]);
  });

  it('should dump else branches and bare returns', () => {
    const dump = dumpAst(parseSource('begin\n  if a then\n    return\n  else\n    x <- 1\n  end\nend'));

    expect(dump.split('\n')).toEqual([
      'Program',
      '  Main',
      '    Block',
      '      IfElse a @2',
      '        Block (implicit)',
      '          ReturnStmt @3',
      '      Else',
      '        Block (implicit)',
      '          Assignment x <- 1 @5',
    ]);
  });
});
