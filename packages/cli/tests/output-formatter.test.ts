import { describe, it, expect } from '@jest/globals';
import { analyze, buildTree, CONSTANT, parseRecurrence, QUADRATIC, serializeReport, tokenize } from '@asymptote/core';
import type { LineCost } from '@asymptote/core';
import * as fs from 'fs';
import * as path from 'path';
import { OutputFormatter } from '../src/utils/output-formatter';

const mergeSort = fs.readFileSync(path.join(__dirname, 'fixtures', 'merge-sort.txt'), 'utf8');

describe('OutputFormatter', () => {
  describe('Basic formatting', () => {
    it('should format header messages', () => {
      expect(OutputFormatter.header('Test Header')).toBe('\n🚀 Test Header');
    });

    it('should format info messages', () => {
      expect(OutputFormatter.info('Test Info')).toBe('ℹ️  Test Info');
    });

    it('should format success messages', () => {
      expect(OutputFormatter.success('Test Success')).toBe('✅ Test Success');
    });

    it('should format error messages', () => {
      expect(OutputFormatter.error('Test Error')).toBe('❌ Test Error');
    });

    it('should format warning messages', () => {
      expect(OutputFormatter.warning('Test Warning')).toBe('⚠️  Test Warning');
    });
  });

  describe('Pipeline sections', () => {
    it('should list tokens with their positions', () => {
      expect(OutputFormatter.tokens(tokenize('x ← 1')).split('\n')).toEqual([
        '   1:1     identifier  x',
        '   1:3     operator    <-  (←)',
        '   1:5     number      1',
      ]);
    });

    it('should say when there are no tokens', () => {
      expect(OutputFormatter.tokens(tokenize(''))).toBe('   No tokens.');
    });

    it('should align line costs and mark recursive lines', () => {
      const rows: LineCost[] = [
        { line: 3, code: 'x <- 1', cost: CONSTANT, explanation: '', origin: 'structural', scope: 'main' },
        { line: 12, code: 'y <- F(n - 1)', cost: QUADRATIC, explanation: '', origin: 'recurrence', scope: 'F' },
      ];

      expect(OutputFormatter.lineCosts(rows).split('\n')).toEqual([
        '   Line  Cost  Code',
        '      3  1     x <- 1',
        '     12  n^2   y <- F(n - 1) (recursive)',
      ]);
    });

    it('should number math steps', () => {
      const output = OutputFormatter.mathSteps([
        { label: 'Critical exponent', value: 'c = 1' },
        { label: 'Conclusion', value: 'Θ(n log n)' },
      ]);

      expect(output).toBe('   1. Critical exponent: c = 1\n   2. Conclusion: Θ(n log n)');
    });

    it('should flag assumed annotations', () => {
      const output = OutputFormatter.annotations([
        { kind: 'early-exit', message: 'Loop on line 2 can stop early', assumption: false },
        { kind: 'unresolved-progress', message: 'assuming a linear number of passes', assumption: true },
      ]);

      expect(output).toBe(
        '   • [early-exit] Loop on line 2 can stop early\n   • [unresolved-progress] assuming a linear number of passes (assumed)'
      );
    });

    it('should draw the recursion tree with level totals', () => {
      const tree = buildTree(parseRecurrence('T(n) = 2T(n/2) + n'), { maxDepth: 1 });
      if (!tree) throw new Error('expected a tree');

      expect(OutputFormatter.tree(tree)).toBe(
        [
          '   T(n): n',
          '   ├─ T(n/2): n/2',
          '   └─ T(n/2): n/2',
          '',
          '   Level costs:',
          '     - level 0: 1 node, n',
          '     - level 1: 2 nodes, n',
          '   Total: 2·n (truncated)',
        ].join('\n')
      );
    });
  });

  describe('Reports', () => {
    const report = analyze(mergeSort);

    it('should render a detailed report without colour', () => {
      const output = OutputFormatter.detailed(report, { color: false });

      expect(output.startsWith('\n📈 Result: Θ(n log n)\n   • Best case: Ω(n log n)\n')).toBe(true);
      expect(output).toContain('\n🧮 Recurrence: T(n) = 2T(n/2) + n\n   • Base case: T(n) = 1 for low >= high\n');
      expect(output).toContain('\n📐 Method: master-theorem\n');
      expect(output).not.toContain('🔤 Tokens:');
    });

    it('should append tokens and the AST on request', () => {
      const output = OutputFormatter.detailed(report, { color: false, showTokens: true, showAst: true });

      expect(output).toContain('🔤 Tokens:');
      expect(output).toContain(`\n🌲 AST:\n${report.astDump}\n`);
    });

    it('should render a compact table', () => {
      const lines = OutputFormatter.table(report).split('\n');

      expect(lines.slice(0, 6)).toEqual([
        '   Result      Θ(n log n)',
        '   Best        Ω(n log n)',
        '   Average     Θ(n log n)',
        '   Worst       O(n log n)',
        '   Method      master-theorem',
        '   Recurrence  T(n) = 2T(n/2) + n',
      ]);
    });

    it('should emit the serialized report as JSON', () => {
      expect(JSON.parse(OutputFormatter.json(report))).toEqual(serializeReport(report));
    });
  });

  describe('Help text', () => {
    it('should describe usage', () => {
      const help = OutputFormatter.help();

      expect(help).toContain('🚀 Asymptote CLI');
      expect(help).toContain('Usage: asymptote [options] [command]');
      expect(help).toContain('solve [options] <equation>');
    });
  });
});
