import chalk from 'chalk';
import { renderGrowth, serializeReport, treeLines } from '@asymptote/core';
import type { AnalysisReport, Annotation, LineCost, MathStep, RecursionTree, Token } from '@asymptote/core';

export interface RenderOptions {
  color?: boolean;
  showTokens?: boolean;
  showAst?: boolean;
}

function palette(color: boolean | undefined) {
  return new chalk.Instance({ level: color === false ? 0 : 1 });
}

export class OutputFormatter {
  static header(message: string): string {
    return `\n🚀 ${message}`;
  }

  static info(message: string): string {
    return `ℹ️  ${message}`;
  }

  static success(message: string): string {
    return `✅ ${message}`;
  }

  static error(message: string): string {
    return `❌ ${message}`;
  }

  static warning(message: string): string {
    return `⚠️  ${message}`;
  }

  static tokens(tokens: readonly Token[]): string {
    const shown = tokens.filter(token => token.kind !== 'eof');
    if (shown.length === 0) {
      return `   No tokens.`;
    }

    const kindWidth = Math.max(...shown.map(token => token.kind.length));
    return shown
      .map(token => {
        const position = `${token.line}:${token.column}`.padEnd(7);
        const normalised = token.value === token.lexeme ? '' : `  (${token.lexeme})`;
        return `   ${position} ${token.kind.padEnd(kindWidth)}  ${token.value}${normalised}`;
      })
      .join('\n');
  }

  static lineCosts(rows: readonly LineCost[]): string {
    if (rows.length === 0) {
      return `   No statements.`;
    }

    const costs = rows.map(row => renderGrowth(row.cost));
    const width = Math.max('Cost'.length, ...costs.map(cost => cost.length));
    let output = `   ${'Line'.padStart(4)}  ${'Cost'.padEnd(width)}  Code\n`;
    rows.forEach((row, index) => {
      const marker = row.origin === 'recurrence' ? ' (recursive)' : '';
      output += `   ${String(row.line).padStart(4)}  ${(costs[index] ?? '').padEnd(width)}  ${row.code}${marker}\n`;
    });
    return output.trimEnd();
  }

  static mathSteps(steps: readonly MathStep[]): string {
    return steps.map((step, index) => `   ${index + 1}. ${step.label}: ${step.value}`).join('\n');
  }

  static annotations(annotations: readonly Annotation[]): string {
    return annotations
      .map(annotation => `   • [${annotation.kind}] ${annotation.message}${annotation.assumption ? ' (assumed)' : ''}`)
      .join('\n');
  }

  static tree(tree: RecursionTree): string {
    let output = treeLines(tree)
      .map(line => `   ${line}`)
      .join('\n');
    output += `\n\n   Level costs:`;
    for (const level of tree.levels) {
      output += `\n     - level ${level.depth}: ${level.nodes} node${level.nodes === 1 ? '' : 's'}, ${level.cost}`;
    }
    output += `\n   Total: ${tree.totalCost}${tree.truncated ? ' (truncated)' : ''}`;
    return output;
  }

  /**
   * Full human-readable report
   */
  static detailed(report: AnalysisReport, options: RenderOptions = {}): string {
    const paint = palette(options.color);
    const title = (text: string): string => paint.bold(text);
    const { solution, extraction } = report;

    let output = `\n📈 ${title('Result:')} ${paint.green(solution.mainResult)}\n`;
    output += `   • Best case: ${solution.cases.best}\n`;
    output += `   • Average case: ${solution.cases.average}\n`;
    output += `   • Worst case: ${solution.cases.worst}\n`;

    output += `\n🧮 ${title('Recurrence:')} ${extraction.equation}\n`;
    output += `   • Base case: ${extraction.baseCase}\n`;
    output += `   • ${extraction.explanation}\n`;
    for (const note of extraction.notes) {
      output += `   • Note: ${note}\n`;
    }

    output += `\n📐 ${title('Method:')} ${solution.method}\n`;
    output += `   ${solution.justification}\n`;
    output += `${OutputFormatter.mathSteps(solution.mathSteps)}\n`;

    output += `\n📏 ${title('Line costs:')}\n${OutputFormatter.lineCosts(report.lineCosts)}\n`;

    if (report.recursionTree) {
      output += `\n🌳 ${title('Recursion tree:')}\n${OutputFormatter.tree(report.recursionTree)}\n`;
    }

    if (report.annotations.length > 0) {
      output += `\n⚠️  ${title('Annotations:')}\n${OutputFormatter.annotations(report.annotations)}\n`;
    }

    if (options.showTokens) {
      output += `\n🔤 ${title('Tokens:')}\n${OutputFormatter.tokens(report.tokens)}\n`;
    }
    if (options.showAst) {
      output += `\n🌲 ${title('AST:')}\n${report.astDump}\n`;
    }

    return output;
  }

  /**
   * Compact tabular summary
   */
  static table(report: AnalysisReport): string {
    const { cases } = report.solution;
    const rows: [string, string][] = [
      ['Result', report.solution.mainResult],
      ['Best', cases.best],
      ['Average', cases.average],
      ['Worst', cases.worst],
      ['Method', report.solution.method],
      ['Recurrence', report.extraction.equation],
    ];
    const width = Math.max(...rows.map(([label]) => label.length));
    const summary = rows.map(([label, value]) => `   ${label.padEnd(width)}  ${value}`).join('\n');
    return `${summary}\n\n${OutputFormatter.lineCosts(report.lineCosts)}`;
  }

  static json(report: AnalysisReport): string {
    return JSON.stringify(serializeReport(report), null, 2);
  }

  static help(): string {
    return `
🚀 Asymptote CLI: asymptotic complexity analysis for academic pseudocode

Usage: asymptote [options] [command]

Commands:
  analyze [options] <file>   Analyze a pseudocode file and report O, Ω and Θ bounds
  tokens <file>              Print the token stream of a pseudocode file
  ast <file>                 Print the parsed syntax tree of a pseudocode file
  solve [options] <equation> Solve a recurrence such as "T(n) = 2T(n/2) + n"
  init [options]             Create a sample asymptote.yaml in the current directory

Options:
  -V, --version              output the version number
  -v, --verbose              Enable verbose logging
  -c, --config <path>        Configuration file (default: nearest asymptote.yaml)
  -h, --help                 display help for command

Examples:
  asymptote analyze mergesort.txt              # Detailed report
  asymptote analyze search.txt -f json         # Wire-format JSON report
  asymptote solve "T(n) = T(n-1) + T(n-2) + 1" # Solve a recurrence directly
`;
  }
}
