import { Command, InvalidArgumentError } from 'commander';
import { AnalysisError, analyze } from '@asymptote/core';
import type { AnalysisReport, AnalyzeOptions } from '@asymptote/core';
import { BaseCommand, runCommand } from './base.js';
import type { RenderedOutput } from './base.js';
import { OUTPUT_FORMATS } from '../config/asymptote-schema.js';
import type { OutputFormat } from '../config/asymptote-schema.js';
import type { CommandResult } from '../types/index.js';
import { OutputFormatter } from '../utils/output-formatter.js';

export interface AnalyzeCommandOptions {
  file: string;
  format?: OutputFormat;
  output?: string;
  maxDepth?: number;
  inputSize?: number;
  tree?: boolean;
}

export interface AnalyzeData extends RenderedOutput {
  mainResult: string;
  method: string;
}

type AnalyzeFlags = {
  format?: OutputFormat;
  output?: string;
  maxDepth?: number;
  inputSize?: number;
  tree: boolean;
};

export class AnalyzeCommand extends BaseCommand<AnalyzeCommandOptions, AnalyzeData> {
  async execute(options: AnalyzeCommandOptions): Promise<CommandResult<AnalyzeData>> {
    const { config } = this.requireContext();
    const format = options.format ?? config.output.format;

    this.logger.info('Starting complexity analysis', { file: options.file, format });

    const source = await this.readSource(options.file);

    let report: AnalysisReport;
    try {
      report = analyze(source, { logger: this.logger, tree: this.treeOptions(options) });
    } catch (error) {
      if (error instanceof AnalysisError) {
        this.logger.error('Analysis failed', error.toJSON());
        return this.failure(`Analysis of ${options.file} failed: ${error.message}`);
      }
      throw error;
    }

    // Files never get colour codes
    const output = this.render(report, format, options.output === undefined);
    const data: AnalyzeData = {
      output,
      mainResult: report.solution.mainResult,
      method: report.solution.method,
    };

    if (options.output) {
      const written = await this.writeOutput(options.output, output);
      return this.success('Report written', [written], {
        ...data,
        output: OutputFormatter.info(report.solution.mainResult),
      });
    }
    return this.success('Analysis completed', [], data);
  }

  private treeOptions(options: AnalyzeCommandOptions): AnalyzeOptions['tree'] {
    const { analysis } = this.requireContext().config;
    if (options.tree === false || !analysis.buildTree) {
      return false;
    }
    const inputSize = options.inputSize ?? analysis.treeInputSize;
    return {
      maxDepth: options.maxDepth ?? analysis.maxTreeDepth,
      maxNodes: analysis.maxTreeNodes,
      ...(inputSize !== undefined ? { inputSize } : {}),
    };
  }

  private render(report: AnalysisReport, format: OutputFormat, toTerminal: boolean): string {
    const { output } = this.requireContext().config;
    switch (format) {
      case 'json':
        return OutputFormatter.json(report);
      case 'table':
        return OutputFormatter.table(report);
      case 'detailed':
        return OutputFormatter.detailed(report, {
          color: output.color && toTerminal,
          showTokens: output.showTokens,
          showAst: output.showAst,
        });
    }
  }
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

export function parseFormat(value: string): OutputFormat {
  const format = OUTPUT_FORMATS.find(candidate => candidate === value);
  if (!format) {
    throw new InvalidArgumentError(`Expected one of ${OUTPUT_FORMATS.join(', ')}.`);
  }
  return format;
}

export function createAnalyzeCommand(): Command {
  const command = new Command('analyze')
    .description('Analyze a pseudocode file and report O, Ω and Θ bounds')
    .argument('<file>', 'Pseudocode file to analyze')
    .option('-f, --format <format>', 'Output format (detailed|json|table)', parseFormat)
    .option('-o, --output <file>', 'Write the report to a file')
    .option('--max-depth <depth>', 'Deepest recursion tree level', parsePositiveInt)
    .option('--input-size <n>', 'Concrete n for recursion tree base cases', parsePositiveInt)
    .option('--no-tree', 'Skip the recursion tree')
    .action(async (file: string, opts: AnalyzeFlags, cmd: Command) => {
      await runCommand(cmd, logger => new AnalyzeCommand(logger), {
        file,
        format: opts.format,
        output: opts.output,
        maxDepth: opts.maxDepth,
        inputSize: opts.inputSize,
        tree: opts.tree,
      });
    });

  return command;
}
