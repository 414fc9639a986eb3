import { Command } from 'commander';
import { buildTree, notation, parseRecurrence, RecurrenceSyntaxError, solveRecurrence } from '@asymptote/core';
import type { RecurrenceRelation } from '@asymptote/core';
import { BaseCommand, runCommand } from './base.js';
import type { RenderedOutput } from './base.js';
import { parsePositiveInt } from './analyze.js';
import type { CommandResult } from '../types/index.js';
import { OutputFormatter } from '../utils/output-formatter.js';

export interface SolveCommandOptions {
  equation: string;
  tree?: boolean;
  maxDepth?: number;
  inputSize?: number;
}

export interface SolveData extends RenderedOutput {
  solved: boolean;
  bound?: string;
  method?: string;
}

type SolveFlags = {
  tree?: boolean;
  maxDepth?: number;
  inputSize?: number;
};

export class SolveCommand extends BaseCommand<SolveCommandOptions, SolveData> {
  async execute(options: SolveCommandOptions): Promise<CommandResult<SolveData>> {
    const { config } = this.requireContext();

    let relation: RecurrenceRelation;
    try {
      relation = parseRecurrence(options.equation);
    } catch (error) {
      if (error instanceof RecurrenceSyntaxError) {
        return this.failure(error.message);
      }
      throw error;
    }

    const outcome = solveRecurrence(relation, this.logger);
    let output = `\n🧮 ${relation.equation}\n`;

    if (!outcome.solved) {
      output += `${OutputFormatter.warning(`Could not solve: ${outcome.reason}`)}\n`;
      if (outcome.mathSteps.length > 0) {
        output += `${OutputFormatter.mathSteps(outcome.mathSteps)}\n`;
      }
      return this.success('Recurrence not solved', [], { output, solved: false });
    }

    const bound = notation('Θ', outcome.bound);
    output += `${OutputFormatter.success(bound)} via ${outcome.method}\n`;
    output += `   ${outcome.justification}\n`;
    output += `${OutputFormatter.mathSteps(outcome.mathSteps)}\n`;

    if (options.tree) {
      const inputSize = options.inputSize ?? config.analysis.treeInputSize;
      const tree = buildTree(relation, {
        maxDepth: options.maxDepth ?? config.analysis.maxTreeDepth,
        maxNodes: config.analysis.maxTreeNodes,
        ...(inputSize !== undefined ? { inputSize } : {}),
        logger: this.logger,
      });
      if (tree) {
        output += `\n🌳 Recursion tree:\n${OutputFormatter.tree(tree)}\n`;
      }
    }

    return this.success('Recurrence solved', [], { output, solved: true, bound, method: outcome.method });
  }
}

export function createSolveCommand(): Command {
  const command = new Command('solve')
    .description('Solve a recurrence such as "T(n) = 2T(n/2) + n"')
    .argument('<equation>', 'Recurrence in the form T(n) = ...')
    .option('--tree', 'Also draw the recursion tree')
    .option('--max-depth <depth>', 'Deepest recursion tree level', parsePositiveInt)
    .option('--input-size <n>', 'Concrete n for recursion tree base cases', parsePositiveInt)
    .action(async (equation: string, opts: SolveFlags, cmd: Command) => {
      await runCommand(cmd, logger => new SolveCommand(logger), {
        equation,
        tree: opts.tree ?? false,
        maxDepth: opts.maxDepth,
        inputSize: opts.inputSize,
      });
    });

  return command;
}
