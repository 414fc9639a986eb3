import { Command } from 'commander';
import { AnalysisError, dumpAst, parse, tokenize } from '@asymptote/core';
import { BaseCommand, runCommand } from './base.js';
import type { RenderedOutput } from './base.js';
import type { CommandResult } from '../types/index.js';

export interface AstCommandOptions {
  file: string;
}

export interface AstData extends RenderedOutput {
  procedures: string[];
  hasMain: boolean;
}

export class AstCommand extends BaseCommand<AstCommandOptions, AstData> {
  async execute(options: AstCommandOptions): Promise<CommandResult<AstData>> {
    const source = await this.readSource(options.file);

    try {
      const program = parse(tokenize(source));
      return this.success(`Parsed ${options.file}`, [], {
        output: dumpAst(program),
        procedures: program.procedures.map(procedure => procedure.name),
        hasMain: program.main !== null,
      });
    } catch (error) {
      if (error instanceof AnalysisError) {
        this.logger.error('Parsing failed', error.toJSON());
        return this.failure(`Parsing ${options.file} failed: ${error.message}`);
      }
      throw error;
    }
  }
}

export function createAstCommand(): Command {
  const command = new Command('ast')
    .description('Print the parsed syntax tree of a pseudocode file')
    .argument('<file>', 'Pseudocode file to parse')
    .action(async (file: string, _opts: Record<string, never>, cmd: Command) => {
      await runCommand(cmd, logger => new AstCommand(logger), { file });
    });

  return command;
}
