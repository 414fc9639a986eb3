import { Command } from 'commander';
import { AnalysisError, tokenize } from '@asymptote/core';
import { BaseCommand, runCommand } from './base.js';
import type { RenderedOutput } from './base.js';
import type { CommandResult } from '../types/index.js';
import { OutputFormatter } from '../utils/output-formatter.js';

export interface TokensCommandOptions {
  file: string;
}

export interface TokensData extends RenderedOutput {
  count: number;
}

export class TokensCommand extends BaseCommand<TokensCommandOptions, TokensData> {
  async execute(options: TokensCommandOptions): Promise<CommandResult<TokensData>> {
    const source = await this.readSource(options.file);

    try {
      const tokens = tokenize(source);
      const count = tokens.filter(token => token.kind !== 'eof').length;
      this.logger.debug('Tokenized file', { file: options.file, count });
      return this.success(`Tokenized ${options.file}`, [], { output: OutputFormatter.tokens(tokens), count });
    } catch (error) {
      if (error instanceof AnalysisError) {
        return this.failure(`Tokenizing ${options.file} failed: ${error.message}`);
      }
      throw error;
    }
  }
}

export function createTokensCommand(): Command {
  const command = new Command('tokens')
    .description('Print the token stream of a pseudocode file')
    .argument('<file>', 'Pseudocode file to tokenize')
    .action(async (file: string, _opts: Record<string, never>, cmd: Command) => {
      await runCommand(cmd, logger => new TokensCommand(logger), { file });
    });

  return command;
}
