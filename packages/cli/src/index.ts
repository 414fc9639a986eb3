#!/usr/bin/env node

import { Command } from 'commander';
import { Logger } from '@asymptote/core';
import { createAnalyzeCommand } from './commands/analyze.js';
import { createAstCommand } from './commands/ast.js';
import { createInitCommand } from './commands/init.js';
import { createSolveCommand } from './commands/solve.js';
import { createTokensCommand } from './commands/tokens.js';
import { OutputFormatter } from './utils/output-formatter.js';

export function createProgram(): Command {
  const program = new Command();

  // Global options
  program
    .name('asymptote')
    .description('Asymptotic complexity analysis for academic pseudocode')
    .version('0.1.0')
    .option('-v, --verbose', 'Enable verbose logging')
    .option('-c, --config <path>', 'Configuration file (default: nearest asymptote.yaml)');

  program.addCommand(createAnalyzeCommand());
  program.addCommand(createTokensCommand());
  program.addCommand(createAstCommand());
  program.addCommand(createSolveCommand());
  program.addCommand(createInitCommand());

  // Configure help
  program.configureHelp({
    sortSubcommands: true,
  });
  program.showHelpAfterError();

  program.on('--help', () => {
    const logger = new Logger();
    logger.log(OutputFormatter.help());
  });

  return program;
}

if (require.main === module) {
  createProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      console.error(OutputFormatter.error(error instanceof Error ? error.message : String(error)));
      process.exit(1);
    });
}
