import { Command } from 'commander';
import { Logger } from '@asymptote/core';
import fs from 'fs/promises';
import path from 'path';
import { ConfigLoader } from '../config/config-loader.js';
import type { CommandContext, CommandResult, GlobalOptions } from '../types/index.js';
import { OutputFormatter } from '../utils/output-formatter.js';

/** Data every command hands back for printing. */
export interface RenderedOutput {
  output: string;
}

export abstract class BaseCommand<TOptions, TData extends RenderedOutput = RenderedOutput> {
  protected logger: Logger;
  protected context?: CommandContext;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  /**
   * Set the command context
   */
  setContext(context: CommandContext): void {
    this.context = context;
  }

  /**
   * Execute the command
   */
  abstract execute(options: TOptions): Promise<CommandResult<TData>>;

  /**
   * Validate command prerequisites and return the context
   */
  protected requireContext(): CommandContext {
    if (!this.context) {
      throw new Error('Command context not set');
    }
    return this.context;
  }

  /**
   * Read a pseudocode file relative to the working directory
   */
  protected async readSource(file: string): Promise<string> {
    const filePath = path.resolve(this.requireContext().cwd, file);
    this.logger.debug('Reading source file', { path: filePath });
    return fs.readFile(filePath, 'utf8');
  }

  /**
   * Write rendered output to a file, creating its directory
   */
  protected async writeOutput(file: string, content: string): Promise<string> {
    const filePath = path.resolve(this.requireContext().cwd, file);
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, content, 'utf8');

    this.logger.debug('Wrote output file', { path: filePath });
    return filePath;
  }

  /**
   * Create a success result
   */
  protected success(message: string, artifacts?: string[], data?: TData): CommandResult<TData> {
    return {
      success: true,
      message,
      artifacts,
      data,
    };
  }

  /**
   * Create a failure result
   */
  protected failure(message: string): CommandResult<TData> {
    return {
      success: false,
      message,
    };
  }
}

/**
 * Builds the logger and context for a subcommand from the global flags
 * and the configuration file.
 */
export async function createContext(command: Command): Promise<{ logger: Logger; context: CommandContext }> {
  const globalOpts = command.parent?.opts<GlobalOptions>() ?? {};
  const logger = new Logger(globalOpts.verbose ?? false);
  const cwd = process.cwd();

  const config = await new ConfigLoader(logger).loadConfig(cwd, globalOpts.config);
  const verbose = (globalOpts.verbose ?? false) || config.logging.verbose;
  logger.setVerbose(verbose);

  return { logger, context: { config, cwd, verbose } };
}

/**
 * Prints a command result; failures exit with status 1.
 */
export function reportResult<TData extends RenderedOutput>(logger: Logger, result: CommandResult<TData>): void {
  if (!result.success) {
    logger.log(OutputFormatter.error(result.message));
    process.exit(1);
  }

  if (result.data) {
    logger.log(result.data.output);
  }
  if (result.artifacts && result.artifacts.length > 0) {
    logger.log(OutputFormatter.success(`${result.message}: ${result.artifacts.join(', ')}`));
  }
}

/**
 * Wires a command instance into a commander action.
 */
export async function runCommand<TOptions, TData extends RenderedOutput>(
  command: Command,
  create: (logger: Logger) => BaseCommand<TOptions, TData>,
  options: TOptions
): Promise<void> {
  let logger = new Logger(false);
  try {
    const setup = await createContext(command);
    logger = setup.logger;

    const instance = create(logger);
    instance.setContext(setup.context);
    reportResult(logger, await instance.execute(options));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error('Command failed', { command: command.name(), error: message });
    logger.log(OutputFormatter.error(message));
    process.exit(1);
  }
}
