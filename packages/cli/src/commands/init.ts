import { Command } from 'commander';
import fs from 'fs/promises';
import path from 'path';
import { BaseCommand, runCommand } from './base.js';
import type { RenderedOutput } from './base.js';
import { CONFIG_FILE_NAME, ConfigLoader } from '../config/config-loader.js';
import type { CommandResult } from '../types/index.js';
import { OutputFormatter } from '../utils/output-formatter.js';

export interface InitCommandOptions {
  force?: boolean;
}

export class InitCommand extends BaseCommand<InitCommandOptions> {
  async execute(options: InitCommandOptions): Promise<CommandResult<RenderedOutput>> {
    const { cwd } = this.requireContext();
    const target = path.join(cwd, CONFIG_FILE_NAME);

    if (!options.force && (await exists(target))) {
      return this.failure(`${CONFIG_FILE_NAME} already exists; use --force to overwrite it`);
    }

    const configPath = await new ConfigLoader(this.logger).createSampleConfig(cwd);
    return this.success('Created configuration', [configPath], {
      output: OutputFormatter.info(`Edit ${CONFIG_FILE_NAME} to change tree limits and output format`),
    });
  }
}

async function exists(file: string): Promise<boolean> {
  try {
    await fs.access(file);
    return true;
  } catch {
    return false;
  }
}

export function createInitCommand(): Command {
  const command = new Command('init')
    .description(`Create a sample ${CONFIG_FILE_NAME} in the current directory`)
    .option('--force', 'Overwrite an existing configuration file')
    .action(async (opts: { force?: boolean }, cmd: Command) => {
      await runCommand(cmd, logger => new InitCommand(logger), { force: opts.force ?? false });
    });

  return command;
}
