import type { ResolvedConfig } from '../config/asymptote-schema.js';

export interface CommandContext {
  config: ResolvedConfig;
  /** Directory relative paths resolve against. */
  cwd: string;
  verbose: boolean;
}

export interface CommandResult<T = Record<string, unknown>> {
  success: boolean;
  message: string;
  artifacts?: string[];
  data?: T;
}

/** Options every subcommand inherits from the program. */
export type GlobalOptions = {
  verbose?: boolean;
  config?: string;
};
