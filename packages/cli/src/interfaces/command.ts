/**
 * Standard Command Interface for the scansplit CLI
 */

import { Command } from 'commander';

/**
 * Base options that all commands support
 */
export interface BaseCommandOptions {
  json?: boolean;
  verbose?: boolean;
  quiet?: boolean;
}

/**
 * Command registration interface for Commander.js integration
 */
export interface ICommand {
  /**
   * Register the command with Commander.js program
   * @param program - The Commander.js program instance
   */
  register(program: Command): void;
}

/**
 * Executable command interface
 */
export interface IExecutableCommand<TOptions extends BaseCommandOptions = BaseCommandOptions> {
  execute(options: TOptions): Promise<void>;
}
