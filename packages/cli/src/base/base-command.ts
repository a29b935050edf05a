/**
 * Base Command Class for the scansplit CLI
 *
 * Provides logging, error reporting and success output shared by all commands.
 */

import { Command } from 'commander';
import { Logger } from '@scansplit/core';
import { DependencyInjectionService } from '../services/dependency-injection';
import type { BaseCommandOptions, ICommand, IExecutableCommand } from '../interfaces/command';

/**
 * Abstract base class for all CLI commands
 */
export abstract class BaseCommand<TOptions extends BaseCommandOptions = BaseCommandOptions>
  implements ICommand, IExecutableCommand<TOptions> {

  protected readonly container = DependencyInjectionService.getInstance();
  protected logger: Logger.Logger = Logger.createLogger('', 'info');

  abstract register(program: Command): void;

  abstract execute(options: TOptions): Promise<void>;

  /**
   * Picks the log level from --verbose / --quiet.
   */
  protected configureLogger(options: TOptions): void {
    const level: Logger.LogLevel = options.verbose ? 'debug' : options.quiet ? 'warn' : 'info';
    this.logger = Logger.createLogger('', level);
  }

  /**
   * Handle errors consistently across all commands
   */
  protected handleError(message: string, options: TOptions, error?: Error, exitCode: number = 1): void {
    if (options.json) {
      console.log(JSON.stringify({
        success: false,
        error: message,
        exitCode
      }, null, 2));
    } else {
      const formattedMessage = message.startsWith('❌') ? message : `❌ ${message}`;
      console.error(formattedMessage);
      if (options.verbose && error?.stack) {
        console.error(`🔍 Technical details: ${error.stack}`);
      }
    }

    process.exit(exitCode);
  }

  /**
   * Handle successful output consistently
   */
  protected handleSuccess(data: unknown, options: TOptions, message?: string): void {
    if (options.json) {
      console.log(JSON.stringify({
        success: true,
        data
      }, null, 2));
      return;
    }
    if (message && !options.quiet) {
      console.log(`✅ ${message}`);
    }
  }
}
