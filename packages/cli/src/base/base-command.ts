/**
 * Base Command Class for the wpt-sync CLI
 *
 * Provides common functionality and enforces standards across all commands.
 */

import { Command } from 'commander';
import { DependencyInjectionService } from '../services/dependency-injection';
import type { BaseCommandOptions, ICommand } from '../interfaces/command';

/**
 * Abstract base class for all CLI commands
 */
export abstract class BaseCommand<TOptions extends BaseCommandOptions = BaseCommandOptions>
  implements ICommand {

  protected readonly dependencyService = DependencyInjectionService.getInstance();

  /**
   * Register the command with Commander.js
   * Must be implemented by each command
   */
  abstract register(program: Command): void;

  /**
   * Points the dependency service at the options' config file and log level
   */
  protected configure(options: TOptions): void {
    this.dependencyService.configure({
      ...(options.config ? { configPath: options.config } : {}),
      verbose: options.verbose ?? false,
      quiet: options.quiet ?? false,
    });
  }

  /**
   * Handle errors consistently across all commands
   */
  protected handleError(message: string, options: TOptions, error?: Error, exitCode: number = 1): void {
    const isJson = options.json || false;
    const isVerbose = options.verbose || false;

    if (isJson) {
      console.log(JSON.stringify({
        success: false,
        error: message,
        exitCode
      }, null, 2));
    } else {
      // Only add ❌ if message doesn't already have it
      const formattedMessage = message.startsWith('❌') ? message : `❌ ${message}`;
      console.error(formattedMessage);
      if (isVerbose && error) {
        console.error(`🔍 Technical details: ${error.stack}`);
      }
    }

    process.exit(exitCode);
  }

  /**
   * Handle successful output consistently
   */
  protected handleSuccess(data: unknown, options: TOptions, message?: string): void {
    const isJson = options.json || false;
    const isQuiet = options.quiet || false;

    if (isJson) {
      console.log(JSON.stringify({
        success: true,
        data
      }, null, 2));
    } else {
      if (message && !isQuiet) {
        console.log(`✅ ${message}`);
      }
    }
  }

  /**
   * Parses a change request number argument
   */
  protected parseNumber(value: string, options: TOptions): number | null {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < 1) {
      this.handleError(`Invalid PR number: ${value}`, options);
      return null;
    }
    return parsed;
  }
}
