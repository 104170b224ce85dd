/**
 * Standard Command Interface for the wpt-sync CLI
 *
 * All commands implement this interface to ensure consistency
 * and enable proper dependency injection and testing.
 */

import { Command } from 'commander';

/**
 * Base options that all commands support
 */
export interface BaseCommandOptions {
  /** Path of the sync configuration file */
  config?: string;
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
