/**
 * Types for the downstream sync commands.
 */

import type { BaseCommandOptions } from '../../interfaces/command';

/** Options for `wpt-sync pr <number>` */
export interface PrOptions extends BaseCommandOptions {
  /** JSON file with a pull_request webhook body, read instead of asking GitHub */
  payload?: string;
}

/** Options for `wpt-sync status <number>` */
export interface StatusOptions extends BaseCommandOptions {
  sha: string;
  state: string;
  /** Defaults to the configured CI context */
  context?: string;
}

/** Options for `wpt-sync list` */
export interface ListOptions extends BaseCommandOptions {
}

/** Options for `wpt-sync cleanup <number>` */
export interface CleanupOptions extends BaseCommandOptions {
}

/** Options for `wpt-sync try-message <number>` */
export interface TryMessageOptions extends BaseCommandOptions {
  /** Push the directive to the try server instead of printing it */
  push?: boolean;
}

/** Options for `wpt-sync webhook <body-file>` */
export interface WebhookOptions extends BaseCommandOptions {
  /** x-github-event header */
  event: string;
  /** x-github-delivery header */
  delivery: string;
  /** x-hub-signature-256 header */
  signature: string;
  /** PR a status delivery belongs to (default: the open PR containing the revision) */
  pr?: string;
}
