import { Command } from 'commander';
import { DownstreamCommand } from './downstream-command';
import type {
  CleanupOptions,
  ListOptions,
  PrOptions,
  StatusOptions,
  TryMessageOptions,
  WebhookOptions,
} from './downstream-command.types';

function withCommonOptions(command: Command): Command {
  return command
    .option('-c, --config <file>', 'Sync configuration file (default: $WPT_SYNC_CONFIG or wpt-sync.yaml)')
    .option('--json', 'Output in JSON format')
    .option('-v, --verbose', 'Show debug logging and error details')
    .option('-q, --quiet', 'Suppress output except errors');
}

/**
 * Registers the downstream sync commands
 */
export function registerDownstreamCommands(program: Command): void {
  const downstreamCommand = new DownstreamCommand();

  // wpt-sync pr <number>
  withCommonOptions(
    program
      .command('pr <number>')
      .description('Record a newly opened upstream PR and file its tracker issue')
      .option('-p, --payload <file>', 'pull_request webhook body to read instead of asking GitHub')
  ).action(async (number: string, options: PrOptions) => {
    await downstreamCommand.executePr(number, options);
  });

  // wpt-sync status <number>
  withCommonOptions(
    program
      .command('status <number>')
      .description('Feed a CI status for a PR revision to the sync engine')
      .requiredOption('--sha <sha>', 'Upstream revision the status refers to')
      .requiredOption('--state <state>', 'CI state (pending, passed, ...)')
      .option('--context <context>', 'CI context (default: the configured one)')
  ).action(async (number: string, options: StatusOptions) => {
    await downstreamCommand.executeStatus(number, options);
  });

  // wpt-sync webhook <body-file>
  withCommonOptions(
    program
      .command('webhook <body-file>')
      .description('Verify a GitHub webhook delivery and record or update the sync it concerns')
      .requiredOption('--event <name>', 'x-github-event header (pull_request, status, ping)')
      .requiredOption('--delivery <id>', 'x-github-delivery header')
      .requiredOption('--signature <signature>', 'x-hub-signature-256 header')
      .option('--pr <number>', 'PR a status delivery belongs to (default: looked up on GitHub)')
  ).action(async (bodyFile: string, options: WebhookOptions) => {
    await downstreamCommand.executeWebhook(bodyFile, options);
  });

  // wpt-sync list
  withCommonOptions(
    program
      .command('list')
      .alias('ls')
      .description('List known syncs')
  ).action(async (options: ListOptions) => {
    await downstreamCommand.executeList(options);
  });

  // wpt-sync cleanup <number>
  withCommonOptions(
    program
      .command('cleanup <number>')
      .description("Remove a sync's workspaces and branches")
  ).action(async (number: string, options: CleanupOptions) => {
    await downstreamCommand.executeCleanup(number, options);
  });

  // wpt-sync try-message <number>
  withCommonOptions(
    program
      .command('try-message <number>')
      .description('Show the try directive for the tests a synced PR affects')
      .option('--push', 'Push the directive to the try server')
  ).action(async (number: string, options: TryMessageOptions) => {
    await downstreamCommand.executeTryMessage(number, options);
  });
}
