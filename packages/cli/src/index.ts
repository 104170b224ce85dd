#!/usr/bin/env tsx

import dotenv from 'dotenv';
import { Command } from 'commander';
import { registerDownstreamCommands } from './commands/downstream/downstream';

dotenv.config();

const program = new Command();

program
  .name('wpt-sync')
  .description('Ports web-platform-tests pull requests into a downstream tree')
  .version('0.1.0');

registerDownstreamCommands(program);

program.parseAsync().catch((error: unknown) => {
  console.error('❌ Fatal error:', error);
  process.exit(1);
});
