#!/usr/bin/env node
/**
 * toolfleet command-line entry point
 */

import { Command } from 'commander';

import { registerFleetCli } from './fleet-cli.js';

const program = new Command()
  .name('toolfleet')
  .description('Route stateful tool calls across a fleet of worker agents')
  .version('0.1.0');

registerFleetCli(program);

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error('Error:', error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
