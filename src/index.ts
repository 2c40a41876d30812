#!/usr/bin/env node
/**
 * deskwire — helpdesk ⇄ local LLM relay
 *
 * Entry point: commander-based CLI with subcommands.
 */

import { createRequire } from 'node:module';
import { Command, InvalidArgumentError } from 'commander';
import { runServe } from './commands/serve.js';
import { runConfigSet, runConfigShow } from './commands/config.js';

const require = createRequire(import.meta.url);
const { version } = require('../package.json');

const program = new Command();

program
  .name('deskwire')
  .description('Answer helpdesk conversations with a locally hosted language model')
  .version(version);

program
  .command('serve', { isDefault: true })
  .description('Run the webhook server')
  .option('-p, --port <port>', 'Port to listen on (overrides config)', parsePort)
  .option('--host <host>', 'Interface to bind (overrides config)')
  .option('-d, --debug', 'Enable debug logging')
  .action(async (opts: { port?: number; host?: string; debug?: boolean }) => {
    await runServe(opts);
  });

const configCommand = program
  .command('config')
  .description('Inspect or change runtime settings');

configCommand
  .command('show')
  .description('Print the effective configuration (secrets masked)')
  .action(async () => {
    await runConfigShow();
  });

configCommand
  .command('set')
  .description('Persist new settings; a running server picks them up on the next request')
  .option('--system-message <text>', 'System message sent with every prompt')
  .option('--model <name>', 'Model name')
  .option('--endpoint <url>', 'Inference endpoint base URL')
  .action(async (opts: { systemMessage?: string; model?: string; endpoint?: string }) => {
    await runConfigSet(opts);
  });

function parsePort(value: string): number {
  const port = Number.parseInt(value, 10);
  if (!Number.isInteger(port) || port < 0 || port > 65_535) {
    throw new InvalidArgumentError('Port must be an integer between 0 and 65535.');
  }
  return port;
}

program.parseAsync().catch((err) => {
  console.error('Fatal:', err instanceof Error ? err.message : String(err));
  process.exit(1);
});
