/**
 * Serve command — runs the webhook server until SIGINT/SIGTERM.
 */

import { serve } from '@hono/node-server';
import { FileConfigProvider } from '../config/config.js';
import { checkStartupConfig } from '../config/startup-check.js';
import { createApp } from '../bootstrap.js';
import * as log from '../utils/logger.js';

export interface ServeOptions {
  port?: number;
  host?: string;
  debug?: boolean;
}

export async function runServe(opts: ServeOptions = {}): Promise<void> {
  const provider = new FileConfigProvider();
  const config = await provider.get();

  log.setLogLevel(opts.debug ? 'debug' : config.logLevel);

  const check = checkStartupConfig(config);
  for (const warning of check.warnings) log.warn(warning);
  if (!check.ready) {
    for (const err of check.errors) log.error(err);
    process.exit(1);
  }

  const { app } = createApp({ config: provider });
  const port = opts.port ?? config.server.port;
  const hostname = opts.host ?? config.server.host;

  const server = serve({ fetch: app.fetch, port, hostname }, (address) => {
    log.info(`deskwire listening on http://${hostname}:${address.port}`);
    log.info(`Config: ${provider.path}`);
    log.info(`Inference: ${config.inference.provider} at ${config.inference.endpoint} (model=${config.inference.model})`);
    log.info(`Helpdesk: ${config.chatwoot.baseUrl} (account ${config.chatwoot.accountId})`);
  });

  await new Promise<void>((resolve) => {
    const shutdown = (signal: string) => {
      console.log(`\nReceived ${signal}, shutting down...`);
      server.close(() => resolve());
    };
    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));
  });
}
