/**
 * Config commands — inspect and change the settings the server re-reads on
 * every request.
 */

import { FileConfigProvider } from '../config/config.js';
import type { DeskwireConfig } from '../config/schema.js';

export async function runConfigShow(): Promise<void> {
  const config = await new FileConfigProvider().get();
  console.log(JSON.stringify(maskSecrets(config), null, 2));
}

export async function runConfigSet(opts: {
  systemMessage?: string;
  model?: string;
  endpoint?: string;
}): Promise<void> {
  const provider = new FileConfigProvider();
  const config = await provider.update({
    systemMessage: opts.systemMessage,
    model: opts.model,
    inferenceEndpoint: opts.endpoint,
  });

  console.log(`Updated ${provider.path}`);
  console.log(`  model:          ${config.inference.model}`);
  console.log(`  endpoint:       ${config.inference.endpoint}`);
  console.log(`  system message: ${config.inference.systemMessage}`);
}

export function maskSecrets(config: DeskwireConfig): DeskwireConfig {
  return {
    ...config,
    chatwoot: { ...config.chatwoot, apiToken: mask(config.chatwoot.apiToken) },
    inference: {
      ...config.inference,
      ...(config.inference.apiKey !== undefined ? { apiKey: mask(config.inference.apiKey) } : {}),
    },
  };
}

function mask(secret: string): string {
  if (!secret) return '';
  return secret.length <= 4 ? '****' : `${'*'.repeat(secret.length - 4)}${secret.slice(-4)}`;
}
