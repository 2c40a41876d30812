import type { DeskwireConfig } from './schema.js';

export interface StartupCheckResult {
  ready: boolean;
  errors: string[];
  warnings: string[];
}

/**
 * Helpdesk credentials are required before the server starts; inference
 * settings all have defaults, so they only produce warnings.
 */
export function checkStartupConfig(config: DeskwireConfig): StartupCheckResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  const required: Array<[string, string]> = [
    ['CHATWOOT_BASE_URL', config.chatwoot.baseUrl],
    ['CHATWOOT_API_TOKEN', config.chatwoot.apiToken],
    ['CHATWOOT_ACCOUNT_ID', config.chatwoot.accountId],
  ];
  const missing = required.filter(([, value]) => !value.trim()).map(([name]) => name);
  if (missing.length > 0) {
    errors.push(`Missing required helpdesk settings: ${missing.join(', ')}. Set them in the environment or in deskwire.json.`);
  }

  if (config.inference.provider === 'openai-compatible' && !config.inference.apiKey) {
    warnings.push('inference.provider is "openai-compatible" but no apiKey is set; requests are sent without a bearer token.');
  }

  if (!config.history.enabled) {
    warnings.push('Conversation history is disabled; prompts will contain only the latest message.');
  }

  return {
    ready: errors.length === 0,
    errors,
    warnings,
  };
}
