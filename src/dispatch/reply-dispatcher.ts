import type { DeskwireConfig } from '../config/schema.js';
import type { ChatwootClient } from '../chatwoot/client.js';
import { ConfigError, NetworkError, SchemaError, errorMessage } from '../errors.js';
import * as log from '../utils/logger.js';

export type DispatchResult =
  | { ok: true }
  | { ok: false; reason: string; error: Error };

/**
 * Posts the generated text back into the conversation as an outgoing message.
 * No retries: a failed dispatch ends the pipeline with an error status.
 */
export class ReplyDispatcher {
  private client: ChatwootClient;

  constructor(client: ChatwootClient) {
    this.client = client;
  }

  async send(config: DeskwireConfig, conversationId: string, text: string): Promise<DispatchResult> {
    const { accountId, baseUrl } = config.chatwoot;
    if (!accountId.trim()) {
      return configFailure('CHATWOOT_ACCOUNT_ID is not configured');
    }
    if (!baseUrl.trim()) {
      return configFailure('CHATWOOT_BASE_URL is not configured');
    }

    try {
      await this.client.createMessage(config.chatwoot, conversationId, text);
    } catch (err) {
      const error = err instanceof NetworkError || err instanceof SchemaError || err instanceof ConfigError
        ? err
        : new NetworkError(errorMessage(err), { cause: err });
      const hint = failureHint(error);
      log.error(`Reply to conversation ${conversationId} failed: ${error.message}${hint ? ` (${hint})` : ''}`);
      return { ok: false, reason: error.message, error };
    }

    log.success(`Reply sent to conversation ${conversationId} (${text.length} chars)`);
    return { ok: true };
  }
}

function configFailure(reason: string): DispatchResult {
  log.error(`Reply not sent: ${reason}`);
  return { ok: false, reason, error: new ConfigError(reason) };
}

/** Operator-facing next step for helpdesk errors that have a known cause. */
export function failureHint(error: Error): string | undefined {
  if (!(error instanceof NetworkError)) return undefined;
  if (error.timedOut) return 'the helpdesk may still have posted the reply; check the conversation before resending';
  if (error.status === 401 || error.status === 403) return 'check CHATWOOT_API_TOKEN';
  if (error.status === 404) return 'check CHATWOOT_ACCOUNT_ID and that the conversation exists';
  return undefined;
}
