import type { ChatwootSettings } from '../config/schema.js';
import { ConfigError, NetworkError, SchemaError, errorMessage, isAbortError } from '../errors.js';
import { isRecord } from '../utils/guards.js';
import * as log from '../utils/logger.js';

export type FetchFn = typeof fetch;

/**
 * Thin client for the two Chatwoot endpoints the relay needs.
 * Settings are passed per call because they are re-read for every request.
 */
export class ChatwootClient {
  private fetchFn: FetchFn;

  constructor(opts: { fetch?: FetchFn } = {}) {
    this.fetchFn = opts.fetch ?? fetch;
  }

  async listMessages(settings: ChatwootSettings, conversationId: string): Promise<unknown[]> {
    const url = messagesUrl(settings, conversationId);
    const response = await this.request(settings, url, { method: 'GET' });

    let body: unknown;
    try {
      body = await response.json();
    } catch (err) {
      throw new SchemaError(`Chatwoot returned a non-JSON body from ${url}`, { cause: err });
    }

    // The API wraps the list as { meta, payload }; older versions return a bare array.
    if (Array.isArray(body)) return body;
    if (isRecord(body) && Array.isArray(body.payload)) return body.payload;
    throw new SchemaError(`Unexpected messages payload from ${url}`);
  }

  async createMessage(settings: ChatwootSettings, conversationId: string, content: string): Promise<void> {
    const url = messagesUrl(settings, conversationId);
    const response = await this.request(settings, url, {
      method: 'POST',
      body: JSON.stringify({ content, message_type: 'outgoing' }),
    });
    await response.body?.cancel();
  }

  private async request(settings: ChatwootSettings, url: string, init: RequestInit): Promise<Response> {
    log.debug(`Chatwoot: ${init.method ?? 'GET'} ${url}`);

    let response: Response;
    try {
      response = await this.fetchFn(url, {
        ...init,
        headers: {
          'api_access_token': settings.apiToken,
          'Content-Type': 'application/json',
        },
        signal: AbortSignal.timeout(settings.timeoutMs),
      });
    } catch (err) {
      if (isAbortError(err)) {
        throw new NetworkError(`Chatwoot request timed out after ${settings.timeoutMs}ms`, { timedOut: true, cause: err });
      }
      throw new NetworkError(`Chatwoot request failed: ${errorMessage(err)}`, { cause: err });
    }

    if (!response.ok) {
      throw new NetworkError(`Chatwoot responded ${response.status} ${response.statusText}`.trim(), { status: response.status });
    }

    return response;
  }
}

function messagesUrl(settings: ChatwootSettings, conversationId: string): string {
  const baseUrl = settings.baseUrl.trim().replace(/\/+$/, '');
  const accountId = settings.accountId.trim();
  if (!baseUrl) throw new ConfigError('chatwoot.baseUrl is not configured');
  if (!accountId) throw new ConfigError('chatwoot.accountId is not configured');
  return `${baseUrl}/api/v1/accounts/${encodeURIComponent(accountId)}/conversations/${encodeURIComponent(conversationId)}/messages`;
}
