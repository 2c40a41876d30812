import type { DeskwireConfig } from '../config/schema.js';
import type { ChatwootClient } from '../chatwoot/client.js';
import { RawMessageSchema, formatId, messageDirection } from '../chatwoot/types.js';
import { errorMessage } from '../errors.js';
import type { Transcript } from './types.js';
import * as log from '../utils/logger.js';

export interface FetchHistoryOptions {
  /** Id of the message that triggered the webhook; it is sent separately. */
  excludeMessageId?: string;
}

/**
 * Best-effort conversation history.
 *
 * Messages are taken in the order the API returns them (oldest first for
 * Chatwoot) and the first `maxMessages` qualifying ones are kept. Any failure
 * yields an empty transcript and a warning.
 */
export class HistoryFetcher {
  private client: ChatwootClient;

  constructor(client: ChatwootClient) {
    this.client = client;
  }

  async fetch(
    config: DeskwireConfig,
    conversationId: string,
    maxMessages: number,
    opts: FetchHistoryOptions = {},
  ): Promise<Transcript> {
    let rawMessages: unknown[];
    try {
      rawMessages = await this.client.listMessages(config.chatwoot, conversationId);
    } catch (err) {
      log.warn(`History unavailable for conversation ${conversationId}: ${errorMessage(err)}`);
      return [];
    }

    const transcript: Transcript = [];
    for (const raw of rawMessages) {
      if (transcript.length >= maxMessages) break;

      const parsed = RawMessageSchema.safeParse(raw);
      if (!parsed.success) continue;
      const message = parsed.data;

      if (opts.excludeMessageId !== undefined && formatId(message.id) === opts.excludeMessageId) continue;

      const direction = messageDirection(message.message_type);
      if (!direction) continue;

      const text = message.content?.trim();
      if (!text) continue;

      transcript.push({ role: direction === 'incoming' ? 'user' : 'assistant', text });
    }

    log.debug(`History: ${transcript.length}/${rawMessages.length} messages kept for conversation ${conversationId}`);
    return transcript;
  }
}
