import type { ConfigProvider } from '../config/config.js';
import type { HistoryFetcher } from '../history/history-fetcher.js';
import { apologyFor, type InferenceClient } from '../llm/inference-client.js';
import type { ReplyDispatcher } from '../dispatch/reply-dispatcher.js';
import type { Transcript } from '../history/types.js';
import { buildPrompt } from '../prompt/prompt-builder.js';
import { classifyEvent } from './inbound.js';
import { failed, type PipelineResult } from './types.js';
import * as log from '../utils/logger.js';

export interface PipelineDeps {
  config: ConfigProvider;
  history: HistoryFetcher;
  inference: InferenceClient;
  dispatcher: ReplyDispatcher;
}

/**
 * One webhook → at most one reply.
 *
 * Flow:
 * 1. classify the event (ignored / error / actionable)
 * 2. re-read config
 * 3. fetch history (best-effort) and build the prompt
 * 4. generate; a failed generation becomes an apology, never an empty reply
 * 5. dispatch; a failed dispatch is the only post-classification error
 *
 * Errors from the config store propagate to the caller.
 */
export class WebhookPipeline {
  private deps: PipelineDeps;

  constructor(deps: PipelineDeps) {
    this.deps = deps;
  }

  async run(payload: unknown): Promise<PipelineResult> {
    const classified = classifyEvent(payload);
    if (!classified.actionable) {
      log.debug(`Webhook ${classified.result.status}: ${classified.result.reason}`);
      return classified.result;
    }

    const { conversationId, content, messageId } = classified.message;
    log.info(`Webhook: incoming message in conversation ${conversationId}`);

    const config = await this.deps.config.get();

    const transcript: Transcript = config.history.enabled
      ? await this.deps.history.fetch(config, conversationId, config.history.maxMessages, { excludeMessageId: messageId })
      : [];
    const prompt = buildPrompt(config, transcript, content);

    const result = await this.deps.inference.generate(config, prompt);
    const reply = result.ok ? result.text : apologyFor(result);

    const dispatched = await this.deps.dispatcher.send(config, conversationId, reply);
    if (!dispatched.ok) {
      return failed('failed to send response');
    }

    return { status: 'success', message: 'response sent' };
  }
}
