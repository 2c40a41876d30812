/**
 * Shared bootstrap — creates all dependencies, wires them together.
 * Used by the serve command and by integration tests (with stubbed I/O).
 */

import { ChatwootClient, type FetchFn } from './chatwoot/client.js';
import { FileConfigProvider, type ConfigProvider } from './config/config.js';
import { ReplyDispatcher } from './dispatch/reply-dispatcher.js';
import { HistoryFetcher } from './history/history-fetcher.js';
import { InferenceClient } from './llm/inference-client.js';
import { OllamaBackend } from './llm/ollama-backend.js';
import { OpenAICompatibleBackend, type CompletionsFactory } from './llm/openai-compatible-backend.js';
import { WebhookPipeline } from './pipeline/webhook-pipeline.js';
import { createServerApp } from './server/app.js';
import type { Hono } from 'hono';

export interface AppDeps {
  config: ConfigProvider;
  chatwoot: ChatwootClient;
  history: HistoryFetcher;
  inference: InferenceClient;
  dispatcher: ReplyDispatcher;
  pipeline: WebhookPipeline;
  app: Hono;
}

export interface CreateAppOptions {
  config?: ConfigProvider;
  /** Outbound HTTP for the helpdesk and Ollama. */
  fetch?: FetchFn;
  /** Client factory for OpenAI-compatible servers. */
  createCompletions?: CompletionsFactory;
}

export function createApp(opts: CreateAppOptions = {}): AppDeps {
  const config = opts.config ?? new FileConfigProvider();

  const chatwoot = new ChatwootClient({ fetch: opts.fetch });
  const history = new HistoryFetcher(chatwoot);
  const dispatcher = new ReplyDispatcher(chatwoot);
  const inference = new InferenceClient({
    'ollama': new OllamaBackend({ fetch: opts.fetch }),
    'openai-compatible': new OpenAICompatibleBackend({ createClient: opts.createCompletions }),
  });

  const pipeline = new WebhookPipeline({ config, history, inference, dispatcher });
  const app = createServerApp({ pipeline, config });

  return { config, chatwoot, history, inference, dispatcher, pipeline, app };
}
