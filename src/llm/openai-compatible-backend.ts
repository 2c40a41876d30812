import OpenAI from 'openai';
import type { InferenceSettings } from '../config/schema.js';
import type { Prompt } from '../prompt/prompt-builder.js';
import { errorMessage } from '../errors.js';
import { extractResponseText, inferenceFailure, type InferenceBackend, type InferenceResult } from './types.js';
import * as log from '../utils/logger.js';

/**
 * Resolves to the raw response body. Servers that only look OpenAI-compatible
 * may answer in another shape, so the result is parsed, not trusted.
 */
export type CompletionsCreate = (
  params: OpenAI.ChatCompletionCreateParamsNonStreaming,
  opts: { timeout: number },
) => Promise<unknown>;

export type CompletionsFactory = (config: { apiKey: string; baseURL: string }) => CompletionsCreate;

/**
 * OpenAI-compatible chat completions (llama.cpp server, vLLM, LM Studio,
 * Ollama's /v1). Uses the official SDK with retries disabled: one attempt
 * per webhook.
 */
export class OpenAICompatibleBackend implements InferenceBackend {
  readonly name = 'openai-compatible';
  private createClient: CompletionsFactory;
  private clients = new Map<string, CompletionsCreate>();

  constructor(opts: { createClient?: CompletionsFactory } = {}) {
    this.createClient = opts.createClient ?? defaultCompletionsFactory;
  }

  async generate(settings: InferenceSettings, prompt: Prompt): Promise<InferenceResult> {
    const baseURL = settings.endpoint.trim().replace(/\/+$/, '');
    const create = this.clientFor(baseURL, settings.apiKey ?? '');

    log.debug(`LLM [${this.name}]: ${baseURL}, model=${settings.model}, history=${prompt.transcript.length}`);

    let response: unknown;
    try {
      response = await create(
        { model: settings.model, messages: toChatMessages(prompt), stream: false },
        { timeout: settings.timeoutMs },
      );
    } catch (err) {
      if (err instanceof OpenAI.APIConnectionTimeoutError) {
        return inferenceFailure('timeout', `No response from ${baseURL} within ${settings.timeoutMs}ms`);
      }
      if (err instanceof OpenAI.APIError && err.status !== undefined) {
        return inferenceFailure('unreachable', `${baseURL} responded ${err.status}: ${err.message}`);
      }
      return inferenceFailure('unreachable', `Cannot reach ${baseURL}: ${errorMessage(err)}`);
    }

    const text = extractResponseText(response);
    if (text === undefined) {
      return inferenceFailure('bad_schema', `No completion text in response from ${baseURL}`);
    }
    if (!text.trim()) {
      return inferenceFailure('bad_schema', `Empty completion from ${baseURL}`);
    }

    log.debug(`LLM [${this.name}]: ${text.length} chars`);
    return { ok: true, text: text.trim() };
  }

  private clientFor(baseURL: string, apiKey: string): CompletionsCreate {
    const key = `${baseURL}\n${apiKey}`;
    let create = this.clients.get(key);
    if (!create) {
      create = this.createClient({ apiKey, baseURL });
      this.clients.set(key, create);
    }
    return create;
  }
}

/** Chat-style backends get the structured prompt instead of the rendered blob. */
export function toChatMessages(prompt: Prompt): OpenAI.ChatCompletionMessageParam[] {
  return [
    { role: 'system', content: prompt.systemMessage },
    ...prompt.transcript.map((entry): OpenAI.ChatCompletionMessageParam =>
      entry.role === 'user'
        ? { role: 'user', content: entry.text }
        : { role: 'assistant', content: entry.text },
    ),
    { role: 'user', content: prompt.userMessage },
  ];
}

const defaultCompletionsFactory: CompletionsFactory = ({ apiKey, baseURL }) => {
  const client = new OpenAI({
    // Local servers usually ignore the key, but the SDK refuses an empty one.
    apiKey: apiKey || 'not-set',
    baseURL,
    maxRetries: 0,
  });
  return (params, opts) => client.chat.completions.create(params, opts);
};
