import type { InferenceSettings } from '../config/schema.js';
import type { FetchFn } from '../chatwoot/client.js';
import type { Prompt } from '../prompt/prompt-builder.js';
import { errorMessage, isAbortError } from '../errors.js';
import { extractResponseText, inferenceFailure, type InferenceBackend, type InferenceResult } from './types.js';
import * as log from '../utils/logger.js';

/**
 * Ollama `/api/generate`, non-streaming.
 *
 * Tunnels and proxies in front of the model server do not always speak the
 * same dialect, so the reply text is looked up in several known shapes.
 */
export class OllamaBackend implements InferenceBackend {
  readonly name = 'ollama';
  private fetchFn: FetchFn;

  constructor(opts: { fetch?: FetchFn } = {}) {
    this.fetchFn = opts.fetch ?? fetch;
  }

  async generate(settings: InferenceSettings, prompt: Prompt): Promise<InferenceResult> {
    const url = `${settings.endpoint.trim().replace(/\/+$/, '')}/api/generate`;

    log.debug(`LLM [ollama]: POST ${url}, model=${settings.model}, history=${prompt.transcript.length}`);

    let response: Response;
    try {
      response = await this.fetchFn(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        // The system message already heads prompt.text.
        body: JSON.stringify({ model: settings.model, prompt: prompt.text, stream: false }),
        signal: AbortSignal.timeout(settings.timeoutMs),
      });
    } catch (err) {
      if (isAbortError(err)) {
        return inferenceFailure('timeout', `No response from ${url} within ${settings.timeoutMs}ms`);
      }
      return inferenceFailure('unreachable', `Cannot reach ${url}: ${errorMessage(err)}`);
    }

    if (!response.ok) {
      return inferenceFailure('unreachable', `${url} responded ${response.status} ${response.statusText}`.trim());
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (err) {
      if (isAbortError(err)) {
        return inferenceFailure('timeout', `Response body from ${url} not received within ${settings.timeoutMs}ms`);
      }
      return inferenceFailure('bad_schema', `Non-JSON response from ${url}: ${errorMessage(err)}`);
    }

    const text = extractResponseText(body);
    if (text === undefined) {
      return inferenceFailure('bad_schema', `No completion text in response from ${url}`);
    }
    if (!text.trim()) {
      return inferenceFailure('bad_schema', `Empty completion from ${url}`);
    }

    log.debug(`LLM [ollama]: ${text.length} chars`);
    return { ok: true, text: text.trim() };
  }
}
