import type { DeskwireConfig, InferenceProviderName } from '../config/schema.js';
import type { Prompt } from '../prompt/prompt-builder.js';
import { errorMessage } from '../errors.js';
import { inferenceFailure, type InferenceBackend, type InferenceFailure, type InferenceResult } from './types.js';
import * as log from '../utils/logger.js';

/**
 * Routes each request to the backend named by `inference.provider`, read from
 * the config of that request so a provider switch needs no restart.
 * Single attempt, no retries.
 */
export class InferenceClient {
  private backends: Record<InferenceProviderName, InferenceBackend>;

  constructor(backends: Record<InferenceProviderName, InferenceBackend>) {
    this.backends = backends;
  }

  async generate(config: DeskwireConfig, prompt: Prompt): Promise<InferenceResult> {
    const backend = this.backends[config.inference.provider];
    const started = Date.now();

    let result: InferenceResult;
    try {
      result = await backend.generate(config.inference, prompt);
    } catch (err) {
      // Backends report failures as results; a throw here is a bug in one of them.
      result = inferenceFailure('unreachable', `${backend.name} backend threw: ${errorMessage(err)}`);
    }

    const durationMs = Date.now() - started;
    if (result.ok) {
      log.info(`LLM [${backend.name}]: reply generated in ${durationMs}ms (model=${config.inference.model})`);
    } else {
      log.error(`LLM [${backend.name}]: ${result.kind} after ${durationMs}ms: ${result.message}`);
    }
    return result;
  }
}

const APOLOGIES: Record<InferenceFailure['kind'], string> = {
  timeout: "I'm sorry, I'm taking longer than expected to answer. Please try again in a moment.",
  unreachable: "I'm sorry, I can't answer right now because the assistant is unavailable. Please try again later.",
  bad_schema: "I'm sorry, something went wrong while I was preparing a reply. Please try again.",
};

/** Customer-facing text sent in place of a failed generation. */
export function apologyFor(failure: InferenceFailure): string {
  return APOLOGIES[failure.kind];
}
