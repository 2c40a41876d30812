import type { InferenceSettings } from '../config/schema.js';
import type { Prompt } from '../prompt/prompt-builder.js';
import { isRecord } from '../utils/guards.js';

export type InferenceFailureKind = 'unreachable' | 'bad_schema' | 'timeout';

export interface InferenceFailure {
  ok: false;
  kind: InferenceFailureKind;
  /** Operator-facing detail; never shown to the customer. */
  message: string;
}

export type InferenceResult =
  | { ok: true; text: string }
  | InferenceFailure;

/**
 * One model server flavour. Implementations must not throw: every outcome is
 * an InferenceResult.
 */
export interface InferenceBackend {
  readonly name: string;
  generate(settings: InferenceSettings, prompt: Prompt): Promise<InferenceResult>;
}

export function inferenceFailure(kind: InferenceFailureKind, message: string): InferenceFailure {
  return { ok: false, kind, message };
}

/**
 * Lookup order:
 *   { response }                          Ollama /api/generate
 *   { choices: [{ message: { content } }] } OpenAI chat completion
 *   { choices: [{ text }] }                 OpenAI completion
 *   { message: { content } }                Ollama /api/chat
 *   { text } / { content }
 */
export function extractResponseText(body: unknown): string | undefined {
  if (!isRecord(body)) return undefined;

  if (typeof body.response === 'string') return body.response;

  if (Array.isArray(body.choices) && body.choices.length > 0) {
    const choice: unknown = body.choices[0];
    if (isRecord(choice)) {
      if (isRecord(choice.message) && typeof choice.message.content === 'string') return choice.message.content;
      if (typeof choice.text === 'string') return choice.text;
    }
  }

  if (isRecord(body.message) && typeof body.message.content === 'string') return body.message.content;
  if (typeof body.text === 'string') return body.text;
  if (typeof body.content === 'string') return body.content;

  return undefined;
}
