import { z } from 'zod';
import { LOG_LEVELS } from '../utils/logger.js';

const ChatwootSchema = z.object({
  baseUrl: z.string().default(''),
  apiToken: z.string().default(''),
  accountId: z.string().default(''),
  timeoutMs: z.number().int().positive().default(15_000),
});

export type ChatwootSettings = z.infer<typeof ChatwootSchema>;

export const INFERENCE_PROVIDERS = ['ollama', 'openai-compatible'] as const;

export type InferenceProviderName = typeof INFERENCE_PROVIDERS[number];

const InferenceSchema = z.object({
  provider: z.enum(INFERENCE_PROVIDERS).default('ollama'),
  endpoint: z.string().default('http://localhost:11434'),
  model: z.string().default('mistral'),
  apiKey: z.string().optional(),
  systemMessage: z.string().default('You are a helpful AI assistant.'),
  timeoutMs: z.number().int().positive().default(120_000),
});

export type InferenceSettings = z.infer<typeof InferenceSchema>;

const HistorySchema = z.object({
  enabled: z.boolean().default(true),
  maxMessages: z.number().int().positive().default(50),
});

const ServerSchema = z.object({
  host: z.string().default('0.0.0.0'),
  port: z.number().int().min(0).max(65_535).default(5000),
});

export const DeskwireConfigSchema = z.object({
  chatwoot: ChatwootSchema.optional().transform(v => ChatwootSchema.parse(v ?? {})),
  inference: InferenceSchema.optional().transform(v => InferenceSchema.parse(v ?? {})),
  history: HistorySchema.optional().transform(v => HistorySchema.parse(v ?? {})),
  server: ServerSchema.optional().transform(v => ServerSchema.parse(v ?? {})),
  logLevel: z.enum(LOG_LEVELS).default('info'),
});

export type DeskwireConfig = z.infer<typeof DeskwireConfigSchema>;

/**
 * Flat view of the settings an operator may change at runtime.
 * Each key maps onto one field of the nested config.
 */
export const UPDATE_FIELDS = [
  'baseUrl',
  'apiToken',
  'accountId',
  'inferenceEndpoint',
  'model',
  'systemMessage',
] as const;

export type UpdateField = typeof UPDATE_FIELDS[number];

export type ConfigUpdate = Partial<Record<UpdateField, string>>;

export const UPDATE_FIELD_PATHS: Record<UpdateField, readonly ['chatwoot' | 'inference', string]> = {
  baseUrl: ['chatwoot', 'baseUrl'],
  apiToken: ['chatwoot', 'apiToken'],
  accountId: ['chatwoot', 'accountId'],
  inferenceEndpoint: ['inference', 'endpoint'],
  model: ['inference', 'model'],
  systemMessage: ['inference', 'systemMessage'],
};
