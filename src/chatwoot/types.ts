import { z } from 'zod';

export type MessageDirection = 'incoming' | 'outgoing';

const IdSchema = z.union([z.number(), z.string()]);

export const RawMessageSchema = z.object({
  id: IdSchema.nullish(),
  content: z.string().nullish(),
  message_type: z.union([z.number(), z.string()]).nullish(),
  created_at: z.union([z.number(), z.string()]).nullish(),
}).passthrough();

export type RawMessage = z.infer<typeof RawMessageSchema>;

/**
 * Webhook body as posted by the helpdesk. Only the first entry of
 * `messages` is looked at (newest first), so the rest stay unvalidated.
 */
export const InboundEventSchema = z.object({
  event: z.string().nullish(),
  id: IdSchema.nullish(),
  conversation: z.object({ id: IdSchema.nullish() }).passthrough().nullish(),
  messages: z.array(z.unknown()).nullish(),
}).passthrough();

export type InboundEvent = z.infer<typeof InboundEventSchema>;

/**
 * Chatwoot encodes direction as 0/1 in API payloads and as
 * "incoming"/"outgoing" in some webhook payloads. Activity (2) and
 * template (3) messages have no direction.
 */
export function messageDirection(messageType: RawMessage['message_type']): MessageDirection | null {
  if (messageType === 0 || messageType === 'incoming') return 'incoming';
  if (messageType === 1 || messageType === 'outgoing') return 'outgoing';
  return null;
}

export function formatId(id: string | number | null | undefined): string | undefined {
  if (id === null || id === undefined) return undefined;
  const value = String(id).trim();
  return value ? value : undefined;
}
