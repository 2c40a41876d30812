import { InboundEventSchema, RawMessageSchema, formatId, messageDirection } from '../chatwoot/types.js';
import { isRecord } from '../utils/guards.js';
import { ignored, failed, type ActionableMessage, type PipelineStop } from './types.js';

const MESSAGE_CREATED = 'message_created';

export type ClassifiedEvent =
  | { actionable: true; message: ActionableMessage }
  | { actionable: false; result: PipelineStop };

/**
 * Decide whether a webhook body warrants a reply. Checks run in a fixed order
 * and the first one that fails decides the outcome.
 */
export function classifyEvent(payload: unknown): ClassifiedEvent {
  if (!isRecord(payload)) {
    return stop(failed('invalid event payload'));
  }

  // Decided on the raw body: other event types are ignored whatever else they carry.
  if (typeof payload.event !== 'string' || !payload.event.includes(MESSAGE_CREATED)) {
    return stop(ignored('not a message event'));
  }

  const parsed = InboundEventSchema.safeParse(payload);
  if (!parsed.success) {
    return stop(failed('invalid event payload'));
  }
  const event = parsed.data;

  const first = event.messages?.[0];
  if (first === undefined) {
    return stop(failed('no messages found'));
  }

  const message = RawMessageSchema.safeParse(first);
  if (!message.success) {
    return stop(failed('invalid event payload'));
  }
  const latest = message.data;

  if (messageDirection(latest.message_type) !== 'incoming') {
    return stop(ignored('not an incoming message'));
  }

  const conversationId = formatId(event.id) ?? formatId(event.conversation?.id);
  const content = latest.content?.trim();
  if (!conversationId || !content) {
    return stop(failed('missing required fields'));
  }

  return {
    actionable: true,
    message: { conversationId, content, messageId: formatId(latest.id) },
  };
}

function stop(result: PipelineStop): ClassifiedEvent {
  return { actionable: false, result };
}
