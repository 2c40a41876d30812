export type PipelineResult =
  | { status: 'success'; message: string }
  | { status: 'ignored'; reason: string }
  | { status: 'error'; reason: string };

/** Terminal outcome reached before a reply was attempted, or a failed dispatch. */
export type PipelineStop = Extract<PipelineResult, { reason: string }>;

/** A webhook event that warrants a reply. */
export interface ActionableMessage {
  conversationId: string;
  content: string;
  messageId?: string;
}

export function ignored(reason: string): PipelineStop {
  return { status: 'ignored', reason };
}

export function failed(reason: string): PipelineStop {
  return { status: 'error', reason };
}
