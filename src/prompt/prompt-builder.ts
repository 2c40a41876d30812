import type { DeskwireConfig } from '../config/schema.js';
import type { Transcript, TranscriptEntry } from '../history/types.js';

export interface Prompt {
  systemMessage: string;
  transcript: Transcript;
  userMessage: string;
  /** Single-blob rendering for completion-style backends. */
  text: string;
}

const HISTORY_HEADER = 'Conversation history:';

/**
 * Assemble the inference prompt. Pure: no I/O, same input gives the same text.
 *
 *   <system message>
 *
 *   Conversation history:      (omitted when the transcript is empty)
 *   User: ...
 *   Assistant: ...
 *
 *   User: <message>
 *   Assistant:
 */
export function buildPrompt(config: DeskwireConfig, transcript: Transcript, userMessage: string): Prompt {
  const systemMessage = config.inference.systemMessage;
  const sections = [systemMessage];

  if (transcript.length > 0) {
    sections.push([HISTORY_HEADER, ...transcript.map(renderEntry)].join('\n'));
  }

  sections.push(`User: ${userMessage}\nAssistant:`);

  return {
    systemMessage,
    transcript: [...transcript],
    userMessage,
    text: sections.join('\n\n'),
  };
}

function renderEntry(entry: TranscriptEntry): string {
  return `${entry.role === 'user' ? 'User' : 'Assistant'}: ${entry.text}`;
}
