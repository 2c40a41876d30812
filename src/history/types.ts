export interface TranscriptEntry {
  role: 'user' | 'assistant';
  text: string;
}

/** Oldest-first conversation history used as inference context. */
export type Transcript = TranscriptEntry[];
