/**
 * OpenAI-compatible API Types
 *
 * Only the fields the proxy reads.
 */

export interface OpenAIUsage {
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens?: number;
}

/**
 * One `data:` payload of a chat completion stream, or a whole non-streamed
 * completion. `usage` is absent or null on delta events.
 */
export interface OpenAIStreamUnit {
  id?: string;
  object?: string;
  created?: number;
  model?: string;
  choices?: unknown[];
  usage?: OpenAIUsage | null;
}

/** Payload that terminates an SSE completion stream */
export const OPENAI_DONE_SENTINEL = '[DONE]';
