/**
 * Ollama API Types
 *
 * Only the fields the proxy reads. Everything else in a payload is forwarded
 * untouched and never modelled here.
 */

/**
 * One line of an `/api/generate` or `/api/chat` NDJSON stream.
 * Token counters are only present on the final (`done: true`) line.
 */
export interface OllamaStreamUnit {
  model?: string;
  created_at?: string;
  response?: string;
  message?: { role: string; content: string };
  done?: boolean;
  done_reason?: string;
  total_duration?: number;
  load_duration?: number;
  prompt_eval_count?: number;
  prompt_eval_duration?: number;
  eval_count?: number;
  eval_duration?: number;
}
