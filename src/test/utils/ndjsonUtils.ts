import type { OllamaStreamUnit } from "../../types/ollama.js";

export interface OllamaStreamOptions {
  model?: string;
  words?: string[];
  promptEvalCount?: number;
  evalCount?: number;
  /** Use `message` (chat) instead of `response` (generate) */
  chat?: boolean;
}

export const DEFAULT_WORDS = ["Hello", " from", " the", " mock", " backend", "."];

/**
 * Units of an Ollama generation stream: one per word, then the `done` line
 * carrying the counters.
 */
export function buildOllamaUnits(options: OllamaStreamOptions = {}): OllamaStreamUnit[] {
  const {
    model = "llama3",
    words = DEFAULT_WORDS,
    promptEvalCount = 8,
    evalCount = 150,
    chat = false,
  } = options;
  const createdAt = "2024-01-01T00:00:00Z";

  const units: OllamaStreamUnit[] = words.map((word) =>
    chat
      ? { model, created_at: createdAt, message: { role: "assistant", content: word }, done: false }
      : { model, created_at: createdAt, response: word, done: false }
  );

  units.push({
    model,
    created_at: createdAt,
    ...(chat ? { message: { role: "assistant", content: "" } } : { response: "" }),
    done: true,
    done_reason: "stop",
    total_duration: 1_000_000,
    prompt_eval_count: promptEvalCount,
    eval_count: evalCount,
  });

  return units;
}

export function toNdjson(units: unknown[]): string {
  return units.map((unit) => `${JSON.stringify(unit)}\n`).join("");
}
