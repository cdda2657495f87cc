import type { OpenAIStreamUnit } from "../../types/openai.js";

export interface OpenAIStreamOptions {
  model?: string;
  words?: string[];
  promptTokens?: number;
  completionTokens?: number;
  /** Emit the trailing usage event (stream_options.include_usage) */
  includeUsage?: boolean;
}

/**
 * Payloads of a chat completion stream: one delta per word, an optional usage
 * event, without the `[DONE]` sentinel.
 */
export function buildOpenAIUnits(options: OpenAIStreamOptions = {}): OpenAIStreamUnit[] {
  const {
    model = "gpt-4o-mini",
    words = ["Hi", " there", "!"],
    promptTokens = 12,
    completionTokens = 40,
    includeUsage = true,
  } = options;

  const base = { id: "chatcmpl-test", object: "chat.completion.chunk", created: 1_700_000_000, model };

  const units: OpenAIStreamUnit[] = words.map((word) => ({
    ...base,
    choices: [{ index: 0, delta: { content: word }, finish_reason: null }],
    usage: null,
  }));

  units.push({
    ...base,
    choices: [{ index: 0, delta: {}, finish_reason: "stop" }],
    usage: null,
  });

  if (includeUsage) {
    units.push({
      ...base,
      choices: [],
      usage: { prompt_tokens: promptTokens, completion_tokens: completionTokens, total_tokens: promptTokens + completionTokens },
    });
  }

  return units;
}

export function toSSE(units: unknown[], done: boolean = true): string {
  const events = units.map((unit) => `data: ${JSON.stringify(unit)}\n\n`);
  if (done) {
    events.push("data: [DONE]\n\n");
  }
  return events.join("");
}
