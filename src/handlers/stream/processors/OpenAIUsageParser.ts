/**
 * OpenAI-compatible Usage Parser
 *
 * Reads `usage` from either framing:
 * - `sse`: chat/completions streams. Each event's `data` payload is one unit;
 *   `[DONE]` ends the stream and is never parsed. Usage normally arrives on
 *   the last event before `[DONE]` (stream_options.include_usage).
 * - `document`: a non-streamed response body, parsed whole at end of stream.
 *
 * The first unit whose `usage` carries integer `prompt_tokens` and
 * `completion_tokens` completes the parse. Units without usage, or with
 * `usage: null`, are skipped.
 */

import { MAX_UNIT_BYTES } from "../../../config.js";
import { OPENAI_DONE_SENTINEL } from "../../../types/index.js";
import { isRecord, toTokenCount } from "../../../utils/typeGuards.js";
import { BaseUsageParser } from "../base/BaseUsageParser.js";
import { DocumentFramer, SseEventFramer, type UnitFramer } from "../components/index.js";

import type { OpenAIFraming } from "../../../types/index.js";

export class OpenAIUsageParser extends BaseUsageParser {
  readonly variant = "openai" as const;
  readonly framing: OpenAIFraming;
  protected readonly parserName: string;
  protected readonly framer: UnitFramer;

  constructor(framing: OpenAIFraming = "sse", maxUnitBytes: number = MAX_UNIT_BYTES) {
    super();
    this.framing = framing;
    this.parserName = framing === "sse" ? "OpenAI SSE Parser" : "OpenAI JSON Parser";
    this.framer = framing === "sse"
      ? new SseEventFramer(maxUnitBytes, this.onOversize)
      : new DocumentFramer(maxUnitBytes, this.onOversize);
  }

  protected handleUnit(unit: string): void {
    const payload = unit.trim();
    if (payload === "") {
      return;
    }

    if (payload === OPENAI_DONE_SENTINEL) {
      this.markEnded();
      return;
    }

    const parsed = this.parseJson(payload);
    if (parsed === undefined) {
      return;
    }

    if (!isRecord(parsed)) {
      this.countMalformed(payload, "not a JSON object");
      return;
    }

    const { usage } = parsed;
    if (!isRecord(usage)) {
      return;
    }

    const promptTokens = toTokenCount(usage.prompt_tokens);
    const completionTokens = toTokenCount(usage.completion_tokens);
    if (promptTokens === null || completionTokens === null) {
      return;
    }

    this.recordUsage({ promptTokens, completionTokens });
  }
}
