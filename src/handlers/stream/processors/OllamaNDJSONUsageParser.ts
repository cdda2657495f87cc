/**
 * Ollama NDJSON Usage Parser
 *
 * `/api/generate` and `/api/chat` stream one JSON object per line. Token
 * counters only appear on the final object, the one with `done: true`:
 * - prompt_eval_count -> prompt tokens
 * - eval_count        -> completion tokens
 *
 * Non-streamed responses are a single object without a trailing newline; the
 * framer hands that over as the last unit at end of stream.
 */

import { MAX_UNIT_BYTES } from "../../../config.js";
import { isRecord, toTokenCount } from "../../../utils/typeGuards.js";
import { BaseUsageParser } from "../base/BaseUsageParser.js";
import { NdjsonLineFramer } from "../components/index.js";

export class OllamaNDJSONUsageParser extends BaseUsageParser {
  readonly variant = "ollama" as const;
  protected readonly parserName = "Ollama NDJSON Parser";
  protected readonly framer: NdjsonLineFramer;

  constructor(maxUnitBytes: number = MAX_UNIT_BYTES) {
    super();
    this.framer = new NdjsonLineFramer(maxUnitBytes, this.onOversize);
  }

  protected handleUnit(unit: string): void {
    if (unit.trim() === "") {
      return;
    }

    const parsed = this.parseJson(unit);
    if (parsed === undefined) {
      return;
    }

    if (!isRecord(parsed)) {
      this.countMalformed(unit, "not a JSON object");
      return;
    }

    if (parsed.done !== true) {
      return;
    }

    this.recordUsage({
      promptTokens: toTokenCount(parsed.prompt_eval_count),
      completionTokens: toTokenCount(parsed.eval_count),
    });
  }
}
