/**
 * Usage Parsers - one per parser variant
 *
 * All parsers extend BaseUsageParser; `UsageParser` is the closed union the
 * dispatcher works with.
 */

import { MAX_UNIT_BYTES } from "../../../config.js";

import { OllamaNDJSONUsageParser } from "./OllamaNDJSONUsageParser.js";
import { OpenAIUsageParser } from "./OpenAIUsageParser.js";
import { PassthroughUsageParser } from "./PassthroughUsageParser.js";

import type { ParserSelection } from "../../../types/index.js";

export { OllamaNDJSONUsageParser, OpenAIUsageParser, PassthroughUsageParser };

export type UsageParser = OllamaNDJSONUsageParser | OpenAIUsageParser | PassthroughUsageParser;

export function createUsageParser(
  selection: ParserSelection,
  maxUnitBytes: number = MAX_UNIT_BYTES
): UsageParser {
  switch (selection.variant) {
    case "ollama":
      return new OllamaNDJSONUsageParser(maxUnitBytes);
    case "openai":
      return new OpenAIUsageParser(selection.framing, maxUnitBytes);
    case "passthrough":
      return new PassthroughUsageParser();
    default: {
      const unreachable: never = selection;
      throw new Error(`Unknown parser selection: ${JSON.stringify(unreachable)}`);
    }
  }
}
