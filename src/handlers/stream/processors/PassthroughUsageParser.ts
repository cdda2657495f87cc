import { BaseUsageParser } from "../base/BaseUsageParser.js";

/**
 * Unknown backends: bytes are never inspected and the result is always
 * `partial` with null counts.
 */
export class PassthroughUsageParser extends BaseUsageParser {
  readonly variant = "passthrough" as const;
  protected readonly parserName = "Passthrough Parser";
  protected readonly framer = null;

  protected handleUnit(_unit: string): void {
    // No units are ever framed
  }
}
