/**
 * Base Usage Parser Module
 */

export { BaseUsageParser } from "./BaseUsageParser.js";
export type { FinishReason } from "./BaseUsageParser.js";
