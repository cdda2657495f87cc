/**
 * BaseUsageParser - Abstract base class for incremental usage parsers
 *
 * Handles what every variant shares:
 * - framing raw chunks into complete units (the subclass picks the framer)
 * - counting malformed units
 * - first-match-wins finalization
 * - building the terminal ParseResult exactly once
 *
 * Subclasses only decide what a unit means.
 */

import { logger } from "../../../logging/index.js";

import type { ParseResult, ParserVariant, TokenUsage } from "../../../types/index.js";
import type { UnitFramer } from "../components/index.js";

/** Why the parser is being finished */
export type FinishReason = "end" | "truncated";

const NO_USAGE: TokenUsage = { promptTokens: null, completionTokens: null };

const PREVIEW_CHARS = 120;

export abstract class BaseUsageParser {
  abstract readonly variant: ParserVariant;
  protected abstract readonly parserName: string;

  private usage: TokenUsage | null = null;
  private ended = false;
  private malformedUnits = 0;
  private result: ParseResult | null = null;

  /**
   * Framer for this variant, or null when the parser never looks at bytes.
   */
  protected abstract readonly framer: UnitFramer | null;

  /**
   * Interpret one complete unit. Called in stream order until the parser
   * finalizes.
   */
  protected abstract handleUnit(unit: string): void;

  /**
   * Consume one chunk. Ignored once a completion marker has been seen.
   */
  feed(data: Buffer): void {
    if (this.isFinalized() || this.framer === null) {
      return;
    }

    for (const unit of this.framer.push(data)) {
      this.handleUnit(unit);
      if (this.isFinalized()) {
        return;
      }
    }
  }

  /**
   * Terminal value. Idempotent: later calls return the first result.
   *
   * On a normal end the framer's remaining bytes are parsed as a last unit;
   * after truncation they are not, since bytes are missing in between.
   */
  finish(reason: FinishReason = "end"): ParseResult {
    if (this.result !== null) {
      return this.result;
    }

    if (reason === "end" && !this.isFinalized() && this.framer !== null) {
      for (const unit of this.framer.flush()) {
        this.handleUnit(unit);
        if (this.isFinalized()) {
          break;
        }
      }
    }

    const usage = this.usage ?? NO_USAGE;
    this.result = {
      variant: this.variant,
      status: this.usage !== null ? "complete" : "partial",
      usage,
      malformedUnits: this.malformedUnits,
      truncated: reason === "truncated",
    };

    logger.debug(
      `[${this.parserName}] Finished (${reason}): status=${this.result.status}, prompt_tokens=${usage.promptTokens}, completion_tokens=${usage.completionTokens}, malformed=${this.malformedUnits}`
    );

    return this.result;
  }

  /** False for parsers that never look at the bytes */
  get inspectsBody(): boolean {
    return this.framer !== null;
  }

  /** A completion marker (or terminal sentinel) has been seen */
  isFinalized(): boolean {
    return this.usage !== null || this.ended;
  }

  /** Record usage from the first completion marker; later calls are ignored */
  protected recordUsage(usage: TokenUsage): void {
    if (this.isFinalized()) {
      return;
    }
    this.usage = usage;
  }

  /** Stream ended by its own protocol before any usage was recorded */
  protected markEnded(): void {
    this.ended = true;
  }

  /**
   * Parse a unit as JSON; on failure the unit is counted and undefined returned.
   */
  protected parseJson(unit: string): unknown {
    try {
      return JSON.parse(unit);
    } catch (error: unknown) {
      this.countMalformed(unit, error instanceof Error ? error.message : String(error));
      return undefined;
    }
  }

  protected countMalformed(unit: string, reason: string): void {
    this.malformedUnits += 1;
    const preview = unit.length > PREVIEW_CHARS ? `${unit.slice(0, PREVIEW_CHARS)}...` : unit;
    logger.warn(`[${this.parserName}] Skipping malformed unit (${reason}): ${preview}`);
  }

  /** Oversized units never reach handleUnit; the framer reports them here */
  protected readonly onOversize = (size: number): void => {
    this.malformedUnits += 1;
    logger.warn(`[${this.parserName}] Skipping oversized unit (${size}+ bytes)`);
  };
}
