import type { OverflowHandler } from "./LineBuffer.js";
import type { UnitFramer } from "./UnitFramer.js";

/**
 * Whole-body framing for non-streamed JSON responses: the only delimiter is
 * end of stream. Bodies larger than `maxUnitBytes` are dropped.
 */
export class DocumentFramer implements UnitFramer {
  private parts: Buffer[] = [];
  private size = 0;
  private oversized = false;
  private readonly maxUnitBytes: number;
  private readonly onOversize: OverflowHandler | undefined;

  constructor(maxUnitBytes: number, onOversize?: OverflowHandler) {
    this.maxUnitBytes = maxUnitBytes;
    this.onOversize = onOversize;
  }

  push(data: Buffer): string[] {
    if (this.oversized) {
      return [];
    }

    if (this.size + data.length > this.maxUnitBytes) {
      this.oversized = true;
      this.parts = [];
      this.onOversize?.(this.size + data.length);
      return [];
    }

    this.parts.push(data);
    this.size += data.length;
    return [];
  }

  flush(): string[] {
    const text = this.oversized || this.size === 0 ? null : Buffer.concat(this.parts, this.size).toString("utf8");
    this.parts = [];
    this.size = 0;
    this.oversized = false;
    return text === null ? [] : [text];
  }
}
