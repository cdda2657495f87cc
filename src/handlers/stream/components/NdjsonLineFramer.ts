import { LineBuffer, type OverflowHandler } from "./LineBuffer.js";
import { decodeLine, type UnitFramer } from "./UnitFramer.js";

/**
 * Newline-delimited JSON: every line is one unit. A final line without a
 * trailing newline is still returned at end of stream.
 */
export class NdjsonLineFramer implements UnitFramer {
  private readonly lines: LineBuffer;

  constructor(maxUnitBytes: number, onOversize?: OverflowHandler) {
    this.lines = new LineBuffer(maxUnitBytes, onOversize, "NDJSON");
  }

  push(data: Buffer): string[] {
    return this.lines.push(data).map(decodeLine);
  }

  flush(): string[] {
    const rest = this.lines.flush();
    return rest === null ? [] : [decodeLine(rest)];
  }
}
