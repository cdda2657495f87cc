/**
 * SseEventFramer - Server-Sent Events framing
 *
 * Follows the event-stream line rules:
 * - an empty line dispatches the pending event
 * - lines starting with `:` are comments
 * - `data:` values (one optional leading space removed) accumulate, joined by `\n`
 * - `event:`, `id:`, `retry:` and unknown fields are ignored
 * - `\r\n` line endings are accepted
 *
 * Each unit returned is the joined `data` payload of one event. An event still
 * open when the stream ends is dispatched by flush().
 */

import { LineBuffer, type OverflowHandler } from "./LineBuffer.js";
import { decodeLine, type UnitFramer } from "./UnitFramer.js";

export class SseEventFramer implements UnitFramer {
  private readonly lines: LineBuffer;
  private readonly maxUnitBytes: number;
  private readonly onOversize: OverflowHandler | undefined;
  private dataLines: string[] = [];
  private dataBytes = 0;
  private oversized = false;

  constructor(maxUnitBytes: number, onOversize?: OverflowHandler) {
    this.lines = new LineBuffer(maxUnitBytes, onOversize, "SSE");
    this.maxUnitBytes = maxUnitBytes;
    this.onOversize = onOversize;
  }

  push(data: Buffer): string[] {
    const events: string[] = [];
    for (const line of this.lines.push(data)) {
      this.handleLine(decodeLine(line), events);
    }
    return events;
  }

  flush(): string[] {
    const events: string[] = [];
    const rest = this.lines.flush();
    if (rest !== null) {
      this.handleLine(decodeLine(rest), events);
    }
    this.dispatch(events);
    return events;
  }

  private handleLine(line: string, events: string[]): void {
    if (line === "") {
      this.dispatch(events);
      return;
    }

    if (line.startsWith(":")) {
      return;
    }

    const colon = line.indexOf(":");
    const field = colon === -1 ? line : line.slice(0, colon);
    if (field !== "data" || this.oversized) {
      return;
    }

    let value = colon === -1 ? "" : line.slice(colon + 1);
    if (value.startsWith(" ")) {
      value = value.slice(1);
    }

    this.dataBytes += Buffer.byteLength(value, "utf8") + 1;
    if (this.dataBytes > this.maxUnitBytes) {
      this.oversized = true;
      this.dataLines = [];
      this.onOversize?.(this.dataBytes);
      return;
    }

    this.dataLines.push(value);
  }

  private dispatch(events: string[]): void {
    if (this.dataLines.length > 0) {
      events.push(this.dataLines.join("\n"));
    }
    this.dataLines = [];
    this.dataBytes = 0;
    this.oversized = false;
  }
}
