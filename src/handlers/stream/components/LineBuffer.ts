/**
 * LineBuffer - Byte-level line splitting for stream parsers
 *
 * Holds only the unterminated tail of a byte stream: everything after the last
 * `\n` seen. Lines are cut from the raw bytes, so a multi-byte UTF-8 sequence
 * split across chunks is reassembled before anything is decoded.
 *
 * A line longer than `maxLineBytes` is never materialized: its bytes are
 * dropped as they arrive and scanning resumes after its terminating `\n`.
 */

import { MAX_UNIT_BYTES } from "../../../config.js";
import { logger } from "../../../logging/index.js";

const NEWLINE = 0x0a;

export type OverflowHandler = (droppedBytes: number) => void;

export class LineBuffer {
  private tail: Buffer[] = [];
  private tailSize = 0;
  private discarding = false;
  private readonly maxLineBytes: number;
  private readonly name: string;
  private readonly onOverflow: OverflowHandler | undefined;

  /**
   * @param maxLineBytes - Largest line kept, excluding the `\n`
   * @param onOverflow - Called once per dropped line
   */
  constructor(maxLineBytes: number = MAX_UNIT_BYTES, onOverflow?: OverflowHandler, name: string = "LineBuffer") {
    this.maxLineBytes = maxLineBytes;
    this.onOverflow = onOverflow;
    this.name = name;
  }

  /**
   * Appends a chunk and returns every line it completed, without their `\n`.
   * Returned buffers may be views into `data`; callers must not mutate them.
   */
  push(data: Buffer): Buffer[] {
    const lines: Buffer[] = [];
    let start = 0;
    let newline = data.indexOf(NEWLINE, start);

    while (newline !== -1) {
      const piece = data.subarray(start, newline);

      if (this.discarding) {
        // The oversized line ends here
        this.discarding = false;
      } else if (this.tailSize + piece.length > this.maxLineBytes) {
        this.overflow(this.tailSize + piece.length);
      } else if (this.tailSize === 0) {
        lines.push(piece);
      } else {
        lines.push(Buffer.concat([...this.tail, piece], this.tailSize + piece.length));
      }

      this.clearTail();
      start = newline + 1;
      newline = data.indexOf(NEWLINE, start);
    }

    if (start < data.length && !this.discarding) {
      const rest = data.subarray(start);
      if (this.tailSize + rest.length > this.maxLineBytes) {
        this.overflow(this.tailSize + rest.length);
        this.clearTail();
        this.discarding = true;
      } else {
        this.tail.push(rest);
        this.tailSize += rest.length;
      }
    }

    return lines;
  }

  /**
   * Returns the unterminated tail at end of stream, or null when there is none.
   */
  flush(): Buffer | null {
    const wasDiscarding = this.discarding;
    this.discarding = false;

    if (wasDiscarding || this.tailSize === 0) {
      this.clearTail();
      return null;
    }

    const rest = Buffer.concat(this.tail, this.tailSize);
    this.clearTail();
    return rest;
  }

  /** Bytes currently held after the last newline */
  getSize(): number {
    return this.tailSize;
  }

  private clearTail(): void {
    this.tail = [];
    this.tailSize = 0;
  }

  private overflow(size: number): void {
    logger.warn(
      `[LINE BUFFER] ${this.name} dropped a ${size}+ byte line (limit ${this.maxLineBytes} bytes)`
    );
    this.onOverflow?.(size);
  }
}
