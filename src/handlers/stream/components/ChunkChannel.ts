/**
 * ChunkChannel - Bounded hand-off from the tee to the metrics parser
 *
 * The producer side (`offer`) never waits: a chunk either fits under the byte
 * limit or the channel switches to `truncated`, drops what it held and refuses
 * everything after. A chunk offered while nothing is queued is always taken,
 * whatever its size, since the consumer is not behind. The consumer side is a
 * single async iterator that drains queued chunks in order and ends once the
 * channel leaves `open` and (for `closed`) its queue is empty.
 */

import { logger } from "../../../logging/index.js";

import type { Chunk } from "../../../types/index.js";

export type ChannelState = "open" | "closed" | "truncated" | "cancelled" | "failed";

export class ChunkChannel implements AsyncIterable<Chunk> {
  private queue: Chunk[] = [];
  private queuedBytes = 0;
  private state: ChannelState = "open";
  private failure: Error | null = null;
  private wake: (() => void) | null = null;
  private readonly maxBytes: number;

  constructor(maxBytes: number) {
    this.maxBytes = maxBytes;
  }

  /** True while offered chunks are still queued for the consumer */
  get accepting(): boolean {
    return this.state === "open";
  }

  get truncated(): boolean {
    return this.state === "truncated";
  }

  get failed(): boolean {
    return this.state === "failed";
  }

  /** Upstream failure passed to fail(), if any */
  get error(): Error | null {
    return this.failure;
  }

  getState(): ChannelState {
    return this.state;
  }

  getQueuedBytes(): number {
    return this.queuedBytes;
  }

  /**
   * Queue a chunk for the consumer. Returns false when the chunk was not
   * queued, either because the channel no longer accepts or because it just
   * overflowed.
   */
  offer(chunk: Chunk): boolean {
    if (this.state !== "open") {
      return false;
    }

    if (this.queuedBytes > 0 && this.queuedBytes + chunk.data.length > this.maxBytes) {
      logger.warn(
        `[CHUNK CHANNEL] Parser fell ${this.queuedBytes + chunk.data.length} bytes behind (limit ${this.maxBytes}), truncating at chunk ${chunk.seq}`
      );
      this.state = "truncated";
      this.clearQueue();
      this.notify();
      return false;
    }

    this.queue.push(chunk);
    this.queuedBytes += chunk.data.length;
    this.notify();
    return true;
  }

  /**
   * End of the upstream body. Already queued chunks are still delivered.
   */
  close(): void {
    if (this.state !== "open") {
      return;
    }
    this.state = "closed";
    this.notify();
  }

  /**
   * Upstream failed mid-body. Queued chunks are discarded so the consumer
   * stops at once; the error is kept for inspection.
   */
  fail(error: Error): void {
    if (this.state === "failed") {
      return;
    }
    this.state = "failed";
    this.failure = error;
    this.clearQueue();
    this.notify();
  }

  /**
   * Consumer is done (parser finalized). Queued chunks are discarded.
   */
  cancel(): void {
    if (this.state === "truncated" || this.state === "cancelled" || this.state === "failed") {
      return;
    }
    this.state = "cancelled";
    this.clearQueue();
    this.notify();
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<Chunk, void, undefined> {
    for (;;) {
      const next = this.queue.shift();
      if (next !== undefined) {
        this.queuedBytes -= next.data.length;
        yield next;
        continue;
      }

      if (this.state !== "open") {
        return;
      }

      await new Promise<void>((resolve) => {
        this.wake = resolve;
      });
    }
  }

  private clearQueue(): void {
    this.queue = [];
    this.queuedBytes = 0;
  }

  private notify(): void {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }
}
