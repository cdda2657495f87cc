import { Readable, Writable } from "stream";

export const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/** Cuts `data` at the given byte offsets */
export function splitAt(data: Buffer, offsets: number[]): Buffer[] {
  const chunks: Buffer[] = [];
  let start = 0;
  for (const offset of [...offsets].sort((a, b) => a - b)) {
    chunks.push(data.subarray(start, offset));
    start = offset;
  }
  chunks.push(data.subarray(start));
  return chunks.filter((chunk) => chunk.length > 0);
}

/** Fixed-size chunks */
export function chunkEvery(data: Buffer, size: number): Buffer[] {
  const chunks: Buffer[] = [];
  for (let start = 0; start < data.length; start += size) {
    chunks.push(data.subarray(start, start + size));
  }
  return chunks;
}

/** A byte source that yields exactly these chunks, in order */
export function sourceOf(chunks: Buffer[]): Readable {
  return Readable.from(chunks);
}

/** A byte source that yields `chunks` and then fails */
export async function* failingSource(chunks: Buffer[], error: Error): AsyncGenerator<Buffer> {
  for (const chunk of chunks) {
    await sleep(0);
    yield chunk;
  }
  throw error;
}

/**
 * Writable that records everything written to it. A positive `writeDelayMs`
 * makes every write complete late, so the tee sees backpressure.
 */
export class RecordingWritable extends Writable {
  readonly chunks: Buffer[] = [];
  private readonly writeDelayMs: number;

  constructor(options: { writeDelayMs?: number; highWaterMark?: number } = {}) {
    super({ highWaterMark: options.highWaterMark ?? 16 * 1024 });
    this.writeDelayMs = options.writeDelayMs ?? 0;
  }

  _write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    this.chunks.push(Buffer.from(chunk));
    if (this.writeDelayMs > 0) {
      setTimeout(() => callback(), this.writeDelayMs);
    } else {
      callback();
    }
  }

  body(): Buffer {
    return Buffer.concat(this.chunks);
  }
}
