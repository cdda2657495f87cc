/**
 * Streaming Handler - tees one upstream body into the client response and the
 * metrics parser channel.
 *
 * A single reader loop pulls upstream chunks. Each chunk is offered to the
 * parser channel (never waits) and written to the client (waits only for the
 * client's own drain). The parser's pace therefore never reaches the client;
 * a parser that falls too far behind is cut off by the channel instead.
 */

import { logger } from "../logging/index.js";
import { extractErrorMessage } from "../utils/http/errorResponseHandler.js";

import type { ChunkChannel } from "./stream/components/index.js";
import type { Chunk } from "../types/index.js";
import type { Writable } from "stream";

export type TeeOutcome =
  /** Upstream ended and the client received every byte */
  | "finished"
  /** Upstream ended after the client went away; the parser still saw the body */
  | "client-closed"
  /** Client gone and parser done: upstream released early */
  | "abandoned"
  /** Upstream failed mid-body */
  | "error";

export interface TeeResult {
  outcome: TeeOutcome;
  chunks: number;
  bytes: number;
  error: Error | null;
}

export type UpstreamBody = AsyncIterable<Buffer | Uint8Array | string>;

const toBuffer = (raw: Buffer | Uint8Array | string): Buffer => {
  if (Buffer.isBuffer(raw)) {
    return raw;
  }
  if (typeof raw === "string") {
    return Buffer.from(raw, "utf8");
  }
  return Buffer.from(raw.buffer, raw.byteOffset, raw.byteLength);
};

const toError = (error: unknown): Error =>
  error instanceof Error ? error : new Error(extractErrorMessage(error));

/**
 * Copies `source` to `client` byte-for-byte while feeding `channel`.
 *
 * Resolves once the upstream body is fully consumed, failed, or released. The
 * channel has always left `open` when this resolves, so a consumer draining it
 * terminates; after an upstream failure it stops without the queued chunks.
 */
export async function teeStream(
  source: UpstreamBody,
  client: Writable,
  channel: ChunkChannel
): Promise<TeeResult> {
  let clientGone = client.destroyed;
  let seq = 0;
  let bytes = 0;

  const onClientClose = (): void => {
    if (!client.writableFinished) {
      clientGone = true;
      logger.debug("[STREAM] Client disconnected, continuing to drain upstream for metrics");
    }
  };
  const onClientError = (error: Error): void => {
    logger.debug(`[STREAM] Client socket error: ${error.message}`);
  };
  client.on("close", onClientClose);
  client.on("error", onClientError);

  const waitForDrain = (): Promise<void> =>
    new Promise<void>((resolve) => {
      const done = (): void => {
        client.off("drain", done);
        client.off("close", done);
        resolve();
      };
      client.on("drain", done);
      client.on("close", done);
    });

  const result = (outcome: TeeOutcome, error: Error | null = null): TeeResult => {
    client.off("close", onClientClose);
    return { outcome, chunks: seq, bytes, error };
  };

  try {
    for await (const raw of source) {
      const chunk: Chunk = { seq, data: toBuffer(raw) };
      seq += 1;
      bytes += chunk.data.length;

      channel.offer(chunk);

      if (!clientGone && !client.write(chunk.data)) {
        await waitForDrain();
      }

      if (clientGone && !channel.accepting) {
        // Breaking out of the loop destroys the upstream body
        logger.debug(`[STREAM] Client and parser both done after ${seq} chunks, releasing upstream`);
        channel.close();
        return result("abandoned");
      }
    }
  } catch (error: unknown) {
    const failure = toError(error);
    logger.error(`[STREAM] Upstream body failed after ${bytes} bytes: ${failure.message}`);
    channel.fail(failure);
    if (!client.destroyed) {
      // An incomplete response must not look like a clean end
      client.destroy();
    }
    return result("error", failure);
  }

  channel.close();

  if (clientGone) {
    return result("client-closed");
  }

  client.end();
  return result("finished");
}
