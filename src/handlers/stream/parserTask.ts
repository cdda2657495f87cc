/**
 * Parser task - drains the parser branch of the tee.
 *
 * Runs concurrently with the client forwarding loop. The optional pacer is
 * awaited before every chunk; production passes none, tests use it to hold
 * the parser back and force the channel to overflow.
 *
 * A parser that never inspects the body releases the channel straight away,
 * so a disconnected client does not keep the upstream body flowing for it.
 */

import { logger } from "../../logging/index.js";
import { extractErrorMessage } from "../../utils/http/errorResponseHandler.js";

import type { ChunkChannel } from "./components/index.js";
import type { UsageParser } from "./processors/index.js";
import type { Chunk, ParseResult } from "../../types/index.js";

export type ParserPacer = (chunk: Chunk) => Promise<void>;

export async function drainToParser(
  channel: ChunkChannel,
  parser: UsageParser,
  pacer?: ParserPacer
): Promise<ParseResult> {
  if (!parser.inspectsBody) {
    channel.cancel();
    return parser.finish("end");
  }

  try {
    for await (const chunk of channel) {
      if (pacer) {
        await pacer(chunk);
      }

      if (channel.failed) {
        // Upstream broke while this chunk was in flight
        break;
      }

      parser.feed(chunk.data);

      if (parser.isFinalized()) {
        // Nothing after the completion marker matters; stop queueing
        channel.cancel();
        break;
      }
    }
  } catch (error: unknown) {
    logger.error(`[PARSER] ${parser.variant} parser failed, reporting partial usage: ${extractErrorMessage(error)}`);
    channel.cancel();
  }

  return parser.finish(channel.truncated ? "truncated" : "end");
}
