import type { Readable } from "stream";

/**
 * Reads a whole request body as raw bytes, without decoding or inflating it.
 */
export async function readRawBody(stream: Readable): Promise<Buffer> {
  const chunks: Buffer[] = [];
  return new Promise<Buffer>((resolve, reject) => {
    stream.on("data", (chunk: Buffer | string) => {
      chunks.push(Buffer.from(chunk));
    });
    stream.on("error", (error: Error) => reject(error));
    stream.on("end", () => resolve(Buffer.concat(chunks)));
  });
}
