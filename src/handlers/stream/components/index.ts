/**
 * Stream Components
 *
 * Framing (bytes -> protocol units) and the bounded parser channel.
 */

export { LineBuffer } from "./LineBuffer.js";
export type { OverflowHandler } from "./LineBuffer.js";
export { decodeLine } from "./UnitFramer.js";
export type { UnitFramer } from "./UnitFramer.js";
export { NdjsonLineFramer } from "./NdjsonLineFramer.js";
export { SseEventFramer } from "./SseEventFramer.js";
export { DocumentFramer } from "./DocumentFramer.js";
export { ChunkChannel } from "./ChunkChannel.js";
export type { ChannelState } from "./ChunkChannel.js";
