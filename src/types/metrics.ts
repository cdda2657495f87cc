/**
 * Usage Proxy Core Types
 */

/**
 * API family of a backend, derived from the route or declared by the client.
 */
export type ApiFamily = 'ollama' | 'openai';

export type ParserVariant = 'ollama' | 'openai' | 'passthrough';

/**
 * How an OpenAI-compatible body is framed: an event stream, or one JSON document
 * (non-streamed completions).
 */
export type OpenAIFraming = 'sse' | 'document';

/**
 * Parser selection made once per response by the format detector.
 */
export type ParserSelection =
  | { readonly variant: 'ollama' }
  | { readonly variant: 'openai'; readonly framing: OpenAIFraming }
  | { readonly variant: 'passthrough' };

export interface BackendTarget {
  readonly host: string;
  readonly port: number;
}

export interface ProxyRoute {
  readonly target: BackendTarget;
  /** Path and query forwarded verbatim, always starting with `/` */
  readonly upstreamPath: string;
}

export interface RequestDescriptor {
  readonly model: string;
  readonly prompt: string;
  readonly streamRequested: boolean;
}

/**
 * One upstream chunk. `data` is shared read-only between the client and parser branches.
 */
export interface Chunk {
  readonly seq: number;
  readonly data: Buffer;
}

export interface TokenUsage {
  readonly promptTokens: number | null;
  readonly completionTokens: number | null;
}

export type ParseStatus = 'complete' | 'partial';

export type MetricsStatus = ParseStatus | 'error';

/**
 * Terminal value of a parser task.
 */
export interface ParseResult {
  readonly variant: ParserVariant;
  readonly status: ParseStatus;
  readonly usage: TokenUsage;
  /** Units that could not be parsed or exceeded the unit size limit */
  readonly malformedUnits: number;
  /** The tee cut the parser branch off before the stream ended */
  readonly truncated: boolean;
}

/**
 * Record written to the metrics sink, one per proxied request.
 */
export interface MetricsRecord {
  readonly model: string;
  readonly prompt: string;
  readonly prompt_tokens: number | null;
  readonly completion_tokens: number | null;
  readonly latency_ms: number;
  readonly timestamp: string;
  readonly status: MetricsStatus;
}
