/**
 * Central type exports
 */

export type {
  ApiFamily,
  BackendTarget,
  Chunk,
  MetricsRecord,
  MetricsStatus,
  OpenAIFraming,
  ParseResult,
  ParseStatus,
  ParserSelection,
  ParserVariant,
  ProxyRoute,
  RequestDescriptor,
  TokenUsage,
} from './metrics.js';

export type { OllamaStreamUnit } from './ollama.js';

export type {
  OpenAIStreamUnit,
  OpenAIUsage,
} from './openai.js';
export { OPENAI_DONE_SENTINEL } from './openai.js';
