/**
 * API Endpoint Constants - SSOT for all API routes
 *
 * All endpoint references must import from this file.
 */

/**
 * Routes served by the proxy itself
 */
export const PROXY_ENDPOINTS = {
  /** Status document */
  ROOT: '/',

  /** Liveness check */
  HEALTH: '/health',

  /** Mount point of `/proxy/{port}/{path...}` */
  PROXY: '/proxy',
} as const;

/**
 * Ollama API Endpoints
 * https://github.com/ollama/ollama/blob/main/docs/api.md
 */
export const OLLAMA_ENDPOINTS = {
  /** Chat completions endpoint */
  CHAT: '/api/chat',

  /** Text generation endpoint */
  GENERATE: '/api/generate',
} as const;

/** Endpoints that stream NDJSON unless the request sets `stream: false` */
export const OLLAMA_GENERATION_PATHS: readonly string[] = [OLLAMA_ENDPOINTS.CHAT, OLLAMA_ENDPOINTS.GENERATE];

/**
 * OpenAI API Endpoints
 * https://platform.openai.com/docs/api-reference
 */
export const OPENAI_ENDPOINTS = {
  /** Every OpenAI-compatible route lives under this prefix */
  PREFIX: '/v1/',

  /** Chat completions endpoint */
  CHAT_COMPLETIONS: '/v1/chat/completions',
} as const;

/** Request header a client can set to name the backend's API family */
export const API_FORMAT_HEADER = 'x-api-format';
