/**
 * Configuration Service Implementation
 *
 * SSOT for all configuration. Environment variables are read ONCE at startup.
 * All config access MUST go through this service.
 */

import {
  DEBUG_MODE,
  MAX_PROMPT_CHARS,
  MAX_UNIT_BYTES,
  PARSER_QUEUE_BYTES,
  PROXY_HOST,
  PROXY_PORT,
  UPSTREAM_BODY_TIMEOUT,
  UPSTREAM_CONNECT_TIMEOUT,
  UPSTREAM_HEADERS_TIMEOUT,
  UPSTREAM_HOST,
} from '../config.js';

import type { ConfigService, ProxySettings } from './contracts.js';

class ConfigServiceImpl implements ConfigService {
  getProxyPort(): number {
    return PROXY_PORT;
  }

  getProxyHost(): string {
    return PROXY_HOST;
  }

  getUpstreamHost(): string {
    return UPSTREAM_HOST;
  }

  getProxySettings(): ProxySettings {
    return {
      upstreamHost: UPSTREAM_HOST,
      connectTimeoutMs: UPSTREAM_CONNECT_TIMEOUT,
      headersTimeoutMs: UPSTREAM_HEADERS_TIMEOUT,
      bodyTimeoutMs: UPSTREAM_BODY_TIMEOUT,
      parserQueueBytes: PARSER_QUEUE_BYTES,
      maxUnitBytes: MAX_UNIT_BYTES,
      maxPromptChars: MAX_PROMPT_CHARS,
    };
  }

  isDebugMode(): boolean {
    return DEBUG_MODE;
  }
}

export const configService = new ConfigServiceImpl();
