/**
 * Upstream Service Implementation
 *
 * SSOT for all backend communication. Sends the client's request to the
 * backend as-is and hands back the response status, headers and body stream.
 *
 * - one undici Agent per service (connect timeout, connection pooling)
 * - headers/body timeouts per request
 * - no retries: a failed request is reported, never replayed
 */

import { Agent, request as undici } from 'undici';

import { logger } from '../logging/index.js';

import type {
  ProxySettings,
  UpstreamRequest,
  UpstreamResponse,
  UpstreamService,
} from './contracts.js';

type UpstreamTimeouts = Pick<ProxySettings, 'connectTimeoutMs' | 'headersTimeoutMs' | 'bodyTimeoutMs'>;

const REDACTED_HEADERS = new Set(['authorization', 'proxy-authorization', 'api-key', 'x-api-key', 'cookie']);

class UpstreamServiceImpl implements UpstreamService {
  private readonly agent: Agent;
  private readonly timeouts: UpstreamTimeouts;

  constructor(timeouts: UpstreamTimeouts) {
    this.timeouts = timeouts;
    this.agent = new Agent({
      connect: { timeout: timeouts.connectTimeoutMs },
    });
  }

  private logRequest(upstreamRequest: UpstreamRequest): void {
    logger.debug(`[UPSTREAM REQUEST] ${upstreamRequest.method} ${upstreamRequest.url} (${upstreamRequest.body?.length ?? 0} bytes)`);

    const loggedHeaders: Record<string, string | string[]> = {};
    for (const [name, value] of Object.entries(upstreamRequest.headers)) {
      loggedHeaders[name] = REDACTED_HEADERS.has(name) ? '********' : value;
    }
    logger.debug('[UPSTREAM REQUEST] Headers:', JSON.stringify(loggedHeaders));
  }

  async forward(upstreamRequest: UpstreamRequest): Promise<UpstreamResponse> {
    this.logRequest(upstreamRequest);

    const response = await undici(upstreamRequest.url, {
      method: upstreamRequest.method,
      headers: upstreamRequest.headers,
      body: upstreamRequest.body,
      dispatcher: this.agent,
      headersTimeout: this.timeouts.headersTimeoutMs,
      bodyTimeout: this.timeouts.bodyTimeoutMs,
    });

    logger.debug(
      `[UPSTREAM RESPONSE] ${response.statusCode} from ${upstreamRequest.url} (content-type: ${String(response.headers['content-type'] ?? 'none')})`
    );

    return {
      statusCode: response.statusCode,
      headers: response.headers,
      body: response.body,
    };
  }

  async close(): Promise<void> {
    await this.agent.close();
  }
}

export function createUpstreamService(timeouts: UpstreamTimeouts): UpstreamService {
  return new UpstreamServiceImpl(timeouts);
}
