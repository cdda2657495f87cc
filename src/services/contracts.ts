/**
 * Service Layer Contracts
 *
 * Defines the interfaces between HTTP handlers and the proxy's logic.
 * All handlers MUST use these services instead of directly calling utilities.
 */

import type { UpstreamBody } from '../handlers/streamingHandler.js';
import type {
    ApiFamily,
    MetricsRecord,
    ParserSelection,
    RequestDescriptor,
} from '../types/index.js';
import type { ForwardHeaders, ResponseHeaders } from '../utils/http/headerUtils.js';

/**
 * Per-application settings, resolved from configuration and optionally
 * overridden when an application is built in-process.
 */
export interface ProxySettings {
    upstreamHost: string;
    connectTimeoutMs: number;
    headersTimeoutMs: number;
    bodyTimeoutMs: number;
    parserQueueBytes: number;
    maxUnitBytes: number;
    /** 0 keeps the whole prompt */
    maxPromptChars: number;
}

/**
 * Configuration service - single source for all config
 */
export interface ConfigService {
    getProxyPort(): number;
    getProxyHost(): string;
    getUpstreamHost(): string;
    getProxySettings(): ProxySettings;
    isDebugMode(): boolean;
}

/**
 * Format detection service - chooses the usage parser for a response
 */
export interface FormatDetectionService {
    detectApiFamily(
        upstreamPath: string,
        headers: Record<string, string | string[] | undefined>
    ): ApiFamily | null;

    detectParserSelection(
        contentType: string | undefined,
        family: ApiFamily | null
    ): ParserSelection;
}

/**
 * Request descriptor service - reads model and prompt from a request body
 */
export interface RequestDescriptorService {
    extractDescriptor(
        body: Buffer,
        upstreamPath: string,
        maxPromptChars?: number
    ): RequestDescriptor;
}

export const HTTP_METHODS = ['GET', 'HEAD', 'POST', 'PUT', 'DELETE', 'OPTIONS', 'PATCH'] as const;

export type HttpMethod = typeof HTTP_METHODS[number];

export interface UpstreamRequest {
    method: HttpMethod;
    url: string;
    headers: ForwardHeaders;
    /** null when the client sent no body */
    body: Buffer | null;
}

export interface UpstreamResponse {
    statusCode: number;
    headers: ResponseHeaders;
    body: UpstreamBody;
}

/**
 * Upstream service - sends one request to a backend, no retries
 */
export interface UpstreamService {
    forward(request: UpstreamRequest): Promise<UpstreamResponse>;
    close(): Promise<void>;
}

/**
 * Metrics sink - receives exactly one record per proxied request.
 * Implementations must accept concurrent emits.
 */
export interface MetricsSink {
    emit(record: MetricsRecord): void | Promise<void>;
}
