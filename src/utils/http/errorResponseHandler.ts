/**
 * Error Response Handler - SSOT for HTTP Error Handling
 *
 * - upstream failure -> status mapping
 * - error message extraction
 * - error response formatting
 */

import { logger } from "../../logging/index.js";
import { isRecord, isString } from "../typeGuards.js";

import type { Response } from "express";

/**
 * HTTP error response format
 */
export interface HTTPErrorResponse {
  error: string;
  message: string;
  statusCode: number;
}

const CONNECTION_UNAVAILABLE_CODES = new Set(["ECONNREFUSED", "ENOTFOUND", "EAI_AGAIN", "EHOSTUNREACH"]);
const TIMEOUT_CODES = new Set(["UND_ERR_CONNECT_TIMEOUT", "UND_ERR_HEADERS_TIMEOUT", "ETIMEDOUT"]);

/**
 * Extracts error message from unknown error type
 *
 * Handles Error instances, strings, `{ message }` and `{ error }` shapes
 * (including `{ error: { message } }`) and null/undefined.
 */
export function extractErrorMessage(error: unknown): string {
  if (error === null || error === undefined) {
    return 'Unknown error (empty response)';
  }

  if (error instanceof Error) {
    return error.message || error.name || 'Unknown error';
  }

  if (isString(error)) {
    return error.trim() || 'Unknown error (empty string)';
  }

  if (isRecord(error)) {
    const messageVal = error['message'];
    if (isString(messageVal) && messageVal.trim()) {
      return messageVal.trim();
    }

    const errorProp = error['error'];
    if (isString(errorProp) && errorProp.trim()) {
      return errorProp.trim();
    }
    if (isRecord(errorProp)) {
      const nestedMessage = errorProp['message'];
      if (isString(nestedMessage) && nestedMessage.trim()) {
        return nestedMessage.trim();
      }
    }

    const stringified = JSON.stringify(error);
    if (stringified !== '{}') {
      return `Error details: ${stringified}`;
    }
  }

  return 'Unknown error';
}

/**
 * System or undici error code of `error`, looking through `cause` chains.
 */
export function getErrorCode(error: unknown): string | undefined {
  let current: unknown = error;
  for (let depth = 0; depth < 5 && isRecord(current); depth++) {
    const code = current['code'];
    if (isString(code)) {
      return code;
    }
    current = current['cause'];
  }
  return undefined;
}

/**
 * Maps an upstream forwarding failure to the status the client receives.
 * - connection refused / host not found -> 503
 * - connect or response-headers timeout -> 504
 * - anything else                       -> 502
 */
export function detectUpstreamError(error: unknown): HTTPErrorResponse {
  const errorMessage = extractErrorMessage(error);
  const code = getErrorCode(error);

  if (code !== undefined && CONNECTION_UNAVAILABLE_CODES.has(code)) {
    return {
      error: 'Service Unavailable',
      message: `Cannot connect to backend: ${errorMessage}`,
      statusCode: 503,
    };
  }

  if (code !== undefined && TIMEOUT_CODES.has(code)) {
    return {
      error: 'Gateway Timeout',
      message: `Backend did not respond in time: ${errorMessage}`,
      statusCode: 504,
    };
  }

  return {
    error: 'Bad Gateway',
    message: errorMessage,
    statusCode: 502,
  };
}

/**
 * Reports an upstream failure to the client.
 *
 * Before the response has started the client gets a JSON error body. After
 * that the status line is gone, so the connection is destroyed and the client
 * sees an incomplete response instead of a clean end.
 */
export function sendProxyError(res: Response, error: unknown, context: string): HTTPErrorResponse {
  const httpError = detectUpstreamError(error);
  logger.error(`[${context}] Upstream error (${getErrorCode(error) ?? 'no code'}): ${httpError.message}`);

  if (res.headersSent) {
    if (!res.destroyed) {
      res.destroy();
    }
    return httpError;
  }

  res.status(httpError.statusCode).json({
    error: httpError.error,
    message: httpError.message,
  });
  return httpError;
}

/**
 * Rejects a request before anything is forwarded.
 */
export function sendClientError(res: Response, statusCode: number, error: string, message: string): void {
  logger.warn(`[PROXY] ${statusCode} ${error}: ${message}`);
  res.status(statusCode).json({ error, message });
}
