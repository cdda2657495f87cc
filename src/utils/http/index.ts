/**
 * HTTP Module
 *
 * HTTP-related utilities for headers, request bodies and error responses.
 */

export { buildForwardHeaders, copyResponseHeaders, isHopByHopHeader } from './headerUtils.js';
export type { ForwardHeaders, ResponseHeaders } from './headerUtils.js';
export { readRawBody } from './streamUtils.js';
export {
  detectUpstreamError,
  extractErrorMessage,
  getErrorCode,
  sendClientError,
  sendProxyError,
} from './errorResponseHandler.js';
export type { HTTPErrorResponse } from './errorResponseHandler.js';
