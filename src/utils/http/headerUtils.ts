/**
 * Header forwarding between client and upstream.
 *
 * Everything is forwarded as received except hop-by-hop headers, which
 * describe a single connection and must not cross the proxy.
 */

import type { IncomingHttpHeaders } from "http";
import type { Response } from "express";

export type ForwardHeaders = Record<string, string | string[]>;

/** Header map as returned by Node or undici for a response */
export type ResponseHeaders = Record<string, string | string[] | number | undefined>;

const HOP_BY_HOP_HEADERS = new Set([
  "connection",
  "keep-alive",
  "proxy-authenticate",
  "proxy-authorization",
  "proxy-connection",
  "te",
  "trailer",
  "transfer-encoding",
  "upgrade",
]);

/** Request-only headers the HTTP client sets itself */
const CLIENT_MANAGED_REQUEST_HEADERS = new Set(["host", "expect"]);

/**
 * Names listed in a `Connection` header are hop-by-hop as well.
 */
function connectionTokens(value: string | string[] | number | undefined): Set<string> {
  if (value === undefined) {
    return new Set();
  }
  const raw = Array.isArray(value) ? value.join(",") : String(value);
  return new Set(
    raw
      .split(",")
      .map((token) => token.trim().toLowerCase())
      .filter((token) => token !== "")
  );
}

export function isHopByHopHeader(name: string): boolean {
  return HOP_BY_HOP_HEADERS.has(name.toLowerCase());
}

/**
 * Client request headers to send upstream.
 */
export function buildForwardHeaders(headers: IncomingHttpHeaders): ForwardHeaders {
  const listed = connectionTokens(headers["connection"]);
  const forwarded: ForwardHeaders = {};

  for (const [name, value] of Object.entries(headers)) {
    const key = name.toLowerCase();
    if (
      value === undefined ||
      isHopByHopHeader(key) ||
      CLIENT_MANAGED_REQUEST_HEADERS.has(key) ||
      listed.has(key)
    ) {
      continue;
    }
    forwarded[key] = value;
  }

  return forwarded;
}

/**
 * Copies upstream response headers onto the client response. Content
 * headers (`content-length`, `content-encoding`) are kept since the body is
 * relayed unchanged.
 */
export function copyResponseHeaders(
  headers: ResponseHeaders,
  res: Response
): void {
  const listed = connectionTokens(headers["connection"]);

  for (const [name, value] of Object.entries(headers)) {
    const key = name.toLowerCase();
    if (value === undefined || isHopByHopHeader(key) || listed.has(key)) {
      continue;
    }
    res.setHeader(key, value);
  }
}
