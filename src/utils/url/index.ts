import type { BackendTarget, ProxyRoute } from "../../types/index.js";

const PORT_SEGMENT = /^\/(\d{1,5})(?=\/|\?|$)/;
const MAX_PORT = 65_535;

/**
 * Resolves the part of a request URL after the `/proxy` mount point
 * (`/{port}/{path...}?{query}`) to a backend and the path to request there.
 * Returns null for a missing or out-of-range port.
 */
export const parseProxyRoute = (mountedUrl: string, upstreamHost: string): ProxyRoute | null => {
  const match = PORT_SEGMENT.exec(mountedUrl);
  const portText = match?.[1];
  if (match === null || portText === undefined) {
    return null;
  }

  const port = Number(portText);
  if (port < 1 || port > MAX_PORT) {
    return null;
  }

  const rest = mountedUrl.slice(match[0].length);
  const upstreamPath = rest.startsWith("/") ? rest : `/${rest}`;

  return {
    target: { host: upstreamHost, port },
    upstreamPath,
  };
};

const formatHost = (host: string): string =>
  host.includes(":") && !host.startsWith("[") ? `[${host}]` : host;

export const getBackendOrigin = (target: BackendTarget): string =>
  `http://${formatHost(target.host)}:${target.port}`;

export const buildUpstreamUrl = (route: ProxyRoute): string =>
  `${getBackendOrigin(route.target)}${route.upstreamPath}`;

/** Path without its query string */
export const stripQuery = (path: string): string => {
  const queryStart = path.indexOf("?");
  return queryStart === -1 ? path : path.slice(0, queryStart);
};
