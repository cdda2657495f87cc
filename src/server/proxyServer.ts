/**
 * Proxy Server
 *
 * Builds the Express application. Kept free of side effects (no listen, no
 * config validation) so tests can mount it on an ephemeral port.
 */

import express, { type Express, type Request, type Response } from "express";

import { PROXY_ENDPOINTS } from "../constants/endpoints.js";
import { createProxyHandler } from "../handlers/proxyHandler.js";
import { logger } from "../logging/index.js";
import { configService, createUpstreamService } from "../services/index.js";

import type { ParserPacer } from "../handlers/stream/parserTask.js";
import type { MetricsSink, ProxySettings, UpstreamService } from "../services/index.js";

export interface ProxyAppOptions {
  sink: MetricsSink;
  /** Overrides for the configured settings */
  settings?: Partial<ProxySettings>;
  /** Custom upstream client; by default one is created from the settings */
  upstream?: UpstreamService;
  /** Awaited before the parser consumes each chunk */
  pacer?: ParserPacer;
}

export interface ProxyApp {
  app: Express;
  settings: ProxySettings;
  /** Releases upstream connections */
  close(): Promise<void>;
}

export function createProxyApp(options: ProxyAppOptions): ProxyApp {
  const settings: ProxySettings = { ...configService.getProxySettings(), ...options.settings };
  const upstream = options.upstream ?? createUpstreamService(settings);

  const app = express();
  app.disable("x-powered-by");

  app.get(PROXY_ENDPOINTS.ROOT, (_req: Request, res: Response) => {
    res.json({
      message: "LLM Usage Proxy is running.",
      status: "OK",
      proxy_route: `${PROXY_ENDPOINTS.PROXY}/{backend_port}/{upstream_path}`,
      upstream_host: settings.upstreamHost,
    });
  });

  app.get(PROXY_ENDPOINTS.HEALTH, (_req: Request, res: Response) => {
    res.json({ status: "OK" });
  });

  // Every method, every path below the mount point; the body is read raw
  app.use(PROXY_ENDPOINTS.PROXY, createProxyHandler({
    sink: options.sink,
    settings,
    upstream,
    pacer: options.pacer,
  }));

  // 404 handler - Express 5 compatible
  app.use((req: Request, res: Response) => {
    logger.warn("[PROXY] 404 Not Found:", req.originalUrl);
    res.status(404).json({
      error: "Endpoint not found",
      message: `This route is not handled by the proxy server. Use ${PROXY_ENDPOINTS.PROXY}/{backend_port}/{upstream_path}.`,
    });
  });

  return {
    app,
    settings,
    close: () => upstream.close(),
  };
}
