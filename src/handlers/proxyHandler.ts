/**
 * Proxy handler - `ANY /proxy/{port}/{path...}`
 *
 * Thin HTTP adapter around the request pipeline:
 * resolve backend -> read body -> extract descriptor -> forward ->
 * tee {client, parser} -> aggregate -> emit.
 */

import { logger, logRequest, logResponse } from "../logging/index.js";
import {
  formatDetectionService,
  HTTP_METHODS,
  MetricsAggregator,
  requestDescriptorService,
} from "../services/index.js";
import { buildForwardHeaders, copyResponseHeaders, readRawBody, sendClientError, sendProxyError } from "../utils/http/index.js";
import { buildUpstreamUrl, parseProxyRoute } from "../utils/url/index.js";

import { ChunkChannel } from "./stream/components/index.js";
import { drainToParser, type ParserPacer } from "./stream/parserTask.js";
import { createUsageParser } from "./stream/processors/index.js";
import { teeStream } from "./streamingHandler.js";

import type {
  HttpMethod,
  MetricsSink,
  ProxySettings,
  UpstreamResponse,
  UpstreamService,
} from "../services/index.js";
import type { Request, Response } from "express";

export interface ProxyHandlerDeps {
  sink: MetricsSink;
  settings: ProxySettings;
  upstream: UpstreamService;
  /** Awaited before the parser consumes each chunk */
  pacer?: ParserPacer | undefined;
}

const isHttpMethod = (method: string): method is HttpMethod =>
  HTTP_METHODS.some((candidate) => candidate === method);

const firstHeader = (value: string | string[] | number | undefined): string | undefined => {
  if (Array.isArray(value)) {
    return value[0];
  }
  return value === undefined ? undefined : String(value);
};

export function createProxyHandler(deps: ProxyHandlerDeps): (req: Request, res: Response) => Promise<void> {
  const { sink, settings, upstream, pacer } = deps;

  return async function proxyHandler(req: Request, res: Response): Promise<void> {
    const startedAt = Date.now();

    // Mounted at /proxy, so req.url is `/{port}/{path...}?{query}`
    const route = parseProxyRoute(req.url, settings.upstreamHost);
    if (route === null) {
      sendClientError(res, 400, "Bad Request", `Invalid proxy path: ${req.originalUrl}. Expected /proxy/{port}/{path} with a port between 1 and 65535`);
      return;
    }

    const method = req.method.toUpperCase();
    if (!isHttpMethod(method)) {
      res.setHeader("Allow", HTTP_METHODS.join(", "));
      sendClientError(res, 405, "Method Not Allowed", `Method ${method} cannot be proxied`);
      return;
    }

    const backend = `${route.target.host}:${route.target.port}`;

    let body: Buffer;
    try {
      body = await readRawBody(req);
    } catch (error: unknown) {
      logger.warn(`[PROXY] Could not read request body for ${req.originalUrl}`);
      const aggregator = new MetricsAggregator(
        requestDescriptorService.extractDescriptor(Buffer.alloc(0), route.upstreamPath),
        { sink }
      );
      await aggregator.fail(error);
      return;
    }

    const descriptor = requestDescriptorService.extractDescriptor(body, route.upstreamPath, settings.maxPromptChars);
    const family = formatDetectionService.detectApiFamily(route.upstreamPath, req.headers);
    const aggregator = new MetricsAggregator(descriptor, { sink });

    logRequest({ method, url: req.originalUrl, backend, model: descriptor.model, stream: descriptor.streamRequested });

    aggregator.begin();

    let upstreamResponse: UpstreamResponse;
    try {
      upstreamResponse = await upstream.forward({
        method,
        url: buildUpstreamUrl(route),
        headers: buildForwardHeaders(req.headers),
        body: body.length > 0 ? body : null,
      });
    } catch (error: unknown) {
      const httpError = sendProxyError(res, error, `PROXY ${backend}`);
      logResponse({ status: httpError.statusCode, backend, durationMs: Date.now() - startedAt });
      await aggregator.fail(error);
      return;
    }

    const selection = formatDetectionService.detectParserSelection(
      firstHeader(upstreamResponse.headers["content-type"]),
      family
    );
    logger.debug(`[PROXY] ${backend} parsing response as ${selection.variant}`);

    const parser = createUsageParser(selection, settings.maxUnitBytes);
    const channel = new ChunkChannel(settings.parserQueueBytes);

    res.status(upstreamResponse.statusCode);
    copyResponseHeaders(upstreamResponse.headers, res);
    res.flushHeaders();

    const parsing = drainToParser(channel, parser, pacer);
    const tee = await teeStream(upstreamResponse.body, res, channel);

    if (tee.outcome === "error") {
      // Recorded at the failure point; the parser task was stopped by the channel
      await aggregator.fail(tee.error);
      logResponse({ status: upstreamResponse.statusCode, backend, durationMs: Date.now() - startedAt, outcome: tee.outcome, bytes: tee.bytes });
      await parsing;
      return;
    }

    const parsed = await parsing;

    logResponse({
      status: upstreamResponse.statusCode,
      backend,
      durationMs: Date.now() - startedAt,
      outcome: tee.outcome,
      bytes: tee.bytes,
      parser: parsed.variant,
    });
    logger.debug(`[PROXY] ${backend} relayed ${tee.chunks} chunks`);

    await aggregator.complete(parsed);
  };
}
