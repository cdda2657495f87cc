import os from "os";

import chalk from "chalk";
import stringWidth from "string-width";

import { validateConfig } from "./config.js";
import { PROXY_ENDPOINTS } from "./constants/endpoints.js";
import { logger } from "./logging/index.js";
import { createProxyApp } from "./server/proxyServer.js";
import { configService, JsonLineMetricsSink } from "./services/index.js";

import type { Server } from "http";

validateConfig();

const PROXY_PORT = configService.getProxyPort();
const PROXY_HOST = configService.getProxyHost();

const { app, close } = createProxyApp({ sink: new JsonLineMetricsSink(process.stdout) });

/** First external IPv4 address, for the banner */
function externalAddress(): string {
  const external = Object.values(os.networkInterfaces())
    .flatMap((entries) => entries ?? [])
    .find((entry) => entry.family === "IPv4" && !entry.internal);
  return external?.address ?? "localhost";
}

const BANNER_WIDTH = 51;
const frame = chalk.bold.blue;

/** Centres `text` between the side rails; width ignores colour codes */
function bannerRow(text: string): string {
  const room = Math.max(0, BANNER_WIDTH - 2 - stringWidth(text));
  const left = Math.floor(room / 2);
  return frame("│") + " ".repeat(left) + text + " ".repeat(room - left) + frame("│");
}

const bannerRule = (left: string, right: string): string =>
  frame(left + "─".repeat(BANNER_WIDTH - 2) + right);

function printBanner(server: Server): void {
  const address = server.address();
  const port = address !== null && typeof address === "object" ? address.port : PROXY_PORT;
  const host = address !== null && typeof address === "object" ? address.address : PROXY_HOST;

  const sections: string[][] = [
    [
      chalk.bold.green("LLM Usage Proxy") + chalk.dim(" - token metrics tap"),
      chalk.dim(`Listening on ${host}:${port}`),
      chalk.cyan("Upstream host: ") + chalk.green(configService.getUpstreamHost()),
      ...(configService.isDebugMode() ? [chalk.yellow("Debug logging enabled")] : []),
    ],
    [
      chalk.magenta("Routes:"),
      chalk.cyan(`${PROXY_ENDPOINTS.PROXY}/{port}/{path...}`),
      chalk.cyan(PROXY_ENDPOINTS.HEALTH),
    ],
    [
      chalk.cyan(`Local:   http://localhost:${port}/`),
      chalk.cyan(`Network: http://${externalAddress()}:${port}/`),
    ],
  ];

  logger.info("");
  logger.info(bannerRule("┌", "┐"));
  sections.forEach((rows, index) => {
    if (index > 0) {
      logger.info(bannerRule("├", "┤"));
    }
    rows.forEach((row) => logger.info(bannerRow(row)));
  });
  logger.info(bannerRule("└", "┘") + "\n");
}

const server: Server = app.listen(PROXY_PORT, PROXY_HOST, () => {
  printBanner(server);
});

server.on("error", (error: NodeJS.ErrnoException) => {
  if (error.syscall !== "listen") {
    throw error;
  }

  const bind = `Port ${PROXY_PORT}`;

  switch (error.code) {
    case "EACCES":
      logger.error(`\n[ERROR] ${bind} requires elevated privileges.`);
      process.exit(1);
      break;
    case "EADDRINUSE":
      logger.error(`\n[ERROR] ${bind} is already in use.`);
      process.exit(1);
      break;
    default:
      throw error;
  }
});

function shutdown(signal: string): void {
  logger.info(`[SERVER] ${signal} received, closing`);
  server.close((error?: Error) => {
    if (error) {
      logger.error("[SERVER] Error while closing:", error);
    }
    void close()
      .catch((closeError: unknown) => {
        logger.error("[SERVER] Error while releasing upstream connections:", closeError);
      })
      .finally(() => process.exit(error ? 1 : 0));
  });
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
