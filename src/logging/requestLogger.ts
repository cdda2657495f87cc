import { STATUS_CODES } from "http";

import chalk from "chalk";

import logger from "./logger.js";

type Colour = typeof chalk.red;

const METHOD_COLOURS: Record<string, Colour> = {
  GET: chalk.green,
  HEAD: chalk.green,
  POST: chalk.yellow,
  PUT: chalk.blue,
  PATCH: chalk.cyan,
  DELETE: chalk.red,
};

function statusColour(status: number): Colour {
  if (status >= 500) {return chalk.red;}
  if (status >= 400) {return chalk.yellow;}
  if (status >= 300) {return chalk.cyan;}
  if (status >= 200) {return chalk.green;}
  return chalk.white;
}

export interface ProxiedRequestLog {
  method: string;
  url: string;
  /** `host:port` the request goes to */
  backend: string;
  model: string;
  stream: boolean;
}

export interface ProxiedResponseLog {
  status: number;
  backend: string;
  durationMs: number;
  /** How the body relay ended; absent when no body was relayed */
  outcome?: string;
  bytes?: number;
  parser?: string;
}

export function logRequest(details: ProxiedRequestLog): void {
  const method = (METHOD_COLOURS[details.method] ?? chalk.white)(details.method);
  const model = details.model === "" ? chalk.dim("(no model)") : chalk.magenta(details.model);
  const stream = details.stream ? ` ${chalk.dim("stream")}` : "";

  logger.info(
    `${chalk.blue("➤")} ${chalk.dim(new Date().toISOString())} ${method} ${chalk.cyan(details.url)} ${chalk.dim("->")} ${chalk.yellow(details.backend)} ${model}${stream}`
  );
}

export function logResponse(details: ProxiedResponseLog): void {
  const statusText = statusColour(details.status)(`${details.status} ${STATUS_CODES[details.status] ?? ""}`.trim());

  let output = `${chalk.blue("⮑")} ${statusText} ${chalk.yellow(details.backend)} ${chalk.dim("in")} ${chalk.magenta(`${details.durationMs}ms`)}`;
  if (details.outcome !== undefined) {
    output += ` ${chalk.dim(details.outcome)}`;
  }
  if (details.bytes !== undefined) {
    output += ` ${chalk.dim(`${details.bytes}B`)}`;
  }
  if (details.parser !== undefined) {
    output += ` ${chalk.dim(`via ${details.parser}`)}`;
  }

  logger.info(output);
}
