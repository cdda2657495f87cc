export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug: (...args: unknown[]) => void;
  log: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
}

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && LOG_LEVELS.some((level) => level === value);
}

function formatArg(arg: unknown): string {
  if (typeof arg === "string") {
    return arg;
  }
  if (arg instanceof Error) {
    return `${arg.name}: ${arg.message}`;
  }
  if (typeof arg === "object" && arg !== null) {
    try {
      return JSON.stringify(arg);
    } catch {
      return String(arg);
    }
  }
  return String(arg);
}

function write(stream: NodeJS.WriteStream, args: unknown[]): void {
  stream.write(args.map(formatArg).join(" ") + "\n");
}

/**
 * Creates a leveled logger writing to stdout (debug/info) and stderr (warn/error).
 *
 * Accepts either a level name or the legacy debug flag: `true` means "debug",
 * `false` means "info".
 */
export function createLogger(level: LogLevel | boolean = "info"): Logger {
  const threshold = LEVEL_ORDER[typeof level === "boolean" ? (level ? "debug" : "info") : level];
  const enabled = (candidate: LogLevel): boolean => LEVEL_ORDER[candidate] >= threshold;

  const debug = (...args: unknown[]): void => {
    if (enabled("debug")) {
      write(process.stdout, args);
    }
  };

  return {
    debug,
    log: debug,
    info: (...args: unknown[]) => {
      if (enabled("info")) {
        write(process.stdout, args);
      }
    },
    warn: (...args: unknown[]) => {
      if (enabled("warn")) {
        write(process.stderr, args);
      }
    },
    error: (...args: unknown[]) => {
      if (enabled("error")) {
        write(process.stderr, args);
      }
    },
  };
}
