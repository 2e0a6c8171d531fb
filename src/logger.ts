import chalk from "chalk";

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export type ConsoleLoggerOptions = {
  level?: LogLevel;
  color?: boolean;
  /** Defaults to stderr so stdout only carries the report. */
  sink?: (line: string) => void;
  now?: () => number;
};

const TAGS: Record<LogLevel, string> = {
  debug: "DEBU",
  info: "INFO",
  warn: "WARN",
  error: "ERRO"
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Console logger printing `INFO[0003] message` lines, where the bracket holds
 * whole seconds since the logger was created.
 */
export function createConsoleLogger(opts: ConsoleLoggerOptions = {}): Logger {
  const minRank = LOG_LEVELS.indexOf(opts.level ?? "info");
  const now = opts.now ?? Date.now;
  const startedAt = now();
  const sink = opts.sink ?? ((line: string) => process.stderr.write(line + "\n"));
  const paint = new chalk.Instance({ level: opts.color === false ? 0 : chalk.level });

  const colors: Record<LogLevel, (s: string) => string> = {
    debug: paint.gray,
    info: paint.cyan,
    warn: paint.yellow,
    error: paint.red
  };

  const write = (level: LogLevel, message: string, args: unknown[]) => {
    if (LOG_LEVELS.indexOf(level) < minRank) return;
    const elapsed = Math.floor((now() - startedAt) / 1000);
    const stamp = String(elapsed).padStart(4, "0");
    const extra = args.length ? " " + args.map(formatArg).join(" ") : "";
    sink(`${colors[level](TAGS[level])}[${stamp}] ${message}${extra}`);
  };

  return {
    debug: (message, ...args) => write("debug", message, args),
    info: (message, ...args) => write("info", message, args),
    warn: (message, ...args) => write("warn", message, args),
    error: (message, ...args) => write("error", message, args)
  };
}

function formatArg(arg: unknown): string {
  if (arg instanceof Error) return arg.message;
  if (typeof arg === "string") return arg;
  try {
    return JSON.stringify(arg);
  } catch {
    return String(arg);
  }
}

export const noopLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined
};
