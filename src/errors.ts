/** Cannot establish a cluster session, or run options are invalid. Fatal. */
export class ConfigError extends Error {
  readonly code = "CONFIG_ERROR";

  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class UsageError extends Error {
  readonly code = "USAGE_ERROR";

  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

/** Target pod, selecting Service or resolver pods could not be found. Fatal. */
export class LookupError extends Error {
  readonly code = "LOOKUP_ERROR";

  constructor(message: string) {
    super(message);
    this.name = "LookupError";
  }
}

export class LogTimeoutError extends Error {
  readonly code = "TIMEOUT_ERROR";

  constructor(
    readonly source: string,
    readonly waitedMs: number
  ) {
    super(`${source}: waited ${formatMs(waitedMs)} for the relevant log to appear but it didn't`);
    this.name = "LogTimeoutError";
  }
}

export class LogParseError extends Error {
  readonly code = "PARSE_ERROR";

  constructor(
    message: string,
    readonly line: string
  ) {
    super(`${message} in the log '${line}'`);
    this.name = "LogParseError";
  }
}

export class LogStreamError extends Error {
  readonly code = "STREAM_ERROR";

  constructor(
    readonly source: string,
    message: string,
    cause?: unknown
  ) {
    super(`${source}: ${message}`, cause === undefined ? undefined : { cause });
    this.name = "LogStreamError";
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function asErrorMessage(e: unknown): string {
  const base = e instanceof Error ? e.message : String(e);
  const details = formatKubernetesHttpError(e);
  return details ? `${base} (${details})` : base;
}

export function httpStatusCode(e: unknown): number | undefined {
  if (!isRecord(e)) return undefined;
  if (typeof e.statusCode === "number") return e.statusCode;
  const response = e.response;
  if (isRecord(response) && typeof response.statusCode === "number") return response.statusCode;
  return undefined;
}

/** Renders client-node `HttpError`s (status code plus the API Status message). */
export function formatKubernetesHttpError(e: unknown): string | undefined {
  if (!isRecord(e)) return undefined;

  const statusCode = httpStatusCode(e);
  const body = e.body;

  if (statusCode === undefined && body === undefined) return undefined;

  const msg = extractKubernetesStatusMessage(body);
  if (statusCode !== undefined && msg) return `HTTP ${statusCode}: ${msg}`;
  if (statusCode !== undefined) return `HTTP ${statusCode}`;
  if (msg) return msg;
  return truncateForLog(safeJson(body), 1200);
}

function extractKubernetesStatusMessage(body: unknown): string | undefined {
  if (body === undefined || body === null || body === "") return undefined;
  if (typeof body === "string") return truncateForLog(body, 1200);
  if (!isRecord(body)) return truncateForLog(String(body), 1200);

  if (typeof body.message === "string" && body.message.trim()) return truncateForLog(body.message, 1200);
  if (typeof body.reason === "string" && body.reason.trim()) return truncateForLog(body.reason, 1200);

  const status = body.status;
  if (isRecord(status) && typeof status.message === "string" && status.message.trim()) {
    return truncateForLog(status.message, 1200);
  }

  return undefined;
}

function safeJson(v: unknown): string {
  try {
    return JSON.stringify(v);
  } catch {
    return String(v);
  }
}

function truncateForLog(s: string, max: number): string {
  if (s.length <= max) return s;
  return s.slice(0, max) + "...";
}

export function formatMs(ms: number): string {
  if (ms % 1000 === 0) return `${ms / 1000}s`;
  return `${ms}ms`;
}
