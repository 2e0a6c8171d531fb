import { z } from "zod";
import { ConfigError } from "./errors";
import { isLogLevel, LogLevel } from "./logger";

export const DEFAULT_CONCURRENCY = 4;
export const DEFAULT_WAIT_FOR_LOGS = "60s";
export const DEFAULT_FQDN_SUFFIX = ".svc.cluster.local.";
export const DEFAULT_RESOLVER_NAMESPACE = "kube-system";
export const DEFAULT_RESOLVER_SELECTOR = "k8s-app=kube-dns";
export const DEFAULT_TAIL_LINES = 5;
/** Longest delay a timer accepts (2^31 - 1 ms, a little over 596h). */
export const MAX_WAIT_MS = 2_147_483_647;

export const RunOptionsSchema = z.object({
  podName: z.string().trim().min(1, "please provide a pod name"),
  namespace: z.string().trim().min(1, "namespace must be a non-empty string"),
  suggestPolicy: z.boolean().default(false),
  /** Number of connection events per correlation segment. */
  concurrency: z.number().int().positive().default(DEFAULT_CONCURRENCY),
  /** Per resolver pod deadline for the relevant-log wait. */
  waitMs: z.number().int().nonnegative().max(MAX_WAIT_MS, "wait must not exceed 596h").default(60_000),
  resolverNamespace: z.string().trim().min(1).default(DEFAULT_RESOLVER_NAMESPACE),
  resolverSelector: z.string().trim().min(1).default(DEFAULT_RESOLVER_SELECTOR),
  fqdnSuffix: z
    .string()
    .regex(/^\.\S+\.$/, "FQDN suffix must start and end with '.'")
    .default(DEFAULT_FQDN_SUFFIX),
  tailLines: z.number().int().positive().default(DEFAULT_TAIL_LINES)
});

export type RunOptionsInput = z.input<typeof RunOptionsSchema>;
export type RunOptions = z.output<typeof RunOptionsSchema>;

export function parseRunOptions(input: RunOptionsInput): RunOptions {
  const parsed = RunOptionsSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "options"}: ${i.message}`);
    throw new ConfigError(`invalid options: ${issues.join("; ")}`);
  }
  return parsed.data;
}

const UNIT_MS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60_000,
  h: 3_600_000
};

/**
 * Parses durations such as `300ms`, `60s`, `1m30s`, `1.5h`. A bare `0` is
 * accepted; any other unitless number is rejected.
 */
export function parseDuration(text: string): number {
  const s = text.trim();
  if (s === "0") return 0;

  const re = /(\d+(?:\.\d+)?)(ms|s|m|h)/y;
  let total = 0;
  let pos = 0;
  while (pos < s.length) {
    re.lastIndex = pos;
    const m = re.exec(s);
    if (!m) throw new ConfigError(`invalid duration "${text}" (examples: 500ms, 60s, 1m30s)`);
    total += Number(m[1]) * UNIT_MS[m[2]];
    pos = re.lastIndex;
  }
  if (pos === 0) throw new ConfigError(`invalid duration "${text}" (examples: 500ms, 60s, 1m30s)`);
  return Math.round(total);
}

export function readLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const raw = (env.LOG_LEVEL ?? "").trim().toLowerCase();
  if (!raw) return "info";
  if (raw === "warning") return "warn";
  if (!isLogLevel(raw)) {
    throw new ConfigError(`LOG_LEVEL "${env.LOG_LEVEL}" is not one of debug, info, warn, error`);
  }
  return raw;
}
