import { MAX_WAIT_MS } from "../../config";
import { asErrorMessage, LogStreamError, LogTimeoutError } from "../../errors";
import { Logger, noopLogger } from "../../logger";
import { LogGrammar } from "./logGrammar";
import { ClusterTopologyProvider, LogLineStream, LogSource, WaitOutcome } from "./types";

export type LogWaitOptions = {
  grammar: Pick<LogGrammar, "isRelevant">;
  waitMs: number;
  tailLines: number;
  logger?: Logger;
  now?: () => number;
};

export function sourceName(source: LogSource): string {
  return `${source.namespace}/${source.podName}`;
}

/**
 * Tails every source concurrently until it shows a relevant line or its
 * deadline passes. Resolves once all sources settled, one outcome per source
 * in input order.
 */
export async function waitForRelevantLogs(
  provider: Pick<ClusterTopologyProvider, "streamLogs">,
  sources: readonly LogSource[],
  opts: LogWaitOptions
): Promise<WaitOutcome[]> {
  const logger = opts.logger ?? noopLogger;
  if (!Number.isInteger(opts.waitMs) || opts.waitMs < 0 || opts.waitMs > MAX_WAIT_MS) {
    throw new RangeError(`wait must be an integer between 0 and ${MAX_WAIT_MS}ms, got ${opts.waitMs}`);
  }
  const outcomes = await Promise.all(sources.map((s) => waitForSource(provider, s, opts)));

  for (const o of outcomes) {
    if (o.status === "found") {
      logger.debug(`${o.source}: relevant logs found after ${o.elapsedMs}ms`);
    } else {
      logger.warn(o.error.message);
    }
  }
  return outcomes;
}

async function waitForSource(
  provider: Pick<ClusterTopologyProvider, "streamLogs">,
  source: LogSource,
  opts: LogWaitOptions
): Promise<WaitOutcome> {
  const logger = opts.logger ?? noopLogger;
  const now = opts.now ?? Date.now;
  const name = sourceName(source);
  const startedAt = now();

  let stream: LogLineStream | undefined;
  let settled = false;
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<WaitOutcome>((resolve) => {
    timer = setTimeout(() => {
      resolve({ status: "timedOut", source: name, error: new LogTimeoutError(name, opts.waitMs) });
    }, opts.waitMs);
  });

  const scan = async (): Promise<WaitOutcome> => {
    try {
      logger.debug(`${name}: looking for relevant logs in the resolver pod logs`);
      const opened = await provider.streamLogs(source.namespace, source.podName, {
        follow: true,
        tailLines: opts.tailLines,
        container: source.container
      });
      stream = opened;
      if (settled) opened.close();

      for await (const line of opened) {
        if (opts.grammar.isRelevant(line)) {
          logger.debug(line);
          return { status: "found", source: name, line, elapsedMs: now() - startedAt };
        }
      }
      return {
        status: "streamError",
        source: name,
        error: new LogStreamError(name, "log stream ended before a relevant line appeared")
      };
    } catch (e) {
      const error = e instanceof LogStreamError ? e : new LogStreamError(name, asErrorMessage(e), e);
      return { status: "streamError", source: name, error };
    }
  };

  try {
    return await Promise.race([scan(), deadline]);
  } finally {
    settled = true;
    clearTimeout(timer);
    stream?.close();
  }
}
