import { asErrorMessage } from "../../errors";
import { Logger, noopLogger } from "../../logger";
import { TopologyIndex } from "./topology";
import { ConnectionEvent, Discovery, HostnameMapping, SourceIdentity } from "./types";

export type CorrelationOptions = {
  index: Pick<TopologyIndex, "resolveSourceIdentity">;
  targetFqdns: ReadonlySet<string>;
  /** events per segment */
  concurrency: number;
  logger?: Logger;
};

export type CorrelationResult = {
  mapping: HostnameMapping;
  discoveries: Discovery[];
  failedSegments: number;
};

type Hit = { hostname: string; source: SourceIdentity };

type SegmentResult = { hits: Hit[]; failed: boolean };

/** Contiguous slices of `size`; the last one holds the remainder. */
export function segmentEvents<T>(events: readonly T[], size: number): T[][] {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError(`segment size must be a positive integer, got ${size}`);
  }
  const segments: T[][] = [];
  for (let from = 0; from < events.length; from += size) {
    segments.push(events.slice(from, from + size));
  }
  return segments;
}

export function discoveryMessage(hostname: string, source: SourceIdentity): string {
  return `pod: ${source.podName}, ns: ${source.namespace} via svc: ${hostname}`;
}

function pairKey(hostname: string, podName: string): string {
  return `${hostname}\u0000${podName}`;
}

/**
 * Folds connection events into hostname -> caller mappings. Segments are
 * resolved independently into local hit lists, then merged in segment order,
 * so the outcome matches a sequential pass over `events`.
 */
export async function correlateConnections(
  events: readonly ConnectionEvent[],
  opts: CorrelationOptions
): Promise<CorrelationResult> {
  const logger = opts.logger ?? noopLogger;
  const segments = segmentEvents(events, opts.concurrency);

  const partials = await Promise.all(segments.map((segment, i) => correlateSegment(segment, i, opts, logger)));

  const mapping: HostnameMapping = new Map();
  const discoveries: Discovery[] = [];
  const seen = new Set<string>();

  for (const partial of partials) {
    for (const { hostname, source } of partial.hits) {
      const key = pairKey(hostname, source.podName);
      if (seen.has(key)) continue;
      seen.add(key);

      const callers = mapping.get(hostname) ?? [];
      callers.push(source);
      mapping.set(hostname, callers);

      const message = discoveryMessage(hostname, source);
      logger.info(message);
      discoveries.push({ hostname, source, message });
    }
  }

  return {
    mapping,
    discoveries,
    failedSegments: partials.filter((p) => p.failed).length
  };
}

async function correlateSegment(
  segment: readonly ConnectionEvent[],
  segmentIndex: number,
  opts: CorrelationOptions,
  logger: Logger
): Promise<SegmentResult> {
  const hits: Hit[] = [];
  const local = new Set<string>();

  for (const event of segment) {
    try {
      const hostname = event.destinationHostname;
      if (!opts.targetFqdns.has(hostname)) continue;

      const source = opts.index.resolveSourceIdentity(event.sourceIP);
      if (!source) continue;

      const key = pairKey(hostname, source.podName);
      if (local.has(key)) continue;
      local.add(key);
      hits.push({ hostname, source });
    } catch (e) {
      logger.error(`segment ${segmentIndex}: stopped at event from ${event.sourceIP}: ${asErrorMessage(e)}`);
      return { hits, failed: true };
    }
  }

  return { hits, failed: false };
}
