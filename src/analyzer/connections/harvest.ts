import { asErrorMessage, LogParseError, LogStreamError } from "../../errors";
import { Logger, noopLogger } from "../../logger";
import { LogGrammar } from "./logGrammar";
import { sourceName } from "./logWaiter";
import { ClusterTopologyProvider, ConnectionEvent, LogSource } from "./types";

export type HarvestOptions = {
  grammar: LogGrammar;
  logger?: Logger;
};

export type HarvestResult = {
  events: ConnectionEvent[];
  parseErrors: LogParseError[];
  streamErrors: LogStreamError[];
};

type SourceHarvest = HarvestResult;

/**
 * Reads each source's full log and parses the relevant lines. Events keep
 * source order, then line order.
 */
export async function harvestConnectionEvents(
  provider: Pick<ClusterTopologyProvider, "streamLogs">,
  sources: readonly LogSource[],
  opts: HarvestOptions
): Promise<HarvestResult> {
  const logger = opts.logger ?? noopLogger;
  const perSource = await Promise.all(sources.map((s) => harvestSource(provider, s, opts.grammar, logger)));

  const result: HarvestResult = { events: [], parseErrors: [], streamErrors: [] };
  for (const h of perSource) {
    result.events.push(...h.events);
    result.parseErrors.push(...h.parseErrors);
    result.streamErrors.push(...h.streamErrors);
  }
  logger.debug(`harvested ${result.events.length} connection events from ${sources.length} resolver pods`);
  return result;
}

async function harvestSource(
  provider: Pick<ClusterTopologyProvider, "streamLogs">,
  source: LogSource,
  grammar: LogGrammar,
  logger: Logger
): Promise<SourceHarvest> {
  const name = sourceName(source);
  const out: SourceHarvest = { events: [], parseErrors: [], streamErrors: [] };

  try {
    const stream = await provider.streamLogs(source.namespace, source.podName, {
      follow: false,
      container: source.container
    });
    try {
      for await (const line of stream) {
        if (!grammar.isRelevant(line)) continue;
        const parsed = grammar.parse(line);
        if (parsed.ok) {
          out.events.push(parsed.event);
        } else {
          logger.warn(`${name}: ${parsed.error.message}`);
          out.parseErrors.push(parsed.error);
        }
      }
    } finally {
      stream.close();
    }
  } catch (e) {
    const error = e instanceof LogStreamError ? e : new LogStreamError(name, asErrorMessage(e), e);
    logger.error(error.message);
    out.streamErrors.push(error);
  }

  return out;
}
