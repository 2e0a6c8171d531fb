import * as k8s from "@kubernetes/client-node";
import { parseRunOptions, RunOptionsInput } from "../config";
import { LookupError } from "../errors";
import { Logger, noopLogger } from "../logger";
import { correlateConnections } from "./connections/correlator";
import { harvestConnectionEvents } from "./connections/harvest";
import { createLogGrammar } from "./connections/logGrammar";
import { waitForRelevantLogs } from "./connections/logWaiter";
import { synthesizePolicy } from "./connections/policy";
import { toNetworkPolicy } from "./connections/render";
import { TopologyIndex } from "./connections/topology";
import {
  ClusterTopologyProvider,
  Discovery,
  HostnameMapping,
  LogSource,
  PolicySpec,
  WaitOutcome
} from "./connections/types";

export type ConnectionAnalysisResult = {
  target: { name: string; namespace: string };
  targetFqdns: string[];
  resolverPods: string[];
  waitReport: WaitOutcome[];
  eventCount: number;
  discoveries: Discovery[];
  mapping: HostnameMapping;
  policy?: PolicySpec;
  networkPolicy?: k8s.V1NetworkPolicy;
  warnings: string[];
};

export type ConnectionAnalysisDeps = {
  logger?: Logger;
};

/**
 * Finds the pods that resolved the target's Service names through the
 * cluster DNS and, when asked, the NetworkPolicy that would admit them.
 *
 * Setup failures (missing pod, no selecting Service, no resolver pods,
 * API listing errors) reject. Per-source and per-line failures become
 * warnings on the result.
 */
export async function analyzeIncomingConnections(
  provider: ClusterTopologyProvider,
  rawOptions: RunOptionsInput,
  deps: ConnectionAnalysisDeps = {}
): Promise<ConnectionAnalysisResult> {
  const opts = parseRunOptions(rawOptions);
  const logger = deps.logger ?? noopLogger;
  const grammar = createLogGrammar(opts.fqdnSuffix);
  const warnings: string[] = [];

  const target = await provider.getPod(opts.namespace, opts.podName);

  const index = await TopologyIndex.load(provider, { fqdnSuffix: opts.fqdnSuffix, logger });
  const targetFqdns = index.findTargetServiceFQDNs(target);
  if (targetFqdns.size === 0) {
    throw new LookupError(
      `no Service in namespace ${target.namespace} selects pod ${target.name}; callers can't be found through DNS`
    );
  }
  logger.debug(`looking for lookups of ${[...targetFqdns].join(", ")}`);

  const resolverPods = await provider.listPodsByLabel(opts.resolverNamespace, opts.resolverSelector);
  if (resolverPods.length === 0) {
    throw new LookupError(
      `no resolver pods matching ${opts.resolverSelector} in namespace ${opts.resolverNamespace}`
    );
  }
  const sources: LogSource[] = resolverPods.map((p) => ({
    namespace: p.namespace || opts.resolverNamespace,
    podName: p.name,
    container: p.containers[0]
  }));

  const waitReport = await waitForRelevantLogs(provider, sources, {
    grammar,
    waitMs: opts.waitMs,
    tailLines: opts.tailLines,
    logger
  });
  for (const o of waitReport) {
    if (o.status !== "found") warnings.push(o.error.message);
  }

  const harvest = await harvestConnectionEvents(provider, sources, { grammar, logger });
  for (const e of harvest.streamErrors) warnings.push(e.message);
  if (harvest.parseErrors.length) {
    warnings.push(`${harvest.parseErrors.length} resolver log line(s) could not be parsed and were skipped`);
  }

  const correlation = await correlateConnections(harvest.events, {
    index,
    targetFqdns,
    concurrency: opts.concurrency,
    logger
  });
  if (correlation.failedSegments) {
    warnings.push(`${correlation.failedSegments} correlation segment(s) stopped early; results may be partial`);
  }

  const result: ConnectionAnalysisResult = {
    target: { name: target.name, namespace: target.namespace },
    targetFqdns: [...targetFqdns],
    resolverPods: sources.map((s) => `${s.namespace}/${s.podName}`),
    waitReport,
    eventCount: harvest.events.length,
    discoveries: correlation.discoveries,
    mapping: correlation.mapping,
    warnings
  };

  if (opts.suggestPolicy) {
    logger.info("creating a NetworkPolicy suggestion...");
    const synthesis = await synthesizePolicy(target, correlation.mapping, { provider, logger });
    for (const s of synthesis.skipped) {
      warnings.push(`left ${s.source.namespace}/${s.source.podName} out of the policy: ${s.reason}`);
    }
    if (synthesis.spec.peers.length === 0) {
      warnings.push("no callers to admit: the suggested NetworkPolicy's empty 'from' list allows ingress from all sources");
    }
    result.policy = synthesis.spec;
    result.networkPolicy = toNetworkPolicy(synthesis.spec, target.name);
  }

  return result;
}
