import { asErrorMessage } from "../../errors";
import { Logger, noopLogger } from "../../logger";
import { labelSetKey, stripNoiseLabels } from "./labels";
import {
  ClusterTopologyProvider,
  HostnameMapping,
  PodRecord,
  PolicyPeer,
  PolicySpec,
  SourceIdentity
} from "./types";

export type PolicySynthesisOptions = {
  provider: Pick<ClusterTopologyProvider, "getPod">;
  logger?: Logger;
};

export type SkippedSource = {
  source: SourceIdentity;
  reason: string;
};

export type PolicySynthesis = {
  spec: PolicySpec;
  skipped: SkippedSource[];
};

/**
 * Builds one ingress rule whose peers are the distinct label sets of every
 * caller in `mapping`.
 */
export async function synthesizePolicy(
  target: Pick<PodRecord, "labels">,
  mapping: HostnameMapping,
  opts: PolicySynthesisOptions
): Promise<PolicySynthesis> {
  const logger = opts.logger ?? noopLogger;

  // a pod reached through several hostnames is fetched once
  const sources = new Map<string, SourceIdentity>();
  for (const callers of mapping.values()) {
    for (const source of callers) {
      const key = `${source.namespace}/${source.podName}`;
      if (!sources.has(key)) sources.set(key, source);
    }
  }

  const ordered = [...sources.values()];
  const fetched = await Promise.allSettled(ordered.map((s) => opts.provider.getPod(s.namespace, s.podName)));

  const peers: PolicyPeer[] = [];
  const peerKeys = new Set<string>();
  const skipped: SkippedSource[] = [];

  fetched.forEach((res, i) => {
    const source = ordered[i];
    if (res.status === "rejected") {
      const reason = asErrorMessage(res.reason);
      logger.warn(`couldn't get pod ${source.namespace}/${source.podName}: ${reason}`);
      skipped.push({ source, reason });
      return;
    }

    const matchLabels = stripNoiseLabels(res.value.labels);
    const key = labelSetKey(matchLabels);
    if (peerKeys.has(key)) return;
    peerKeys.add(key);
    peers.push({ matchLabels });
  });

  return {
    spec: { targetSelectorLabels: stripNoiseLabels(target.labels), peers },
    skipped
  };
}
