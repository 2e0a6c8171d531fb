import { DEFAULT_FQDN_SUFFIX } from "../../config";
import { Logger, noopLogger } from "../../logger";
import { podLabelsMatchSelector } from "./labels";
import {
  ClusterTopologyProvider,
  EndpointsRecord,
  PodRecord,
  ServiceRecord,
  SourceIdentity
} from "./types";

export type TopologySnapshot = {
  namespaces: readonly string[];
  endpoints: ReadonlyMap<string, readonly EndpointsRecord[]>;
  services: ReadonlyMap<string, readonly ServiceRecord[]>;
};

export type TopologyIndexOptions = {
  fqdnSuffix?: string;
  logger?: Logger;
};

/**
 * Point-in-time view of namespaces, endpoints and services. Never refreshed:
 * pods created or rescheduled after the snapshot are unknown to it.
 */
export class TopologyIndex {
  private readonly podsByIp: ReadonlyMap<string, SourceIdentity>;
  private readonly fqdnSuffix: string;

  private constructor(
    private readonly snapshot: TopologySnapshot,
    opts: TopologyIndexOptions
  ) {
    this.fqdnSuffix = opts.fqdnSuffix ?? DEFAULT_FQDN_SUFFIX;
    this.podsByIp = indexPodAddresses(snapshot);
  }

  static fromSnapshot(snapshot: TopologySnapshot, opts: TopologyIndexOptions = {}): TopologyIndex {
    return new TopologyIndex(snapshot, opts);
  }

  static async load(provider: ClusterTopologyProvider, opts: TopologyIndexOptions = {}): Promise<TopologyIndex> {
    const logger = opts.logger ?? noopLogger;
    const namespaces = await provider.listNamespaces();

    const perNamespace = await Promise.all(
      namespaces.map(async (ns) => {
        const [endpoints, services] = await Promise.all([provider.listEndpoints(ns), provider.listServices(ns)]);
        return { ns, endpoints, services };
      })
    );

    const endpoints = new Map<string, EndpointsRecord[]>();
    const services = new Map<string, ServiceRecord[]>();
    for (const { ns, endpoints: eps, services: svcs } of perNamespace) {
      endpoints.set(ns, eps);
      services.set(ns, svcs);
    }

    const index = new TopologyIndex({ namespaces: [...namespaces], endpoints, services }, opts);
    logger.debug(`topology snapshot: ${namespaces.length} namespaces, ${index.addressCount} pod addresses`);
    return index;
  }

  get addressCount(): number {
    return this.podsByIp.size;
  }

  resolveSourceIdentity(ip: string): SourceIdentity | undefined {
    return this.podsByIp.get(ip);
  }

  findTargetServiceFQDNs(pod: PodRecord): ReadonlySet<string> {
    const fqdns = new Set<string>();
    for (const svc of this.snapshot.services.get(pod.namespace) ?? []) {
      if (!podLabelsMatchSelector(pod.labels, svc.selector)) continue;
      fqdns.add(`${svc.name}.${svc.namespace}${this.fqdnSuffix}`);
    }
    return fqdns;
  }
}

/** First Pod-backed address wins, in namespace -> endpoints -> subset -> address order. */
function indexPodAddresses(snapshot: TopologySnapshot): Map<string, SourceIdentity> {
  const byIp = new Map<string, SourceIdentity>();
  for (const ns of snapshot.namespaces) {
    for (const ep of snapshot.endpoints.get(ns) ?? []) {
      for (const subset of ep.subsets) {
        for (const addr of subset.addresses) {
          if (addr.targetKind !== "Pod" || !addr.targetName) continue;
          if (byIp.has(addr.ip)) continue;
          byIp.set(addr.ip, {
            podName: addr.targetName,
            namespace: addr.targetNamespace ?? ep.namespace
          });
        }
      }
    }
  }
  return byIp;
}
