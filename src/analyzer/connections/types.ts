import type { LogStreamError, LogTimeoutError } from "../../errors";

export type LabelSet = Record<string, string>;

export type PodRecord = {
  name: string;
  namespace: string;
  labels: LabelSet;
  containers: string[];
};

export type EndpointAddressRecord = {
  ip: string;
  targetKind?: string;
  targetName?: string;
  targetNamespace?: string;
};

export type EndpointSubsetRecord = {
  addresses: EndpointAddressRecord[];
};

export type EndpointsRecord = {
  name: string;
  namespace: string;
  subsets: EndpointSubsetRecord[];
};

export type ServiceRecord = {
  name: string;
  namespace: string;
  selector: LabelSet;
};

export type LogStreamOptions = {
  follow: boolean;
  tailLines?: number;
  container?: string;
};

/** Line-oriented log output; `close()` releases the underlying request. */
export interface LogLineStream extends AsyncIterable<string> {
  close(): void;
}

export interface ClusterTopologyProvider {
  getPod(namespace: string, name: string): Promise<PodRecord>;
  listNamespaces(): Promise<string[]>;
  listEndpoints(namespace: string): Promise<EndpointsRecord[]>;
  listServices(namespace: string): Promise<ServiceRecord[]>;
  listPodsByLabel(namespace: string, selector: string): Promise<PodRecord[]>;
  streamLogs(namespace: string, podName: string, opts: LogStreamOptions): Promise<LogLineStream>;
}

export type ConnectionEvent = Readonly<{
  sourceIP: string;
  sourcePort: string;
  destinationHostname: string;
}>;

export type SourceIdentity = Readonly<{
  podName: string;
  namespace: string;
}>;

/** destination hostname -> callers, insertion ordered, unique by podName */
export type HostnameMapping = Map<string, SourceIdentity[]>;

export type Discovery = {
  hostname: string;
  source: SourceIdentity;
  message: string;
};

export type PolicyPeer = {
  matchLabels: LabelSet;
};

export type PolicySpec = {
  targetSelectorLabels: LabelSet;
  peers: PolicyPeer[];
};

export type LogSource = {
  namespace: string;
  podName: string;
  container?: string;
};

export type WaitOutcome =
  | { status: "found"; source: string; line: string; elapsedMs: number }
  | { status: "timedOut"; source: string; error: LogTimeoutError }
  | { status: "streamError"; source: string; error: LogStreamError };
