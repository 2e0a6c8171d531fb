import * as k8s from "@kubernetes/client-node";
import { PassThrough } from "node:stream";
import { asErrorMessage, httpStatusCode, LogStreamError, LookupError } from "../../errors";
import { Logger, noopLogger } from "../../logger";
import { linesFromReadable, linesFromText } from "./lineStream";
import {
  ClusterTopologyProvider,
  EndpointsRecord,
  LogLineStream,
  LogStreamOptions,
  PodRecord,
  ServiceRecord
} from "./types";

export function defaultNamespace(kc: k8s.KubeConfig, ns?: string): string {
  return (
    ns ||
    kc.getContextObject(kc.getCurrentContext())?.namespace ||
    "default"
  );
}

export function toPodRecord(pod: k8s.V1Pod): PodRecord {
  return {
    name: pod.metadata?.name ?? "",
    namespace: pod.metadata?.namespace ?? "",
    labels: { ...(pod.metadata?.labels ?? {}) },
    containers: (pod.spec?.containers ?? []).map((c) => c.name)
  };
}

export function toEndpointsRecord(ep: k8s.V1Endpoints, namespace: string): EndpointsRecord {
  return {
    name: ep.metadata?.name ?? "",
    namespace: ep.metadata?.namespace ?? namespace,
    subsets: (ep.subsets ?? []).map((s) => ({
      addresses: (s.addresses ?? []).map((a) => ({
        ip: a.ip,
        targetKind: a.targetRef?.kind,
        targetName: a.targetRef?.name,
        targetNamespace: a.targetRef?.namespace
      }))
    }))
  };
}

export function toServiceRecord(svc: k8s.V1Service, namespace: string): ServiceRecord {
  return {
    name: svc.metadata?.name ?? "",
    namespace: svc.metadata?.namespace ?? namespace,
    selector: { ...(svc.spec?.selector ?? {}) }
  };
}

/** ClusterTopologyProvider backed by the connected kubeconfig. */
export class KubeTopologyProvider implements ClusterTopologyProvider {
  private readonly core: k8s.CoreV1Api;

  constructor(
    private readonly kc: k8s.KubeConfig,
    private readonly logger: Logger = noopLogger
  ) {
    this.core = kc.makeApiClient(k8s.CoreV1Api);
  }

  async getPod(namespace: string, name: string): Promise<PodRecord> {
    try {
      return toPodRecord((await this.core.readNamespacedPod(name, namespace)).body);
    } catch (e) {
      if (httpStatusCode(e) === 404) {
        throw new LookupError(`Pod ${name} not found in namespace ${namespace}`);
      }
      throw e;
    }
  }

  async listNamespaces(): Promise<string[]> {
    const res = await this.core.listNamespace();
    return res.body.items
      .map((n) => n.metadata?.name)
      .filter((n): n is string => !!n);
  }

  async listEndpoints(namespace: string): Promise<EndpointsRecord[]> {
    const res = await this.core.listNamespacedEndpoints(namespace);
    return res.body.items.map((ep) => toEndpointsRecord(ep, namespace));
  }

  async listServices(namespace: string): Promise<ServiceRecord[]> {
    const res = await this.core.listNamespacedService(namespace);
    return res.body.items.map((svc) => toServiceRecord(svc, namespace));
  }

  async listPodsByLabel(namespace: string, selector: string): Promise<PodRecord[]> {
    const res = await this.core.listNamespacedPod(namespace, undefined, undefined, undefined, undefined, selector);
    return res.body.items.map(toPodRecord);
  }

  async streamLogs(namespace: string, podName: string, opts: LogStreamOptions): Promise<LogLineStream> {
    const source = `${namespace}/${podName}`;
    const container = opts.container ?? (await this.getPod(namespace, podName)).containers[0];
    if (!container) {
      throw new LogStreamError(source, "pod has no containers to read logs from");
    }

    if (!opts.follow) {
      try {
        const res = await this.core.readNamespacedPodLog(
          podName,
          namespace,
          container,
          false,            // follow
          undefined,        // insecureSkipTLSVerifyBackend
          undefined,        // limitBytes
          undefined,        // pretty
          undefined,        // previous
          undefined,        // sinceSeconds
          opts.tailLines,
          false             // timestamps
        );
        return linesFromText(typeof res.body === "string" ? res.body : String(res.body ?? ""));
      } catch (e) {
        throw new LogStreamError(source, `couldn't read logs: ${asErrorMessage(e)}`, e);
      }
    }

    const sink = new PassThrough();
    sink.setEncoding("utf8");
    sink.on("error", (err) => this.logger.debug(`${source}: log stream error`, err));

    try {
      // a request that breaks or finishes after the 200 response only reports through `done`
      const done = (err: unknown) => {
        if (err) {
          sink.destroy(err instanceof Error ? err : new Error(String(err)));
        } else if (!sink.writableEnded) {
          sink.end();
        }
      };
      const req = await new k8s.Log(this.kc).log(namespace, podName, container, sink, done, {
        follow: true,
        tailLines: opts.tailLines
      });
      return linesFromReadable(sink, () => req.abort());
    } catch (e) {
      sink.destroy();
      throw new LogStreamError(source, `couldn't open log stream: ${asErrorMessage(e)}`, e);
    }
  }
}
