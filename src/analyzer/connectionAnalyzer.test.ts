import { describe, expect, it } from "vitest";
import { ConfigError, LookupError } from "../errors";
import { analyzeIncomingConnections } from "./connectionAnalyzer";
import { FakeCluster, FakeClusterState, pod, podEndpoints, recordingLogger } from "./connections/testing/fakeCluster";

const USER_DB = "user-db.sock-shop.svc.cluster.local.";
const CARTS_DB = "carts-db.sock-shop.svc.cluster.local.";

function lookup(clientIp: string, host: string): string {
  return `[INFO] ${clientIp}:40000 - 7 "A IN ${host} udp 53 false 512" NOERROR qr,aa,rd 146 0.0001s`;
}

const coredns = (name: string) => pod("kube-system", name, { "k8s-app": "kube-dns" }, ["coredns"]);

function shop(overrides: Partial<FakeClusterState> = {}): FakeClusterState {
  return {
    pods: [
      pod("sock-shop", "user-db-b8dfb847c-wvkgf", { name: "user-db", "pod-template-hash": "b8dfb847c" }),
      pod("sock-shop", "user-79dddf5cc9-bzvhd", { name: "user", "pod-template-hash": "79dddf5cc9" }),
      pod("sock-shop", "carts-7d9f8b6c5-p2x4r", { name: "carts", "pod-template-hash": "7d9f8b6c5" }),
      coredns("coredns-a"),
      coredns("coredns-b")
    ],
    endpoints: [
      podEndpoints("sock-shop", "user", [["10.42.2.90", "user-79dddf5cc9-bzvhd"]]),
      podEndpoints("sock-shop", "carts", [["10.42.3.10", "carts-7d9f8b6c5-p2x4r"]])
    ],
    services: [
      { name: "user-db", namespace: "sock-shop", selector: { name: "user-db" } },
      { name: "carts-db", namespace: "sock-shop", selector: { name: "carts-db" } }
    ],
    logs: {
      "kube-system/coredns-a": {
        tail: [lookup("10.42.2.90", USER_DB)],
        full: [lookup("10.42.2.90", USER_DB), lookup("10.42.3.10", CARTS_DB), lookup("10.42.3.10", USER_DB)]
      },
      "kube-system/coredns-b": {
        tail: [lookup("10.42.2.90", USER_DB)],
        full: [lookup("10.42.2.90", USER_DB)]
      }
    },
    ...overrides
  };
}

const baseOptions = { podName: "user-db-b8dfb847c-wvkgf", namespace: "sock-shop", waitMs: 1000 };

describe("analyzeIncomingConnections", () => {
  it("finds the callers of the target's services", async () => {
    const logger = recordingLogger();
    const cluster = new FakeCluster(shop());

    const result = await analyzeIncomingConnections(cluster, baseOptions, { logger });

    expect(result.target).toEqual({ name: "user-db-b8dfb847c-wvkgf", namespace: "sock-shop" });
    expect(result.targetFqdns).toEqual([USER_DB]);
    expect(result.resolverPods).toEqual(["kube-system/coredns-a", "kube-system/coredns-b"]);
    expect(result.waitReport.map((o) => o.status)).toEqual(["found", "found"]);
    expect(result.eventCount).toBe(4);
    expect(result.discoveries.map((d) => d.message)).toEqual([
      `pod: user-79dddf5cc9-bzvhd, ns: sock-shop via svc: ${USER_DB}`,
      `pod: carts-7d9f8b6c5-p2x4r, ns: sock-shop via svc: ${USER_DB}`
    ]);
    expect(result.policy).toBeUndefined();
    expect(result.networkPolicy).toBeUndefined();
    expect(result.warnings).toEqual([]);
    expect(cluster.streams.map((s) => [s.source, s.opts.follow, s.opts.container])).toEqual([
      ["kube-system/coredns-a", true, "coredns"],
      ["kube-system/coredns-b", true, "coredns"],
      ["kube-system/coredns-a", false, "coredns"],
      ["kube-system/coredns-b", false, "coredns"]
    ]);
  });

  it("suggests a policy admitting every caller", async () => {
    const cluster = new FakeCluster(shop());

    const result = await analyzeIncomingConnections(cluster, { ...baseOptions, suggestPolicy: true });

    expect(result.policy).toEqual({
      targetSelectorLabels: { name: "user-db" },
      peers: [{ matchLabels: { name: "user" } }, { matchLabels: { name: "carts" } }]
    });
    expect(result.networkPolicy?.metadata?.name).toBe("user-db-b8dfb847c-wvkgf-ingress");
  });

  it("carries on past a quiet resolver and reports it", async () => {
    const cluster = new FakeCluster(
      shop({
        logs: {
          "kube-system/coredns-a": { tail: [lookup("10.42.2.90", USER_DB)], full: [lookup("10.42.2.90", USER_DB)] },
          "kube-system/coredns-b": { tail: ["[INFO] plugin/reload: Running configuration"], full: [] }
        }
      })
    );

    const result = await analyzeIncomingConnections(cluster, { ...baseOptions, waitMs: 20 });

    expect(result.waitReport.map((o) => o.status)).toEqual(["found", "timedOut"]);
    expect(result.warnings).toEqual(["kube-system/coredns-b: waited 20ms for the relevant log to appear but it didn't"]);
    expect(result.discoveries.map((d) => d.source.podName)).toEqual(["user-79dddf5cc9-bzvhd"]);
  });

  it("warns about unparsable lines and unreadable logs", async () => {
    const cluster = new FakeCluster(
      shop({
        logs: {
          "kube-system/coredns-a": {
            tail: [lookup("10.42.2.90", USER_DB)],
            full: ['[INFO] 10.0.0.9:40000 - 1 "A IN .svc.cluster.local. udp" NOERROR qr 1 0.1s', lookup("10.42.2.90", USER_DB)]
          },
          "kube-system/coredns-b": { tail: [lookup("10.42.2.90", USER_DB)], fullError: new Error("unexpected EOF") }
        }
      })
    );

    const result = await analyzeIncomingConnections(cluster, baseOptions);

    expect(result.eventCount).toBe(1);
    expect(result.warnings).toEqual([
      "kube-system/coredns-b: unexpected EOF",
      "1 resolver log line(s) could not be parsed and were skipped"
    ]);
  });

  it("notes callers left out of the policy", async () => {
    const cluster = new FakeCluster(
      shop({ podErrors: { "sock-shop/carts-7d9f8b6c5-p2x4r": new Error("forbidden") } })
    );

    const result = await analyzeIncomingConnections(cluster, { ...baseOptions, suggestPolicy: true });

    expect(result.policy?.peers).toEqual([{ matchLabels: { name: "user" } }]);
    expect(result.warnings).toEqual(["left sock-shop/carts-7d9f8b6c5-p2x4r out of the policy: forbidden"]);
  });

  it("warns that a policy with no peers admits everything", async () => {
    const cluster = new FakeCluster(
      shop({
        logs: {
          "kube-system/coredns-a": { tail: [lookup("10.42.2.90", USER_DB)], full: [] },
          "kube-system/coredns-b": { tail: [lookup("10.42.2.90", USER_DB)], full: [] }
        }
      })
    );

    const result = await analyzeIncomingConnections(cluster, { ...baseOptions, suggestPolicy: true });

    expect(result.policy?.peers).toEqual([]);
    expect(result.networkPolicy?.spec?.ingress).toEqual([{ from: [] }]);
    expect(result.warnings).toEqual([
      "no callers to admit: the suggested NetworkPolicy's empty 'from' list allows ingress from all sources"
    ]);
  });

  it("fails when the target pod does not exist", async () => {
    const cluster = new FakeCluster(shop());
    await expect(
      analyzeIncomingConnections(cluster, { ...baseOptions, podName: "nope" })
    ).rejects.toThrow(new LookupError("Pod nope not found in namespace sock-shop"));
  });

  it("fails when no service selects the target", async () => {
    const cluster = new FakeCluster(shop({ services: [] }));
    await expect(analyzeIncomingConnections(cluster, baseOptions)).rejects.toThrow(
      "no Service in namespace sock-shop selects pod user-db-b8dfb847c-wvkgf; callers can't be found through DNS"
    );
  });

  it("fails when no resolver pods match", async () => {
    const cluster = new FakeCluster(shop());
    await expect(
      analyzeIncomingConnections(cluster, { ...baseOptions, resolverSelector: "k8s-app=coredns" })
    ).rejects.toThrow(new LookupError("no resolver pods matching k8s-app=coredns in namespace kube-system"));
  });

  it("rejects invalid options before touching the cluster", async () => {
    const cluster = new FakeCluster(shop());
    await expect(analyzeIncomingConnections(cluster, { ...baseOptions, concurrency: 0 })).rejects.toBeInstanceOf(
      ConfigError
    );
    expect(cluster.getPodCalls).toEqual([]);
  });
});
