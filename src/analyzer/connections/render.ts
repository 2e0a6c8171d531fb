import * as k8s from "@kubernetes/client-node";
import chalk from "chalk";
import YAML from "yaml";
import type { ConnectionAnalysisResult } from "../connectionAnalyzer";
import { PolicySpec } from "./types";

export function networkPolicyName(targetPodName: string): string {
  return `${targetPodName}-ingress`;
}

export function toNetworkPolicy(spec: PolicySpec, targetPodName: string): k8s.V1NetworkPolicy {
  return {
    apiVersion: "networking.k8s.io/v1",
    kind: "NetworkPolicy",
    metadata: { name: networkPolicyName(targetPodName) },
    spec: {
      podSelector: { matchLabels: { ...spec.targetSelectorLabels } },
      ingress: [
        {
          from: spec.peers.map((p) => ({ podSelector: { matchLabels: { ...p.matchLabels } } }))
        }
      ]
    }
  };
}

export function renderNetworkPolicyYaml(policy: k8s.V1NetworkPolicy): string {
  return YAML.stringify(policy, { indent: 2 });
}

function heading(title: string, paint: chalk.Chalk): string[] {
  return [paint.bold(title), "-".repeat(title.length)];
}

export type ReportOptions = {
  color?: boolean;
};

export function renderReport(result: ConnectionAnalysisResult, opts: ReportOptions = {}): string {
  const paint = new chalk.Instance({ level: opts.color === false ? 0 : chalk.level });
  const lines: string[] = [];

  lines.push(...heading("INCOMING CONNECTIONS", paint));
  if (result.discoveries.length === 0) {
    lines.push(paint.dim(`no incoming connections to ${result.target.namespace}/${result.target.name} found in resolver logs`));
  } else {
    for (const d of result.discoveries) lines.push(d.message);
  }

  if (result.warnings.length) {
    lines.push("");
    lines.push(...heading("WARNINGS", paint));
    for (const w of result.warnings) lines.push(paint.yellow(`- ${w}`));
  }

  if (result.networkPolicy) {
    lines.push("");
    lines.push(...heading("SUGGESTED NetworkPolicy", paint));
    lines.push(renderNetworkPolicyYaml(result.networkPolicy).trimEnd());
  }

  return lines.join("\n") + "\n";
}

/** Plain-object form of the result for `--output json`. */
export function resultToJson(result: ConnectionAnalysisResult): Record<string, unknown> {
  return {
    target: result.target,
    targetFqdns: result.targetFqdns,
    resolverPods: result.resolverPods,
    waitReport: result.waitReport.map((o) =>
      o.status === "found"
        ? { source: o.source, status: o.status, elapsedMs: o.elapsedMs }
        : { source: o.source, status: o.status, error: o.error.message }
    ),
    eventCount: result.eventCount,
    connections: Object.fromEntries(
      [...result.mapping].map(([hostname, callers]) => [hostname, callers.map((c) => ({ ...c }))])
    ),
    ...(result.networkPolicy ? { networkPolicy: result.networkPolicy } : {}),
    warnings: result.warnings
  };
}
