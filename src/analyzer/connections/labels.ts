import { LabelSet } from "./types";

/** Labels that differ between replicas of the same workload. */
export const NOISE_LABELS: readonly string[] = [
  "pod-template-hash",
  "controller-revision-hash",
  "pod-template-generation",
  "statefulset.kubernetes.io/pod-name",
  "apps.kubernetes.io/pod-index"
];

/** An empty or missing selector matches nothing. */
export function podLabelsMatchSelector(podLabels: LabelSet | undefined, selector: LabelSet | undefined): boolean {
  if (!selector || Object.keys(selector).length === 0) return false;
  if (!podLabels) return false;
  for (const [k, v] of Object.entries(selector)) {
    if (podLabels[k] !== v) return false;
  }
  return true;
}

export function stripNoiseLabels(labels: LabelSet | undefined): LabelSet {
  const out: LabelSet = {};
  for (const [k, v] of Object.entries(labels ?? {})) {
    if (NOISE_LABELS.includes(k)) continue;
    out[k] = v;
  }
  return out;
}

/** Order-independent key: two label sets share a key iff they are equal. */
export function labelSetKey(labels: LabelSet): string {
  const pairs = Object.entries(labels).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return JSON.stringify(pairs);
}
