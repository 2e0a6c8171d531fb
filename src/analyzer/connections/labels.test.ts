import { describe, expect, it } from "vitest";
import { labelSetKey, podLabelsMatchSelector, stripNoiseLabels } from "./labels";

describe("stripNoiseLabels", () => {
  it("strips replica-specific labels", () => {
    expect(
      stripNoiseLabels({
        app: "db",
        "pod-template-hash": "abc",
        "controller-revision-hash": "db-5f7",
        "statefulset.kubernetes.io/pod-name": "db-0"
      })
    ).toEqual({ app: "db" });
    expect(stripNoiseLabels(undefined)).toEqual({});
  });
});

describe("labelSetKey", () => {
  it("keys label sets independently of insertion order", () => {
    expect(labelSetKey({ a: "1", b: "2" })).toBe(labelSetKey({ b: "2", a: "1" }));
    expect(labelSetKey({ a: "1" })).not.toBe(labelSetKey({ a: "1", b: "2" }));
    expect(labelSetKey({ a: "1,b" })).not.toBe(labelSetKey({ a: "1", b: "" }));
  });
});

describe("podLabelsMatchSelector", () => {
  it("matches only non-empty selectors", () => {
    expect(podLabelsMatchSelector({ app: "db", tier: "x" }, { app: "db" })).toBe(true);
    expect(podLabelsMatchSelector({ app: "db" }, { app: "web" })).toBe(false);
    expect(podLabelsMatchSelector({ app: "db" }, {})).toBe(false);
    expect(podLabelsMatchSelector(undefined, { app: "db" })).toBe(false);
  });
});
