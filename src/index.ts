export { analyzeIncomingConnections } from "./analyzer/connectionAnalyzer";
export type { ConnectionAnalysisResult, ConnectionAnalysisDeps } from "./analyzer/connectionAnalyzer";
export { correlateConnections, segmentEvents } from "./analyzer/connections/correlator";
export { harvestConnectionEvents } from "./analyzer/connections/harvest";
export { defaultNamespace, KubeTopologyProvider } from "./analyzer/connections/k8s";
export { NOISE_LABELS, stripNoiseLabels } from "./analyzer/connections/labels";
export { createLogGrammar } from "./analyzer/connections/logGrammar";
export type { LogGrammar, ParseResult } from "./analyzer/connections/logGrammar";
export { waitForRelevantLogs } from "./analyzer/connections/logWaiter";
export { synthesizePolicy } from "./analyzer/connections/policy";
export { renderNetworkPolicyYaml, renderReport, toNetworkPolicy } from "./analyzer/connections/render";
export { TopologyIndex } from "./analyzer/connections/topology";
export type * from "./analyzer/connections/types";
export { parseDuration, parseRunOptions, RunOptionsSchema } from "./config";
export type { RunOptions, RunOptionsInput } from "./config";
export * from "./errors";
export { kubeConnect } from "./kubeClient";
export { createConsoleLogger, noopLogger } from "./logger";
export type { Logger, LogLevel } from "./logger";
