#!/usr/bin/env node
import { Command, CommanderError, InvalidArgumentError, Option } from "commander";
import chalk from "chalk";
import { analyzeIncomingConnections } from "./analyzer/connectionAnalyzer";
import { defaultNamespace, KubeTopologyProvider } from "./analyzer/connections/k8s";
import { renderNetworkPolicyYaml, renderReport, resultToJson } from "./analyzer/connections/render";
import {
  DEFAULT_CONCURRENCY,
  DEFAULT_FQDN_SUFFIX,
  DEFAULT_RESOLVER_NAMESPACE,
  DEFAULT_RESOLVER_SELECTOR,
  DEFAULT_TAIL_LINES,
  DEFAULT_WAIT_FOR_LOGS,
  MAX_WAIT_MS,
  parseDuration,
  readLogLevel
} from "./config";
import { asErrorMessage, UsageError } from "./errors";
import { kubeConnect } from "./kubeClient";
import { createConsoleLogger } from "./logger";

type OutputFormat = "text" | "yaml" | "json";

type CliOptions = {
  namespace?: string;
  suggestNetpol: boolean;
  concurrency: number;
  waitForLogs: number;
  resolverNamespace: string;
  resolverSelector: string;
  fqdnSuffix: string;
  tailLines: number;
  output: OutputFormat;
};

function positiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) throw new InvalidArgumentError("must be a positive integer");
  return n;
}

function duration(value: string): number {
  let ms: number;
  try {
    ms = parseDuration(value);
  } catch (e) {
    throw new InvalidArgumentError(asErrorMessage(e));
  }
  if (ms > MAX_WAIT_MS) throw new InvalidArgumentError("must not exceed 596h");
  return ms;
}

export function createProgram(): Command {
  return new Command("kubecallers")
    .description(
      "Shows which pods are connecting to <pod-name>, based on the cluster DNS resolver logs,\n" +
        "and suggests a NetworkPolicy that allows those incoming connections."
    )
    .version("0.1.0")
    .argument("<pod-name>", "pod whose callers to discover")
    .option("-n, --namespace <ns>", "namespace where the pod exists (default: current kube context namespace)")
    .option("-s, --suggest-netpol", "suggest a NetworkPolicy", false)
    .option("-c, --concurrency <n>", "connection events per correlation segment", positiveInt, DEFAULT_CONCURRENCY)
    .option(
      "-w, --wait-for-logs <duration>",
      `how long to wait for relevant resolver logs (default: ${DEFAULT_WAIT_FOR_LOGS})`,
      duration,
      parseDuration(DEFAULT_WAIT_FOR_LOGS)
    )
    .option("--resolver-namespace <ns>", "namespace of the cluster DNS pods", DEFAULT_RESOLVER_NAMESPACE)
    .option("--resolver-selector <selector>", "label selector of the cluster DNS pods", DEFAULT_RESOLVER_SELECTOR)
    .option("--fqdn-suffix <suffix>", "cluster domain suffix of Service names", DEFAULT_FQDN_SUFFIX)
    .option("--tail-lines <n>", "recent log lines inspected while waiting", positiveInt, DEFAULT_TAIL_LINES)
    .addOption(
      new Option("-o, --output <format>", "output format; yaml prints only the NetworkPolicy")
        .choices(["text", "yaml", "json"])
        .default("text")
    )
    .action(async (podName: string, options: CliOptions) => {
      if (!podName.trim()) throw new UsageError("please provide a pod name");

      const logger = createConsoleLogger({ level: readLogLevel(process.env) });
      const kc = await kubeConnect();
      const provider = new KubeTopologyProvider(kc, logger);

      const result = await analyzeIncomingConnections(
        provider,
        {
          podName,
          namespace: defaultNamespace(kc, options.namespace),
          suggestPolicy: options.suggestNetpol || options.output === "yaml",
          concurrency: options.concurrency,
          waitMs: options.waitForLogs,
          resolverNamespace: options.resolverNamespace,
          resolverSelector: options.resolverSelector,
          fqdnSuffix: options.fqdnSuffix,
          tailLines: options.tailLines
        },
        { logger }
      );

      if (options.output === "json") {
        process.stdout.write(JSON.stringify(resultToJson(result), null, 2) + "\n");
      } else if (options.output === "yaml") {
        if (result.networkPolicy) process.stdout.write(renderNetworkPolicyYaml(result.networkPolicy));
      } else {
        process.stdout.write(renderReport(result));
      }
    });
}

export async function main(argv: string[] = process.argv): Promise<number> {
  const program = createProgram().exitOverride();
  try {
    await program.parseAsync(argv);
    return 0;
  } catch (err) {
    if (err instanceof CommanderError) {
      // help and version also arrive here, with exit code 0
      return err.exitCode === 0 ? 0 : 2;
    }
    console.error(chalk.red(asErrorMessage(err)));
    return err instanceof UsageError ? 2 : 1;
  }
}

if (require.main === module) {
  main().then((code) => {
    process.exitCode = code;
  }, (err: unknown) => {
    console.error(chalk.red(asErrorMessage(err)));
    process.exitCode = 1;
  });
}
