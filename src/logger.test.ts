import { describe, expect, it } from "vitest";
import { createConsoleLogger } from "./logger";

function capture(level?: "debug" | "info" | "warn" | "error") {
  const lines: string[] = [];
  let clock = 1_000;
  const logger = createConsoleLogger({
    level,
    color: false,
    sink: (line) => lines.push(line),
    now: () => clock
  });
  return {
    logger,
    lines,
    advance(ms: number) {
      clock += ms;
    }
  };
}

describe("createConsoleLogger", () => {
  it("prefixes lines with a level tag and whole seconds since start", () => {
    const { logger, lines, advance } = capture();
    logger.info("start");
    advance(3_400);
    logger.warn("slow", { pods: 2 });
    advance(10_000);
    logger.error("boom", new Error("stream reset"));

    expect(lines).toEqual(["INFO[0000] start", 'WARN[0003] slow {"pods":2}', "ERRO[0013] boom stream reset"]);
  });

  it("drops messages below the configured level", () => {
    const { logger, lines } = capture("warn");
    logger.debug("d");
    logger.info("i");
    logger.warn("w");
    logger.error("e");

    expect(lines).toEqual(["WARN[0000] w", "ERRO[0000] e"]);
  });

  it("prints debug lines when asked", () => {
    const { logger, lines } = capture("debug");
    logger.debug("looking");
    expect(lines).toEqual(["DEBU[0000] looking"]);
  });
});
