import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createProgram, main } from "./cli";

describe("cli", () => {
  beforeEach(() => {
    vi.spyOn(process.stderr, "write").mockImplementation(() => true);
    vi.spyOn(process.stdout, "write").mockImplementation(() => true);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("exits with 2 on usage errors", async () => {
    await expect(main(["node", "kubecallers"])).resolves.toBe(2);
    await expect(main(["node", "kubecallers", "user-db-0", "-c", "0"])).resolves.toBe(2);
    await expect(main(["node", "kubecallers", "user-db-0", "-w", "60"])).resolves.toBe(2);
    await expect(main(["node", "kubecallers", "user-db-0", "-o", "xml"])).resolves.toBe(2);
    await expect(main(["node", "kubecallers", "user-db-0", "-w", "600h"])).resolves.toBe(2);
  });

  it("exits with 0 for help and version", async () => {
    await expect(main(["node", "kubecallers", "--help"])).resolves.toBe(0);
    await expect(main(["node", "kubecallers", "--version"])).resolves.toBe(0);
  });

  it("documents the discovery flags", () => {
    const help = createProgram().helpInformation();
    expect(help).toContain("-s, --suggest-netpol");
    expect(help).toContain("-w, --wait-for-logs <duration>");
    expect(help).toContain("--resolver-selector <selector>");
  });
});
