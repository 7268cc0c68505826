import { describe, it, expect, vi } from "vitest";
import { ToolLocator, type ProcessRunFn } from "../../src/runner/tool-locator.js";
import { EnvironmentBridge } from "../../src/runner/bridge.js";
import { ProcessStartError } from "../../src/errors.js";
import type { RawOutput } from "../../src/types/execution.js";

function output(partial: Partial<RawOutput>): RawOutput {
  return { stdout: "", stderr: "", exitCode: 0, elapsedMs: 1, ...partial };
}

describe("ToolLocator", () => {
  it("spawns nothing when there are no candidates, every time", async () => {
    const run = vi.fn<ProcessRunFn>();
    const locator = new ToolLocator({ run });

    expect(await locator.locate([], { toolName: "yosys" })).toEqual({ found: false, probed: [] });
    expect(await locator.locate([], { toolName: "yosys" })).toEqual({ found: false, probed: [] });
    expect(run).not.toHaveBeenCalled();
  });

  it("skips missing files without spawning", async () => {
    const run = vi.fn<ProcessRunFn>();
    const locator = new ToolLocator({ run });
    const candidates = ["/nonexistent/bin/yosys", "/also/missing/yosys"];

    for (let attempt = 0; attempt < 2; attempt++) {
      expect(await locator.locate(candidates, { toolName: "yosys" })).toEqual({ found: false, probed: candidates });
    }
    expect(run).not.toHaveBeenCalled();
  });

  it("verifies a real executable", async () => {
    const locator = new ToolLocator();

    const result = await locator.locate([process.execPath], { toolName: "node" });

    expect(result.found).toBe(true);
    if (!result.found) return;
    expect(result.executablePath).toBe(process.execPath);
    expect(result.requiresBridge).toBe(false);
    expect(result.verified).toBe(true);
    expect(result.version).toBe(process.version);
  });

  it("accepts a non-zero exit when the output names the tool", async () => {
    const run = vi.fn<ProcessRunFn>().mockResolvedValue(output({ exitCode: 1, stderr: "OpenROAD 2.0 usage: ..." }));
    const locator = new ToolLocator({ run, exists: async () => true });

    const result = await locator.locate(["/opt/openroad/bin/openroad"], { toolName: "openroad" });

    expect(result).toMatchObject({ found: true, executablePath: "/opt/openroad/bin/openroad", requiresBridge: false });
  });

  it("rejects a candidate whose verification fails and moves on", async () => {
    const run = vi
      .fn<ProcessRunFn>()
      .mockResolvedValueOnce(output({ exitCode: 127, stderr: "not executable" }))
      .mockResolvedValueOnce(output({ stdout: "Yosys 0.40\n" }));
    const locator = new ToolLocator({ run, exists: async () => true });

    const result = await locator.locate(["/broken/yosys", "/good/yosys"], { toolName: "yosys", versionArgs: ["-V"] });

    expect(result).toMatchObject({ found: true, executablePath: "/good/yosys", version: "Yosys 0.40" });
    expect(run).toHaveBeenNthCalledWith(1, "/broken/yosys", ["-V"], { timeoutMs: 10_000 });
  });

  it("caps the verification time budget", async () => {
    const run = vi.fn<ProcessRunFn>().mockResolvedValue(output({}));
    const locator = new ToolLocator({ run, exists: async () => true });

    await locator.locate(["/opt/magic"], { toolName: "magic", verifyTimeoutMs: 60_000 });

    expect(run).toHaveBeenCalledWith("/opt/magic", ["--version"], { timeoutMs: 10_000 });
  });

  it("prepends base arguments to the version query", async () => {
    const run = vi.fn<ProcessRunFn>().mockResolvedValue(output({}));
    const locator = new ToolLocator({ run, exists: async () => true });

    const result = await locator.locate(["/usr/bin/node"], {
      toolName: "yosys",
      versionArgs: ["-V"],
      baseArgs: ["fake-yosys.mjs"],
    });

    expect(run).toHaveBeenCalledWith("/usr/bin/node", ["fake-yosys.mjs", "-V"], { timeoutMs: 10_000 });
    expect(result).toMatchObject({ found: true, baseArgs: ["fake-yosys.mjs"] });
  });

  it("falls back to the bridge for a binary the host cannot run", async () => {
    const bridge = new EnvironmentBridge({
      bridgeMode: "always",
      bridgeCommand: "wsl",
      bridgeShell: "bash",
      mountPrefix: "/mnt",
    });
    vi.spyOn(bridge, "isAvailable").mockResolvedValue(true);

    const run = vi
      .fn<ProcessRunFn>()
      .mockRejectedValueOnce(new ProcessStartError("D:\\OpenROAD\\bin\\openroad", "ENOEXEC: exec format error"))
      .mockResolvedValueOnce(output({ stdout: "OpenROAD v2.0-17598\n" }));
    const locator = new ToolLocator({ run, exists: async () => true, bridge });

    const result = await locator.locate(["D:\\OpenROAD\\bin\\openroad"], {
      toolName: "openroad",
      versionArgs: ["-version"],
    });

    expect(result).toEqual({
      found: true,
      executablePath: "D:\\OpenROAD\\bin\\openroad",
      requiresBridge: true,
      verified: true,
      baseArgs: [],
      version: "OpenROAD v2.0-17598",
    });
    expect(run).toHaveBeenLastCalledWith("wsl", ["/mnt/d/OpenROAD/bin/openroad", "-version"], { timeoutMs: 10_000 });
  });

  it("does not try the bridge when it is unavailable", async () => {
    const bridge = new EnvironmentBridge({
      bridgeMode: "always",
      bridgeCommand: "wsl",
      bridgeShell: "bash",
      mountPrefix: "/mnt",
    });
    vi.spyOn(bridge, "isAvailable").mockResolvedValue(false);

    const run = vi.fn<ProcessRunFn>().mockRejectedValue(new ProcessStartError("openroad", "ENOEXEC"));
    const locator = new ToolLocator({ run, exists: async () => true, bridge });

    const result = await locator.locate(["D:\\OpenROAD\\bin\\openroad"], { toolName: "openroad" });

    expect(result).toEqual({ found: false, probed: ["D:\\OpenROAD\\bin\\openroad"] });
    expect(run).toHaveBeenCalledTimes(1);
  });

  it("looks bare names up on PATH", async () => {
    const run = vi.fn<ProcessRunFn>();
    const locator = new ToolLocator({ run, exists: async () => false });

    const result = await locator.locateOnPath("no-such-eda-tool", { toolName: "no-such-eda-tool" });

    expect(result).toEqual({ found: false, probed: [] });
    expect(run).not.toHaveBeenCalled();
  });
});
