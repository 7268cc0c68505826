import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { readFile, writeFile } from "fs/promises";
import { join } from "path";
import { OpenRoadDriver } from "../../src/drivers/index.js";
import {
  OPENROAD_LOG_FILE,
  formatOpenroadResult,
  loadScript,
  readStaReport,
  runOpenroadScript,
} from "../../src/tools/openroad.js";
import { InvalidInputError } from "../../src/errors.js";
import { fixturePath, makeTempDir, removeDir, testContext } from "../helpers/fixtures.js";

describe("runOpenroadScript", () => {
  let workDir: string;
  let driver: OpenRoadDriver;

  beforeEach(async () => {
    workDir = await makeTempDir("openroad");
    driver = new OpenRoadDriver(testContext(workDir), {
      candidates: [process.execPath],
      baseArgs: [fixturePath("fake-openroad.mjs")],
    });
  });

  afterEach(async () => {
    await removeDir(workDir);
  });

  async function writeScript(lines: string[]): Promise<string> {
    const path = join(workDir, "flow.tcl");
    await writeFile(path, lines.join("\n") + "\n");
    return path;
  }

  it("runs a script in terminal mode and keeps the log beside it", async () => {
    const scriptPath = await writeScript(["read_lef tech.lef", "report_checks -path_delay min_max > sta_report.txt"]);

    const result = await runOpenroadScript(driver, { scriptPath, timeoutMs: 10_000 });

    expect(result.success).toBe(true);
    expect(result.stage).toBe("completed");
    expect(result.output.warnings).toEqual(["Warning: no clocks defined"]);
    expect(result.logPath).toBe(join(workDir, OPENROAD_LOG_FILE));
    expect(await readFile(join(workDir, OPENROAD_LOG_FILE), "utf-8")).toContain("[INFO ORD-0030] Using 1 thread(s).");

    const report = await readStaReport(scriptPath);
    expect(report).toEqual({
      path: join(workDir, "sta_report.txt"),
      found: true,
      empty: false,
      content: "Startpoint: a\nEndpoint: y\nslack (MET)\n",
    });
  });

  it("reports a failing script", async () => {
    const scriptPath = await writeScript(["fail_here"]);

    const result = await runOpenroadScript(driver, { scriptPath, timeoutMs: 10_000 });

    expect(result.success).toBe(false);
    expect(result.stage).toBe("tool_failed");
    expect(result.output.errors).toEqual(['Error: invalid command name "fail_here"']);
    expect(result.failureMessage).toBe("OpenROAD exited with code 1");
  });

  it("runs a script in GUI mode", async () => {
    const scriptPath = await writeScript(["puts hello"]);

    const result = await runOpenroadScript(driver, { scriptPath, gui: true, stdio: "ignore" });

    expect(result.success).toBe(true);
    expect(result.stage).toBe("completed");
    expect(result.output.errors).toEqual([]);
  });

  it("reports a GUI session that exits with an error", async () => {
    const scriptPath = await writeScript(["fail_here"]);

    const result = await runOpenroadScript(driver, { scriptPath, gui: true, stdio: "ignore" });

    expect(result.success).toBe(false);
    expect(result.stage).toBe("tool_failed");
    expect(result.failureKind).toBe("ToolReportedError");
    expect(result.failureMessage).toBe("OpenROAD reported an error: GUI session exited with code 1");
  });

  it("rejects a missing script", async () => {
    const result = await runOpenroadScript(driver, { scriptPath: join(workDir, "absent.tcl") });

    expect(result.stage).toBe("invalid_input");
    expect(result.output.errors).toEqual([`TCL script file not found: ${join(workDir, "absent.tcl")}`]);
  });

  it("reports OpenROAD missing from every candidate", async () => {
    const scriptPath = await writeScript(["puts hello"]);
    const absent = new OpenRoadDriver(testContext(workDir, { EDA_OPENROAD_CANDIDATES: "/nonexistent/openroad" }));

    const result = await runOpenroadScript(absent, { scriptPath });

    expect(result.stage).toBe("start_failed");
    expect(result.output.errors).toEqual(["OpenROAD not found (probed: /nonexistent/openroad)"]);
  });

  it("formats the terminal result", async () => {
    const scriptPath = await writeScript(["puts hello"]);
    const result = await runOpenroadScript(driver, { scriptPath, timeoutMs: 10_000 });

    const formatted = JSON.parse(formatOpenroadResult(result, "terminal"));

    expect(formatted.mode).toBe("terminal");
    expect(formatted.note).toBe("OpenROAD terminal run completed. Use read_sta_report to view sta_report.txt.");
  });
});

describe("readStaReport", () => {
  let workDir: string;

  beforeEach(async () => {
    workDir = await makeTempDir("sta");
  });

  afterEach(async () => {
    await removeDir(workDir);
  });

  it("reports a missing report", async () => {
    expect(await readStaReport(join(workDir, "flow.tcl"))).toEqual({
      path: join(workDir, "sta_report.txt"),
      found: false,
      empty: true,
    });
  });

  it("reports an empty report", async () => {
    await writeFile(join(workDir, "sta_report.txt"), "  \n");

    const report = await readStaReport(join(workDir, "flow.tcl"));

    expect(report.found).toBe(true);
    expect(report.empty).toBe(true);
  });
});

describe("loadScript", () => {
  it("runs the script from its own directory", async () => {
    const workDir = await makeTempDir("load");
    try {
      const path = join(workDir, "a.tcl");
      await writeFile(path, "line one\r\nline two\r\n");

      expect(await loadScript(path)).toEqual({
        lines: ["line one", "line two"],
        workingDirectory: workDir,
        extension: ".tcl",
      });
    } finally {
      await removeDir(workDir);
    }
  });

  it("rejects a missing file", async () => {
    await expect(loadScript("/nonexistent/flow.tcl")).rejects.toBeInstanceOf(InvalidInputError);
  });
});
