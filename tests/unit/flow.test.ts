import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync } from "fs";
import { mkdir, readFile, writeFile } from "fs/promises";
import { join } from "path";
import { OpenRoadDriver, YosysDriver } from "../../src/drivers/index.js";
import { runFlow, type FlowOptions } from "../../src/tools/flow.js";
import { readStaReport } from "../../src/tools/openroad.js";
import { fixturePath, makeTempDir, removeDir, testContext } from "../helpers/fixtures.js";

describe("runFlow", () => {
  let workDir: string;
  let yosys: YosysDriver;
  let openroad: OpenRoadDriver;

  beforeEach(async () => {
    workDir = await makeTempDir("flow");
    const context = testContext(workDir);
    yosys = new YosysDriver(context, { candidates: [process.execPath], baseArgs: [fixturePath("fake-yosys.mjs")] });
    openroad = new OpenRoadDriver(context, {
      candidates: [process.execPath],
      baseArgs: [fixturePath("fake-openroad.mjs")],
    });
  });

  afterEach(async () => {
    await removeDir(workDir);
  });

  function options(overrides: Partial<FlowOptions> = {}): FlowOptions {
    return {
      verilogFiles: [fixturePath("mux8_2to1.v")],
      topModule: "mux8_2to1",
      workDir,
      tech: { techLef: "/pdk/tech.lef", libLef: "/pdk/cells.lef", liberty: "/pdk/cells.lib" },
      timeoutMs: 10_000,
      ...overrides,
    };
  }

  it("synthesizes, places and reports timing", async () => {
    const result = await runFlow({ yosys, openroad }, options());

    const outDir = join(workDir, "out");
    expect(result.status).toBe("ok");
    expect(result.module).toBe("mux8_2to1");
    expect(result.netlist).toBe(join(outDir, "mux8_2to1_synth.v"));
    expect(result.tcl).toBe(join(outDir, "mux8_2to1_flow.tcl"));
    expect(result.log).toBe(join(outDir, "openroad.log"));
    expect(result.def).toBe(join(outDir, "mux8_2to1.def"));
    expect(result.placeAndRoute?.outputPath).toBe(join(outDir, "mux8_2to1.def"));
    expect(existsSync(join(outDir, "mux8_2to1_synth.v"))).toBe(true);

    const tcl = await readFile(join(outDir, "mux8_2to1_flow.tcl"), "utf-8");
    expect(tcl.split("\n")).toContain(`read_verilog ${join(outDir, "mux8_2to1_synth.v")}`);

    const report = await readStaReport(join(outDir, "mux8_2to1_flow.tcl"));
    expect(report.found).toBe(true);
    expect(report.content).toBe("Startpoint: a\nEndpoint: y\nslack (MET)\n");
  });

  it("hands OpenROAD a netlist without attributes or comments", async () => {
    const source = join(workDir, "buf1.v");
    await writeFile(source, "// buffer\n(* keep *)\nmodule buf1(input a, output y);\n  assign y = a;\nendmodule\n");

    const result = await runFlow({ yosys, openroad }, options({ verilogFiles: [source], topModule: "buf1" }));

    expect(result.status).toBe("ok");
    expect(await readFile(join(workDir, "out", "buf1_synth.v"), "utf-8")).toBe(
      "/* Generated by test stand-in */\n\nmodule buf1(input a, output y);\n  assign y = a;\nendmodule\n"
    );
  });

  it("fails when OpenROAD exits cleanly without writing the DEF", async () => {
    await mkdir(join(workDir, "out"));
    await writeFile(join(workDir, "out", "nodef.def"), "VERSION 5.8 ;\nEND DESIGN\n");
    const source = join(workDir, "nodef.v");
    await writeFile(source, "/* fake: no-def */\nmodule nodef(input a, output y);\n  assign y = a;\nendmodule\n");

    const result = await runFlow({ yosys, openroad }, options({ verilogFiles: [source], topModule: "nodef" }));

    expect(result.status).toBe("openroad_failed");
    expect(result.def).toBeUndefined();
    expect(result.placeAndRoute).toMatchObject({
      success: false,
      stage: "tool_failed",
      failureKind: "ToolFailed",
      failureMessage: "OpenROAD exited with code 0 but did not write nodef.def",
    });
    expect(result.placeAndRoute?.outputPath).toBeUndefined();
    expect(existsSync(join(workDir, "out", "nodef.def"))).toBe(false);
    expect(result.log).toBe(join(workDir, "out", "openroad.log"));
  });

  it("stops after a failed synthesis", async () => {
    const result = await runFlow({ yosys, openroad }, options({ topModule: "absent" }));

    expect(result.status).toBe("synthesis_failed");
    expect(result.synthesis?.output.errorKind).toBe("EntityNotFound");
    expect(result.placeAndRoute).toBeUndefined();
  });

  it("keeps the netlist when OpenROAD is missing", async () => {
    const missing = new OpenRoadDriver(testContext(workDir), { candidates: ["/nonexistent/openroad"] });

    const result = await runFlow({ yosys, openroad: missing }, options());

    expect(result.status).toBe("openroad_not_found");
    expect(result.netlist).toBe(join(workDir, "out", "mux8_2to1_synth.v"));
    expect(result.tcl).toBeUndefined();
  });

  it("rejects an invalid module name", async () => {
    const result = await runFlow({ yosys, openroad }, options({ topModule: "" }));

    expect(result.status).toBe("invalid_input");
    expect(result.synthesis?.stage).toBe("invalid_input");
  });
});
