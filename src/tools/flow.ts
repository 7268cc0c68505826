/**
 * Flow Tool - synthesis followed by a basic OpenROAD place-and-route run
 *
 * Layout under the work directory:
 *   out/<top>_synth.v      netlist, without attributes or comments
 *   out/<top>_flow.tcl     generated flow script (kept for reference)
 *   out/openroad.log       OpenROAD output
 *   out/sta_report.txt     timing report written by the flow
 *   out/<top>.def          placed design; the run only counts when it exists
 */

import { access, mkdir, rm, writeFile } from "fs/promises";
import { basename, join, resolve } from "path";
import type { OpenRoadDriver, YosysDriver } from "../drivers/index.js";
import { renderBasicFlowTcl, type TechnologyFiles } from "../scripts/openroad-flow.js";
import { validateTopEntity } from "../scripts/yosys-script.js";
import { freezeResult, type ExecutionResult, type TargetProfile } from "../types/execution.js";
import { failureResult, isExpectedFailure } from "./execution-result.js";
import { runOpenroadScript } from "./openroad.js";
import { synthesizeVerilog } from "./synthesis.js";
import { logger } from "../logging/logger.js";

const log = logger.child("flow");

export type FlowStatus = "ok" | "invalid_input" | "synthesis_failed" | "openroad_not_found" | "openroad_failed";

export interface FlowOptions {
  verilogFiles: string[];
  topModule: string;
  workDir: string;
  tech: TechnologyFiles;
  target?: TargetProfile;
  timeoutMs?: number;
}

export interface FlowResult {
  status: FlowStatus;
  module: string;
  netlist?: string;
  tcl?: string;
  def?: string;
  log?: string;
  synthesis?: ExecutionResult;
  placeAndRoute?: ExecutionResult;
}

export async function runFlow(
  drivers: { yosys: YosysDriver; openroad: OpenRoadDriver },
  options: FlowOptions
): Promise<FlowResult> {
  let top: string;
  try {
    top = validateTopEntity(options.topModule);
  } catch (error: unknown) {
    if (isExpectedFailure(error)) {
      return { status: "invalid_input", module: options.topModule, synthesis: failureResult(error, Date.now()) };
    }
    throw error;
  }

  const outDir = join(resolve(options.workDir), "out");
  await mkdir(outDir, { recursive: true });
  const netlist = join(outDir, `${top}_synth.v`);

  const synthesis = await synthesizeVerilog(drivers.yosys, {
    verilogFiles: options.verilogFiles,
    topModule: top,
    target: options.target ?? "generic",
    outputFile: netlist,
    showStatistics: true,
    timeoutMs: options.timeoutMs,
    forPlaceAndRoute: true,
  });
  if (!synthesis.success) {
    log.warn(`flow stopped after synthesis (${synthesis.stage})`);
    return { status: "synthesis_failed", module: top, synthesis };
  }

  const located = await drivers.openroad.locate();
  if (!located.found) {
    return { status: "openroad_not_found", module: top, netlist, synthesis };
  }

  const bridge = drivers.openroad.bridge;
  const script = renderBasicFlowTcl({
    designName: top,
    netlistPath: netlist,
    topModule: top,
    tech: options.tech,
    workingDirectory: outDir,
    translatePath: located.requiresBridge ? (path) => bridge.translator.toForeign(path) : undefined,
  });

  const tcl = join(outDir, `${top}_flow.tcl`);
  await writeFile(tcl, script.lines.join("\n") + "\n", "utf-8");

  // out/ belongs to the flow; a DEF from an earlier run must not count
  const def = join(outDir, `${top}.def`);
  await rm(def, { force: true });

  const run = await runOpenroadScript(drivers.openroad, { scriptPath: tcl, timeoutMs: options.timeoutMs });
  const placeAndRoute = run.success ? await requireDef(run, def) : run;

  return {
    status: placeAndRoute.success ? "ok" : "openroad_failed",
    module: top,
    netlist,
    tcl,
    def: placeAndRoute.success ? def : undefined,
    log: placeAndRoute.logPath,
    synthesis,
    placeAndRoute,
  };
}

async function requireDef(run: ExecutionResult, def: string): Promise<ExecutionResult> {
  try {
    await access(def);
    return freezeResult({ ...run, outputPath: def });
  } catch {
    const message = `OpenROAD exited with code 0 but did not write ${basename(def)}`;
    log.error(message);
    return freezeResult({
      ...run,
      success: false,
      stage: "tool_failed",
      outputPath: undefined,
      failureKind: "ToolFailed",
      failureMessage: message,
    });
  }
}
