/**
 * Synthesis Tool
 *
 * Synthesizes Verilog files with Yosys: render the script, run it once in
 * batch mode, interpret the log and check the netlist on disk.
 */

import { access, mkdir, readFile, rename, writeFile } from "fs/promises";
import { basename, dirname, join, resolve } from "path";
import { errorMessage } from "../errors.js";
import { expandVerilogInputs } from "../files/verilog-inputs.js";
import type { YosysDriver } from "../drivers/index.js";
import { analyzeNetlist, stripNetlistAttributes } from "../parsers/netlist-analysis.js";
import { detectCircuitKind } from "../parsers/verilog-source.js";
import { interpretOutput } from "../parsers/yosys-output.js";
import { cleanEntityName, renderSynthesisScript, validateTopEntity } from "../scripts/yosys-script.js";
import {
  freezeResult,
  type CircuitKind,
  type ExecutionRequest,
  type ExecutionResult,
  type NetlistAnalysis,
  type TargetProfile,
} from "../types/execution.js";
import { failureResult, isExpectedFailure, notFoundResult, writeRunLog } from "./execution-result.js";
import { logger } from "../logging/logger.js";

const log = logger.child("synthesis");

/**
 * Synthesis options
 */
export interface SynthesisOptions {
  /** Files, or directories whose `.v`/`.sv` files are all read */
  verilogFiles: string[];
  topModule: string;
  target?: TargetProfile;
  /** Defaults to <workDir>/<top>_synth.v */
  outputFile?: string;
  defines?: Record<string, string>;
  showStatistics?: boolean;
  timeoutMs?: number;
  /** Write a netlist without attributes or comments, ready for OpenROAD */
  forPlaceAndRoute?: boolean;
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

async function readCircuitKind(file: string): Promise<CircuitKind> {
  try {
    return detectCircuitKind(await readFile(file, "utf-8"));
  } catch (error: unknown) {
    log.warn(`could not read ${file}, assuming combinational: ${errorMessage(error)}`);
    return "combinational";
  }
}

/**
 * Move a netlist from an earlier run aside so that only this run's output
 * counts. Returns where it went.
 */
async function backupPreviousNetlist(outputPath: string): Promise<string | undefined> {
  if (!(await pathExists(outputPath))) {
    return undefined;
  }
  const stem = outputPath.endsWith(".v") ? outputPath.slice(0, -2) : outputPath;
  const backupPath = `${stem}.backup_${Math.floor(Date.now() / 1000)}.v`;
  await rename(outputPath, backupPath);
  log.info(`moved previous netlist to ${backupPath}`);
  return backupPath;
}

/**
 * Build the request the script builder consumes
 */
export function buildSynthesisRequest(options: SynthesisOptions, workDir: string, defaultTimeoutMs: number): ExecutionRequest {
  const top = cleanEntityName(options.topModule);
  return {
    inputFiles: options.verilogFiles.map((file) => resolve(file)),
    topEntity: top,
    target: options.target ?? "generic",
    outputPath: resolve(options.outputFile ?? join(workDir, `${top || "design"}_synth.v`)),
    parameters: options.defines,
    timeoutMs: options.timeoutMs ?? defaultTimeoutMs,
    showStatistics: options.showStatistics ?? true,
    noAttributes: options.forPlaceAndRoute,
  };
}

/**
 * Synthesize Verilog files with Yosys
 */
export async function synthesizeVerilog(driver: YosysDriver, options: SynthesisOptions): Promise<ExecutionResult> {
  const startTime = Date.now();
  const base = buildSynthesisRequest(options, driver.workDir, driver.batchTimeoutMs);

  try {
    validateTopEntity(base.topEntity);
    const request: ExecutionRequest = { ...base, inputFiles: await expandVerilogInputs(base.inputFiles) };
    const circuitKind = await readCircuitKind(request.inputFiles[0]);

    const located = await driver.locate();
    if (!located.found) {
      return notFoundResult(driver.displayName, located, startTime);
    }

    const bridge = driver.bridge;
    const script = renderSynthesisScript(request, circuitKind, {
      translatePath: located.requiresBridge ? (path) => bridge.translator.toForeign(path) : undefined,
    });

    await mkdir(dirname(request.outputPath), { recursive: true });
    const backupPath = await backupPreviousNetlist(request.outputPath);

    log.info(`synthesizing ${request.topEntity} (${request.target}, ${circuitKind})`);
    const raw = await driver.runBatch(located, script, { timeoutMs: request.timeoutMs });

    const output = interpretOutput(raw);
    const logPath = await writeRunLog(`${request.outputPath}.log`, raw.stdout, raw.stderr);
    const written = await pathExists(request.outputPath);
    const success = raw.exitCode === 0 && written;

    let netlist: NetlistAnalysis | undefined;
    if (success) {
      let text = await readFile(request.outputPath, "utf-8");
      if (options.forPlaceAndRoute) {
        text = stripNetlistAttributes(text);
        await writeFile(request.outputPath, text, "utf-8");
      }
      netlist = analyzeNetlist(text);
    }

    let failureMessage: string | undefined;
    if (!success) {
      failureMessage =
        raw.exitCode !== 0
          ? `Yosys exited with code ${raw.exitCode}`
          : `Yosys exited with code 0 but did not write ${basename(request.outputPath)}`;
      log.error(failureMessage, { errors: output.errors });
    }

    return freezeResult({
      success,
      stage: success ? "completed" : "tool_failed",
      outputPath: success ? request.outputPath : undefined,
      output,
      elapsedMs: Date.now() - startTime,
      logPath,
      netlist,
      backupPath,
      failureKind: success ? undefined : output.errorKind ?? "ToolFailed",
      failureMessage,
    });
  } catch (error: unknown) {
    if (isExpectedFailure(error)) {
      log.error(`synthesis failed: ${error.message}`);
      return failureResult(error, startTime);
    }
    throw error;
  }
}

/**
 * Format synthesis result for MCP response
 */
export function formatSynthesisResult(result: ExecutionResult): string {
  return JSON.stringify(
    {
      success: result.success,
      stage: result.stage,
      output_path: result.outputPath,
      log_path: result.logPath,
      elapsed_ms: result.elapsedMs,
      statistics: result.output.statistics,
      modules: result.output.entities,
      passes: result.output.passes.length,
      errors: result.output.errors,
      warnings: result.output.warnings,
      error_kind: result.output.errorKind ?? result.failureKind,
      remediations: result.output.remediations.length > 0 ? result.output.remediations : undefined,
      netlist: result.netlist,
      backup_path: result.backupPath,
      note: result.success
        ? `Synthesis completed. Netlist written to ${result.outputPath}`
        : result.failureMessage ?? "Synthesis failed. Check the errors for details.",
    },
    null,
    2
  );
}
