/**
 * OpenROAD Tool - run a TCL script in terminal or GUI mode and read back the
 * timing report it leaves beside the script
 */

import { readFile, stat } from "fs/promises";
import { dirname, join, resolve } from "path";
import type { StdioOptions } from "child_process";
import { InvalidInputError } from "../errors.js";
import type { OpenRoadDriver } from "../drivers/index.js";
import { interpretOutput } from "../parsers/yosys-output.js";
import { EMPTY_OUTPUT, freezeResult, type ExecutionResult, type RenderedScript } from "../types/execution.js";
import { failureResult, isExpectedFailure, notFoundResult, writeRunLog } from "./execution-result.js";
import { logger } from "../logging/logger.js";

const log = logger.child("openroad");

export const STA_REPORT_FILE = "sta_report.txt";
export const OPENROAD_LOG_FILE = "openroad.log";

export interface OpenroadRunOptions {
  scriptPath: string;
  gui?: boolean;
  timeoutMs?: number;
  /** GUI mode only; the MCP server passes "ignore" to keep its stdio clean */
  stdio?: StdioOptions;
}

export interface StaReport {
  path: string;
  found: boolean;
  empty: boolean;
  content?: string;
}

/**
 * Load an on-disk TCL script as a rendered script that runs in its own
 * directory
 */
export async function loadScript(scriptPath: string): Promise<RenderedScript> {
  const absolute = resolve(scriptPath);
  let text: string;
  try {
    text = await readFile(absolute, "utf-8");
  } catch {
    throw new InvalidInputError(`TCL script file not found: ${scriptPath}`, ["Check the script path"]);
  }
  return {
    lines: text.replace(/\r\n/g, "\n").replace(/\n$/, "").split("\n"),
    workingDirectory: dirname(absolute),
    extension: ".tcl",
  };
}

/**
 * Run an OpenROAD script. Terminal mode captures and interprets the output;
 * GUI mode blocks until the window is closed and reports only the exit.
 */
export async function runOpenroadScript(driver: OpenRoadDriver, options: OpenroadRunOptions): Promise<ExecutionResult> {
  const startTime = Date.now();

  try {
    const script = await loadScript(options.scriptPath);

    const located = await driver.locate();
    if (!located.found) {
      return notFoundResult(driver.displayName, located, startTime);
    }

    if (options.gui) {
      await driver.runGui(located, script, { stdio: options.stdio });
      return freezeResult({
        success: true,
        stage: "completed",
        output: EMPTY_OUTPUT,
        elapsedMs: Date.now() - startTime,
      });
    }

    const raw = await driver.runBatch(located, script, { timeoutMs: options.timeoutMs });
    const output = interpretOutput(raw);
    const logPath = await writeRunLog(join(script.workingDirectory, OPENROAD_LOG_FILE), raw.stdout, raw.stderr);
    const success = raw.exitCode === 0;
    if (!success) {
      log.error(`OpenROAD exited with code ${raw.exitCode}`, { errors: output.errors });
    }

    return freezeResult({
      success,
      stage: success ? "completed" : "tool_failed",
      output,
      elapsedMs: Date.now() - startTime,
      logPath,
      failureKind: success ? undefined : "ToolFailed",
      failureMessage: success ? undefined : `OpenROAD exited with code ${raw.exitCode}`,
    });
  } catch (error: unknown) {
    if (isExpectedFailure(error)) {
      log.error(`OpenROAD run failed: ${error.message}`);
      return failureResult(error, startTime);
    }
    throw error;
  }
}

/**
 * Read sta_report.txt from the script's directory
 */
export async function readStaReport(scriptPath: string): Promise<StaReport> {
  const path = join(dirname(resolve(scriptPath)), STA_REPORT_FILE);
  try {
    const info = await stat(path);
    if (!info.isFile()) return { path, found: false, empty: true };
  } catch {
    return { path, found: false, empty: true };
  }

  const content = await readFile(path, "utf-8");
  return { path, found: true, empty: content.trim() === "", content };
}

/**
 * Format OpenROAD result for MCP response
 */
export function formatOpenroadResult(result: ExecutionResult, mode: "gui" | "terminal"): string {
  return JSON.stringify(
    {
      success: result.success,
      stage: result.stage,
      mode,
      elapsed_ms: result.elapsedMs,
      log_path: result.logPath,
      errors: result.output.errors,
      warnings: result.output.warnings,
      error_kind: result.failureKind,
      remediations: result.output.remediations.length > 0 ? result.output.remediations : undefined,
      note: result.success
        ? `OpenROAD ${mode} run completed. Use read_sta_report to view ${STA_REPORT_FILE}.`
        : result.failureMessage,
    },
    null,
    2
  );
}
