/**
 * Batch Invocation Engine - runs a tool once over a rendered script
 *
 * The script is written to a scratch file in its working directory, the tool
 * is launched there (through the bridge when the handle requires it), and the
 * scratch file is removed on every exit path.
 */

import { rm, writeFile } from "fs/promises";
import { randomUUID } from "crypto";
import { basename, join } from "path";
import type { StdioOptions } from "child_process";
import { BridgeError, ProcessStartError, ToolReportedError } from "../errors.js";
import type { RawOutput, RenderedScript, ToolHandle } from "../types/execution.js";
import type { EnvironmentBridge } from "./bridge.js";
import { runAttached, runProcess } from "./process-runner.js";
import { logger } from "../logging/logger.js";

const log = logger.child("batch");

export type ScriptArgs = (scriptPath: string) => string[];

/** `-s <script>` as Yosys takes it */
export const flagScriptArgs: ScriptArgs = (scriptPath) => ["-s", scriptPath];

/** Script path as a positional argument, as OpenROAD takes it */
export const positionalScriptArgs: ScriptArgs = (scriptPath) => [scriptPath];

export interface BatchOptions {
  timeoutMs: number;
  scriptArgs?: ScriptArgs;
  /** Arguments placed before the script, e.g. `-exit` */
  leadingArgs?: readonly string[];
  bridge?: EnvironmentBridge;
}

export interface GuiOptions {
  scriptArgs?: ScriptArgs;
  leadingArgs?: readonly string[];
  bridge?: EnvironmentBridge;
  stdio?: StdioOptions;
  /** Tool name used in error messages */
  toolName?: string;
}

interface Invocation {
  command: string;
  args: string[];
  cwd: string;
}

/**
 * Build the final argument vector, bridged when the handle needs it
 */
export function buildInvocation(
  handle: ToolHandle,
  toolArgs: readonly string[],
  workDir: string,
  bridge?: EnvironmentBridge
): Invocation {
  const args = [...(handle.baseArgs ?? []), ...toolArgs];

  if (!handle.requiresBridge) {
    return { command: handle.executablePath, args, cwd: workDir };
  }
  if (!bridge) {
    throw new BridgeError("(none)", `handle for ${handle.executablePath} requires a bridge but none was configured`);
  }

  const wrapped = bridge.wrap(handle.executablePath, args, workDir);
  return { command: wrapped.command, args: wrapped.args, cwd: workDir };
}

/**
 * Write the script to a uniquely named scratch file, run `body`, and remove
 * the file afterwards whatever happens
 */
export async function withScratchScript<T>(script: RenderedScript, body: (scriptPath: string) => Promise<T>): Promise<T> {
  const name = `script_${Date.now()}_${process.pid}_${randomUUID().slice(0, 8)}${script.extension}`;
  const scriptPath = join(script.workingDirectory, name);

  await writeFile(scriptPath, script.lines.join("\n") + "\n", "utf-8");
  try {
    return await body(scriptPath);
  } finally {
    await rm(scriptPath, { force: true });
  }
}

function scriptArgument(scriptPath: string, handle: ToolHandle): string {
  // Bridged tools run with cwd already set to the script's directory
  return handle.requiresBridge ? basename(scriptPath) : scriptPath;
}

/**
 * Run a tool once over the script and capture everything it prints
 */
export async function runBatch(handle: ToolHandle, script: RenderedScript, options: BatchOptions): Promise<RawOutput> {
  const scriptArgs = options.scriptArgs ?? flagScriptArgs;

  return withScratchScript(script, async (scriptPath) => {
    const toolArgs = [...(options.leadingArgs ?? []), ...scriptArgs(scriptArgument(scriptPath, handle))];
    const invocation = buildInvocation(handle, toolArgs, script.workingDirectory, options.bridge);

    log.info(`running ${basename(handle.executablePath)}`, {
      args: invocation.args,
      cwd: invocation.cwd,
      timeoutMs: options.timeoutMs,
    });

    try {
      return await runProcess(invocation.command, invocation.args, {
        cwd: invocation.cwd,
        timeoutMs: options.timeoutMs,
      });
    } catch (error: unknown) {
      if (handle.requiresBridge && error instanceof ProcessStartError) {
        throw new BridgeError(invocation.command, error.details ?? error.message);
      }
      throw error;
    }
  });
}

/**
 * GUI variant: the tool owns the display, nothing is captured, and the call
 * blocks until the tool exits. A non-zero exit is reported as-is.
 */
export async function runGui(handle: ToolHandle, script: RenderedScript, options: GuiOptions = {}): Promise<void> {
  const scriptArgs = options.scriptArgs ?? positionalScriptArgs;
  const toolName = options.toolName ?? basename(handle.executablePath);

  await withScratchScript(script, async (scriptPath) => {
    const toolArgs = ["-gui", ...(options.leadingArgs ?? []), ...scriptArgs(scriptArgument(scriptPath, handle))];
    const invocation = buildInvocation(handle, toolArgs, script.workingDirectory, options.bridge);

    log.info(`launching ${toolName} in GUI mode`, { args: invocation.args });

    let exitCode: number | null;
    try {
      exitCode = await runAttached(invocation.command, invocation.args, {
        cwd: invocation.cwd,
        stdio: options.stdio,
      });
    } catch (error: unknown) {
      if (handle.requiresBridge && error instanceof ProcessStartError) {
        throw new BridgeError(invocation.command, error.details ?? error.message);
      }
      throw error;
    }

    if (exitCode !== 0) {
      throw new ToolReportedError(toolName, `GUI session exited with code ${exitCode}`);
    }
    log.info(`${toolName} GUI session completed`);
  });
}
