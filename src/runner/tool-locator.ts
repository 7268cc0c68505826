/**
 * Tool Locator - finds an executable that actually runs
 *
 * Candidates are probed in order: existence check, then a short version
 * query. A binary the host cannot execute directly is retried through the
 * environment bridge, and the handle remembers that the bridge is required.
 * Never throws: absence is reported as a NotFound value.
 */

import { access, constants } from "fs/promises";
import { delimiter, isAbsolute, join } from "path";
import { MAX_VERIFY_TIMEOUT_MS } from "../config.js";
import { errorMessage } from "../errors.js";
import { isNativePath } from "../files/path-translator.js";
import type { LocateResult, RawOutput, ToolHandle } from "../types/execution.js";
import type { EnvironmentBridge } from "./bridge.js";
import { runProcess, type RunProcessOptions } from "./process-runner.js";
import { logger } from "../logging/logger.js";

const log = logger.child("locator");

export type ProcessRunFn = (command: string, args: readonly string[], options: RunProcessOptions) => Promise<RawOutput>;

export type BridgeLike = Pick<EnvironmentBridge, "hostNeedsBridge" | "isAvailable" | "wrap">;

export interface LocateOptions {
  /** Name expected in the version output, e.g. "openroad" */
  toolName: string;
  versionArgs?: readonly string[];
  verifyTimeoutMs?: number;
  baseArgs?: readonly string[];
}

export interface ToolLocatorDeps {
  run?: ProcessRunFn;
  exists?: (path: string) => Promise<boolean>;
  bridge?: BridgeLike;
}

async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path, constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

function firstLine(text: string): string | undefined {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .find(Boolean);
}

export class ToolLocator {
  private readonly run: ProcessRunFn;
  private readonly exists: (path: string) => Promise<boolean>;
  private readonly bridge?: BridgeLike;

  constructor(deps: ToolLocatorDeps = {}) {
    this.run = deps.run ?? runProcess;
    this.exists = deps.exists ?? fileExists;
    this.bridge = deps.bridge;
  }

  /**
   * Accept the first candidate whose verification succeeds
   */
  async locate(candidates: readonly string[], options: LocateOptions): Promise<LocateResult> {
    const probed: string[] = [];

    for (const candidate of await this.expandCandidates(candidates)) {
      probed.push(candidate);

      if (!(await this.exists(candidate))) {
        log.debug(`candidate missing: ${candidate}`);
        continue;
      }

      const handle = await this.verify(candidate, options);
      if (handle) {
        log.info(`${options.toolName} found at ${candidate}${handle.requiresBridge ? " (via bridge)" : ""}`);
        return { found: true, ...handle };
      }
    }

    log.warn(`${options.toolName} not found`, { probed });
    return { found: false, probed };
  }

  /**
   * Look a bare command name up on PATH and verify the hits in PATH order
   */
  locateOnPath(name: string, options: LocateOptions): Promise<LocateResult> {
    return this.locate([name], options);
  }

  /**
   * Bare command names are looked up on PATH; paths are kept as given
   */
  private async expandCandidates(candidates: readonly string[]): Promise<string[]> {
    const expanded: string[] = [];
    for (const candidate of candidates) {
      if (isAbsolute(candidate) || isNativePath(candidate) || /[\\/]/.test(candidate)) {
        expanded.push(candidate);
      } else {
        expanded.push(...(await this.searchPath(candidate)));
      }
    }
    return expanded;
  }

  private async searchPath(name: string): Promise<string[]> {
    const dirs = (process.env.PATH ?? "").split(delimiter).filter(Boolean);
    const extensions =
      process.platform === "win32" ? ["", ...(process.env.PATHEXT ?? ".EXE;.CMD;.BAT").split(";")] : [""];

    const hits: string[] = [];
    for (const dir of dirs) {
      for (const ext of extensions) {
        const path = join(dir, name + ext);
        if (await this.exists(path)) {
          hits.push(path);
          break;
        }
      }
    }
    return hits;
  }

  private async verify(candidate: string, options: LocateOptions): Promise<ToolHandle | null> {
    const versionArgs = options.versionArgs ?? ["--version"];
    const baseArgs = options.baseArgs ?? [];
    const timeoutMs = Math.min(options.verifyTimeoutMs ?? MAX_VERIFY_TIMEOUT_MS, MAX_VERIFY_TIMEOUT_MS);

    try {
      const output = await this.run(candidate, [...baseArgs, ...versionArgs], { timeoutMs });
      if (this.accepts(output, options.toolName)) {
        return {
          executablePath: candidate,
          requiresBridge: false,
          verified: true,
          baseArgs,
          version: firstLine(output.stdout) ?? firstLine(output.stderr),
        };
      }
      log.debug(`native verification rejected ${candidate} (exit ${output.exitCode})`);
    } catch (error: unknown) {
      log.debug(`native verification failed for ${candidate}: ${errorMessage(error)}`);
    }

    return this.verifyThroughBridge(candidate, options, [...baseArgs, ...versionArgs], timeoutMs);
  }

  private async verifyThroughBridge(
    candidate: string,
    options: LocateOptions,
    args: readonly string[],
    timeoutMs: number
  ): Promise<ToolHandle | null> {
    const bridge = this.bridge;
    if (!bridge || !bridge.hostNeedsBridge() || !isNativePath(candidate)) return null;
    if (!(await bridge.isAvailable())) return null;

    try {
      const wrapped = bridge.wrap(candidate, args);
      const output = await this.run(wrapped.command, wrapped.args, { timeoutMs });
      if (!this.accepts(output, options.toolName)) return null;

      return {
        executablePath: candidate,
        requiresBridge: true,
        verified: true,
        baseArgs: options.baseArgs ?? [],
        version: firstLine(output.stdout) ?? firstLine(output.stderr),
      };
    } catch (error: unknown) {
      log.debug(`bridged verification failed for ${candidate}: ${errorMessage(error)}`);
      return null;
    }
  }

  private accepts(output: RawOutput, toolName: string): boolean {
    if (output.exitCode === 0) return true;
    const text = `${output.stdout}\n${output.stderr}`.toLowerCase();
    return text.includes(toolName.toLowerCase());
  }
}
