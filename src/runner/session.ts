/**
 * Session Protocol Engine - one persistent tool process used as a
 * command/response channel (e.g. `magic -noconsole`)
 *
 * Lifecycle: created -> running -> closed | dead
 *
 * One command in flight at a time. Each send writes a line, then waits for
 * exactly one stdout line and one stderr line under a shared deadline. A
 * missed deadline kills the process and the session is dead for good.
 */

import { spawn, type ChildProcessWithoutNullStreams } from "child_process";
import { appendFile } from "fs/promises";
import { basename } from "path";
import {
  BridgeError,
  ProcessStartError,
  SessionNotRunningError,
  TimeoutError,
  ToolReportedError,
  errorMessage,
} from "../errors.js";
import type { ToolHandle } from "../types/execution.js";
import type { EnvironmentBridge } from "./bridge.js";
import { LineReader } from "./line-reader.js";
import { spawnErrorCode } from "./process-runner.js";
import { logger } from "../logging/logger.js";

const log = logger.child("session");

const DEFAULT_SETTLE_MS = 200;
const CLOSE_GRACE_MS = 2_000;

export type SessionStatus = "created" | "running" | "closed" | "dead";

type SessionState =
  | { status: "created" }
  | {
      status: "running";
      child: ChildProcessWithoutNullStreams;
      stdout: LineReader;
      stderr: LineReader;
    }
  | { status: "closed" }
  | { status: "dead"; reason: string };

export interface SessionOptions {
  /** Tool arguments, e.g. ["-noconsole"] */
  args?: readonly string[];
  bridge?: EnvironmentBridge;
  cwd?: string;
  /** Time allowed for start-up output to arrive before the first command */
  startupSettleMs?: number;
  /** Sent by close() before terminating */
  quitCommand?: string;
  toolName?: string;
  /** Append command/output/error of each send here, best-effort */
  transcriptPath?: string;
}

export class ToolSession {
  private state: SessionState = { status: "created" };
  private pending: Promise<void> = Promise.resolve();
  private readonly toolName: string;

  private constructor(
    private readonly handle: ToolHandle,
    private readonly options: SessionOptions
  ) {
    this.toolName = options.toolName ?? basename(handle.executablePath);
  }

  /**
   * Spawn the tool and wait until it is running
   */
  static async open(handle: ToolHandle, options: SessionOptions = {}): Promise<ToolSession> {
    const session = new ToolSession(handle, options);
    await session.start();
    return session;
  }

  get status(): SessionStatus {
    return this.state.status;
  }

  get pid(): number | undefined {
    return this.state.status === "running" ? this.state.child.pid : undefined;
  }

  /**
   * Send one command and return the trimmed reply line.
   * Concurrent callers are served one after another.
   */
  send(command: string, timeoutMs: number): Promise<string> {
    const exec = this.pending.then(() => this.doSend(command, timeoutMs));
    // Keep the chain alive when a send fails
    this.pending = exec.then(
      () => undefined,
      () => undefined
    );
    return exec;
  }

  /**
   * Ask the tool to quit, then terminate it. Safe to call any number of
   * times and after the process has died; never throws.
   */
  async close(): Promise<void> {
    const state = this.state;
    if (state.status === "created") {
      this.state = { status: "closed" };
      return;
    }
    if (state.status !== "running") return;

    this.state = { status: "closed" };
    const { child } = state;

    try {
      if (child.exitCode === null && child.stdin.writable) {
        child.stdin.write(`${this.options.quitCommand ?? "quit"}\n`);
        child.stdin.end();
      }
      child.kill("SIGTERM");
      await this.waitForExit(child, CLOSE_GRACE_MS);
      if (child.exitCode === null && child.signalCode === null) {
        child.kill("SIGKILL");
      }
    } catch (error: unknown) {
      log.warn(`error while closing ${this.toolName}: ${errorMessage(error)}`);
    }

    log.info(`${this.toolName} session closed`);
  }

  private async start(): Promise<void> {
    const args = [...(this.handle.baseArgs ?? []), ...(this.options.args ?? [])];
    let command = this.handle.executablePath;
    let finalArgs = args;

    if (this.handle.requiresBridge) {
      if (!this.options.bridge) {
        throw new BridgeError("(none)", `handle for ${this.handle.executablePath} requires a bridge but none was configured`);
      }
      const wrapped = this.options.bridge.wrap(this.handle.executablePath, args);
      command = wrapped.command;
      finalArgs = wrapped.args;
    }

    // Default stdio is three pipes
    const child = spawn(command, finalArgs, {
      cwd: this.options.cwd,
      windowsHide: true,
    });

    try {
      await new Promise<void>((resolve, reject) => {
        child.once("spawn", () => resolve());
        child.once("error", (error) => reject(error));
      });
    } catch (error: unknown) {
      const details =
        error instanceof Error ? `${spawnErrorCode(error) ?? "spawn error"}: ${error.message}` : String(error);
      this.state = { status: "dead", reason: details };
      throw this.handle.requiresBridge ? new BridgeError(command, details) : new ProcessStartError(command, details);
    }

    const stdout = new LineReader(child.stdout);
    const stderr = new LineReader(child.stderr);

    child.stdin.on("error", (error) => log.debug(`stdin error: ${error.message}`));
    child.on("error", (error) => log.warn(`${this.toolName} process error: ${error.message}`));
    child.on("exit", (code, signal) => {
      if (this.state.status === "running") {
        const reason = `process exited (code ${code ?? "none"}, signal ${signal ?? "none"})`;
        log.warn(`${this.toolName} ${reason}`);
        this.state = { status: "dead", reason };
      }
    });

    this.state = { status: "running", child, stdout, stderr };
    log.info(`${this.toolName} session started (pid ${child.pid})`);

    await new Promise<void>((resolve) => setTimeout(resolve, this.options.startupSettleMs ?? DEFAULT_SETTLE_MS));
  }

  private async doSend(command: string, timeoutMs: number): Promise<string> {
    const state = this.state;
    if (state.status !== "running" || state.child.exitCode !== null) {
      throw new SessionNotRunningError(this.state.status === "running" ? "dead" : this.state.status);
    }

    const { child, stdout, stderr } = state;

    const banner = [...stdout.discardPending(), ...stderr.discardPending()];
    if (banner.length > 0) {
      log.debug(`discarded ${banner.length} unsolicited line(s)`, banner);
    }

    try {
      await new Promise<void>((resolve, reject) => {
        child.stdin.write(`${command}\n`, (error) => (error ? reject(error) : resolve()));
      });
    } catch (error: unknown) {
      this.markDead(`write failed: ${errorMessage(error)}`);
      throw new SessionNotRunningError("dead");
    }

    const [out, err] = await Promise.all([stdout.next(timeoutMs), stderr.next(timeoutMs)]);

    if (this.state.status !== "running") {
      // closed underneath us, or the exit handler already ran
      throw new SessionNotRunningError(this.state.status);
    }

    if (out.kind === "timeout" || err.kind === "timeout") {
      log.error(`${this.toolName} gave no reply to '${command}' within ${timeoutMs}ms, killing pid ${child.pid}`);
      child.kill("SIGKILL");
      this.markDead("timed out");
      throw new TimeoutError(`Command '${command}'`, timeoutMs);
    }

    if (out.kind === "closed" || err.kind === "closed") {
      this.markDead("output stream closed");
      throw new SessionNotRunningError("dead");
    }

    await this.writeTranscript(command, out.text, err.text);

    if (err.text.trim()) {
      throw new ToolReportedError(this.toolName, err.text.trim());
    }
    return out.text.trim();
  }

  private markDead(reason: string): void {
    this.state = { status: "dead", reason };
  }

  private async writeTranscript(command: string, output: string, error: string): Promise<void> {
    if (!this.options.transcriptPath) return;
    try {
      await appendFile(
        this.options.transcriptPath,
        `Command: ${command}\nOutput: ${output}\nError: ${error}\n---\n`,
        "utf-8"
      );
    } catch (writeError: unknown) {
      log.warn(`could not write session transcript: ${errorMessage(writeError)}`);
    }
  }

  private waitForExit(child: ChildProcessWithoutNullStreams, timeoutMs: number): Promise<void> {
    if (child.exitCode !== null || child.signalCode !== null) return Promise.resolve();
    return new Promise<void>((resolve) => {
      const timer = setTimeout(resolve, timeoutMs);
      child.once("exit", () => {
        clearTimeout(timer);
        resolve();
      });
    });
  }
}

/**
 * Open a session; shorthand for ToolSession.open
 */
export function openSession(handle: ToolHandle, options: SessionOptions = {}): Promise<ToolSession> {
  return ToolSession.open(handle, options);
}
