/**
 * Process Runner - one external process, fully captured, under a time budget
 *
 * Output is collected, not streamed. When the budget runs out the process is
 * killed and the call fails with TimeoutError; no partial result is returned.
 * A stream larger than the capture limits keeps its head and its tail, with a
 * marker line in between, so the final diagnostics are never lost.
 */

import { spawn, type ChildProcess, type StdioOptions } from "child_process";
import { ProcessStartError, TimeoutError } from "../errors.js";
import type { RawOutput } from "../types/execution.js";
import { logger } from "../logging/logger.js";

const log = logger.child("process");

/** How long to wait for the exit event after SIGKILL before giving up on it */
const KILL_GRACE_MS = 2_000;
const DEFAULT_HEAD_BYTES = 8 * 1024 * 1024;
const DEFAULT_TAIL_BYTES = 2 * 1024 * 1024;

export interface RunProcessOptions {
  cwd?: string;
  timeoutMs: number;
  env?: NodeJS.ProcessEnv;
  /** Bytes kept from the start of each stream (default 8MB) */
  headBytes?: number;
  /** Bytes kept from the end of each stream once the head is full (default 2MB) */
  tailBytes?: number;
}

/**
 * Keeps the first `headLimit` bytes of a stream and a rolling window of the
 * last `tailLimit` bytes
 */
export class OutputCapture {
  private readonly head: Buffer[] = [];
  private headSize = 0;
  private readonly tail: Buffer[] = [];
  private tailSize = 0;
  private omittedBytes = 0;

  constructor(
    private readonly headLimit: number,
    private readonly tailLimit: number
  ) {}

  get omitted(): number {
    return this.omittedBytes;
  }

  push(chunk: Buffer): void {
    let rest = chunk;
    if (this.headSize < this.headLimit) {
      const part = rest.subarray(0, this.headLimit - this.headSize);
      this.head.push(part);
      this.headSize += part.length;
      rest = rest.subarray(part.length);
      if (rest.length === 0) return;
    }

    this.tail.push(rest);
    this.tailSize += rest.length;

    while (this.tailSize > this.tailLimit && this.tail.length > 0) {
      const first = this.tail[0];
      const excess = this.tailSize - this.tailLimit;
      if (first.length <= excess) {
        this.tail.shift();
        this.tailSize -= first.length;
        this.omittedBytes += first.length;
      } else {
        this.tail[0] = first.subarray(excess);
        this.tailSize -= excess;
        this.omittedBytes += excess;
      }
    }
  }

  text(): string {
    const head = Buffer.concat(this.head).toString("utf-8");
    const tail = Buffer.concat(this.tail).toString("utf-8");
    if (this.omittedBytes === 0) return head + tail;
    return `${head}\n[... ${this.omittedBytes} bytes omitted ...]\n${tail}`;
  }
}

/**
 * Read the errno code off a spawn error
 */
export function spawnErrorCode(error: Error): string | undefined {
  const code: unknown = Reflect.get(error, "code");
  return typeof code === "string" ? code : undefined;
}

/**
 * Spawn a process and capture stdout/stderr until it exits
 */
export async function runProcess(
  command: string,
  args: readonly string[],
  options: RunProcessOptions
): Promise<RawOutput> {
  const startTime = Date.now();

  return new Promise<RawOutput>((resolve, reject) => {
    const headBytes = options.headBytes ?? DEFAULT_HEAD_BYTES;
    const tailBytes = options.tailBytes ?? DEFAULT_TAIL_BYTES;
    const stdout = new OutputCapture(headBytes, tailBytes);
    const stderr = new OutputCapture(headBytes, tailBytes);
    let timedOut = false;
    let settled = false;
    let graceTimer: ReturnType<typeof setTimeout> | null = null;

    let child: ChildProcess;
    try {
      child = spawn(command, [...args], {
        cwd: options.cwd,
        env: options.env ?? process.env,
        stdio: ["ignore", "pipe", "pipe"],
        windowsHide: true,
      });
    } catch (error: unknown) {
      // spawn throws synchronously for e.g. a missing cwd on some platforms
      reject(new ProcessStartError(command, error instanceof Error ? error.message : String(error)));
      return;
    }

    log.debug(`spawned ${command}`, { args, cwd: options.cwd, pid: child.pid });

    child.stdout?.on("data", (chunk: Buffer) => stdout.push(chunk));
    child.stderr?.on("data", (chunk: Buffer) => stderr.push(chunk));

    const timeoutHandle = setTimeout(() => {
      timedOut = true;
      log.warn(`${command} exceeded ${options.timeoutMs}ms, killing pid ${child.pid}`);
      child.kill("SIGKILL");
      // A grandchild may keep the pipes open; don't wait on 'close' forever
      graceTimer = setTimeout(() => finishTimeout(), KILL_GRACE_MS);
    }, options.timeoutMs);

    const clearTimers = () => {
      clearTimeout(timeoutHandle);
      if (graceTimer) clearTimeout(graceTimer);
    };

    const finishTimeout = () => {
      if (settled) return;
      settled = true;
      clearTimers();
      reject(new TimeoutError(`'${command}'`, options.timeoutMs));
    };

    child.on("error", (error) => {
      if (settled) return;
      settled = true;
      clearTimers();
      reject(new ProcessStartError(command, `${spawnErrorCode(error) ?? "spawn error"}: ${error.message}`));
    });

    child.on("close", (code) => {
      if (timedOut) {
        finishTimeout();
        return;
      }
      if (settled) return;
      settled = true;
      clearTimers();

      const truncated = stdout.omitted > 0 || stderr.omitted > 0;
      if (truncated) {
        log.warn(`${command} output truncated`, { stdout: stdout.omitted, stderr: stderr.omitted });
      }

      resolve({
        stdout: stdout.text(),
        stderr: stderr.text(),
        exitCode: code,
        elapsedMs: Date.now() - startTime,
        ...(truncated ? { truncated } : {}),
      });
    });
  });
}

/**
 * Spawn a process that owns the terminal/display and wait for it to exit.
 * Nothing is captured. Resolves with the exit status.
 */
export async function runAttached(
  command: string,
  args: readonly string[],
  options: { cwd?: string; stdio?: StdioOptions }
): Promise<number | null> {
  return new Promise<number | null>((resolve, reject) => {
    let child: ChildProcess;
    try {
      child = spawn(command, [...args], {
        cwd: options.cwd,
        stdio: options.stdio ?? "inherit",
      });
    } catch (error: unknown) {
      reject(new ProcessStartError(command, error instanceof Error ? error.message : String(error)));
      return;
    }

    child.once("error", (error) => {
      reject(new ProcessStartError(command, `${spawnErrorCode(error) ?? "spawn error"}: ${error.message}`));
    });
    child.once("exit", (code) => resolve(code));
  });
}
