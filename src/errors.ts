/**
 * Error taxonomy for tool orchestration
 *
 * Every failure the core raises carries a kind tag, the raw diagnostic detail
 * and a short list of remediations for the operator.
 */

export type ErrorKind =
  | "UnsupportedPath"
  | "ProcessStartFailure"
  | "BridgeFailure"
  | "Timeout"
  | "ToolReportedError"
  | "SessionNotRunning"
  | "InvalidInput";

/**
 * Base error for everything raised by the orchestration core
 */
export class OrchestrationError extends Error {
  constructor(
    message: string,
    public readonly kind: ErrorKind,
    public readonly details?: string,
    public readonly remediations: readonly string[] = []
  ) {
    super(message);
    this.name = "OrchestrationError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class UnsupportedPathError extends OrchestrationError {
  constructor(path: string, reason: string) {
    super(`Unsupported path '${path}': ${reason}`, "UnsupportedPath", path, [
      "Pass an absolute path that starts with a drive letter, e.g. D:\\designs\\top.v",
    ]);
    this.name = "UnsupportedPathError";
  }
}

export class ProcessStartError extends OrchestrationError {
  constructor(command: string, details: string) {
    super(`Failed to start '${command}': ${details}`, "ProcessStartFailure", details, [
      "Check that the executable exists and the path is correct",
      "Verify executable permissions",
    ]);
    this.name = "ProcessStartError";
  }
}

export class BridgeError extends OrchestrationError {
  constructor(bridgeCommand: string, details: string) {
    super(`Environment bridge '${bridgeCommand}' is unavailable: ${details}`, "BridgeFailure", details, [
      "Install or enable WSL (wsl --install)",
      "Check that 'wsl --status' succeeds from this shell",
    ]);
    this.name = "BridgeError";
  }
}

export class TimeoutError extends OrchestrationError {
  constructor(what: string, timeoutMs: number) {
    super(`${what} timed out after ${timeoutMs}ms`, "Timeout", `timeout=${timeoutMs}ms`, [
      `Increase the time budget (current: ${timeoutMs}ms)`,
      "Simplify the design or split the run into smaller steps",
    ]);
    this.name = "TimeoutError";
  }
}

export class ToolReportedError extends OrchestrationError {
  constructor(tool: string, diagnostic: string) {
    super(`${tool} reported an error: ${diagnostic}`, "ToolReportedError", diagnostic, [
      "Check the command syntax against the tool's manual",
    ]);
    this.name = "ToolReportedError";
  }
}

export class SessionNotRunningError extends OrchestrationError {
  constructor(state: string) {
    super(`Session is not running (state: ${state})`, "SessionNotRunning", state, [
      "Open a new session; a dead or closed session is never restarted",
    ]);
    this.name = "SessionNotRunningError";
  }
}

export class InvalidInputError extends OrchestrationError {
  constructor(message: string, remediations: readonly string[] = []) {
    super(message, "InvalidInput", undefined, remediations);
    this.name = "InvalidInputError";
  }
}

/**
 * Turn anything thrown into a message string
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
