/**
 * Builders for ExecutionResult - one per request, frozen on creation
 */

import { writeFile } from "fs/promises";
import { OrchestrationError, errorMessage, type ErrorKind } from "../errors.js";
import { classifyFailure } from "../parsers/yosys-output.js";
import {
  EMPTY_OUTPUT,
  freezeResult,
  type ExecutionResult,
  type ExecutionStage,
  type NotFound,
} from "../types/execution.js";
import { logger } from "../logging/logger.js";

const log = logger.child("result");

const STAGE_BY_KIND: Partial<Record<ErrorKind, ExecutionStage>> = {
  Timeout: "timeout",
  ProcessStartFailure: "start_failed",
  BridgeFailure: "bridge_failed",
  InvalidInput: "invalid_input",
  UnsupportedPath: "invalid_input",
  ToolReportedError: "tool_failed",
};

/**
 * Whether the tool layer turns this error into a failed result rather than
 * letting it propagate
 */
export function isExpectedFailure(error: unknown): error is OrchestrationError {
  return error instanceof OrchestrationError && STAGE_BY_KIND[error.kind] !== undefined;
}

export function failureResult(error: OrchestrationError, startTime: number): ExecutionResult {
  const failure = classifyFailure(error);
  return freezeResult({
    success: false,
    stage: STAGE_BY_KIND[error.kind] ?? "tool_failed",
    output: { ...EMPTY_OUTPUT, errors: [failure.message], remediations: [...failure.remediations] },
    elapsedMs: Date.now() - startTime,
    failureKind: failure.kind,
    failureMessage: failure.message,
  });
}

export function notFoundResult(toolName: string, notFound: NotFound, startTime: number): ExecutionResult {
  const message = `${toolName} not found (probed: ${notFound.probed.join(", ") || "nothing"})`;
  return freezeResult({
    success: false,
    stage: "start_failed",
    output: {
      ...EMPTY_OUTPUT,
      errors: [message],
      remediations: [`Install ${toolName} or point the configuration at its executable`],
    },
    elapsedMs: Date.now() - startTime,
    failureKind: "NotFound",
    failureMessage: message,
  });
}

/**
 * Write the combined tool output to disk. Failure to write does not fail the
 * run; the log path is simply left out of the result.
 */
export async function writeRunLog(logPath: string, stdout: string, stderr: string): Promise<string | undefined> {
  try {
    await writeFile(logPath, `${stdout}\n${stderr}`, "utf-8");
    return logPath;
  } catch (error: unknown) {
    log.warn(`could not write ${logPath}: ${errorMessage(error)}`);
    return undefined;
  }
}
