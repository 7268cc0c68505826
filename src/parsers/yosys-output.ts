/**
 * Output Interpreter - turns free-form synthesizer output into a structured
 * summary
 *
 * One pass over `stdout + "\n" + stderr`, line by line, in order. Never throws.
 */

import { OrchestrationError } from "../errors.js";
import type { InterpretedOutput, OutputErrorKind, RawOutput } from "../types/execution.js";

export const ENTITY_NOT_FOUND_REMEDIATIONS: readonly string[] = [
  "Check module name spelling",
  "Ensure module is defined in the Verilog files",
];

export const SYNTAX_ERROR_REMEDIATIONS: readonly string[] = [
  "Check Verilog syntax",
  "Look for missing semicolons or parentheses",
];

const ERROR_MARKERS = ["error:", "fatal:", "abort"];
const WARNING_MARKERS = ["warning:", "warn:"];

const STATISTIC = /number of ([a-z][a-z ]*?)\s*:\s*(\d+)/i;
const ENTITY = /generating rtlil representation for module `\\?([\w$]+)'/i;

/**
 * "Wire Bits" -> "wire_bits"
 */
export function statisticKey(noun: string): string {
  return noun.trim().toLowerCase().replace(/\s+/g, "_");
}

function pushUnique(list: string[], items: readonly string[]): void {
  for (const item of items) {
    if (!list.includes(item)) list.push(item);
  }
}

/**
 * Interpret captured tool output
 */
export function interpretOutput(raw: Pick<RawOutput, "stdout" | "stderr">): InterpretedOutput {
  const errors: string[] = [];
  const warnings: string[] = [];
  const statistics: Record<string, number> = {};
  const entities: string[] = [];
  const passes: string[] = [];
  const remediations: string[] = [];
  let errorKind: OutputErrorKind | undefined;

  for (const rawLine of `${raw.stdout}\n${raw.stderr}`.split("\n")) {
    const line = rawLine.trim();
    if (!line) continue;
    const lower = line.toLowerCase();

    if (ERROR_MARKERS.some((marker) => lower.includes(marker))) {
      errors.push(line);
      if (lower.includes("not found")) {
        errorKind = "EntityNotFound";
        pushUnique(remediations, ENTITY_NOT_FOUND_REMEDIATIONS);
      } else if (lower.includes("syntax error")) {
        errorKind = "SyntaxError";
        pushUnique(remediations, SYNTAX_ERROR_REMEDIATIONS);
      }
      continue;
    }

    if (WARNING_MARKERS.some((marker) => lower.includes(marker))) {
      warnings.push(line);
      continue;
    }

    if (lower.includes("executing") && lower.includes("pass")) {
      passes.push(line);
      continue;
    }

    const stat = STATISTIC.exec(line);
    if (stat) {
      statistics[statisticKey(stat[1])] = Number.parseInt(stat[2], 10);
      continue;
    }

    const entity = ENTITY.exec(line);
    if (entity && !entities.includes(entity[1])) {
      entities.push(entity[1]);
    }
  }

  return {
    errors,
    warnings,
    statistics,
    entities,
    passes,
    ...(errorKind ? { errorKind } : {}),
    remediations,
  };
}

/**
 * Remediations for a failure raised by the core itself (not by the tool)
 */
export function classifyFailure(error: unknown): { kind: string; message: string; remediations: readonly string[] } {
  if (error instanceof OrchestrationError) {
    return { kind: error.kind, message: error.message, remediations: error.remediations };
  }
  const message = error instanceof Error ? error.message : String(error);
  return {
    kind: "Unexpected",
    message,
    remediations: ["Re-run with LOG_LEVEL=debug and inspect the log"],
  };
}
