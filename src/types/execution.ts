/**
 * Execution Types - records passed between the orchestration stages
 */

/**
 * Resolved executable. Created once by the locator, never mutated.
 */
export interface ToolHandle {
  readonly executablePath: string;
  /** Every invocation must go through the environment bridge */
  readonly requiresBridge: boolean;
  /** The verification run succeeded */
  readonly verified: boolean;
  /** Arguments placed before the tool's own, e.g. for interpreter-wrapped tools */
  readonly baseArgs?: readonly string[];
  /** First line of the verification output */
  readonly version?: string;
}

export interface NotFound {
  readonly found: false;
  /** Candidates that were examined, in order */
  readonly probed: readonly string[];
}

export type LocateResult = ({ readonly found: true } & ToolHandle) | NotFound;

/**
 * Synthesis target families
 */
export type TargetProfile = "generic" | "ice40" | "ecp5" | "xilinx" | "intel";

export const TARGET_PROFILES: readonly TargetProfile[] = ["generic", "ice40", "ecp5", "xilinx", "intel"];

export type CircuitKind = "combinational" | "sequential";

/**
 * What the caller wants synthesized. Caller-owned; the core only reads it.
 */
export interface ExecutionRequest {
  readonly inputFiles: readonly string[];
  readonly topEntity: string;
  readonly target: TargetProfile;
  readonly outputPath: string;
  readonly parameters?: Readonly<Record<string, string>>;
  readonly timeoutMs: number;
  readonly showStatistics?: boolean;
  /** Write the netlist without `(* ... *)` attributes */
  readonly noAttributes?: boolean;
}

/**
 * A deterministic command sequence plus where it has to run
 */
export interface RenderedScript {
  readonly lines: readonly string[];
  readonly workingDirectory: string;
  /** Scratch file extension, including the dot */
  readonly extension: string;
}

export interface RawOutput {
  readonly stdout: string;
  readonly stderr: string;
  readonly exitCode: number | null;
  readonly elapsedMs: number;
  /** Part of a stream was dropped between its head and its tail */
  readonly truncated?: boolean;
}

export type OutputErrorKind = "EntityNotFound" | "SyntaxError";

export interface InterpretedOutput {
  readonly errors: readonly string[];
  readonly warnings: readonly string[];
  readonly statistics: Readonly<Record<string, number>>;
  readonly entities: readonly string[];
  readonly passes: readonly string[];
  readonly errorKind?: OutputErrorKind;
  readonly remediations: readonly string[];
}

/**
 * Where an execution stopped
 */
export type ExecutionStage =
  | "completed"
  | "tool_failed"
  | "timeout"
  | "start_failed"
  | "bridge_failed"
  | "invalid_input";

/**
 * Structural summary of a written netlist
 */
export interface NetlistAnalysis {
  readonly totalLines: number;
  readonly modules: readonly string[];
  readonly inputs: readonly string[];
  readonly outputs: readonly string[];
  readonly wireCount: number;
  readonly assignCount: number;
  readonly alwaysCount: number;
}

export interface ExecutionResult {
  readonly success: boolean;
  readonly stage: ExecutionStage;
  readonly outputPath?: string;
  readonly output: InterpretedOutput;
  readonly elapsedMs: number;
  /** Raw combined log written beside the output, when that succeeded */
  readonly logPath?: string;
  readonly netlist?: NetlistAnalysis;
  /** Where a netlist from an earlier run was moved before this one started */
  readonly backupPath?: string;
  /** Classified kind of a failure raised by the core itself */
  readonly failureKind?: string;
  readonly failureMessage?: string;
}

/**
 * Freeze a result and its nested lists so nothing downstream can edit it
 */
export function freezeResult(result: ExecutionResult): ExecutionResult {
  Object.freeze(result.output.errors);
  Object.freeze(result.output.warnings);
  Object.freeze(result.output.statistics);
  Object.freeze(result.output.entities);
  Object.freeze(result.output.passes);
  Object.freeze(result.output.remediations);
  Object.freeze(result.output);
  return Object.freeze(result);
}

export const EMPTY_OUTPUT: InterpretedOutput = Object.freeze({
  errors: Object.freeze([]),
  warnings: Object.freeze([]),
  statistics: Object.freeze({}),
  entities: Object.freeze([]),
  passes: Object.freeze([]),
  remediations: Object.freeze([]),
});
