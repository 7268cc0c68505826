/**
 * Yosys script builder
 *
 * Renders a synthesis request into a `.ys` command sequence. Output depends
 * only on the inputs (no timestamps), so the same request always renders the
 * same script.
 */

import { dirname } from "path";
import { InvalidInputError } from "../errors.js";
import { isNativePath } from "../files/path-translator.js";
import type { CircuitKind, ExecutionRequest, RenderedScript, TargetProfile } from "../types/execution.js";

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_$]*$/;
const SPECIAL_CHARS = /[ &()[\]{};|<>?*]/;

const VENDOR_PASSES: Partial<Record<TargetProfile, string>> = {
  ice40: "synth_ice40",
  ecp5: "synth_ecp5",
  xilinx: "synth_xilinx",
  intel: "synth_intel",
};

const COMBINATIONAL_ABC = "abc -g AND,NAND,OR,NOR,XOR,XNOR,MUX -script +fraig_sweep;fraig;refactor;balance";

export interface ScriptRenderOptions {
  /** Applied to every file path in the script, e.g. native -> bridged */
  translatePath?: (path: string) => string;
}

/**
 * Normalize a user-supplied module name: drop a leading `module ` and any
 * `(`, `)`, `;` the user pasted along with it
 */
export function cleanEntityName(input: string): string {
  let cleaned = input.replace(/[\r\n]/g, "").replace(/\s+/g, " ").trim();
  if (cleaned.toLowerCase().startsWith("module ")) {
    cleaned = cleaned.slice("module ".length).trim();
  }
  return cleaned.replace(/[();]/g, "").trim();
}

/**
 * Quote a path for the script when it contains characters the command
 * parser would split on
 */
export function scriptPath(path: string): string {
  return SPECIAL_CHARS.test(path) ? `"${path}"` : path;
}

function defaultTranslate(path: string): string {
  return isNativePath(path) ? path.replace(/\\/g, "/") : path;
}

/**
 * Clean the top entity name and reject it when it cannot name a module
 */
export function validateTopEntity(name: string): string {
  const top = cleanEntityName(name);
  if (!top) {
    throw new InvalidInputError("Top module name is empty", ["Pass the name of the top-level module"]);
  }
  if (!IDENTIFIER.test(top)) {
    throw new InvalidInputError(`'${top}' is not a valid Verilog identifier`, [
      "Use letters, digits and underscores, starting with a letter or underscore",
    ]);
  }
  return top;
}

export function renderSynthesisScript(
  request: ExecutionRequest,
  circuitKind: CircuitKind,
  options: ScriptRenderOptions = {}
): RenderedScript {
  const top = validateTopEntity(request.topEntity);
  if (request.inputFiles.length === 0) {
    throw new InvalidInputError("No Verilog input files given", ["Pass at least one .v file"]);
  }

  const translate = options.translatePath ?? defaultTranslate;
  const lines: string[] = [
    `# Yosys synthesis script for module '${top}'`,
    `# Target: ${request.target}`,
    `# Circuit type: ${circuitKind}`,
    "",
  ];

  const parameters = Object.entries(request.parameters ?? {});
  if (parameters.length > 0) {
    lines.push("# Verilog defines");
    for (const [key, value] of parameters) {
      lines.push(`# Define ${key}=${value}`);
    }
    lines.push("");
  }

  lines.push("# Reading Verilog files");
  for (const file of request.inputFiles) {
    lines.push(`read_verilog ${scriptPath(translate(file))}`);
  }
  lines.push("");

  lines.push("# Design hierarchy and basic synthesis", `hierarchy -check -top ${top}`, "proc", "opt", "memory", "opt");

  const vendorPass = VENDOR_PASSES[request.target];
  if (vendorPass) {
    lines.push(`${vendorPass} -top ${top}`);
  } else {
    lines.push("# Generic synthesis flow", "fsm", "opt", "techmap", "opt");
    lines.push(circuitKind === "combinational" ? COMBINATIONAL_ABC : "abc");
    lines.push("clean");
  }

  if (request.showStatistics ?? true) {
    lines.push("", "stat");
  }

  lines.push("", "# Write output", `write_verilog ${request.noAttributes ? "-noattr " : ""}${scriptPath(translate(request.outputPath))}`);

  return {
    lines,
    workingDirectory: dirname(request.outputPath),
    extension: ".ys",
  };
}
