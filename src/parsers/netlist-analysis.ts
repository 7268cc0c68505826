/**
 * Netlist Analysis - structural summary of a netlist written by the
 * synthesizer
 */

import type { NetlistAnalysis } from "../types/execution.js";

// `(*)` in `@(*)` is a sensitivity list, not an attribute
const ATTRIBUTE = /\(\*(?!\))[\s\S]*?\*\)/g;
const LINE_COMMENT = /\/\/.*$/gm;
const BLANK_RUN = /\n\s*\n+/g;

/**
 * Remove `(* ... *)` attributes and line comments from a netlist and collapse
 * the blank lines they leave behind. Place-and-route readers reject some of
 * the attributes the synthesizer emits.
 */
export function stripNetlistAttributes(text: string): string {
  return text.replace(ATTRIBUTE, "").replace(LINE_COMMENT, "").replace(BLANK_RUN, "\n\n");
}

const MODULE_DECL = /^module\s+([\w$]+)/;
const PORT_DECL = /^(input|output)\s+(?:wire\s+|reg\s+)?(?:\[[^\]]*\]\s*)?([\w$]+)/;

export function analyzeNetlist(text: string): NetlistAnalysis {
  const lines = text
    .split("\n")
    .map((line) => line.trim())
    .filter(Boolean);

  const modules: string[] = [];
  const inputs: string[] = [];
  const outputs: string[] = [];
  let wireCount = 0;
  let assignCount = 0;
  let alwaysCount = 0;

  for (const line of lines) {
    const moduleMatch = MODULE_DECL.exec(line);
    if (moduleMatch) {
      modules.push(moduleMatch[1]);
      continue;
    }

    const port = PORT_DECL.exec(line);
    if (port) {
      (port[1] === "input" ? inputs : outputs).push(port[2]);
      continue;
    }

    if (line.startsWith("wire ")) wireCount++;
    else if (line.startsWith("assign ")) assignCount++;
    else if (line.startsWith("always ") || line.startsWith("always@")) alwaysCount++;
  }

  return {
    totalLines: lines.length,
    modules,
    inputs,
    outputs,
    wireCount,
    assignCount,
    alwaysCount,
  };
}
