/**
 * OpenROAD basic flow - a minimal place-and-route TCL for a synthesized
 * netlist: read technology and design, floorplan, place, report timing, write
 * results
 */

import { InvalidInputError } from "../errors.js";
import type { RenderedScript } from "../types/execution.js";

export interface TechnologyFiles {
  techLef: string;
  libLef: string;
  liberty: string;
  sdc?: string;
  /** Placement site for the floorplan, e.g. FreePDK45_38x28_10R_NP_162NW_34O */
  site?: string;
}

export interface BasicFlowOptions {
  designName: string;
  netlistPath: string;
  topModule: string;
  tech: TechnologyFiles;
  /** Directory the script runs in; reports and results land here */
  workingDirectory: string;
  utilization?: number;
  /** Applied to every file path, e.g. native -> bridged */
  translatePath?: (path: string) => string;
}

/**
 * Brace-quote a TCL word when it holds whitespace or TCL metacharacters
 */
export function tclWord(value: string): string {
  return /[\s"$[\]{};\\]/.test(value) ? `{${value}}` : value;
}

export function renderBasicFlowTcl(options: BasicFlowOptions): RenderedScript {
  const { designName, topModule, tech } = options;
  if (!topModule.trim()) {
    throw new InvalidInputError("Top module name is empty", ["Pass the name of the top-level module"]);
  }

  const path = (value: string) => tclWord(options.translatePath ? options.translatePath(value) : value);
  const utilization = options.utilization ?? 30;
  const site = tech.site ? ` -site ${tclWord(tech.site)}` : "";

  const lines = [
    `# OpenROAD basic flow for ${designName}`,
    "",
    `read_lef ${path(tech.techLef)}`,
    `read_lef ${path(tech.libLef)}`,
    `read_liberty ${path(tech.liberty)}`,
    `read_verilog ${path(options.netlistPath)}`,
    `link_design ${topModule}`,
  ];

  if (tech.sdc) {
    lines.push(`read_sdc ${path(tech.sdc)}`);
  }

  lines.push(
    "",
    `initialize_floorplan -utilization ${utilization} -aspect_ratio 1.0 -core_space 2.0${site}`,
    "global_placement -skip_initial_place",
    "detailed_placement",
    "",
    "report_checks -path_delay min_max > sta_report.txt",
    "",
    `write_def ${designName}.def`,
    `write_verilog ${designName}_final.v`
  );

  return {
    lines,
    workingDirectory: options.workingDirectory,
    extension: ".tcl",
  };
}
