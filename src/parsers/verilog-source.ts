/**
 * Verilog source helpers - module discovery and circuit classification on
 * raw source text. Not a parser: keyword and pattern scans only.
 */

import { readFile, stat } from "fs/promises";
import { errorMessage } from "../errors.js";
import { verilogFilesIn } from "../files/verilog-inputs.js";
import type { CircuitKind } from "../types/execution.js";

// Any of these in the source means state-holding logic
const SEQUENTIAL_KEYWORDS = [
  "always @(posedge",
  "always @(negedge",
  "always @(edge",
  "reg ",
  "flip",
  "latch",
  "memory",
];

export interface ModuleListing {
  path: string;
  modules: string[];
  error?: string;
}

/**
 * Names of all modules declared in the text, in declaration order
 */
export function extractModuleNames(text: string): string[] {
  return Array.from(text.matchAll(/\bmodule\s+([A-Za-z_][\w$]*)/gi), (match) => match[1]);
}

/**
 * Read each file and list the modules it declares. A file that cannot be read
 * is reported with an error instead of failing the whole listing.
 */
async function readListing(path: string): Promise<ModuleListing> {
  try {
    const text = await readFile(path, "utf-8");
    return { path, modules: extractModuleNames(text) };
  } catch (error: unknown) {
    return { path, modules: [], error: errorMessage(error) };
  }
}

/**
 * One listing per file; a directory is replaced by its `.v`/`.sv` files
 */
export async function listModulesInFiles(paths: readonly string[]): Promise<ModuleListing[]> {
  const listings = await Promise.all(
    paths.map(async (path): Promise<ModuleListing[]> => {
      const info = await stat(path).catch(() => null);
      if (!info?.isDirectory()) {
        return [await readListing(path)];
      }
      const files = await verilogFilesIn(path);
      if (files.length === 0) {
        return [{ path, modules: [], error: "No Verilog files found in directory" }];
      }
      return Promise.all(files.map(readListing));
    })
  );
  return listings.flat();
}

export function detectCircuitKind(text: string): CircuitKind {
  const lower = text.toLowerCase();
  return SEQUENTIAL_KEYWORDS.some((keyword) => lower.includes(keyword)) ? "sequential" : "combinational";
}
