/**
 * Verilog inputs - expand directories into the Verilog sources they hold
 */

import { readdir, stat } from "fs/promises";
import { extname, join, resolve } from "path";
import { InvalidInputError } from "../errors.js";

export const VERILOG_EXTENSIONS: readonly string[] = [".v", ".sv", ".verilog", ".vh"];

// Only these are picked up from a directory; headers are included, not read
const DIRECTORY_EXTENSIONS: readonly string[] = [".v", ".sv"];

async function statOrNull(path: string) {
  try {
    return await stat(path);
  } catch {
    return null;
  }
}

/**
 * `.v` and `.sv` files directly inside `dir`, sorted by name
 */
export async function verilogFilesIn(dir: string): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && DIRECTORY_EXTENSIONS.includes(extname(entry.name).toLowerCase()))
    .map((entry) => join(dir, entry.name))
    .sort();
}

/**
 * Resolve each input: a file must carry a Verilog extension, a directory
 * contributes its Verilog files. Order is kept; duplicates are dropped.
 */
export async function expandVerilogInputs(inputs: readonly string[]): Promise<string[]> {
  if (inputs.length === 0) {
    throw new InvalidInputError("No Verilog input files given", ["Pass at least one .v file or a directory"]);
  }

  const files: string[] = [];
  for (const input of inputs) {
    const path = resolve(input);
    const info = await statOrNull(path);

    if (!info) {
      throw new InvalidInputError(`Verilog file not found: ${path}`, [
        "Check that the path is correct",
        "Verify file permissions",
      ]);
    }

    if (info.isDirectory()) {
      const found = await verilogFilesIn(path);
      if (found.length === 0) {
        throw new InvalidInputError(`No Verilog files found in: ${path}`, ["The directory must hold .v or .sv files"]);
      }
      files.push(...found);
    } else if (VERILOG_EXTENSIONS.includes(extname(path).toLowerCase())) {
      files.push(path);
    } else {
      throw new InvalidInputError(`Not a Verilog file: ${path}`, [
        `Use one of ${VERILOG_EXTENSIONS.join(", ")}`,
      ]);
    }
  }

  return [...new Set(files)];
}
