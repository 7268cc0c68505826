import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdir, writeFile } from "fs/promises";
import { join } from "path";
import { detectCircuitKind, extractModuleNames, listModulesInFiles } from "../../src/parsers/verilog-source.js";
import { fixturePath, makeTempDir, removeDir } from "../helpers/fixtures.js";

describe("extractModuleNames", () => {
  it("lists declared modules in order and ignores endmodule", () => {
    const text = "module alu(a, b);\nendmodule\n\nmodule regfile (clk);\nendmodule\n";
    expect(extractModuleNames(text)).toEqual(["alu", "regfile"]);
  });
});

describe("detectCircuitKind", () => {
  it("treats clocked processes as sequential", () => {
    expect(detectCircuitKind("always @(posedge clk) q <= d;")).toBe("sequential");
  });

  it("treats register declarations as sequential", () => {
    expect(detectCircuitKind("reg [3:0] state;")).toBe("sequential");
  });

  it("treats pure assignments as combinational", () => {
    expect(detectCircuitKind("assign y = sel ? b : a;")).toBe("combinational");
  });
});

describe("listModulesInFiles", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir("modules");
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it("reports modules per file and unreadable files separately", async () => {
    const extra = join(dir, "extra.v");
    await writeFile(extra, "module one; endmodule\nmodule two; endmodule\n");
    const missing = join(dir, "missing.v");

    const listings = await listModulesInFiles([fixturePath("mux8_2to1.v"), extra, missing]);

    expect(listings[0]).toEqual({ path: fixturePath("mux8_2to1.v"), modules: ["mux8_2to1"] });
    expect(listings[1]).toEqual({ path: extra, modules: ["one", "two"] });
    expect(listings[2].path).toBe(missing);
    expect(listings[2].modules).toEqual([]);
    expect(listings[2].error).toContain("ENOENT");
  });

  it("expands a directory into its Verilog files", async () => {
    const rtl = join(dir, "rtl");
    await mkdir(rtl);
    await writeFile(join(rtl, "b.v"), "module beta; endmodule\n");
    await writeFile(join(rtl, "a.sv"), "module alpha; endmodule\n");
    await writeFile(join(rtl, "notes.txt"), "module ignored; endmodule\n");

    const listings = await listModulesInFiles([rtl]);

    expect(listings).toEqual([
      { path: join(rtl, "a.sv"), modules: ["alpha"] },
      { path: join(rtl, "b.v"), modules: ["beta"] },
    ]);
  });

  it("reports a directory without Verilog files", async () => {
    const empty = join(dir, "empty");
    await mkdir(empty);

    expect(await listModulesInFiles([empty])).toEqual([
      { path: empty, modules: [], error: "No Verilog files found in directory" },
    ]);
  });
});
