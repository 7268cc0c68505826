#!/usr/bin/env node

/**
 * eda-tool-bridge - Model Context Protocol server for EDA tool orchestration
 *
 * Exposes Yosys synthesis, OpenROAD script runs and interactive Magic
 * sessions over MCP stdio. Linux tool builds on a Windows host are reached
 * through WSL.
 */

// Load environment variables from .env file
import dotenv from "dotenv";
dotenv.config();

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  CallToolRequestSchema,
  ErrorCode,
  ListToolsRequestSchema,
  McpError,
} from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";

import { getConfig } from "./config.js";
import { RunStore } from "./db/database.js";
import { getDriverRegistry, type DriverRegistry } from "./drivers/index.js";
import { OrchestrationError } from "./errors.js";
import { classifyFailure } from "./parsers/yosys-output.js";
import { listModulesInFiles } from "./parsers/verilog-source.js";
import {
  formatOpenroadResult,
  formatSynthesisResult,
  layoutSessions,
  readStaReport,
  runFlow,
  runOpenroadScript,
  shutdownLayoutSessions,
  synthesizeVerilog,
} from "./tools/index.js";
import { TARGET_PROFILES } from "./types/execution.js";
import { logger } from "./logging/logger.js";

const VERSION = "1.0.0";

const targetSchema = z.enum(["generic", "ice40", "ecp5", "xilinx", "intel"]);

const argSchemas = {
  synthesize_verilog: z.object({
    verilog_files: z.array(z.string().min(1)).min(1),
    top_module: z.string().min(1),
    target: targetSchema.default("generic"),
    output_file: z.string().optional(),
    defines: z.record(z.string()).optional(),
    show_statistics: z.boolean().default(true),
    for_place_and_route: z.boolean().default(false),
    timeout_ms: z.number().int().positive().optional(),
  }),
  run_openroad_script: z.object({
    script_path: z.string().min(1),
    mode: z.enum(["terminal", "gui"]).default("terminal"),
    timeout_ms: z.number().int().positive().optional(),
  }),
  read_sta_report: z.object({
    script_path: z.string().min(1),
  }),
  layout_session_open: z.object({
    working_dir: z.string().optional(),
    transcript_path: z.string().optional(),
  }),
  layout_session_send: z.object({
    session_id: z.string().min(1),
    command: z.string(),
    timeout_ms: z.number().int().positive().optional(),
  }),
  layout_session_close: z.object({
    session_id: z.string().min(1),
  }),
  run_flow: z.object({
    verilog_files: z.array(z.string().min(1)).min(1),
    top_module: z.string().min(1),
    work_dir: z.string().optional(),
    tech_lef: z.string().min(1),
    lib_lef: z.string().min(1),
    liberty: z.string().min(1),
    sdc: z.string().optional(),
    site: z.string().optional(),
    target: targetSchema.default("generic"),
  }),
  locate_tools: z.object({}),
  list_runs: z.object({
    limit: z.number().int().positive().max(500).default(20),
  }),
  list_modules: z.object({
    verilog_files: z.array(z.string().min(1)).min(1),
  }),
};

type ToolName = keyof typeof argSchemas;

function isToolName(name: string): name is ToolName {
  return Object.hasOwn(argSchemas, name);
}

/**
 * Validate tool arguments, mapping failures to InvalidParams
 */
function parseArgs<T extends z.ZodTypeAny>(schema: T, args: unknown, toolName: string): z.infer<T> {
  const result = schema.safeParse(args ?? {});
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
    throw new McpError(ErrorCode.InvalidParams, `Invalid arguments for tool '${toolName}': ${issues.join("; ")}`);
  }
  return result.data;
}

function requireDriver<K extends "yosys" | "openroad" | "magic">(
  registry: DriverRegistry,
  family: K
): NonNullable<DriverRegistry[K]> {
  const driver = registry[family];
  if (!driver) {
    throw new McpError(ErrorCode.InvalidRequest, `The ${family} driver is disabled (see EDA_DRIVERS)`);
  }
  return driver;
}

function textResult(value: unknown) {
  return {
    content: [{ type: "text" as const, text: typeof value === "string" ? value : JSON.stringify(value, null, 2) }],
  };
}

const filesProperty = {
  type: "array",
  items: { type: "string" },
  description: "Absolute paths to Verilog source files, in read order. A directory stands for its .v and .sv files.",
};

// Tool definitions
const tools = [
  {
    name: "synthesize_verilog",
    description:
      "Synthesize Verilog files with Yosys. Supports generic, ice40, ecp5, xilinx and intel targets. Writes the netlist and a .log beside it.",
    inputSchema: {
      type: "object",
      properties: {
        verilog_files: filesProperty,
        top_module: { type: "string", description: "Top-level module name" },
        target: { type: "string", enum: [...TARGET_PROFILES], default: "generic" },
        output_file: { type: "string", description: "Netlist path (default: <work dir>/<top>_synth.v)" },
        defines: {
          type: "object",
          additionalProperties: { type: "string" },
          description: "Verilog defines, recorded in the script header",
        },
        show_statistics: { type: "boolean", default: true },
        for_place_and_route: {
          type: "boolean",
          default: false,
          description: "Write the netlist without attributes or comments so OpenROAD can read it",
        },
        timeout_ms: { type: "number", description: "Time budget for the Yosys run" },
      },
      required: ["verilog_files", "top_module"],
    },
  },
  {
    name: "run_openroad_script",
    description:
      "Run an OpenROAD TCL script. 'terminal' captures output into openroad.log beside the script; 'gui' opens the OpenROAD GUI and waits for it to close.",
    inputSchema: {
      type: "object",
      properties: {
        script_path: { type: "string", description: "Path to the .tcl script" },
        mode: { type: "string", enum: ["terminal", "gui"], default: "terminal" },
        timeout_ms: { type: "number", description: "Time budget for terminal mode" },
      },
      required: ["script_path"],
    },
  },
  {
    name: "read_sta_report",
    description: "Read sta_report.txt from the directory of an OpenROAD script",
    inputSchema: {
      type: "object",
      properties: {
        script_path: { type: "string", description: "Path to the .tcl script that produced the report" },
      },
      required: ["script_path"],
    },
  },
  {
    name: "layout_session_open",
    description: "Start an interactive Magic layout session (magic -noconsole). Returns a session id.",
    inputSchema: {
      type: "object",
      properties: {
        working_dir: { type: "string", description: "Directory Magic starts in" },
        transcript_path: { type: "string", description: "Append every command and reply to this file" },
      },
    },
  },
  {
    name: "layout_session_send",
    description:
      "Send one command to an open Magic session and return its one-line reply. A timeout ends the session.",
    inputSchema: {
      type: "object",
      properties: {
        session_id: { type: "string" },
        command: { type: "string", description: "Magic command, e.g. 'load inverter'" },
        timeout_ms: { type: "number", description: "Reply deadline (default: EDA_SESSION_TIMEOUT_MS)" },
      },
      required: ["session_id", "command"],
    },
  },
  {
    name: "layout_session_close",
    description: "Quit a Magic session",
    inputSchema: {
      type: "object",
      properties: {
        session_id: { type: "string" },
      },
      required: ["session_id"],
    },
  },
  {
    name: "run_flow",
    description:
      "Synthesize with Yosys, then run a basic OpenROAD floorplan/placement/timing flow on the netlist. Results go to <work_dir>/out.",
    inputSchema: {
      type: "object",
      properties: {
        verilog_files: filesProperty,
        top_module: { type: "string" },
        work_dir: { type: "string", description: "Default: EDA_WORK_DIR" },
        tech_lef: { type: "string", description: "Technology LEF" },
        lib_lef: { type: "string", description: "Standard cell LEF" },
        liberty: { type: "string", description: "Liberty timing library" },
        sdc: { type: "string", description: "Timing constraints (optional)" },
        site: { type: "string", description: "Placement site for the floorplan (optional)" },
        target: { type: "string", enum: [...TARGET_PROFILES], default: "generic" },
      },
      required: ["verilog_files", "top_module", "tech_lef", "lib_lef", "liberty"],
    },
  },
  {
    name: "locate_tools",
    description: "Find and verify every enabled tool; reports paths, versions and whether WSL is needed",
    inputSchema: { type: "object", properties: {} },
  },
  {
    name: "list_runs",
    description: "List recent synthesis, OpenROAD and flow runs",
    inputSchema: {
      type: "object",
      properties: {
        limit: { type: "number", default: 20 },
      },
    },
  },
  {
    name: "list_modules",
    description: "List the modules declared in Verilog files",
    inputSchema: {
      type: "object",
      properties: {
        verilog_files: filesProperty,
      },
      required: ["verilog_files"],
    },
  },
];

// Initialize the MCP server
const server = new Server({ name: "eda-tool-bridge", version: VERSION }, { capabilities: { tools: {} } });

const config = getConfig();
const registry = getDriverRegistry();
const runStore = new RunStore(config.dbPath);

// Register tool list handler
server.setRequestHandler(ListToolsRequestSchema, async () => {
  return { tools };
});

// Handle tool calls
server.setRequestHandler(CallToolRequestSchema, async (request) => {
  const { name, arguments: args } = request.params;

  try {
    if (!isToolName(name)) {
      throw new McpError(ErrorCode.MethodNotFound, `Tool not found: ${name}`);
    }

    switch (name) {
      case "synthesize_verilog": {
        const params = parseArgs(argSchemas.synthesize_verilog, args, name);
        const result = await synthesizeVerilog(requireDriver(registry, "yosys"), {
          verilogFiles: params.verilog_files,
          topModule: params.top_module,
          target: params.target,
          outputFile: params.output_file,
          defines: params.defines,
          showStatistics: params.show_statistics,
          forPlaceAndRoute: params.for_place_and_route,
          timeoutMs: params.timeout_ms,
        });
        runStore.record("yosys", result, params.top_module);
        return textResult(formatSynthesisResult(result));
      }

      case "run_openroad_script": {
        const params = parseArgs(argSchemas.run_openroad_script, args, name);
        const result = await runOpenroadScript(requireDriver(registry, "openroad"), {
          scriptPath: params.script_path,
          gui: params.mode === "gui",
          timeoutMs: params.timeout_ms,
          // stdout carries the MCP stream
          stdio: "ignore",
        });
        runStore.record("openroad", result);
        return textResult(formatOpenroadResult(result, params.mode));
      }

      case "read_sta_report": {
        const params = parseArgs(argSchemas.read_sta_report, args, name);
        return textResult(await readStaReport(params.script_path));
      }

      case "layout_session_open": {
        const params = parseArgs(argSchemas.layout_session_open, args, name);
        const info = await layoutSessions.open(requireDriver(registry, "magic"), {
          cwd: params.working_dir,
          transcriptPath: params.transcript_path,
        });
        return textResult({ success: true, session: info });
      }

      case "layout_session_send": {
        const params = parseArgs(argSchemas.layout_session_send, args, name);
        const magic = requireDriver(registry, "magic");
        const reply = await layoutSessions.send(
          params.session_id,
          params.command,
          params.timeout_ms ?? magic.commandTimeoutMs
        );
        return textResult(reply);
      }

      case "layout_session_close": {
        const params = parseArgs(argSchemas.layout_session_close, args, name);
        return textResult({ success: true, session: await layoutSessions.close(params.session_id) });
      }

      case "run_flow": {
        const params = parseArgs(argSchemas.run_flow, args, name);
        const result = await runFlow(
          { yosys: requireDriver(registry, "yosys"), openroad: requireDriver(registry, "openroad") },
          {
            verilogFiles: params.verilog_files,
            topModule: params.top_module,
            workDir: params.work_dir ?? config.workDir,
            tech: {
              techLef: params.tech_lef,
              libLef: params.lib_lef,
              liberty: params.liberty,
              sdc: params.sdc,
              site: params.site,
            },
            target: params.target,
          }
        );
        if (result.synthesis) runStore.record("yosys", result.synthesis, result.module);
        if (result.placeAndRoute) runStore.record("openroad", result.placeAndRoute, result.module);
        return textResult({
          status: result.status,
          module: result.module,
          netlist: result.netlist,
          tcl: result.tcl,
          def: result.def,
          log: result.log,
          synthesis_stage: result.synthesis?.stage,
          openroad_stage: result.placeAndRoute?.stage,
          errors: [...(result.synthesis?.output.errors ?? []), ...(result.placeAndRoute?.output.errors ?? [])],
        });
      }

      case "locate_tools": {
        parseArgs(argSchemas.locate_tools, args, name);
        const drivers = [registry.yosys, registry.openroad, registry.magic].filter(
          (driver): driver is NonNullable<typeof driver> => driver !== undefined
        );
        const located = await Promise.all(
          drivers.map(async (driver) => ({ tool: driver.family, result: await driver.locate() }))
        );
        return textResult({
          bridge: {
            command: registry.context.bridge.command,
            needed_on_this_host: registry.context.bridge.hostNeedsBridge(),
          },
          tools: located,
        });
      }

      case "list_runs": {
        const params = parseArgs(argSchemas.list_runs, args, name);
        return textResult({ runs: runStore.listRuns(params.limit) });
      }

      case "list_modules": {
        const params = parseArgs(argSchemas.list_modules, args, name);
        return textResult({ files: await listModulesInFiles(params.verilog_files) });
      }

      default:
        throw new McpError(ErrorCode.MethodNotFound, `Tool not found: ${name}`);
    }
  } catch (error: unknown) {
    if (error instanceof McpError) throw error;
    if (error instanceof OrchestrationError) {
      if (error.kind === "InvalidInput") {
        throw new McpError(ErrorCode.InvalidParams, error.message);
      }
      const failure = classifyFailure(error);
      return textResult({ success: false, error: failure.message, error_kind: failure.kind, remediations: failure.remediations });
    }
    const errorMessage = error instanceof Error ? error.message : String(error);
    throw new McpError(ErrorCode.InternalError, `Tool execution failed: ${errorMessage}`);
  }
});

async function shutdown(signal: string): Promise<void> {
  logger.info(`received ${signal}, shutting down`);
  await shutdownLayoutSessions();
  runStore.close();
  process.exit(0);
}

// Start the server
async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);

  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));

  // Log startup info to stderr (stdout belongs to the MCP client)
  console.error(`=== eda-tool-bridge v${VERSION} ===`);
  console.error(`Drivers: ${config.drivers.join(", ")}`);
  console.error(`Work dir: ${config.workDir}`);
  console.error(`Bridge: ${config.bridgeCommand} (mode ${config.bridgeMode}, mounts under ${config.mountPrefix})`);
  console.error("================================");
}

main().catch((error) => {
  console.error("Server failed to start:", error);
  process.exit(1);
});
