/**
 * Environment Bridge - runs Linux tool binaries from a Windows host through
 * the WSL compatibility subsystem
 *
 * Bridged invocation shape:
 *   wsl bash -c 'cd "/mnt/d/work" && "/mnt/d/OpenROAD/bin/openroad" <args>'
 */

import type { BridgeSettings } from "../config.js";
import { PathTranslator } from "../files/path-translator.js";
import { runProcess } from "./process-runner.js";
import { logger } from "../logging/logger.js";

const log = logger.child("bridge");

const STATUS_TIMEOUT_MS = 5_000;
const SAFE_SHELL_WORD = /^[\w@%+=:,./-]+$/;

export interface BridgedCommand {
  command: string;
  args: string[];
}

/**
 * Quote an argument for the bridge shell's command string
 */
export function quoteShellArg(arg: string): string {
  if (SAFE_SHELL_WORD.test(arg)) return arg;
  return `"${arg.replace(/(["\\$`])/g, "\\$1")}"`;
}

export class EnvironmentBridge {
  private available: boolean | null = null;
  readonly translator: PathTranslator;

  constructor(private readonly settings: BridgeSettings) {
    this.translator = new PathTranslator({ mountPrefix: settings.mountPrefix });
  }

  get command(): string {
    return this.settings.bridgeCommand;
  }

  /**
   * Whether tools on this host are expected to need the bridge at all
   */
  hostNeedsBridge(): boolean {
    switch (this.settings.bridgeMode) {
      case "always":
        return true;
      case "never":
        return false;
      default:
        return process.platform === "win32";
    }
  }

  /**
   * Probe the bridge once (`wsl --status`) and remember the answer
   */
  async isAvailable(): Promise<boolean> {
    if (this.settings.bridgeMode === "never") return false;
    if (this.available !== null) return this.available;

    try {
      const result = await runProcess(this.settings.bridgeCommand, ["--status"], {
        timeoutMs: STATUS_TIMEOUT_MS,
      });
      this.available = result.exitCode === 0;
    } catch (error: unknown) {
      log.debug("bridge probe failed", error);
      this.available = false;
    }

    log.info(`bridge '${this.settings.bridgeCommand}' ${this.available ? "available" : "not available"}`);
    return this.available;
  }

  /**
   * Wrap a tool invocation so it runs inside the subsystem.
   * Native paths in `args` are translated; with a working directory the
   * command goes through the bridge shell so it can `cd` first.
   */
  wrap(toolPath: string, args: readonly string[], workDir?: string): BridgedCommand {
    const foreignTool = this.foreignPath(toolPath);
    const foreignArgs = args.map((arg) => this.translator.translateArgument(arg));

    if (!workDir) {
      return { command: this.settings.bridgeCommand, args: [foreignTool, ...foreignArgs] };
    }

    const words = [foreignTool, ...foreignArgs].map(quoteShellArg).join(" ");
    const script = `cd ${quoteShellArg(this.foreignPath(workDir))} && ${words}`;

    return {
      command: this.settings.bridgeCommand,
      args: [this.settings.bridgeShell, "-c", script],
    };
  }

  /**
   * Native paths are translated; absolute POSIX paths already name a
   * location inside the subsystem and pass through
   */
  private foreignPath(path: string): string {
    return path.startsWith("/") ? path : this.translator.toForeign(path);
  }
}
