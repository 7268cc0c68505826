/**
 * OpenROAD driver - terminal (`openroad -exit script.tcl`) or GUI
 * (`openroad -gui script.tcl`). The usual install is a Linux build reached
 * through the bridge from a Windows host.
 */

import { positionalScriptArgs, runBatch, runGui, type GuiOptions } from "../runner/batch.js";
import type { RawOutput, RenderedScript, ToolHandle } from "../types/execution.js";
import { BaseDriver, type DriverBatchOptions, type ToolDriver } from "./tool-driver.js";

export class OpenRoadDriver extends BaseDriver implements ToolDriver {
  readonly family = "openroad" as const;
  readonly displayName = "OpenROAD";

  protected defaultCandidates(): readonly string[] {
    return this.context.config.openroadCandidates;
  }

  protected versionArgs(): readonly string[] {
    return ["-version"];
  }

  runBatch(handle: ToolHandle, script: RenderedScript, options: DriverBatchOptions = {}): Promise<RawOutput> {
    return runBatch(handle, script, {
      timeoutMs: options.timeoutMs ?? this.context.config.batchTimeoutMs,
      scriptArgs: positionalScriptArgs,
      leadingArgs: ["-exit"],
      bridge: this.context.bridge,
    });
  }

  runGui(handle: ToolHandle, script: RenderedScript, options: Pick<GuiOptions, "stdio"> = {}): Promise<void> {
    return runGui(handle, script, {
      scriptArgs: positionalScriptArgs,
      bridge: this.context.bridge,
      stdio: options.stdio,
      toolName: this.displayName,
    });
  }
}
