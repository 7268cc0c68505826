/**
 * Yosys driver - batch only: `yosys -s <script.ys>`
 */

import { flagScriptArgs, runBatch } from "../runner/batch.js";
import type { RawOutput, RenderedScript, ToolHandle } from "../types/execution.js";
import { BaseDriver, type DriverBatchOptions, type ToolDriver } from "./tool-driver.js";

export class YosysDriver extends BaseDriver implements ToolDriver {
  readonly family = "yosys" as const;
  readonly displayName = "Yosys";

  protected defaultCandidates(): readonly string[] {
    return [this.context.config.yosysPath];
  }

  protected versionArgs(): readonly string[] {
    return ["-V"];
  }

  runBatch(handle: ToolHandle, script: RenderedScript, options: DriverBatchOptions = {}): Promise<RawOutput> {
    return runBatch(handle, script, {
      timeoutMs: options.timeoutMs ?? this.context.config.batchTimeoutMs,
      scriptArgs: flagScriptArgs,
      bridge: this.context.bridge,
    });
  }
}
