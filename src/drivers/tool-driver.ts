/**
 * Tool Driver - capability interface over one tool family
 *
 * A driver knows where its tool may live and how it is invoked. Drivers are
 * plain classes picked from configuration by the registry in ./index.ts.
 */

import type { AppConfig, DriverFamily } from "../config.js";
import type { EnvironmentBridge } from "../runner/bridge.js";
import type { GuiOptions } from "../runner/batch.js";
import type { SessionOptions, ToolSession } from "../runner/session.js";
import type { ToolLocator } from "../runner/tool-locator.js";
import type { LocateResult, RawOutput, RenderedScript, ToolHandle } from "../types/execution.js";

export interface DriverContext {
  config: AppConfig;
  locator: ToolLocator;
  bridge: EnvironmentBridge;
}

/**
 * Replace where a driver looks for its tool, e.g. to point it at a stand-in
 */
export interface DriverOverrides {
  candidates?: readonly string[];
  baseArgs?: readonly string[];
}

export interface DriverBatchOptions {
  timeoutMs?: number;
}

export interface ToolDriver {
  readonly family: DriverFamily;
  readonly displayName: string;

  /** Resolve the executable; a found handle is cached for later calls */
  locate(): Promise<LocateResult>;

  runBatch?(handle: ToolHandle, script: RenderedScript, options?: DriverBatchOptions): Promise<RawOutput>;
  runGui?(handle: ToolHandle, script: RenderedScript, options?: Pick<GuiOptions, "stdio">): Promise<void>;
  openSession?(handle: ToolHandle, options?: Pick<SessionOptions, "cwd" | "transcriptPath">): Promise<ToolSession>;
}

/**
 * Shared locate/caching behaviour
 */
export abstract class BaseDriver {
  abstract readonly family: DriverFamily;
  abstract readonly displayName: string;

  private located: ({ readonly found: true } & ToolHandle) | null = null;

  constructor(
    protected readonly context: DriverContext,
    protected readonly overrides: DriverOverrides = {}
  ) {}

  protected abstract defaultCandidates(): readonly string[];
  protected abstract versionArgs(): readonly string[];

  get workDir(): string {
    return this.context.config.workDir;
  }

  get batchTimeoutMs(): number {
    return this.context.config.batchTimeoutMs;
  }

  get bridge(): EnvironmentBridge {
    return this.context.bridge;
  }

  async locate(): Promise<LocateResult> {
    if (this.located) return this.located;

    const result = await this.context.locator.locate(this.overrides.candidates ?? this.defaultCandidates(), {
      toolName: this.family,
      versionArgs: this.versionArgs(),
      verifyTimeoutMs: this.context.config.verifyTimeoutMs,
      baseArgs: this.overrides.baseArgs,
    });

    if (result.found) {
      this.located = result;
    }
    return result;
  }

  /** Forget the cached handle */
  reset(): void {
    this.located = null;
  }
}
