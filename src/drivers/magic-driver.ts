/**
 * Magic driver - interactive session over `magic -noconsole`
 */

import { openSession, type SessionOptions, type ToolSession } from "../runner/session.js";
import type { ToolHandle } from "../types/execution.js";
import { BaseDriver, type ToolDriver } from "./tool-driver.js";

export class MagicDriver extends BaseDriver implements ToolDriver {
  readonly family = "magic" as const;
  readonly displayName = "Magic";

  protected defaultCandidates(): readonly string[] {
    return [this.context.config.magicPath];
  }

  protected versionArgs(): readonly string[] {
    return ["--version"];
  }

  get commandTimeoutMs(): number {
    return this.context.config.sessionTimeoutMs;
  }

  openSession(handle: ToolHandle, options: Pick<SessionOptions, "cwd" | "transcriptPath"> = {}): Promise<ToolSession> {
    return openSession(handle, {
      args: ["-noconsole", ...this.context.config.magicArgs],
      bridge: this.context.bridge,
      cwd: options.cwd,
      transcriptPath: options.transcriptPath,
      quitCommand: "quit",
      toolName: this.displayName,
    });
  }
}
