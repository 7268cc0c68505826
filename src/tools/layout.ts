/**
 * Layout Tool - interactive Magic sessions addressed by id
 */

import { randomUUID } from "crypto";
import { InvalidInputError, OrchestrationError, errorMessage } from "../errors.js";
import type { MagicDriver } from "../drivers/index.js";
import type { ToolSession } from "../runner/session.js";
import { logger } from "../logging/logger.js";

const log = logger.child("layout");

export interface LayoutSessionInfo {
  id: string;
  status: string;
  pid?: number;
  openedAt: string;
  commandCount: number;
}

export interface LayoutReply {
  sessionId: string;
  command: string;
  success: boolean;
  status: string;
  output?: string;
  error?: string;
  errorKind?: string;
  remediations?: readonly string[];
}

interface Entry {
  session: ToolSession;
  openedAt: Date;
  commandCount: number;
}

class LayoutSessionRegistry {
  private sessions = new Map<string, Entry>();

  /**
   * Start a new session and return its id
   */
  async open(driver: MagicDriver, options: { cwd?: string; transcriptPath?: string } = {}): Promise<LayoutSessionInfo> {
    const located = await driver.locate();
    if (!located.found) {
      throw new InvalidInputError(`${driver.displayName} not found (probed: ${located.probed.join(", ") || "nothing"})`, [
        `Install ${driver.displayName} or set EDA_MAGIC_PATH`,
      ]);
    }

    const session = await driver.openSession(located, options);
    const id = randomUUID().slice(0, 8);
    const entry: Entry = { session, openedAt: new Date(), commandCount: 0 };
    this.sessions.set(id, entry);

    log.info(`layout session ${id} opened`);
    return this.describe(id, entry);
  }

  /**
   * Send one command. Tool-reported errors and timeouts come back as a failed
   * reply; the session's status tells whether it can still be used.
   */
  async send(id: string, command: string, timeoutMs: number): Promise<LayoutReply> {
    const entry = this.get(id);
    entry.commandCount++;

    try {
      const output = await entry.session.send(command, timeoutMs);
      return { sessionId: id, command, success: true, status: entry.session.status, output };
    } catch (error: unknown) {
      if (!(error instanceof OrchestrationError)) throw error;
      return {
        sessionId: id,
        command,
        success: false,
        status: entry.session.status,
        error: error.message,
        errorKind: error.kind,
        remediations: error.remediations,
      };
    }
  }

  async close(id: string): Promise<LayoutSessionInfo> {
    const entry = this.get(id);
    await entry.session.close();
    this.sessions.delete(id);
    return this.describe(id, entry);
  }

  async closeAll(): Promise<void> {
    const ids = [...this.sessions.keys()];
    await Promise.all(ids.map((id) => this.close(id)));
  }

  list(): LayoutSessionInfo[] {
    return [...this.sessions.entries()].map(([id, entry]) => this.describe(id, entry));
  }

  private get(id: string): Entry {
    const entry = this.sessions.get(id);
    if (!entry) {
      throw new InvalidInputError(`No layout session with id '${id}'`, ["Open one with layout_session_open"]);
    }
    return entry;
  }

  private describe(id: string, entry: Entry): LayoutSessionInfo {
    return {
      id,
      status: entry.session.status,
      pid: entry.session.pid,
      openedAt: entry.openedAt.toISOString(),
      commandCount: entry.commandCount,
    };
  }
}

// Export singleton instance
export const layoutSessions = new LayoutSessionRegistry();

/**
 * Close every open session, logging rather than throwing
 */
export async function shutdownLayoutSessions(): Promise<void> {
  try {
    await layoutSessions.closeAll();
  } catch (error: unknown) {
    log.warn(`error closing layout sessions: ${errorMessage(error)}`);
  }
}

// Export class for isolated registries (tests)
export { LayoutSessionRegistry };
