/**
 * Shared test helpers: fixture paths, stand-in tool handles, temp dirs
 */

import { mkdtemp, rm } from "fs/promises";
import { tmpdir } from "os";
import { dirname, join, resolve } from "path";
import { fileURLToPath } from "url";
import { parseConfig, type AppConfig } from "../../src/config.js";
import { EnvironmentBridge } from "../../src/runner/bridge.js";
import { ToolLocator } from "../../src/runner/tool-locator.js";
import type { DriverContext } from "../../src/drivers/index.js";
import type { ToolHandle } from "../../src/types/execution.js";

export const FIXTURES_DIR = resolve(dirname(fileURLToPath(import.meta.url)), "../fixtures");

export function fixturePath(name: string): string {
  return join(FIXTURES_DIR, name);
}

/**
 * Handle that runs a fixture script with the current Node binary
 */
export function nodeToolHandle(fixture: string): ToolHandle {
  return {
    executablePath: process.execPath,
    requiresBridge: false,
    verified: true,
    baseArgs: [fixturePath(fixture)],
  };
}

export function makeTempDir(prefix: string): Promise<string> {
  return mkdtemp(join(tmpdir(), `eda-${prefix}-`));
}

export async function removeDir(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

/**
 * Driver context with the bridge switched off
 */
export function testContext(workDir: string, env: NodeJS.ProcessEnv = {}): DriverContext {
  const config: AppConfig = parseConfig({ EDA_WORK_DIR: workDir, EDA_BRIDGE_MODE: "never", ...env });
  const bridge = new EnvironmentBridge(config);
  return { config, bridge, locator: new ToolLocator({ bridge }) };
}
