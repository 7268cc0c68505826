/**
 * Driver registry - the enabled tool families, chosen by EDA_DRIVERS
 */

import { getConfig, type AppConfig, type DriverFamily } from "../config.js";
import { EnvironmentBridge } from "../runner/bridge.js";
import { ToolLocator } from "../runner/tool-locator.js";
import { MagicDriver } from "./magic-driver.js";
import { OpenRoadDriver } from "./openroad-driver.js";
import type { DriverContext, DriverOverrides } from "./tool-driver.js";
import { YosysDriver } from "./yosys-driver.js";

export interface DriverRegistry {
  readonly context: DriverContext;
  readonly yosys?: YosysDriver;
  readonly openroad?: OpenRoadDriver;
  readonly magic?: MagicDriver;
}

export function createDriverContext(config: AppConfig): DriverContext {
  const bridge = new EnvironmentBridge(config);
  return { config, bridge, locator: new ToolLocator({ bridge }) };
}

/**
 * Build drivers for the enabled families only
 */
export function createDriverRegistry(
  context: DriverContext,
  overrides: Partial<Record<DriverFamily, DriverOverrides>> = {}
): DriverRegistry {
  const enabled = new Set(context.config.drivers);
  return {
    context,
    yosys: enabled.has("yosys") ? new YosysDriver(context, overrides.yosys) : undefined,
    openroad: enabled.has("openroad") ? new OpenRoadDriver(context, overrides.openroad) : undefined,
    magic: enabled.has("magic") ? new MagicDriver(context, overrides.magic) : undefined,
  };
}

let registry: DriverRegistry | null = null;

export function getDriverRegistry(): DriverRegistry {
  if (!registry) {
    registry = createDriverRegistry(createDriverContext(getConfig()));
  }
  return registry;
}

export { YosysDriver, OpenRoadDriver, MagicDriver };
export type { ToolDriver, DriverContext, DriverOverrides, DriverBatchOptions } from "./tool-driver.js";
