/**
 * Configuration - environment driven, validated with zod
 *
 * Values come from process.env (populated from .env by dotenv in the entry
 * point). Missing keys fall back to schema defaults.
 */

import { z } from "zod";
import { join } from "path";
import { tmpdir } from "os";

const DRIVER_FAMILIES = ["yosys", "openroad", "magic"] as const;
export type DriverFamily = (typeof DRIVER_FAMILIES)[number];

/** Hard ceiling for the locator's verification run */
export const MAX_VERIFY_TIMEOUT_MS = 10_000;

const listOf = (separator: string | RegExp) =>
  z
    .string()
    .transform((value) =>
      value
        .split(separator)
        .map((item) => item.trim())
        .filter(Boolean)
    );

const configSchema = z.object({
  yosysPath: z.string().default("yosys"),
  // ";"-separated: native paths carry a ":" after the drive letter
  openroadCandidates: listOf(";").default(
    ["D:\\OpenROAD\\build\\src\\openroad", "D:\\OpenROAD\\bin\\openroad", "D:\\OpenROAD\\openroad"].join(";")
  ),
  magicPath: z.string().default("magic"),
  magicArgs: listOf(/\s+/).default(""),
  workDir: z.string().default(join(tmpdir(), "eda-tool-bridge")),
  batchTimeoutMs: z.coerce.number().int().positive().default(300_000),
  sessionTimeoutMs: z.coerce.number().int().positive().default(15_000),
  verifyTimeoutMs: z.coerce.number().int().positive().max(MAX_VERIFY_TIMEOUT_MS).default(MAX_VERIFY_TIMEOUT_MS),
  bridgeMode: z.enum(["auto", "always", "never"]).default("auto"),
  bridgeCommand: z.string().default("wsl"),
  bridgeShell: z.string().default("bash"),
  mountPrefix: z.string().regex(/^\/[^\s]*[^/]$/, "must be an absolute POSIX path without trailing slash").default("/mnt"),
  drivers: listOf(",")
    .pipe(z.array(z.enum(DRIVER_FAMILIES)))
    .default(DRIVER_FAMILIES.join(",")),
  dbPath: z.string().default(join(tmpdir(), "eda-tool-bridge", "runs.db")),
});

export type BridgeMode = z.infer<typeof configSchema>["bridgeMode"];
export type BridgeSettings = Pick<AppConfig, "bridgeMode" | "bridgeCommand" | "bridgeShell" | "mountPrefix">;
export type AppConfig = z.infer<typeof configSchema>;

let cached: AppConfig | null = null;

/**
 * Parse an environment record into a validated config
 */
export function parseConfig(env: NodeJS.ProcessEnv): AppConfig {
  const raw = {
    yosysPath: env.EDA_YOSYS_PATH,
    openroadCandidates: env.EDA_OPENROAD_CANDIDATES,
    magicPath: env.EDA_MAGIC_PATH,
    magicArgs: env.EDA_MAGIC_ARGS,
    workDir: env.EDA_WORK_DIR,
    batchTimeoutMs: env.EDA_BATCH_TIMEOUT_MS,
    sessionTimeoutMs: env.EDA_SESSION_TIMEOUT_MS,
    verifyTimeoutMs: env.EDA_VERIFY_TIMEOUT_MS,
    bridgeMode: env.EDA_BRIDGE_MODE,
    bridgeCommand: env.EDA_BRIDGE_COMMAND,
    bridgeShell: env.EDA_BRIDGE_SHELL,
    mountPrefix: env.EDA_MOUNT_PREFIX,
    drivers: env.EDA_DRIVERS,
    dbPath: env.EDA_DB_PATH,
  };

  // Strip undefined keys so the schema defaults apply
  const cleaned = Object.fromEntries(Object.entries(raw).filter(([, value]) => value !== undefined));

  const result = configSchema.safeParse(cleaned);
  if (!result.success) {
    throw new Error(`Configuration error: ${result.error.message}`);
  }
  return result.data;
}

export function getConfig(): AppConfig {
  if (!cached) {
    cached = parseConfig(process.env);
  }
  return cached;
}

/** Drop the cached config (tests) */
export function resetConfig(): void {
  cached = null;
}
