/**
 * Config file discovery and loading.
 */

import { existsSync } from "node:fs";
import { resolve } from "node:path";
import { pathToFileURL } from "node:url";
import { ConfigFileNotFoundError } from "../errors/config.errors.js";
import { parseConfig, type ScanDriftConfig } from "./schema.js";

export const DEFAULT_CONFIG_FILES = ["scan-drift.config.js", "scan-drift.config.mjs"];

function exportedConfig(mod: unknown): unknown {
  if (typeof mod === "object" && mod !== null && "default" in mod) {
    return mod.default;
  }
  return mod;
}

/**
 * Load config from a scan-drift config file, layered under environment variables.
 * Without an explicit path and with no default file present, config comes from the environment alone.
 */
export async function loadConfig(
  configPath?: string,
  env: Record<string, string | undefined> = process.env
): Promise<ScanDriftConfig> {
  const paths = configPath
    ? [resolve(configPath)]
    : DEFAULT_CONFIG_FILES.map((name) => resolve(name));

  for (const p of paths) {
    if (existsSync(p)) {
      const mod: unknown = await import(pathToFileURL(p).href);
      return parseConfig(exportedConfig(mod), env);
    }
  }

  if (configPath) {
    throw new ConfigFileNotFoundError(resolve(configPath));
  }
  return parseConfig({}, env);
}
