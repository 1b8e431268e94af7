import { existsSync, readFileSync } from "node:fs";
import { join, resolve } from "node:path";
import { Logger } from "../logger.js";
import { asError, cortexError } from "../errors.js";
import { modeSystemSchema, type ParsedModeSystemConfig } from "./schema.js";
import { buildModeSystemConfig, type ModeSystemConfig } from "./config.js";

export const DEFAULT_CONFIG_DIR = "config";

export interface LoadOptions {
  configDir?: string;
  env?: NodeJS.ProcessEnv;
}

export function configPath(configName: string, configDir = DEFAULT_CONFIG_DIR): string {
  if (!configName || /[\\/]/.test(configName) || configName.includes("..")) {
    throw cortexError("config_error", `Invalid config name '${configName}'`);
  }
  const file = configName.endsWith(".json") ? configName : `${configName}.json`;
  return resolve(join(configDir, file));
}

/** Fill empty globals from the environment. */
export function applyEnvFallbacks(doc: ParsedModeSystemConfig, env: NodeJS.ProcessEnv): ParsedModeSystemConfig {
  const out = { ...doc };
  if (!out.robot_ip && env.ROBOT_IP) {
    Logger.info("[Config] robot_ip not set, using ROBOT_IP from the environment");
    out.robot_ip = env.ROBOT_IP;
  }
  if (!out.api_key && env.CORTEX_API_KEY) {
    Logger.info("[Config] api_key not set, using CORTEX_API_KEY from the environment");
    out.api_key = env.CORTEX_API_KEY;
  }
  if (out.URID === "default" && env.URID) {
    Logger.info("[Config] URID not set, using URID from the environment");
    out.URID = env.URID;
  }
  return out;
}

/** Validate an already-parsed document. */
export function parseModeConfig(raw: unknown, configName: string, env: NodeJS.ProcessEnv = process.env): ModeSystemConfig {
  const parsed = modeSystemSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw cortexError("config_error", `Invalid mode config '${configName}': ${issues}`);
  }
  return buildModeSystemConfig(applyEnvFallbacks(parsed.data, env), configName);
}

/**
 * Load `<configDir>/<configName>.json`. Every problem (missing file, bad
 * JSON, schema or cross-reference failure) is a config_error.
 */
export function loadModeConfig(configName: string, opts: LoadOptions = {}): ModeSystemConfig {
  const path = configPath(configName, opts.configDir);
  if (!existsSync(path)) {
    throw cortexError("config_error", `Config file not found: ${path}`);
  }
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (e: unknown) {
    throw cortexError("config_error", `Could not parse ${path}: ${asError(e).message}`, { cause: e });
  }
  const name = configName.replace(/\.json$/, "");
  const config = parseModeConfig(raw, name, opts.env ?? process.env);
  Logger.debug(`[Config] loaded ${path}: ${Object.keys(config.modes).length} mode(s), ${config.transitionRules.length} rule(s)`);
  return config;
}
