/**
 * CLI argument parsing and help text.
 */

import { join } from "node:path";
import { cortexError } from "../errors.js";
import { Logger } from "../logger.js";
import { DEFAULT_CONFIG_DIR } from "../modes/loader.js";
import { defaultStateDir } from "../modes/state-store.js";
import { getVersion } from "../utils/version.js";

export const LOG_LEVELS = ["DEBUG", "INFO", "WARN", "ERROR"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface CliOptions {
  configName: string;
  configDir: string;
  stateDir: string;
  logLevel: LogLevel | null;
  logToFile: boolean;
  logDir: string;
  verbose: boolean;
}

export type CliCommand =
  | { kind: "run"; options: CliOptions }
  | { kind: "help" }
  | { kind: "version" };

const VALUE_FLAGS = new Set(["--config-dir", "--state-dir", "--log-level", "--log-dir"]);

function parseLogLevel(value: string): LogLevel {
  const upper = value.toUpperCase();
  const level = LOG_LEVELS.find((l) => l === upper);
  if (!level) {
    throw cortexError("config_error", `--log-level must be one of ${LOG_LEVELS.join(", ")} (got '${value}')`);
  }
  return level;
}

export function parseArgs(argv: readonly string[], env: NodeJS.ProcessEnv = process.env): CliCommand {
  const flags = new Map<string, string>();
  const positional: string[] = [];
  let logToFile = false;
  let verbose = false;

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i] ?? "";
    const eq = token.indexOf("=");
    const arg = token.startsWith("--") && eq > 0 ? token.slice(0, eq) : token;
    const inline = token.startsWith("--") && eq > 0 ? token.slice(eq + 1) : null;

    if (arg === "-h" || arg === "--help") return { kind: "help" };
    else if (arg === "-V" || arg === "--version") return { kind: "version" };
    else if (arg === "-v" || arg === "--verbose") verbose = true;
    else if (arg === "--log-to-file") logToFile = true;
    else if (VALUE_FLAGS.has(arg)) {
      const value = inline ?? argv[++i];
      if (value === undefined || value === "") {
        throw cortexError("config_error", `${arg} needs a value`);
      }
      flags.set(arg, value);
    }
    else if (!arg.startsWith("-")) positional.push(arg);
    else Logger.warn(`Unknown flag: ${arg}`);
  }

  const configName = positional[0];
  if (!configName) {
    throw cortexError("config_error", "missing <config-name>; see --help");
  }
  if (positional.length > 1) Logger.warn(`ignoring extra arguments: ${positional.slice(1).join(" ")}`);

  const configDir = flags.get("--config-dir") ?? env.CORTEX_CONFIG_DIR ?? DEFAULT_CONFIG_DIR;
  const level = flags.get("--log-level");
  return {
    kind: "run",
    options: {
      configName,
      configDir,
      stateDir: flags.get("--state-dir") ?? defaultStateDir(configDir),
      logLevel: level ? parseLogLevel(level) : null,
      logToFile,
      logDir: flags.get("--log-dir") ?? join(configDir, "..", "logs"),
      verbose,
    },
  };
}

export function usage(): string {
  return `modecortex ${getVersion()}, a mode-aware robot cortex runtime

usage:
  modecortex <config-name> [options]

options:
  --config-dir <dir>     directory holding <config-name>.json (default: ./config, env: CORTEX_CONFIG_DIR)
  --state-dir <dir>      where the last active mode is remembered (default: <config-dir>/memory)
  --log-level <level>    DEBUG | INFO | WARN | ERROR (env: CORTEX_LOG_LEVEL)
  --log-to-file          also append log lines to <log-dir>/<config-name>.log
  --log-dir <dir>        log directory (default: <config-dir>/../logs)
  -v, --verbose          verbose output (debug lines need CORTEX_LOG_LEVEL=DEBUG too)
  -h, --help             show this help
  -V, --version          show version

environment:
  ROBOT_IP, CORTEX_API_KEY, URID fill empty robot_ip / api_key / URID settings.`;
}
