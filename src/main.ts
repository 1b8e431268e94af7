#!/usr/bin/env node
/**
 * modecortex: runs a robot agent from a mode configuration.
 *
 * Loads `<config-dir>/<config-name>.json`, starts the mode-aware cortex
 * and runs until SIGINT/SIGTERM or a fatal transition failure.
 */

import { join } from "node:path";
import "./plugins/register-plugins.js";
import { Logger, C } from "./logger.js";
import { asError, errorLogFields, isCortexError } from "./errors.js";
import { parseArgs, usage } from "./cli/config.js";
import { loadModeConfig } from "./modes/loader.js";
import { ModeCortexRuntime } from "./runtime/mode-cortex.js";
import { getVersion } from "./utils/version.js";

export async function main(argv: readonly string[] = process.argv.slice(2)): Promise<number> {
  const command = parseArgs(argv);
  if (command.kind === "help") {
    Logger.info(usage());
    return 0;
  }
  if (command.kind === "version") {
    Logger.info(`modecortex ${getVersion()}`);
    return 0;
  }

  const opts = command.options;
  if (opts.logLevel) process.env.CORTEX_LOG_LEVEL = opts.logLevel;
  Logger.setVerbose(opts.verbose || opts.logLevel === "DEBUG");
  if (opts.logToFile) Logger.setLogFile(join(opts.logDir, `${opts.configName}.log`));

  const config = loadModeConfig(opts.configName, { configDir: opts.configDir });
  Logger.info(C.gray(`modecortex ${getVersion()}: ${config.name} (${Object.keys(config.modes).length} modes)`));

  const runtime = new ModeCortexRuntime(config, { stateDir: config.modeMemoryEnabled ? opts.stateDir : null });

  let signals = 0;
  const onSignal = (signal: NodeJS.Signals) => {
    signals++;
    if (signals > 1) {
      Logger.warn(`${signal} again, exiting immediately`);
      process.exit(130);
    }
    Logger.info(`${signal} received, stopping...`);
    runtime.stop();
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);

  try {
    await runtime.run();
    return 0;
  } finally {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
  }
}

process.on("unhandledRejection", (reason: unknown) => {
  const err = asError(reason);
  Logger.error(C.red(`unhandled rejection: ${err.message}`));
  if (err.stack) Logger.error(C.red(err.stack));
});

const mainError = (e: unknown) => {
  if (isCortexError(e)) {
    Logger.error(C.red(`modecortex: ${e.message}`), errorLogFields(e));
  } else {
    const err = asError(e);
    Logger.error("modecortex:", err.message);
    if (err.stack) Logger.error(err.stack);
  }
  process.exit(1);
};

main()
  .then((code) => process.exit(code))
  .catch(mainError);
