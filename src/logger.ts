import { appendFileSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";

export const C = {
  reset: "\x1b[0m",
  bold: (s: string) => `\x1b[1m${s}\x1b[0m`,
  red: (s: string) => `\x1b[31m${s}\x1b[0m`,
  green: (s: string) => `\x1b[32m${s}\x1b[0m`,
  yellow: (s: string) => `\x1b[33m${s}\x1b[0m`,
  blue: (s: string) => `\x1b[34m${s}\x1b[0m`,
  magenta: (s: string) => `\x1b[35m${s}\x1b[0m`,
  cyan: (s: string) => `\x1b[36m${s}\x1b[0m`,
  gray: (s: string) => `\x1b[90m${s}\x1b[0m`,
};

type Level = "DEBUG" | "INFO" | "WARN" | "ERROR";

const ANSI_RE = /\x1b\[[0-9;]*m/g;

function render(args: unknown[]): string {
  return args
    .map((a) => {
      if (typeof a === "string") return a;
      if (a instanceof Error) return a.stack ?? a.message;
      try {
        return JSON.stringify(a);
      } catch {
        return String(a);
      }
    })
    .join(" ")
    .replace(ANSI_RE, "");
}

export class Logger {
  private static _verbose = false;
  private static _logFile: string | null = null;

  static setVerbose(v: boolean) { Logger._verbose = v; }
  static isVerbose() { return Logger._verbose; }

  /** Mirror every line into a file as well as the console. Pass null to stop. */
  static setLogFile(path: string | null) {
    if (path) mkdirSync(dirname(path), { recursive: true });
    Logger._logFile = path;
  }

  static info(...args: unknown[]) {
    console.log(...args);
    Logger.toFile("INFO", args);
  }

  static warn(...args: unknown[]) {
    console.warn(...args);
    Logger.toFile("WARN", args);
  }

  static error(...args: unknown[]) {
    console.error(...args);
    Logger.toFile("ERROR", args);
  }

  static debug(...args: unknown[]) {
    // Debug requires BOTH verbose mode AND CORTEX_LOG_LEVEL=DEBUG
    const debugLevel = (process.env.CORTEX_LOG_LEVEL ?? "").toUpperCase() === "DEBUG";
    if (Logger._verbose && debugLevel) {
      console.log(...args);
      Logger.toFile("DEBUG", args);
    }
  }

  private static toFile(level: Level, args: unknown[]) {
    if (!Logger._logFile) return;
    try {
      appendFileSync(Logger._logFile, `${new Date().toISOString()} ${level} ${render(args)}\n`);
    } catch (e: unknown) {
      Logger._logFile = null;
      console.error(`log file disabled: ${e instanceof Error ? e.message : String(e)}`);
    }
  }
}
