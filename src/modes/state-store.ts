/**
 * Last-active-mode persistence.
 *
 * Layout:
 *   <stateDir>/
 *     .<configName>.json  : { last_active_mode, previous_mode, timestamp, transition_history }
 *
 * Writes go to a temp file first and are renamed over the old snapshot.
 */

import { mkdirSync, readFileSync, renameSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { z } from "zod";
import { Logger } from "../logger.js";
import { asError, cortexError, errorLogFields } from "../errors.js";

export const PERSISTED_HISTORY = 10;

export const modeSnapshotSchema = z.object({
  last_active_mode: z.string().min(1),
  previous_mode: z.string().nullable().default(null),
  /** Seconds since the epoch. */
  timestamp: z.number(),
  transition_history: z.array(z.string()).default([]),
});

export type ModeSnapshot = z.infer<typeof modeSnapshotSchema>;

export function defaultStateDir(configDir: string): string {
  return join(configDir, "memory");
}

export class ModeStateStore {
  readonly path: string;

  constructor(readonly stateDir: string, readonly configName: string) {
    this.path = join(stateDir, `.${configName}.json`);
  }

  /** Persist the snapshot. Failures are logged, never thrown. */
  save(snapshot: ModeSnapshot): boolean {
    const data: ModeSnapshot = {
      ...snapshot,
      transition_history: snapshot.transition_history.slice(-PERSISTED_HISTORY),
    };
    const tmp = `${this.path}.tmp`;
    try {
      mkdirSync(this.stateDir, { recursive: true });
      writeFileSync(tmp, JSON.stringify(data, null, 2));
      renameSync(tmp, this.path);
      Logger.debug(`[State] saved ${this.path}`);
      return true;
    } catch (e: unknown) {
      const ce = cortexError("state_error", `Could not save mode state: ${asError(e).message}`, { cause: e });
      Logger.error("[State]", errorLogFields(ce));
      return false;
    }
  }

  /** The stored snapshot, or null when absent or unreadable. */
  load(): ModeSnapshot | null {
    let text: string;
    try {
      text = readFileSync(this.path, "utf-8");
    } catch (e: unknown) {
      Logger.debug(`[State] no state file at ${this.path}: ${asError(e).message}`);
      return null;
    }
    try {
      const parsed = modeSnapshotSchema.safeParse(JSON.parse(text));
      if (parsed.success) return parsed.data;
      Logger.warn(`[State] invalid state file ${this.path}: ${parsed.error.issues[0]?.message ?? "unknown"}`);
    } catch (e: unknown) {
      Logger.warn(`[State] invalid state file ${this.path}: ${asError(e).message}`);
    }
    return null;
  }
}
