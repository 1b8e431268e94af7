/** Long-running work tied to a mode; `run` loops until its signal fires. */
export interface Background {
  readonly name: string;
  run(signal: AbortSignal): Promise<void>;
  stop?(): void | Promise<void>;
}
