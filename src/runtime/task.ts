/**
 * A cancellable subsystem task. `outcome` never rejects, so a task that
 * fails while nobody is waiting on it is not an unhandled rejection.
 */

export type TaskOutcome = { ok: true } | { ok: false; error: unknown };

export class Task {
  done = false;
  /** Set once the run loop has seen this task's outcome. */
  reported = false;
  readonly outcome: Promise<TaskOutcome>;
  private readonly controller = new AbortController();

  constructor(readonly name: string, run: (signal: AbortSignal) => Promise<unknown>) {
    this.outcome = run(this.controller.signal).then(
      (): TaskOutcome => {
        this.done = true;
        return { ok: true };
      },
      (error: unknown): TaskOutcome => {
        this.done = true;
        return { ok: false, error };
      },
    );
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  cancel(): void {
    this.controller.abort();
  }
}

export interface TaskEvent {
  task: Task;
  outcome: TaskOutcome;
}

/**
 * Resolves when `main` settles or when any unreported task in `others`
 * fails, whichever happens first. The task it reports is marked reported.
 */
export function nextTaskEvent(main: Task, others: readonly Task[]): Promise<TaskEvent> {
  return new Promise((resolve) => {
    let settled = false;
    const report = (task: Task, outcome: TaskOutcome) => {
      if (settled) return;
      settled = true;
      task.reported = true;
      resolve({ task, outcome });
    };
    void main.outcome.then((o) => report(main, o));
    for (const task of others) {
      if (task.reported) continue;
      void task.outcome.then((o) => {
        if (o.ok) task.reported = true;
        else report(task, o);
      });
    }
  });
}
