/**
 * IOProvider: shared scratchpad between inputs, the fuser and the mode
 * manager for one runtime.
 *
 * Inputs publish their latest text here; inputs flagged for mode
 * transitions also queue text that the next tick hands to the mode manager.
 */

export interface InputRecord {
  text: string;
  timestamp: number;
}

export class IOProvider {
  private inputs = new Map<string, InputRecord>();
  private transitionInputs: string[] = [];
  private _lastPrompt: string | null = null;

  recordInput(name: string, text: string, timestamp = Date.now()): void {
    this.inputs.set(name, { text, timestamp });
  }

  getInput(name: string): InputRecord | undefined {
    return this.inputs.get(name);
  }

  getInputs(): Record<string, InputRecord> {
    return Object.fromEntries(this.inputs);
  }

  clearInputs(): void {
    this.inputs.clear();
  }

  addModeTransitionInput(text: string): void {
    const trimmed = text.trim();
    if (trimmed) this.transitionInputs.push(trimmed);
  }

  /** Everything queued since the last call, joined; null when nothing arrived. */
  consumeModeTransitionInput(): string | null {
    if (this.transitionInputs.length === 0) return null;
    const text = this.transitionInputs.join(" ");
    this.transitionInputs = [];
    return text;
  }

  recordPrompt(prompt: string): void {
    this._lastPrompt = prompt;
  }

  get lastPrompt(): string | null {
    return this._lastPrompt;
  }
}
