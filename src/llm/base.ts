import type { AgentAction } from "../actions/base.js";
import type { CortexOutput } from "../cortex-types.js";

/**
 * A reasoning backend. Given the fused prompt and the actions of the active
 * mode, returns the actions to take, or null when it has nothing to do or
 * the backend failed (failures are logged by the backend).
 */
export interface CortexLLM {
  readonly name: string;
  ask(prompt: string, actions: AgentAction[]): Promise<CortexOutput | null>;
  stop?(): void | Promise<void>;
}
