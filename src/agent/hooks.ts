import type { AgentState } from "../types.js";
import type { ResponseGuardrail } from "./guardrail.js";
import type { ToolCallGate } from "./tool-gate.js";

/**
 * Callback slots a host agent loop calls at two points of its
 * lifecycle.
 *
 * - `onAfterResponse`: after the final assistant reply; returns the
 *   (possibly rewritten) conversation and never throws
 * - `onBeforeToolExecution`: after the model proposes tool calls; returns
 *   the state unchanged or throws to veto execution
 */
export interface AgentHooks {
  onAfterResponse(state: AgentState): Promise<AgentState>;
  onBeforeToolExecution(state: AgentState): Promise<AgentState>;
}

export interface SyncAgentHooks {
  onAfterResponse(state: AgentState): AgentState;
  onBeforeToolExecution(state: AgentState): AgentState;
}

export interface HookComponents {
  guardrail?: ResponseGuardrail;
  toolGate?: ToolCallGate;
}

/** Bind gates to the hook slots; a missing gate leaves its slot a pass-through. */
export function createAgentHooks({
  guardrail,
  toolGate,
}: HookComponents): AgentHooks {
  return {
    onAfterResponse: async (state) =>
      guardrail ? guardrail.onAfterResponse(state) : state,
    onBeforeToolExecution: async (state) =>
      toolGate ? toolGate.onBeforeToolExecution(state) : state,
  };
}

export function createSyncAgentHooks({
  guardrail,
  toolGate,
}: HookComponents): SyncAgentHooks {
  return {
    onAfterResponse: (state) =>
      guardrail ? guardrail.onAfterResponseSync(state) : state,
    onBeforeToolExecution: (state) =>
      toolGate ? toolGate.onBeforeToolExecutionSync(state) : state,
  };
}
