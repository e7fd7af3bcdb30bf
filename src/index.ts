import { ReviewClient } from "./core/client.js";
import { ResponseGuardrail } from "./agent/guardrail.js";
import { ToolCallGate } from "./agent/tool-gate.js";
import { createAgentHooks, createSyncAgentHooks } from "./agent/hooks.js";
import type { AgentHooks, SyncAgentHooks } from "./agent/hooks.js";
import type {
  ApprovalConfig,
  GuardrailConfig,
  ReviewClientConfig,
} from "./types.js";

export type {
  AgentState,
  ApprovalConfig,
  ConversationMessage,
  GuardrailConfig,
  GuardrailMode,
  MessageAnnotations,
  MessageRole,
  PollOptions,
  ReviewClientConfig,
  ReviewTask,
  ReviewTaskState,
  ReviewVerdict,
  ReviewWarning,
  ToolCallRequest,
} from "./types.js";
export {
  ApprovalDeniedError,
  ApprovalTimeoutError,
  ReviewGateError,
  ServiceError,
} from "./types.js";
export type { ApprovalPolicy, GuardrailPolicy } from "./config.js";
export { ReviewClient } from "./core/client.js";
export { ApprovalWaiter } from "./core/approval.js";
export { maxPollAttempts } from "./core/poll.js";
export type { ReviewEffect, ReviewProgram } from "./core/program.js";
export { HttpReviewTransport } from "./core/transport.js";
export type { ReviewTransport, SyncReviewTransport } from "./core/transport.js";
export type { AsyncWaiter, Clock, SyncWaiter } from "./core/wait.js";
export {
  REVIEW_TASK_STATES,
  classifyVerdict,
  isApproved,
  isBlocking,
  isChangeRequested,
  isDenied,
  isPending,
  isProcessing,
  isTerminal,
  requiresIntervention,
} from "./core/verdict.js";
export { ResponseGuardrail } from "./agent/guardrail.js";
export type { GuardrailOutcome, GuardrailResult } from "./agent/guardrail.js";
export { ToolCallGate } from "./agent/tool-gate.js";
export { createAgentHooks, createSyncAgentHooks } from "./agent/hooks.js";
export type { AgentHooks, SyncAgentHooks } from "./agent/hooks.js";
export { createLogger } from "./logger.js";

/** Handle returned by ReviewGate.init(), the main entry point for the SDK. */
export interface ReviewGateInstance {
  /** The shared review-service client. */
  readonly client: ReviewClient;

  /**
   * Create a post-response guardrail that reviews the agent's final
   * reply and replaces or annotates it when the verdict blocks.
   */
  guardrail(config?: GuardrailConfig): ResponseGuardrail;

  /**
   * Create a pre-execution gate that holds each proposed tool call until
   * the review service approves it.
   */
  toolGate(config?: ApprovalConfig): ToolCallGate;

  /**
   * Build both gates and bind them to the `onAfterResponse` /
   * `onBeforeToolExecution` callback slots.
   */
  hooks(config?: {
    guardrail?: GuardrailConfig;
    toolGate?: ApprovalConfig;
  }): AgentHooks;

  /** Blocking variant of hooks(); needs `syncTransport` in the client config. */
  hooksSync(config?: {
    guardrail?: GuardrailConfig;
    toolGate?: ApprovalConfig;
  }): SyncAgentHooks;
}

/**
 * Top-level ReviewGate namespace.
 *
 * ```ts
 * import { ReviewGate } from "agent-review-gate";
 *
 * const gate  = ReviewGate.init({ apiKey: process.env.REVIEW_GATE_API_KEY });
 * const hooks = gate.hooks({
 *   guardrail: { mode: "blocking" },
 *   toolGate: { requireApprovalFor: ["delete_file"] },
 * });
 *
 * await hooks.onBeforeToolExecution(state); // throws on veto
 * state = await hooks.onAfterResponse(state);
 * ```
 */
export const ReviewGate = {
  /**
   * Initialise the SDK: validates the configuration, builds one client
   * and returns factories for the gates that share it.
   */
  init(config: ReviewClientConfig = {}): ReviewGateInstance {
    const client = new ReviewClient(config);

    const components = (c: {
      guardrail?: GuardrailConfig;
      toolGate?: ApprovalConfig;
    }) => ({
      guardrail: new ResponseGuardrail(client, c.guardrail),
      toolGate: new ToolCallGate(client, c.toolGate),
    });

    return {
      client,
      guardrail: (guardrailConfig?: GuardrailConfig) =>
        new ResponseGuardrail(client, guardrailConfig),
      toolGate: (approvalConfig?: ApprovalConfig) =>
        new ToolCallGate(client, approvalConfig),
      hooks: (c = {}) => createAgentHooks(components(c)),
      hooksSync: (c = {}) => createSyncAgentHooks(components(c)),
    };
  },
};
