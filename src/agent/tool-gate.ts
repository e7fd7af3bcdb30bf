import type { Logger } from "pino";
import { resolveApprovalPolicy } from "../config.js";
import type { ApprovalPolicy } from "../config.js";
import { ApprovalWaiter } from "../core/approval.js";
import type { ReviewClient } from "../core/client.js";
import { submitTask } from "../core/program.js";
import type { ReviewProgram } from "../core/program.js";
import { classifyVerdict } from "../core/verdict.js";
import { ApprovalDeniedError } from "../types.js";
import type {
  AgentState,
  ApprovalConfig,
  ReviewTask,
  ReviewVerdict,
  ToolCallRequest,
} from "../types.js";
import { conversationContext, lastMessage } from "./messages.js";

/**
 * Pre-execution approval gate for tool calls.
 *
 * Every tool call on the latest assistant turn (or only those named in
 * `requireApprovalFor`) is submitted for review, one at a time and in
 * order. The first denial or timeout aborts the batch by throwing;
 * later calls are never submitted. When everything clears, the state
 * comes back untouched and the host executes the calls itself.
 *
 * ```ts
 * const gate = new ToolCallGate(client, {
 *   requireApprovalFor: ["delete_user", "execute_payment"],
 *   timeoutMs: 600_000,
 * });
 * await gate.onBeforeToolExecution(state); // throws ApprovalDeniedError on veto
 * ```
 */
export class ToolCallGate {
  readonly policy: ApprovalPolicy;
  private readonly waiter: ApprovalWaiter;
  private readonly logger: Logger;

  constructor(
    private readonly client: ReviewClient,
    config: ApprovalConfig = {},
  ) {
    this.policy = resolveApprovalPolicy(config);
    this.waiter = new ApprovalWaiter(client, {
      pollIntervalMs: this.policy.pollIntervalMs,
      timeoutMs: this.policy.timeoutMs,
    });
    this.logger = client.logger.child({ component: "ToolCallGate" });
  }

  onBeforeToolExecution(state: AgentState): Promise<AgentState> {
    return this.client.run(this.program(state));
  }

  onBeforeToolExecutionSync(state: AgentState): AgentState {
    return this.client.runSync(this.program(state));
  }

  /** Tool calls on the last message that go through review. */
  pendingCalls(state: AgentState): ToolCallRequest[] {
    const calls = lastMessage(state)?.toolCalls ?? [];
    const allowList = this.policy.requireApprovalFor;
    if (allowList === undefined) return calls;
    return calls.filter((tc) => allowList.includes(tc.name));
  }

  *program(state: AgentState): ReviewProgram<AgentState> {
    const calls = this.pendingCalls(state);
    if (calls.length === 0) return state;

    const context = conversationContext(state);

    for (const call of calls) {
      const submitted = yield* submitTask(this.buildTask(call, context));

      let verdict: ReviewVerdict = submitted;
      if (classifyVerdict(submitted) === "pending") {
        this.logger.info(
          { tool: call.name, review_task_id: submitted.review_task_id },
          "waiting for tool call approval",
        );
        verdict = yield* this.waiter.program(submitted.review_task_id, call.name);
      }

      if (classifyVerdict(verdict) === "approved") {
        this.logger.debug(
          { tool: call.name, review_task_id: verdict.review_task_id },
          "tool call approved",
        );
        continue;
      }

      // Blocking verdict. Polling only returns terminal states, so
      // anything else here fails closed too.
      this.logger.warn(
        {
          tool: call.name,
          review_task_id: verdict.review_task_id,
          state: verdict.state,
          reason: verdict.requested_change,
        },
        "tool call denied",
      );
      throw new ApprovalDeniedError(
        `Tool execution denied for ${call.name}: ${verdict.requested_change ?? "No reason provided"}`,
        verdict.review_task_id,
        call.name,
        verdict.requested_change,
      );
    }

    return state;
  }

  // ── Private helpers ────────────────────────────────────────────────

  private buildTask(call: ToolCallRequest, context: string[]): ReviewTask {
    return {
      function_name: call.name,
      args: call.args,
      doc: `Agent requesting to execute: ${call.name}`,
      llm_explanation: "Tool call from agent workflow",
      metadata: {
        ...this.policy.metadata,
        tool_call_id: call.id,
        middleware: "ToolCallGate",
        conversation_context: context,
      },
    };
  }
}
