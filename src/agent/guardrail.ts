import type { Logger } from "pino";
import { resolveGuardrailPolicy } from "../config.js";
import type { GuardrailPolicy } from "../config.js";
import { ApprovalWaiter } from "../core/approval.js";
import type { ReviewClient } from "../core/client.js";
import { submitTask } from "../core/program.js";
import type { ReviewProgram } from "../core/program.js";
import { classifyVerdict } from "../core/verdict.js";
import { ApprovalTimeoutError } from "../types.js";
import type {
  AgentState,
  ConversationMessage,
  GuardrailConfig,
  ReviewTask,
  ReviewVerdict,
} from "../types.js";
import {
  assistantMessage,
  conversationContext,
  lastMessage,
  messageText,
  replaceLastMessage,
} from "./messages.js";

export const RESPONSE_FUNCTION_NAME = "agent_response";
export const TIMEOUT_MESSAGE = "Response review timed out.";
export const ERROR_MESSAGE = "Response blocked due to review system error.";

/**
 * What the guardrail did with a response:
 *
 * - `skipped`: last message is not an assistant reply
 * - `approved`: response stands
 * - `blocked`: response replaced (denial, timeout or service failure)
 * - `flagged`: logging mode; response stands, with a warning attached
 *   when the verdict was immediate
 * - `timed_out` / `failed`: logging mode; response left as is
 */
export type GuardrailOutcome =
  | "skipped"
  | "approved"
  | "blocked"
  | "flagged"
  | "timed_out"
  | "failed";

export interface GuardrailResult {
  state: AgentState;
  outcome: GuardrailOutcome;
  reviewTaskId?: string;
}

/**
 * Post-response guardrail.
 *
 * After the agent produces its final reply, submits it for review and
 * lets it stand, replaces it with a substitute message, or (in logging
 * mode) annotates it with a warning. Never re-invokes the agent and
 * never throws: every failure resolves to a state.
 *
 * ```ts
 * const guardrail = new ResponseGuardrail(client, { mode: "blocking" });
 * state = await guardrail.onAfterResponse(state);
 * ```
 */
export class ResponseGuardrail {
  readonly policy: GuardrailPolicy;
  private readonly waiter: ApprovalWaiter;
  private readonly logger: Logger;

  constructor(
    private readonly client: ReviewClient,
    config: GuardrailConfig = {},
  ) {
    this.policy = resolveGuardrailPolicy(config);
    this.waiter = new ApprovalWaiter(client, {
      pollIntervalMs: this.policy.pollIntervalMs,
      timeoutMs: this.policy.approvalTimeoutMs,
    });
    this.logger = client.logger.child({
      component: "ResponseGuardrail",
      mode: this.policy.mode,
    });
  }

  // ── Hook entry points ──────────────────────────────────────────────

  async onAfterResponse(state: AgentState): Promise<AgentState> {
    return (await this.evaluate(state)).state;
  }

  onAfterResponseSync(state: AgentState): AgentState {
    return this.evaluateSync(state).state;
  }

  evaluate(state: AgentState): Promise<GuardrailResult> {
    return this.client.run(this.program(state));
  }

  evaluateSync(state: AgentState): GuardrailResult {
    return this.client.runSync(this.program(state));
  }

  // ── Decision program ───────────────────────────────────────────────

  *program(state: AgentState): ReviewProgram<GuardrailResult> {
    const last = lastMessage(state);
    if (!last || last.role !== "assistant") {
      return { state, outcome: "skipped" };
    }

    const blocking = this.policy.mode === "blocking";
    let submitted: ReviewVerdict | undefined;

    try {
      submitted = yield* submitTask(this.buildTask(state, last));
      const reviewTaskId = submitted.review_task_id;

      switch (classifyVerdict(submitted)) {
        case "approved":
          return { state, outcome: "approved", reviewTaskId };
        case "blocking":
          return this.applyBlockingVerdict(state, last, submitted);
        case "pending":
          break;
      }

      const final = yield* this.waiter.program(
        reviewTaskId,
        RESPONSE_FUNCTION_NAME,
      );

      switch (classifyVerdict(final)) {
        case "approved":
          return { state, outcome: "approved", reviewTaskId };
        case "blocking":
          if (!blocking) {
            // Warnings are only attached for an immediate verdict.
            this.logger.warn(
              {
                review_task_id: reviewTaskId,
                state: final.state,
                reason: final.requested_change,
              },
              "response flagged by review after waiting",
            );
            return { state, outcome: "flagged", reviewTaskId };
          }
          return this.applyBlockingVerdict(state, last, final);
        case "pending":
          // pollUntilTerminal only returns terminal verdicts
          return { state, outcome: "failed", reviewTaskId };
      }
    } catch (err) {
      if (err instanceof ApprovalTimeoutError) {
        this.logger.warn(
          { review_task_id: err.reviewTaskId, elapsedMs: err.elapsedMs },
          "response review timed out",
        );
        if (!blocking) {
          return { state, outcome: "timed_out", reviewTaskId: err.reviewTaskId };
        }
        return {
          state: replaceLastMessage(
            state,
            assistantMessage(TIMEOUT_MESSAGE, {
              blocked: true,
              review_task_id: err.reviewTaskId,
              reason: "Timeout waiting for approval",
            }),
          ),
          outcome: "blocked",
          reviewTaskId: err.reviewTaskId,
        };
      }

      // Service failures are judged like a denial: the mode decides.
      const detail = err instanceof Error ? err.message : String(err);
      this.logger.error(
        { err, review_task_id: submitted?.review_task_id },
        "response review failed",
      );
      if (!blocking) {
        return { state, outcome: "failed", reviewTaskId: submitted?.review_task_id };
      }
      return {
        state: replaceLastMessage(
          state,
          assistantMessage(ERROR_MESSAGE, { blocked: true, error: detail }),
        ),
        outcome: "blocked",
        reviewTaskId: submitted?.review_task_id,
      };
    }
  }

  // ── Private helpers ────────────────────────────────────────────────

  private buildTask(state: AgentState, last: ConversationMessage): ReviewTask {
    return {
      function_name: RESPONSE_FUNCTION_NAME,
      args: {
        response: messageText(last),
        conversation_context: conversationContext(state),
      },
      doc: "Agent response requiring governance review",
      metadata: {
        ...this.policy.metadata,
        middleware: "ResponseGuardrail",
        mode: this.policy.mode,
      },
    };
  }

  /**
   * Blocking mode swaps in a new message; logging mode annotates the
   * original message in place and leaves the conversation as it was.
   */
  private applyBlockingVerdict(
    state: AgentState,
    last: ConversationMessage,
    verdict: ReviewVerdict,
  ): GuardrailResult {
    const reviewTaskId = verdict.review_task_id;
    const reason = verdict.requested_change;

    if (this.policy.mode === "logging") {
      this.logger.warn(
        { review_task_id: reviewTaskId, state: verdict.state, reason },
        "response flagged by review",
      );
      if (!last.annotations) last.annotations = {};
      last.annotations.review_warning = { review_task_id: reviewTaskId, reason };
      return { state, outcome: "flagged", reviewTaskId };
    }

    this.logger.warn(
      { review_task_id: reviewTaskId, state: verdict.state, reason },
      "response blocked by review",
    );
    return {
      state: replaceLastMessage(
        state,
        assistantMessage(this.policy.blockedMessage, {
          blocked: true,
          review_task_id: reviewTaskId,
          reason,
        }),
      ),
      outcome: "blocked",
      reviewTaskId,
    };
  }
}
