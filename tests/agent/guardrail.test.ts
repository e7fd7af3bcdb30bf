import { describe, it, expect } from "vitest";
import {
  ERROR_MESSAGE,
  ResponseGuardrail,
  TIMEOUT_MESSAGE,
} from "../../src/agent/guardrail.js";
import type { GuardrailResult } from "../../src/agent/guardrail.js";
import { DEFAULT_BLOCKED_MESSAGE } from "../../src/config.js";
import { ServiceError } from "../../src/types.js";
import type { AgentState, GuardrailConfig } from "../../src/types.js";
import { conversation, fakeClient } from "../helpers/fake-service.js";

// ── Helpers ────────────────────────────────────────────────────────────

const REPLY = "Your refund of $40 was issued today.";

function setup(config: GuardrailConfig = {}) {
  const { client, service, clock } = fakeClient();
  const guardrail = new ResponseGuardrail(client, config);
  return { guardrail, service, clock };
}

type Evaluate = (
  guardrail: ResponseGuardrail,
  state: AgentState,
) => Promise<GuardrailResult>;

const conventions: Array<{ name: string; evaluate: Evaluate }> = [
  { name: "async", evaluate: (g, state) => g.evaluate(state) },
  { name: "sync", evaluate: async (g, state) => g.evaluateSync(state) },
];

// ── Tests ──────────────────────────────────────────────────────────────

describe("ResponseGuardrail configuration", () => {
  it("applies defaults", () => {
    const { guardrail } = setup();

    expect(guardrail.policy).toEqual({
      mode: "blocking",
      approvalTimeoutMs: 30_000,
      pollIntervalMs: 2_000,
      blockedMessage: DEFAULT_BLOCKED_MESSAGE,
      metadata: {},
    });
    expect(Object.isFrozen(guardrail.policy)).toBe(true);
  });

  it("rejects a non-positive poll interval", () => {
    expect(() => setup({ pollIntervalMs: 0 })).toThrow(
      /^Invalid guardrail config: pollIntervalMs: /,
    );
  });
});

describe("ResponseGuardrail task", () => {
  it("submits the reply with the last three messages as context", async () => {
    const { guardrail, service } = setup({ metadata: { team: "support" } });

    await guardrail.onAfterResponse(conversation());

    expect(service.submitted).toEqual([
      {
        function_name: "agent_response",
        args: {
          response: REPLY,
          conversation_context: [
            "system: You are a support assistant.",
            "user: Where is my refund?",
            `assistant: ${REPLY}`,
          ],
        },
        doc: "Agent response requiring governance review",
        metadata: {
          team: "support",
          middleware: "ResponseGuardrail",
          mode: "blocking",
        },
      },
    ]);
  });

  it("only sends the three most recent messages", async () => {
    const { guardrail, service } = setup();
    const state = conversation();
    state.messages.unshift({ role: "user", content: "Hello" });

    await guardrail.onAfterResponse(state);

    const context = service.submitted[0]?.args.conversation_context;
    expect(context).toEqual([
      "system: You are a support assistant.",
      "user: Where is my refund?",
      `assistant: ${REPLY}`,
    ]);
  });
});

describe.each(conventions)("ResponseGuardrail [$name]", ({ evaluate }) => {
  // ── Immediate verdicts ─────────────────────────────────────────────

  it("leaves an approved reply untouched", async () => {
    const { guardrail, service } = setup();
    const state = conversation();

    const result = await evaluate(guardrail, state);

    expect(result.state).toBe(state);
    expect(result.outcome).toBe("approved");
    expect(state.messages[2]).toEqual({ role: "assistant", content: REPLY });
    expect(service.statusCalls).toEqual([]);
  });

  it("substitutes a rejected reply in blocking mode", async () => {
    const { guardrail, service } = setup({ blockedMessage: "Withheld pending review." });
    service.enqueue("Rejected", [], "Mentions an unverified amount");
    const state = conversation();

    const result = await evaluate(guardrail, state);

    expect(result.outcome).toBe("blocked");
    expect(result.state).not.toBe(state);
    expect(result.state.messages).toHaveLength(3);
    expect(result.state.messages[0]).toBe(state.messages[0]);
    expect(result.state.messages[2]).toEqual({
      role: "assistant",
      content: "Withheld pending review.",
      annotations: {
        blocked: true,
        review_task_id: "task-1",
        reason: "Mentions an unverified amount",
      },
    });
    // the input conversation is not rewritten
    expect(state.messages[2]?.content).toBe(REPLY);
    expect(service.statusCalls).toEqual([]);
  });

  it("treats ChangeRequested like a rejection", async () => {
    const { guardrail, service } = setup();
    service.enqueue("ChangeRequested", [], "Soften the tone");

    const result = await evaluate(guardrail, conversation());

    expect(result.outcome).toBe("blocked");
    expect(result.state.messages[2]?.content).toBe(DEFAULT_BLOCKED_MESSAGE);
    expect(result.state.messages[2]?.annotations?.reason).toBe("Soften the tone");
  });

  it("annotates a rejected reply in place in logging mode", async () => {
    const { guardrail, service } = setup({ mode: "logging" });
    service.enqueue("Rejected", [], "Mentions an unverified amount");
    const state = conversation();
    const reply = state.messages[2];

    const result = await evaluate(guardrail, state);

    expect(result.outcome).toBe("flagged");
    expect(result.state).toBe(state);
    expect(result.state.messages[2]).toBe(reply);
    expect(reply?.content).toBe(REPLY);
    expect(reply?.annotations).toEqual({
      review_warning: {
        review_task_id: "task-1",
        reason: "Mentions an unverified amount",
      },
    });
  });

  // ── Waiting ────────────────────────────────────────────────────────

  it("waits out a pending verdict and keeps an approved reply", async () => {
    const { guardrail, service, clock } = setup();
    service.enqueue("Pending", ["Pending", "Approved"]);
    const state = conversation();

    const result = await evaluate(guardrail, state);

    expect(result.state).toBe(state);
    expect(result.outcome).toBe("approved");
    expect(service.statusCalls).toEqual(["task-1", "task-1"]);
    expect(clock.waits).toEqual([2000]);
  });

  it("substitutes a reply rejected after human review", async () => {
    const { guardrail, service } = setup();
    service.enqueue("RequiresIntervention", ["Processing", "Rejected"], "Escalate to billing");

    const result = await evaluate(guardrail, conversation());

    expect(result.outcome).toBe("blocked");
    expect(result.state.messages[2]?.annotations).toEqual({
      blocked: true,
      review_task_id: "task-1",
      reason: "Escalate to billing",
    });
  });

  it("leaves the reply unannotated when logging mode is rejected after waiting", async () => {
    const { guardrail, service } = setup({ mode: "logging" });
    service.enqueue("Pending", ["Rejected"], "Mentions an unverified amount");
    const state = conversation();
    const reply = state.messages[2];

    const result = await evaluate(guardrail, state);

    expect(result).toEqual({ state, outcome: "flagged", reviewTaskId: "task-1" });
    expect(result.state).toBe(state);
    expect(result.state.messages[2]).toBe(reply);
    expect(reply).toEqual({ role: "assistant", content: REPLY });
    expect(service.statusCalls).toEqual(["task-1"]);
  });

  it("substitutes a timeout message in blocking mode", async () => {
    const { guardrail, service, clock } = setup({
      approvalTimeoutMs: 4000,
      pollIntervalMs: 2000,
    });
    service.enqueue("Pending");

    const result = await evaluate(guardrail, conversation());

    expect(result.outcome).toBe("blocked");
    expect(result.state.messages[2]).toEqual({
      role: "assistant",
      content: TIMEOUT_MESSAGE,
      annotations: {
        blocked: true,
        review_task_id: "task-1",
        reason: "Timeout waiting for approval",
      },
    });
    expect(service.statusCalls).toHaveLength(3);
    expect(clock.current).toBe(4000);
  });

  it("keeps the reply on timeout in logging mode", async () => {
    const { guardrail, service } = setup({
      mode: "logging",
      approvalTimeoutMs: 4000,
      pollIntervalMs: 2000,
    });
    service.enqueue("Pending");
    const state = conversation();

    const result = await evaluate(guardrail, state);

    expect(result.state).toBe(state);
    expect(result.outcome).toBe("timed_out");
    expect(state.messages[2]?.annotations).toBeUndefined();
  });

  // ── Failures ───────────────────────────────────────────────────────

  it("fails closed on a service error in blocking mode", async () => {
    const { guardrail, service } = setup();
    service.failSubmitWith(new ServiceError("Review service unreachable", "NETWORK_ERROR"));

    const result = await evaluate(guardrail, conversation());

    expect(result.outcome).toBe("blocked");
    expect(result.state.messages[2]).toEqual({
      role: "assistant",
      content: ERROR_MESSAGE,
      annotations: { blocked: true, error: "Review service unreachable" },
    });
  });

  it("lets the reply through on a service error in logging mode", async () => {
    const { guardrail, service } = setup({ mode: "logging" });
    service.failSubmitWith(new ServiceError("Review service unreachable", "NETWORK_ERROR"));
    const state = conversation();

    const result = await evaluate(guardrail, state);

    expect(result.state).toBe(state);
    expect(result.outcome).toBe("failed");
  });

  it("fails closed when polling breaks mid-review", async () => {
    const { guardrail, service } = setup();
    service.enqueue("Pending").failStatusWith(new ServiceError("Bad gateway", "API_ERROR", 502));

    const result = await evaluate(guardrail, conversation());

    expect(result.outcome).toBe("blocked");
    expect(result.reviewTaskId).toBe("task-1");
    expect(result.state.messages[2]?.annotations).toEqual({
      blocked: true,
      error: "Bad gateway",
    });
  });

  // ── Skips ──────────────────────────────────────────────────────────

  it("ignores conversations that do not end with an assistant reply", async () => {
    const { guardrail, service } = setup();
    const state: AgentState = {
      messages: [{ role: "user", content: "Are you there?" }],
    };

    const result = await evaluate(guardrail, state);

    expect(result).toEqual({ state, outcome: "skipped" });
    expect(service.submitted).toEqual([]);
  });

  it("ignores an empty conversation", async () => {
    const { guardrail, service } = setup();
    const state: AgentState = { messages: [] };

    const result = await evaluate(guardrail, state);

    expect(result.outcome).toBe("skipped");
    expect(service.submitted).toEqual([]);
  });
});

describe("ResponseGuardrail hook", () => {
  it("returns only the state from onAfterResponse", async () => {
    const { guardrail, service } = setup();
    service.enqueue("Rejected", [], "Off-policy");

    const state = await guardrail.onAfterResponse(conversation());

    expect(state.messages[2]?.content).toBe(DEFAULT_BLOCKED_MESSAGE);
  });

  it("returns the same state from onAfterResponseSync on approval", () => {
    const { guardrail } = setup();
    const state = conversation();

    expect(guardrail.onAfterResponseSync(state)).toBe(state);
  });
});
