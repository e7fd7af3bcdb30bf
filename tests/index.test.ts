import { describe, it, expect, vi, afterEach } from "vitest";
import {
  ApprovalDeniedError,
  ResponseGuardrail,
  ReviewGate,
  ReviewGateError,
  ToolCallGate,
} from "../src/index.js";
import {
  FakeReviewService,
  ManualClock,
  conversation,
  silentLogger,
  toolTurn,
} from "./helpers/fake-service.js";

// ── Helpers ────────────────────────────────────────────────────────────

function init() {
  const service = new FakeReviewService();
  const clock = new ManualClock();
  const gate = ReviewGate.init({
    apiKey: "test-key",
    transport: service,
    syncTransport: service,
    clock,
    waiter: clock,
    syncWaiter: clock,
    logger: silentLogger,
  });
  return { gate, service };
}

// ── Tests ──────────────────────────────────────────────────────────────

describe("ReviewGate.init()", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("builds gates that share one client", () => {
    const { gate } = init();

    const guardrail = gate.guardrail({ mode: "logging" });
    const toolGate = gate.toolGate({ requireApprovalFor: ["delete_file"] });

    expect(guardrail).toBeInstanceOf(ResponseGuardrail);
    expect(guardrail.policy.mode).toBe("logging");
    expect(toolGate).toBeInstanceOf(ToolCallGate);
    expect(toolGate.policy.requireApprovalFor).toEqual(["delete_file"]);
    expect(gate.client.supportsSync).toBe(true);
  });

  it("fails fast without an API key", () => {
    vi.stubEnv("REVIEW_GATE_API_KEY", "");

    expect(() => ReviewGate.init({ logger: silentLogger })).toThrow(ReviewGateError);
  });

  it("validates gate config when the gate is built", () => {
    const { gate } = init();

    expect(() => gate.toolGate({ pollIntervalMs: -5 })).toThrow(
      /^Invalid approval config: pollIntervalMs: /,
    );
  });

  it("runs a full agent turn through the async hooks", async () => {
    const { gate, service } = init();
    const hooks = gate.hooks({
      guardrail: { metadata: { agent: "support-bot" } },
      toolGate: { requireApprovalFor: ["issue_refund"] },
    });
    service
      .enqueue("Pending", ["Approved"])
      .enqueue("Rejected", [], "Do not promise dates");

    const proposed = toolTurn(
      { id: "call-1", name: "lookup_order", args: { id: "A-17" } },
      { id: "call-2", name: "issue_refund", args: { amount: 40 } },
    );
    await expect(hooks.onBeforeToolExecution(proposed)).resolves.toBe(proposed);

    const final = await hooks.onAfterResponse(
      conversation("Your refund arrives tomorrow."),
    );

    expect(service.submittedNames).toEqual(["issue_refund", "agent_response"]);
    expect(service.submitted[1]?.metadata).toEqual({
      agent: "support-bot",
      middleware: "ResponseGuardrail",
      mode: "blocking",
    });
    expect(final.messages[2]).toEqual({
      role: "assistant",
      content: "This response requires review and was not approved.",
      annotations: {
        blocked: true,
        review_task_id: "task-2",
        reason: "Do not promise dates",
      },
    });
  });

  it("vetoes through the sync hooks", () => {
    const { gate, service } = init();
    const hooks = gate.hooksSync();
    service.enqueue("Rejected");

    expect(() =>
      hooks.onBeforeToolExecution(toolTurn({ id: "call-1", name: "wire_transfer" })),
    ).toThrow(ApprovalDeniedError);
  });
});
