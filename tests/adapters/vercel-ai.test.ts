import { describe, it, expect, vi } from "vitest";
import { ResponseGuardrail } from "../../src/agent/guardrail.js";
import { ToolCallGate } from "../../src/agent/tool-gate.js";
import { reviewGateLanguageModelMiddleware } from "../../src/adapters/vercel-ai.js";
import type {
  GenerateResult,
  LanguageModelV1FunctionToolCall,
} from "../../src/adapters/vercel-ai.js";
import { DEFAULT_BLOCKED_MESSAGE } from "../../src/config.js";
import { ApprovalDeniedError } from "../../src/types.js";
import { fakeClient } from "../helpers/fake-service.js";

// ── Helpers ────────────────────────────────────────────────────────────

function toolCall(
  toolName: string,
  args: string,
  toolCallId = "call-1",
): LanguageModelV1FunctionToolCall {
  return { toolCallType: "function", toolCallId, toolName, args };
}

function setup() {
  const { client, service } = fakeClient();
  const middleware = reviewGateLanguageModelMiddleware({
    guardrail: new ResponseGuardrail(client),
    toolGate: new ToolCallGate(client),
  });
  return { middleware, service };
}

async function generate(
  middleware: ReturnType<typeof reviewGateLanguageModelMiddleware>,
  result: GenerateResult,
): Promise<GenerateResult> {
  const wrapGenerate = middleware.wrapGenerate;
  if (!wrapGenerate) throw new Error("wrapGenerate not installed");
  const doGenerate = vi.fn(async () => result);
  const output = await wrapGenerate({ doGenerate, params: {}, model: {} });
  expect(doGenerate).toHaveBeenCalledTimes(1);
  return output;
}

// ── Tests ──────────────────────────────────────────────────────────────

describe("reviewGateLanguageModelMiddleware()", () => {
  describe("tool calls", () => {
    it("returns the result untouched when every call is approved", async () => {
      const { middleware, service } = setup();
      const result: GenerateResult = {
        text: "",
        toolCalls: [
          toolCall("read_file", '{"path":"notes.md"}'),
          toolCall("send_email", '{"to":"ops@example.com"}', "call-2"),
        ],
        finishReason: "tool-calls",
      };

      const output = await generate(middleware, result);

      expect(output).toBe(result);
      expect(service.submitted.map((t) => [t.function_name, t.args])).toEqual([
        ["read_file", { path: "notes.md" }],
        ["send_email", { to: "ops@example.com" }],
      ]);
    });

    it("does not run the guardrail over a tool-call turn", async () => {
      const { middleware, service } = setup();

      await generate(middleware, {
        text: "Let me check.",
        toolCalls: [toolCall("search", "{}")],
      });

      expect(service.submittedNames).toEqual(["search"]);
    });

    it("rejects the generation on a veto", async () => {
      const { middleware, service } = setup();
      service.enqueue("Rejected", [], "External email not allowed");

      await expect(
        generate(middleware, {
          toolCalls: [toolCall("send_email", '{"to":"someone@example.com"}')],
        }),
      ).rejects.toBeInstanceOf(ApprovalDeniedError);
    });

    it("submits empty args for unparseable or non-object JSON", async () => {
      const { middleware, service } = setup();

      await generate(middleware, {
        toolCalls: [toolCall("a", "{not json"), toolCall("b", "[1,2]", "call-2")],
      });

      expect(service.submitted.map((t) => t.args)).toEqual([{}, {}]);
    });
  });

  describe("text responses", () => {
    it("returns an approved text untouched", async () => {
      const { middleware, service } = setup();
      const result: GenerateResult = { text: "All set.", finishReason: "stop" };

      const output = await generate(middleware, result);

      expect(output).toBe(result);
      expect(service.submitted[0]?.args).toEqual({
        response: "All set.",
        conversation_context: ["assistant: All set."],
      });
    });

    it("replaces a blocked text and keeps the other fields", async () => {
      const { middleware, service } = setup();
      service.enqueue("Rejected", [], "Leaks an internal hostname");

      const output = await generate(middleware, {
        text: "Connect to db-primary.internal",
        finishReason: "stop",
        usage: { promptTokens: 12, completionTokens: 5 },
      });

      expect(output).toEqual({
        text: DEFAULT_BLOCKED_MESSAGE,
        finishReason: "stop",
        usage: { promptTokens: 12, completionTokens: 5 },
      });
    });

    it("passes results without text through unreviewed", async () => {
      const { middleware, service } = setup();
      const result: GenerateResult = { finishReason: "length" };

      const output = await generate(middleware, result);

      expect(output).toBe(result);
      expect(service.submitted).toEqual([]);
    });
  });

  it("does nothing without gates", async () => {
    const result: GenerateResult = {
      text: "hi",
      toolCalls: [toolCall("search", "{}")],
    };

    const output = await generate(reviewGateLanguageModelMiddleware({}), result);

    expect(output).toBe(result);
  });
});
