import type { ResponseGuardrail } from "../agent/guardrail.js";
import { isRecord, lastMessage, messageText } from "../agent/messages.js";
import type { ToolCallGate } from "../agent/tool-gate.js";
import type { AgentState, ToolCallRequest } from "../types.js";

// ── Vercel AI SDK compatible types (duck-typed) ─────────────────────
//
// Minimal interfaces matching the Vercel AI SDK so consumers get full
// type-safety without a hard dependency on the `ai` package.

/** A function tool call in a model response. */
export interface LanguageModelV1FunctionToolCall {
  toolCallType: "function";
  toolCallId: string;
  toolName: string;
  args: string; // JSON-encoded arguments
}

/** Result shape from a non-streaming model call. */
export interface GenerateResult {
  text?: string;
  toolCalls?: LanguageModelV1FunctionToolCall[];
  [key: string]: unknown;
}

/**
 * Middleware compatible with the Vercel AI SDK's
 * `wrapLanguageModel({ model, middleware })`.
 */
export interface LanguageModelV1Middleware {
  wrapGenerate?: (options: {
    doGenerate: () => PromiseLike<GenerateResult>;
    params: unknown;
    model: unknown;
  }) => PromiseLike<GenerateResult>;
}

export interface VercelAIMiddlewareOptions {
  guardrail?: ResponseGuardrail;
  toolGate?: ToolCallGate;
}

// ── Middleware ─────────────────────────────────────────────────────────

/**
 * Create a Vercel AI SDK middleware that reviews model output before the
 * SDK acts on it.
 *
 * ```ts
 * import { wrapLanguageModel } from "ai";
 * import { reviewGateLanguageModelMiddleware } from "agent-review-gate/vercel-ai";
 *
 * const model = wrapLanguageModel({
 *   model: openai("gpt-4o"),
 *   middleware: reviewGateLanguageModelMiddleware({
 *     guardrail: gate.guardrail(),
 *     toolGate: gate.toolGate({ requireApprovalFor: ["send_email"] }),
 *   }),
 * });
 * ```
 *
 * A response carrying tool calls goes through the ToolCallGate, which
 * rejects the whole generation on a veto. A final text response goes
 * through the ResponseGuardrail, and a blocked text is replaced by the
 * substitute message.
 */
export function reviewGateLanguageModelMiddleware(
  options: VercelAIMiddlewareOptions,
): LanguageModelV1Middleware {
  const { guardrail, toolGate } = options;

  return {
    async wrapGenerate({ doGenerate }) {
      const result = await doGenerate();
      const toolCalls = result.toolCalls ?? [];

      if (toolCalls.length > 0) {
        if (toolGate) {
          await toolGate.onBeforeToolExecution(
            responseState(result.text ?? "", toolCalls.map(toToolCallRequest)),
          );
        }
        return result;
      }

      if (!guardrail || result.text === undefined) return result;

      const state = responseState(result.text);
      const reviewed = await guardrail.onAfterResponse(state);
      if (reviewed === state) return result;

      const replacement = lastMessage(reviewed);
      return replacement
        ? { ...result, text: messageText(replacement) }
        : result;
    },
  };
}

// ── Helpers ──────────────────────────────────────────────────────────

function responseState(
  text: string,
  toolCalls?: ToolCallRequest[],
): AgentState {
  return { messages: [{ role: "assistant", content: text, toolCalls }] };
}

function toToolCallRequest(
  tc: LanguageModelV1FunctionToolCall,
): ToolCallRequest {
  return {
    id: tc.toolCallId,
    name: tc.toolName,
    args: parseArgs(tc.args),
  };
}

function parseArgs(raw: string): Record<string, unknown> {
  try {
    const parsed: unknown = JSON.parse(raw);
    return isRecord(parsed) ? parsed : {};
  } catch {
    return {};
  }
}
