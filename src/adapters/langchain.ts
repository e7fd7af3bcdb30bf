import type { ResponseGuardrail } from "../agent/guardrail.js";
import { isRecord, lastMessage, messageText } from "../agent/messages.js";
import type { ToolCallGate } from "../agent/tool-gate.js";
import type {
  AgentState,
  ConversationMessage,
  MessageRole,
  ToolCallRequest,
} from "../types.js";

// ── LangChain compatible types (duck-typed) ─────────────────────────
//
// Minimal shapes matching @langchain/core messages and the agent
// middleware of `createAgent({ middleware })`, so consumers get type
// safety without a hard dependency on langchain.

/** A tool call as carried on an AIMessage. */
export interface LangChainToolCall {
  id?: string;
  name: string;
  args: Record<string, unknown>;
}

/** Any BaseMessage-like object. */
export interface LangChainMessage {
  id?: string;
  content: unknown;
  tool_calls?: LangChainToolCall[];
  additional_kwargs?: Record<string, unknown>;
  /** BaseMessage type accessor ("ai", "human", "system", "tool") */
  _getType?(): string;
  type?: string;
}

export interface LangChainAgentState {
  messages: LangChainMessage[];
}

/** State update returned from a middleware hook. */
export interface LangChainStateUpdate {
  messages: LangChainMessage[];
}

export interface LangChainAgentMiddleware {
  name: string;
  afterModel?: (
    state: LangChainAgentState,
  ) => Promise<LangChainStateUpdate | undefined>;
  afterAgent?: (
    state: LangChainAgentState,
  ) => Promise<LangChainStateUpdate | undefined>;
}

/** Builds the AI message that replaces a blocked response. */
export type AIMessageFactory = (fields: {
  id?: string;
  content: string;
  additional_kwargs: Record<string, unknown>;
}) => LangChainMessage;

export interface LangChainMiddlewareOptions {
  guardrail?: ResponseGuardrail;
  toolGate?: ToolCallGate;
  /** Middleware name (default: "ReviewGateMiddleware") */
  name?: string;
  /**
   * Defaults to a plain `{ type: "ai", ... }` object. Pass
   * `(fields) => new AIMessage(fields)` to get real message instances.
   */
  createMessage?: AIMessageFactory;
}

// ── Middleware ─────────────────────────────────────────────────────────

/**
 * LangChain agent middleware backed by the review gates.
 *
 * `afterModel` runs the ToolCallGate over the model's proposed tool
 * calls and throws on a veto. `afterAgent` runs the ResponseGuardrail
 * over the final reply and swaps in the substitute message when it is
 * blocked.
 *
 * ```ts
 * import { createAgent, createMiddleware, AIMessage } from "langchain";
 * import { reviewGateMiddleware } from "agent-review-gate/langchain";
 *
 * const gate = ReviewGate.init({ apiKey: process.env.REVIEW_GATE_API_KEY });
 * const agent = createAgent({
 *   model,
 *   tools,
 *   middleware: [
 *     createMiddleware(
 *       reviewGateMiddleware({
 *         guardrail: gate.guardrail({ mode: "blocking" }),
 *         toolGate: gate.toolGate({ requireApprovalFor: ["delete_file"] }),
 *         createMessage: (fields) => new AIMessage(fields),
 *       }),
 *     ),
 *   ],
 * });
 * ```
 */
export function reviewGateMiddleware(
  options: LangChainMiddlewareOptions,
): LangChainAgentMiddleware {
  const { guardrail, toolGate } = options;
  const createMessage = options.createMessage ?? plainAIMessage;
  const middleware: LangChainAgentMiddleware = {
    name: options.name ?? "ReviewGateMiddleware",
  };

  if (toolGate) {
    middleware.afterModel = async (state) => {
      await toolGate.onBeforeToolExecution(toAgentState(state.messages));
      return undefined;
    };
  }

  if (guardrail) {
    middleware.afterAgent = async (state) => {
      const original = state.messages[state.messages.length - 1];
      const converted = toAgentState(state.messages);
      const result = await guardrail.onAfterResponse(converted);

      if (result === converted) {
        // Logging-mode warnings land on the original message's kwargs.
        const annotations = lastMessage(converted)?.annotations;
        if (original && annotations && !original.additional_kwargs) {
          original.additional_kwargs = annotations;
        }
        return undefined;
      }

      const replacement = lastMessage(result);
      if (!original || !replacement) return undefined;

      // Reusing the id lets LangGraph's message reducer replace the
      // original instead of appending.
      return {
        messages: [
          ...state.messages.slice(0, -1),
          createMessage({
            id: original.id,
            content: messageText(replacement),
            additional_kwargs: { ...replacement.annotations },
          }),
        ],
      };
    };
  }

  return middleware;
}

// ── Conversion helpers ───────────────────────────────────────────────

function plainAIMessage(fields: {
  id?: string;
  content: string;
  additional_kwargs: Record<string, unknown>;
}): LangChainMessage {
  return { type: "ai", ...fields };
}

function messageType(message: LangChainMessage): string {
  return message._getType?.() ?? message.type ?? "human";
}

function toRole(type: string): MessageRole {
  switch (type) {
    case "ai":
    case "AIMessageChunk":
      return "assistant";
    case "system":
    case "developer":
      return "system";
    case "tool":
    case "function":
      return "tool";
    default:
      return "user";
  }
}

function toContent(content: unknown): ConversationMessage["content"] {
  if (typeof content === "string") return content;
  if (Array.isArray(content)) return content.filter(isRecord);
  if (content === undefined || content === null) return "";
  return JSON.stringify(content);
}

function toToolCalls(message: LangChainMessage): ToolCallRequest[] | undefined {
  if (!message.tool_calls?.length) return undefined;
  return message.tool_calls.map((tc) => ({
    id: tc.id ?? "unknown_id",
    name: tc.name,
    args: tc.args ?? {},
  }));
}

/**
 * Convert LangChain messages to the SDK's conversation model.
 * Annotations share the original `additional_kwargs` object, so in-place
 * annotation by the guardrail is visible on the LangChain message.
 */
export function toAgentState(messages: LangChainMessage[]): AgentState {
  return {
    messages: messages.map((message) => ({
      role: toRole(messageType(message)),
      content: toContent(message.content),
      toolCalls: toToolCalls(message),
      annotations: message.additional_kwargs,
    })),
  };
}
