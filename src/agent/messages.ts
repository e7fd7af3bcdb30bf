import type {
  AgentState,
  ConversationMessage,
  MessageAnnotations,
} from "../types.js";

/** Messages included in `conversation_context` for reviewers. */
export const CONTEXT_WINDOW = 3;

export function lastMessage(state: AgentState): ConversationMessage | undefined {
  return state.messages[state.messages.length - 1];
}

/** Flatten message content to text; non-text parts are JSON-encoded. */
export function messageText(message: ConversationMessage): string {
  if (typeof message.content === "string") return message.content;
  return message.content
    .map((part) =>
      part.type === "text" && typeof part.text === "string"
        ? part.text
        : JSON.stringify(part),
    )
    .join("\n");
}

/** `role: text`, with proposed tool calls appended when present. */
export function stringifyMessage(message: ConversationMessage): string {
  const text = `${message.role}: ${messageText(message)}`;
  if (!message.toolCalls?.length) return text;
  const calls = message.toolCalls
    .map((tc) => `${tc.name}(${JSON.stringify(tc.args)})`)
    .join(", ");
  return `${text} [tool calls: ${calls}]`;
}

/** The last few messages, stringified, oldest first. */
export function conversationContext(state: AgentState): string[] {
  return state.messages.slice(-CONTEXT_WINDOW).map(stringifyMessage);
}

/** Copy of `state` with its last message swapped for `replacement`. */
export function replaceLastMessage(
  state: AgentState,
  replacement: ConversationMessage,
): AgentState {
  return {
    ...state,
    messages: [...state.messages.slice(0, -1), replacement],
  };
}

export function assistantMessage(
  content: string,
  annotations: MessageAnnotations,
): ConversationMessage {
  return { role: "assistant", content, annotations };
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
