import type { Logger } from "pino";
import type { ReviewTransport, SyncReviewTransport } from "./core/transport.js";
import type { AsyncWaiter, Clock, SyncWaiter } from "./core/wait.js";

// ── Review service shapes ─────────────────────────────────────────────

/** Verdict states reported by the review service. */
export type ReviewTaskState =
  | "Pending"
  | "Processing"
  | "Approved"
  | "RequiresIntervention"
  | "Rejected"
  | "ChangeRequested";

/** A unit of work submitted for review (POST /api/v1/review-tasks). */
export interface ReviewTask {
  /** The operation being reviewed: a tool name, or "agent_response" */
  function_name: string;
  /** Arguments or payload under review */
  args: Record<string, unknown>;
  /** Human-readable description shown to reviewers */
  doc?: string;
  /** Free-text explanation from the model */
  llm_explanation?: string;
  /** Correlation data: middleware name, mode, tool-call id, context */
  metadata?: Record<string, unknown>;
  /** Parent task, for hierarchical reviews */
  parent_review_task_id?: string;
}

/** Verdict for a review task, returned on submission and on every status poll. */
export interface ReviewVerdict {
  /** Opaque id, stable across polls */
  review_task_id: string;
  state: ReviewTaskState;
  /** Explanation when the task was rejected or a change was requested */
  requested_change?: string;
}

// ── Client configuration ──────────────────────────────────────────────

/** Configuration provided to ReviewGate.init() and new ReviewClient(). */
export interface ReviewClientConfig {
  /** API key for the review service (default: REVIEW_GATE_API_KEY) */
  apiKey?: string;
  /** Base URL of the review service (default: REVIEW_GATE_BASE_URL, then https://api.reviewgate.dev) */
  baseUrl?: string;
  /** Per-request timeout in ms (default: 10000) */
  requestTimeoutMs?: number;
  /** Retries for transient transport failures (default: 3) */
  maxRetries?: number;
  /** Base backoff between retries in ms, doubled per attempt (default: 500) */
  retryBackoffMs?: number;
  /** Replaces the built-in fetch transport */
  transport?: ReviewTransport;
  /** Enables the blocking (…Sync) calling convention */
  syncTransport?: SyncReviewTransport;
  clock?: Clock;
  waiter?: AsyncWaiter;
  syncWaiter?: SyncWaiter;
  logger?: Logger;
}

/** Options for a single pollUntilTerminal() call. */
export interface PollOptions {
  /** Delay between status calls in ms */
  pollIntervalMs: number;
  /** Overall deadline in ms; omit to poll until a terminal state */
  timeoutMs?: number;
}

// ── Gate configuration ────────────────────────────────────────────────

/**
 * How the response guardrail reacts to a blocking verdict.
 *
 * - `blocking`: replace the response with a substitute message
 * - `logging`:  keep the response and attach a warning annotation
 */
export type GuardrailMode = "blocking" | "logging";

/** Configuration for the response guardrail. */
export interface GuardrailConfig {
  /** Default: "blocking" */
  mode?: GuardrailMode;
  /** Max ms to wait for a pending verdict (default: 30000) */
  approvalTimeoutMs?: number;
  /** Ms between status polls (default: 2000) */
  pollIntervalMs?: number;
  /** Substitute text for a blocked response */
  blockedMessage?: string;
  /** Static metadata attached to every review task */
  metadata?: Record<string, unknown>;
}

/** Configuration for the tool-call approval gate. */
export interface ApprovalConfig {
  /** Ms between status polls (default: 5000) */
  pollIntervalMs?: number;
  /** Max ms to wait for a human decision (default: 600000) */
  timeoutMs?: number;
  /**
   * Tool names that go through review. When omitted every tool call is
   * reviewed.
   */
  requireApprovalFor?: string[];
  /** Static metadata attached to every review task */
  metadata?: Record<string, unknown>;
}

// ── Conversation state ────────────────────────────────────────────────

export type MessageRole = "system" | "user" | "assistant" | "tool";

/** A single tool invocation proposed by the model. */
export interface ToolCallRequest {
  id: string;
  name: string;
  args: Record<string, unknown>;
}

/** Warning attached in place by the guardrail in logging mode. */
export interface ReviewWarning {
  review_task_id: string;
  reason?: string;
}

/** Audit data carried by messages the gates touch. */
export interface MessageAnnotations {
  blocked?: boolean;
  review_task_id?: string;
  reason?: string;
  error?: string;
  review_warning?: ReviewWarning;
  [key: string]: unknown;
}

/** Host-agnostic conversation message. */
export interface ConversationMessage {
  role: MessageRole;
  /** Plain text, or provider content parts */
  content: string | Array<Record<string, unknown>>;
  toolCalls?: ToolCallRequest[];
  annotations?: MessageAnnotations;
}

/** The conversation state the hooks receive and return. */
export interface AgentState {
  messages: ConversationMessage[];
}

// ── Errors ────────────────────────────────────────────────────────────

/** Base class for errors surfaced by the SDK */
export class ReviewGateError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ReviewGateError";
  }
}

/** The review service could not be reached or rejected the request. */
export class ServiceError extends ReviewGateError {
  constructor(
    message: string,
    code: string,
    public readonly statusCode?: number,
    options?: { cause?: unknown },
  ) {
    super(message, code, options);
    this.name = "ServiceError";
  }
}

/** No terminal verdict arrived before the deadline. */
export class ApprovalTimeoutError extends ReviewGateError {
  readonly reviewTaskId: string;
  readonly elapsedMs: number;
  readonly timeoutMs?: number;
  /** Tool name, or "agent_response" */
  readonly operation?: string;

  constructor(
    message: string,
    details: {
      reviewTaskId: string;
      elapsedMs: number;
      timeoutMs?: number;
      operation?: string;
    },
    options?: { cause?: unknown },
  ) {
    super(message, "APPROVAL_TIMEOUT", options);
    this.name = "ApprovalTimeoutError";
    this.reviewTaskId = details.reviewTaskId;
    this.elapsedMs = details.elapsedMs;
    this.timeoutMs = details.timeoutMs;
    this.operation = details.operation;
  }
}

/** A tool call received a blocking verdict. */
export class ApprovalDeniedError extends ReviewGateError {
  constructor(
    message: string,
    public readonly reviewTaskId: string,
    public readonly toolName: string,
    public readonly requestedChange?: string,
  ) {
    super(message, "APPROVAL_DENIED");
    this.name = "ApprovalDeniedError";
  }
}
