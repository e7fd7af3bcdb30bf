import { z } from "zod";
import type { ReviewTaskState, ReviewVerdict } from "../types.js";

export const REVIEW_TASK_STATES = [
  "Pending",
  "Processing",
  "Approved",
  "RequiresIntervention",
  "Rejected",
  "ChangeRequested",
] as const satisfies readonly ReviewTaskState[];

/** Wire shape of a verdict returned by the review service. */
export const ReviewVerdictSchema = z.object({
  review_task_id: z.string().min(1),
  state: z.enum(REVIEW_TASK_STATES),
  requested_change: z
    .string()
    .nullish()
    .transform((value) => value ?? undefined),
});

function assertNever(state: never): never {
  throw new Error(`Unhandled review task state: ${String(state)}`);
}

// ── Classification ───────────────────────────────────────────────────
//
// Each predicate switches over every state so a new service-side state
// fails to compile here instead of falling through.

/** Whether no further state change will happen for this task. */
export function isTerminalState(state: ReviewTaskState): boolean {
  switch (state) {
    case "Approved":
    case "Rejected":
    case "ChangeRequested":
      return true;
    case "Pending":
    case "Processing":
    case "RequiresIntervention":
      return false;
    default:
      return assertNever(state);
  }
}

/** Rejected or ChangeRequested: the verdict halts or alters execution. */
export function isBlockingState(state: ReviewTaskState): boolean {
  switch (state) {
    case "Rejected":
    case "ChangeRequested":
      return true;
    case "Approved":
    case "Pending":
    case "Processing":
    case "RequiresIntervention":
      return false;
    default:
      return assertNever(state);
  }
}

export const isTerminal = (v: ReviewVerdict): boolean =>
  isTerminalState(v.state);

export const isBlocking = (v: ReviewVerdict): boolean =>
  isBlockingState(v.state);

export const isApproved = (v: ReviewVerdict): boolean =>
  v.state === "Approved";

export const isDenied = (v: ReviewVerdict): boolean =>
  v.state === "Rejected";

export const isChangeRequested = (v: ReviewVerdict): boolean =>
  v.state === "ChangeRequested";

export const isPending = (v: ReviewVerdict): boolean =>
  v.state === "Pending";

export const isProcessing = (v: ReviewVerdict): boolean =>
  v.state === "Processing";

export const requiresIntervention = (v: ReviewVerdict): boolean =>
  v.state === "RequiresIntervention";

/**
 * Collapse a verdict into the decision a gate acts on.
 *
 * `pending` covers every non-terminal state.
 */
export function classifyVerdict(
  v: ReviewVerdict,
): "approved" | "blocking" | "pending" {
  switch (v.state) {
    case "Approved":
      return "approved";
    case "Rejected":
    case "ChangeRequested":
      return "blocking";
    case "Pending":
    case "Processing":
    case "RequiresIntervention":
      return "pending";
    default:
      return assertNever(v.state);
  }
}
