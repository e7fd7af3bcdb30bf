import { ApprovalTimeoutError, ReviewGateError } from "../types.js";
import type { PollOptions, ReviewVerdict } from "../types.js";
import { fetchStatus, sleep } from "./program.js";
import type { ReviewProgram } from "./program.js";
import { isTerminal } from "./verdict.js";
import type { Clock } from "./wait.js";

/** Hard cap on status calls: floor(timeout / interval) + 1, or unbounded. */
export function maxPollAttempts(options: PollOptions): number {
  if (options.timeoutMs === undefined) return Number.POSITIVE_INFINITY;
  return Math.floor(options.timeoutMs / options.pollIntervalMs) + 1;
}

export function validatePollOptions(options: PollOptions): void {
  if (!Number.isFinite(options.pollIntervalMs) || options.pollIntervalMs <= 0) {
    throw new ReviewGateError(
      `pollIntervalMs must be a positive number, got ${options.pollIntervalMs}`,
      "INVALID_CONFIG",
    );
  }
  if (
    options.timeoutMs !== undefined &&
    (Number.isNaN(options.timeoutMs) || options.timeoutMs < 0)
  ) {
    throw new ReviewGateError(
      `timeoutMs must be a non-negative number, got ${options.timeoutMs}`,
      "INVALID_CONFIG",
    );
  }
}

/**
 * Poll a review task until it reaches a terminal state.
 *
 * The first status call is immediate; the program sleeps
 * `pollIntervalMs` between calls. It gives up with ApprovalTimeoutError
 * when either the attempt cap is reached or the clock passes the
 * deadline, whichever comes first.
 */
export function* pollUntilTerminal(
  reviewTaskId: string,
  options: PollOptions,
  clock: Clock,
): ReviewProgram<ReviewVerdict> {
  validatePollOptions(options);

  const startedAt = clock.now();
  const maxAttempts = maxPollAttempts(options);

  for (let attempt = 1; ; attempt++) {
    const verdict = yield* fetchStatus(reviewTaskId);
    if (isTerminal(verdict)) return verdict;

    const elapsedMs = clock.now() - startedAt;
    const deadlinePassed =
      options.timeoutMs !== undefined && elapsedMs >= options.timeoutMs;

    if (attempt >= maxAttempts || deadlinePassed) {
      throw new ApprovalTimeoutError(
        `Approval timeout after ${(elapsedMs / 1000).toFixed(1)}s waiting for review task ${reviewTaskId}`,
        { reviewTaskId, elapsedMs, timeoutMs: options.timeoutMs },
      );
    }

    yield* sleep(options.pollIntervalMs);
  }
}
