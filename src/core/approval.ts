import { ApprovalTimeoutError } from "../types.js";
import type { ReviewVerdict } from "../types.js";
import type { ReviewClient } from "./client.js";
import { pollUntilTerminal } from "./poll.js";
import type { ReviewProgram } from "./program.js";

export interface ApprovalWaiterOptions {
  pollIntervalMs: number;
  timeoutMs?: number;
}

/**
 * Waits for a pending review task to resolve on behalf of a named
 * operation (a tool name, or "agent_response").
 *
 * A timeout is re-raised as an ApprovalTimeoutError that names the
 * operation and the configured timeout, so callers can tell an approval
 * that never came from a transport that timed out.
 */
export class ApprovalWaiter {
  constructor(
    private readonly client: ReviewClient,
    private readonly options: ApprovalWaiterOptions,
  ) {}

  *program(
    reviewTaskId: string,
    operation: string,
  ): ReviewProgram<ReviewVerdict> {
    try {
      return yield* pollUntilTerminal(
        reviewTaskId,
        this.options,
        this.client.clock,
      );
    } catch (err) {
      if (err instanceof ApprovalTimeoutError) {
        const limit = this.options.timeoutMs ?? err.elapsedMs;
        throw new ApprovalTimeoutError(
          `Timeout waiting for approval of ${operation} after ${(limit / 1000).toFixed(1)}s (review task ${reviewTaskId})`,
          {
            reviewTaskId: err.reviewTaskId,
            elapsedMs: err.elapsedMs,
            timeoutMs: this.options.timeoutMs,
            operation,
          },
          { cause: err },
        );
      }
      throw err;
    }
  }

  wait(reviewTaskId: string, operation: string): Promise<ReviewVerdict> {
    return this.client.run(this.program(reviewTaskId, operation));
  }

  waitSync(reviewTaskId: string, operation: string): ReviewVerdict {
    return this.client.runSync(this.program(reviewTaskId, operation));
  }
}
