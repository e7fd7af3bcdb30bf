import type { Logger } from "pino";
import { resolveClientSettings } from "../config.js";
import type { ClientSettings } from "../config.js";
import { createLogger } from "../logger.js";
import { ReviewGateError, ServiceError } from "../types.js";
import type {
  PollOptions,
  ReviewClientConfig,
  ReviewTask,
  ReviewVerdict,
} from "../types.js";
import { pollUntilTerminal } from "./poll.js";
import { runProgram, runProgramSync, submitTask, fetchStatus } from "./program.js";
import type {
  EffectHandler,
  ReviewProgram,
  SyncEffectHandler,
} from "./program.js";
import { HttpReviewTransport } from "./transport.js";
import type { ReviewTransport, SyncReviewTransport } from "./transport.js";
import { ReviewVerdictSchema } from "./verdict.js";
import { systemClock, threadWaiter, timerWaiter } from "./wait.js";
import type { AsyncWaiter, Clock, SyncWaiter } from "./wait.js";

/**
 * Client for the external review service.
 *
 * Offers three operations, each in two calling conventions:
 *  - `submit` / `submitSync`: create a review task, return its immediate verdict
 *  - `status` / `statusSync`: fetch the current verdict of a known task
 *  - `pollUntilTerminal` / `pollUntilTerminalSync`: poll until terminal or timeout
 *
 * Both conventions run the same ReviewProgram; only the effect handler
 * differs. The client holds no per-request state and is safe to share
 * across concurrent hook invocations.
 */
export class ReviewClient {
  readonly settings: ClientSettings;
  readonly clock: Clock;
  readonly logger: Logger;

  private readonly transport: ReviewTransport;
  private readonly syncTransport: SyncReviewTransport | null;
  private readonly waiter: AsyncWaiter;
  private readonly syncWaiter: SyncWaiter;

  constructor(config: ReviewClientConfig = {}) {
    this.settings = resolveClientSettings(config);
    this.logger = (config.logger ?? createLogger()).child({
      component: "ReviewClient",
    });
    this.clock = config.clock ?? systemClock;
    this.waiter = config.waiter ?? timerWaiter;
    this.syncWaiter = config.syncWaiter ?? threadWaiter;
    this.transport =
      config.transport ??
      new HttpReviewTransport({ ...this.settings, logger: this.logger });
    this.syncTransport = config.syncTransport ?? null;
  }

  // ── Async convention ───────────────────────────────────────────────

  /** Create a review task and return the service's immediate verdict. */
  submit(task: ReviewTask): Promise<ReviewVerdict> {
    return this.run(submitTask(task));
  }

  /** Fetch the current verdict for a review task. */
  status(reviewTaskId: string): Promise<ReviewVerdict> {
    return this.run(fetchStatus(reviewTaskId));
  }

  /**
   * Poll until the task reaches a terminal state.
   *
   * Rejects with ApprovalTimeoutError once the deadline or the attempt
   * cap (`floor(timeoutMs / pollIntervalMs) + 1`) is reached.
   */
  pollUntilTerminal(
    reviewTaskId: string,
    options: PollOptions,
  ): Promise<ReviewVerdict> {
    return this.run(pollUntilTerminal(reviewTaskId, options, this.clock));
  }

  /** Drive any review program with the async transport and timer waits. */
  run<T>(program: ReviewProgram<T>): Promise<T> {
    return runProgram(program, this.asyncHandler);
  }

  // ── Sync convention ────────────────────────────────────────────────

  submitSync(task: ReviewTask): ReviewVerdict {
    return this.runSync(submitTask(task));
  }

  statusSync(reviewTaskId: string): ReviewVerdict {
    return this.runSync(fetchStatus(reviewTaskId));
  }

  pollUntilTerminalSync(
    reviewTaskId: string,
    options: PollOptions,
  ): ReviewVerdict {
    return this.runSync(pollUntilTerminal(reviewTaskId, options, this.clock));
  }

  /** Drive any review program with the sync transport, blocking the thread while it waits. */
  runSync<T>(program: ReviewProgram<T>): T {
    return runProgramSync(program, this.syncHandler);
  }

  /** Whether the blocking calling convention is available. */
  get supportsSync(): boolean {
    return this.syncTransport !== null;
  }

  // ── Effect handlers (private) ──────────────────────────────────────

  private readonly asyncHandler: EffectHandler = {
    submit: async (task) => {
      this.logger.debug({ function_name: task.function_name }, "submitting review task");
      const verdict = this.parseVerdict(
        await this.transport.createReviewTask(task),
      );
      this.logger.debug(
        { review_task_id: verdict.review_task_id, state: verdict.state },
        "review task created",
      );
      return verdict;
    },
    status: async (reviewTaskId) =>
      this.parseVerdict(await this.transport.getReviewTask(reviewTaskId)),
    sleep: (ms) => this.waiter.wait(ms),
  };

  private readonly syncHandler: SyncEffectHandler = {
    submit: (task) => {
      this.logger.debug({ function_name: task.function_name }, "submitting review task");
      const verdict = this.parseVerdict(
        this.requireSyncTransport().createReviewTaskSync(task),
      );
      this.logger.debug(
        { review_task_id: verdict.review_task_id, state: verdict.state },
        "review task created",
      );
      return verdict;
    },
    status: (reviewTaskId) =>
      this.parseVerdict(
        this.requireSyncTransport().getReviewTaskSync(reviewTaskId),
      ),
    sleep: (ms) => this.syncWaiter.waitSync(ms),
  };

  private requireSyncTransport(): SyncReviewTransport {
    if (this.syncTransport === null) {
      throw new ReviewGateError(
        "No syncTransport configured; use the async methods or pass syncTransport",
        "SYNC_TRANSPORT_UNAVAILABLE",
      );
    }
    return this.syncTransport;
  }

  private parseVerdict(body: unknown): ReviewVerdict {
    const result = ReviewVerdictSchema.safeParse(body);
    if (!result.success) {
      throw new ServiceError(
        `Review service returned an invalid verdict: ${result.error.issues
          .map((i) => `${i.path.join(".")}: ${i.message}`)
          .join("; ")}`,
        "INVALID_RESPONSE",
        undefined,
        { cause: result.error },
      );
    }
    return result.data;
  }
}
