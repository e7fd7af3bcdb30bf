import type { Logger } from "pino";
import { ServiceError } from "../types.js";
import type { ReviewTask } from "../types.js";

/**
 * Async transport to the review service. Implementations return the raw
 * response body; ReviewClient validates it.
 */
export interface ReviewTransport {
  createReviewTask(task: ReviewTask): Promise<unknown>;
  getReviewTask(reviewTaskId: string): Promise<unknown>;
}

/** Blocking counterpart of ReviewTransport, used by the …Sync methods. */
export interface SyncReviewTransport {
  createReviewTaskSync(task: ReviewTask): unknown;
  getReviewTaskSync(reviewTaskId: string): unknown;
}

export interface HttpTransportOptions {
  apiKey: string;
  baseUrl: string;
  requestTimeoutMs: number;
  maxRetries: number;
  retryBackoffMs: number;
  logger: Logger;
}

const RETRYABLE_STATUS = new Set([408, 425, 429, 500, 502, 503, 504]);

/**
 * fetch-based transport.
 *
 * Retries network failures and transient HTTP statuses with exponential
 * backoff (`retryBackoffMs * 2^attempt`). Auth failures are never
 * retried.
 */
export class HttpReviewTransport implements ReviewTransport {
  private readonly baseUrl: string;

  constructor(private readonly options: HttpTransportOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
  }

  createReviewTask(task: ReviewTask): Promise<unknown> {
    return this.request("POST", "/api/v1/review-tasks", task);
  }

  getReviewTask(reviewTaskId: string): Promise<unknown> {
    return this.request(
      "GET",
      `/api/v1/review-tasks/${encodeURIComponent(reviewTaskId)}`,
    );
  }

  // ── Private helpers ────────────────────────────────────────────────

  private async request(
    method: string,
    path: string,
    body?: unknown,
  ): Promise<unknown> {
    const url = `${this.baseUrl}${path}`;
    const { maxRetries, retryBackoffMs, logger } = this.options;

    for (let attempt = 0; ; attempt++) {
      let res: Response;
      try {
        res = await fetchWithTimeout(
          url,
          {
            method,
            headers: {
              Authorization: `Bearer ${this.options.apiKey}`,
              "Content-Type": "application/json",
            },
            body: body !== undefined ? JSON.stringify(body) : undefined,
          },
          this.options.requestTimeoutMs,
        );
      } catch (err) {
        if (attempt < maxRetries) {
          logger.debug({ err, url, attempt }, "review service unreachable, retrying");
          await backoff(retryBackoffMs, attempt);
          continue;
        }
        throw new ServiceError(
          `Review service unreachable: ${method} ${path}`,
          "NETWORK_ERROR",
          undefined,
          { cause: err },
        );
      }

      if (res.ok) {
        try {
          return await res.json();
        } catch (err) {
          throw new ServiceError(
            "Review service returned a non-JSON body",
            "INVALID_RESPONSE",
            res.status,
            { cause: err },
          );
        }
      }

      // Release the connection; error bodies are not surfaced.
      await res.body?.cancel();

      if (res.status === 401 || res.status === 403) {
        throw new ServiceError(
          `Review service rejected credentials: ${res.status} ${res.statusText}`,
          "AUTH_FAILED",
          res.status,
        );
      }

      if (RETRYABLE_STATUS.has(res.status) && attempt < maxRetries) {
        logger.debug(
          { status: res.status, url, attempt },
          "transient review service error, retrying",
        );
        await backoff(retryBackoffMs, attempt);
        continue;
      }

      throw new ServiceError(
        `API request failed: ${res.status} ${res.statusText}`,
        "API_ERROR",
        res.status,
      );
    }
  }
}

function backoff(baseMs: number, attempt: number): Promise<void> {
  const delay = baseMs * 2 ** attempt;
  return new Promise((resolve) => setTimeout(resolve, delay));
}

// ── Fetch with timeout ─────────────────────────────────────────────────

/** fetch with an AbortController-based timeout. */
export function fetchWithTimeout(
  url: string,
  init: RequestInit,
  timeoutMs: number,
): Promise<Response> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);

  return fetch(url, { ...init, signal: controller.signal }).finally(() => {
    clearTimeout(timer);
  });
}
