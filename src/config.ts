import { z } from "zod";
import { ReviewGateError } from "./types.js";
import type { ApprovalConfig, GuardrailConfig } from "./types.js";

export const DEFAULT_BASE_URL = "https://api.reviewgate.dev";
export const DEFAULT_REQUEST_TIMEOUT_MS = 10_000;
export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_RETRY_BACKOFF_MS = 500;

export const DEFAULT_BLOCKED_MESSAGE =
  "This response requires review and was not approved.";

// ── Schemas ──────────────────────────────────────────────────────────

const metadataSchema = z.record(z.unknown()).default({});

export const ClientSettingsSchema = z.object({
  apiKey: z.string().min(1, "apiKey is required (or set REVIEW_GATE_API_KEY)"),
  baseUrl: z.string().url("baseUrl must be a valid URL"),
  requestTimeoutMs: z.number().positive().default(DEFAULT_REQUEST_TIMEOUT_MS),
  maxRetries: z.number().int().nonnegative().default(DEFAULT_MAX_RETRIES),
  retryBackoffMs: z.number().nonnegative().default(DEFAULT_RETRY_BACKOFF_MS),
});

export type ClientSettings = Readonly<z.infer<typeof ClientSettingsSchema>>;

export const GuardrailPolicySchema = z
  .object({
    mode: z.enum(["blocking", "logging"]).default("blocking"),
    approvalTimeoutMs: z.number().nonnegative().default(30_000),
    pollIntervalMs: z.number().positive().default(2_000),
    blockedMessage: z.string().default(DEFAULT_BLOCKED_MESSAGE),
    metadata: metadataSchema,
  })
  .strict();

export type GuardrailPolicy = Readonly<z.infer<typeof GuardrailPolicySchema>>;

export const ApprovalPolicySchema = z
  .object({
    pollIntervalMs: z.number().positive().default(5_000),
    timeoutMs: z.number().nonnegative().default(600_000),
    requireApprovalFor: z.array(z.string().min(1)).optional(),
    metadata: metadataSchema,
  })
  .strict();

export type ApprovalPolicy = Readonly<z.infer<typeof ApprovalPolicySchema>>;

// ── Resolution ───────────────────────────────────────────────────────

function parseOrThrow<T extends z.ZodTypeAny>(
  schema: T,
  input: unknown,
  label: string,
): z.infer<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".") || label}: ${issue.message}`)
      .join("; ");
    throw new ReviewGateError(`Invalid ${label}: ${details}`, "INVALID_CONFIG", {
      cause: result.error,
    });
  }
  return result.data;
}

/**
 * Resolve client settings, falling back to REVIEW_GATE_API_KEY and
 * REVIEW_GATE_BASE_URL for values the caller leaves out.
 */
export function resolveClientSettings(
  config: {
    apiKey?: string;
    baseUrl?: string;
    requestTimeoutMs?: number;
    maxRetries?: number;
    retryBackoffMs?: number;
  },
  env: NodeJS.ProcessEnv = process.env,
): ClientSettings {
  return Object.freeze(
    parseOrThrow(
      ClientSettingsSchema,
      {
        apiKey: config.apiKey ?? env.REVIEW_GATE_API_KEY ?? "",
        baseUrl: config.baseUrl ?? env.REVIEW_GATE_BASE_URL ?? DEFAULT_BASE_URL,
        requestTimeoutMs: config.requestTimeoutMs,
        maxRetries: config.maxRetries,
        retryBackoffMs: config.retryBackoffMs,
      },
      "client config",
    ),
  );
}

export function resolveGuardrailPolicy(
  config: GuardrailConfig = {},
): GuardrailPolicy {
  const policy = parseOrThrow(GuardrailPolicySchema, config, "guardrail config");
  Object.freeze(policy.metadata);
  return Object.freeze(policy);
}

export function resolveApprovalPolicy(
  config: ApprovalConfig = {},
): ApprovalPolicy {
  const policy = parseOrThrow(ApprovalPolicySchema, config, "approval config");
  Object.freeze(policy.metadata);
  if (policy.requireApprovalFor) Object.freeze(policy.requireApprovalFor);
  return Object.freeze(policy);
}
