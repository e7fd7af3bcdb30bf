import { ReviewGateError } from "../types.js";
import type { ReviewTask, ReviewVerdict } from "../types.js";

/**
 * The I/O a review program can request. Submission, status calls and
 * poll sleeps are the only suspension points.
 */
export type ReviewEffect =
  | { type: "submit"; task: ReviewTask }
  | { type: "status"; reviewTaskId: string }
  | { type: "sleep"; ms: number };

/** Value a driver resumes the program with: a verdict, or nothing after a sleep. */
export type EffectResult = ReviewVerdict | undefined;

/**
 * Review logic written once as a generator of effects. `runProgram`
 * drives it with promises, `runProgramSync` with blocking calls.
 */
export type ReviewProgram<T> = Generator<ReviewEffect, T, EffectResult>;

export interface EffectHandler {
  submit(task: ReviewTask): Promise<ReviewVerdict>;
  status(reviewTaskId: string): Promise<ReviewVerdict>;
  sleep(ms: number): Promise<void>;
}

export interface SyncEffectHandler {
  submit(task: ReviewTask): ReviewVerdict;
  status(reviewTaskId: string): ReviewVerdict;
  sleep(ms: number): void;
}

// ── Effect constructors ──────────────────────────────────────────────

export function* submitTask(task: ReviewTask): ReviewProgram<ReviewVerdict> {
  return expectVerdict(yield { type: "submit", task }, "submit");
}

export function* fetchStatus(
  reviewTaskId: string,
): ReviewProgram<ReviewVerdict> {
  return expectVerdict(yield { type: "status", reviewTaskId }, "status");
}

export function* sleep(ms: number): ReviewProgram<void> {
  yield { type: "sleep", ms };
}

function expectVerdict(
  result: EffectResult,
  effect: ReviewEffect["type"],
): ReviewVerdict {
  if (result === undefined) {
    throw new ReviewGateError(
      `Driver resumed a ${effect} effect without a verdict`,
      "INVALID_EFFECT_RESULT",
    );
  }
  return result;
}

// ── Drivers ──────────────────────────────────────────────────────────
//
// A failed effect is thrown back into the program so its own try/catch
// decides what the failure means.

export async function runProgram<T>(
  program: ReviewProgram<T>,
  handler: EffectHandler,
): Promise<T> {
  let step = program.next();
  while (!step.done) {
    let result: EffectResult;
    try {
      result = await performEffect(step.value, handler);
    } catch (err) {
      step = program.throw(err);
      continue;
    }
    step = program.next(result);
  }
  return step.value;
}

export function runProgramSync<T>(
  program: ReviewProgram<T>,
  handler: SyncEffectHandler,
): T {
  let step = program.next();
  while (!step.done) {
    let result: EffectResult;
    try {
      result = performEffectSync(step.value, handler);
    } catch (err) {
      step = program.throw(err);
      continue;
    }
    step = program.next(result);
  }
  return step.value;
}

async function performEffect(
  effect: ReviewEffect,
  handler: EffectHandler,
): Promise<EffectResult> {
  switch (effect.type) {
    case "submit":
      return handler.submit(effect.task);
    case "status":
      return handler.status(effect.reviewTaskId);
    case "sleep":
      await handler.sleep(effect.ms);
      return undefined;
  }
}

function performEffectSync(
  effect: ReviewEffect,
  handler: SyncEffectHandler,
): EffectResult {
  switch (effect.type) {
    case "submit":
      return handler.submit(effect.task);
    case "status":
      return handler.status(effect.reviewTaskId);
    case "sleep":
      handler.sleep(effect.ms);
      return undefined;
  }
}
