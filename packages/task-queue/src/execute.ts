// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tally/task-queue/execute`
 * Purpose: Runs one job attempt under its hard timeout and classifies the result.
 * Scope: Shared by every backend so retry semantics cannot drift between them. Does not reschedule jobs.
 * Invariants:
 * - The attempt settles no later than timeoutMs; the handler's signal aborts at that moment
 * - A shutdown signal aborts the handler's signal and settles the attempt with QueueShutdownError
 * - A late settlement of an abandoned handler is ignored, never surfaced as unhandled
 * - NonRetryableJobError → failed; other errors → retrying until attempt == maxAttempts, then failed
 * Side-effects: timers
 * @internal
 */

import {
  isNonRetryableJobError,
  isQueueShutdownError,
  JobTimeoutError,
  QueueShutdownError,
} from "./errors";
import type { AttemptOutcome, JobContext, JobHandler } from "./types";

/**
 * Runs `fn` with an AbortSignal that fires after `timeoutMs` or when
 * `shutdownSignal` aborts. Rejects with JobTimeoutError or QueueShutdownError,
 * whichever comes first, without waiting for `fn` to settle.
 */
export function runWithTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  shutdownSignal?: AbortSignal
): Promise<T> {
  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    const abandon = (error: Error): void => {
      controller.abort(error);
      reject(error);
    };
    const shutdownError = (): QueueShutdownError => {
      const reason: unknown = shutdownSignal?.reason;
      return isQueueShutdownError(reason)
        ? reason
        : new QueueShutdownError({ cause: reason });
    };

    if (shutdownSignal?.aborted) {
      abandon(shutdownError());
      return;
    }

    const onShutdown = (): void => {
      clearTimeout(timer);
      abandon(shutdownError());
    };
    const timer = setTimeout(() => {
      shutdownSignal?.removeEventListener("abort", onShutdown);
      abandon(new JobTimeoutError(timeoutMs));
    }, timeoutMs);
    shutdownSignal?.addEventListener("abort", onShutdown, { once: true });

    const settle = (): void => {
      clearTimeout(timer);
      shutdownSignal?.removeEventListener("abort", onShutdown);
    };

    let work: Promise<T>;
    try {
      work = fn(controller.signal);
    } catch (error) {
      settle();
      reject(error);
      return;
    }

    void work.then(
      (value) => {
        settle();
        resolve(value);
      },
      (error: unknown) => {
        settle();
        reject(error);
      }
    );
  });
}

export type AttemptResult =
  | { outcome: Extract<AttemptOutcome, "completed">; durationMs: number }
  | {
      outcome: Exclude<AttemptOutcome, "completed">;
      durationMs: number;
      error: unknown;
    };

export async function runAttempt(
  handler: JobHandler,
  payload: unknown,
  ctx: Omit<JobContext, "signal">,
  timeoutMs: number,
  now: () => number = Date.now,
  shutdownSignal?: AbortSignal
): Promise<AttemptResult> {
  const startedAt = now();
  try {
    await runWithTimeout(
      (signal) => handler(payload, { ...ctx, signal }),
      timeoutMs,
      shutdownSignal
    );
    return { outcome: "completed", durationMs: now() - startedAt };
  } catch (error) {
    const durationMs = now() - startedAt;
    const exhausted = ctx.attempt >= ctx.maxAttempts;
    const outcome =
      isNonRetryableJobError(error) || exhausted ? "failed" : "retrying";
    return { outcome, durationMs, error };
  }
}

/** Exponential backoff capped at one hour, in the spirit of graphile-worker's own. */
export function defaultRetryDelay(attempt: number): number {
  return Math.min(2 ** attempt * 1000, 3_600_000);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
