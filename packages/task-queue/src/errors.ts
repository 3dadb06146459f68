// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tally/task-queue/errors`
 * Purpose: Error classes that decide whether a failed attempt is retried.
 * Scope: Error types, guards and payload validation helper. Does not contain queue logic.
 * Invariants:
 * - NonRetryableJobError (and subclasses) fails the job immediately
 * - Every other error, JobTimeoutError and QueueShutdownError included, is retry-eligible
 * Side-effects: none
 * @public
 */

import type { z } from "zod";

/**
 * A failure a retry cannot fix (bad configuration, malformed payload).
 * Subclass it for domain-specific configuration errors.
 */
export class NonRetryableJobError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "NonRetryableJobError";
  }
}

export function isNonRetryableJobError(
  error: unknown
): error is NonRetryableJobError {
  return error instanceof NonRetryableJobError;
}

export class InvalidPayloadError extends NonRetryableJobError {
  readonly kind: string;
  readonly issues: readonly string[];

  constructor(kind: string, issues: readonly string[]) {
    super(`Invalid payload for ${kind}: ${issues.join("; ")}`);
    this.name = "InvalidPayloadError";
    this.kind = kind;
    this.issues = issues;
  }
}

export class JobTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Job attempt exceeded ${timeoutMs}ms`);
    this.name = "JobTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export function isJobTimeoutError(error: unknown): error is JobTimeoutError {
  return error instanceof JobTimeoutError;
}

/** The worker is stopping; the attempt was abandoned, not failed. */
export class QueueShutdownError extends Error {
  constructor(options?: { cause?: unknown }) {
    super("Job attempt interrupted by queue shutdown", options);
    this.name = "QueueShutdownError";
  }
}

export function isQueueShutdownError(
  error: unknown
): error is QueueShutdownError {
  return error instanceof QueueShutdownError;
}

/**
 * Validates a task payload at entry. Schema failures are non-retryable:
 * the same payload will fail the same way on every attempt.
 */
export function parsePayload<S extends z.ZodTypeAny>(
  kind: string,
  schema: S,
  payload: unknown
): z.output<S> {
  const result = schema.safeParse(payload);
  if (!result.success) {
    throw new InvalidPayloadError(
      kind,
      result.error.issues.map(
        (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`
      )
    );
  }
  return result.data;
}
