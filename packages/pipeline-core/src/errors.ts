// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tally/pipeline-core/errors`
 * Purpose: Domain error types for evaluator configuration and LLM judge failures.
 * Scope: Defines EvaluatorConfigError, LlmError, JudgeResponseParseError and classification helpers. Does not perform IO or logging.
 * Invariants:
 *   - LlmError captures kind + optional HTTP status at throw site (adapter boundary)
 *   - Only provider_5xx, rate_limited, timeout and unknown count against the judge breaker
 *   - provider_4xx is a client error: never retried, never counted by the breaker
 * Side-effects: none
 * Links: Used by the judge adapter (throw), evaluation task (catch), breaker (isFailure)
 * @public
 */

import { NonRetryableJobError } from "@tally/task-queue";

// ─────────────────────────────────────────────────────────────────────────────
// Configuration Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Evaluator cannot run as configured (empty template, bad rule config, no judge key).
 * Fails the job immediately.
 */
export class EvaluatorConfigError extends NonRetryableJobError {
  readonly evaluatorId: string | undefined;

  constructor(message: string, evaluatorId?: string) {
    super(message);
    this.name = "EvaluatorConfigError";
    this.evaluatorId = evaluatorId;
  }
}

export function isEvaluatorConfigError(
  error: unknown
): error is EvaluatorConfigError {
  return error instanceof EvaluatorConfigError;
}

// ─────────────────────────────────────────────────────────────────────────────
// LLM Error Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Error classification kinds for LLM failures.
 * Derived from HTTP status codes at adapter boundary.
 */
export type LlmErrorKind =
  | "timeout"
  | "rate_limited"
  | "provider_4xx"
  | "provider_5xx"
  | "aborted"
  | "unknown";

/**
 * Typed error for LLM adapter failures.
 * Thrown by adapters on HTTP errors.
 */
export class LlmError extends Error {
  readonly kind: LlmErrorKind;
  readonly status: number | undefined;

  constructor(message: string, kind: LlmErrorKind, status?: number) {
    super(message);
    this.name = "LlmError";
    this.kind = kind;
    this.status = status;
  }
}

/**
 * Type guard for LlmError.
 */
export function isLlmError(error: unknown): error is LlmError {
  return error instanceof LlmError;
}

/**
 * Classify LlmError kind from HTTP status code.
 * A 408 reply is a provider 4xx; "timeout" is reserved for the client's own deadline.
 */
export function classifyLlmErrorFromStatus(status: number): LlmErrorKind {
  if (status === 429) return "rate_limited";
  if (status >= 400 && status < 500) return "provider_4xx";
  if (status >= 500 && status < 600) return "provider_5xx";
  return "unknown";
}

/**
 * Whether an error should count against the judge circuit breaker.
 * Client errors and caller aborts say nothing about provider health.
 */
export function isBreakerCountableLlmError(error: unknown): boolean {
  if (isLlmError(error)) {
    return error.kind !== "provider_4xx" && error.kind !== "aborted";
  }
  return true;
}

// ─────────────────────────────────────────────────────────────────────────────
// Response Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Judge replied with something that is not the expected JSON shape.
 * Retry-eligible: a fresh completion may be well-formed.
 */
export class JudgeResponseParseError extends Error {
  readonly content: string;

  constructor(message: string, content: string) {
    super(message);
    this.name = "JudgeResponseParseError";
    this.content = content;
  }
}

export function isJudgeResponseParseError(
  error: unknown
): error is JudgeResponseParseError {
  return error instanceof JudgeResponseParseError;
}
