// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tally/circuit-breaker/errors`
 * Purpose: Rejections raised by a breaker without invoking the protected call.
 * Scope: Error classes and guards only.
 * Invariants: Both rejections extend CircuitRejectedError so callers can test once.
 * Side-effects: none
 * @public
 */

export class CircuitRejectedError extends Error {
  readonly breaker: string;

  constructor(breaker: string, message: string) {
    super(message);
    this.name = "CircuitRejectedError";
    this.breaker = breaker;
  }
}

/** The breaker is open; calls fail fast until the reset timeout elapses. */
export class CircuitOpenError extends CircuitRejectedError {
  readonly retryAfterMs: number;

  constructor(breaker: string, retryAfterMs: number) {
    super(breaker, `Circuit "${breaker}" is open`);
    this.name = "CircuitOpenError";
    this.retryAfterMs = retryAfterMs;
  }
}

/** The breaker is half-open and every trial slot is taken. */
export class CircuitHalfOpenLimitError extends CircuitRejectedError {
  constructor(breaker: string) {
    super(breaker, `Circuit "${breaker}" is half-open: too many trial requests`);
    this.name = "CircuitHalfOpenLimitError";
  }
}

export function isCircuitRejectedError(
  error: unknown
): error is CircuitRejectedError {
  return error instanceof CircuitRejectedError;
}
