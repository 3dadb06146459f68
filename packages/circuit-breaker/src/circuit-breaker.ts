// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tally/circuit-breaker/circuit-breaker`
 * Purpose: Closed → Open → HalfOpen → Closed breaker shared by every caller of one dependency.
 * Scope: Admission, outcome accounting and state transitions. Does not retry.
 * Invariants:
 * - Closed: `maxFailures` consecutive countable failures open the circuit; a success resets the count
 * - Open: calls are rejected without invoking the downstream function until `timeoutMs` has elapsed
 * - HalfOpen: at most `maxHalfOpenRequests` trials in flight; any trial failure reopens,
 *   `maxHalfOpenRequests` trial successes close
 * - State read-modify-write never spans an await (check and update run in one synchronous step)
 * - Outcomes of calls admitted under an earlier state generation are ignored
 * - Errors rejected by `isFailure` are neutral: no count change, but a trial slot is released
 * Side-effects: invokes onStateChange observer
 * @public
 */

import { CircuitHalfOpenLimitError, CircuitOpenError } from "./errors";

export type CircuitState = "closed" | "open" | "half_open";

export interface CircuitBreakerOptions {
  name: string;
  /** Consecutive failures that open the circuit (default 5). */
  maxFailures?: number;
  /** How long the circuit stays open before admitting a trial (default 30s). */
  timeoutMs?: number;
  /** Concurrent trials admitted while half-open (default 1). */
  maxHalfOpenRequests?: number;
  onStateChange?: (name: string, from: CircuitState, to: CircuitState) => void;
  /** Which errors count against the breaker (default: all). */
  isFailure?: (error: unknown) => boolean;
  now?: () => number;
}

export interface CircuitBreakerStats {
  name: string;
  state: CircuitState;
  consecutiveFailures: number;
  halfOpenInFlight: number;
  openedAt: number | null;
}

export const DEFAULT_MAX_FAILURES = 5;
export const DEFAULT_TIMEOUT_MS = 30_000;
export const DEFAULT_MAX_HALF_OPEN_REQUESTS = 1;

interface Admission {
  generation: number;
  trial: boolean;
}

function positiveOr(value: number | undefined, fallback: number): number {
  return value !== undefined && value > 0 ? value : fallback;
}

export class CircuitBreaker {
  readonly name: string;
  private readonly maxFailures: number;
  private readonly timeoutMs: number;
  private readonly maxHalfOpenRequests: number;
  private readonly isFailure: (error: unknown) => boolean;
  private readonly now: () => number;
  private readonly onStateChange: CircuitBreakerOptions["onStateChange"];

  private currentState: CircuitState = "closed";
  private generation = 0;
  private consecutiveFailures = 0;
  private halfOpenInFlight = 0;
  private halfOpenSuccesses = 0;
  private openedAt: number | null = null;

  constructor(options: CircuitBreakerOptions) {
    this.name = options.name;
    this.maxFailures = positiveOr(options.maxFailures, DEFAULT_MAX_FAILURES);
    this.timeoutMs = positiveOr(options.timeoutMs, DEFAULT_TIMEOUT_MS);
    this.maxHalfOpenRequests = positiveOr(
      options.maxHalfOpenRequests,
      DEFAULT_MAX_HALF_OPEN_REQUESTS
    );
    this.isFailure = options.isFailure ?? (() => true);
    this.now = options.now ?? Date.now;
    this.onStateChange = options.onStateChange;
  }

  /**
   * Current state. An open circuit whose timeout has elapsed still reports
   * "open" until the next call is admitted as a trial.
   */
  get state(): CircuitState {
    return this.currentState;
  }

  get failures(): number {
    return this.consecutiveFailures;
  }

  stats(): CircuitBreakerStats {
    return {
      name: this.name,
      state: this.currentState,
      consecutiveFailures: this.consecutiveFailures,
      halfOpenInFlight: this.halfOpenInFlight,
      openedAt: this.openedAt,
    };
  }

  /**
   * Runs `fn` if the circuit admits it. Rejections (CircuitOpenError,
   * CircuitHalfOpenLimitError) happen before `fn` is invoked.
   */
  async execute<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    signal?.throwIfAborted();
    const admission = this.admit();

    let result: T;
    try {
      result = await fn();
    } catch (error) {
      this.recordFailure(admission, error);
      throw error;
    }
    this.recordSuccess(admission);
    return result;
  }

  /** Forces the circuit closed and clears all counters. */
  reset(): void {
    this.transition("closed");
  }

  private admit(): Admission {
    if (this.currentState === "open") {
      const elapsed = this.now() - (this.openedAt ?? 0);
      if (elapsed < this.timeoutMs) {
        throw new CircuitOpenError(this.name, this.timeoutMs - elapsed);
      }
      this.transition("half_open");
    }

    if (this.currentState === "half_open") {
      if (this.halfOpenInFlight >= this.maxHalfOpenRequests) {
        throw new CircuitHalfOpenLimitError(this.name);
      }
      this.halfOpenInFlight++;
      return { generation: this.generation, trial: true };
    }

    return { generation: this.generation, trial: false };
  }

  private recordSuccess(admission: Admission): void {
    if (admission.generation !== this.generation) return;

    if (admission.trial) {
      this.halfOpenInFlight--;
      this.halfOpenSuccesses++;
      if (this.halfOpenSuccesses >= this.maxHalfOpenRequests) {
        this.transition("closed");
      }
      return;
    }

    this.consecutiveFailures = 0;
  }

  private recordFailure(admission: Admission, error: unknown): void {
    if (admission.generation !== this.generation) return;

    if (!this.isFailure(error)) {
      if (admission.trial) this.halfOpenInFlight--;
      return;
    }

    if (admission.trial) {
      this.transition("open");
      return;
    }

    this.consecutiveFailures++;
    if (this.consecutiveFailures >= this.maxFailures) {
      this.transition("open");
    }
  }

  private transition(to: CircuitState): void {
    const from = this.currentState;
    this.generation++;
    this.currentState = to;
    this.consecutiveFailures = 0;
    this.halfOpenInFlight = 0;
    this.halfOpenSuccesses = 0;
    this.openedAt = to === "open" ? this.now() : null;
    if (from !== to) {
      this.onStateChange?.(this.name, from, to);
    }
  }
}
