// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tally/task-queue/types`
 * Purpose: Job model shared by every queue backend: lanes, options, handler contract, lifecycle hooks.
 * Scope: Types and constants only. Does not contain queue logic.
 * Invariants:
 * - Lanes are a closed set with fixed relative worker shares (critical 6 : default 3 : low 1)
 * - Handlers receive the payload as `unknown` and validate it themselves (no `payload as X`)
 * - HandlerMap is keyed exhaustively by the job map, so a missing handler is a compile error
 * Side-effects: none
 * @public
 */

/**
 * Logger interface expected by queue components.
 * Compatible with pino's Logger type.
 */
export interface LoggerLike {
  info(obj: Record<string, unknown>, msg?: string): void;
  warn(obj: Record<string, unknown>, msg?: string): void;
  error(obj: Record<string, unknown>, msg?: string): void;
  debug?(obj: Record<string, unknown>, msg?: string): void;
  child?(bindings: Record<string, unknown>): LoggerLike;
}

export const LANES = ["critical", "default", "low"] as const;

export type Lane = (typeof LANES)[number];

export const LANE_WEIGHTS: Readonly<Record<Lane, number>> = {
  critical: 6,
  default: 3,
  low: 1,
};

/** Per-job settings. Anything omitted falls back to DEFAULT_JOB_OPTIONS. */
export interface JobOptions {
  lane?: Lane;
  /** Retries after the first attempt; 0 means a single attempt. */
  maxRetries?: number;
  /** Hard per-attempt timeout; the handler's signal aborts on expiry. */
  timeoutMs?: number;
  /** Earliest start, relative to enqueue time. */
  delayMs?: number;
  /** Deduplication key; a second enqueue with the same key replaces the pending job. */
  jobKey?: string;
}

export type ResolvedJobOptions = Required<Omit<JobOptions, "jobKey">> &
  Pick<JobOptions, "jobKey">;

export const DEFAULT_JOB_OPTIONS: ResolvedJobOptions = {
  lane: "default",
  maxRetries: 3,
  timeoutMs: 30_000,
  delayMs: 0,
};

export function resolveJobOptions(
  base: JobOptions | undefined,
  overrides?: JobOptions
): ResolvedJobOptions {
  return { ...DEFAULT_JOB_OPTIONS, ...base, ...overrides };
}

/** What a handler learns about the attempt it is running. */
export interface JobContext {
  jobId: string;
  kind: string;
  lane: Lane;
  /** 1-based attempt number. */
  attempt: number;
  maxAttempts: number;
  /** Aborts when the attempt's timeout fires. Pass it to every outbound call. */
  signal: AbortSignal;
}

export type JobHandler = (payload: unknown, ctx: JobContext) => Promise<unknown>;

/** Maps job kind to payload type. */
export type JobMap = Record<string, unknown>;

export type JobKind<M extends JobMap> = keyof M & string;

export type HandlerMap<M extends JobMap> = { [K in JobKind<M>]: JobHandler };

/** Producer-side contract implemented by every backend. */
export interface JobQueue<M extends JobMap> {
  /** Resolves with the backend's job id once the job is durably queued. */
  enqueue<K extends JobKind<M>>(
    kind: K,
    payload: M[K],
    options?: JobOptions
  ): Promise<string>;
}

/** Worker-side lifecycle shared by every backend. */
export interface JobRunner {
  start(concurrency: number): Promise<void>;
  /** Stops intake and waits for in-flight attempts to settle. */
  stop(): Promise<void>;
}

export type AttemptOutcome = "completed" | "retrying" | "failed";

export interface JobSettlement {
  jobId: string;
  kind: string;
  lane: Lane;
  attempt: number;
  outcome: AttemptOutcome;
  durationMs: number;
  error?: unknown;
}

/** A job that exhausted its retries or failed with a non-retryable error. */
export interface JobFailure {
  jobId: string;
  kind: string;
  lane: Lane;
  payload: unknown;
  attempts: number;
  error: unknown;
  failedAt: Date;
}

export interface JobHooks {
  onJobSettled?(settlement: JobSettlement): void;
  onJobFailed?(failure: JobFailure): void;
}
