// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tally/task-queue`
 * Purpose: Task queue package exports.
 * Scope: Re-exports queue backends, cron scheduler, error classes and job types. Does not contain implementations.
 * Invariants: Zero imports from other workspace packages (leaf infrastructure).
 * Side-effects: none
 * @public
 */

export {
  type CronScheduleOptions,
  CronScheduler,
  computeNextCronTime,
} from "./cron";
export {
  InvalidPayloadError,
  isJobTimeoutError,
  isNonRetryableJobError,
  isQueueShutdownError,
  JobTimeoutError,
  NonRetryableJobError,
  parsePayload,
  QueueShutdownError,
} from "./errors";
export {
  type AttemptResult,
  defaultRetryDelay,
  errorMessage,
  runAttempt,
  runWithTimeout,
} from "./execute";
export {
  GraphileJobQueue,
  type GraphileJobQueueConfig,
} from "./graphile-queue";
export {
  DEFAULT_MAX_FAILED_JOBS,
  InProcessJobQueue,
  type InProcessJobQueueConfig,
} from "./in-process-queue";
export { LanePicker, laneFlag, splitConcurrency } from "./lanes";
export {
  type AttemptOutcome,
  DEFAULT_JOB_OPTIONS,
  type HandlerMap,
  type JobContext,
  type JobFailure,
  type JobHandler,
  type JobHooks,
  type JobKind,
  type JobMap,
  type JobOptions,
  type JobQueue,
  type JobRunner,
  type JobSettlement,
  LANE_WEIGHTS,
  LANES,
  type Lane,
  type LoggerLike,
  type ResolvedJobOptions,
  resolveJobOptions,
} from "./types";
