// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tally/pipeline-worker/jobs`
 * Purpose: Closed map of pipeline job kinds to payload types, with per-kind queue defaults.
 * Scope: Type-level registry and lane/retry/timeout defaults. Does not enqueue.
 * Invariants:
 * - Every kind has exactly one handler (HandlerMap<PipelineJobs> is exhaustive)
 * - Webhook delivery runs on the critical lane; reporting and batch work on low
 * Side-effects: none
 * @public
 */

import type { JobKind, JobOptions, Lane } from "@tally/task-queue";

import type {
  BatchCostPayload,
  BatchEvaluationPayload,
  CostCalculationPayload,
  DailyAggregationPayload,
  DailyCostReportPayload,
  EvaluationPayload,
  NotificationPayload,
  ThresholdCheckPayload,
} from "./schemas/payloads";

export type PipelineJobs = {
  "cost:calculate": CostCalculationPayload;
  "cost:calculate-batch": BatchCostPayload;
  "cost:aggregate-daily": DailyAggregationPayload;
  "eval:run": EvaluationPayload;
  "eval:run-batch": BatchEvaluationPayload;
  "notification:send": NotificationPayload;
  "notification:check-thresholds": ThresholdCheckPayload;
  "notification:daily-cost-report": DailyCostReportPayload;
};

export type PipelineJobKind = JobKind<PipelineJobs>;

export interface JobDefaults extends JobOptions {
  lane: Lane;
  maxRetries: number;
  timeoutMs: number;
}

const SECOND = 1000;
const MINUTE = 60 * SECOND;

export const JOB_DEFAULTS: Readonly<Record<PipelineJobKind, JobDefaults>> = {
  "cost:calculate": { lane: "default", maxRetries: 3, timeoutMs: 30 * SECOND },
  "cost:calculate-batch": {
    lane: "default",
    maxRetries: 3,
    timeoutMs: 5 * MINUTE,
  },
  "cost:aggregate-daily": { lane: "low", maxRetries: 3, timeoutMs: 5 * MINUTE },
  "eval:run": { lane: "default", maxRetries: 3, timeoutMs: 5 * MINUTE },
  "eval:run-batch": { lane: "low", maxRetries: 3, timeoutMs: 30 * MINUTE },
  // Above WEBHOOK_TIMEOUT_MS.
  "notification:send": {
    lane: "critical",
    maxRetries: 3,
    timeoutMs: 60 * SECOND,
  },
  "notification:check-thresholds": {
    lane: "default",
    maxRetries: 3,
    timeoutMs: 30 * SECOND,
  },
  "notification:daily-cost-report": {
    lane: "low",
    maxRetries: 3,
    timeoutMs: 5 * MINUTE,
  },
};

/** Daily aggregation of the previous UTC day. */
export const DAILY_AGGREGATION_CRON = "0 1 * * *";
/** Daily cost report, after aggregation has had time to run. */
export const DAILY_COST_REPORT_CRON = "30 1 * * *";
