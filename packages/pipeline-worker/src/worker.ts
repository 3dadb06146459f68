// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tally/pipeline-worker/worker`
 * Purpose: Pipeline worker bootstrap and lifecycle management.
 * Scope: Builds the handler map, starts the queue backend and daily cron schedules, handles shutdown. Does not contain task logic.
 * Invariants:
 * - All dependencies injected via config; the backend is chosen by the caller
 * - HandlerMap<PipelineJobs> is exhaustive: a new job kind without a handler does not compile
 * - Tasks that enqueue follow-up jobs go through the same backend they run on
 * - Shutdown stops cron before the queue so no tick lands on a stopping backend
 * Side-effects: IO (starts queue runners and timers)
 * @internal
 */

import type { CircuitBreaker } from "@tally/circuit-breaker";
import {
  type EvaluatorStore,
  type ObservationCostWriter,
  type PricingCatalog,
  previousUtcDay,
  type ScoreWriter,
  type TraceReader,
  type WebhookStore,
} from "@tally/pipeline-core";
import {
  CronScheduler,
  type HandlerMap,
  type JobKind,
  type JobOptions,
  type JobRunner,
  type LoggerLike,
} from "@tally/task-queue";

import type { JudgeClient } from "./adapters/openai-judge.client";
import {
  DAILY_AGGREGATION_CRON,
  DAILY_COST_REPORT_CRON,
  JOB_DEFAULTS,
  type PipelineJobs,
} from "./jobs";
import type { NotificationDispatcher } from "./notifications/dispatcher";
import type { PipelineQueue } from "./producers";
import {
  createBatchCostTask,
  createCostCalculationTask,
  createDailyAggregationTask,
} from "./tasks/cost";
import {
  createBatchEvaluationTask,
  createEvaluationTask,
} from "./tasks/evaluation";
import {
  createDailyCostReportTask,
  createSendNotificationTask,
  createThresholdCheckTask,
} from "./tasks/notification";

/**
 * Port implementations and clients the tasks run against.
 */
export interface PipelineDeps {
  traces: TraceReader;
  evaluators: EvaluatorStore;
  scores: ScoreWriter;
  webhooks: WebhookStore;
  pricing: PricingCatalog;
  costs: ObservationCostWriter;
  /** Null when no judge API key is configured. */
  judge: JudgeClient | null;
  judgeBreaker: CircuitBreaker;
  /** Judge model when the evaluator has no override. */
  defaultModel: string;
  dispatcher: NotificationDispatcher;
}

export type PipelineBackend = PipelineQueue & JobRunner;

export interface PipelineWorkerConfig {
  logger: LoggerLike;
  deps: PipelineDeps;
  /** Builds the queue backend (graphile or in-process) around the handler map. */
  createQueue: (handlers: HandlerMap<PipelineJobs>) => PipelineBackend;
  /** Worker pool size, split 6:3:1 across lanes (default: 10) */
  concurrency?: number;
  /** Register the daily cron schedules (default: true) */
  schedules?: boolean;
  now?: () => Date;
}

export interface PipelineWorker {
  queue: PipelineQueue;
  stop: () => Promise<void>;
}

/**
 * Producer handle for tasks, bound once the backend exists.
 * The backend needs the handlers, and some handlers enqueue.
 */
class BoundQueue implements PipelineQueue {
  private backend: PipelineQueue | null = null;

  bind(backend: PipelineQueue): void {
    this.backend = backend;
  }

  enqueue<K extends JobKind<PipelineJobs>>(
    kind: K,
    payload: PipelineJobs[K],
    options?: JobOptions
  ): Promise<string> {
    if (!this.backend) {
      return Promise.reject(new Error("Pipeline queue is not started"));
    }
    return this.backend.enqueue(kind, payload, options);
  }
}

export function createPipelineHandlers(
  deps: PipelineDeps,
  queue: PipelineQueue,
  logger: LoggerLike,
  now?: () => Date
): HandlerMap<PipelineJobs> {
  const cost = { ...deps, logger };
  const evaluation = { ...deps, logger };
  const notification = { ...deps, queue, logger, ...(now ? { now } : {}) };

  return {
    "cost:calculate": createCostCalculationTask(cost),
    "cost:calculate-batch": createBatchCostTask(cost),
    "cost:aggregate-daily": createDailyAggregationTask(cost),
    "eval:run": createEvaluationTask(evaluation),
    "eval:run-batch": createBatchEvaluationTask(evaluation),
    "notification:send": createSendNotificationTask(notification),
    "notification:check-thresholds": createThresholdCheckTask(notification),
    "notification:daily-cost-report": createDailyCostReportTask(notification),
  };
}

/**
 * Starts the pipeline worker with injected dependencies.
 * Returns the producer handle and a cleanup function to stop gracefully.
 */
export async function startPipelineWorker(
  config: PipelineWorkerConfig
): Promise<PipelineWorker> {
  const { logger, deps, concurrency = 10, schedules = true } = config;

  logger.info({ concurrency }, "Starting pipeline worker");

  const queue = new BoundQueue();
  const backend = config.createQueue(
    createPipelineHandlers(deps, queue, logger, config.now)
  );
  queue.bind(backend);

  await backend.start(concurrency);

  const cron = new CronScheduler<PipelineJobs>(queue, logger, config.now);
  if (schedules) {
    cron.schedule(
      DAILY_AGGREGATION_CRON,
      "cost:aggregate-daily",
      (tickAt) => ({ date: previousUtcDay(tickAt) }),
      JOB_DEFAULTS["cost:aggregate-daily"]
    );
    cron.schedule(
      DAILY_COST_REPORT_CRON,
      "notification:daily-cost-report",
      (tickAt) => ({ date: previousUtcDay(tickAt) }),
      JOB_DEFAULTS["notification:daily-cost-report"]
    );
    cron.start();
  }

  logger.info({ schedules }, "Pipeline worker started");

  return {
    queue,
    stop: async () => {
      logger.info({}, "Stopping pipeline worker");
      cron.stop();
      await backend.stop();
    },
  };
}
