// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tally/pipeline-worker/producers`
 * Purpose: Typed enqueue helpers for code outside the worker (ingestion, admin actions, cron, other tasks).
 * Scope: Applies per-kind queue defaults and fans events out to subscribed webhooks. Does not run jobs.
 * Invariants:
 * - Every enqueue starts from JOB_DEFAULTS[kind]; caller options override
 * - notifyProject enqueues one notification:send job per enabled, subscribed webhook
 * - A failed enqueue in a fan-out is logged; the remaining webhooks are still enqueued
 * Side-effects: IO (queue writes)
 * @public
 */

import type { NotificationData, WebhookEventType, WebhookStore } from "@tally/pipeline-core";
import {
  errorMessage,
  type JobOptions,
  type JobQueue,
  type LoggerLike,
} from "@tally/task-queue";

import { JOB_DEFAULTS, type PipelineJobKind, type PipelineJobs } from "./jobs";
import type {
  BatchEvaluationPayload,
  CostCalculationPayload,
  EvaluationPayload,
  NotificationPayload,
  ThresholdCheckPayload,
} from "./schemas/payloads";

export type PipelineQueue = JobQueue<PipelineJobs>;

export function enqueuePipelineJob<K extends PipelineJobKind>(
  queue: PipelineQueue,
  kind: K,
  payload: PipelineJobs[K],
  options?: JobOptions
): Promise<string> {
  return queue.enqueue(kind, payload, { ...JOB_DEFAULTS[kind], ...options });
}

export function enqueueCostCalculation(
  queue: PipelineQueue,
  payload: CostCalculationPayload,
  options?: JobOptions
): Promise<string> {
  return enqueuePipelineJob(queue, "cost:calculate", payload, options);
}

export function enqueueEvaluation(
  queue: PipelineQueue,
  payload: EvaluationPayload,
  options?: JobOptions
): Promise<string> {
  return enqueuePipelineJob(queue, "eval:run", payload, options);
}

export function enqueueBatchEvaluation(
  queue: PipelineQueue,
  payload: BatchEvaluationPayload,
  options?: JobOptions
): Promise<string> {
  return enqueuePipelineJob(queue, "eval:run-batch", payload, options);
}

export function enqueueThresholdCheck(
  queue: PipelineQueue,
  payload: ThresholdCheckPayload,
  options?: JobOptions
): Promise<string> {
  return enqueuePipelineJob(queue, "notification:check-thresholds", payload, options);
}

export function enqueueNotification(
  queue: PipelineQueue,
  payload: NotificationPayload,
  options?: JobOptions
): Promise<string> {
  return enqueuePipelineJob(queue, "notification:send", payload, options);
}

export interface NotifyProjectDeps {
  queue: PipelineQueue;
  webhooks: WebhookStore;
  logger: LoggerLike;
}

/** Returns the number of notification jobs enqueued. */
export async function notifyProject(
  deps: NotifyProjectDeps,
  projectId: string,
  eventType: WebhookEventType,
  data: NotificationData
): Promise<number> {
  const subscribed = await deps.webhooks.listEnabledByEvent(projectId, eventType);

  let enqueued = 0;
  for (const webhook of subscribed) {
    try {
      await enqueueNotification(deps.queue, {
        webhookId: webhook.id,
        eventType,
        data: { ...data },
      });
      enqueued++;
    } catch (error) {
      deps.logger.error(
        { projectId, webhookId: webhook.id, eventType, error: errorMessage(error) },
        "Failed to enqueue notification"
      );
    }
  }
  return enqueued;
}
