// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tally/pipeline-worker/tasks/notification`
 * Purpose: Notification tasks: deliver one webhook, check a trace against thresholds, send the daily cost report.
 * Scope: Payload validation and fan-out; delivery semantics live in NotificationDispatcher. Does not retry inline.
 * Invariants:
 * - Each crossed threshold of each subscribed webhook becomes its own notification job; crossings are never merged
 * - Cost and latency subscriptions are listed independently; a failed listing is logged and treated as empty
 * - A failed enqueue is logged; the remaining crossings are still enqueued
 * - Missing trace → no-op (warn)
 * - Threshold events carry the trace's start time
 * Side-effects: IO (queue writes, webhook delivery via dispatcher)
 * @internal
 */

import {
  aggregateDailyCost,
  costThresholdCrossing,
  dailyCostReportData,
  latencyThresholdCrossing,
  type ThresholdCrossing,
  type TraceReader,
  type Webhook,
  type WebhookStore,
} from "@tally/pipeline-core";
import {
  errorMessage,
  type JobHandler,
  type LoggerLike,
  parsePayload,
} from "@tally/task-queue";

import type { DispatchResult, NotificationDispatcher } from "../notifications/dispatcher";
import { enqueueNotification, notifyProject, type PipelineQueue } from "../producers";
import {
  DailyCostReportPayloadSchema,
  NotificationPayloadSchema,
  ThresholdCheckPayloadSchema,
} from "../schemas/payloads";
import { utcDayOrThrow } from "./cost";

export interface NotificationTaskDeps {
  dispatcher: Pick<NotificationDispatcher, "send">;
  webhooks: WebhookStore;
  traces: TraceReader;
  queue: PipelineQueue;
  logger: LoggerLike;
}

export interface DailyCostReportResult {
  date: string;
  projects: number;
  notifications: number;
}

export function createSendNotificationTask(
  deps: Pick<NotificationTaskDeps, "dispatcher">
): JobHandler {
  return async (payload, ctx): Promise<DispatchResult> => {
    const { webhookId, eventType, data } = parsePayload(
      "notification:send",
      NotificationPayloadSchema,
      payload
    );
    return deps.dispatcher.send(webhookId, eventType, data, {
      attempt: ctx.attempt,
      signal: ctx.signal,
    });
  };
}

async function listSubscribed(
  deps: NotificationTaskDeps,
  projectId: string,
  eventType: ThresholdCrossing["eventType"]
): Promise<Webhook[]> {
  try {
    return await deps.webhooks.listEnabledByEvent(projectId, eventType);
  } catch (error) {
    deps.logger.warn(
      { projectId, eventType, error: errorMessage(error) },
      "Failed to list webhooks for threshold check"
    );
    return [];
  }
}

export function createThresholdCheckTask(deps: NotificationTaskDeps): JobHandler {
  return async (payload): Promise<number> => {
    const { projectId, traceId } = parsePayload(
      "notification:check-thresholds",
      ThresholdCheckPayloadSchema,
      payload
    );

    const trace = await deps.traces.getTrace(projectId, traceId);
    if (!trace) {
      deps.logger.warn({ projectId, traceId }, "Trace not found, skipping threshold check");
      return 0;
    }

    const [costHooks, latencyHooks] = await Promise.all([
      listSubscribed(deps, projectId, "trace.cost_threshold"),
      listSubscribed(deps, projectId, "trace.latency_threshold"),
    ]);

    const crossings: ThresholdCrossing[] = [];
    for (const webhook of costHooks) {
      const crossing = costThresholdCrossing(trace, webhook);
      if (crossing) crossings.push(crossing);
    }
    for (const webhook of latencyHooks) {
      const crossing = latencyThresholdCrossing(trace, webhook);
      if (crossing) crossings.push(crossing);
    }

    let enqueued = 0;
    for (const crossing of crossings) {
      try {
        await enqueueNotification(deps.queue, {
          webhookId: crossing.webhookId,
          eventType: crossing.eventType,
          data: { ...crossing.data },
        });
        enqueued++;
      } catch (error) {
        deps.logger.error(
          {
            projectId,
            traceId,
            webhookId: crossing.webhookId,
            eventType: crossing.eventType,
            error: errorMessage(error),
          },
          "Failed to enqueue threshold notification"
        );
      }
    }

    if (enqueued > 0) {
      deps.logger.info({ projectId, traceId, enqueued }, "Threshold notifications enqueued");
    }
    return enqueued;
  };
}

export function createDailyCostReportTask(deps: NotificationTaskDeps): JobHandler {
  return async (payload, ctx): Promise<DailyCostReportResult> => {
    const { projectId, date } = parsePayload(
      "notification:daily-cost-report",
      DailyCostReportPayloadSchema,
      payload
    );
    const day = utcDayOrThrow(date);

    const projectIds =
      projectId !== undefined
        ? [projectId]
        : await deps.traces.listProjectsWithActivity(day.start, day.end);

    let notifications = 0;
    for (const id of projectIds) {
      ctx.signal.throwIfAborted();
      const observations = await deps.traces.listObservationsInRange(
        id,
        day.start,
        day.end
      );
      const summary = aggregateDailyCost(observations);
      notifications += await notifyProject(
        deps,
        id,
        "daily.cost_report",
        dailyCostReportData(id, date, summary)
      );
    }

    deps.logger.info(
      { date, projects: projectIds.length, notifications },
      "Daily cost report enqueued"
    );
    return { date, projects: projectIds.length, notifications };
  };
}
