// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tally/pipeline-core/notifications/thresholds`
 * Purpose: Decide which webhook thresholds a completed trace crosses.
 * Scope: Strict comparisons and notification data construction. Does not enqueue.
 * Invariants:
 * - Crossing is strict (>); a webhook without the threshold never fires
 * - A trace without the measured value (null cost / duration) never fires
 * - One crossing per webhook per threshold kind; crossings are never merged
 * - The event timestamp is the trace's start time, not the time of the check
 * Side-effects: none
 * @public
 */

import type { Trace, Webhook, WebhookEventType } from "../domain/types";
import type { NotificationData } from "./payloads";

export interface ThresholdCrossing {
  webhookId: string;
  eventType: Extract<
    WebhookEventType,
    "trace.cost_threshold" | "trace.latency_threshold"
  >;
  data: NotificationData;
}

export function costThresholdCrossing(
  trace: Trace,
  webhook: Webhook
): ThresholdCrossing | null {
  if (webhook.costThreshold === null || trace.totalCost === null) return null;
  if (!(trace.totalCost > webhook.costThreshold)) return null;
  return {
    webhookId: webhook.id,
    eventType: "trace.cost_threshold",
    data: {
      traceId: trace.id,
      traceName: trace.name,
      cost: trace.totalCost,
      threshold: webhook.costThreshold,
      projectId: trace.projectId,
      timestamp: trace.startTime.toISOString(),
    },
  };
}

export function latencyThresholdCrossing(
  trace: Trace,
  webhook: Webhook
): ThresholdCrossing | null {
  if (webhook.latencyThresholdMs === null || trace.durationMs === null) {
    return null;
  }
  if (!(trace.durationMs > webhook.latencyThresholdMs)) return null;
  return {
    webhookId: webhook.id,
    eventType: "trace.latency_threshold",
    data: {
      traceId: trace.id,
      traceName: trace.name,
      latencyMs: trace.durationMs,
      threshold: webhook.latencyThresholdMs,
      projectId: trace.projectId,
      timestamp: trace.startTime.toISOString(),
    },
  };
}
