// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tally/pipeline-core/notifications/payloads`
 * Purpose: Webhook request bodies, headers and HMAC signature.
 * Scope: Generic envelope, Slack attachment rendering per event type, header assembly. Does not send.
 * Invariants:
 * - Body is serialized once; the signature covers exactly the bytes sent
 * - Signature header: `X-Tally-Signature: sha256=<hex HMAC-SHA256(secret, body)>`, only when a secret is set
 * - Custom headers are applied after the defaults; the signature header is applied last
 * - Missing data fields render as "Unknown" (or 0 for numbers)
 * Side-effects: none
 * @public
 */

import { createHmac } from "node:crypto";

import type { Webhook } from "../domain/types";

export type NotificationData = Readonly<Record<string, unknown>>;

export const SIGNATURE_HEADER = "X-Tally-Signature";
export const WEBHOOK_USER_AGENT = "Tally-Webhook/1.0";

export interface GenericNotificationPayload {
  id: string;
  eventType: string;
  timestamp: string;
  projectId: string;
  data: NotificationData;
}

export interface SlackField {
  title: string;
  value: string;
  short: boolean;
}

export interface SlackAttachment {
  color: string;
  title: string;
  text: string;
  footer: string;
  ts: number;
  title_link?: string;
  fields?: SlackField[];
}

export interface SlackMessage {
  attachments: SlackAttachment[];
}

export interface PayloadContext {
  /** Delivery id for the generic envelope */
  id: string;
  now: Date;
  /** Base URL for Slack title links; omitted links when unset */
  dashboardUrl?: string;
}

function stringField(data: NotificationData, key: string, fallback: string): string {
  const value = data[key];
  return typeof value === "string" ? value : fallback;
}

function numberField(data: NotificationData, key: string): number {
  const value = data[key];
  return typeof value === "number" && Number.isFinite(value) ? value : 0;
}

export function buildGenericPayload(
  webhook: Pick<Webhook, "projectId">,
  eventType: string,
  data: NotificationData,
  context: PayloadContext
): GenericNotificationPayload {
  return {
    id: context.id,
    eventType,
    timestamp: context.now.toISOString(),
    projectId: stringField(data, "projectId", webhook.projectId),
    data,
  };
}

const RED = "#dc3545";
const YELLOW = "#ffc107";
const BLUE = "#17a2b8";
const PURPLE = "#6f42c1";
const GRAY = "#6c757d";

interface SlackSummary {
  color: string;
  title: string;
  text: string;
}

function summarize(eventType: string, data: NotificationData): SlackSummary {
  const traceName = stringField(data, "traceName", "Unknown");
  switch (eventType) {
    case "trace.error":
      return {
        color: RED,
        title: "Trace Error Alert",
        text: `Trace '${traceName}' failed with error:\n\`\`\`${stringField(data, "error", "An error occurred")}\`\`\``,
      };
    case "trace.cost_threshold":
      return {
        color: YELLOW,
        title: "Cost Threshold Exceeded",
        text: `Trace '${traceName}' cost $${numberField(data, "cost").toFixed(4)} exceeded threshold of $${numberField(data, "threshold").toFixed(4)}`,
      };
    case "trace.latency_threshold":
      return {
        color: YELLOW,
        title: "Latency Threshold Exceeded",
        text: `Trace '${traceName}' latency ${numberField(data, "latencyMs").toFixed(0)}ms exceeded threshold of ${numberField(data, "threshold").toFixed(0)}ms`,
      };
    case "daily.cost_report":
      return {
        color: BLUE,
        title: "Daily Cost Report",
        text: `Daily summary for ${stringField(data, "date", "Unknown")}:\n- Total Cost: $${numberField(data, "totalCost").toFixed(2)}\n- Total Traces: ${Math.trunc(numberField(data, "traceCount"))}`,
      };
    case "eval.failed":
      return {
        color: RED,
        title: "Evaluation Failed",
        text: `Evaluator '${stringField(data, "evaluatorName", "Unknown")}' failed on trace '${traceName}':\n\`\`\`${stringField(data, "error", "Evaluation failed")}\`\`\``,
      };
    case "eval.score_low":
      return {
        color: YELLOW,
        title: "Low Evaluation Score",
        text: `Score '${stringField(data, "scoreName", "Unknown")}' = ${numberField(data, "score").toFixed(2)} (below threshold ${numberField(data, "threshold").toFixed(2)}) on trace '${traceName}'`,
      };
    case "anomaly.detected":
      return {
        color: PURPLE,
        title: "Anomaly Detected",
        text: `Anomaly detected: ${stringField(data, "anomalyType", "Unknown")}\n${stringField(data, "description", "Anomaly detected")}`,
      };
    default:
      return { color: GRAY, title: "Tally Notification", text: `Event: ${eventType}` };
  }
}

export function buildSlackPayload(
  eventType: string,
  data: NotificationData,
  context: Pick<PayloadContext, "now" | "dashboardUrl">
): SlackMessage {
  const { color, title, text } = summarize(eventType, data);
  const attachment: SlackAttachment = {
    color,
    title,
    text,
    footer: "Tally",
    ts: Math.floor(context.now.getTime() / 1000),
  };

  const fields: SlackField[] = [];
  const traceId = data.traceId;
  if (typeof traceId === "string") {
    if (context.dashboardUrl) {
      attachment.title_link = `${context.dashboardUrl.replace(/\/+$/, "")}/traces/${traceId}`;
    }
    fields.push({ title: "Trace ID", value: traceId, short: true });
  }
  const projectName = data.projectName;
  if (typeof projectName === "string") {
    fields.push({ title: "Project", value: projectName, short: true });
  }
  if (fields.length > 0) attachment.fields = fields;

  return { attachments: [attachment] };
}

/** Serialized request body for the webhook's format. */
export function renderWebhookBody(
  webhook: Pick<Webhook, "type" | "projectId">,
  eventType: string,
  data: NotificationData,
  context: PayloadContext
): string {
  const payload =
    webhook.type === "slack"
      ? buildSlackPayload(eventType, data, context)
      : buildGenericPayload(webhook, eventType, data, context);
  return JSON.stringify(payload);
}

export function signPayload(body: string, secret: string): string {
  return `sha256=${createHmac("sha256", secret).update(body).digest("hex")}`;
}

export function buildWebhookHeaders(
  webhook: Pick<Webhook, "headers" | "secret">,
  body: string
): Record<string, string> {
  const headers: Record<string, string> = {
    "Content-Type": "application/json",
    "User-Agent": WEBHOOK_USER_AGENT,
    ...webhook.headers,
  };
  if (webhook.secret !== "") {
    headers[SIGNATURE_HEADER] = signPayload(body, webhook.secret);
  }
  return headers;
}
