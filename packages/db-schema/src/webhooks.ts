// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tally/db-schema/webhooks`
 * Purpose: Webhook subscriptions, delivery audit log and hourly rate-limit buckets.
 * Scope: Defines webhooks, webhook_deliveries, webhook_rate_limits and the event/type value lists. Does not contain queries or logic.
 * Invariants:
 * - webhook_deliveries is append-only, one row per delivery attempt
 * - webhook_rate_limits has one row per (webhook_id, hour_bucket); hour_bucket is truncated to the UTC hour
 * - webhooks rows are owned by admin CRUD; the pipeline only touches last_triggered_at
 * Side-effects: none (schema definitions only)
 * @public
 */

import {
  boolean,
  doublePrecision,
  index,
  integer,
  jsonb,
  pgTable,
  primaryKey,
  text,
  timestamp,
  uuid,
} from "drizzle-orm/pg-core";

/** Events a webhook can subscribe to (source of truth for DB values). */
export const WEBHOOK_EVENT_TYPES = [
  "trace.error",
  "trace.cost_threshold",
  "trace.latency_threshold",
  "daily.cost_report",
  "eval.failed",
  "eval.score_low",
  "anomaly.detected",
] as const;
export type WebhookEventType = (typeof WEBHOOK_EVENT_TYPES)[number];

/** Payload format: generic JSON envelope or a Slack attachment. */
export const WEBHOOK_TYPES = ["generic", "slack"] as const;
export type WebhookType = (typeof WEBHOOK_TYPES)[number];

export const webhooks = pgTable(
  "webhooks",
  {
    id: uuid("id").defaultRandom().primaryKey(),
    projectId: text("project_id").notNull(),
    name: text("name").notNull(),
    type: text("type", { enum: WEBHOOK_TYPES }).notNull().default("generic"),
    url: text("url").notNull(),
    /** HMAC-SHA256 signing key; empty string means unsigned */
    secret: text("secret").notNull().default(""),
    events: text("events").array().notNull(),
    enabled: boolean("enabled").notNull().default(true),
    headers: jsonb("headers").$type<Record<string, string>>(),
    costThreshold: doublePrecision("cost_threshold"),
    latencyThresholdMs: integer("latency_threshold_ms"),
    rateLimitPerHour: integer("rate_limit_per_hour"),
    lastTriggeredAt: timestamp("last_triggered_at", { withTimezone: true }),
    createdAt: timestamp("created_at", { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => ({
    projectIdx: index("webhooks_project_idx").on(table.projectId),
  })
);

export const webhookDeliveries = pgTable(
  "webhook_deliveries",
  {
    id: uuid("id").defaultRandom().primaryKey(),
    webhookId: uuid("webhook_id")
      .notNull()
      .references(() => webhooks.id, { onDelete: "cascade" }),
    eventType: text("event_type").notNull(),
    payload: jsonb("payload").notNull(),
    /** 0 when no HTTP response was received */
    statusCode: integer("status_code").notNull(),
    response: text("response"),
    error: text("error"),
    durationMs: integer("duration_ms").notNull(),
    success: boolean("success").notNull(),
    retryCount: integer("retry_count").notNull().default(0),
    createdAt: timestamp("created_at", { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => ({
    webhookCreatedIdx: index("webhook_deliveries_webhook_created_idx").on(
      table.webhookId,
      table.createdAt
    ),
  })
);

export const webhookRateLimits = pgTable(
  "webhook_rate_limits",
  {
    webhookId: uuid("webhook_id")
      .notNull()
      .references(() => webhooks.id, { onDelete: "cascade" }),
    hourBucket: timestamp("hour_bucket", { withTimezone: true }).notNull(),
    deliveryCount: integer("delivery_count").notNull().default(0),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.webhookId, table.hourBucket] }),
  })
);
