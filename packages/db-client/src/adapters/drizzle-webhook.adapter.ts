// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tally/db-client/adapters/drizzle-webhook`
 * Purpose: DrizzleWebhookStore for subscriptions, hourly rate-limit buckets and delivery audit rows.
 * Scope: Implements WebhookStore with Drizzle ORM. Does not send HTTP.
 * Invariants:
 * - acquireDeliverySlot is one INSERT .. ON CONFLICT DO UPDATE .. WHERE count < limit statement;
 *   a returned row means the slot was taken
 * - A limit of zero or less never grants a slot; a null limit always does
 * - releaseDeliverySlot never drives a bucket below zero
 * - webhook_deliveries is append-only
 * Side-effects: IO (database operations)
 * Links: pipeline-core ports/webhook-store.port.ts
 * @public
 */

import {
  webhookDeliveries,
  webhookRateLimits,
  webhooks,
} from "@tally/db-schema/webhooks";
import type {
  NewWebhookDelivery,
  Webhook,
  WebhookStore,
} from "@tally/pipeline-core";
import { and, arrayContains, eq, sql } from "drizzle-orm";

import type { Database } from "../build-client";

const HOUR_MS = 60 * 60 * 1000;

/** Start of the UTC hour containing `at`. */
export function hourBucket(at: Date): Date {
  return new Date(Math.floor(at.getTime() / HOUR_MS) * HOUR_MS);
}

export class DrizzleWebhookStore implements WebhookStore {
  constructor(private readonly db: Database) {}

  async getById(webhookId: string): Promise<Webhook | null> {
    const [row] = await this.db
      .select()
      .from(webhooks)
      .where(eq(webhooks.id, webhookId))
      .limit(1);
    return row ? toWebhook(row) : null;
  }

  async listEnabledByEvent(
    projectId: string,
    eventType: string
  ): Promise<Webhook[]> {
    const rows = await this.db
      .select()
      .from(webhooks)
      .where(
        and(
          eq(webhooks.projectId, projectId),
          eq(webhooks.enabled, true),
          arrayContains(webhooks.events, [eventType])
        )
      );
    return rows.map(toWebhook);
  }

  async acquireDeliverySlot(
    webhookId: string,
    limitPerHour: number | null,
    at: Date
  ): Promise<boolean> {
    if (limitPerHour !== null && limitPerHour <= 0) return false;

    const bucket = hourBucket(at);
    const increment = this.db
      .insert(webhookRateLimits)
      .values({ webhookId, hourBucket: bucket, deliveryCount: 1 });

    const rows =
      limitPerHour === null
        ? await increment
            .onConflictDoUpdate({
              target: [webhookRateLimits.webhookId, webhookRateLimits.hourBucket],
              set: { deliveryCount: sql`${webhookRateLimits.deliveryCount} + 1` },
            })
            .returning({ deliveryCount: webhookRateLimits.deliveryCount })
        : await increment
            .onConflictDoUpdate({
              target: [webhookRateLimits.webhookId, webhookRateLimits.hourBucket],
              set: { deliveryCount: sql`${webhookRateLimits.deliveryCount} + 1` },
              setWhere: sql`${webhookRateLimits.deliveryCount} < ${limitPerHour}`,
            })
            .returning({ deliveryCount: webhookRateLimits.deliveryCount });

    return rows.length > 0;
  }

  async releaseDeliverySlot(webhookId: string, at: Date): Promise<void> {
    await this.db
      .update(webhookRateLimits)
      .set({
        deliveryCount: sql`greatest(${webhookRateLimits.deliveryCount} - 1, 0)`,
      })
      .where(
        and(
          eq(webhookRateLimits.webhookId, webhookId),
          eq(webhookRateLimits.hourBucket, hourBucket(at))
        )
      );
  }

  async updateLastTriggered(webhookId: string, at: Date): Promise<void> {
    await this.db
      .update(webhooks)
      .set({ lastTriggeredAt: at })
      .where(eq(webhooks.id, webhookId));
  }

  async createDelivery(delivery: NewWebhookDelivery): Promise<string> {
    const [row] = await this.db
      .insert(webhookDeliveries)
      .values({
        webhookId: delivery.webhookId,
        eventType: delivery.eventType,
        payload: delivery.payload,
        statusCode: delivery.statusCode,
        response: delivery.response,
        error: delivery.error,
        durationMs: delivery.durationMs,
        success: delivery.success,
        retryCount: delivery.retryCount,
      })
      .returning({ id: webhookDeliveries.id });
    if (!row) {
      throw new Error("Webhook delivery insert returned no row");
    }
    return row.id;
  }
}

function toWebhook(row: typeof webhooks.$inferSelect): Webhook {
  return {
    id: row.id,
    projectId: row.projectId,
    name: row.name,
    type: row.type,
    url: row.url,
    secret: row.secret,
    events: row.events,
    enabled: row.enabled,
    headers: row.headers ?? {},
    costThreshold: row.costThreshold,
    latencyThresholdMs: row.latencyThresholdMs,
    rateLimitPerHour: row.rateLimitPerHour,
    lastTriggeredAt: row.lastTriggeredAt,
  };
}
