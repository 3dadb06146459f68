// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tally/pipeline-core/ports/webhook-store`
 * Purpose: Webhook subscriptions, rate-limit buckets and delivery audit log.
 * Scope: Defines the WebhookStore contract. Does not contain implementations.
 * Invariants:
 * - acquireDeliverySlot is an atomic check-and-increment on the UTC-hour bucket of `at`
 * - A null limit always grants a slot (unlimited) and still counts the delivery
 * - releaseDeliverySlot undoes one acquire in the same bucket, never below zero
 * - createDelivery appends; rows are never updated or deleted here
 * Side-effects: none (interface definition only)
 * Links: DrizzleWebhookStore
 * @public
 */

import type { NewWebhookDelivery, Webhook } from "../domain/types";

export type { NewWebhookDelivery, Webhook } from "../domain/types";

export interface WebhookStore {
  getById: (webhookId: string) => Promise<Webhook | null>;

  /** Enabled webhooks of a project subscribed to `eventType`. */
  listEnabledByEvent: (
    projectId: string,
    eventType: string
  ) => Promise<Webhook[]>;

  /** Returns false when the hour's limit is already reached. */
  acquireDeliverySlot: (
    webhookId: string,
    limitPerHour: number | null,
    at: Date
  ) => Promise<boolean>;

  releaseDeliverySlot: (webhookId: string, at: Date) => Promise<void>;

  updateLastTriggered: (webhookId: string, at: Date) => Promise<void>;

  /** Returns the generated delivery id. */
  createDelivery: (delivery: NewWebhookDelivery) => Promise<string>;
}
