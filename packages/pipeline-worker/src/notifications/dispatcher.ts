// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tally/pipeline-worker/notifications/dispatcher`
 * Purpose: Rate-limited, audited delivery of one webhook notification.
 * Scope: Preconditions, rate-limit slot, rendering, signing, per-host breaker, HTTP send, audit row, bookkeeping. Does not retry; the task queue owns redelivery.
 * Invariants:
 * - No network call for a missing, disabled or unsubscribed webhook, or when the hour's limit is reached
 * - Rate-limited sends write no delivery row and do not throw
 * - Every attempted send writes exactly one delivery row with retryCount = attempt - 1
 * - A failed send releases its rate-limit slot, so the counter reflects successful sends
 * - Rate-limit store failures fail open (warn and send)
 * - Audit and bookkeeping write failures are logged, never rethrown
 * - Only transport failures, 5xx and 429 count against a host's breaker
 * Side-effects: IO (HTTP via WebhookSender, WebhookStore writes)
 * @public
 */

import { randomUUID } from "node:crypto";

import {
  type CircuitBreakerDefaults,
  CircuitBreakerRegistry,
  type CircuitBreakerRegistryOptions,
  isCircuitRejectedError,
} from "@tally/circuit-breaker";
import {
  buildWebhookHeaders,
  type NotificationData,
  renderWebhookBody,
  type Webhook,
  type WebhookStore,
} from "@tally/pipeline-core";
import {
  errorMessage,
  type LoggerLike,
  NonRetryableJobError,
} from "@tally/task-queue";

import type { WebhookSender } from "../adapters/webhook-sender";
import { WebhookDeliveryError } from "../errors";

export type DispatchSkipReason =
  | "not_found"
  | "disabled"
  | "not_subscribed"
  | "rate_limited";

export type DispatchResult =
  | { status: "delivered"; statusCode: number }
  | { status: "skipped"; reason: DispatchSkipReason };

export type DeliveryOutcome = "success" | "failure" | "rate_limited" | "skipped";

export interface DispatchAttempt {
  /** 1-based attempt number of the enclosing job. */
  attempt: number;
  signal?: AbortSignal;
}

export const WEBHOOK_BREAKER_DEFAULTS = {
  maxFailures: 3,
  timeoutMs: 60_000,
} as const;

export const CIRCUIT_OPEN_DELIVERY_ERROR =
  "circuit breaker open: webhook endpoint temporarily unavailable";

export interface NotificationDispatcherDeps {
  webhooks: WebhookStore;
  send: WebhookSender;
  logger: LoggerLike;
  /** Per-host breakers; created with WEBHOOK_BREAKER_DEFAULTS when omitted. */
  breakers?: CircuitBreakerRegistry;
  dashboardUrl?: string;
  onDelivery?: (outcome: DeliveryOutcome) => void;
  now?: () => Date;
  newId?: () => string;
}

/** Non-2xx response, thrown inside the breaker so the outcome is accounted. */
class UnexpectedStatusError extends Error {
  constructor(
    readonly statusCode: number,
    readonly body: string
  ) {
    super(`unexpected status code: ${statusCode}`);
    this.name = "UnexpectedStatusError";
  }
}

export function isBreakerCountableDeliveryError(error: unknown): boolean {
  if (error instanceof UnexpectedStatusError) {
    return error.statusCode >= 500 || error.statusCode === 429;
  }
  return true;
}

/** Upper bound on per-host breakers held at once. */
export const WEBHOOK_BREAKER_MAX_HOSTS = 500;

export function createWebhookBreakerRegistry(
  overrides: Pick<CircuitBreakerDefaults, "onStateChange" | "now"> = {},
  options: CircuitBreakerRegistryOptions = {}
): CircuitBreakerRegistry {
  return new CircuitBreakerRegistry(
    {
      ...WEBHOOK_BREAKER_DEFAULTS,
      isFailure: isBreakerCountableDeliveryError,
      ...overrides,
    },
    { maxSize: WEBHOOK_BREAKER_MAX_HOSTS, ...options }
  );
}

interface AttemptRecord {
  success: boolean;
  statusCode: number;
  response: string | null;
  error: string | null;
}

export class NotificationDispatcher {
  private readonly breakers: CircuitBreakerRegistry;
  private readonly now: () => Date;
  private readonly newId: () => string;

  constructor(private readonly deps: NotificationDispatcherDeps) {
    this.breakers = deps.breakers ?? createWebhookBreakerRegistry();
    this.now = deps.now ?? (() => new Date());
    this.newId = deps.newId ?? randomUUID;
  }

  async send(
    webhookId: string,
    eventType: string,
    data: NotificationData,
    { attempt, signal }: DispatchAttempt
  ): Promise<DispatchResult> {
    const { webhooks, logger } = this.deps;
    const log = { webhookId, eventType, attempt };

    const webhook = await webhooks.getById(webhookId);
    if (!webhook) {
      logger.warn(log, "Webhook not found, skipping notification");
      return this.skip("not_found");
    }
    if (!webhook.enabled) {
      logger.info(log, "Webhook disabled, skipping notification");
      return this.skip("disabled");
    }
    if (!webhook.events.includes(eventType)) {
      logger.info(log, "Webhook not subscribed to event, skipping notification");
      return this.skip("not_subscribed");
    }

    const startedAt = this.now();
    const slot = await this.acquireSlot(webhook, startedAt);
    if (slot === "limited") {
      logger.info(
        { ...log, rateLimitPerHour: webhook.rateLimitPerHour },
        "Webhook rate limit reached, skipping notification"
      );
      return this.skip("rate_limited");
    }

    const body = renderWebhookBody(webhook, eventType, data, {
      id: this.newId(),
      now: startedAt,
      ...(this.deps.dashboardUrl !== undefined
        ? { dashboardUrl: this.deps.dashboardUrl }
        : {}),
    });

    let host: string;
    try {
      host = new URL(webhook.url).host;
    } catch {
      const message = `invalid webhook url: ${webhook.url}`;
      await this.finish(webhook, eventType, data, attempt, startedAt, slot, {
        success: false,
        statusCode: 0,
        response: null,
        error: message,
      });
      throw new NonRetryableJobError(message);
    }

    const record = await this.deliver(
      host,
      webhook,
      body,
      buildWebhookHeaders(webhook, body),
      signal
    );
    await this.finish(
      webhook,
      eventType,
      data,
      attempt,
      startedAt,
      slot,
      record
    );

    if (!record.success) {
      logger.warn(
        { ...log, statusCode: record.statusCode, error: record.error },
        "Webhook delivery failed"
      );
      throw new WebhookDeliveryError(
        webhookId,
        record.statusCode,
        record.error ?? `unexpected status code: ${record.statusCode}`
      );
    }

    logger.info(
      { ...log, statusCode: record.statusCode },
      "Webhook delivered"
    );
    return { status: "delivered", statusCode: record.statusCode };
  }

  private skip(reason: DispatchSkipReason): DispatchResult {
    this.deps.onDelivery?.(reason === "rate_limited" ? "rate_limited" : "skipped");
    return { status: "skipped", reason };
  }

  /** "taken" | "limited", or "unknown" when the store failed and we send anyway. */
  private async acquireSlot(
    webhook: Webhook,
    at: Date
  ): Promise<"taken" | "limited" | "unknown"> {
    try {
      const acquired = await this.deps.webhooks.acquireDeliverySlot(
        webhook.id,
        webhook.rateLimitPerHour,
        at
      );
      return acquired ? "taken" : "limited";
    } catch (error) {
      this.deps.logger.warn(
        { webhookId: webhook.id, error: errorMessage(error) },
        "Rate limit check failed, sending anyway"
      );
      return "unknown";
    }
  }

  private async deliver(
    host: string,
    webhook: Webhook,
    body: string,
    headers: Record<string, string>,
    signal: AbortSignal | undefined
  ): Promise<AttemptRecord> {
    const breaker = this.breakers.get(`webhook:${host}`);
    try {
      const response = await breaker.execute(async () => {
        const result = await this.deps.send(
          { url: webhook.url, body, headers },
          signal
        );
        if (result.statusCode < 200 || result.statusCode >= 300) {
          throw new UnexpectedStatusError(result.statusCode, result.body);
        }
        return result;
      }, signal);
      return {
        success: true,
        statusCode: response.statusCode,
        response: response.body,
        error: null,
      };
    } catch (error) {
      if (error instanceof UnexpectedStatusError) {
        return {
          success: false,
          statusCode: error.statusCode,
          response: error.body,
          error: error.message,
        };
      }
      if (isCircuitRejectedError(error)) {
        return {
          success: false,
          statusCode: 0,
          response: null,
          error: CIRCUIT_OPEN_DELIVERY_ERROR,
        };
      }
      return {
        success: false,
        statusCode: 0,
        response: null,
        error: `request failed: ${errorMessage(error)}`,
      };
    }
  }

  private async finish(
    webhook: Webhook,
    eventType: string,
    data: NotificationData,
    attempt: number,
    startedAt: Date,
    slot: "taken" | "unknown",
    record: AttemptRecord
  ): Promise<void> {
    const { webhooks, logger } = this.deps;
    const finishedAt = this.now();

    try {
      await webhooks.createDelivery({
        webhookId: webhook.id,
        eventType,
        payload: data,
        statusCode: record.statusCode,
        response: record.response,
        error: record.error,
        durationMs: Math.max(0, finishedAt.getTime() - startedAt.getTime()),
        success: record.success,
        retryCount: Math.max(0, attempt - 1),
      });
    } catch (error) {
      logger.warn(
        { webhookId: webhook.id, error: errorMessage(error) },
        "Failed to record webhook delivery"
      );
    }

    this.deps.onDelivery?.(record.success ? "success" : "failure");

    try {
      if (record.success) {
        await webhooks.updateLastTriggered(webhook.id, finishedAt);
      } else if (slot === "taken") {
        await webhooks.releaseDeliverySlot(webhook.id, startedAt);
      }
    } catch (error) {
      logger.warn(
        { webhookId: webhook.id, error: errorMessage(error) },
        "Failed to update webhook bookkeeping"
      );
    }
  }
}
