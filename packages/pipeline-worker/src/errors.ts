// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tally/pipeline-worker/errors`
 * Purpose: Error thrown when a webhook delivery attempt does not succeed.
 * Scope: Carries the audit fields of the failed attempt. Does not decide retry policy.
 * Invariants: Retry-eligible; the task queue's own budget bounds redelivery.
 * Side-effects: none
 * @public
 */

export class WebhookDeliveryError extends Error {
  readonly webhookId: string;
  /** HTTP status, or 0 when no response was received. */
  readonly statusCode: number;

  constructor(webhookId: string, statusCode: number, message: string) {
    super(message);
    this.name = "WebhookDeliveryError";
    this.webhookId = webhookId;
    this.statusCode = statusCode;
  }
}

export function isWebhookDeliveryError(
  error: unknown
): error is WebhookDeliveryError {
  return error instanceof WebhookDeliveryError;
}
