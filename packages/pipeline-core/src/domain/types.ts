// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tally/pipeline-core/domain/types`
 * Purpose: Pipeline domain types and enum value lists (logic-free).
 * Scope: Defines traces, observations, evaluators, scores, webhooks, deliveries and pricing shapes. Does not contain logic.
 * Invariants:
 * - ONLY exports: enums (as const arrays), literal union types, and interfaces
 * - Enum value lists are re-exported from @tally/db-schema (source of truth for DB values)
 * - Money fields are plain numbers in USD; null means "not priced"
 * Side-effects: none (constants and types only)
 * @public
 */

import {
  EVALUATOR_TYPES as _EVALUATOR_TYPES,
  type EvaluatorType as _EvaluatorType,
  SCORE_DATA_TYPES as _SCORE_DATA_TYPES,
  type ScoreDataType as _ScoreDataType,
} from "@tally/db-schema/evaluation";
import {
  WEBHOOK_EVENT_TYPES as _WEBHOOK_EVENT_TYPES,
  WEBHOOK_TYPES as _WEBHOOK_TYPES,
  type WebhookEventType as _WebhookEventType,
  type WebhookType as _WebhookType,
} from "@tally/db-schema/webhooks";

export const SCORE_DATA_TYPES = _SCORE_DATA_TYPES;
export type ScoreDataType = _ScoreDataType;
export const EVALUATOR_TYPES = _EVALUATOR_TYPES;
export type EvaluatorType = _EvaluatorType;
export const WEBHOOK_EVENT_TYPES = _WEBHOOK_EVENT_TYPES;
export type WebhookEventType = _WebhookEventType;
export const WEBHOOK_TYPES = _WEBHOOK_TYPES;
export type WebhookType = _WebhookType;

export interface Trace {
  readonly id: string;
  readonly projectId: string;
  readonly name: string;
  /** Serialized trace input ("" when absent) */
  readonly input: string;
  readonly output: string;
  readonly totalCost: number | null;
  readonly durationMs: number | null;
  readonly startTime: Date;
}

export interface Observation {
  readonly id: string;
  readonly traceId: string;
  readonly projectId: string;
  readonly name: string;
  readonly type: string;
  readonly model: string;
  readonly input: string;
  readonly output: string;
  readonly inputTokens: number;
  readonly outputTokens: number;
  readonly inputCost: number | null;
  readonly outputCost: number | null;
  readonly totalCost: number | null;
  readonly startTime: Date;
}

export interface EvaluatorRecord {
  readonly id: string;
  readonly projectId: string;
  readonly name: string;
  readonly type: EvaluatorType;
  readonly promptTemplate: string;
  /** Rule config, or `{ model }` override for LLM evaluators */
  readonly config: Readonly<Record<string, unknown>> | null;
  readonly scoreName: string;
  readonly scoreDataType: ScoreDataType;
  readonly enabled: boolean;
}

/**
 * Score produced by an evaluator run.
 * value is set iff NUMERIC/BOOLEAN; stringValue iff CATEGORICAL.
 */
export interface NewScore {
  readonly projectId: string;
  readonly traceId: string;
  readonly observationId: string | null;
  readonly name: string;
  readonly value: number | null;
  readonly stringValue: string | null;
  readonly dataType: ScoreDataType;
  readonly source: "EVAL";
  readonly evaluatorId: string;
  readonly comment: string | null;
}

export interface Webhook {
  readonly id: string;
  readonly projectId: string;
  readonly name: string;
  readonly type: WebhookType;
  readonly url: string;
  /** Empty string means unsigned */
  readonly secret: string;
  readonly events: readonly string[];
  readonly enabled: boolean;
  readonly headers: Readonly<Record<string, string>>;
  readonly costThreshold: number | null;
  readonly latencyThresholdMs: number | null;
  /** null means unlimited */
  readonly rateLimitPerHour: number | null;
  readonly lastTriggeredAt: Date | null;
}

/** One audit row per delivery attempt. */
export interface NewWebhookDelivery {
  readonly webhookId: string;
  readonly eventType: string;
  readonly payload: unknown;
  /** 0 when no HTTP response was received */
  readonly statusCode: number;
  readonly response: string | null;
  readonly error: string | null;
  readonly durationMs: number;
  readonly success: boolean;
  readonly retryCount: number;
}

export interface ModelPricing {
  readonly model: string;
  readonly provider: string;
  /** USD per 1,000 input tokens */
  readonly inputPricePer1k: number;
  readonly outputPricePer1k: number;
}

export interface ObservationCosts {
  readonly inputCost: number;
  readonly outputCost: number;
  readonly totalCost: number;
}
