// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tally/pipeline-worker/schemas/payloads`
 * Purpose: Zod schemas for pipeline job payloads.
 * Scope: Validates payloads at task entry. Does not contain task logic.
 * Invariants:
 * - All tasks call parsePayload(kind, Schema, payload) before processing
 * - No `payload as X` casts allowed in tasks
 * - Schemas carry no defaults, so producer and consumer types are identical
 * Side-effects: none
 * @internal
 */

import { parseUtcDay, WEBHOOK_EVENT_TYPES } from "@tally/pipeline-core";
import { z } from "zod";

const id = z.string().min(1);

const utcDay = z
  .string()
  .refine((value) => parseUtcDay(value) !== null, {
    message: "Expected a calendar date in YYYY-MM-DD form (UTC)",
  });

const tokenCount = z.number().int().nonnegative();

/** Price one observation. */
export const CostCalculationPayloadSchema = z.object({
  projectId: id,
  traceId: id,
  observationId: id,
  model: z.string(),
  inputTokens: tokenCount,
  outputTokens: tokenCount,
});

export type CostCalculationPayload = z.infer<
  typeof CostCalculationPayloadSchema
>;

/** Price every unpriced observation of a trace. */
export const BatchCostPayloadSchema = z.object({
  projectId: id,
  traceId: id,
});

export type BatchCostPayload = z.infer<typeof BatchCostPayloadSchema>;

/** Sum one UTC day of cost; all active projects when projectId is absent. */
export const DailyAggregationPayloadSchema = z.object({
  projectId: id.optional(),
  date: utcDay,
});

export type DailyAggregationPayload = z.infer<
  typeof DailyAggregationPayloadSchema
>;

export const EvaluationPayloadSchema = z.object({
  projectId: id,
  evaluatorId: id,
  traceId: id,
  observationId: id.optional(),
});

export type EvaluationPayload = z.infer<typeof EvaluationPayloadSchema>;

export const BatchEvaluationPayloadSchema = z.object({
  projectId: id,
  evaluatorId: id,
  traceIds: z.array(id),
});

export type BatchEvaluationPayload = z.infer<
  typeof BatchEvaluationPayloadSchema
>;

export const NotificationPayloadSchema = z.object({
  webhookId: id,
  eventType: z.enum(WEBHOOK_EVENT_TYPES),
  data: z.record(z.unknown()),
});

export type NotificationPayload = z.infer<typeof NotificationPayloadSchema>;

/** Compare a completed trace against its project's thresholds. */
export const ThresholdCheckPayloadSchema = z.object({
  projectId: id,
  traceId: id,
});

export type ThresholdCheckPayload = z.infer<
  typeof ThresholdCheckPayloadSchema
>;

export const DailyCostReportPayloadSchema = z.object({
  projectId: id.optional(),
  date: utcDay,
});

export type DailyCostReportPayload = z.infer<
  typeof DailyCostReportPayloadSchema
>;
