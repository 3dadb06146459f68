// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tally/pipeline-worker/tasks/cost`
 * Purpose: Cost attribution tasks: price one observation, price a trace, aggregate a UTC day.
 * Scope: Validates payloads, looks up pricing, writes observation costs, sums daily cost. Does not own the price table.
 * Invariants:
 * - Unpriced models are a no-op (complete, no retry)
 * - Batch pricing never aborts on one observation's failure; failures are counted
 * - Daily aggregation is read-only
 * Side-effects: IO (observation cost writes via injected deps)
 * @internal
 */

import {
  aggregateDailyCost,
  calculateCost,
  costSkipReason,
  type DailyCostSummary,
  type ObservationCosts,
  type ObservationCostWriter,
  type PricingCatalog,
  parseUtcDay,
  type TraceReader,
  type UtcDay,
} from "@tally/pipeline-core";
import {
  errorMessage,
  type JobHandler,
  type LoggerLike,
  NonRetryableJobError,
  parsePayload,
} from "@tally/task-queue";

import {
  BatchCostPayloadSchema,
  CostCalculationPayloadSchema,
  DailyAggregationPayloadSchema,
} from "../schemas/payloads";

export interface CostTaskDeps {
  pricing: PricingCatalog;
  costs: ObservationCostWriter;
  traces: TraceReader;
  logger: LoggerLike;
}

export type CostCalculationResult =
  | ({ status: "priced" } & ObservationCosts)
  | { status: "skipped"; reason: "no_pricing" };

export interface BatchCostResult {
  processed: number;
  skipped: number;
  failed: number;
}

export interface ProjectDailyCost extends DailyCostSummary {
  projectId: string;
}

export interface DailyAggregationResult {
  date: string;
  projects: ProjectDailyCost[];
}

/** Range of a payload date that the schema has already validated. */
export function utcDayOrThrow(date: string): UtcDay {
  const day = parseUtcDay(date);
  if (!day) {
    throw new NonRetryableJobError(`Invalid date "${date}", expected YYYY-MM-DD`);
  }
  return day;
}

export function createCostCalculationTask(deps: CostTaskDeps): JobHandler {
  return async (payload): Promise<CostCalculationResult> => {
    const { projectId, observationId, model, inputTokens, outputTokens } =
      parsePayload("cost:calculate", CostCalculationPayloadSchema, payload);

    const pricing = await deps.pricing.findPricing(projectId, model);
    if (!pricing) {
      deps.logger.info(
        { projectId, observationId, model },
        "No pricing for model, skipping cost calculation"
      );
      return { status: "skipped", reason: "no_pricing" };
    }

    const costs = calculateCost(pricing, inputTokens, outputTokens);
    await deps.costs.updateObservationCosts(projectId, observationId, costs);

    deps.logger.info(
      { projectId, observationId, model, totalCost: costs.totalCost },
      "Observation cost calculated"
    );
    return { status: "priced", ...costs };
  };
}

export function createBatchCostTask(deps: CostTaskDeps): JobHandler {
  return async (payload, ctx): Promise<BatchCostResult> => {
    const { projectId, traceId } = parsePayload(
      "cost:calculate-batch",
      BatchCostPayloadSchema,
      payload
    );

    const observations = await deps.traces.listObservationsByTrace(
      projectId,
      traceId
    );
    const result: BatchCostResult = { processed: 0, skipped: 0, failed: 0 };

    for (const observation of observations) {
      ctx.signal.throwIfAborted();

      if (costSkipReason(observation) !== null) {
        result.skipped++;
        continue;
      }

      try {
        const pricing = await deps.pricing.findPricing(
          projectId,
          observation.model
        );
        if (!pricing) {
          result.skipped++;
          continue;
        }
        await deps.costs.updateObservationCosts(
          projectId,
          observation.id,
          calculateCost(pricing, observation.inputTokens, observation.outputTokens)
        );
        result.processed++;
      } catch (error) {
        result.failed++;
        deps.logger.warn(
          { projectId, traceId, observationId: observation.id, error: errorMessage(error) },
          "Failed to price observation"
        );
      }
    }

    deps.logger.info({ projectId, traceId, ...result }, "Trace costs calculated");
    return result;
  };
}

export function createDailyAggregationTask(deps: CostTaskDeps): JobHandler {
  return async (payload, ctx): Promise<DailyAggregationResult> => {
    const { projectId, date } = parsePayload(
      "cost:aggregate-daily",
      DailyAggregationPayloadSchema,
      payload
    );
    const day = utcDayOrThrow(date);

    const projectIds =
      projectId !== undefined
        ? [projectId]
        : await deps.traces.listProjectsWithActivity(day.start, day.end);

    const projects: ProjectDailyCost[] = [];
    for (const id of projectIds) {
      ctx.signal.throwIfAborted();
      const observations = await deps.traces.listObservationsInRange(
        id,
        day.start,
        day.end
      );
      const summary = aggregateDailyCost(observations);
      projects.push({ projectId: id, ...summary });
      deps.logger.info(
        {
          projectId: id,
          date,
          totalCost: summary.totalCost,
          observationCount: summary.observationCount,
          modelCount: summary.models.length,
        },
        "Daily cost aggregated"
      );
    }

    return { date, projects };
  };
}
