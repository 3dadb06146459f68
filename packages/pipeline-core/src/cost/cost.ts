// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tally/pipeline-core/cost/cost`
 * Purpose: Token cost arithmetic and daily per-model cost aggregation.
 * Scope: Pure functions over pricing entries and observations. Does not perform IO.
 * Invariants:
 * - cost = tokens × pricePer1k / 1000; total = input + output
 * - Observations with totalCost > 0 count as already priced
 * - Daily aggregation only counts priced observations; model breakdown sorted by cost descending
 * - traceCount is the number of distinct traces among priced observations
 * Side-effects: none
 * @public
 */

import type { ModelPricing, Observation, ObservationCosts } from "../domain/types";

export function calculateCost(
  pricing: ModelPricing,
  inputTokens: number,
  outputTokens: number
): ObservationCosts {
  const inputCost = (inputTokens * pricing.inputPricePer1k) / 1000;
  const outputCost = (outputTokens * pricing.outputPricePer1k) / 1000;
  return { inputCost, outputCost, totalCost: inputCost + outputCost };
}

export type CostSkipReason = "already_priced" | "missing_usage";

/** Why a batch run would skip this observation, or null if it needs pricing. */
export function costSkipReason(observation: Observation): CostSkipReason | null {
  if ((observation.totalCost ?? 0) > 0) return "already_priced";
  if (
    observation.model.trim() === "" ||
    (observation.inputTokens === 0 && observation.outputTokens === 0)
  ) {
    return "missing_usage";
  }
  return null;
}

export interface ModelCost {
  model: string;
  cost: number;
  count: number;
}

export interface DailyCostSummary {
  totalCost: number;
  observationCount: number;
  traceCount: number;
  models: ModelCost[];
}

export function aggregateDailyCost(
  observations: readonly Observation[]
): DailyCostSummary {
  const byModel = new Map<string, ModelCost>();
  const traceIds = new Set<string>();
  let totalCost = 0;
  let observationCount = 0;

  for (const observation of observations) {
    const cost = observation.totalCost ?? 0;
    if (cost <= 0) continue;

    totalCost += cost;
    observationCount++;
    traceIds.add(observation.traceId);

    if (observation.model === "") continue;
    const entry = byModel.get(observation.model);
    if (entry) {
      entry.cost += cost;
      entry.count++;
    } else {
      byModel.set(observation.model, { model: observation.model, cost, count: 1 });
    }
  }

  const models = [...byModel.values()].sort((a, b) => b.cost - a.cost);
  return { totalCost, observationCount, traceCount: traceIds.size, models };
}

export interface UtcDay {
  start: Date;
  end: Date;
}

const DAY_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Parses `YYYY-MM-DD` into the half-open UTC range [start, end).
 * Returns null for malformed or non-existent dates (e.g. 2025-02-30).
 */
export function parseUtcDay(value: string): UtcDay | null {
  const match = DAY_PATTERN.exec(value);
  if (!match) return null;
  const [, year, month, day] = match;
  const start = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
  if (start.toISOString().slice(0, 10) !== value) return null;
  const end = new Date(start.getTime() + 24 * 60 * 60 * 1000);
  return { start, end };
}

/** `YYYY-MM-DD` of the UTC day before `at`. */
export function previousUtcDay(at: Date): string {
  const dayStart = Date.UTC(at.getUTCFullYear(), at.getUTCMonth(), at.getUTCDate());
  return new Date(dayStart - 24 * 60 * 60 * 1000).toISOString().slice(0, 10);
}
