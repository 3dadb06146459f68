// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tally/db-client/adapters/drizzle-pricing`
 * Purpose: Project price overrides and observation cost write-back.
 * Scope: Implements PricingOverrideSource and ObservationCostWriter with Drizzle ORM. Does not compute costs.
 * Invariants:
 * - Cost write-back touches only input_cost, output_cost and total_cost
 * - Costs are written with 8 decimal places (numeric(18,8))
 * Side-effects: IO (database operations)
 * Links: pipeline-core ports/pricing.port.ts, cost/pricing.ts
 * @public
 */

import { modelPricing } from "@tally/db-schema/pricing";
import { observations } from "@tally/db-schema/tracing";
import type {
  ModelPricing,
  ObservationCostWriter,
  ObservationCosts,
  PricingOverrideSource,
} from "@tally/pipeline-core";
import { and, eq } from "drizzle-orm";

import type { Database } from "../build-client";

export class DrizzlePricingOverrides implements PricingOverrideSource {
  constructor(private readonly db: Database) {}

  async listProjectPricing(projectId: string): Promise<ModelPricing[]> {
    return this.db
      .select({
        model: modelPricing.model,
        provider: modelPricing.provider,
        inputPricePer1k: modelPricing.inputPricePer1k,
        outputPricePer1k: modelPricing.outputPricePer1k,
      })
      .from(modelPricing)
      .where(eq(modelPricing.projectId, projectId));
  }
}

export class DrizzleObservationCostWriter implements ObservationCostWriter {
  constructor(private readonly db: Database) {}

  async updateObservationCosts(
    projectId: string,
    observationId: string,
    costs: ObservationCosts
  ): Promise<void> {
    await this.db
      .update(observations)
      .set({
        inputCost: costs.inputCost.toFixed(8),
        outputCost: costs.outputCost.toFixed(8),
        totalCost: costs.totalCost.toFixed(8),
      })
      .where(
        and(
          eq(observations.projectId, projectId),
          eq(observations.id, observationId)
        )
      );
  }
}
