// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tally/pipeline-core/ports/pricing`
 * Purpose: Model price lookup and observation cost write-back.
 * Scope: Defines PricingCatalog, PricingOverrideSource and ObservationCostWriter. Does not contain implementations.
 * Invariants:
 * - findPricing returns null for an unpriced model (a no-op for the caller, not an error)
 * - updateObservationCosts only writes the three cost columns
 * Side-effects: none (interface definition only)
 * Links: cost/pricing.ts (createPricingCatalog), DrizzlePricingOverrides, DrizzleObservationCostWriter
 * @public
 */

import type { ModelPricing, ObservationCosts } from "../domain/types";

export type { ModelPricing, ObservationCosts } from "../domain/types";

export interface PricingCatalog {
  findPricing: (projectId: string, model: string) => Promise<ModelPricing | null>;
}

/** Project-level price overrides, consulted before the built-in table. */
export interface PricingOverrideSource {
  listProjectPricing: (projectId: string) => Promise<ModelPricing[]>;
}

export interface ObservationCostWriter {
  /** Writes nothing when the observation belongs to another project. */
  updateObservationCosts: (
    projectId: string,
    observationId: string,
    costs: ObservationCosts
  ) => Promise<void>;
}
