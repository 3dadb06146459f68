// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tally/pipeline-core/cost/pricing`
 * Purpose: Model price resolution against project overrides and the built-in price table.
 * Scope: Model-name normalization, table matching and the PricingCatalog factory. Does not compute costs.
 * Invariants:
 * - Lookup order: project override, then exact match, then prefix match (either direction)
 * - Model names are compared trimmed and lower-cased
 * - Among prefix matches the longest key wins; ties keep table order
 * - The built-in table is validated once at load; a malformed entry throws at startup
 * Side-effects: none
 * Links: default-pricing.json, ports/pricing.port.ts
 * @public
 */

import { z } from "zod";

import type { ModelPricing } from "../domain/types";
import type { PricingCatalog, PricingOverrideSource } from "../ports";
import defaultPricingData from "./default-pricing.json";

const ModelPricingSchema = z.object({
  model: z.string().min(1),
  provider: z.string(),
  inputPricePer1k: z.number().nonnegative(),
  outputPricePer1k: z.number().nonnegative(),
});

const PricingTableSchema = z.array(ModelPricingSchema);

export function normalizeModelName(model: string): string {
  return model.trim().toLowerCase();
}

/**
 * Finds the price entry for `model`: exact match first, then the longest key
 * that is a prefix of the model (versioned names like "gpt-4o-2024-11-20")
 * or that the model is a prefix of.
 */
export function matchPricing(
  table: readonly ModelPricing[],
  model: string
): ModelPricing | null {
  const normalized = normalizeModelName(model);
  if (normalized === "") return null;

  let best: ModelPricing | null = null;
  let bestLength = 0;
  for (const entry of table) {
    const key = normalizeModelName(entry.model);
    if (key === normalized) return entry;
    if (
      key.length > bestLength &&
      (normalized.startsWith(key) || key.startsWith(normalized))
    ) {
      best = entry;
      bestLength = key.length;
    }
  }
  return best;
}

let cachedDefaults: readonly ModelPricing[] | null = null;

/** Built-in price table (USD per 1K tokens). */
export function loadDefaultPricing(): readonly ModelPricing[] {
  if (!cachedDefaults) {
    cachedDefaults = PricingTableSchema.parse(defaultPricingData);
  }
  return cachedDefaults;
}

export interface PricingCatalogOptions {
  overrides?: PricingOverrideSource;
  defaults?: readonly ModelPricing[];
}

/**
 * Catalog that consults the project's overrides before the built-in table.
 * Override lookup failures propagate: the caller's job is retried.
 */
export function createPricingCatalog(
  options: PricingCatalogOptions = {}
): PricingCatalog {
  const defaults = options.defaults ?? loadDefaultPricing();
  const { overrides } = options;

  return {
    findPricing: async (projectId, model) => {
      if (overrides) {
        const projectTable = await overrides.listProjectPricing(projectId);
        const override = matchPricing(projectTable, model);
        if (override) return override;
      }
      return matchPricing(defaults, model);
    },
  };
}
