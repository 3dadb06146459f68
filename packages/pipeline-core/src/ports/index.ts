// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tally/pipeline-core/ports`
 * Purpose: Pipeline ports barrel export.
 * Scope: Re-exports all port interfaces. Does not contain implementations.
 * Invariants: All exports are interfaces only.
 * Side-effects: none
 * @public
 */

export type { EvaluatorStore, ScoreWriter } from "./evaluator-store.port";
export type {
  ObservationCostWriter,
  PricingCatalog,
  PricingOverrideSource,
} from "./pricing.port";
export type { TraceReader } from "./trace-reader.port";
export type { WebhookStore } from "./webhook-store.port";
