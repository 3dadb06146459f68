// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tally/db-client`
 * Purpose: Pipeline DB client: factory, adapters implementing the pipeline ports, schema.
 * Scope: Client factory and Drizzle adapters. Does not contain pipeline logic.
 * Invariants:
 * - FORBIDDEN: process.env
 * - Re-exports full schema (all domain slices)
 * Side-effects: IO (database operations)
 * @public
 */

export * from "@tally/db-schema";
export { DrizzleEvaluatorStore, DrizzleScoreWriter } from "./adapters/drizzle-evaluation.adapter";
export {
  DrizzleObservationCostWriter,
  DrizzlePricingOverrides,
} from "./adapters/drizzle-pricing.adapter";
export { DrizzleTraceReader } from "./adapters/drizzle-trace-reader.adapter";
export { DrizzleWebhookStore, hourBucket } from "./adapters/drizzle-webhook.adapter";
export { closeDbClient, createPipelineDbClient, type Database } from "./client";
export { toMoney, toText } from "./build-client";
