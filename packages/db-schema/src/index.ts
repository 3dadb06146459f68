// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tally/db-schema`
 * Purpose: Root barrel re-exporting all schema slices for consumers that need the full schema.
 * Scope: Re-exports only. Does not define any tables.
 * Invariants: Must re-export every slice so drizzle's relational client sees the whole schema.
 * Side-effects: none
 * @public
 */

export * from "./evaluation";
export * from "./pricing";
export * from "./tracing";
export * from "./webhooks";
