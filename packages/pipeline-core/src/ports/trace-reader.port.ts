// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tally/pipeline-core/ports/trace-reader`
 * Purpose: Read access to traces and observations.
 * Scope: Defines the contract used by evaluation, cost and threshold tasks. Does not contain implementations.
 * Invariants:
 * - Lookups return null for unknown ids instead of throwing
 * - Range queries are half-open: [from, to)
 * - Every lookup is scoped by projectId; a record in another project reads as not found
 * Side-effects: none (interface definition only)
 * Links: DrizzleTraceReader
 * @public
 */

import type { Observation, Trace } from "../domain/types";

export type { Observation, Trace } from "../domain/types";

/** Function properties (not methods) for contravariant param checking. */
export interface TraceReader {
  getTrace: (projectId: string, traceId: string) => Promise<Trace | null>;

  getObservation: (
    projectId: string,
    observationId: string
  ) => Promise<Observation | null>;

  listObservationsByTrace: (
    projectId: string,
    traceId: string
  ) => Promise<Observation[]>;

  listObservationsInRange: (
    projectId: string,
    from: Date,
    to: Date
  ) => Promise<Observation[]>;

  /** Projects with at least one observation in [from, to). */
  listProjectsWithActivity: (from: Date, to: Date) => Promise<string[]>;
}
