// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tally/db-client/adapters/drizzle-trace-reader`
 * Purpose: DrizzleTraceReader for trace and observation reads.
 * Scope: Implements TraceReader with Drizzle ORM. Does not write.
 * Invariants:
 * - Every read filters on project_id
 * - Range queries are half-open on start_time: [from, to)
 * - jsonb input/output are surfaced as text ("" when null)
 * Side-effects: IO (database reads)
 * Links: pipeline-core ports/trace-reader.port.ts
 * @public
 */

import { observations, traces } from "@tally/db-schema/tracing";
import type { Observation, Trace, TraceReader } from "@tally/pipeline-core";
import { and, asc, eq, gte, lt } from "drizzle-orm";

import { type Database, toMoney, toText } from "../build-client";

export class DrizzleTraceReader implements TraceReader {
  constructor(private readonly db: Database) {}

  async getTrace(projectId: string, traceId: string): Promise<Trace | null> {
    const [row] = await this.db
      .select()
      .from(traces)
      .where(and(eq(traces.projectId, projectId), eq(traces.id, traceId)))
      .limit(1);
    return row ? toTrace(row) : null;
  }

  async getObservation(
    projectId: string,
    observationId: string
  ): Promise<Observation | null> {
    const [row] = await this.db
      .select()
      .from(observations)
      .where(
        and(
          eq(observations.projectId, projectId),
          eq(observations.id, observationId)
        )
      )
      .limit(1);
    return row ? toObservation(row) : null;
  }

  async listObservationsByTrace(
    projectId: string,
    traceId: string
  ): Promise<Observation[]> {
    const rows = await this.db
      .select()
      .from(observations)
      .where(
        and(
          eq(observations.projectId, projectId),
          eq(observations.traceId, traceId)
        )
      )
      .orderBy(asc(observations.startTime));
    return rows.map(toObservation);
  }

  async listObservationsInRange(
    projectId: string,
    from: Date,
    to: Date
  ): Promise<Observation[]> {
    const rows = await this.db
      .select()
      .from(observations)
      .where(
        and(
          eq(observations.projectId, projectId),
          gte(observations.startTime, from),
          lt(observations.startTime, to)
        )
      )
      .orderBy(asc(observations.startTime));
    return rows.map(toObservation);
  }

  async listProjectsWithActivity(from: Date, to: Date): Promise<string[]> {
    const rows = await this.db
      .selectDistinct({ projectId: observations.projectId })
      .from(observations)
      .where(and(gte(observations.startTime, from), lt(observations.startTime, to)));
    return rows.map((row) => row.projectId);
  }
}

function toTrace(row: typeof traces.$inferSelect): Trace {
  return {
    id: row.id,
    projectId: row.projectId,
    name: row.name,
    input: toText(row.input),
    output: toText(row.output),
    totalCost: toMoney(row.totalCost),
    durationMs: row.durationMs,
    startTime: row.startTime,
  };
}

function toObservation(row: typeof observations.$inferSelect): Observation {
  return {
    id: row.id,
    traceId: row.traceId,
    projectId: row.projectId,
    name: row.name,
    type: row.type,
    model: row.model ?? "",
    input: toText(row.input),
    output: toText(row.output),
    inputTokens: row.inputTokens,
    outputTokens: row.outputTokens,
    inputCost: toMoney(row.inputCost),
    outputCost: toMoney(row.outputCost),
    totalCost: toMoney(row.totalCost),
    startTime: row.startTime,
  };
}
