// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tally/db-schema/tracing`
 * Purpose: Trace and observation tables read by the pipeline.
 * Scope: Defines traces, observations. Does not contain queries or logic.
 * Invariants:
 * - Cost columns are numeric(18,8); drizzle surfaces them as strings, adapters convert
 * - observations.(project_id, start_time) index backs the daily cost scan
 * - Observation cost columns are the only ones this core writes
 * Side-effects: none (schema definitions only)
 * @public
 */

import {
  index,
  integer,
  jsonb,
  numeric,
  pgTable,
  text,
  timestamp,
} from "drizzle-orm/pg-core";

export const traces = pgTable(
  "traces",
  {
    id: text("id").primaryKey(),
    projectId: text("project_id").notNull(),
    name: text("name").notNull().default(""),
    input: jsonb("input"),
    output: jsonb("output"),
    totalCost: numeric("total_cost", { precision: 18, scale: 8 }),
    durationMs: integer("duration_ms"),
    startTime: timestamp("start_time", { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => ({
    projectStartIdx: index("traces_project_start_idx").on(
      table.projectId,
      table.startTime
    ),
  })
);

/**
 * Spans, generations and events recorded under a trace.
 * Token counts come from ingestion; cost columns are filled by the cost worker.
 */
export const observations = pgTable(
  "observations",
  {
    id: text("id").primaryKey(),
    traceId: text("trace_id")
      .notNull()
      .references(() => traces.id, { onDelete: "cascade" }),
    projectId: text("project_id").notNull(),
    name: text("name").notNull().default(""),
    type: text("type").notNull().default("span"),
    model: text("model"),
    input: jsonb("input"),
    output: jsonb("output"),
    inputTokens: integer("input_tokens").notNull().default(0),
    outputTokens: integer("output_tokens").notNull().default(0),
    inputCost: numeric("input_cost", { precision: 18, scale: 8 }),
    outputCost: numeric("output_cost", { precision: 18, scale: 8 }),
    totalCost: numeric("total_cost", { precision: 18, scale: 8 }),
    startTime: timestamp("start_time", { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => ({
    traceIdx: index("observations_trace_idx").on(table.traceId),
    projectStartIdx: index("observations_project_start_idx").on(
      table.projectId,
      table.startTime
    ),
  })
);
