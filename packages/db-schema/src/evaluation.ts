// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tally/db-schema/evaluation`
 * Purpose: Evaluator definitions and the scores they produce.
 * Scope: Defines evaluators, scores and their enum value lists. Does not contain queries or logic.
 * Invariants:
 * - scores is append-only; value is set iff data_type is NUMERIC/BOOLEAN, string_value iff CATEGORICAL
 * - evaluators.config holds the rule config (rule evaluators) or a { model } override (llm evaluators)
 * Side-effects: none (schema definitions only)
 * @public
 */

import {
  boolean,
  doublePrecision,
  index,
  jsonb,
  pgTable,
  text,
  timestamp,
  uuid,
} from "drizzle-orm/pg-core";

import { observations, traces } from "./tracing";

/** Score data types (source of truth for DB enum). */
export const SCORE_DATA_TYPES = ["NUMERIC", "BOOLEAN", "CATEGORICAL"] as const;
export type ScoreDataType = (typeof SCORE_DATA_TYPES)[number];

export const EVALUATOR_TYPES = ["llm", "rule"] as const;
export type EvaluatorType = (typeof EVALUATOR_TYPES)[number];

export const SCORE_SOURCES = ["API", "EVAL", "ANNOTATION"] as const;
export type ScoreSource = (typeof SCORE_SOURCES)[number];

export const evaluators = pgTable(
  "evaluators",
  {
    id: uuid("id").defaultRandom().primaryKey(),
    projectId: text("project_id").notNull(),
    name: text("name").notNull(),
    type: text("type", { enum: EVALUATOR_TYPES }).notNull(),
    promptTemplate: text("prompt_template").notNull().default(""),
    config: jsonb("config").$type<Record<string, unknown>>(),
    scoreName: text("score_name").notNull(),
    scoreDataType: text("score_data_type", { enum: SCORE_DATA_TYPES })
      .notNull()
      .default("NUMERIC"),
    enabled: boolean("enabled").notNull().default(true),
    createdAt: timestamp("created_at", { withTimezone: true })
      .notNull()
      .defaultNow(),
    updatedAt: timestamp("updated_at", { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => ({
    projectIdx: index("evaluators_project_idx").on(table.projectId),
  })
);

export const scores = pgTable(
  "scores",
  {
    id: uuid("id").defaultRandom().primaryKey(),
    projectId: text("project_id").notNull(),
    traceId: text("trace_id")
      .notNull()
      .references(() => traces.id, { onDelete: "cascade" }),
    observationId: text("observation_id").references(() => observations.id, {
      onDelete: "set null",
    }),
    name: text("name").notNull(),
    value: doublePrecision("value"),
    stringValue: text("string_value"),
    dataType: text("data_type", { enum: SCORE_DATA_TYPES }).notNull(),
    source: text("source", { enum: SCORE_SOURCES }).notNull(),
    /** Evaluator that produced the score (config_id) */
    evaluatorId: uuid("evaluator_id").references(() => evaluators.id, {
      onDelete: "set null",
    }),
    comment: text("comment"),
    createdAt: timestamp("created_at", { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => ({
    traceIdx: index("scores_trace_idx").on(table.traceId),
    projectNameIdx: index("scores_project_name_idx").on(
      table.projectId,
      table.name
    ),
  })
);
