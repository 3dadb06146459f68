// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tally/db-schema/pricing`
 * Purpose: Per-project model price overrides.
 * Scope: Defines model_pricing. Does not contain queries or logic.
 * Invariants: UNIQUE(project_id, model); model is stored normalized (trimmed, lower-case)
 * Side-effects: none (schema definitions only)
 * @public
 */

import {
  doublePrecision,
  pgTable,
  text,
  timestamp,
  uniqueIndex,
  uuid,
} from "drizzle-orm/pg-core";

export const modelPricing = pgTable(
  "model_pricing",
  {
    id: uuid("id").defaultRandom().primaryKey(),
    projectId: text("project_id").notNull(),
    model: text("model").notNull(),
    provider: text("provider").notNull().default(""),
    /** USD per 1,000 input tokens */
    inputPricePer1k: doublePrecision("input_price_per_1k").notNull(),
    /** USD per 1,000 output tokens */
    outputPricePer1k: doublePrecision("output_price_per_1k").notNull(),
    updatedAt: timestamp("updated_at", { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => ({
    projectModelUnique: uniqueIndex("model_pricing_project_model_unique").on(
      table.projectId,
      table.model
    ),
  })
);
