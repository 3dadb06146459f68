// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tally/db-client/build-client`
 * Purpose: Drizzle client constructor and shared row conversions.
 * Scope: Pool construction, money/JSON column conversion. Does not handle env resolution.
 * Invariants:
 *   - Connection string injected, never from process.env
 *   - Database type preserves drizzle's `$client` accessor for pool shutdown
 * Side-effects: IO (database connections)
 * @internal
 */

import * as fullSchema from "@tally/db-schema";
import { drizzle } from "drizzle-orm/postgres-js";
import postgres from "postgres";

export function buildClient(connectionString: string, applicationName: string) {
  const client = postgres(connectionString, {
    max: 10,
    idle_timeout: 20,
    connect_timeout: 10,
    connection: {
      application_name: applicationName,
    },
  });

  return drizzle(client, { schema: fullSchema });
}

/** Drizzle client including the postgres.js `$client` accessor for pool control. */
export type Database = ReturnType<typeof buildClient>;

/** numeric columns arrive as strings. */
export function toMoney(value: string | null): number | null {
  if (value === null) return null;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}

/** jsonb payloads are handed to evaluators as text. */
export function toText(value: unknown): string {
  if (value === null || value === undefined) return "";
  if (typeof value === "string") return value;
  return JSON.stringify(value);
}
