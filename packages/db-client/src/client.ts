// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tally/db-client/client`
 * Purpose: Database client factory with injected connection string.
 * Scope: Creates and closes the pipeline worker's Drizzle client. Does not read from environment.
 * Invariants:
 * - Connection string injected, never from process.env
 * Side-effects: IO (database connections)
 * @public
 */

import { buildClient, type Database } from "./build-client";

export type { Database } from "./build-client";

export function createPipelineDbClient(connectionString: string): Database {
  return buildClient(connectionString, "tally_pipeline_worker");
}

/** Drains and closes the connection pool. */
export async function closeDbClient(db: Database): Promise<void> {
  await db.$client.end({ timeout: 5 });
}
