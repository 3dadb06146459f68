// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tally/db-client/adapters/drizzle-evaluation`
 * Purpose: Evaluator lookup and score persistence.
 * Scope: Implements EvaluatorStore and ScoreWriter with Drizzle ORM. Does not run evaluations.
 * Invariants:
 * - Scores are insert-only; no conflict handling (duplicates are tolerated)
 * Side-effects: IO (database operations)
 * Links: pipeline-core ports/evaluator-store.port.ts
 * @public
 */

import { evaluators, scores } from "@tally/db-schema/evaluation";
import type {
  EvaluatorRecord,
  EvaluatorStore,
  NewScore,
  ScoreWriter,
} from "@tally/pipeline-core";
import { eq } from "drizzle-orm";

import type { Database } from "../build-client";

export class DrizzleEvaluatorStore implements EvaluatorStore {
  constructor(private readonly db: Database) {}

  async getEvaluator(evaluatorId: string): Promise<EvaluatorRecord | null> {
    const [row] = await this.db
      .select()
      .from(evaluators)
      .where(eq(evaluators.id, evaluatorId))
      .limit(1);
    if (!row) return null;
    return {
      id: row.id,
      projectId: row.projectId,
      name: row.name,
      type: row.type,
      promptTemplate: row.promptTemplate,
      config: row.config ?? null,
      scoreName: row.scoreName,
      scoreDataType: row.scoreDataType,
      enabled: row.enabled,
    };
  }
}

export class DrizzleScoreWriter implements ScoreWriter {
  constructor(private readonly db: Database) {}

  async createScore(score: NewScore): Promise<string> {
    const [row] = await this.db
      .insert(scores)
      .values({
        projectId: score.projectId,
        traceId: score.traceId,
        observationId: score.observationId,
        name: score.name,
        value: score.value,
        stringValue: score.stringValue,
        dataType: score.dataType,
        source: score.source,
        evaluatorId: score.evaluatorId,
        comment: score.comment,
      })
      .returning({ id: scores.id });
    if (!row) {
      throw new Error("Score insert returned no row");
    }
    return row.id;
  }
}
