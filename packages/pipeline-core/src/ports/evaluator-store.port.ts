// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tally/pipeline-core/ports/evaluator-store`
 * Purpose: Evaluator lookup and score persistence.
 * Scope: Defines EvaluatorStore and ScoreWriter contracts. Does not contain implementations.
 * Invariants:
 * - Evaluators are read-only to the pipeline; edits take effect on the next job
 * - Scores are create-only facts with generated ids; duplicates are tolerated
 * Side-effects: none (interface definition only)
 * Links: DrizzleEvaluatorStore, DrizzleScoreWriter
 * @public
 */

import type { EvaluatorRecord, NewScore } from "../domain/types";

export type { EvaluatorRecord, NewScore } from "../domain/types";

export interface EvaluatorStore {
  getEvaluator: (evaluatorId: string) => Promise<EvaluatorRecord | null>;
}

export interface ScoreWriter {
  /** Returns the generated score id. */
  createScore: (score: NewScore) => Promise<string>;
}
