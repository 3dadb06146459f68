// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tally/pipeline-core/evaluation/evaluator`
 * Purpose: Turn an evaluator record into a runnable plan and build the resulting score.
 * Scope: Config validation per evaluator type and NewScore construction. Does not call the LLM or persist.
 * Invariants:
 * - LLM evaluators need a non-empty prompt template
 * - Model: config.model when it is a non-empty string, else the worker default
 * - Rule scores are BOOLEAN with value 1 or 0, whatever the evaluator's scoreDataType
 * Side-effects: none
 * @public
 */

import type {
  EvaluatorRecord,
  NewScore,
  Observation,
  Trace,
} from "../domain/types";
import { EvaluatorConfigError } from "../errors";
import type { VerdictScoreFields } from "./judge-response";
import { parseRuleConfig, type RuleConfig, type RuleResult } from "./rules";

export type EvaluationPlan =
  | {
      kind: "llm";
      evaluator: EvaluatorRecord;
      promptTemplate: string;
      model: string;
    }
  | {
      kind: "rule";
      evaluator: EvaluatorRecord;
      rule: RuleConfig;
    };

function modelOverride(evaluator: EvaluatorRecord): string | undefined {
  const model = evaluator.config?.model;
  return typeof model === "string" && model.trim() !== "" ? model : undefined;
}

export function planEvaluation(
  evaluator: EvaluatorRecord,
  defaultModel: string
): EvaluationPlan {
  switch (evaluator.type) {
    case "llm":
      if (evaluator.promptTemplate.trim() === "") {
        throw new EvaluatorConfigError(
          `Evaluator ${evaluator.id} has no prompt template`,
          evaluator.id
        );
      }
      return {
        kind: "llm",
        evaluator,
        promptTemplate: evaluator.promptTemplate,
        model: modelOverride(evaluator) ?? defaultModel,
      };
    case "rule":
      return {
        kind: "rule",
        evaluator,
        rule: parseRuleConfig(evaluator.config, evaluator.id),
      };
  }
}

function baseScore(
  evaluator: EvaluatorRecord,
  trace: Trace,
  observation: Observation | null
): Pick<
  NewScore,
  "projectId" | "traceId" | "observationId" | "name" | "source" | "evaluatorId"
> {
  return {
    projectId: evaluator.projectId,
    traceId: trace.id,
    observationId: observation?.id ?? null,
    name: evaluator.scoreName,
    source: "EVAL",
    evaluatorId: evaluator.id,
  };
}

export function buildRuleScore(
  evaluator: EvaluatorRecord,
  trace: Trace,
  observation: Observation | null,
  result: RuleResult
): NewScore {
  return {
    ...baseScore(evaluator, trace, observation),
    value: result.passed ? 1 : 0,
    stringValue: null,
    dataType: "BOOLEAN",
    comment: result.comment,
  };
}

export function buildJudgeScore(
  evaluator: EvaluatorRecord,
  trace: Trace,
  observation: Observation | null,
  fields: VerdictScoreFields
): NewScore {
  return {
    ...baseScore(evaluator, trace, observation),
    ...fields,
    dataType: evaluator.scoreDataType,
  };
}
