// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tally/pipeline-worker/tasks/evaluation`
 * Purpose: Evaluation tasks: run one evaluator against a trace/observation, or against many traces inline.
 * Scope: Loads evaluator and trace, dispatches to rule or LLM judge, persists the score. Does not define rule or prompt semantics (pipeline-core).
 * Invariants:
 * - Disabled evaluator → no-op, no score
 * - Missing evaluator and invalid config → non-retryable EvaluatorConfigError
 * - Missing trace/observation → retry-eligible (ingestion may lag)
 * - Judge calls go through the shared judge breaker and honor the job signal
 * - Judge provider_4xx → non-retryable; 5xx/429/timeouts/parse errors → retry-eligible
 * - Batch runs are sequential and never throw for inner failures
 * Side-effects: IO (score writes, LLM HTTP via injected JudgeClient)
 * @internal
 */

import type { CircuitBreaker } from "@tally/circuit-breaker";
import {
  buildJudgeMessages,
  buildJudgeScore,
  buildRuleScore,
  buildTemplateVariables,
  EvaluatorConfigError,
  type EvaluatorStore,
  evaluateRule,
  isLlmError,
  type NewScore,
  type Observation,
  parseJudgeVerdict,
  planEvaluation,
  renderPromptTemplate,
  type ScoreWriter,
  type Trace,
  type TraceReader,
  verdictToScoreFields,
} from "@tally/pipeline-core";
import {
  errorMessage,
  type JobHandler,
  type LoggerLike,
  NonRetryableJobError,
  parsePayload,
} from "@tally/task-queue";

import type { JudgeClient } from "../adapters/openai-judge.client";
import {
  BatchEvaluationPayloadSchema,
  type EvaluationPayload,
  EvaluationPayloadSchema,
} from "../schemas/payloads";

export interface EvaluationTaskDeps {
  evaluators: EvaluatorStore;
  scores: ScoreWriter;
  traces: TraceReader;
  /** Null when no judge API key is configured; LLM evaluators then fail with a config error. */
  judge: JudgeClient | null;
  judgeBreaker: CircuitBreaker;
  defaultModel: string;
  logger: LoggerLike;
}

export type EvaluationOutcome =
  | {
      status: "scored";
      scoreId: string;
      value: number | null;
      stringValue: string | null;
    }
  | { status: "skipped"; reason: "disabled" };

export interface BatchEvaluationResult {
  total: number;
  succeeded: number;
  failed: number;
}

async function loadTarget(
  traces: TraceReader,
  payload: EvaluationPayload
): Promise<{ trace: Trace; observation: Observation | null }> {
  const trace = await traces.getTrace(payload.projectId, payload.traceId);
  if (!trace) {
    throw new Error(`Trace ${payload.traceId} not found`);
  }
  if (payload.observationId === undefined) {
    return { trace, observation: null };
  }
  const observation = await traces.getObservation(
    payload.projectId,
    payload.observationId
  );
  if (!observation) {
    throw new Error(`Observation ${payload.observationId} not found`);
  }
  return { trace, observation };
}

async function judge(
  deps: EvaluationTaskDeps,
  model: string,
  messages: ReturnType<typeof buildJudgeMessages>,
  evaluatorId: string,
  signal: AbortSignal | undefined
): Promise<string> {
  const client = deps.judge;
  if (!client) {
    throw new EvaluatorConfigError(
      "LLM judge is not configured (missing JUDGE_API_KEY)",
      evaluatorId
    );
  }
  try {
    return await deps.judgeBreaker.execute(
      () => client.complete({ model, messages }, signal),
      signal
    );
  } catch (error) {
    if (isLlmError(error) && error.kind === "provider_4xx") {
      throw new NonRetryableJobError(error.message, { cause: error });
    }
    throw error;
  }
}

/** One evaluation, shared by the single and batch tasks. */
export async function runEvaluation(
  deps: EvaluationTaskDeps,
  payload: EvaluationPayload,
  signal?: AbortSignal
): Promise<EvaluationOutcome> {
  const evaluator = await deps.evaluators.getEvaluator(payload.evaluatorId);
  if (!evaluator || evaluator.projectId !== payload.projectId) {
    throw new EvaluatorConfigError(
      `Evaluator ${payload.evaluatorId} not found in project ${payload.projectId}`,
      payload.evaluatorId
    );
  }
  if (!evaluator.enabled) {
    deps.logger.info(
      { evaluatorId: evaluator.id, traceId: payload.traceId },
      "Evaluator disabled, skipping"
    );
    return { status: "skipped", reason: "disabled" };
  }

  const plan = planEvaluation(evaluator, deps.defaultModel);
  const { trace, observation } = await loadTarget(deps.traces, payload);

  let score: NewScore;
  if (plan.kind === "rule") {
    const result = evaluateRule(plan.rule, trace, observation);
    score = buildRuleScore(evaluator, trace, observation, result);
  } else {
    const prompt = renderPromptTemplate(
      plan.promptTemplate,
      buildTemplateVariables(trace, observation)
    );
    const content = await judge(
      deps,
      plan.model,
      buildJudgeMessages(evaluator.scoreDataType, prompt),
      evaluator.id,
      signal
    );
    const verdict = parseJudgeVerdict(content);
    score = buildJudgeScore(
      evaluator,
      trace,
      observation,
      verdictToScoreFields(verdict, evaluator.scoreDataType)
    );
  }

  const scoreId = await deps.scores.createScore(score);
  deps.logger.info(
    {
      evaluatorId: evaluator.id,
      evaluatorType: evaluator.type,
      traceId: trace.id,
      observationId: observation?.id,
      scoreId,
      value: score.value,
    },
    "Evaluation scored"
  );
  return {
    status: "scored",
    scoreId,
    value: score.value,
    stringValue: score.stringValue,
  };
}

export function createEvaluationTask(deps: EvaluationTaskDeps): JobHandler {
  return async (payload, ctx) =>
    runEvaluation(
      deps,
      parsePayload("eval:run", EvaluationPayloadSchema, payload),
      ctx.signal
    );
}

export function createBatchEvaluationTask(deps: EvaluationTaskDeps): JobHandler {
  return async (payload, ctx): Promise<BatchEvaluationResult> => {
    const { projectId, evaluatorId, traceIds } = parsePayload(
      "eval:run-batch",
      BatchEvaluationPayloadSchema,
      payload
    );

    const result: BatchEvaluationResult = {
      total: traceIds.length,
      succeeded: 0,
      failed: 0,
    };

    for (const traceId of traceIds) {
      ctx.signal.throwIfAborted();
      try {
        await runEvaluation(deps, { projectId, evaluatorId, traceId }, ctx.signal);
        result.succeeded++;
      } catch (error) {
        result.failed++;
        deps.logger.warn(
          { evaluatorId, traceId, error: errorMessage(error) },
          "Batch evaluation item failed"
        );
      }
    }

    if (result.failed > 0) {
      deps.logger.warn(
        { projectId, evaluatorId, ...result },
        "Batch evaluation completed with failures"
      );
    } else {
      deps.logger.info({ projectId, evaluatorId, ...result }, "Batch evaluation completed");
    }
    return result;
  };
}
