// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tally/pipeline-core/evaluation/judge-prompt`
 * Purpose: System prompt and request settings for the LLM judge.
 * Scope: Builds the system message describing the JSON reply shape per score data type. Does not perform IO.
 * Invariants:
 * - NUMERIC asks for {score, reasoning}
 * - BOOLEAN asks for {passed, score, reasoning}
 * - CATEGORICAL asks for {string_value, score, reasoning}
 * Side-effects: none
 * @public
 */

import type { ScoreDataType } from "../domain/types";

export const JUDGE_TEMPERATURE = 0.1;
export const JUDGE_MAX_TOKENS = 500;
export const JUDGE_REQUEST_TIMEOUT_MS = 60_000;

const PREAMBLE = `You grade the output of an AI agent against the criteria in the user message.

Reply with a single JSON object and nothing else. It must contain:
- "reasoning": one to three sentences explaining the grade
`;

const SHAPES: Record<ScoreDataType, string> = {
  NUMERIC: `- "score": a number between 0.0 and 1.0, higher is better

Example:
{"score": 0.7, "reasoning": "Mostly correct, but one step of the answer is missing."}`,
  BOOLEAN: `- "passed": true if the criteria are met, otherwise false
- "score": 1.0 when passed, 0.0 when not

Example:
{"passed": false, "score": 0.0, "reasoning": "The answer ignores the requested output format."}`,
  CATEGORICAL: `- "string_value": the label that best describes the output
- "score": your confidence in that label, between 0.0 and 1.0

Example:
{"string_value": "neutral", "score": 0.8, "reasoning": "The tone is factual with no strong sentiment."}`,
};

export function buildJudgeSystemPrompt(dataType: ScoreDataType): string {
  return PREAMBLE + SHAPES[dataType];
}

export interface JudgeMessage {
  role: "system" | "user";
  content: string;
}

export function buildJudgeMessages(
  dataType: ScoreDataType,
  renderedPrompt: string
): JudgeMessage[] {
  return [
    { role: "system", content: buildJudgeSystemPrompt(dataType) },
    { role: "user", content: renderedPrompt },
  ];
}
