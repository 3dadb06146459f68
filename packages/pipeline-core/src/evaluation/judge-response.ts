// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tally/pipeline-core/evaluation/judge-response`
 * Purpose: Parse the judge's reply and map it onto score fields.
 * Scope: JSON extraction, shape validation, clamping and per-data-type mapping. Does not persist.
 * Invariants:
 * - Direct JSON parse first; on failure, the text between the first "{" and the last "}"
 * - Score is clamped to [0, 1]; a missing score reads as 0
 * - BOOLEAN: explicit `passed` wins over `score >= 0.5`; value is always 0 or 1
 * - CATEGORICAL: an empty string_value leaves stringValue null
 * Side-effects: none
 * @public
 */

import { z } from "zod";

import type { ScoreDataType } from "../domain/types";
import { JudgeResponseParseError } from "../errors";

const JudgeVerdictSchema = z.object({
  score: z.number().finite().default(0),
  reasoning: z.string().default(""),
  passed: z.boolean().optional(),
  string_value: z.string().optional(),
});

export type JudgeVerdict = z.output<typeof JudgeVerdictSchema>;

function tryParseJson(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

function extractJson(content: string): unknown {
  const direct = tryParseJson(content);
  if (direct.ok) return direct.value;

  const start = content.indexOf("{");
  const end = content.lastIndexOf("}");
  if (start < 0 || end <= start) {
    throw new JudgeResponseParseError("No JSON object in judge response", content);
  }
  const embedded = tryParseJson(content.slice(start, end + 1));
  if (!embedded.ok) {
    throw new JudgeResponseParseError("Invalid JSON in judge response", content);
  }
  return embedded.value;
}

export function clampScore(score: number): number {
  return Math.min(1, Math.max(0, score));
}

export function parseJudgeVerdict(content: string): JudgeVerdict {
  const parsed = JudgeVerdictSchema.safeParse(extractJson(content));
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new JudgeResponseParseError(
      `Unexpected judge response shape: ${issues}`,
      content
    );
  }
  return { ...parsed.data, score: clampScore(parsed.data.score) };
}

export interface VerdictScoreFields {
  value: number | null;
  stringValue: string | null;
  comment: string | null;
}

export function verdictToScoreFields(
  verdict: JudgeVerdict,
  dataType: ScoreDataType
): VerdictScoreFields {
  const comment = verdict.reasoning === "" ? null : verdict.reasoning;
  switch (dataType) {
    case "NUMERIC":
      return { value: verdict.score, stringValue: null, comment };
    case "BOOLEAN": {
      const passed = verdict.passed ?? verdict.score >= 0.5;
      return { value: passed ? 1 : 0, stringValue: null, comment };
    }
    case "CATEGORICAL":
      return {
        value: null,
        stringValue:
          verdict.string_value !== undefined && verdict.string_value !== ""
            ? verdict.string_value
            : null,
        comment,
      };
  }
}
