// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tally/pipeline-core/evaluation/rules`
 * Purpose: Deterministic rule DSL for rule-based evaluators.
 * Scope: Parses rule config into a closed union and evaluates it against trace/observation content. Does not persist.
 * Invariants:
 * - Config is parsed once into RuleConfig; unknown rule_type, wrong-typed fields, unknown target
 *   and an uncompilable regex pattern are EvaluatorConfigError
 * - contains / not_contains are exact complements on the same content
 * - length_check counts Unicode code points; max_length 0 means unbounded
 * - An observation target without an observation reads as ""
 * Side-effects: none
 * @public
 */

import { z } from "zod";

import type { Observation, Trace } from "../domain/types";
import { EvaluatorConfigError } from "../errors";

export const RULE_TARGETS = [
  "trace_input",
  "trace_output",
  "observation_input",
  "observation_output",
] as const;

export type RuleTarget = (typeof RULE_TARGETS)[number];

const TargetSchema = z.enum(RULE_TARGETS);
const LengthBoundSchema = z.number().int().nonnegative().default(0);

const RuleConfigSchema = z.discriminatedUnion("rule_type", [
  z.object({
    rule_type: z.literal("contains"),
    target: TargetSchema,
    substring: z.string(),
  }),
  z.object({
    rule_type: z.literal("not_contains"),
    target: TargetSchema,
    substring: z.string(),
  }),
  z.object({
    rule_type: z.literal("length_check"),
    target: TargetSchema,
    min_length: LengthBoundSchema,
    max_length: LengthBoundSchema,
  }),
  z.object({
    rule_type: z.literal("regex_match"),
    target: TargetSchema,
    pattern: z.string().min(1),
  }),
]);

type ParsedRuleConfig = z.output<typeof RuleConfigSchema>;

/** Rule config with regex patterns already compiled. */
export type RuleConfig =
  | Exclude<ParsedRuleConfig, { rule_type: "regex_match" }>
  | (Extract<ParsedRuleConfig, { rule_type: "regex_match" }> & {
      regex: RegExp;
    });

export interface RuleResult {
  passed: boolean;
  comment: string;
}

export function parseRuleConfig(
  config: unknown,
  evaluatorId?: string
): RuleConfig {
  if (config === null || config === undefined) {
    throw new EvaluatorConfigError("Rule evaluator has no config", evaluatorId);
  }

  const parsed = RuleConfigSchema.safeParse(config);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new EvaluatorConfigError(`Invalid rule config: ${issues}`, evaluatorId);
  }

  const rule = parsed.data;
  if (rule.rule_type !== "regex_match") return rule;

  try {
    return { ...rule, regex: new RegExp(rule.pattern) };
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new EvaluatorConfigError(
      `Invalid regex pattern /${rule.pattern}/: ${reason}`,
      evaluatorId
    );
  }
}

export function resolveRuleTarget(
  target: RuleTarget,
  trace: Trace,
  observation: Observation | null
): string {
  switch (target) {
    case "trace_input":
      return trace.input;
    case "trace_output":
      return trace.output;
    case "observation_input":
      return observation?.input ?? "";
    case "observation_output":
      return observation?.output ?? "";
  }
}

/** Length in Unicode code points, so "é" and "😀" each count once. */
export function codePointLength(content: string): number {
  return Array.from(content).length;
}

export function evaluateRule(
  rule: RuleConfig,
  trace: Trace,
  observation: Observation | null
): RuleResult {
  const content = resolveRuleTarget(rule.target, trace, observation);

  switch (rule.rule_type) {
    case "contains":
      return {
        passed: content.includes(rule.substring),
        comment: `Checked if content contains '${rule.substring}'`,
      };
    case "not_contains":
      return {
        passed: !content.includes(rule.substring),
        comment: `Checked if content does not contain '${rule.substring}'`,
      };
    case "length_check": {
      const length = codePointLength(content);
      const passed =
        length >= rule.min_length &&
        (rule.max_length === 0 || length <= rule.max_length);
      return {
        passed,
        comment: `Length: ${length} (min: ${rule.min_length}, max: ${rule.max_length})`,
      };
    }
    case "regex_match":
      return {
        passed: rule.regex.test(content),
        comment: `Checked if content matches /${rule.pattern}/`,
      };
  }
}
