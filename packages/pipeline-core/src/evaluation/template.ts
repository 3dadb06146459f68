// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tally/pipeline-core/evaluation/template`
 * Purpose: `{{variable}}` substitution for judge prompt templates.
 * Scope: Variable extraction from trace/observation and single-pass rendering. Does not call the LLM.
 * Invariants:
 * - Unknown placeholders stay literal
 * - Substituted values are never re-scanned for placeholders
 * - Empty input/output/model values are omitted so their placeholders stay literal
 * Side-effects: none
 * @public
 */

import type { Observation, Trace } from "../domain/types";

export type TemplateVariables = Readonly<Record<string, string>>;

const PLACEHOLDER = /\{\{([a-zA-Z0-9_]+)\}\}/g;

export function buildTemplateVariables(
  trace: Trace,
  observation: Observation | null
): TemplateVariables {
  const variables: Record<string, string> = {
    trace_id: trace.id,
    trace_name: trace.name,
  };
  if (trace.input !== "") variables.trace_input = trace.input;
  if (trace.output !== "") variables.trace_output = trace.output;

  if (observation) {
    variables.observation_id = observation.id;
    variables.observation_name = observation.name;
    variables.observation_type = observation.type;
    if (observation.input !== "") variables.input = observation.input;
    if (observation.output !== "") variables.output = observation.output;
    if (observation.model !== "") variables.model = observation.model;
  }

  return variables;
}

export function renderPromptTemplate(
  template: string,
  variables: TemplateVariables
): string {
  return template.replace(PLACEHOLDER, (placeholder, name: string) =>
    Object.hasOwn(variables, name) ? (variables[name] ?? placeholder) : placeholder
  );
}
