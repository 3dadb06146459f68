// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tally/pipeline-core/tests/fixtures`
 * Purpose: Builders for domain records used across pipeline-core unit tests.
 * Scope: Plain object factories with overridable fields. Does not touch IO.
 * Invariants: Every builder returns a fresh object.
 * Side-effects: none
 * Links: tests/*.test.ts
 * @internal
 */

import type {
  EvaluatorRecord,
  Observation,
  Trace,
  Webhook,
} from "../src/domain/types";

export const PROJECT_ID = "proj-1";

export function makeTrace(overrides: Partial<Trace> = {}): Trace {
  return {
    id: "trace-1",
    projectId: PROJECT_ID,
    name: "checkout-agent",
    input: "What is my order status?",
    output: "Your order has shipped. This is important content.",
    totalCost: 0.5,
    durationMs: 1200,
    startTime: new Date("2025-01-15T10:00:00.000Z"),
    ...overrides,
  };
}

export function makeObservation(overrides: Partial<Observation> = {}): Observation {
  return {
    id: "obs-1",
    traceId: "trace-1",
    projectId: PROJECT_ID,
    name: "llm-call",
    type: "generation",
    model: "gpt-4o",
    input: "Summarize the order",
    output: "Order shipped",
    inputTokens: 1000,
    outputTokens: 500,
    inputCost: null,
    outputCost: null,
    totalCost: null,
    startTime: new Date("2025-01-15T10:00:01.000Z"),
    ...overrides,
  };
}

export function makeEvaluator(
  overrides: Partial<EvaluatorRecord> = {}
): EvaluatorRecord {
  return {
    id: "eval-1",
    projectId: PROJECT_ID,
    name: "helpfulness",
    type: "llm",
    promptTemplate: "Rate the answer {{output}} to {{input}}",
    config: null,
    scoreName: "helpfulness",
    scoreDataType: "NUMERIC",
    enabled: true,
    ...overrides,
  };
}

export function makeWebhook(overrides: Partial<Webhook> = {}): Webhook {
  return {
    id: "wh-1",
    projectId: PROJECT_ID,
    name: "alerts",
    type: "generic",
    url: "https://hooks.example.test/alerts",
    secret: "",
    events: ["trace.cost_threshold"],
    enabled: true,
    headers: {},
    costThreshold: null,
    latencyThresholdMs: null,
    rateLimitPerHour: null,
    lastTriggeredAt: null,
    ...overrides,
  };
}
