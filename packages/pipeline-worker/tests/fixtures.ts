// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tally/pipeline-worker/tests/fixtures`
 * Purpose: Record builders and in-memory port fakes for pipeline-worker unit tests.
 * Scope: Fakes behind TraceReader, EvaluatorStore, ScoreWriter, WebhookStore, pricing ports and the job queue. Does not touch a database or the network.
 * Invariants: Every builder returns a fresh object; fakes keep state per instance.
 * Side-effects: none
 * Links: tests/*.test.ts
 * @internal
 */

import type {
  EvaluatorRecord,
  EvaluatorStore,
  ModelPricing,
  NewScore,
  NewWebhookDelivery,
  Observation,
  ObservationCosts,
  ObservationCostWriter,
  ScoreWriter,
  Trace,
  TraceReader,
  Webhook,
  WebhookStore,
} from "@tally/pipeline-core";
import type { JobContext, JobOptions, LoggerLike } from "@tally/task-queue";
import { vi } from "vitest";

import type { PipelineJobKind, PipelineJobs } from "../src/jobs";
import type { PipelineQueue } from "../src/producers";

export const PROJECT_ID = "proj-1";

export function makeTrace(overrides: Partial<Trace> = {}): Trace {
  return {
    id: "trace-1",
    projectId: PROJECT_ID,
    name: "checkout-agent",
    input: "Where is my order?",
    output: "Your order has shipped. This is important content.",
    totalCost: 1.5,
    durationMs: 1200,
    startTime: new Date("2025-01-15T10:00:00.000Z"),
    ...overrides,
  };
}

export function makeObservation(
  overrides: Partial<Observation> = {}
): Observation {
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
    promptTemplate: "Rate {{output}} for {{trace_name}}",
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

export function makeJobContext(overrides: Partial<JobContext> = {}): JobContext {
  return {
    jobId: "job-1",
    kind: "test",
    lane: "default",
    attempt: 1,
    maxAttempts: 4,
    signal: new AbortController().signal,
    ...overrides,
  };
}

export function createMockLogger() {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  } satisfies LoggerLike;
}

export class InMemoryTraceReader implements TraceReader {
  readonly traces = new Map<string, Trace>();
  readonly observations: Observation[] = [];

  constructor(traces: Trace[] = [], observations: Observation[] = []) {
    for (const trace of traces) this.traces.set(trace.id, trace);
    this.observations.push(...observations);
  }

  getTrace = async (projectId: string, traceId: string): Promise<Trace | null> => {
    const trace = this.traces.get(traceId);
    return trace?.projectId === projectId ? trace : null;
  };

  getObservation = async (
    projectId: string,
    observationId: string
  ): Promise<Observation | null> =>
    this.observations.find(
      (o) => o.projectId === projectId && o.id === observationId
    ) ?? null;

  listObservationsByTrace = async (
    projectId: string,
    traceId: string
  ): Promise<Observation[]> =>
    this.observations.filter(
      (o) => o.projectId === projectId && o.traceId === traceId
    );

  listObservationsInRange = async (
    projectId: string,
    from: Date,
    to: Date
  ): Promise<Observation[]> =>
    this.observations.filter(
      (o) =>
        o.projectId === projectId &&
        o.startTime.getTime() >= from.getTime() &&
        o.startTime.getTime() < to.getTime()
    );

  listProjectsWithActivity = async (from: Date, to: Date): Promise<string[]> => {
    const projects = new Set<string>();
    for (const o of this.observations) {
      const at = o.startTime.getTime();
      if (at >= from.getTime() && at < to.getTime()) projects.add(o.projectId);
    }
    return [...projects];
  };
}

export class InMemoryEvaluationStore implements EvaluatorStore, ScoreWriter {
  readonly evaluators = new Map<string, EvaluatorRecord>();
  readonly scores: NewScore[] = [];

  constructor(evaluators: EvaluatorRecord[] = []) {
    for (const evaluator of evaluators) this.evaluators.set(evaluator.id, evaluator);
  }

  getEvaluator = async (evaluatorId: string): Promise<EvaluatorRecord | null> =>
    this.evaluators.get(evaluatorId) ?? null;

  createScore = async (score: NewScore): Promise<string> => {
    this.scores.push(score);
    return `score-${this.scores.length}`;
  };
}

/** Rate-limit buckets keyed by webhook and UTC hour, like the SQL adapter. */
export class InMemoryWebhookStore implements WebhookStore {
  readonly webhooks = new Map<string, Webhook>();
  readonly deliveries: NewWebhookDelivery[] = [];
  readonly buckets = new Map<string, number>();
  readonly lastTriggered = new Map<string, Date>();

  constructor(webhooks: Webhook[] = []) {
    for (const webhook of webhooks) this.webhooks.set(webhook.id, webhook);
  }

  private bucketKey(webhookId: string, at: Date): string {
    return `${webhookId}@${at.toISOString().slice(0, 13)}`;
  }

  count(webhookId: string, at: Date): number {
    return this.buckets.get(this.bucketKey(webhookId, at)) ?? 0;
  }

  getById = async (webhookId: string): Promise<Webhook | null> =>
    this.webhooks.get(webhookId) ?? null;

  listEnabledByEvent = async (
    projectId: string,
    eventType: string
  ): Promise<Webhook[]> =>
    [...this.webhooks.values()].filter(
      (w) => w.projectId === projectId && w.enabled && w.events.includes(eventType)
    );

  acquireDeliverySlot = async (
    webhookId: string,
    limitPerHour: number | null,
    at: Date
  ): Promise<boolean> => {
    if (limitPerHour !== null && limitPerHour <= 0) return false;
    const key = this.bucketKey(webhookId, at);
    const current = this.buckets.get(key) ?? 0;
    if (limitPerHour !== null && current >= limitPerHour) return false;
    this.buckets.set(key, current + 1);
    return true;
  };

  releaseDeliverySlot = async (webhookId: string, at: Date): Promise<void> => {
    const key = this.bucketKey(webhookId, at);
    this.buckets.set(key, Math.max(0, (this.buckets.get(key) ?? 0) - 1));
  };

  updateLastTriggered = async (webhookId: string, at: Date): Promise<void> => {
    this.lastTriggered.set(webhookId, at);
  };

  createDelivery = async (delivery: NewWebhookDelivery): Promise<string> => {
    this.deliveries.push(delivery);
    return `delivery-${this.deliveries.length}`;
  };
}

export class InMemoryCostWriter implements ObservationCostWriter {
  readonly writes = new Map<string, ObservationCosts>();
  /** Project each write was scoped to, by observation id. */
  readonly projects = new Map<string, string>();

  updateObservationCosts = async (
    projectId: string,
    observationId: string,
    costs: ObservationCosts
  ): Promise<void> => {
    this.writes.set(observationId, costs);
    this.projects.set(observationId, projectId);
  };
}

export const GPT_4O_PRICING: ModelPricing = {
  model: "gpt-4o",
  provider: "openai",
  inputPricePer1k: 0.0025,
  outputPricePer1k: 0.01,
};

export interface RecordedJob {
  kind: PipelineJobKind;
  payload: unknown;
  options: JobOptions | undefined;
}

/** Producer-side fake that records every enqueue. */
export class RecordingQueue implements PipelineQueue {
  readonly jobs: RecordedJob[] = [];
  failNext = 0;

  async enqueue<K extends PipelineJobKind>(
    kind: K,
    payload: PipelineJobs[K],
    options?: JobOptions
  ): Promise<string> {
    if (this.failNext > 0) {
      this.failNext--;
      throw new Error("queue unavailable");
    }
    this.jobs.push({ kind, payload, options });
    return `job-${this.jobs.length}`;
  }
}
