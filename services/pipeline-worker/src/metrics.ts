// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tally/pipeline-worker-service/metrics`
 * Purpose: Prometheus registry and pipeline metric definitions, plus the hooks that feed them.
 * Scope: Metric definitions and recording hooks for the queue, breakers and webhook dispatcher. Does not serve HTTP.
 * Invariants:
 * - Labels are low-cardinality (job kind, outcome, breaker name); one registry per createPipelineMetrics call
 * - A breaker's series is removed when its registry evicts it
 * Side-effects: none (default process metrics only when requested)
 * Links: health.ts (/metrics), bootstrap/container.ts
 * @public
 */

import type { CircuitState } from "@tally/circuit-breaker";
import type { DeliveryOutcome } from "@tally/pipeline-worker";
import type { JobHooks } from "@tally/task-queue";
import client, { type Counter, type Gauge, type Histogram, type Registry } from "prom-client";

export const BREAKER_STATE_VALUE: Readonly<Record<CircuitState, number>> = {
  closed: 0,
  half_open: 1,
  open: 2,
};

export interface PipelineMetrics {
  registry: Registry;
  jobsTotal: Counter<"kind" | "outcome">;
  jobDurationMs: Histogram<"kind">;
  breakerState: Gauge<"breaker">;
  webhookDeliveriesTotal: Counter<"outcome">;
  /** Queue hooks recording every attempt's outcome and duration. */
  jobHooks: JobHooks;
  onBreakerStateChange: (name: string, from: CircuitState, to: CircuitState) => void;
  onBreakerEvicted: (name: string) => void;
  onDelivery: (outcome: DeliveryOutcome) => void;
}

export interface PipelineMetricsOptions {
  /** Also collect Node.js process metrics (default: false) */
  defaultMetrics?: boolean;
  defaultLabels?: Record<string, string>;
}

export function createPipelineMetrics(
  options: PipelineMetricsOptions = {}
): PipelineMetrics {
  const registry = new client.Registry();
  if (options.defaultLabels) registry.setDefaultLabels(options.defaultLabels);
  if (options.defaultMetrics) client.collectDefaultMetrics({ register: registry });

  const jobsTotal = new client.Counter({
    name: "pipeline_jobs_total",
    help: "Job attempts settled, by kind and outcome",
    labelNames: ["kind", "outcome"],
    registers: [registry],
  });

  const jobDurationMs = new client.Histogram({
    name: "pipeline_job_duration_ms",
    help: "Job attempt duration in milliseconds",
    labelNames: ["kind"],
    buckets: [10, 50, 100, 250, 500, 1000, 2500, 5000, 10000, 30000, 60000, 300000],
    registers: [registry],
  });

  const breakerState = new client.Gauge({
    name: "pipeline_circuit_breaker_state",
    help: "Circuit breaker state (0 closed, 1 half-open, 2 open)",
    labelNames: ["breaker"],
    registers: [registry],
  });

  const webhookDeliveriesTotal = new client.Counter({
    name: "pipeline_webhook_deliveries_total",
    help: "Webhook dispatch results by outcome",
    labelNames: ["outcome"],
    registers: [registry],
  });

  return {
    registry,
    jobsTotal,
    jobDurationMs,
    breakerState,
    webhookDeliveriesTotal,
    jobHooks: {
      onJobSettled: ({ kind, outcome, durationMs }) => {
        jobsTotal.inc({ kind, outcome });
        jobDurationMs.observe({ kind }, durationMs);
      },
    },
    onBreakerStateChange: (name, _from, to) => {
      breakerState.set({ breaker: name }, BREAKER_STATE_VALUE[to]);
    },
    onBreakerEvicted: (name) => {
      breakerState.remove({ breaker: name });
    },
    onDelivery: (outcome) => {
      webhookDeliveriesTotal.inc({ outcome });
    },
  };
}
