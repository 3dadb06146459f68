// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tally/pipeline-worker-service/bootstrap/container`
 * Purpose: Composition root: wires concrete adapters, clients and metrics hooks to the pipeline ports.
 * Scope: All adapter construction lives here. Returns the deps the worker runs against and the queue factory.
 * Invariants:
 * - Only file that imports concrete adapter packages (@tally/db-client)
 * - Judge client exists only when JUDGE_API_KEY is set
 * - Every breaker reports state changes to metrics
 * Side-effects: Creates DB connection pool (connects lazily on first query)
 * @internal
 */

import { CircuitBreaker } from "@tally/circuit-breaker";
import {
  createPipelineDbClient,
  type Database,
  DrizzleEvaluatorStore,
  DrizzleObservationCostWriter,
  DrizzlePricingOverrides,
  DrizzleScoreWriter,
  DrizzleTraceReader,
  DrizzleWebhookStore,
} from "@tally/db-client";
import {
  createPricingCatalog,
  isBreakerCountableLlmError,
} from "@tally/pipeline-core";
import {
  createFetchWebhookSender,
  createWebhookBreakerRegistry,
  NotificationDispatcher,
  OpenAiJudgeClient,
  type PipelineBackend,
  type PipelineDeps,
  type PipelineJobs,
} from "@tally/pipeline-worker";
import {
  GraphileJobQueue,
  type HandlerMap,
  InProcessJobQueue,
} from "@tally/task-queue";

import type { PipelineMetrics } from "../metrics";
import type { Logger } from "../observability/logger";
import type { Env } from "./env";

export interface ServiceContainer {
  db: Database;
  deps: PipelineDeps;
  createQueue: (handlers: HandlerMap<PipelineJobs>) => PipelineBackend;
}

/**
 * Build the service container from validated env, logger and metrics.
 * This is the only place that instantiates concrete adapters.
 */
export function createContainer(
  config: Env,
  logger: Logger,
  metrics: PipelineMetrics
): ServiceContainer {
  const db = createPipelineDbClient(config.DATABASE_URL);
  const webhooks = new DrizzleWebhookStore(db);
  const evaluatorStore = new DrizzleEvaluatorStore(db);

  const judge = config.JUDGE_API_KEY
    ? new OpenAiJudgeClient({
        apiKey: config.JUDGE_API_KEY,
        baseUrl: config.JUDGE_BASE_URL,
      })
    : null;
  if (!judge) {
    logger.warn({}, "JUDGE_API_KEY not set, LLM evaluators will fail with a config error");
  }

  const judgeBreaker = new CircuitBreaker({
    name: "llm-judge",
    maxFailures: config.JUDGE_BREAKER_MAX_FAILURES,
    timeoutMs: config.JUDGE_BREAKER_TIMEOUT_MS,
    isFailure: isBreakerCountableLlmError,
    onStateChange: metrics.onBreakerStateChange,
  });

  const dispatcher = new NotificationDispatcher({
    webhooks,
    send: createFetchWebhookSender({ timeoutMs: config.WEBHOOK_TIMEOUT_MS }),
    logger: logger.child({ component: "webhook-dispatcher" }),
    breakers: createWebhookBreakerRegistry(
      { onStateChange: metrics.onBreakerStateChange },
      { onEvict: metrics.onBreakerEvicted }
    ),
    onDelivery: metrics.onDelivery,
    ...(config.DASHBOARD_URL !== undefined
      ? { dashboardUrl: config.DASHBOARD_URL }
      : {}),
  });

  const deps: PipelineDeps = {
    traces: new DrizzleTraceReader(db),
    evaluators: evaluatorStore,
    scores: new DrizzleScoreWriter(db),
    webhooks,
    pricing: createPricingCatalog({ overrides: new DrizzlePricingOverrides(db) }),
    costs: new DrizzleObservationCostWriter(db),
    judge,
    judgeBreaker,
    defaultModel: config.JUDGE_DEFAULT_MODEL,
    dispatcher,
  };

  const queueLogger = logger.child({ component: "queue" });
  const createQueue = (handlers: HandlerMap<PipelineJobs>): PipelineBackend =>
    config.QUEUE_BACKEND === "memory"
      ? new InProcessJobQueue({ handlers, logger: queueLogger, hooks: metrics.jobHooks })
      : new GraphileJobQueue({
          connectionString: config.DATABASE_URL,
          handlers,
          logger: queueLogger,
          hooks: metrics.jobHooks,
          pollInterval: config.QUEUE_POLL_INTERVAL_MS,
        });

  return { db, deps, createQueue };
}
