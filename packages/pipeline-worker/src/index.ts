// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tally/pipeline-worker`
 * Purpose: Pipeline worker package exports.
 * Scope: Re-exports job kinds, payload schemas, tasks, adapters, dispatcher, producers and bootstrap. Does not contain implementations.
 * Invariants: No imports of pino, drizzle or prom-client; the service wires those in.
 * Side-effects: none
 * @public
 */

export {
  type FetchWebhookSenderConfig,
  createFetchWebhookSender,
  MAX_RESPONSE_BODY_CHARS,
  WEBHOOK_TIMEOUT_MS,
  type WebhookRequest,
  type WebhookResponse,
  type WebhookSender,
} from "./adapters/webhook-sender";
export {
  type JudgeClient,
  type JudgeRequest,
  OpenAiJudgeClient,
  type OpenAiJudgeClientConfig,
} from "./adapters/openai-judge.client";
export { isWebhookDeliveryError, WebhookDeliveryError } from "./errors";
export {
  DAILY_AGGREGATION_CRON,
  DAILY_COST_REPORT_CRON,
  JOB_DEFAULTS,
  type JobDefaults,
  type PipelineJobKind,
  type PipelineJobs,
} from "./jobs";
export {
  CIRCUIT_OPEN_DELIVERY_ERROR,
  createWebhookBreakerRegistry,
  type DeliveryOutcome,
  type DispatchAttempt,
  type DispatchResult,
  type DispatchSkipReason,
  isBreakerCountableDeliveryError,
  NotificationDispatcher,
  type NotificationDispatcherDeps,
  WEBHOOK_BREAKER_DEFAULTS,
  WEBHOOK_BREAKER_MAX_HOSTS,
} from "./notifications/dispatcher";
export {
  enqueueBatchEvaluation,
  enqueueCostCalculation,
  enqueueEvaluation,
  enqueueNotification,
  enqueuePipelineJob,
  enqueueThresholdCheck,
  type NotifyProjectDeps,
  notifyProject,
  type PipelineQueue,
} from "./producers";
export * from "./schemas/payloads";
export {
  type BatchCostResult,
  type CostCalculationResult,
  type CostTaskDeps,
  createBatchCostTask,
  createCostCalculationTask,
  createDailyAggregationTask,
  type DailyAggregationResult,
  type ProjectDailyCost,
} from "./tasks/cost";
export {
  type BatchEvaluationResult,
  createBatchEvaluationTask,
  createEvaluationTask,
  type EvaluationOutcome,
  type EvaluationTaskDeps,
  runEvaluation,
} from "./tasks/evaluation";
export {
  createDailyCostReportTask,
  createSendNotificationTask,
  createThresholdCheckTask,
  type DailyCostReportResult,
  type NotificationTaskDeps,
} from "./tasks/notification";
export {
  createPipelineHandlers,
  type PipelineBackend,
  type PipelineDeps,
  type PipelineWorker,
  type PipelineWorkerConfig,
  startPipelineWorker,
} from "./worker";
