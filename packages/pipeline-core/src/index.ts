// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tally/pipeline-core`
 * Purpose: Pipeline domain package exports.
 * Scope: Re-exports domain types, ports, errors, evaluation, cost and notification logic. Does not perform IO.
 * Invariants: No imports of pino, drizzle or HTTP clients; adapters live in @tally/db-client and @tally/pipeline-worker.
 * Side-effects: none
 * @public
 */

export {
  aggregateDailyCost,
  type CostSkipReason,
  calculateCost,
  costSkipReason,
  type DailyCostSummary,
  type ModelCost,
  parseUtcDay,
  previousUtcDay,
  type UtcDay,
} from "./cost/cost";
export {
  createPricingCatalog,
  loadDefaultPricing,
  matchPricing,
  normalizeModelName,
  type PricingCatalogOptions,
} from "./cost/pricing";
export {
  EVALUATOR_TYPES,
  type EvaluatorRecord,
  type EvaluatorType,
  type ModelPricing,
  type NewScore,
  type NewWebhookDelivery,
  type Observation,
  type ObservationCosts,
  SCORE_DATA_TYPES,
  type ScoreDataType,
  type Trace,
  WEBHOOK_EVENT_TYPES,
  WEBHOOK_TYPES,
  type Webhook,
  type WebhookEventType,
  type WebhookType,
} from "./domain/types";
export {
  classifyLlmErrorFromStatus,
  EvaluatorConfigError,
  isBreakerCountableLlmError,
  isEvaluatorConfigError,
  isJudgeResponseParseError,
  isLlmError,
  JudgeResponseParseError,
  LlmError,
  type LlmErrorKind,
} from "./errors";
export {
  buildJudgeScore,
  buildRuleScore,
  type EvaluationPlan,
  planEvaluation,
} from "./evaluation/evaluator";
export {
  buildJudgeMessages,
  buildJudgeSystemPrompt,
  JUDGE_MAX_TOKENS,
  JUDGE_REQUEST_TIMEOUT_MS,
  JUDGE_TEMPERATURE,
  type JudgeMessage,
} from "./evaluation/judge-prompt";
export {
  clampScore,
  type JudgeVerdict,
  parseJudgeVerdict,
  type VerdictScoreFields,
  verdictToScoreFields,
} from "./evaluation/judge-response";
export {
  codePointLength,
  evaluateRule,
  parseRuleConfig,
  RULE_TARGETS,
  type RuleConfig,
  type RuleResult,
  type RuleTarget,
  resolveRuleTarget,
} from "./evaluation/rules";
export {
  buildTemplateVariables,
  renderPromptTemplate,
  type TemplateVariables,
} from "./evaluation/template";
export {
  DAILY_REPORT_TOP_MODELS,
  dailyCostReportData,
} from "./notifications/daily-report";
export {
  buildGenericPayload,
  buildSlackPayload,
  buildWebhookHeaders,
  type GenericNotificationPayload,
  type NotificationData,
  type PayloadContext,
  renderWebhookBody,
  SIGNATURE_HEADER,
  type SlackAttachment,
  type SlackMessage,
  signPayload,
  WEBHOOK_USER_AGENT,
} from "./notifications/payloads";
export {
  costThresholdCrossing,
  latencyThresholdCrossing,
  type ThresholdCrossing,
} from "./notifications/thresholds";
export type {
  EvaluatorStore,
  ObservationCostWriter,
  PricingCatalog,
  PricingOverrideSource,
  ScoreWriter,
  TraceReader,
  WebhookStore,
} from "./ports";
