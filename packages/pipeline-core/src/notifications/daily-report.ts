// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tally/pipeline-core/notifications/daily-report`
 * Purpose: Notification data for the `daily.cost_report` event.
 * Scope: Shapes a DailyCostSummary for webhook delivery. Does not query or enqueue.
 * Side-effects: none
 * @public
 */

import type { DailyCostSummary } from "../cost/cost";
import type { NotificationData } from "./payloads";

export const DAILY_REPORT_TOP_MODELS = 5;

export function dailyCostReportData(
  projectId: string,
  date: string,
  summary: DailyCostSummary
): NotificationData {
  return {
    projectId,
    date,
    totalCost: summary.totalCost,
    traceCount: summary.traceCount,
    observationCount: summary.observationCount,
    topModels: summary.models.slice(0, DAILY_REPORT_TOP_MODELS),
  };
}
