// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tally/pipeline-worker-service/redact`
 * Purpose: Redaction paths for sensitive data in logs.
 * Scope: Define paths to redact from log output. Does not implement redaction logic.
 * Invariants: Only redact known secret-bearing keys (not generic "url").
 * Side-effects: none
 * Links: Imported by observability/logger.ts
 * @internal
 */

export const REDACT_PATHS = [
  // Auth & secrets
  "password",
  "token",
  "secret",
  "apiKey",
  "api_key",
  // Pipeline secrets
  "judgeApiKey",
  "config.JUDGE_API_KEY",
  "webhook.secret",
  "DATABASE_URL",
  "connectionString",
  // HTTP headers
  "headers.authorization",
  "headers.Authorization",
  "headers.cookie",
  'headers["X-Tally-Signature"]',
];
