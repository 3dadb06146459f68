// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tally/pipeline-worker/adapters/openai-judge`
 * Purpose: Chat-completion client for the LLM judge (OpenAI-compatible `/v1/chat/completions`).
 * Scope: One non-streaming completion with JSON response format; maps transport and HTTP failures to LlmError. Does not parse the verdict or apply the circuit breaker.
 * Invariants:
 * - Never logs prompts, completions or the API key
 * - Request aborts on the 60s request timeout or the caller's signal, whichever fires first
 * - Caller abort → LlmError(kind='aborted'); request timeout → LlmError(kind='timeout')
 * - Transport failures while reading the body map the same way as failures of the request
 * - Non-2xx → LlmError classified by status; only the client deadline yields kind='timeout'
 * Side-effects: IO (HTTP)
 * @internal
 */

import {
  classifyLlmErrorFromStatus,
  JUDGE_MAX_TOKENS,
  JUDGE_REQUEST_TIMEOUT_MS,
  JUDGE_TEMPERATURE,
  type JudgeMessage,
  LlmError,
} from "@tally/pipeline-core";
import { z } from "zod";

export interface JudgeRequest {
  model: string;
  messages: readonly JudgeMessage[];
}

export interface JudgeClient {
  /** Resolves with the first choice's message content. */
  complete(request: JudgeRequest, signal?: AbortSignal): Promise<string>;
}

export interface OpenAiJudgeClientConfig {
  apiKey: string;
  /** e.g. https://api.openai.com (no trailing /v1) */
  baseUrl: string;
  timeoutMs?: number;
  fetch?: typeof fetch;
}

const ChatCompletionResponseSchema = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullable() }) }))
    .optional(),
  error: z.object({ message: z.string() }).nullish(),
});

const MAX_ERROR_BODY_CHARS = 500;

export class OpenAiJudgeClient implements JudgeClient {
  private readonly endpoint: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly config: OpenAiJudgeClientConfig) {
    this.endpoint = `${config.baseUrl.replace(/\/+$/, "")}/v1/chat/completions`;
    this.timeoutMs = config.timeoutMs ?? JUDGE_REQUEST_TIMEOUT_MS;
    this.fetchImpl = config.fetch ?? fetch;
  }

  async complete(request: JudgeRequest, signal?: AbortSignal): Promise<string> {
    const timeoutSignal = AbortSignal.timeout(this.timeoutMs);
    const combined = signal
      ? AbortSignal.any([timeoutSignal, signal])
      : timeoutSignal;

    let response: Response;
    let text: string;
    try {
      response = await this.fetchImpl(this.endpoint, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Authorization: `Bearer ${this.config.apiKey}`,
        },
        body: JSON.stringify({
          model: request.model,
          messages: request.messages,
          temperature: JUDGE_TEMPERATURE,
          max_tokens: JUDGE_MAX_TOKENS,
          response_format: { type: "json_object" },
        }),
        signal: combined,
      });
      text = await response.text();
    } catch (error) {
      if (signal?.aborted) {
        throw new LlmError("Judge request aborted", "aborted");
      }
      if (timeoutSignal.aborted) {
        throw new LlmError("Judge request timed out", "timeout");
      }
      throw new LlmError(
        `Judge network error: ${error instanceof Error ? error.message : String(error)}`,
        "unknown"
      );
    }

    if (!response.ok) {
      throw new LlmError(
        `Judge API error (status ${response.status}): ${text.slice(0, MAX_ERROR_BODY_CHARS)}`,
        classifyLlmErrorFromStatus(response.status),
        response.status
      );
    }

    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch {
      throw new LlmError("Judge returned a non-JSON response body", "unknown");
    }

    const parsed = ChatCompletionResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new LlmError("Invalid response from judge", "unknown");
    }
    if (parsed.data.error) {
      throw new LlmError(`Judge error: ${parsed.data.error.message}`, "unknown");
    }

    const content = parsed.data.choices?.[0]?.message.content;
    if (content === undefined || content === null) {
      throw new LlmError("Judge response has no choices", "unknown");
    }
    return content;
  }
}
