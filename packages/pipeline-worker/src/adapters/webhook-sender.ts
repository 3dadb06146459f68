// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tally/pipeline-worker/adapters/webhook-sender`
 * Purpose: HTTP POST of a rendered webhook body to a tenant-supplied URL.
 * Scope: Transport only; returns status and a bounded response body for every HTTP response. Does not interpret status, sign, or audit.
 * Invariants:
 * - Request aborts on the sender timeout or the caller's signal, whichever fires first
 * - Transport failures reject; HTTP error statuses resolve
 * - At most MAX_RESPONSE_BODY_BYTES of the response are read; the rest of the stream is canceled
 * Side-effects: IO (HTTP)
 * @internal
 */

export interface WebhookRequest {
  url: string;
  body: string;
  headers: Readonly<Record<string, string>>;
}

export interface WebhookResponse {
  statusCode: number;
  body: string;
}

export type WebhookSender = (
  request: WebhookRequest,
  signal?: AbortSignal
) => Promise<WebhookResponse>;

export const WEBHOOK_TIMEOUT_MS = 30_000;
/** Response bodies are stored in the delivery audit row; keep them bounded. */
export const MAX_RESPONSE_BODY_CHARS = 4096;
/** Upper bound on bytes pulled off the socket to fill MAX_RESPONSE_BODY_CHARS. */
export const MAX_RESPONSE_BODY_BYTES = MAX_RESPONSE_BODY_CHARS * 4;

export interface FetchWebhookSenderConfig {
  timeoutMs?: number;
  fetch?: typeof fetch;
}

export function createFetchWebhookSender(
  config: FetchWebhookSenderConfig = {}
): WebhookSender {
  const timeoutMs = config.timeoutMs ?? WEBHOOK_TIMEOUT_MS;
  const fetchImpl = config.fetch ?? fetch;

  return async (request, signal) => {
    const timeoutSignal = AbortSignal.timeout(timeoutMs);
    const response = await fetchImpl(request.url, {
      method: "POST",
      headers: { ...request.headers },
      body: request.body,
      redirect: "manual",
      signal: signal ? AbortSignal.any([timeoutSignal, signal]) : timeoutSignal,
    });
    return {
      statusCode: response.status,
      body: await readBoundedBody(response),
    };
  };
}

async function readBoundedBody(response: Response): Promise<string> {
  if (!response.body) return "";
  const reader = response.body.getReader();
  const decoder = new TextDecoder();
  let text = "";
  let bytes = 0;

  for (;;) {
    const { done, value } = await reader.read();
    if (done) {
      text += decoder.decode();
      break;
    }
    bytes += value.byteLength;
    text += decoder.decode(value, { stream: true });
    if (text.length >= MAX_RESPONSE_BODY_CHARS || bytes >= MAX_RESPONSE_BODY_BYTES) {
      await reader.cancel();
      break;
    }
  }
  return text.slice(0, MAX_RESPONSE_BODY_CHARS);
}
