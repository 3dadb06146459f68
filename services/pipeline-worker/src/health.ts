// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tally/pipeline-worker-service/health`
 * Purpose: Health endpoint HTTP server for orchestrator probes and Prometheus scrapes.
 * Scope: /livez (liveness), /readyz (readiness), /metrics, /version endpoints.
 * Invariants:
 * - /livez always returns 200 (process alive)
 * - /readyz returns 200 only when ready=true, 503 otherwise
 * - /metrics returns the registry in Prometheus text format
 * Side-effects: Binds HTTP server to HEALTH_PORT
 * @internal
 */

import { createServer, type IncomingMessage, type Server, type ServerResponse } from "node:http";

import type { Registry } from "prom-client";

export interface HealthState {
  ready: boolean;
}

/** Build metadata from env vars (set at build time or runtime) */
const versionInfo = {
  sha: process.env.GIT_SHA ?? "unknown",
  service: "pipeline-worker",
  buildTs: process.env.BUILD_TS ?? "unknown",
};

function text(res: ServerResponse, status: number, body: string): void {
  res.writeHead(status, { "Content-Type": "text/plain" });
  res.end(body);
}

async function route(
  state: HealthState,
  registry: Registry,
  req: IncomingMessage,
  res: ServerResponse
): Promise<void> {
  switch (req.url) {
    case "/livez":
      text(res, 200, "ok");
      return;
    case "/readyz":
      if (state.ready) text(res, 200, "ok");
      else text(res, 503, "not ready");
      return;
    case "/metrics": {
      const body = await registry.metrics();
      res.writeHead(200, { "Content-Type": registry.contentType });
      res.end(body);
      return;
    }
    case "/version":
      res.writeHead(200, { "Content-Type": "application/json" });
      res.end(JSON.stringify(versionInfo));
      return;
    default:
      text(res, 404, "not found");
  }
}

export function createHealthServer(state: HealthState, registry: Registry): Server {
  return createServer((req, res) => {
    route(state, registry, req, res).catch(() => {
      text(res, 500, "metrics unavailable");
    });
  });
}

export function startHealthServer(
  state: HealthState,
  registry: Registry,
  port: number
): Server {
  const server = createHealthServer(state, registry);
  server.listen(port);
  return server;
}
