// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tally/pipeline-worker-service/main`
 * Purpose: Service entry point with graceful shutdown.
 * Scope: Calls env(), builds the container and starts the pipeline worker. Does not contain business logic.
 * Invariants:
 *   - Reads config from env (no hardcoded values)
 *   - Handles SIGTERM/SIGINT for graceful shutdown
 *   - ready=false as soon as shutdown begins
 *   - Shutdown order: cron, queue, then DB pool
 * Side-effects: IO (DB pool, queue runners, HTTP health server, process signals)
 * @public
 */

import { closeDbClient } from "@tally/db-client";
import { startPipelineWorker } from "@tally/pipeline-worker";

import { createContainer } from "./bootstrap/container";
import { env } from "./bootstrap/env";
import { type HealthState, startHealthServer } from "./health";
import { createPipelineMetrics } from "./metrics";
import { flushLogger, makeLogger } from "./observability/logger";

async function main(): Promise<void> {
  const config = env();
  const logger = makeLogger();

  logger.info(
    { logLevel: config.LOG_LEVEL, queueBackend: config.QUEUE_BACKEND },
    "Starting pipeline worker service"
  );

  const metrics = createPipelineMetrics({
    defaultMetrics: true,
    defaultLabels: { service: config.SERVICE_NAME },
  });

  const healthState: HealthState = { ready: false };
  const healthServer = startHealthServer(healthState, metrics.registry, config.HEALTH_PORT);
  logger.info({ port: config.HEALTH_PORT }, "Health server started");

  const container = createContainer(config, logger, metrics);
  const worker = await startPipelineWorker({
    logger,
    deps: container.deps,
    createQueue: container.createQueue,
    concurrency: config.WORKER_CONCURRENCY,
    schedules: config.CRON_ENABLED,
  });

  healthState.ready = true;
  logger.info(
    { concurrency: config.WORKER_CONCURRENCY, cronEnabled: config.CRON_ENABLED },
    "Pipeline worker ready for traffic"
  );

  let shuttingDown = false;

  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      logger.warn({ signal }, "Shutdown already in progress");
      return;
    }
    shuttingDown = true;
    healthState.ready = false;
    logger.info({ signal }, "Received signal, shutting down");

    try {
      await worker.stop();
      await closeDbClient(container.db);
      healthServer.close();
      logger.info({}, "Pipeline worker stopped");
      flushLogger();
      process.exit(0);
    } catch (err) {
      logger.error({ err }, "Error during shutdown");
      flushLogger();
      process.exit(1);
    }
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
}

const bootLogger = makeLogger({ phase: "boot" });

main().catch((err: unknown) => {
  bootLogger.fatal({ err }, "Fatal error during startup");
  flushLogger();
  process.exit(1);
});
