// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tally/task-queue/graphile-queue`
 * Purpose: Durable Postgres-backed job queue on Graphile Worker with weighted priority lanes.
 * Scope: Enqueue via WorkerUtils.addJob, one runner per lane, shared attempt wrapper. Does not contain task logic.
 * Invariants:
 * - Lanes are job flags (`lane:<name>`); each runner forbids the other lanes' flags
 * - Runner concurrency is split 6:3:1 across lanes, at least one slot each
 * - maxAttempts = maxRetries + 1; delayMs becomes runAt
 * - Stored payload is an envelope { payload, timeoutMs } so the attempt timeout survives the round-trip
 * - Non-retryable failures (and rows that are not envelopes) are reported and then completed, so Graphile never retries them
 * - Graphile's shutdown signal aborts running handlers; the interrupted job is handed back to Graphile unreported
 * Side-effects: IO (Postgres connections, Graphile Worker runners)
 * @public
 */

import {
  makeWorkerUtils,
  type Runner,
  run,
  type Task,
  type TaskList,
  type WorkerUtils,
} from "graphile-worker";
import { z } from "zod";

import {
  isNonRetryableJobError,
  isQueueShutdownError,
  parsePayload,
} from "./errors";
import { errorMessage, runAttempt } from "./execute";
import { laneFlag, splitConcurrency } from "./lanes";
import {
  type HandlerMap,
  type JobHandler,
  type JobHooks,
  type JobKind,
  type JobMap,
  type JobOptions,
  type JobQueue,
  type JobRunner,
  LANES,
  type Lane,
  type LoggerLike,
  resolveJobOptions,
} from "./types";

const JobEnvelopeSchema = z.object({
  payload: z.unknown(),
  timeoutMs: z.number().int().positive(),
});

export interface GraphileJobQueueConfig<M extends JobMap> {
  /** PostgreSQL connection string */
  connectionString: string;
  handlers: HandlerMap<M>;
  logger: LoggerLike;
  hooks?: JobHooks;
  /** Poll interval in ms (default: 1000) */
  pollInterval?: number;
}

export class GraphileJobQueue<M extends JobMap>
  implements JobQueue<M>, JobRunner
{
  private utils: WorkerUtils | null = null;
  private runners: Runner[] = [];

  constructor(private readonly config: GraphileJobQueueConfig<M>) {}

  async enqueue<K extends JobKind<M>>(
    kind: K,
    payload: M[K],
    options?: JobOptions
  ): Promise<string> {
    const resolved = resolveJobOptions(options);
    const utils = await this.workerUtils();
    const job = await utils.addJob<string>(
      kind,
      { payload, timeoutMs: resolved.timeoutMs },
      {
        maxAttempts: resolved.maxRetries + 1,
        flags: [laneFlag(resolved.lane)],
        ...(resolved.delayMs > 0
          ? { runAt: new Date(Date.now() + resolved.delayMs) }
          : {}),
        ...(resolved.jobKey !== undefined
          ? { jobKey: resolved.jobKey, jobKeyMode: "replace" as const }
          : {}),
      }
    );
    return String(job.id);
  }

  async start(concurrency: number): Promise<void> {
    const { connectionString, logger, pollInterval = 1000 } = this.config;
    const split = splitConcurrency(concurrency);

    logger.info({ split }, "Starting Graphile job runners");

    this.runners = await Promise.all(
      LANES.map((lane) =>
        run({
          connectionString,
          concurrency: split[lane],
          pollInterval,
          noHandleSignals: true,
          taskList: this.taskListFor(lane),
          forbiddenFlags: LANES.filter((other) => other !== lane).map(laneFlag),
        })
      )
    );

    logger.info({}, "Graphile job runners started");
  }

  async stop(): Promise<void> {
    this.config.logger.info({}, "Stopping Graphile job runners");
    await Promise.all(this.runners.map((runner) => runner.stop()));
    this.runners = [];
    if (this.utils) {
      await this.utils.release();
      this.utils = null;
    }
  }

  private async workerUtils(): Promise<WorkerUtils> {
    if (!this.utils) {
      this.utils = await makeWorkerUtils({
        connectionString: this.config.connectionString,
      });
    }
    return this.utils;
  }

  private taskListFor(lane: Lane): TaskList {
    const taskList: TaskList = {};
    for (const [kind, handler] of Object.entries<JobHandler>(
      this.config.handlers
    )) {
      taskList[kind] = this.wrap(kind, lane, handler);
    }
    return taskList;
  }

  private wrap(kind: string, lane: Lane, handler: JobHandler): Task {
    const { logger, hooks } = this.config;

    const reportFailure = (
      jobId: string,
      attempts: number,
      payload: unknown,
      error: unknown
    ): void => {
      logger.error(
        { jobId, kind, attempts, error: errorMessage(error) },
        "Job failed permanently"
      );
      hooks?.onJobFailed?.({
        jobId,
        kind,
        lane,
        payload,
        attempts,
        error,
        failedAt: new Date(),
      });
    };

    return async (rawPayload, helpers) => {
      const { job } = helpers;
      const jobId = String(job.id);

      let envelope: z.infer<typeof JobEnvelopeSchema>;
      try {
        envelope = parsePayload(kind, JobEnvelopeSchema, rawPayload);
      } catch (error) {
        // A row that is not an envelope will never parse; complete it.
        reportFailure(jobId, job.attempts, rawPayload, error);
        return;
      }

      const result = await runAttempt(
        handler,
        envelope.payload,
        {
          jobId,
          kind,
          lane,
          attempt: job.attempts,
          maxAttempts: job.max_attempts,
        },
        envelope.timeoutMs,
        Date.now,
        helpers.abortSignal
      );

      if (result.outcome !== "completed" && isQueueShutdownError(result.error)) {
        logger.info(
          { jobId, kind, attempt: job.attempts },
          "Job attempt interrupted by shutdown"
        );
        throw result.error;
      }

      hooks?.onJobSettled?.({
        jobId,
        kind,
        lane,
        attempt: job.attempts,
        ...result,
      });

      if (result.outcome === "completed") return;

      if (result.outcome === "failed") {
        reportFailure(jobId, job.attempts, envelope.payload, result.error);
        // Completing the job is how Graphile is told not to retry.
        if (isNonRetryableJobError(result.error)) return;
      }

      throw result.error;
    };
  }
}
