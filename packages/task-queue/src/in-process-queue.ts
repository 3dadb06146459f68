// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tally/task-queue/in-process-queue`
 * Purpose: Memory-backed job queue with a fixed worker pool shared by three weighted lanes.
 * Scope: Enqueue, lane selection, per-attempt timeout, retry with backoff, failed-job archive. Does not persist jobs.
 * Invariants:
 * - At most `concurrency` attempts run at once
 * - Lane picks follow LanePicker (6:3:1 under saturation, no starvation)
 * - A job runs at most maxRetries + 1 times, then lands in the failed archive
 * - jobKey replaces a still-queued or still-delayed job with the same key
 * - stop() aborts every running attempt with QueueShutdownError; an interrupted attempt is not counted
 * - The failed archive keeps the newest maxFailedJobs entries
 * Side-effects: timers (delays, retries, attempt timeouts)
 * Notes: For single-process deployments and tests. Durable deployments use GraphileJobQueue.
 * @public
 */

import { randomUUID } from "node:crypto";

import { isQueueShutdownError, QueueShutdownError } from "./errors";
import {
  type AttemptResult,
  defaultRetryDelay,
  errorMessage,
  runAttempt,
} from "./execute";
import { LanePicker } from "./lanes";
import {
  type HandlerMap,
  type JobFailure,
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
  type ResolvedJobOptions,
  resolveJobOptions,
} from "./types";

interface QueuedJob {
  id: string;
  kind: string;
  payload: unknown;
  options: ResolvedJobOptions;
  attemptsMade: number;
}

export interface InProcessJobQueueConfig<M extends JobMap> {
  handlers: HandlerMap<M>;
  logger: LoggerLike;
  hooks?: JobHooks;
  /** Delay before retry number `attempt` (1-based). Defaults to capped exponential backoff. */
  retryDelay?: (attempt: number) => number;
  /** Size of the failed-job archive; the oldest entries are dropped first. Default 1000. */
  maxFailedJobs?: number;
  now?: () => number;
}

export const DEFAULT_MAX_FAILED_JOBS = 1000;

export class InProcessJobQueue<M extends JobMap>
  implements JobQueue<M>, JobRunner
{
  private readonly lanes: Record<Lane, QueuedJob[]> = {
    critical: [],
    default: [],
    low: [],
  };
  private readonly picker = new LanePicker();
  private readonly timers = new Set<ReturnType<typeof setTimeout>>();
  /** Delayed first runs by jobKey, so a replacement can cancel the timer. */
  private readonly delayedByKey = new Map<string, ReturnType<typeof setTimeout>>();
  private readonly inFlight = new Set<Promise<void>>();
  private readonly attempts = new Set<AbortController>();
  private readonly failed: JobFailure[] = [];
  private readonly handlers: ReadonlyMap<string, JobHandler>;
  private idleWaiters: Array<() => void> = [];
  private concurrency = 0;
  private running = false;

  constructor(private readonly config: InProcessJobQueueConfig<M>) {
    const entries: Array<[string, JobHandler]> = Object.entries(
      config.handlers
    );
    this.handlers = new Map(entries);
  }

  async enqueue<K extends JobKind<M>>(
    kind: K,
    payload: M[K],
    options?: JobOptions
  ): Promise<string> {
    const resolved = resolveJobOptions(options);
    const job: QueuedJob = {
      id: randomUUID(),
      kind,
      payload,
      options: resolved,
      attemptsMade: 0,
    };

    const { jobKey } = resolved;
    if (jobKey !== undefined) {
      this.dropQueuedByKey(jobKey);
    }

    if (resolved.delayMs > 0) {
      const fire = (): void => {
        if (jobKey !== undefined && this.delayedByKey.get(jobKey) === timer) {
          this.delayedByKey.delete(jobKey);
        }
        this.push(job);
      };
      const timer = this.later(resolved.delayMs, fire);
      if (jobKey !== undefined) this.delayedByKey.set(jobKey, timer);
    } else {
      this.push(job);
    }
    return job.id;
  }

  async start(concurrency: number): Promise<void> {
    this.concurrency = Math.max(1, concurrency);
    this.running = true;
    this.config.logger.info(
      { concurrency: this.concurrency },
      "In-process job queue started"
    );
    this.dispatch();
  }

  async stop(): Promise<void> {
    this.running = false;
    for (const timer of this.timers) clearTimeout(timer);
    this.timers.clear();
    this.delayedByKey.clear();
    const reason = new QueueShutdownError();
    for (const controller of this.attempts) controller.abort(reason);
    await Promise.all([...this.inFlight]);
    this.config.logger.info(
      { abandoned: this.queuedCount() },
      "In-process job queue stopped"
    );
  }

  /** Resolves once nothing is queued, delayed or running. */
  onIdle(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  failedJobs(): readonly JobFailure[] {
    return this.failed;
  }

  queuedCount(lane?: Lane): number {
    if (lane) return this.lanes[lane].length;
    return LANES.reduce((sum, l) => sum + this.lanes[l].length, 0);
  }

  private push(job: QueuedJob): void {
    this.lanes[job.options.lane].push(job);
    this.dispatch();
  }

  private dropQueuedByKey(jobKey: string): void {
    const delayed = this.delayedByKey.get(jobKey);
    if (delayed !== undefined) {
      clearTimeout(delayed);
      this.timers.delete(delayed);
      this.delayedByKey.delete(jobKey);
    }
    for (const lane of LANES) {
      this.lanes[lane] = this.lanes[lane].filter(
        (queued) => queued.options.jobKey !== jobKey
      );
    }
  }

  private later(
    delayMs: number,
    fn: () => void
  ): ReturnType<typeof setTimeout> {
    const timer = setTimeout(() => {
      this.timers.delete(timer);
      fn();
    }, delayMs);
    this.timers.add(timer);
    return timer;
  }

  private dispatch(): void {
    while (this.running && this.inFlight.size < this.concurrency) {
      const lane = this.picker.pick((l) => this.lanes[l].length > 0);
      if (lane === undefined) break;
      const job = this.lanes[lane].shift();
      if (!job) break;

      const attempt = this.process(job)
        .catch((error: unknown) => {
          this.config.logger.error(
            { jobId: job.id, kind: job.kind, error: errorMessage(error) },
            "Job processing failed outside its handler"
          );
        })
        .finally(() => {
          this.inFlight.delete(attempt);
          this.dispatch();
          this.notifyIfIdle();
        });
      this.inFlight.add(attempt);
    }
    this.notifyIfIdle();
  }

  private async process(job: QueuedJob): Promise<void> {
    const { logger, hooks } = this.config;
    const attempt = job.attemptsMade + 1;
    const maxAttempts = job.options.maxRetries + 1;
    job.attemptsMade = attempt;

    const handler = this.handlers.get(job.kind);
    if (!handler) {
      throw new Error(`No handler registered for job kind "${job.kind}"`);
    }

    const controller = new AbortController();
    this.attempts.add(controller);
    let result: AttemptResult;
    try {
      result = await runAttempt(
        handler,
        job.payload,
        {
          jobId: job.id,
          kind: job.kind,
          lane: job.options.lane,
          attempt,
          maxAttempts,
        },
        job.options.timeoutMs,
        this.config.now,
        controller.signal
      );
    } finally {
      this.attempts.delete(controller);
    }

    if (result.outcome !== "completed" && isQueueShutdownError(result.error)) {
      job.attemptsMade = attempt - 1;
      this.lanes[job.options.lane].unshift(job);
      logger.info(
        { jobId: job.id, kind: job.kind, attempt },
        "Job attempt interrupted by shutdown"
      );
      return;
    }

    hooks?.onJobSettled?.({
      jobId: job.id,
      kind: job.kind,
      lane: job.options.lane,
      attempt,
      ...result,
    });

    if (result.outcome === "completed") {
      logger.debug?.(
        { jobId: job.id, kind: job.kind, attempt, durationMs: result.durationMs },
        "Job completed"
      );
      return;
    }

    if (result.outcome === "retrying") {
      const delayMs = (this.config.retryDelay ?? defaultRetryDelay)(attempt);
      logger.warn(
        {
          jobId: job.id,
          kind: job.kind,
          attempt,
          maxAttempts,
          retryInMs: delayMs,
          error: errorMessage(result.error),
        },
        "Job attempt failed, retrying"
      );
      if (delayMs > 0) {
        this.later(delayMs, () => this.push(job));
      } else {
        this.lanes[job.options.lane].push(job);
      }
      return;
    }

    const failure: JobFailure = {
      jobId: job.id,
      kind: job.kind,
      lane: job.options.lane,
      payload: job.payload,
      attempts: attempt,
      error: result.error,
      failedAt: new Date(),
    };
    this.failed.push(failure);
    const overflow =
      this.failed.length - (this.config.maxFailedJobs ?? DEFAULT_MAX_FAILED_JOBS);
    if (overflow > 0) this.failed.splice(0, overflow);
    logger.error(
      {
        jobId: job.id,
        kind: job.kind,
        attempts: attempt,
        error: errorMessage(result.error),
      },
      "Job failed permanently"
    );
    hooks?.onJobFailed?.(failure);
  }

  private isIdle(): boolean {
    return (
      this.queuedCount() === 0 &&
      this.inFlight.size === 0 &&
      this.timers.size === 0
    );
  }

  private notifyIfIdle(): void {
    if (!this.isIdle() || this.idleWaiters.length === 0) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }
}
