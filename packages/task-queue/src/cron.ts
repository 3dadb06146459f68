// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tally/task-queue/cron`
 * Purpose: Cron-driven producer that enqueues a fresh job on every tick.
 * Scope: Next-fire computation and timer management. Does not track job completion or backlog.
 * Invariants:
 * - Every tick enqueues a new job, whatever the queue's backlog
 * - A failed enqueue is logged and the schedule keeps ticking
 * - Invalid cron expressions throw at schedule() time, not at tick time
 * Side-effects: timers
 * @public
 */

import cronParser from "cron-parser";

import { errorMessage } from "./execute";
import type {
  JobKind,
  JobMap,
  JobOptions,
  JobQueue,
  LoggerLike,
} from "./types";

/** setTimeout overflows above this; longer waits are chained. */
const MAX_TIMER_MS = 2_147_483_647;

/**
 * Computes the next run time from a cron expression and timezone.
 * Returns a date strictly after `currentDate`.
 */
export function computeNextCronTime(
  cron: string,
  timezone: string,
  currentDate: Date = new Date()
): Date {
  const interval = cronParser.parseExpression(cron, {
    currentDate,
    tz: timezone,
  });
  return interval.next().toDate();
}

export interface CronScheduleOptions extends JobOptions {
  /** IANA timezone the expression is evaluated in (default: UTC). */
  timezone?: string;
}

interface CronEntry {
  name: string;
  expression: string;
  timezone: string;
  fire: (tickAt: Date) => Promise<unknown>;
  timer?: ReturnType<typeof setTimeout>;
}

export class CronScheduler<M extends JobMap> {
  private readonly entries: CronEntry[] = [];
  private started = false;

  constructor(
    private readonly queue: JobQueue<M>,
    private readonly logger: LoggerLike,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * Registers a schedule. The payload is built per tick so it can carry
   * tick-relative data (e.g. "yesterday").
   */
  schedule<K extends JobKind<M>>(
    expression: string,
    kind: K,
    payload: (tickAt: Date) => M[K],
    options: CronScheduleOptions = {}
  ): void {
    const { timezone = "UTC", ...jobOptions } = options;
    // Fail fast on a bad expression.
    computeNextCronTime(expression, timezone, this.now());

    const entry: CronEntry = {
      name: `${kind}@${expression}`,
      expression,
      timezone,
      fire: (tickAt) =>
        this.queue.enqueue(kind, payload(tickAt), jobOptions),
    };
    this.entries.push(entry);
    if (this.started) this.arm(entry);
  }

  start(): void {
    if (this.started) return;
    this.started = true;
    for (const entry of this.entries) this.arm(entry);
    this.logger.info(
      { schedules: this.entries.map((e) => e.name) },
      "Cron scheduler started"
    );
  }

  stop(): void {
    this.started = false;
    for (const entry of this.entries) {
      if (entry.timer) clearTimeout(entry.timer);
      entry.timer = undefined;
    }
  }

  private arm(entry: CronEntry, from: Date = this.now()): void {
    const nextAt = computeNextCronTime(entry.expression, entry.timezone, from);
    this.armUntil(entry, nextAt);
  }

  private armUntil(entry: CronEntry, nextAt: Date): void {
    const waitMs = nextAt.getTime() - this.now().getTime();
    if (waitMs > MAX_TIMER_MS) {
      entry.timer = setTimeout(() => this.armUntil(entry, nextAt), MAX_TIMER_MS);
      return;
    }
    entry.timer = setTimeout(
      () => {
        if (!this.started) return;
        void this.tick(entry, nextAt);
        this.arm(entry, nextAt);
      },
      Math.max(0, waitMs)
    );
  }

  private async tick(entry: CronEntry, tickAt: Date): Promise<void> {
    try {
      const jobId = await entry.fire(tickAt);
      this.logger.info(
        { schedule: entry.name, jobId, tickAt: tickAt.toISOString() },
        "Cron tick enqueued job"
      );
    } catch (error) {
      this.logger.error(
        { schedule: entry.name, error: errorMessage(error) },
        "Cron tick failed to enqueue job"
      );
    }
  }
}
