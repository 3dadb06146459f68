// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tally/task-queue/tests/in-process-queue`
 * Purpose: Unit tests for the memory-backed worker pool.
 * Scope: Tests delivery, retries, archive, timeouts, shutdown, lane shares, concurrency and delays. Does not touch Postgres.
 * Invariants: retryDelay is zero so retries are immediate; waits use onIdle().
 * Side-effects: none
 * Links: src/in-process-queue.ts
 * @internal
 */

import { afterEach, describe, expect, it, vi } from "vitest";

import {
  JobTimeoutError,
  NonRetryableJobError,
  QueueShutdownError,
} from "../src/errors";
import { InProcessJobQueue } from "../src/in-process-queue";
import type { JobContext, JobHandler, JobHooks, Lane } from "../src/types";
import {
  createDeferred,
  createMockLogger,
  type TestJobs,
  waitForAbort,
} from "./fixtures";

function createQueue(
  echo: JobHandler,
  other: JobHandler = vi.fn().mockResolvedValue(undefined),
  hooks?: JobHooks
) {
  return new InProcessJobQueue<TestJobs>({
    handlers: { "test:echo": echo, "test:other": other },
    logger: createMockLogger(),
    hooks,
    retryDelay: () => 0,
  });
}

describe("InProcessJobQueue", () => {
  let queue: InProcessJobQueue<TestJobs> | undefined;

  afterEach(async () => {
    await queue?.stop();
    queue = undefined;
  });

  describe("happy path", () => {
    it("delivers the payload with attempt metadata", async () => {
      const echo = vi.fn().mockResolvedValue(undefined);
      queue = createQueue(echo);
      await queue.start(2);

      const jobId = await queue.enqueue("test:echo", { value: 7 });
      await queue.onIdle();

      expect(echo).toHaveBeenCalledTimes(1);
      expect(echo).toHaveBeenCalledWith(
        { value: 7 },
        expect.objectContaining({
          jobId,
          kind: "test:echo",
          lane: "default",
          attempt: 1,
          maxAttempts: 4,
        })
      );
      expect(queue.failedJobs()).toHaveLength(0);
    });

    it("holds jobs enqueued before start until start()", async () => {
      const echo = vi.fn().mockResolvedValue(undefined);
      queue = createQueue(echo);

      await queue.enqueue("test:echo", { value: 1 });
      expect(echo).not.toHaveBeenCalled();
      expect(queue.queuedCount()).toBe(1);

      await queue.start(1);
      await queue.onIdle();
      expect(echo).toHaveBeenCalledTimes(1);
    });
  });

  describe("retries", () => {
    it("retries until the handler succeeds", async () => {
      const echo = vi
        .fn()
        .mockRejectedValueOnce(new Error("flaky"))
        .mockRejectedValueOnce(new Error("flaky"))
        .mockResolvedValue(undefined);
      queue = createQueue(echo);
      await queue.start(1);

      await queue.enqueue("test:echo", { value: 1 }, { maxRetries: 3 });
      await queue.onIdle();

      expect(echo).toHaveBeenCalledTimes(3);
      const attempts = echo.mock.calls.map((call) => call[1].attempt);
      expect(attempts).toEqual([1, 2, 3]);
      expect(queue.failedJobs()).toHaveLength(0);
    });

    it("archives the job after maxRetries + 1 attempts", async () => {
      const onJobFailed = vi.fn();
      const echo = vi.fn().mockRejectedValue(new Error("down"));
      queue = createQueue(echo, undefined, { onJobFailed });
      await queue.start(1);

      await queue.enqueue("test:echo", { value: 1 }, { maxRetries: 2 });
      await queue.onIdle();

      expect(echo).toHaveBeenCalledTimes(3);
      expect(queue.failedJobs()).toHaveLength(1);
      expect(queue.failedJobs()[0]).toMatchObject({
        kind: "test:echo",
        attempts: 3,
        payload: { value: 1 },
      });
      expect(onJobFailed).toHaveBeenCalledTimes(1);
    });

    it("keeps only the newest maxFailedJobs failures", async () => {
      const echo = vi.fn().mockRejectedValue(new NonRetryableJobError("bad"));
      queue = new InProcessJobQueue<TestJobs>({
        handlers: { "test:echo": echo, "test:other": vi.fn() },
        logger: createMockLogger(),
        maxFailedJobs: 2,
      });
      await queue.start(1);

      for (const value of [1, 2, 3]) {
        await queue.enqueue("test:echo", { value });
      }
      await queue.onIdle();

      expect(queue.failedJobs().map((failure) => failure.payload)).toEqual([
        { value: 2 },
        { value: 3 },
      ]);
    });

    it("does not retry a non-retryable error", async () => {
      const echo = vi
        .fn()
        .mockRejectedValue(new NonRetryableJobError("bad config"));
      queue = createQueue(echo);
      await queue.start(1);

      await queue.enqueue("test:echo", { value: 1 }, { maxRetries: 5 });
      await queue.onIdle();

      expect(echo).toHaveBeenCalledTimes(1);
      expect(queue.failedJobs()[0]?.attempts).toBe(1);
    });

    it("reports every attempt through onJobSettled", async () => {
      const onJobSettled = vi.fn();
      const echo = vi
        .fn()
        .mockRejectedValueOnce(new Error("flaky"))
        .mockResolvedValue(undefined);
      queue = createQueue(echo, undefined, { onJobSettled });
      await queue.start(1);

      await queue.enqueue("test:echo", { value: 1 });
      await queue.onIdle();

      const outcomes = onJobSettled.mock.calls.map((call) => call[0].outcome);
      expect(outcomes).toEqual(["retrying", "completed"]);
    });
  });

  describe("timeouts", () => {
    it("aborts the handler at its timeout and retries", async () => {
      const signals: AbortSignal[] = [];
      const echo = vi.fn((_payload: unknown, ctx: JobContext) => {
        signals.push(ctx.signal);
        return waitForAbort(ctx.signal);
      });
      queue = createQueue(echo);
      await queue.start(1);

      await queue.enqueue(
        "test:echo",
        { value: 1 },
        { timeoutMs: 10, maxRetries: 1 }
      );
      await queue.onIdle();

      expect(echo).toHaveBeenCalledTimes(2);
      expect(signals.every((s) => s.aborted)).toBe(true);
      expect(queue.failedJobs()[0]?.error).toBeInstanceOf(JobTimeoutError);
    });
  });

  describe("shutdown", () => {
    it("aborts a running handler on stop() without archiving it", async () => {
      const onJobSettled = vi.fn();
      const signals: AbortSignal[] = [];
      const echo = vi.fn((_payload: unknown, ctx: JobContext) => {
        signals.push(ctx.signal);
        return new Promise<void>(() => {});
      });
      const logger = createMockLogger();
      queue = new InProcessJobQueue<TestJobs>({
        handlers: { "test:echo": echo, "test:other": vi.fn() },
        logger,
        hooks: { onJobSettled },
      });
      await queue.start(1);

      await queue.enqueue("test:echo", { value: 1 }, { timeoutMs: 60_000 });
      expect(echo).toHaveBeenCalledTimes(1);

      await queue.stop();

      expect(signals[0]?.aborted).toBe(true);
      expect(signals[0]?.reason).toBeInstanceOf(QueueShutdownError);
      expect(queue.failedJobs()).toHaveLength(0);
      expect(onJobSettled).not.toHaveBeenCalled();
      expect(logger.info).toHaveBeenCalledWith(
        expect.objectContaining({ attempt: 1, kind: "test:echo" }),
        "Job attempt interrupted by shutdown"
      );
      expect(logger.info).toHaveBeenLastCalledWith(
        { abandoned: 1 },
        "In-process job queue stopped"
      );
    });
  });

  describe("lanes", () => {
    it("shares a saturated single worker 6:3:1 across lanes", async () => {
      const seen: Lane[] = [];
      const echo = vi.fn(async (_payload: unknown, ctx: JobContext) => {
        seen.push(ctx.lane);
      });
      queue = createQueue(echo);

      for (const lane of ["critical", "default", "low"] as const) {
        for (let i = 0; i < 10; i++) {
          await queue.enqueue("test:echo", { value: i }, { lane });
        }
      }
      await queue.start(1);
      await queue.onIdle();

      const firstTen = seen.slice(0, 10);
      expect(firstTen.filter((l) => l === "critical")).toHaveLength(6);
      expect(firstTen.filter((l) => l === "default")).toHaveLength(3);
      expect(firstTen.filter((l) => l === "low")).toHaveLength(1);
      expect(seen).toHaveLength(30);
    });

    it("runs low-lane work when the other lanes are empty", async () => {
      const echo = vi.fn().mockResolvedValue(undefined);
      queue = createQueue(echo);
      await queue.start(1);

      await queue.enqueue("test:echo", { value: 1 }, { lane: "low" });
      await queue.onIdle();

      expect(echo).toHaveBeenCalledTimes(1);
    });
  });

  describe("concurrency", () => {
    it("never runs more attempts than the pool size", async () => {
      const gate = createDeferred();
      let active = 0;
      let peak = 0;
      const echo = vi.fn(async () => {
        active++;
        peak = Math.max(peak, active);
        await gate.promise;
        active--;
      });
      queue = createQueue(echo);
      await queue.start(2);

      for (let i = 0; i < 5; i++) {
        await queue.enqueue("test:echo", { value: i });
      }
      expect(echo).toHaveBeenCalledTimes(2);

      gate.resolve();
      await queue.onIdle();
      expect(echo).toHaveBeenCalledTimes(5);
      expect(peak).toBe(2);
    });
  });

  describe("scheduling", () => {
    it("delays a job by delayMs", async () => {
      const echo = vi.fn().mockResolvedValue(undefined);
      queue = createQueue(echo);
      await queue.start(1);

      await queue.enqueue("test:echo", { value: 1 }, { delayMs: 20 });
      expect(echo).not.toHaveBeenCalled();

      await queue.onIdle();
      expect(echo).toHaveBeenCalledTimes(1);
    });

    it("replaces a queued job that shares a jobKey", async () => {
      const echo = vi.fn().mockResolvedValue(undefined);
      queue = createQueue(echo);

      await queue.enqueue("test:echo", { value: 1 }, { jobKey: "k" });
      await queue.enqueue("test:echo", { value: 2 }, { jobKey: "k" });
      await queue.start(1);
      await queue.onIdle();

      expect(echo).toHaveBeenCalledTimes(1);
      expect(echo).toHaveBeenCalledWith({ value: 2 }, expect.anything());
    });

    it("replaces a delayed job that shares a jobKey", async () => {
      const echo = vi.fn().mockResolvedValue(undefined);
      queue = createQueue(echo);
      await queue.start(1);

      await queue.enqueue("test:echo", { value: 1 }, { jobKey: "k", delayMs: 20 });
      await queue.enqueue("test:echo", { value: 2 }, { jobKey: "k", delayMs: 5 });
      await queue.onIdle();

      expect(echo).toHaveBeenCalledTimes(1);
      expect(echo).toHaveBeenCalledWith({ value: 2 }, expect.anything());
    });

    it("replaces a delayed job with an immediate one", async () => {
      const echo = vi.fn().mockResolvedValue(undefined);
      queue = createQueue(echo);

      await queue.enqueue("test:echo", { value: 1 }, { jobKey: "k", delayMs: 20 });
      await queue.enqueue("test:echo", { value: 2 }, { jobKey: "k" });
      await queue.start(1);
      await queue.onIdle();

      expect(echo).toHaveBeenCalledTimes(1);
      expect(echo).toHaveBeenCalledWith({ value: 2 }, expect.anything());
    });
  });
});
