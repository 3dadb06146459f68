// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tally/task-queue/tests/graphile-queue`
 * Purpose: Unit tests for the Graphile Worker backend's lane wiring and attempt wrapper.
 * Scope: graphile-worker is mocked; tests cover addJob specs, runner options and retry signalling. Does not require Postgres.
 * Invariants: Retry is signalled by throwing; completion by resolving.
 * Side-effects: none
 * Links: src/graphile-queue.ts
 * @internal
 */

import { beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("graphile-worker", () => ({
  run: vi.fn(),
  makeWorkerUtils: vi.fn(),
}));

import {
  type JobHelpers,
  makeWorkerUtils,
  type Runner,
  run,
  type TaskList,
  type WorkerUtils,
} from "graphile-worker";

import {
  InvalidPayloadError,
  NonRetryableJobError,
  QueueShutdownError,
} from "../src/errors";
import { GraphileJobQueue } from "../src/graphile-queue";
import type { JobHandler, JobHooks } from "../src/types";
import { createMockLogger, type TestJobs, waitForAbort } from "./fixtures";

const runner = { stop: vi.fn().mockResolvedValue(undefined) };
const utils = {
  addJob: vi.fn().mockResolvedValue({ id: "101" }),
  release: vi.fn().mockResolvedValue(undefined),
};

function createQueue(echo: JobHandler, hooks?: JobHooks) {
  return new GraphileJobQueue<TestJobs>({
    connectionString: "postgres://localhost/test",
    handlers: {
      "test:echo": echo,
      "test:other": vi.fn().mockResolvedValue(undefined),
    },
    logger: createMockLogger(),
    hooks,
  });
}

function helpers(
  attempts: number,
  maxAttempts: number,
  abortSignal?: AbortSignal
): JobHelpers {
  return {
    job: { id: "55", attempts, max_attempts: maxAttempts },
    abortSignal,
  } as unknown as JobHelpers;
}

function taskListForRun(index: number): TaskList {
  const options = vi.mocked(run).mock.calls[index]?.[0];
  if (!options?.taskList) throw new Error(`run() call ${index} had no taskList`);
  return options.taskList;
}

function echoTask(taskList: TaskList) {
  const task = taskList["test:echo"];
  if (!task) throw new Error("test:echo not registered");
  return task;
}

describe("GraphileJobQueue", () => {
  beforeEach(() => {
    vi.clearAllMocks();
    vi.mocked(run).mockResolvedValue(runner as unknown as Runner);
    vi.mocked(makeWorkerUtils).mockResolvedValue(
      utils as unknown as WorkerUtils
    );
  });

  describe("enqueue", () => {
    it("stores an envelope and maps options onto graphile job options", async () => {
      const queue = createQueue(vi.fn());

      const id = await queue.enqueue(
        "test:echo",
        { value: 3 },
        { lane: "critical", maxRetries: 2, timeoutMs: 5000 }
      );

      expect(id).toBe("101");
      expect(utils.addJob).toHaveBeenCalledWith(
        "test:echo",
        { payload: { value: 3 }, timeoutMs: 5000 },
        { maxAttempts: 3, flags: ["lane:critical"] }
      );
    });

    it("turns delayMs into runAt and jobKey into replace mode", async () => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date("2025-01-15T10:00:00.000Z"));
      const queue = createQueue(vi.fn());

      await queue.enqueue(
        "test:echo",
        { value: 1 },
        { delayMs: 60_000, jobKey: "daily" }
      );

      expect(utils.addJob).toHaveBeenCalledWith(
        "test:echo",
        { payload: { value: 1 }, timeoutMs: 30_000 },
        {
          maxAttempts: 4,
          flags: ["lane:default"],
          runAt: new Date("2025-01-15T10:01:00.000Z"),
          jobKey: "daily",
          jobKeyMode: "replace",
        }
      );
      vi.useRealTimers();
    });
  });

  describe("start/stop", () => {
    it("starts one runner per lane with weighted concurrency and forbidden flags", async () => {
      const queue = createQueue(vi.fn());

      await queue.start(10);

      expect(run).toHaveBeenCalledTimes(3);
      expect(run).toHaveBeenCalledWith(
        expect.objectContaining({
          concurrency: 6,
          forbiddenFlags: ["lane:default", "lane:low"],
          noHandleSignals: true,
        })
      );
      expect(run).toHaveBeenCalledWith(
        expect.objectContaining({
          concurrency: 3,
          forbiddenFlags: ["lane:critical", "lane:low"],
        })
      );
      expect(run).toHaveBeenCalledWith(
        expect.objectContaining({
          concurrency: 1,
          forbiddenFlags: ["lane:critical", "lane:default"],
        })
      );
    });

    it("stops every runner and releases worker utils", async () => {
      const queue = createQueue(vi.fn());
      await queue.start(10);
      await queue.enqueue("test:echo", { value: 1 });

      await queue.stop();

      expect(runner.stop).toHaveBeenCalledTimes(3);
      expect(utils.release).toHaveBeenCalledTimes(1);
    });
  });

  describe("task wrapper", () => {
    it("unwraps the envelope and passes attempt metadata", async () => {
      const echo = vi.fn().mockResolvedValue(undefined);
      const queue = createQueue(echo);
      await queue.start(10);

      await echoTask(taskListForRun(0))(
        { payload: { value: 9 }, timeoutMs: 1000 },
        helpers(2, 4)
      );

      expect(echo).toHaveBeenCalledWith(
        { value: 9 },
        expect.objectContaining({
          jobId: "55",
          lane: "critical",
          attempt: 2,
          maxAttempts: 4,
        })
      );
    });

    it("throws a retryable error so Graphile reschedules", async () => {
      const onJobFailed = vi.fn();
      const queue = createQueue(vi.fn().mockRejectedValue(new Error("flaky")), {
        onJobFailed,
      });
      await queue.start(10);

      await expect(
        echoTask(taskListForRun(1))(
          { payload: { value: 1 }, timeoutMs: 1000 },
          helpers(1, 4)
        )
      ).rejects.toThrow("flaky");
      expect(onJobFailed).not.toHaveBeenCalled();
    });

    it("reports the final failed attempt and still throws", async () => {
      const onJobFailed = vi.fn();
      const queue = createQueue(vi.fn().mockRejectedValue(new Error("down")), {
        onJobFailed,
      });
      await queue.start(10);

      await expect(
        echoTask(taskListForRun(1))(
          { payload: { value: 1 }, timeoutMs: 1000 },
          helpers(4, 4)
        )
      ).rejects.toThrow("down");
      expect(onJobFailed).toHaveBeenCalledWith(
        expect.objectContaining({ kind: "test:echo", attempts: 4 })
      );
    });

    it("completes a non-retryable failure after reporting it", async () => {
      const onJobFailed = vi.fn();
      const queue = createQueue(
        vi.fn().mockRejectedValue(new NonRetryableJobError("bad config")),
        { onJobFailed }
      );
      await queue.start(10);

      await expect(
        echoTask(taskListForRun(2))(
          { payload: { value: 1 }, timeoutMs: 1000 },
          helpers(1, 4)
        )
      ).resolves.toBeUndefined();
      expect(onJobFailed).toHaveBeenCalledTimes(1);
    });

    it("aborts the handler when Graphile shuts down and hands the job back", async () => {
      const onJobFailed = vi.fn();
      const onJobSettled = vi.fn();
      const signals: AbortSignal[] = [];
      const echo = vi.fn((_payload: unknown, ctx: { signal: AbortSignal }) => {
        signals.push(ctx.signal);
        return waitForAbort(ctx.signal);
      });
      const queue = createQueue(echo, { onJobFailed, onJobSettled });
      await queue.start(10);
      const shutdown = new AbortController();

      const attempt = echoTask(taskListForRun(0))(
        { payload: { value: 1 }, timeoutMs: 60_000 },
        helpers(4, 4, shutdown.signal)
      );
      shutdown.abort();

      await expect(attempt).rejects.toBeInstanceOf(QueueShutdownError);
      expect(signals[0]?.aborted).toBe(true);
      expect(onJobFailed).not.toHaveBeenCalled();
      expect(onJobSettled).not.toHaveBeenCalled();
    });

    it("completes and reports a row stored without the envelope", async () => {
      const onJobFailed = vi.fn();
      const echo = vi.fn();
      const queue = createQueue(echo, { onJobFailed });
      await queue.start(10);

      await expect(
        echoTask(taskListForRun(0))({ value: 1 }, helpers(1, 4))
      ).resolves.toBeUndefined();
      expect(echo).not.toHaveBeenCalled();
      expect(onJobFailed.mock.calls[0]?.[0].error).toBeInstanceOf(
        InvalidPayloadError
      );
    });
  });
});
