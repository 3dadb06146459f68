// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tally/task-queue/tests/fixtures`
 * Purpose: Reusable test fixtures for task-queue unit tests.
 * Scope: Mock logger, test job map and a controllable deferred. Does not import from src/ beyond types.
 * Invariants: All mocks are fresh per call.
 * Side-effects: none
 * Links: tests/*.test.ts
 * @internal
 */

import { vi } from "vitest";

export type TestJobs = {
  "test:echo": { value: number };
  "test:other": { label: string };
};

export function createMockLogger() {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  };
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}

export function createDeferred<T = void>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

/** Rejects with the abort reason once `signal` aborts. */
export function waitForAbort(signal: AbortSignal): Promise<never> {
  return new Promise((_, reject) => {
    signal.addEventListener("abort", () => reject(signal.reason), {
      once: true,
    });
  });
}
