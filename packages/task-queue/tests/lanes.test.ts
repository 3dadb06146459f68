// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tally/task-queue/tests/lanes`
 * Purpose: Unit tests for weighted lane selection and concurrency split.
 * Scope: Pure scheduling math. Does not run jobs.
 * Invariants: Deterministic; no timers.
 * Side-effects: none
 * Links: src/lanes.ts
 * @internal
 */

import { describe, expect, it } from "vitest";

import { LanePicker, laneFlag, splitConcurrency } from "../src/lanes";
import type { Lane } from "../src/types";

function pickMany(
  picker: LanePicker,
  count: number,
  hasWork: (lane: Lane) => boolean
): Array<Lane | undefined> {
  return Array.from({ length: count }, () => picker.pick(hasWork));
}

describe("LanePicker", () => {
  it("picks 6:3:1 per 10 picks when every lane is backlogged", () => {
    const picks = pickMany(new LanePicker(), 10, () => true);

    expect(picks.filter((l) => l === "critical")).toHaveLength(6);
    expect(picks.filter((l) => l === "default")).toHaveLength(3);
    expect(picks.filter((l) => l === "low")).toHaveLength(1);
  });

  it("interleaves lanes instead of draining critical first", () => {
    const picks = pickMany(new LanePicker(), 10, () => true);

    expect(picks).toEqual([
      "critical",
      "default",
      "critical",
      "critical",
      "default",
      "critical",
      "low",
      "critical",
      "default",
      "critical",
    ]);
  });

  it("keeps the ratio over many cycles", () => {
    const picks = pickMany(new LanePicker(), 1000, () => true);

    expect(picks.filter((l) => l === "critical")).toHaveLength(600);
    expect(picks.filter((l) => l === "default")).toHaveLength(300);
    expect(picks.filter((l) => l === "low")).toHaveLength(100);
  });

  it("never starves the low lane behind a busy default lane", () => {
    const picks = pickMany(new LanePicker(), 4, (lane) => lane !== "critical");

    expect(picks).toEqual(["default", "default", "low", "default"]);
  });

  it("picks a lone low-lane job immediately", () => {
    const picker = new LanePicker();
    expect(picker.pick((lane) => lane === "low")).toBe("low");
  });

  it("returns undefined when no lane has work", () => {
    expect(new LanePicker().pick(() => false)).toBeUndefined();
  });
});

describe("splitConcurrency", () => {
  it("splits 10 workers 6/3/1", () => {
    expect(splitConcurrency(10)).toEqual({ critical: 6, default: 3, low: 1 });
  });

  it("scales with the worker budget", () => {
    expect(splitConcurrency(20)).toEqual({ critical: 12, default: 6, low: 2 });
  });

  it("gives every lane at least one worker", () => {
    expect(splitConcurrency(1)).toEqual({ critical: 1, default: 1, low: 1 });
  });
});

describe("laneFlag", () => {
  it("prefixes the lane name", () => {
    expect(laneFlag("critical")).toBe("lane:critical");
  });
});
