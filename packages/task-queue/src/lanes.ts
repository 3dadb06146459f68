// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tally/task-queue/lanes`
 * Purpose: Lane selection and concurrency split by lane weight.
 * Scope: Pure scheduling math. Does not hold jobs.
 * Invariants:
 * - With every lane backlogged, each run of sum(weights) picks selects each lane exactly weight times
 * - A lane with work is always eventually picked (no starvation)
 * - splitConcurrency gives every lane at least one slot
 * Side-effects: none
 * @internal
 */

import { LANE_WEIGHTS, LANES, type Lane } from "./types";

/**
 * Smooth weighted round-robin over the lanes that currently have work.
 * Interleaves picks instead of draining the heaviest lane first.
 */
export class LanePicker {
  private readonly current: Record<Lane, number> = {
    critical: 0,
    default: 0,
    low: 0,
  };

  constructor(
    private readonly weights: Readonly<Record<Lane, number>> = LANE_WEIGHTS
  ) {}

  pick(hasWork: (lane: Lane) => boolean): Lane | undefined {
    let total = 0;
    let best: Lane | undefined;

    for (const lane of LANES) {
      if (!hasWork(lane)) continue;
      const weight = this.weights[lane];
      this.current[lane] += weight;
      total += weight;
      if (best === undefined || this.current[lane] > this.current[best]) {
        best = lane;
      }
    }

    if (best !== undefined) {
      this.current[best] -= total;
    }
    return best;
  }
}

/** Splits a worker budget across lanes proportionally to lane weight. */
export function splitConcurrency(
  concurrency: number,
  weights: Readonly<Record<Lane, number>> = LANE_WEIGHTS
): Record<Lane, number> {
  const totalWeight = LANES.reduce((sum, lane) => sum + weights[lane], 0);
  const split: Record<Lane, number> = { critical: 1, default: 1, low: 1 };
  for (const lane of LANES) {
    split[lane] = Math.max(
      1,
      Math.round((concurrency * weights[lane]) / totalWeight)
    );
  }
  return split;
}

export function laneFlag(lane: Lane): string {
  return `lane:${lane}`;
}
