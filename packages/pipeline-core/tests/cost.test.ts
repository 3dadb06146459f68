// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tally/pipeline-core/tests/cost`
 * Purpose: Unit tests for price lookup, cost arithmetic and daily aggregation.
 * Scope: Pure functions plus the catalog factory with an in-memory override source.
 * Side-effects: none
 * Links: src/cost/pricing.ts, src/cost/cost.ts
 * @internal
 */

import { describe, expect, it, vi } from "vitest";

import {
  aggregateDailyCost,
  calculateCost,
  costSkipReason,
  parseUtcDay,
  previousUtcDay,
} from "../src/cost/cost";
import {
  createPricingCatalog,
  loadDefaultPricing,
  matchPricing,
  normalizeModelName,
} from "../src/cost/pricing";
import type { ModelPricing } from "../src/domain/types";
import { makeObservation } from "./fixtures";

const ALPHA: ModelPricing = {
  model: "alpha",
  provider: "test",
  inputPricePer1k: 1,
  outputPricePer1k: 2,
};

const TABLE: ModelPricing[] = [
  ALPHA,
  { model: "alpha-mini", provider: "test", inputPricePer1k: 0.1, outputPricePer1k: 0.2 },
  { model: "beta-large-v2", provider: "test", inputPricePer1k: 5, outputPricePer1k: 10 },
];

describe("matchPricing", () => {
  it("normalizes case and whitespace", () => {
    expect(normalizeModelName("  GPT-4o ")).toBe("gpt-4o");
    expect(matchPricing(TABLE, " ALPHA ")?.model).toBe("alpha");
  });

  it("prefers an exact match over prefix matches", () => {
    expect(matchPricing(TABLE, "alpha-mini")?.model).toBe("alpha-mini");
  });

  it("matches versioned names by the longest prefix key", () => {
    expect(matchPricing(TABLE, "alpha-mini-2025-01-01")?.model).toBe("alpha-mini");
    expect(matchPricing(TABLE, "alpha-2025")?.model).toBe("alpha");
  });

  it("matches a model that is a prefix of a key", () => {
    expect(matchPricing(TABLE, "beta-large")?.model).toBe("beta-large-v2");
  });

  it("returns null for unknown and empty models", () => {
    expect(matchPricing(TABLE, "gamma")).toBeNull();
    expect(matchPricing(TABLE, "  ")).toBeNull();
  });

  it("resolves dated variants in the built-in table", () => {
    const pricing = matchPricing(loadDefaultPricing(), "gpt-4o-mini-2025-01-01");
    expect(pricing).toEqual({
      model: "gpt-4o-mini",
      provider: "openai",
      inputPricePer1k: 0.00015,
      outputPricePer1k: 0.0006,
    });
  });
});

describe("createPricingCatalog", () => {
  it("prefers project overrides over the defaults", async () => {
    const listProjectPricing = vi.fn().mockResolvedValue([
      { model: "alpha", provider: "custom", inputPricePer1k: 9, outputPricePer1k: 9 },
    ]);
    const catalog = createPricingCatalog({
      defaults: TABLE,
      overrides: { listProjectPricing },
    });

    expect((await catalog.findPricing("proj-1", "alpha"))?.provider).toBe("custom");
    expect((await catalog.findPricing("proj-1", "alpha-mini"))?.provider).toBe("custom");
    expect(listProjectPricing).toHaveBeenCalledWith("proj-1");
  });

  it("falls back to the defaults when no override matches", async () => {
    const catalog = createPricingCatalog({
      defaults: TABLE,
      overrides: { listProjectPricing: vi.fn().mockResolvedValue([]) },
    });
    expect((await catalog.findPricing("proj-1", "beta-large-v2"))?.inputPricePer1k).toBe(5);
    expect(await catalog.findPricing("proj-1", "unknown")).toBeNull();
  });

  it("propagates override lookup failures", async () => {
    const catalog = createPricingCatalog({
      defaults: TABLE,
      overrides: {
        listProjectPricing: vi.fn().mockRejectedValue(new Error("db down")),
      },
    });
    await expect(catalog.findPricing("proj-1", "alpha")).rejects.toThrow("db down");
  });
});

describe("calculateCost", () => {
  it("prices tokens per thousand", () => {
    const costs = calculateCost(
      { model: "gpt-4o", provider: "openai", inputPricePer1k: 0.0025, outputPricePer1k: 0.01 },
      1000,
      500
    );
    expect(costs.inputCost).toBeCloseTo(0.0025, 10);
    expect(costs.outputCost).toBeCloseTo(0.005, 10);
    expect(costs.totalCost).toBeCloseTo(0.0075, 10);
  });

  it("returns zero cost for zero tokens", () => {
    expect(calculateCost(ALPHA, 0, 0)).toEqual({
      inputCost: 0,
      outputCost: 0,
      totalCost: 0,
    });
  });
});

describe("costSkipReason", () => {
  it("skips priced observations", () => {
    expect(costSkipReason(makeObservation({ totalCost: 0.01 }))).toBe("already_priced");
  });

  it("skips observations without a model or tokens", () => {
    expect(costSkipReason(makeObservation({ model: "" }))).toBe("missing_usage");
    expect(
      costSkipReason(makeObservation({ inputTokens: 0, outputTokens: 0 }))
    ).toBe("missing_usage");
  });

  it("prices observations with zero cost and usage", () => {
    expect(costSkipReason(makeObservation({ totalCost: 0 }))).toBeNull();
    expect(costSkipReason(makeObservation())).toBeNull();
  });
});

describe("aggregateDailyCost", () => {
  it("sums priced observations per model, most expensive first", () => {
    const summary = aggregateDailyCost([
      makeObservation({ id: "o1", traceId: "t1", model: "alpha", totalCost: 1 }),
      makeObservation({ id: "o2", traceId: "t1", model: "beta", totalCost: 3 }),
      makeObservation({ id: "o3", traceId: "t2", model: "alpha", totalCost: 0.5 }),
      makeObservation({ id: "o4", traceId: "t3", model: "", totalCost: 0.25 }),
      makeObservation({ id: "o5", traceId: "t4", model: "alpha", totalCost: null }),
      makeObservation({ id: "o6", traceId: "t5", model: "beta", totalCost: 0 }),
    ]);

    expect(summary).toEqual({
      totalCost: 4.75,
      observationCount: 4,
      traceCount: 3,
      models: [
        { model: "beta", cost: 3, count: 1 },
        { model: "alpha", cost: 1.5, count: 2 },
      ],
    });
  });

  it("returns an empty summary for no observations", () => {
    expect(aggregateDailyCost([])).toEqual({
      totalCost: 0,
      observationCount: 0,
      traceCount: 0,
      models: [],
    });
  });
});

describe("UTC day helpers", () => {
  it("parses a day into a half-open UTC range", () => {
    expect(parseUtcDay("2025-01-14")).toEqual({
      start: new Date("2025-01-14T00:00:00.000Z"),
      end: new Date("2025-01-15T00:00:00.000Z"),
    });
  });

  it("rejects malformed and impossible dates", () => {
    expect(parseUtcDay("2025-1-14")).toBeNull();
    expect(parseUtcDay("2025-02-30")).toBeNull();
    expect(parseUtcDay("yesterday")).toBeNull();
  });

  it("computes the previous UTC day", () => {
    expect(previousUtcDay(new Date("2025-03-01T01:00:00.000Z"))).toBe("2025-02-28");
  });
});
