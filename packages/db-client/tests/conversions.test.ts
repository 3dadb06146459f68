// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tally/db-client/tests/conversions`
 * Purpose: Unit tests for row conversions and rate-limit bucketing.
 * Scope: Pure helpers only. Does not open a database connection.
 * Side-effects: none
 * Links: src/build-client.ts, src/adapters/drizzle-webhook.adapter.ts
 * @internal
 */

import { describe, expect, it } from "vitest";

import { hourBucket } from "../src/adapters/drizzle-webhook.adapter";
import { toMoney, toText } from "../src/build-client";

describe("hourBucket", () => {
  it("truncates to the start of the UTC hour", () => {
    expect(hourBucket(new Date("2025-01-15T10:59:59.999Z"))).toEqual(
      new Date("2025-01-15T10:00:00.000Z")
    );
    expect(hourBucket(new Date("2025-01-15T11:00:00.000Z"))).toEqual(
      new Date("2025-01-15T11:00:00.000Z")
    );
  });
});

describe("toMoney", () => {
  it("parses numeric column strings", () => {
    expect(toMoney("0.00750000")).toBe(0.0075);
    expect(toMoney(null)).toBeNull();
    expect(toMoney("NaN")).toBeNull();
  });
});

describe("toText", () => {
  it("passes strings through and serializes other JSON", () => {
    expect(toText("hello")).toBe("hello");
    expect(toText({ q: "status" })).toBe('{"q":"status"}');
    expect(toText(null)).toBe("");
    expect(toText(undefined)).toBe("");
  });
});
