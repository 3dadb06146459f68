// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tally/circuit-breaker/registry`
 * Purpose: Get-or-create store of named breakers sharing one default configuration.
 * Scope: Passed by handle to whoever needs per-key breakers (e.g. one per webhook host). Not a module global.
 * Invariants:
 * - One breaker instance per name while it is held
 * - At most maxSize breakers are held; the least recently used closed breaker is evicted first,
 *   an open or half-open one only when every held breaker is tripped
 * Side-effects: none
 * @public
 */

import {
  CircuitBreaker,
  type CircuitBreakerOptions,
  type CircuitBreakerStats,
} from "./circuit-breaker";

export type CircuitBreakerDefaults = Omit<CircuitBreakerOptions, "name">;

export interface CircuitBreakerRegistryOptions {
  /** Default: DEFAULT_REGISTRY_MAX_SIZE */
  maxSize?: number;
  /** Called with the name of each evicted breaker, e.g. to drop its metric series. */
  onEvict?: (name: string) => void;
}

export const DEFAULT_REGISTRY_MAX_SIZE = 1000;

export class CircuitBreakerRegistry {
  /** Insertion order is recency order: get() moves a name to the end. */
  private readonly breakers = new Map<string, CircuitBreaker>();
  private readonly maxSize: number;

  constructor(
    private readonly defaults: CircuitBreakerDefaults = {},
    private readonly options: CircuitBreakerRegistryOptions = {}
  ) {
    this.maxSize = Math.max(1, options.maxSize ?? DEFAULT_REGISTRY_MAX_SIZE);
  }

  get(name: string): CircuitBreaker {
    const existing = this.breakers.get(name);
    if (existing) {
      this.breakers.delete(name);
      this.breakers.set(name, existing);
      return existing;
    }
    const breaker = new CircuitBreaker({ ...this.defaults, name });
    this.breakers.set(name, breaker);
    this.evictOverflow(name);
    return breaker;
  }

  get size(): number {
    return this.breakers.size;
  }

  has(name: string): boolean {
    return this.breakers.has(name);
  }

  stats(): CircuitBreakerStats[] {
    return [...this.breakers.values()].map((breaker) => breaker.stats());
  }

  resetAll(): void {
    for (const breaker of this.breakers.values()) breaker.reset();
  }

  private evictOverflow(keep: string): void {
    while (this.breakers.size > this.maxSize) {
      const victim = this.leastRecentlyUsed(keep);
      if (victim === undefined) return;
      this.breakers.delete(victim);
      this.options.onEvict?.(victim);
    }
  }

  private leastRecentlyUsed(keep: string): string | undefined {
    let fallback: string | undefined;
    for (const [name, breaker] of this.breakers) {
      if (name === keep) continue;
      if (breaker.state === "closed") return name;
      fallback ??= name;
    }
    return fallback;
  }
}
