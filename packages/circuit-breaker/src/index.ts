// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tally/circuit-breaker`
 * Purpose: Circuit breaker package exports.
 * Scope: Re-exports breaker, registry and rejection errors. Does not contain implementations.
 * Invariants: No runtime dependencies.
 * Side-effects: none
 * @public
 */

export {
  CircuitBreaker,
  type CircuitBreakerOptions,
  type CircuitBreakerStats,
  type CircuitState,
  DEFAULT_MAX_FAILURES,
  DEFAULT_MAX_HALF_OPEN_REQUESTS,
  DEFAULT_TIMEOUT_MS,
} from "./circuit-breaker";
export {
  CircuitHalfOpenLimitError,
  CircuitOpenError,
  CircuitRejectedError,
  isCircuitRejectedError,
} from "./errors";
export {
  type CircuitBreakerDefaults,
  CircuitBreakerRegistry,
  type CircuitBreakerRegistryOptions,
  DEFAULT_REGISTRY_MAX_SIZE,
} from "./registry";
