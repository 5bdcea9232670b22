/**
 * Timing knobs of the supervisor. Each resolver takes the explicit value
 * first, then the matching `HARNESS_*` environment variable, then the default
 * observed to work for services that bind within a few seconds.
 */
import { readOptionalInt } from "./env.js";

/** Ceiling applied to every timeout, explicit or from the environment. */
export const MAX_TIMEOUT_MS = 600_000;

/** Ceiling applied to the number of attempts per run. */
export const MAX_ATTEMPTS_LIMIT = 20;

/**
 * Smallest readiness deadline accepted. The per-call timeout must stay
 * strictly below it, which needs at least 2 ms.
 */
export const MIN_READY_TIMEOUT_MS = 2;

export const DEFAULT_MAX_ATTEMPTS = 3;
export const DEFAULT_READY_TIMEOUT_MS = 10_000;
export const DEFAULT_POLL_INTERVAL_MS = 100;
export const DEFAULT_PROBE_CALL_TIMEOUT_MS = 500;
export const DEFAULT_STOP_GRACE_MS = 2_000;
export const DEFAULT_STOP_FORCE_MS = 2_000;
export const DEFAULT_OUTPUT_DRAIN_MS = 2_000;

interface Bounds {
  readonly min: number;
  readonly max: number;
}

function sanitise(value: number | undefined, fallback: number, { min, max }: Bounds): number {
  if (value === undefined || !Number.isFinite(value)) {
    return fallback;
  }
  const integer = Math.trunc(value);
  if (integer < min) {
    return fallback;
  }
  return Math.min(integer, max);
}

function choose(explicit: number | undefined, envName: string, fallback: number, bounds: Bounds): number {
  if (explicit !== undefined) {
    return sanitise(explicit, fallback, bounds);
  }
  return sanitise(readOptionalInt(envName, bounds), fallback, bounds);
}

const TIMEOUT_BOUNDS: Bounds = { min: 1, max: MAX_TIMEOUT_MS };

export function resolveMaxAttempts(explicit?: number): number {
  return choose(explicit, "HARNESS_MAX_ATTEMPTS", DEFAULT_MAX_ATTEMPTS, { min: 1, max: MAX_ATTEMPTS_LIMIT });
}

/** Overall readiness deadline granted to a single attempt. */
export function resolveReadyTimeout(explicit?: number): number {
  return choose(explicit, "HARNESS_READY_TIMEOUT_MS", DEFAULT_READY_TIMEOUT_MS, {
    min: MIN_READY_TIMEOUT_MS,
    max: MAX_TIMEOUT_MS,
  });
}

export function resolvePollInterval(explicit?: number): number {
  return choose(explicit, "HARNESS_POLL_INTERVAL_MS", DEFAULT_POLL_INTERVAL_MS, TIMEOUT_BOUNDS);
}

/**
 * Per-call health check timeout. It must stay strictly below the readiness
 * deadline (at least {@link MIN_READY_TIMEOUT_MS}); a value that does not is
 * clamped to half of the deadline.
 */
export function resolveProbeCallTimeout(readyTimeoutMs: number, explicit?: number): number {
  const resolved = choose(explicit, "HARNESS_PROBE_TIMEOUT_MS", DEFAULT_PROBE_CALL_TIMEOUT_MS, TIMEOUT_BOUNDS);
  if (resolved < readyTimeoutMs) {
    return resolved;
  }
  return Math.max(1, Math.floor(readyTimeoutMs / 2));
}

/** Time granted to the service to exit after the graceful signal. */
export function resolveStopGrace(explicit?: number): number {
  return choose(explicit, "HARNESS_STOP_GRACE_MS", DEFAULT_STOP_GRACE_MS, TIMEOUT_BOUNDS);
}

/** Time granted to the OS to reap the service after SIGKILL. */
export function resolveStopForce(explicit?: number): number {
  return choose(explicit, "HARNESS_STOP_FORCE_MS", DEFAULT_STOP_FORCE_MS, TIMEOUT_BOUNDS);
}

/** Ceiling on waiting for stdout/stderr to reach end-of-stream during disposal. */
export function resolveOutputDrain(explicit?: number): number {
  return choose(explicit, "HARNESS_OUTPUT_DRAIN_MS", DEFAULT_OUTPUT_DRAIN_MS, { min: 0, max: MAX_TIMEOUT_MS });
}
