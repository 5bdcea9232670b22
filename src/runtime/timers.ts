import {
  clearTimeout as nodeClearTimeout,
  setTimeout as nodeSetTimeout,
} from "node:timers";

/** Handle returned by {@link runtimeSetTimeout}. */
export type TimeoutHandle = ReturnType<typeof nodeSetTimeout>;

const fallbackTimers = {
  setTimeout: nodeSetTimeout,
  clearTimeout: nodeClearTimeout,
} as const;

/**
 * Looks the timer function up on {@link globalThis} at call time. Sinon fake
 * timers install their overrides there, so every wait in the harness (probe
 * intervals, exit grace periods, drain ceilings) follows the fake clock in
 * tests instead of capturing the native implementation at import time.
 */
function resolveTimer<K extends keyof typeof fallbackTimers>(key: K): (typeof fallbackTimers)[K] {
  const candidate = (globalThis as Record<string, unknown>)[key];
  if (typeof candidate === "function") {
    return candidate as (typeof fallbackTimers)[K];
  }
  return fallbackTimers[key];
}

export function runtimeSetTimeout(...args: Parameters<typeof nodeSetTimeout>): TimeoutHandle {
  const candidate = resolveTimer("setTimeout");
  if (candidate === fallbackTimers.setTimeout) {
    return candidate(...args);
  }
  return candidate.apply(globalThis, args);
}

export function runtimeClearTimeout(handle: TimeoutHandle): void {
  const candidate = resolveTimer("clearTimeout");
  if (candidate === fallbackTimers.clearTimeout) {
    candidate(handle);
    return;
  }
  candidate.apply(globalThis, [handle]);
}

/** Current wall clock in milliseconds. Reads `Date.now` lazily for the same reason. */
export function runtimeNow(): number {
  return Date.now();
}

/** Resolves after `delayMs`. Non-positive delays resolve on the next macrotask. */
export function sleep(delayMs: number): Promise<void> {
  return new Promise<void>((resolve) => {
    runtimeSetTimeout(resolve, Math.max(0, delayMs));
  });
}

/** Error raised by {@link withTimeout} when the wrapped operation overruns. */
export class OperationTimeoutError extends Error {
  public readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = "OperationTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Races `operation` against a timer. The timer is always cleared so a settled
 * operation never keeps the event loop alive. The operation itself is not
 * cancelled; callers that own a cancellable resource must release it.
 */
export function withTimeout<T>(operation: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    let settled = false;
    const timer = runtimeSetTimeout(() => {
      if (settled) {
        return;
      }
      settled = true;
      reject(new OperationTimeoutError(label, timeoutMs));
    }, Math.max(0, timeoutMs));

    operation.then(
      (value) => {
        if (settled) {
          return;
        }
        settled = true;
        runtimeClearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        if (settled) {
          return;
        }
        settled = true;
        runtimeClearTimeout(timer);
        reject(error);
      },
    );
  });
}

export const runtimeTimers = {
  setTimeout: runtimeSetTimeout,
  clearTimeout: runtimeClearTimeout,
  now: runtimeNow,
} as const;
