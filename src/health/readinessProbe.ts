import { describeError, isConfigurationError } from "../errors.js";
import type { StructuredLogger } from "../logger.js";
import type { ProcessExit } from "../nodePrimitives.js";
import { runtimeNow, sleep, withTimeout } from "../runtime/timers.js";
import type { HealthChecker, HealthStatus } from "./healthClient.js";

/** The slice of a managed process the probe needs: whether it already exited. */
export interface ProbeTarget {
  exitInfo(): ProcessExit | null;
}

export interface ProbeOptions {
  address: string;
  target: ProbeTarget;
  checker: HealthChecker;
  /** Overall budget for the attempt, measured from the first call. */
  deadlineMs: number;
  intervalMs: number;
  callTimeoutMs: number;
  /** Service name sent in each health request. */
  serviceName?: string;
  logger?: StructuredLogger;
}

interface ProbeStats {
  polls: number;
  elapsedMs: number;
  lastError: string | null;
  lastStatus: HealthStatus | null;
}

export type ProbeOutcome =
  | ({ kind: "ready" } & ProbeStats)
  | ({ kind: "crashed"; exit: ProcessExit } & ProbeStats)
  | ({ kind: "timed_out" } & ProbeStats);

/**
 * Polls the health endpoint until it reports `SERVING`, the process exits, or
 * the deadline elapses. The exit is checked before and after every call so a
 * process that died is never reported ready.
 */
export async function probeReadiness(options: ProbeOptions): Promise<ProbeOutcome> {
  const { address, target, checker, deadlineMs, intervalMs, callTimeoutMs, logger } = options;
  const service = options.serviceName ?? "";
  const started = runtimeNow();
  const deadline = started + deadlineMs;
  const stats: ProbeStats = { polls: 0, elapsedMs: 0, lastError: null, lastStatus: null };

  const finish = <K extends ProbeOutcome["kind"]>(kind: K) => {
    stats.elapsedMs = runtimeNow() - started;
    return { kind, ...stats };
  };

  for (;;) {
    const exitBefore = target.exitInfo();
    if (exitBefore) {
      return { ...finish("crashed"), exit: exitBefore };
    }

    const remaining = deadline - runtimeNow();
    if (remaining <= 0) {
      return finish("timed_out");
    }

    const callBudget = Math.min(callTimeoutMs, remaining);
    stats.polls += 1;
    try {
      const status = await withTimeout(
        checker.check(address, { service, timeoutMs: callBudget }),
        callBudget,
        `health check on ${address}`,
      );
      stats.lastStatus = status;
      if (status === "SERVING") {
        const exitAfter = target.exitInfo();
        if (exitAfter) {
          return { ...finish("crashed"), exit: exitAfter };
        }
        return finish("ready");
      }
      stats.lastError = null;
    } catch (error) {
      if (isConfigurationError(error)) {
        throw error;
      }
      stats.lastError = describeError(error);
    }

    logger?.debug("probe_not_ready", {
      poll: stats.polls,
      status: stats.lastStatus,
      error: stats.lastError,
    });

    const afterCall = deadline - runtimeNow();
    if (afterCall <= 0) {
      continue;
    }
    await sleep(Math.min(intervalMs, afterCall));
  }
}
