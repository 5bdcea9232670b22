import { describeError } from "../errors.js";
import type { SupervisorOptions } from "../config/options.js";
import { StructuredLogger } from "../logger.js";
import type { ManagedProcess, StopResult } from "../process/managedProcess.js";
import { createServiceSupervisor, type SupervisorDeps } from "./retryCoordinator.js";

/** A started service plus the handle that tears it down. */
export interface ServiceLease {
  readonly process: ManagedProcess;
  readonly address: string;
  readonly port: number;
  /** Stops the service. Repeated calls share the first successful teardown. */
  release(): Promise<StopResult>;
}

function createLease(process: ManagedProcess, stop: () => Promise<StopResult>): ServiceLease {
  let released: Promise<StopResult> | null = null;
  return {
    process,
    address: process.address,
    port: process.port,
    release(): Promise<StopResult> {
      if (!released) {
        const attempt = stop();
        released = attempt;
        void attempt.catch(() => {
          if (released === attempt) {
            released = null;
          }
        });
      }
      return released;
    },
  };
}

/**
 * Starts a service and returns a lease, for setups split across
 * `before`/`after` hooks. The caller must `release()` it.
 */
export async function acquireService(options: SupervisorOptions, deps: SupervisorDeps = {}): Promise<ServiceLease> {
  const supervisor = createServiceSupervisor(options, deps);
  const process = await supervisor.start();
  const { stopGraceMs, stopForceMs } = supervisor.options;
  return createLease(process, () => process.stop({ graceMs: stopGraceMs, forceMs: stopForceMs }));
}

/**
 * Runs `fn` against a ready service and stops the service on every exit
 * path. When `fn` throws, a teardown failure is logged and the original
 * error is rethrown.
 */
export async function withService<T>(
  options: SupervisorOptions,
  fn: (service: ManagedProcess) => Promise<T> | T,
  deps: SupervisorDeps = {},
): Promise<T> {
  const lease = await acquireService(options, deps);
  return runWithLease(lease, fn, deps.logger ?? new StructuredLogger());
}

/** Runs `fn` and releases `lease` afterwards without letting teardown mask `fn`'s error. */
export async function runWithLease<T>(
  lease: ServiceLease,
  fn: (service: ManagedProcess) => Promise<T> | T,
  logger: StructuredLogger,
): Promise<T> {
  let result: T;
  try {
    result = await fn(lease.process);
  } catch (error) {
    try {
      await lease.release();
    } catch (teardownError) {
      logger.error("teardown_failed", {
        address: lease.address,
        reason: describeError(teardownError),
        primary: describeError(error),
      });
    }
    throw error;
  }
  await lease.release();
  return result;
}
