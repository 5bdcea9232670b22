import {
  PortAllocationError,
  ReadinessExhaustedError,
  SupervisorStateError,
  describeError,
  isConfigurationError,
} from "../errors.js";
import { resolveSupervisorOptions, type ResolvedSupervisorOptions, type SupervisorOptions } from "../config/options.js";
import { createBindingsProvider } from "../health/bindings.js";
import { GrpcHealthChecker, type HealthChecker } from "../health/healthClient.js";
import { probeReadiness, type ProbeOutcome } from "../health/readinessProbe.js";
import { StructuredLogger } from "../logger.js";
import { createLaunchSpec, createProcessLauncher, type ProcessLauncher } from "../process/launcher.js";
import type { ManagedProcess, StopResult } from "../process/managedProcess.js";
import { ephemeralPortAllocator, formatAddress, type PortAllocator } from "../process/ports.js";
import { runtimeNow } from "../runtime/timers.js";
import { FailureReport, type FailedAttemptOutcome } from "./failureReport.js";

export type SupervisorState = "idle" | "attempting" | "succeeded" | "exhausted" | "aborted";

export type AttemptOutcome = "pending" | "ready" | FailedAttemptOutcome;

export interface AttemptRecord {
  readonly index: number;
  readonly port: number;
  readonly address: string;
  readonly startedAt: number;
  outcome: AttemptOutcome;
}

export interface SupervisorDeps {
  allocator?: PortAllocator;
  launcher?: ProcessLauncher;
  checker?: HealthChecker;
  logger?: StructuredLogger;
}

/** How many times the allocator may hand back an already used port before the run gives up. */
export const MAX_PORT_DRAWS = 16;

const FAILED_OUTCOME: Record<Exclude<ProbeOutcome["kind"], "ready">, FailedAttemptOutcome> = {
  crashed: "crashed_before_ready",
  timed_out: "timed_out",
};

/**
 * Drives attempts until one service reports ready: allocate a fresh port,
 * launch, probe, and on failure dispose of the attempt before retrying.
 * Only one attempt is alive at any time.
 */
export class ServiceSupervisor {
  public readonly options: ResolvedSupervisorOptions;

  private readonly allocator: PortAllocator;
  private readonly launcher: ProcessLauncher;
  private readonly checker: HealthChecker;
  private readonly ownsChecker: boolean;
  private readonly logger: StructuredLogger;
  private readonly usedPorts = new Set<number>();
  private readonly records: AttemptRecord[] = [];
  private currentState: SupervisorState = "idle";
  private service: ManagedProcess | null = null;

  constructor(options: ResolvedSupervisorOptions, deps: SupervisorDeps = {}) {
    this.options = options;
    this.logger = (deps.logger ?? new StructuredLogger()).child({ executable: options.executable });
    this.allocator = deps.allocator ?? ephemeralPortAllocator;
    this.launcher =
      deps.launcher ??
      createProcessLauncher({
        logger: this.logger,
        outputLimitBytes: options.outputLimitBytes,
        timings: { graceMs: options.stopGraceMs, forceMs: options.stopForceMs, drainMs: options.outputDrainMs },
      });
    this.ownsChecker = deps.checker === undefined;
    this.checker =
      deps.checker ??
      new GrpcHealthChecker({
        bindings: createBindingsProvider(options.health),
        logger: this.logger,
      });
  }

  get state(): SupervisorState {
    return this.currentState;
  }

  get attempts(): readonly AttemptRecord[] {
    return this.records;
  }

  /** The ready service once {@link start} succeeded. */
  get process(): ManagedProcess | null {
    return this.service;
  }

  /**
   * Runs the attempt loop. Resolves with the ready service, or rejects with
   * {@link ReadinessExhaustedError} once every attempt failed. Configuration
   * errors are never retried.
   */
  async start(): Promise<ManagedProcess> {
    if (this.currentState !== "idle") {
      throw new SupervisorStateError(`start() can only be called once (state: ${this.currentState})`);
    }
    this.currentState = "attempting";

    const { maxAttempts } = this.options;
    const report = new FailureReport(this.options.executable, maxAttempts);
    let active: ManagedProcess | null = null;

    try {
      await this.checker.prepare();

      for (let index = 1; index <= maxAttempts; index += 1) {
        const port = await this.allocatePort();
        const record: AttemptRecord = {
          index,
          port,
          address: formatAddress(this.options.host, port),
          startedAt: runtimeNow(),
          outcome: "pending",
        };
        this.records.push(record);
        const log = this.logger.child({ attempt: index, port });
        log.info("attempt_started", { maxAttempts, address: record.address });

        active = await this.launcher.launch(
          createLaunchSpec({
            executable: this.options.executable,
            host: this.options.host,
            port,
            portFlag: this.options.portFlag,
            extraArgs: this.options.extraArgs,
            ...(this.options.cwd !== undefined ? { cwd: this.options.cwd } : {}),
            ...(this.options.env !== undefined ? { env: this.options.env } : {}),
            ...(this.options.envAllowList !== undefined ? { envAllowList: this.options.envAllowList } : {}),
          }),
        );

        const outcome = await probeReadiness({
          address: active.address,
          target: active,
          checker: this.checker,
          deadlineMs: this.options.readyTimeoutMs,
          intervalMs: this.options.pollIntervalMs,
          callTimeoutMs: this.options.probeCallTimeoutMs,
          serviceName: this.options.health.serviceName,
          logger: log,
        });

        if (outcome.kind === "ready") {
          record.outcome = "ready";
          this.checker.release(active.address);
          this.service = active;
          this.currentState = "succeeded";
          log.info("service_ready", { pid: active.pid, polls: outcome.polls, elapsedMs: outcome.elapsedMs });
          return active;
        }

        const failedOutcome = FAILED_OUTCOME[outcome.kind];
        record.outcome = failedOutcome;
        const failed: ManagedProcess = active;
        active = null;
        const disposal = await failed.dispose({
          graceMs: this.options.stopGraceMs,
          forceMs: this.options.stopForceMs,
          drainMs: this.options.outputDrainMs,
        });
        this.checker.release(failed.address);

        const exit = failed.exitInfo() ?? (outcome.kind === "crashed" ? outcome.exit : null);
        const { output } = disposal;
        report.add({
          attempt: index,
          port,
          address: failed.address,
          outcome: failedOutcome,
          exitCode: exit?.code ?? null,
          exitSignal: exit?.signal ?? null,
          polls: outcome.polls,
          elapsedMs: outcome.elapsedMs,
          lastError: outcome.lastError,
          lastStatus: outcome.lastStatus,
          stdout: output.stdout,
          stderr: output.stderr,
          outputTruncated: output.truncatedBytes.stdout > 0 || output.truncatedBytes.stderr > 0 || !output.complete,
          teardownError: disposal.teardownError ? describeError(disposal.teardownError) : null,
        });
        log.warn("attempt_failed", {
          outcome: failedOutcome,
          exitCode: exit?.code ?? null,
          exitSignal: exit?.signal ?? null,
          polls: outcome.polls,
          lastError: outcome.lastError,
        });

        if (disposal.teardownError) {
          log.error("retries_abandoned", { reason: describeError(disposal.teardownError) });
          break;
        }
      }
    } catch (error) {
      if (active) {
        const orphan: ManagedProcess = active;
        await orphan.dispose({ graceMs: this.options.stopGraceMs, forceMs: this.options.stopForceMs, drainMs: 0 });
        this.checker.release(orphan.address);
      }
      this.currentState = "aborted";
      this.logger.error("supervisor_aborted", {
        reason: describeError(error),
        configuration: isConfigurationError(error),
      });
      throw error;
    } finally {
      if (this.ownsChecker) {
        this.checker.close();
      }
    }

    this.currentState = "exhausted";
    this.logger.error("supervisor_exhausted", { attempts: report.entries.length, ports: report.ports });
    throw new ReadinessExhaustedError(report);
  }

  /** Stops the ready service. A no-op before success or after a completed stop. */
  async stop(): Promise<StopResult | null> {
    const service = this.service;
    if (!service) {
      return null;
    }
    return service.stop({ graceMs: this.options.stopGraceMs, forceMs: this.options.stopForceMs });
  }

  private async allocatePort(): Promise<number> {
    for (let draw = 0; draw < MAX_PORT_DRAWS; draw += 1) {
      const port = await this.allocator.allocate(this.options.host);
      if (!this.usedPorts.has(port)) {
        this.usedPorts.add(port);
        return port;
      }
      this.logger.debug("port_reused_by_allocator", { port });
    }
    throw new PortAllocationError(MAX_PORT_DRAWS, [...this.usedPorts]);
  }
}

/** Validates `options` and builds a supervisor around them. */
export function createServiceSupervisor(options: SupervisorOptions, deps: SupervisorDeps = {}): ServiceSupervisor {
  return new ServiceSupervisor(resolveSupervisorOptions(options), deps);
}
