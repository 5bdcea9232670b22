import { ProcessTerminationError, describeError } from "../errors.js";
import type { SpawnedProcess } from "../gateways/childProcess.js";
import { StructuredLogger } from "../logger.js";
import type { ProcessExit, SignalName } from "../nodePrimitives.js";
import {
  DEFAULT_OUTPUT_DRAIN_MS,
  DEFAULT_STOP_FORCE_MS,
  DEFAULT_STOP_GRACE_MS,
} from "../config/timeouts.js";
import { runtimeNow, runtimeTimers, withTimeout, type TimeoutHandle } from "../runtime/timers.js";
import { OutputCollector, type CollectedOutput } from "./outputCollector.js";
import { formatAddress } from "./ports.js";
import type { ProcessRegistry, RegisteredProcess } from "./registry.js";

/** Exit observed for a managed service. */
export interface ManagedProcessExit extends ProcessExit {
  /** True when the harness had escalated to SIGKILL before the exit. */
  forced: boolean;
  /** Spawn or runtime error reported by Node.js instead of a regular exit. */
  error: Error | null;
}

export interface StopOptions {
  /** Signal sent first. Defaults to SIGTERM. */
  signal?: SignalName;
  /** Time granted after the first signal before escalating to SIGKILL. */
  graceMs?: number;
  /** Time granted after SIGKILL before giving up. */
  forceMs?: number;
}

export interface StopResult {
  code: number | null;
  signal: SignalName | null;
  forced: boolean;
  /** True when the process had already exited before `stop()` did anything. */
  alreadyExited: boolean;
  durationMs: number;
}

export interface DisposeOptions extends StopOptions {
  /** Ceiling on waiting for the output streams to end. */
  drainMs?: number;
}

export interface DisposeResult {
  stop: StopResult | null;
  /** Set when the process could not be terminated. */
  teardownError: Error | null;
  output: CollectedOutput;
}

export interface ManagedProcessTimings {
  graceMs: number;
  forceMs: number;
  drainMs: number;
}

export interface ManagedProcessParams {
  child: SpawnedProcess;
  executable: string;
  host: string;
  port: number;
  logger?: StructuredLogger;
  outputLimitBytes?: number;
  timings?: Partial<ManagedProcessTimings>;
  /** Registry tracking the process until it exits. */
  registry?: ProcessRegistry;
}

/**
 * Owns one spawned service. It is the only component allowed to signal or
 * wait on the child. Teardown escalates from the graceful signal to SIGKILL
 * and every wait is bounded.
 */
export class ManagedProcess {
  public readonly executable: string;
  public readonly host: string;
  public readonly port: number;
  public readonly address: string;

  private readonly child: SpawnedProcess;
  private readonly logger: StructuredLogger;
  private readonly collector: OutputCollector;
  private readonly timings: ManagedProcessTimings;
  private readonly registry: ProcessRegistry | undefined;
  private readonly registryEntry: RegisteredProcess;

  /** Settles with the spawn error, or `null` once the OS confirmed the spawn. Never rejects. */
  private readonly spawnSettled: Promise<Error | null>;
  private readonly exitPromise: Promise<ManagedProcessExit>;
  private resolveSpawn: ((error: Error | null) => void) | null = null;
  private resolveExit: ((exit: ManagedProcessExit) => void) | null = null;
  private exit: ManagedProcessExit | null = null;
  private spawned = false;
  private escalated = false;
  private stopPromise: Promise<StopResult> | null = null;

  constructor(params: ManagedProcessParams) {
    this.child = params.child;
    this.executable = params.executable;
    this.host = params.host;
    this.port = params.port;
    this.address = formatAddress(params.host, params.port);
    this.timings = {
      graceMs: params.timings?.graceMs ?? DEFAULT_STOP_GRACE_MS,
      forceMs: params.timings?.forceMs ?? DEFAULT_STOP_FORCE_MS,
      drainMs: params.timings?.drainMs ?? DEFAULT_OUTPUT_DRAIN_MS,
    };
    this.registry = params.registry;
    this.logger = (params.logger ?? new StructuredLogger()).child({ address: this.address });
    this.collector = new OutputCollector(
      { stdout: this.child.stdout, stderr: this.child.stderr },
      params.outputLimitBytes === undefined ? {} : { limitBytes: params.outputLimitBytes },
    );

    const child = this.child;
    this.registryEntry = {
      get pid() {
        return child.pid ?? -1;
      },
      kill: (signal) => child.kill(signal),
    };

    this.spawnSettled = new Promise<Error | null>((resolve) => {
      this.resolveSpawn = resolve;
    });
    this.exitPromise = new Promise<ManagedProcessExit>((resolve) => {
      this.resolveExit = resolve;
    });

    this.setupListeners();
  }

  get pid(): number {
    return this.child.pid ?? -1;
  }

  /** Exit status, or `null` while the process is running. */
  exitInfo(): ManagedProcessExit | null {
    return this.exit;
  }

  isRunning(): boolean {
    return this.spawned && this.exit === null;
  }

  /** Resolves once the OS confirmed the spawn; rejects with the spawn error otherwise. */
  async waitUntilSpawned(): Promise<void> {
    const error = await this.spawnSettled;
    if (error) {
      throw error;
    }
  }

  /**
   * Resolves with the exit status. With a timeout, rejects with an
   * `OperationTimeoutError` when the process is still running once it elapses.
   */
  waitForExit(timeoutMs?: number): Promise<ManagedProcessExit> {
    if (timeoutMs === undefined) {
      return this.exitPromise;
    }
    return withTimeout(this.exitPromise, timeoutMs, `waiting for pid ${this.pid} to exit`);
  }

  /** Output captured so far. */
  output(): CollectedOutput {
    return this.collector.snapshot();
  }

  /**
   * Terminates the process: graceful signal, then SIGKILL after `graceMs`,
   * then {@link ProcessTerminationError} after `forceMs`. Concurrent and
   * repeated calls share one teardown; a failed teardown is forgotten so the
   * next call tries again.
   */
  stop(options: StopOptions = {}): Promise<StopResult> {
    if (this.stopPromise) {
      return this.stopPromise;
    }
    const attempt = this.performStop(options);
    this.stopPromise = attempt;
    void attempt.catch(() => {
      if (this.stopPromise === attempt) {
        this.stopPromise = null;
      }
    });
    return attempt;
  }

  /**
   * Stops the process and drains its output. Never throws: a failed teardown
   * is returned alongside whatever output was captured.
   */
  async dispose(options: DisposeOptions = {}): Promise<DisposeResult> {
    const drainMs = options.drainMs ?? this.timings.drainMs;
    let stop: StopResult | null = null;
    let teardownError: Error | null = null;
    try {
      stop = await this.stop(options);
    } catch (error) {
      teardownError = error instanceof Error ? error : new Error(String(error));
      this.logger.error("teardown_failed", { pid: this.pid, reason: describeError(error) });
    }
    const output = await this.collector.drain(teardownError ? 0 : drainMs);
    return { stop, teardownError, output };
  }

  private async performStop(options: StopOptions): Promise<StopResult> {
    const started = runtimeNow();
    const signal = options.signal ?? "SIGTERM";
    const graceMs = options.graceMs ?? this.timings.graceMs;
    const forceMs = options.forceMs ?? this.timings.forceMs;

    if (!this.spawned && this.exit === null) {
      await this.spawnSettled;
    }
    const before = this.exit;
    if (before) {
      return this.toResult(before, true, started);
    }

    this.logger.debug("stop_requested", { pid: this.pid, signal, graceMs });
    this.child.kill(signal);
    const graceful = await this.exitWithin(graceMs);
    if (graceful) {
      return this.toResult(graceful, false, started);
    }

    this.escalated = true;
    this.logger.warn("stop_escalated", { pid: this.pid, signal: "SIGKILL", graceMs });
    this.child.kill("SIGKILL");
    const forced = await this.exitWithin(forceMs);
    if (forced) {
      return this.toResult(forced, false, started);
    }

    throw new ProcessTerminationError(this.pid, forceMs);
  }

  private toResult(exit: ManagedProcessExit, alreadyExited: boolean, started: number): StopResult {
    return {
      code: exit.code,
      signal: exit.signal,
      forced: exit.forced,
      alreadyExited,
      durationMs: runtimeNow() - started,
    };
  }

  /** Waits up to `timeoutMs` for the exit, resolving `null` when it does not come. */
  private exitWithin(timeoutMs: number): Promise<ManagedProcessExit | null> {
    const current = this.exit;
    if (current) {
      return Promise.resolve(current);
    }
    return new Promise<ManagedProcessExit | null>((resolve) => {
      let timer: TimeoutHandle | null = runtimeTimers.setTimeout(() => {
        timer = null;
        resolve(null);
      }, Math.max(0, timeoutMs));
      void this.exitPromise.then((exit) => {
        if (timer) {
          runtimeTimers.clearTimeout(timer);
          timer = null;
        }
        resolve(exit);
      });
    });
  }

  private setupListeners(): void {
    this.child.once("spawn", () => {
      this.spawned = true;
      this.registry?.add(this.registryEntry);
      this.resolveSpawn?.(null);
    });

    this.child.on("error", (error: Error) => {
      if (!this.spawned) {
        this.resolveSpawn?.(error);
        this.recordExit(null, null, error);
        return;
      }
      this.logger.warn("process_error", { pid: this.pid, reason: error.message });
    });

    this.child.once("exit", (code: number | null, signal: SignalName | null) => {
      this.recordExit(code, signal, null);
    });
  }

  private recordExit(code: number | null, signal: SignalName | null, error: Error | null): void {
    if (this.exit) {
      return;
    }
    this.exit = { code, signal, at: runtimeNow(), forced: this.escalated, error };
    this.registry?.delete(this.registryEntry);
    this.logger.debug("process_exited", { pid: this.pid, code, signal, forced: this.escalated });
    this.resolveExit?.(this.exit);
  }
}
