import { resolveHealthOptions, type SupervisorOptions } from "./config/options.js";
import { describeError } from "./errors.js";
import {
  DEFAULT_EXECUTABLE_ENV_VAR,
  resolveServiceExecutable,
} from "./discovery/executable.js";
import { createBindingsProvider, type BindingsProvider, type HealthBindings } from "./health/bindings.js";
import { GrpcHealthChecker, type HealthChecker } from "./health/healthClient.js";
import { StructuredLogger } from "./logger.js";
import type { ManagedProcess } from "./process/managedProcess.js";
import type { PortAllocator } from "./process/ports.js";
import type { ProcessLauncher } from "./process/launcher.js";
import { acquireService, runWithLease, type ServiceLease } from "./supervisor/scope.js";

export type ServiceOverrides = Omit<SupervisorOptions, "executable">;

export interface HarnessSessionOptions {
  /** Path of the binary. Skips discovery when set. */
  executable?: string;
  /** Names looked up in the build directories. Needed unless `executable` or the env variable points at the binary. */
  executableNames?: readonly string[];
  root?: string;
  searchDirs?: readonly string[];
  envVar?: string;
  /** Options applied to every service started by the session. */
  defaults?: ServiceOverrides;
  logger?: StructuredLogger;
  allocator?: PortAllocator;
  launcher?: ProcessLauncher;
  /** Health checker shared by the session's services. Defaults to gRPC over the session bindings. */
  checker?: HealthChecker;
}

export interface PreparedSession {
  readonly executable: string;
  readonly bindings: HealthBindings;
}

/**
 * Setup shared by a whole test run: resolves the executable and loads the
 * health bindings once, then starts any number of isolated services.
 */
export class HarnessSession {
  private readonly options: HarnessSessionOptions;
  private readonly logger: StructuredLogger;
  private readonly bindings: BindingsProvider;
  private readonly checker: HealthChecker;
  private readonly ownsChecker: boolean;
  private readonly leases = new Set<ServiceLease>();
  private prepared: Promise<PreparedSession> | null = null;
  private closed = false;

  constructor(options: HarnessSessionOptions = {}) {
    this.options = options;
    this.logger = options.logger ?? new StructuredLogger();
    this.bindings = createBindingsProvider(resolveHealthOptions(options.defaults?.health));
    this.ownsChecker = options.checker === undefined;
    this.checker = options.checker ?? new GrpcHealthChecker({ bindings: this.bindings, logger: this.logger });
  }

  /** Resolves the executable and loads bindings. Memoised; a failed preparation is retried. */
  prepare(): Promise<PreparedSession> {
    if (!this.prepared) {
      const attempt = this.runPrepare();
      this.prepared = attempt;
      void attempt.catch(() => {
        if (this.prepared === attempt) {
          this.prepared = null;
        }
      });
    }
    return this.prepared;
  }

  /** Starts a service; the session releases it on {@link close} if the caller did not. */
  async startService(overrides: ServiceOverrides = {}): Promise<ServiceLease> {
    if (this.closed) {
      throw new Error("HarnessSession is closed");
    }
    const { executable } = await this.prepare();
    const defaults = this.options.defaults ?? {};
    const health = overrides.health ?? defaults.health;
    const options: SupervisorOptions = {
      ...defaults,
      ...overrides,
      ...(health !== undefined ? { health } : {}),
      executable,
    };
    // A service asking for another health revision gets its own checker.
    const shareChecker = overrides.health === undefined;
    const lease = await acquireService(options, {
      logger: this.logger,
      ...(this.options.allocator ? { allocator: this.options.allocator } : {}),
      ...(this.options.launcher ? { launcher: this.options.launcher } : {}),
      ...(shareChecker ? { checker: this.checker } : {}),
    });
    this.leases.add(lease);
    return {
      process: lease.process,
      address: lease.address,
      port: lease.port,
      release: async () => {
        const result = await lease.release();
        this.leases.delete(lease);
        return result;
      },
    };
  }

  async withService<T>(fn: (service: ManagedProcess) => Promise<T> | T, overrides: ServiceOverrides = {}): Promise<T> {
    const lease = await this.startService(overrides);
    return runWithLease(lease, fn, this.logger);
  }

  /** Releases every service still running and closes the shared health client. */
  async close(): Promise<void> {
    this.closed = true;
    const failures: unknown[] = [];
    for (const lease of [...this.leases]) {
      try {
        await lease.release();
        this.leases.delete(lease);
      } catch (error) {
        failures.push(error);
        this.logger.error("teardown_failed", { address: lease.address, reason: describeError(error) });
      }
    }
    if (this.ownsChecker) {
      this.checker.close();
    }
    await this.logger.flush();
    if (failures.length > 0) {
      throw new AggregateError(failures, `${failures.length} service(s) could not be stopped`);
    }
  }

  private async runPrepare(): Promise<PreparedSession> {
    const executable = await resolveServiceExecutable({
      names: this.options.executableNames ?? [],
      envVar: this.options.envVar ?? DEFAULT_EXECUTABLE_ENV_VAR,
      logger: this.logger,
      ...(this.options.executable !== undefined ? { explicit: this.options.executable } : {}),
      ...(this.options.root !== undefined ? { root: this.options.root } : {}),
      ...(this.options.searchDirs !== undefined ? { searchDirs: this.options.searchDirs } : {}),
    });
    const bindings = await this.bindings.load();
    this.logger.info("session_prepared", { executable, protoPath: bindings.protoPath });
    return { executable, bindings };
  }
}
