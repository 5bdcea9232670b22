import type { FailureReport } from "./supervisor/failureReport.js";

/** Machine readable codes attached to every harness failure. */
export type HarnessErrorCode =
  | "E_HARNESS_OPTIONS"
  | "E_HARNESS_EXECUTABLE"
  | "E_HARNESS_LAUNCH"
  | "E_HARNESS_BINDINGS"
  | "E_HARNESS_EXHAUSTED"
  | "E_HARNESS_TEARDOWN"
  | "E_HARNESS_PORTS"
  | "E_HARNESS_STATE";

/**
 * Base class of the harness error taxonomy. `code` stays stable across
 * releases so test reporters can branch on it; `hint` is a short operator
 * facing suggestion.
 */
export class HarnessError extends Error {
  public readonly code: HarnessErrorCode;
  public readonly hint: string | undefined;
  public readonly details: unknown;

  constructor(code: HarnessErrorCode, message: string, options: { hint?: string; details?: unknown; cause?: unknown } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "HarnessError";
    this.code = code;
    this.hint = options.hint;
    this.details = options.details;
  }
}

/** Options rejected by schema validation. */
export class InvalidHarnessOptionsError extends HarnessError {
  constructor(issues: readonly string[], cause?: unknown) {
    super("E_HARNESS_OPTIONS", `Invalid harness options: ${issues.join("; ")}`, {
      hint: "check the supervisor options or the HARNESS_* environment variables",
      details: { issues },
      cause,
    });
    this.name = "InvalidHarnessOptionsError";
  }
}

/** No usable service binary was found at any of the candidate locations. */
export class ServiceExecutableNotFoundError extends HarnessError {
  public readonly tried: readonly string[];

  constructor(tried: readonly string[]) {
    const listing = tried.length > 0 ? tried.map((path) => `  - ${path}`).join("\n") : "  (no candidates)";
    super("E_HARNESS_EXECUTABLE", `Service executable not found. Tried:\n${listing}`, {
      hint: "build the service first or point HARNESS_SERVICE_EXE at the binary",
      details: { tried },
    });
    this.name = "ServiceExecutableNotFoundError";
    this.tried = Object.freeze([...tried]);
  }
}

/** The binary could not be spawned at all (missing, not executable, invalid command). */
export class ServiceLaunchError extends HarnessError {
  public readonly executable: string;

  constructor(executable: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super("E_HARNESS_LAUNCH", `Failed to spawn ${executable}: ${reason}`, {
      hint: "verify the executable path and its permissions",
      details: { executable },
      cause,
    });
    this.name = "ServiceLaunchError";
    this.executable = executable;
  }
}

/** The health-check schema could not be loaded or lacks the configured call. */
export class BindingsUnavailableError extends HarnessError {
  constructor(message: string, details: Record<string, unknown>, cause?: unknown) {
    super("E_HARNESS_BINDINGS", message, {
      hint: "check health.protoPath, health.serviceType and health.method",
      details,
      cause,
    });
    this.name = "BindingsUnavailableError";
  }
}

/** Every permitted attempt failed; the report aggregates their diagnostics. */
export class ReadinessExhaustedError extends HarnessError {
  public readonly report: FailureReport;

  constructor(report: FailureReport) {
    super("E_HARNESS_EXHAUSTED", report.format(), {
      hint: "inspect the per-attempt output above",
      details: report.toJSON(),
    });
    this.name = "ReadinessExhaustedError";
    this.report = report;
  }
}

/** The process survived both the graceful signal and SIGKILL. */
export class ProcessTerminationError extends HarnessError {
  public readonly pid: number;

  constructor(pid: number, waitedMs: number) {
    super("E_HARNESS_TEARDOWN", `Process ${pid} did not exit within ${waitedMs}ms of SIGKILL`, {
      hint: "the process may be stuck in uninterruptible sleep; check the host",
      details: { pid, waitedMs },
    });
    this.name = "ProcessTerminationError";
    this.pid = pid;
  }
}

/** The port allocator kept handing back ports this run already used. */
export class PortAllocationError extends HarnessError {
  public readonly draws: number;

  constructor(draws: number, usedPorts: readonly number[]) {
    super("E_HARNESS_PORTS", `Port allocator returned only used ports after ${draws} draws`, {
      hint: "the allocator must hand out a fresh port for every attempt",
      details: { draws, usedPorts },
    });
    this.name = "PortAllocationError";
    this.draws = draws;
  }
}

/** A supervisor was driven outside its state machine (e.g. `start()` twice). */
export class SupervisorStateError extends HarnessError {
  constructor(message: string) {
    super("E_HARNESS_STATE", message);
    this.name = "SupervisorStateError";
  }
}

const CONFIGURATION_CODES: ReadonlySet<HarnessErrorCode> = new Set([
  "E_HARNESS_OPTIONS",
  "E_HARNESS_EXECUTABLE",
  "E_HARNESS_LAUNCH",
  "E_HARNESS_BINDINGS",
]);

/** True for failures that retrying on another port cannot fix. */
export function isConfigurationError(error: unknown): error is HarnessError {
  return error instanceof HarnessError && CONFIGURATION_CODES.has(error.code);
}

/** Renders any thrown value as a single line for logs and reports. */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message.split("\n")[0] ?? error.name;
  }
  return String(error);
}
