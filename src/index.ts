export {
  HarnessError,
  InvalidHarnessOptionsError,
  ServiceExecutableNotFoundError,
  ServiceLaunchError,
  BindingsUnavailableError,
  ReadinessExhaustedError,
  ProcessTerminationError,
  PortAllocationError,
  SupervisorStateError,
  isConfigurationError,
  describeError,
  type HarnessErrorCode,
} from "./errors.js";
export { StructuredLogger, type LogEntry, type LogLevel, type LogThreshold, type LoggerOptions } from "./logger.js";
export {
  SupervisorOptionsSchema,
  HealthOptionsSchema,
  resolveSupervisorOptions,
  resolveHealthOptions,
  type SupervisorOptions,
  type HealthOptions,
  type ResolvedSupervisorOptions,
  type ResolvedHealthOptions,
} from "./config/options.js";
export {
  allocateFreePort,
  isPortFree,
  formatAddress,
  ephemeralPortAllocator,
  LOOPBACK_HOST,
  type PortAllocator,
} from "./process/ports.js";
export {
  createLaunchSpec,
  buildLaunchArgs,
  createProcessLauncher,
  type LaunchSpec,
  type LaunchSpecInput,
  type ProcessLauncher,
  type ProcessLauncherDeps,
} from "./process/launcher.js";
export {
  ManagedProcess,
  type ManagedProcessExit,
  type StopOptions,
  type StopResult,
  type DisposeOptions,
  type DisposeResult,
} from "./process/managedProcess.js";
export { OutputCollector, DEFAULT_OUTPUT_LIMIT_BYTES, type CollectedOutput } from "./process/outputCollector.js";
export {
  liveProcesses,
  installExitHook,
  uninstallExitHook,
  ProcessRegistry,
  type ExitHookOptions,
} from "./process/registry.js";
export {
  createChildProcessGateway,
  ChildProcessEnvViolationError,
  type ChildProcessGateway,
  type SpawnServiceOptions,
} from "./gateways/childProcess.js";
export {
  createBindingsProvider,
  resolveServiceConstructor,
  DEFAULT_PROTO_PATH,
  DEFAULT_HEALTH_SERVICE_TYPE,
  type BindingsProvider,
  type HealthBindings,
} from "./health/bindings.js";
export {
  GrpcHealthChecker,
  parseHealthStatus,
  HEALTH_STATUSES,
  type HealthChecker,
  type HealthCheckOptions,
  type HealthStatus,
} from "./health/healthClient.js";
export { probeReadiness, type ProbeOutcome, type ProbeOptions, type ProbeTarget } from "./health/readinessProbe.js";
export { FailureReport, type FailureReportEntry } from "./supervisor/failureReport.js";
export {
  ServiceSupervisor,
  createServiceSupervisor,
  type SupervisorState,
  type AttemptRecord,
  type SupervisorDeps,
} from "./supervisor/retryCoordinator.js";
export { withService, acquireService, type ServiceLease } from "./supervisor/scope.js";
export { resolveServiceExecutable, DEFAULT_SEARCH_DIRS, type ResolveExecutableOptions } from "./discovery/executable.js";
export { HarnessSession, type HarnessSessionOptions, type PreparedSession, type ServiceOverrides } from "./session.js";
