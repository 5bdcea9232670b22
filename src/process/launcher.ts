import { ServiceLaunchError, describeError } from "../errors.js";
import {
  createChildProcessGateway,
  type ChildProcessGateway,
} from "../gateways/childProcess.js";
import { StructuredLogger } from "../logger.js";
import { ManagedProcess, type ManagedProcessTimings } from "./managedProcess.js";
import { installExitHook, liveProcesses, type ProcessRegistry } from "./registry.js";

export const DEFAULT_PORT_FLAG = "--port";

/** Immutable description of one launch. */
export interface LaunchSpec {
  readonly executable: string;
  readonly host: string;
  readonly port: number;
  readonly portFlag: string;
  readonly extraArgs: readonly string[];
  readonly cwd?: string;
  readonly env?: Readonly<Record<string, string | undefined>>;
  /** Variables the service may inherit; everything else is dropped. */
  readonly envAllowList?: readonly string[];
}

export interface LaunchSpecInput {
  executable: string;
  host: string;
  port: number;
  portFlag?: string;
  extraArgs?: readonly string[];
  cwd?: string;
  env?: Record<string, string | undefined>;
  envAllowList?: readonly string[];
}

export function createLaunchSpec(input: LaunchSpecInput): LaunchSpec {
  return Object.freeze({
    executable: input.executable,
    host: input.host,
    port: input.port,
    portFlag: input.portFlag ?? DEFAULT_PORT_FLAG,
    extraArgs: Object.freeze([...(input.extraArgs ?? [])]),
    ...(input.cwd !== undefined ? { cwd: input.cwd } : {}),
    ...(input.env !== undefined ? { env: Object.freeze({ ...input.env }) } : {}),
    ...(input.envAllowList !== undefined ? { envAllowList: Object.freeze([...input.envAllowList]) } : {}),
  });
}

/** Argument vector passed to the service: `--port <n>` followed by the extra flags. */
export function buildLaunchArgs(spec: LaunchSpec): string[] {
  return [spec.portFlag, String(spec.port), ...spec.extraArgs];
}

export interface ProcessLauncher {
  /**
   * Starts the service described by `spec` and resolves once the OS confirmed
   * the spawn. Readiness is not awaited.
   */
  launch(spec: LaunchSpec): Promise<ManagedProcess>;
}

export interface ProcessLauncherDeps {
  gateway?: ChildProcessGateway;
  logger?: StructuredLogger;
  outputLimitBytes?: number;
  timings?: Partial<ManagedProcessTimings>;
  /** Registry reaped on runner exit. Defaults to {@link liveProcesses}. */
  registry?: ProcessRegistry;
  /** Installs the `exit` safety net on first launch. Defaults to true. */
  installExitHook?: boolean;
}

export function createProcessLauncher(deps: ProcessLauncherDeps = {}): ProcessLauncher {
  const gateway = deps.gateway ?? createChildProcessGateway();
  const logger = deps.logger ?? new StructuredLogger();
  const registry = deps.registry ?? liveProcesses;
  const wantsExitHook = deps.installExitHook ?? true;

  return {
    async launch(spec: LaunchSpec): Promise<ManagedProcess> {
      if (wantsExitHook) {
        installExitHook(registry);
      }

      const args = buildLaunchArgs(spec);
      let managed: ManagedProcess;
      try {
        const child = gateway.spawn({
          command: spec.executable,
          args,
          ...(spec.cwd !== undefined ? { cwd: spec.cwd } : {}),
          ...(spec.env !== undefined ? { extraEnv: spec.env } : {}),
          ...(spec.envAllowList !== undefined ? { allowedEnvKeys: spec.envAllowList } : {}),
        });
        managed = new ManagedProcess({
          child,
          executable: spec.executable,
          host: spec.host,
          port: spec.port,
          logger,
          registry,
          ...(deps.outputLimitBytes !== undefined ? { outputLimitBytes: deps.outputLimitBytes } : {}),
          ...(deps.timings !== undefined ? { timings: deps.timings } : {}),
        });
      } catch (error) {
        throw new ServiceLaunchError(spec.executable, error);
      }

      try {
        await managed.waitUntilSpawned();
      } catch (error) {
        logger.error("launch_failed", { executable: spec.executable, port: spec.port, reason: describeError(error) });
        throw new ServiceLaunchError(spec.executable, error);
      }

      logger.info("process_spawned", { executable: spec.executable, pid: managed.pid, address: managed.address, args });
      return managed;
    },
  };
}
