import { z } from "zod";

import { InvalidHarnessOptionsError } from "../errors.js";
import {
  DEFAULT_HEALTH_METHOD,
  DEFAULT_HEALTH_SERVICE_TYPE,
  DEFAULT_PROTO_PATH,
} from "../health/bindings.js";
import { DEFAULT_OUTPUT_LIMIT_BYTES } from "../process/outputCollector.js";
import { DEFAULT_PORT_FLAG } from "../process/launcher.js";
import { LOOPBACK_HOST } from "../process/ports.js";
import { readOptionalString } from "./env.js";
import {
  MAX_ATTEMPTS_LIMIT,
  MAX_TIMEOUT_MS,
  MIN_READY_TIMEOUT_MS,
  resolveMaxAttempts,
  resolveOutputDrain,
  resolvePollInterval,
  resolveProbeCallTimeout,
  resolveReadyTimeout,
  resolveStopForce,
  resolveStopGrace,
} from "./timeouts.js";

const timeoutSchema = z.number().int().positive().max(MAX_TIMEOUT_MS);

export const HealthOptionsSchema = z
  .object({
    /** Schema file declaring the health call. Defaults to `HARNESS_PROTO_PATH`, then the bundled file. */
    protoPath: z.string().min(1).optional(),
    includeDirs: z.array(z.string().min(1)).optional(),
    serviceType: z.string().min(1).optional(),
    method: z.string().min(1).optional(),
    /** Value of the `service` field in each request. Empty asks about the whole server. */
    serviceName: z.string().optional(),
  })
  .strict();

export const SupervisorOptionsSchema = z
  .object({
    executable: z.string().min(1),
    host: z.string().min(1).optional(),
    portFlag: z.string().min(1).optional(),
    /** Fixed simulation timestep in seconds, forwarded as `--dt <value>`. */
    dt: z.number().positive().optional(),
    extraArgs: z.array(z.string()).optional(),
    cwd: z.string().min(1).optional(),
    env: z.record(z.string().optional()).optional(),
    /** When set, the service inherits only these variables and `env` may only name them. */
    envAllowList: z.array(z.string().min(1)).optional(),
    maxAttempts: z.number().int().positive().max(MAX_ATTEMPTS_LIMIT).optional(),
    readyTimeoutMs: z.number().int().min(MIN_READY_TIMEOUT_MS).max(MAX_TIMEOUT_MS).optional(),
    pollIntervalMs: timeoutSchema.optional(),
    probeCallTimeoutMs: timeoutSchema.optional(),
    stopGraceMs: timeoutSchema.optional(),
    stopForceMs: timeoutSchema.optional(),
    outputDrainMs: z.number().int().nonnegative().max(MAX_TIMEOUT_MS).optional(),
    outputLimitBytes: z.number().int().positive().optional(),
    health: HealthOptionsSchema.optional(),
  })
  .strict();

export type SupervisorOptions = z.input<typeof SupervisorOptionsSchema>;
export type HealthOptions = z.input<typeof HealthOptionsSchema>;

export interface ResolvedHealthOptions {
  protoPath: string;
  includeDirs: string[];
  serviceType: string;
  method: string;
  serviceName: string;
}

export interface ResolvedSupervisorOptions {
  executable: string;
  host: string;
  portFlag: string;
  /** Flags appended after `--port <n>`, `--dt` included. */
  extraArgs: string[];
  cwd: string | undefined;
  env: Record<string, string | undefined> | undefined;
  envAllowList: string[] | undefined;
  maxAttempts: number;
  readyTimeoutMs: number;
  pollIntervalMs: number;
  probeCallTimeoutMs: number;
  stopGraceMs: number;
  stopForceMs: number;
  outputDrainMs: number;
  outputLimitBytes: number;
  health: ResolvedHealthOptions;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`);
}

export function resolveHealthOptions(input: HealthOptions = {}): ResolvedHealthOptions {
  return {
    protoPath: input.protoPath ?? readOptionalString("HARNESS_PROTO_PATH") ?? DEFAULT_PROTO_PATH,
    includeDirs: [...(input.includeDirs ?? [])],
    serviceType: input.serviceType ?? DEFAULT_HEALTH_SERVICE_TYPE,
    method: input.method ?? DEFAULT_HEALTH_METHOD,
    serviceName: input.serviceName ?? "",
  };
}

/**
 * Validates supervisor options and fills every gap from the `HARNESS_*`
 * environment, then from the defaults.
 */
export function resolveSupervisorOptions(input: unknown): ResolvedSupervisorOptions {
  const parsed = SupervisorOptionsSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidHarnessOptionsError(formatIssues(parsed.error), parsed.error);
  }
  const options = parsed.data;
  const readyTimeoutMs = resolveReadyTimeout(options.readyTimeoutMs);
  const dtArgs = options.dt !== undefined ? ["--dt", String(options.dt)] : [];

  return {
    executable: options.executable,
    host: options.host ?? LOOPBACK_HOST,
    portFlag: options.portFlag ?? DEFAULT_PORT_FLAG,
    extraArgs: [...dtArgs, ...(options.extraArgs ?? [])],
    cwd: options.cwd,
    env: options.env,
    envAllowList: options.envAllowList,
    maxAttempts: resolveMaxAttempts(options.maxAttempts),
    readyTimeoutMs,
    pollIntervalMs: resolvePollInterval(options.pollIntervalMs),
    probeCallTimeoutMs: resolveProbeCallTimeout(readyTimeoutMs, options.probeCallTimeoutMs),
    stopGraceMs: resolveStopGrace(options.stopGraceMs),
    stopForceMs: resolveStopForce(options.stopForceMs),
    outputDrainMs: resolveOutputDrain(options.outputDrainMs),
    outputLimitBytes: options.outputLimitBytes ?? DEFAULT_OUTPUT_LIMIT_BYTES,
    health: resolveHealthOptions(options.health),
  };
}
