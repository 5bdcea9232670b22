import type { HealthOptions, SupervisorOptions } from "./config/options.js";
import { LOOPBACK_HOST } from "./process/ports.js";

export const DEFAULT_PROBE_TIMEOUT_MS = 1_000;

export type CliCommand =
  | { kind: "up"; options: SupervisorOptions }
  | { kind: "probe"; address: string; timeoutMs: number; health: HealthOptions }
  | { kind: "free-port"; host: string }
  | { kind: "help" };

export const USAGE = `Usage:
  service-harness up <executable> [--host H] [--port-flag F] [--dt S] [--max-attempts N]
                     [--ready-timeout-ms N] [--poll-interval-ms N] [--probe-timeout-ms N]
                     [--proto P] [--health-service T] [--service-name S] [-- extra args]
  service-harness probe <host:port> [--proto P] [--health-service T] [--service-name S] [--timeout-ms N]
  service-harness free-port [--host H]
`;

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

const FLAGS_BY_COMMAND: Record<Exclude<CliCommand["kind"], "help">, ReadonlySet<string>> = {
  up: new Set([
    "--host",
    "--port-flag",
    "--dt",
    "--max-attempts",
    "--ready-timeout-ms",
    "--poll-interval-ms",
    "--probe-timeout-ms",
    "--proto",
    "--health-service",
    "--service-name",
  ]),
  probe: new Set(["--proto", "--health-service", "--service-name", "--timeout-ms"]),
  "free-port": new Set(["--host"]),
};

interface ParsedFlags {
  positionals: string[];
  values: Map<string, string>;
  passthrough: string[];
}

function collectFlags(argv: readonly string[], allowed: ReadonlySet<string>): ParsedFlags {
  const parsed: ParsedFlags = { positionals: [], values: new Map(), passthrough: [] };

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];
    if (arg === "--") {
      parsed.passthrough = argv.slice(index + 1);
      break;
    }
    if (!arg.startsWith("--")) {
      parsed.positionals.push(arg);
      continue;
    }

    const separator = arg.indexOf("=");
    const flag = separator === -1 ? arg : arg.slice(0, separator);
    if (!allowed.has(flag)) {
      throw new CliUsageError(`Unknown flag ${flag}`);
    }
    let value: string | undefined = separator === -1 ? undefined : arg.slice(separator + 1);
    if (value === undefined) {
      const next = argv[index + 1];
      if (next === undefined || next.startsWith("--")) {
        throw new CliUsageError(`Flag ${flag} requires a value`);
      }
      value = next;
      index += 1;
    }
    parsed.values.set(flag, value);
  }

  return parsed;
}

function parsePositiveInteger(value: string, flag: string): number {
  const num = Number(value);
  if (!Number.isInteger(num) || num <= 0) {
    throw new CliUsageError(`Value ${value} for ${flag} must be a positive integer`);
  }
  return num;
}

function parsePositiveNumber(value: string, flag: string): number {
  const num = Number(value);
  if (!Number.isFinite(num) || num <= 0) {
    throw new CliUsageError(`Value ${value} for ${flag} must be a positive number`);
  }
  return num;
}

function readHealthFlags(values: Map<string, string>): HealthOptions {
  const health: HealthOptions = {};
  const protoPath = values.get("--proto");
  if (protoPath !== undefined) {
    health.protoPath = protoPath;
  }
  const serviceType = values.get("--health-service");
  if (serviceType !== undefined) {
    health.serviceType = serviceType;
  }
  const serviceName = values.get("--service-name");
  if (serviceName !== undefined) {
    health.serviceName = serviceName;
  }
  return health;
}

function singlePositional(positionals: string[], command: string, name: string): string {
  if (positionals.length !== 1) {
    throw new CliUsageError(`${command} expects exactly one ${name}`);
  }
  return positionals[0];
}

/** Parses `process.argv.slice(2)` into a command. Pure: touches neither the environment nor the filesystem. */
export function parseCliArgs(argv: readonly string[]): CliCommand {
  const [command, ...rest] = argv;
  if (command === undefined || command === "help" || command === "--help" || command === "-h") {
    return { kind: "help" };
  }

  switch (command) {
    case "up": {
      const { positionals, values, passthrough } = collectFlags(rest, FLAGS_BY_COMMAND.up);
      const options: SupervisorOptions = { executable: singlePositional(positionals, "up", "executable") };
      for (const [flag, value] of values) {
        switch (flag) {
          case "--host":
            options.host = value;
            break;
          case "--port-flag":
            options.portFlag = value;
            break;
          case "--dt":
            options.dt = parsePositiveNumber(value, flag);
            break;
          case "--max-attempts":
            options.maxAttempts = parsePositiveInteger(value, flag);
            break;
          case "--ready-timeout-ms":
            options.readyTimeoutMs = parsePositiveInteger(value, flag);
            break;
          case "--poll-interval-ms":
            options.pollIntervalMs = parsePositiveInteger(value, flag);
            break;
          case "--probe-timeout-ms":
            options.probeCallTimeoutMs = parsePositiveInteger(value, flag);
            break;
          default:
            break;
        }
      }
      const health = readHealthFlags(values);
      if (Object.keys(health).length > 0) {
        options.health = health;
      }
      if (passthrough.length > 0) {
        options.extraArgs = passthrough;
      }
      return { kind: "up", options };
    }
    case "probe": {
      const { positionals, values } = collectFlags(rest, FLAGS_BY_COMMAND.probe);
      const address = singlePositional(positionals, "probe", "address");
      if (!/^.+:\d+$/.test(address)) {
        throw new CliUsageError(`Address ${address} must look like host:port`);
      }
      const timeout = values.get("--timeout-ms");
      return {
        kind: "probe",
        address,
        timeoutMs: timeout === undefined ? DEFAULT_PROBE_TIMEOUT_MS : parsePositiveInteger(timeout, "--timeout-ms"),
        health: readHealthFlags(values),
      };
    }
    case "free-port": {
      const { positionals, values } = collectFlags(rest, FLAGS_BY_COMMAND["free-port"]);
      if (positionals.length > 0) {
        throw new CliUsageError("free-port takes no positional argument");
      }
      return { kind: "free-port", host: values.get("--host") ?? LOOPBACK_HOST };
    }
    default:
      throw new CliUsageError(`Unknown command ${command}`);
  }
}
