/**
 * Gateway responsible for spawning the service under test. It validates the
 * command and arguments, builds the child environment and always pipes stdio
 * so the harness owns every output stream.
 */
import { spawn as nodeSpawn, type SpawnOptions } from "node:child_process";
import type { EventEmitter } from "node:events";
import type { Readable } from "node:stream";

import type { ProcessEnv, SignalName } from "../nodePrimitives.js";

/**
 * Surface of a spawned child the harness relies on. `ChildProcess` satisfies
 * it; tests substitute a controllable emitter.
 */
export interface SpawnedProcess extends EventEmitter {
  readonly pid?: number | undefined;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  kill(signal?: SignalName | number): boolean;
}

export interface SpawnServiceOptions {
  /** Executable name or absolute path. Must not be empty. */
  readonly command: string;
  /** Ordered argument vector forwarded verbatim (no shell). */
  readonly args?: readonly string[];
  readonly cwd?: string;
  /** Overrides applied on top of the inherited environment; `undefined` removes a key. */
  readonly extraEnv?: Record<string, string | undefined>;
  /**
   * When provided, only these keys survive from the inherited environment.
   * Overrides outside the list are rejected.
   */
  readonly allowedEnvKeys?: readonly string[];
}

export class InvalidChildProcessCommandError extends Error {
  constructor(command: unknown) {
    super(`Child process command must be a non-empty string. Received: "${String(command)}".`);
    this.name = "InvalidChildProcessCommandError";
  }
}

export class InvalidChildProcessArgumentError extends TypeError {
  constructor(value: unknown, index: number) {
    super(`Child process arguments must be strings without NUL bytes. Argument at index ${index} is ${typeof value}.`);
    this.name = "InvalidChildProcessArgumentError";
  }
}

export class ChildProcessEnvViolationError extends Error {
  constructor(key: string) {
    super(`Environment variable "${key}" is not allow-listed for the spawned service.`);
    this.name = "ChildProcessEnvViolationError";
  }
}

export interface ChildProcessGateway {
  /**
   * Spawns the process. Synchronous validation failures throw; OS level
   * failures (ENOENT, EACCES) surface later through the child's `error` event.
   */
  spawn(options: SpawnServiceOptions): SpawnedProcess;
}

export type SpawnImpl = (command: string, args: readonly string[], options: SpawnOptions) => SpawnedProcess;

interface ChildProcessGatewayDeps {
  /** Concrete spawn implementation (defaults to Node.js {@link nodeSpawn}). */
  readonly spawnImpl?: SpawnImpl;
  /** Environment the child inherits. Defaults to {@link process.env}. */
  readonly baseEnv?: ProcessEnv;
}

export function createChildProcessGateway({
  spawnImpl = nodeSpawn,
  baseEnv = process.env,
}: ChildProcessGatewayDeps = {}): ChildProcessGateway {
  return {
    spawn(options: SpawnServiceOptions): SpawnedProcess {
      const command = options.command;
      if (typeof command !== "string" || command.trim().length === 0) {
        throw new InvalidChildProcessCommandError(command);
      }

      const spawnOptions: SpawnOptions = {
        env: buildEnv(baseEnv, options),
        stdio: ["ignore", "pipe", "pipe"],
        shell: false,
        windowsHide: true,
        ...(options.cwd !== undefined ? { cwd: options.cwd } : {}),
      };

      return spawnImpl(command, normaliseArgs(options.args), spawnOptions);
    },
  };
}

function normaliseArgs(args: SpawnServiceOptions["args"]): string[] {
  if (args === undefined) {
    return [];
  }
  if (!Array.isArray(args)) {
    throw new InvalidChildProcessArgumentError(args, -1);
  }
  return args.map((value: unknown, index) => {
    if (typeof value !== "string" || value.includes("\u0000")) {
      throw new InvalidChildProcessArgumentError(value, index);
    }
    return value;
  });
}

function buildEnv(baseEnv: ProcessEnv, { extraEnv = {}, allowedEnvKeys }: SpawnServiceOptions): ProcessEnv {
  const allowSet = allowedEnvKeys ? new Set(allowedEnvKeys) : null;
  const env: ProcessEnv = {};

  for (const [key, value] of Object.entries(baseEnv)) {
    if (value !== undefined && (!allowSet || allowSet.has(key))) {
      env[key] = value;
    }
  }

  for (const [key, value] of Object.entries(extraEnv)) {
    if (allowSet && !allowSet.has(key)) {
      throw new ChildProcessEnvViolationError(key);
    }
    if (value === undefined) {
      delete env[key];
    } else {
      env[key] = value;
    }
  }

  return env;
}
