#!/usr/bin/env node
import { constants } from "node:os";
import process from "node:process";

import { CliUsageError, USAGE, parseCliArgs, type CliCommand } from "./cliOptions.js";
import { resolveHealthOptions } from "./config/options.js";
import { HarnessError, describeError, isConfigurationError } from "./errors.js";
import { createBindingsProvider } from "./health/bindings.js";
import { GrpcHealthChecker } from "./health/healthClient.js";
import { StructuredLogger } from "./logger.js";
import type { SignalName } from "./nodePrimitives.js";
import type { ManagedProcess } from "./process/managedProcess.js";
import { allocateFreePort } from "./process/ports.js";
import { REAPED_SIGNALS, liveProcesses } from "./process/registry.js";
import { withTimeout } from "./runtime/timers.js";
import { createServiceSupervisor } from "./supervisor/retryCoordinator.js";

// stdout carries the command's result; log lines only go to HARNESS_LOG_FILE.
const logger = new StructuredLogger({ echo: false });

/** Bound on waiting for SIGKILLed services to be reaped before the CLI exits. */
const REAP_WAIT_MS = 2_000;

interface ShutdownListener {
  /** Resolves with the first shutdown signal received. */
  readonly received: Promise<SignalName>;
  dispose(): void;
}

/**
 * Listens for SIGINT and SIGTERM until disposed. The listeners stay attached
 * after the first signal so the registry hook keeps deferring to the CLI
 * while it tears the service down.
 */
function listenForShutdown(): ShutdownListener {
  const detach: Array<() => void> = [];
  const received = new Promise<SignalName>((resolve) => {
    const onSignal = (signal: SignalName) => resolve(signal);
    for (const signal of REAPED_SIGNALS) {
      process.on(signal, onSignal);
      detach.push(() => process.off(signal, onSignal));
    }
  });
  return {
    received,
    dispose: () => {
      for (const off of detach.splice(0)) {
        off();
      }
    },
  };
}

/**
 * A signal arrived before the service was ready. `start()` would keep
 * retrying, so the CLI reaps whatever is alive and exits on the spot.
 */
async function abandonStartup(signal: SignalName, starting: Promise<ManagedProcess>): Promise<never> {
  logger.warn("startup_interrupted", { signal, pids: liveProcesses.pids() });
  void starting.catch((error: unknown) => {
    logger.warn("startup_abandoned", { reason: describeError(error) });
  });
  liveProcesses.killAll("SIGKILL");
  try {
    await withTimeout(liveProcesses.whenEmpty(), REAP_WAIT_MS, "reaping interrupted services");
  } catch (error) {
    logger.error("reap_incomplete", { reason: describeError(error), pids: liveProcesses.pids() });
  }
  await logger.flush();
  return process.exit(128 + constants.signals[signal]);
}

async function runUp(command: Extract<CliCommand, { kind: "up" }>): Promise<number> {
  const shutdown = listenForShutdown();
  try {
    const supervisor = createServiceSupervisor(command.options, { logger });
    const starting = supervisor.start();
    const first = await Promise.race([
      starting.then((service) => ({ kind: "ready" as const, service })),
      shutdown.received.then((signal) => ({ kind: "interrupted" as const, signal })),
    ]);
    if (first.kind === "interrupted") {
      return await abandonStartup(first.signal, starting);
    }

    const { service } = first;
    process.stdout.write(`${JSON.stringify({ address: service.address, port: service.port, pid: service.pid })}\n`);

    const reason = await Promise.race([
      shutdown.received,
      service.waitForExit().then(() => "service_exited" as const),
    ]);
    logger.info("shutdown_requested", { reason });
    await supervisor.stop();
    return reason === "service_exited" ? 1 : 0;
  } finally {
    shutdown.dispose();
  }
}

async function runProbe(command: Extract<CliCommand, { kind: "probe" }>): Promise<number> {
  const health = resolveHealthOptions(command.health);
  const checker = new GrpcHealthChecker({ bindings: createBindingsProvider(health), logger });
  try {
    await checker.prepare();
    const status = await withTimeout(
      checker.check(command.address, { service: health.serviceName, timeoutMs: command.timeoutMs }),
      command.timeoutMs,
      `health check on ${command.address}`,
    );
    process.stdout.write(`${status}\n`);
    return status === "SERVING" ? 0 : 1;
  } catch (error) {
    if (isConfigurationError(error)) {
      throw error;
    }
    process.stdout.write(`UNREACHABLE ${describeError(error)}\n`);
    return 1;
  } finally {
    checker.close();
  }
}

async function main(argv: readonly string[]): Promise<number> {
  let command: CliCommand;
  try {
    command = parseCliArgs(argv);
  } catch (error) {
    if (error instanceof CliUsageError) {
      process.stderr.write(`${error.message}\n\n${USAGE}`);
      return 2;
    }
    throw error;
  }

  switch (command.kind) {
    case "help":
      process.stdout.write(USAGE);
      return 0;
    case "free-port":
      process.stdout.write(`${await allocateFreePort(command.host)}\n`);
      return 0;
    case "probe":
      return runProbe(command);
    case "up":
      return runUp(command);
  }
}

void main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    process.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
    if (error instanceof HarnessError && error.hint) {
      process.stderr.write(`hint: ${error.hint}\n`);
    }
    process.exitCode = 1;
  })
  .finally(() => logger.flush());
