import process from "node:process";

import type { SignalName } from "../nodePrimitives.js";

/** Minimal handle the registry needs to reap a process on runner exit. */
export interface RegisteredProcess {
  readonly pid: number;
  kill(signal: SignalName): boolean;
}

/**
 * Process-wide record of the services started by the harness and not yet
 * observed to exit. It only exists so the exit and signal hooks can reap
 * survivors when the test runner dies without running its teardown.
 */
export class ProcessRegistry {
  private readonly entries = new Set<RegisteredProcess>();
  private readonly emptyWaiters = new Set<() => void>();

  add(entry: RegisteredProcess): void {
    this.entries.add(entry);
  }

  delete(entry: RegisteredProcess): void {
    this.entries.delete(entry);
    if (this.entries.size === 0) {
      const waiters = [...this.emptyWaiters];
      this.emptyWaiters.clear();
      for (const resolve of waiters) {
        resolve();
      }
    }
  }

  get size(): number {
    return this.entries.size;
  }

  pids(): number[] {
    return [...this.entries].map((entry) => entry.pid);
  }

  /** Signals every tracked process and returns how many accepted the signal. */
  killAll(signal: SignalName = "SIGKILL"): number {
    let delivered = 0;
    for (const entry of this.entries) {
      if (entry.kill(signal)) {
        delivered += 1;
      }
    }
    return delivered;
  }

  /** Resolves once every tracked process has been observed to exit. */
  whenEmpty(): Promise<void> {
    if (this.entries.size === 0) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.emptyWaiters.add(resolve);
    });
  }
}

export const liveProcesses = new ProcessRegistry();

export const REAPED_SIGNALS: readonly SignalName[] = ["SIGINT", "SIGTERM"];

export interface ExitHookOptions {
  /** Signals after which survivors are reaped. Defaults to {@link REAPED_SIGNALS}. */
  signals?: readonly SignalName[];
  /** Delivers the signal again once the hook is gone, so the runner still dies of it. */
  reraise?: (signal: SignalName) => void;
}

interface InstalledHook {
  readonly onExit: () => void;
  readonly onSignal: (signal: SignalName) => void;
  readonly signals: readonly SignalName[];
}

let installedHook: InstalledHook | null = null;

function reraiseOnSelf(signal: SignalName): void {
  process.kill(process.pid, signal);
}

/**
 * Installs (once) the handlers that SIGKILL every tracked process when the
 * runner exits or receives one of the reaped signals. A signal that another
 * listener also handles is left to that listener: it owns the shutdown.
 */
export function installExitHook(registry: ProcessRegistry = liveProcesses, options: ExitHookOptions = {}): void {
  if (installedHook) {
    return;
  }
  const reraise = options.reraise ?? reraiseOnSelf;
  const hook: InstalledHook = {
    signals: options.signals ?? REAPED_SIGNALS,
    onExit: () => {
      registry.killAll("SIGKILL");
    },
    onSignal: (signal) => {
      if (process.listenerCount(signal) > 1) {
        return;
      }
      registry.killAll("SIGKILL");
      uninstallExitHook();
      reraise(signal);
    },
  };
  installedHook = hook;
  process.on("exit", hook.onExit);
  for (const signal of hook.signals) {
    process.on(signal, hook.onSignal);
  }
}

export function uninstallExitHook(): void {
  const hook = installedHook;
  if (!hook) {
    return;
  }
  installedHook = null;
  process.off("exit", hook.onExit);
  for (const signal of hook.signals) {
    process.off(signal, hook.onSignal);
  }
}
