import { describe, it, afterEach } from "mocha";
import { expect } from "chai";

import {
  ProcessRegistry,
  installExitHook,
  uninstallExitHook,
} from "../src/process/registry.js";
import type { SignalName } from "../src/nodePrimitives.js";

function fakeEntry(pid: number, accepts = true) {
  const signals: SignalName[] = [];
  return {
    pid,
    signals,
    kill(signal: SignalName): boolean {
      signals.push(signal);
      return accepts;
    },
  };
}

describe("process registry", () => {
  afterEach(() => {
    uninstallExitHook();
  });

  it("signals every tracked process and counts deliveries", () => {
    const registry = new ProcessRegistry();
    const first = fakeEntry(11);
    const second = fakeEntry(12, false);
    registry.add(first);
    registry.add(second);

    expect(registry.killAll()).to.equal(1);
    expect(first.signals).to.deep.equal(["SIGKILL"]);
    expect(second.signals).to.deep.equal(["SIGKILL"]);
    expect(registry.pids()).to.deep.equal([11, 12]);
  });

  it("forgets entries that were removed", () => {
    const registry = new ProcessRegistry();
    const entry = fakeEntry(21);
    registry.add(entry);
    registry.delete(entry);

    expect(registry.size).to.equal(0);
    expect(registry.killAll()).to.equal(0);
    expect(entry.signals).to.deep.equal([]);
  });

  it("resolves whenEmpty once the last entry is removed", async () => {
    const registry = new ProcessRegistry();
    const first = fakeEntry(31);
    const second = fakeEntry(32);
    registry.add(first);
    registry.add(second);

    let settled = false;
    const empty = registry.whenEmpty().then(() => {
      settled = true;
    });
    registry.delete(first);
    await Promise.resolve();
    expect(settled).to.equal(false);

    registry.delete(second);
    await empty;
    expect(settled).to.equal(true);
    await registry.whenEmpty();
  });

  it("installs a single set of exit and signal listeners and removes them again", () => {
    uninstallExitHook();
    const exitBefore = process.listenerCount("exit");
    const termBefore = process.listenerCount("SIGTERM");
    const intBefore = process.listenerCount("SIGINT");

    installExitHook(new ProcessRegistry());
    installExitHook(new ProcessRegistry());
    expect(process.listenerCount("exit")).to.equal(exitBefore + 1);
    expect(process.listenerCount("SIGTERM")).to.equal(termBefore + 1);
    expect(process.listenerCount("SIGINT")).to.equal(intBefore + 1);

    uninstallExitHook();
    expect(process.listenerCount("exit")).to.equal(exitBefore);
    expect(process.listenerCount("SIGTERM")).to.equal(termBefore);
    expect(process.listenerCount("SIGINT")).to.equal(intBefore);
  });

  it("reaps tracked processes and re-raises a signal nobody else handles", () => {
    uninstallExitHook();
    const registry = new ProcessRegistry();
    const entry = fakeEntry(41);
    registry.add(entry);
    const raised: SignalName[] = [];

    installExitHook(registry, { signals: ["SIGUSR2"], reraise: (signal) => raised.push(signal) });
    process.emit("SIGUSR2", "SIGUSR2");

    expect(entry.signals).to.deep.equal(["SIGKILL"]);
    expect(raised).to.deep.equal(["SIGUSR2"]);
    expect(process.listenerCount("SIGUSR2")).to.equal(0);
  });

  it("leaves a signal to another listener that already handles it", () => {
    uninstallExitHook();
    const registry = new ProcessRegistry();
    const entry = fakeEntry(51);
    registry.add(entry);
    const raised: SignalName[] = [];
    const received: SignalName[] = [];
    const owner = (signal: SignalName) => {
      received.push(signal);
    };
    process.on("SIGUSR2", owner);

    try {
      installExitHook(registry, { signals: ["SIGUSR2"], reraise: (signal) => raised.push(signal) });
      process.emit("SIGUSR2", "SIGUSR2");
    } finally {
      process.off("SIGUSR2", owner);
    }

    expect(received).to.deep.equal(["SIGUSR2"]);
    expect(entry.signals).to.deep.equal([]);
    expect(raised).to.deep.equal([]);
  });
});
