import { afterEach, beforeEach, describe, it } from "mocha";
import { expect } from "chai";
import sinon from "sinon";

import { BindingsUnavailableError } from "../src/errors.js";
import type { HealthStatus } from "../src/health/healthClient.js";
import { probeReadiness, type ProbeOptions, type ProbeTarget } from "../src/health/readinessProbe.js";
import type { ProcessExit } from "../src/nodePrimitives.js";
import { ScriptedHealthChecker } from "./helpers/scriptedHealthChecker.js";

const ADDRESS = "127.0.0.1:41000";

class MutableTarget implements ProbeTarget {
  public exit: ProcessExit | null = null;

  exitInfo(): ProcessExit | null {
    return this.exit;
  }
}

function probeOptions(checker: ScriptedHealthChecker, target: ProbeTarget, overrides: Partial<ProbeOptions> = {}): ProbeOptions {
  return {
    address: ADDRESS,
    target,
    checker,
    deadlineMs: 10_000,
    intervalMs: 100,
    callTimeoutMs: 500,
    ...overrides,
  };
}

describe("readiness probe", () => {
  let clock: sinon.SinonFakeTimers;

  beforeEach(() => {
    clock = sinon.useFakeTimers({ toFake: ["setTimeout", "clearTimeout", "setInterval", "clearInterval", "Date"] });
  });

  afterEach(() => {
    clock.restore();
  });

  it("reports ready on the first SERVING answer", async () => {
    const checker = ScriptedHealthChecker.always("SERVING");

    const outcome = await probeReadiness(probeOptions(checker, new MutableTarget(), { serviceName: "fluxgraph" }));

    expect(outcome).to.deep.equal({ kind: "ready", polls: 1, elapsedMs: 0, lastError: null, lastStatus: "SERVING" });
    expect(checker.calls).to.deep.equal([{ address: ADDRESS, service: "fluxgraph", timeoutMs: 500 }]);
  });

  it("keeps polling at the interval until the service is SERVING", async () => {
    const checker = new ScriptedHealthChecker((_address, index): HealthStatus => (index < 2 ? "NOT_SERVING" : "SERVING"));

    const probing = probeReadiness(probeOptions(checker, new MutableTarget()));
    await clock.tickAsync(200);
    const outcome = await probing;

    expect(outcome).to.deep.equal({ kind: "ready", polls: 3, elapsedMs: 200, lastError: null, lastStatus: "SERVING" });
    expect(checker.calls.map((call) => call.service)).to.deep.equal(["", "", ""]);
  });

  it("never reports ready for a process that exited during the call", async () => {
    const target = new MutableTarget();
    const checker = new ScriptedHealthChecker(() => {
      target.exit = { code: 1, signal: null, at: 0 };
      return "SERVING";
    });

    const outcome = await probeReadiness(probeOptions(checker, target));

    expect(outcome.kind).to.equal("crashed");
    expect(outcome.polls).to.equal(1);
    expect(outcome).to.have.deep.property("exit", { code: 1, signal: null, at: 0 });
  });

  it("does not call the endpoint once the process already exited", async () => {
    const target = new MutableTarget();
    target.exit = { code: 3, signal: null, at: 0 };
    const checker = ScriptedHealthChecker.always("SERVING");

    const outcome = await probeReadiness(probeOptions(checker, target));

    expect(outcome.kind).to.equal("crashed");
    expect(outcome.polls).to.equal(0);
    expect(checker.calls).to.have.length(0);
  });

  it("times out at the deadline while the endpoint stays unreachable", async () => {
    const checker = ScriptedHealthChecker.unreachable();

    const probing = probeReadiness(probeOptions(checker, new MutableTarget(), { deadlineMs: 1_000 }));
    await clock.tickAsync(1_000);
    const outcome = await probing;

    expect(outcome).to.deep.equal({
      kind: "timed_out",
      polls: 10,
      elapsedMs: 1_000,
      lastError: "14 UNAVAILABLE: No connection established",
      lastStatus: null,
    });
  });

  it("bounds a hung call by the per-call timeout and the remaining budget", async () => {
    const checker = new ScriptedHealthChecker(() => new Promise<HealthStatus>(() => undefined));

    const probing = probeReadiness(probeOptions(checker, new MutableTarget(), { deadlineMs: 1_000 }));
    await clock.tickAsync(1_000);
    const outcome = await probing;

    expect(outcome).to.deep.equal({
      kind: "timed_out",
      polls: 2,
      elapsedMs: 1_000,
      lastError: `health check on ${ADDRESS} timed out after 400ms`,
      lastStatus: null,
    });
    expect(checker.calls.map((call) => call.timeoutMs)).to.deep.equal([500, 400]);
  });

  it("remembers the last status answered before the deadline", async () => {
    const checker = ScriptedHealthChecker.always("NOT_SERVING");

    const probing = probeReadiness(probeOptions(checker, new MutableTarget(), { deadlineMs: 300 }));
    await clock.tickAsync(300);
    const outcome = await probing;

    expect(outcome).to.deep.equal({
      kind: "timed_out",
      polls: 3,
      elapsedMs: 300,
      lastError: null,
      lastStatus: "NOT_SERVING",
    });
  });

  it("propagates configuration errors instead of retrying", async () => {
    const failure = new BindingsUnavailableError("Service grpc.health.v1.Health is not defined in /tmp/x.proto", {});
    const checker = new ScriptedHealthChecker(() => {
      throw failure;
    });

    let caught: unknown = null;
    try {
      await probeReadiness(probeOptions(checker, new MutableTarget()));
    } catch (error) {
      caught = error;
    }
    expect(caught).to.equal(failure);
    expect(checker.calls).to.have.length(1);
  });
});
