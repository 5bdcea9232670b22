import { after, before, describe, it } from "mocha";
import { expect } from "chai";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { InvalidHarnessOptionsError, ServiceExecutableNotFoundError } from "../src/errors.js";
import { HarnessSession } from "../src/session.js";
import { FakeLauncher, sequentialAllocator, type FakeBehaviour } from "./helpers/fakeLauncher.js";
import { RecordingLogger } from "./helpers/recordingLogger.js";
import { ScriptedHealthChecker } from "./helpers/scriptedHealthChecker.js";

describe("harness session", () => {
  let workdir: string;
  let executable: string;

  before(async () => {
    workdir = await mkdtemp(join(tmpdir(), "harness-session-"));
    executable = join(workdir, "fluxgraph_server");
    await writeFile(executable, "", "utf8");
  });

  after(async () => {
    await rm(workdir, { recursive: true, force: true });
  });

  function session(behaviour: FakeBehaviour, extra: { executable?: string } = {}) {
    const launcher = new FakeLauncher([behaviour]);
    const checker = ScriptedHealthChecker.always("SERVING");
    const logger = new RecordingLogger();
    const harness = new HarnessSession({
      executable: extra.executable ?? executable,
      defaults: { stopGraceMs: 10, stopForceMs: 10, extraArgs: ["--mode", "test"] },
      launcher,
      checker,
      logger,
      allocator: sequentialAllocator([5001, 5002, 5003]),
    });
    return { harness, launcher, checker, logger };
  }

  it("shares the checker and applies the defaults to every service", async () => {
    const { harness, launcher, checker } = session("alive");

    const first = await harness.startService();
    const second = await harness.startService({ extraArgs: ["--mode", "other"] });

    expect([first.port, second.port]).to.deep.equal([5001, 5002]);
    expect(launcher.specs.map((spec) => spec.executable)).to.deep.equal([executable, executable]);
    expect(launcher.specs.map((spec) => [...spec.extraArgs])).to.deep.equal([
      ["--mode", "test"],
      ["--mode", "other"],
    ]);
    expect(checker.prepareCount).to.equal(2);

    await first.release();
    await harness.close();

    expect(launcher.children.map((child) => child.killInvocations)).to.deep.equal([["SIGTERM"], ["SIGTERM"]]);
    expect(checker.closed).to.equal(false);
  });

  it("runs a callback against a service and releases it", async () => {
    const { harness, launcher } = session("alive");

    const address = await harness.withService((service) => service.address);

    expect(address).to.equal("127.0.0.1:5001");
    expect(launcher.children[0].killInvocations).to.deep.equal(["SIGTERM"]);
    await harness.close();
  });

  it("retries a preparation that failed", async () => {
    const late = join(workdir, "late_server");
    const { harness } = session("alive", { executable: late });

    let caught: unknown = null;
    try {
      await harness.prepare();
    } catch (error) {
      caught = error;
    }
    expect(caught).to.be.instanceOf(ServiceExecutableNotFoundError);

    await writeFile(late, "", "utf8");
    const prepared = await harness.prepare();
    expect(prepared.executable).to.equal(late);
    expect(prepared.bindings.serviceType).to.equal("grpc.health.v1.Health");
    await harness.close();
  });

  it("reports services that survive close", async () => {
    const { harness, logger } = session("stubborn");
    await harness.startService();

    let caught: unknown = null;
    try {
      await harness.close();
    } catch (error) {
      caught = error;
    }

    expect(caught).to.be.instanceOf(AggregateError);
    expect(caught).to.have.property("message", "1 service(s) could not be stopped");
    expect(logger.find("teardown_failed")?.payload).to.deep.equal({
      address: "127.0.0.1:5001",
      reason: "Process 1000 did not exit within 10ms of SIGKILL",
    });
  });

  it("fails preparation early when it has no executable to look for", async () => {
    const harness = new HarnessSession({
      launcher: new FakeLauncher(["alive"]),
      checker: ScriptedHealthChecker.always("SERVING"),
      logger: new RecordingLogger(),
    });

    let caught: unknown = null;
    try {
      await harness.prepare();
    } catch (error) {
      caught = error;
    }

    expect(caught).to.be.instanceOf(InvalidHarnessOptionsError);
    expect(caught).to.have.property("code", "E_HARNESS_OPTIONS");
    await harness.close();
  });
});
