import { describe, it } from "mocha";
import { expect } from "chai";

import { FailureReport, type FailureReportEntry } from "../src/supervisor/failureReport.js";

function entry(overrides: Partial<FailureReportEntry>): FailureReportEntry {
  return {
    attempt: 1,
    port: 5001,
    address: "127.0.0.1:5001",
    outcome: "crashed_before_ready",
    exitCode: 3,
    exitSignal: null,
    polls: 0,
    elapsedMs: 4,
    lastError: null,
    lastStatus: null,
    stdout: "",
    stderr: "",
    outputTruncated: false,
    teardownError: null,
    ...overrides,
  };
}

describe("failure report", () => {
  it("renders one block per attempt with indented output", () => {
    const report = new FailureReport("/opt/service", 3);
    report.add(entry({ stderr: "boom: refusing to start\nsecond line\n\n" }));
    report.add(
      entry({
        attempt: 2,
        port: 5002,
        address: "127.0.0.1:5002",
        outcome: "timed_out",
        exitCode: null,
        exitSignal: "SIGTERM",
        polls: 100,
        elapsedMs: 10_000,
        lastError: "14 UNAVAILABLE: No connection established",
        lastStatus: "NOT_SERVING",
        stdout: "booting\n",
        outputTruncated: true,
        teardownError: "Process 77 did not exit within 2000ms of SIGKILL",
      }),
    );

    expect(report.format().split("\n")).to.deep.equal([
      "Service /opt/service failed to become ready after 2 of 3 attempt(s)",
      "--- attempt 1/3 (port 5001, 127.0.0.1:5001) ---",
      "outcome: exited before becoming ready after 0 poll(s) in 4ms",
      "exit code: 3, signal: none",
      "stdout:",
      "    <empty>",
      "stderr:",
      "    boom: refusing to start",
      "    second line",
      "--- attempt 2/3 (port 5002, 127.0.0.1:5002) ---",
      "outcome: not ready before the deadline after 100 poll(s) in 10000ms",
      "exit code: none, signal: SIGTERM",
      "last status: NOT_SERVING",
      "last error: 14 UNAVAILABLE: No connection established",
      "teardown error: Process 77 did not exit within 2000ms of SIGKILL",
      "stdout (truncated):",
      "    booting",
      "stderr (truncated):",
      "    <empty>",
    ]);
    expect(report.ports).to.deep.equal([5001, 5002]);
  });

  it("serialises a copy of its entries", () => {
    const report = new FailureReport("svc", 1);
    report.add(entry({}));

    const json = report.toJSON();
    json.entries[0].port = 1;

    expect(json.executable).to.equal("svc");
    expect(json.maxAttempts).to.equal(1);
    expect(report.entries[0].port).to.equal(5001);
  });
});
