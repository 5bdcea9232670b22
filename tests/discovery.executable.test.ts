import { after, before, describe, it } from "mocha";
import { expect } from "chai";
import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { InvalidHarnessOptionsError, ServiceExecutableNotFoundError } from "../src/errors.js";
import { resolveServiceExecutable } from "../src/discovery/executable.js";
import { RecordingLogger } from "./helpers/recordingLogger.js";

async function touch(path: string): Promise<void> {
  await mkdir(join(path, ".."), { recursive: true });
  await writeFile(path, "", "utf8");
}

async function captureRejection(run: Promise<unknown>): Promise<unknown> {
  try {
    await run;
  } catch (error) {
    return error;
  }
  throw new Error("expected the lookup to fail");
}

describe("executable discovery", () => {
  let root: string;

  before(async () => {
    root = await mkdtemp(join(tmpdir(), "harness-discovery-"));
    await touch(join(root, "build-server", "Release", "fluxgraph_server"));
    await touch(join(root, "build-server", "Debug", "fluxgraph_server.exe"));
    await touch(join(root, "bin", "custom_server"));
  });

  after(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("uses an explicit path relative to the root", async () => {
    const found = await resolveServiceExecutable({ explicit: "bin/custom_server", root, names: [], env: {} });
    expect(found).to.equal(join(root, "bin", "custom_server"));
  });

  it("fails on a missing explicit path without searching further", async () => {
    const error = await captureRejection(
      resolveServiceExecutable({ explicit: "bin/absent", root, names: ["fluxgraph_server"], env: {} }),
    );
    expect(error).to.be.instanceOf(ServiceExecutableNotFoundError);
    expect(error).to.have.deep.property("tried", [join(root, "bin", "absent")]);
  });

  it("prefers the environment variable over the search directories", async () => {
    const found = await resolveServiceExecutable({
      root,
      names: ["fluxgraph_server"],
      env: { HARNESS_SERVICE_EXE: join(root, "bin", "custom_server") },
    });
    expect(found).to.equal(join(root, "bin", "custom_server"));
  });

  it("falls back to the search directories when the variable points nowhere", async () => {
    const logger = new RecordingLogger();
    const found = await resolveServiceExecutable({
      root,
      names: ["fluxgraph_server"],
      env: { HARNESS_SERVICE_EXE: "bin/nothing" },
      platform: "linux",
      logger,
    });

    expect(found).to.equal(join(root, "build-server", "Release", "fluxgraph_server"));
    expect(logger.messages("warn")).to.deep.equal(["executable_env_missing"]);
  });

  it("tries the .exe variant first on Windows", async () => {
    const found = await resolveServiceExecutable({
      root,
      names: ["fluxgraph_server"],
      searchDirs: ["build-server/Debug", "build-server/Release"],
      platform: "win32",
      env: {},
    });
    expect(found).to.equal(join(root, "build-server", "Debug", "fluxgraph_server.exe"));
  });

  it("lists every candidate when nothing is found", async () => {
    const error = await captureRejection(
      resolveServiceExecutable({ root, names: ["absent_server"], searchDirs: ["build", "out"], platform: "linux", env: {} }),
    );

    expect(error).to.be.instanceOf(ServiceExecutableNotFoundError);
    expect(error).to.have.deep.property("tried", [join(root, "build", "absent_server"), join(root, "out", "absent_server")]);
    expect(error).to.have.property(
      "message",
      `Service executable not found. Tried:\n  - ${join(root, "build", "absent_server")}\n  - ${join(root, "out", "absent_server")}`,
    );
  });

  it("asks for a path or a name when there is nothing to search for", async () => {
    const error = await captureRejection(resolveServiceExecutable({ root, names: [], env: {} }));

    expect(error).to.be.instanceOf(InvalidHarnessOptionsError);
    expect(error).to.have.property(
      "message",
      "Invalid harness options: executable: no path given, HARNESS_SERVICE_EXE is unset and no binary names to search for",
    );
  });

  it("reports the variable's path when there are no names to fall back on", async () => {
    const error = await captureRejection(
      resolveServiceExecutable({ root, names: [], env: { HARNESS_SERVICE_EXE: "gone/server" } }),
    );

    expect(error).to.be.instanceOf(ServiceExecutableNotFoundError);
    expect(error).to.have.deep.property("tried", [join(root, "gone", "server")]);
  });
});
