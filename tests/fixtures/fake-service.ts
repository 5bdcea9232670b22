/**
 * Stand-in for the service under test. It speaks `grpc.health.v1.Health` on
 * loopback and misbehaves on request:
 *
 * - `serving`: SERVING for "" and "fake", SERVICE_UNKNOWN for anything else
 * - `not-serving`: binds but always answers NOT_SERVING
 * - `crash`: prints to stderr and exits with code 3 before binding
 * - `stubborn`: like `serving` but ignores SIGTERM
 * - `silent`: stays alive without ever binding the port
 *
 * `--ready-after-ms N` makes `serving` answer NOT_SERVING for the first N ms.
 */
import grpc from "@grpc/grpc-js";
import type { GrpcObject, ServerUnaryCall, ServiceClientConstructor, sendUnaryData } from "@grpc/grpc-js";
import protoLoader from "@grpc/proto-loader";

type Mode = "serving" | "not-serving" | "crash" | "stubborn" | "silent";
const MODES: readonly Mode[] = ["serving", "not-serving", "crash", "stubborn", "silent"];

interface FixtureArgs {
  port: number;
  host: string;
  mode: Mode;
  proto: string;
  readyAfterMs: number;
  dt: string | null;
}

function parseArgs(argv: readonly string[]): FixtureArgs {
  const values = new Map<string, string>();
  for (let index = 0; index < argv.length; index += 2) {
    values.set(argv[index], argv[index + 1] ?? "");
  }
  const port = Number(values.get("--port"));
  const mode = MODES.find((candidate) => candidate === values.get("--mode")) ?? "serving";
  const proto = values.get("--proto");
  if (!Number.isInteger(port) || port <= 0 || !proto) {
    throw new Error(`usage: fake-service --port N --proto P [--mode M]; got ${argv.join(" ")}`);
  }
  return {
    port,
    host: values.get("--host") ?? "127.0.0.1",
    mode,
    proto,
    readyAfterMs: Number(values.get("--ready-after-ms") ?? "0"),
    dt: values.get("--dt") ?? null,
  };
}

function isServiceClientConstructor(node: unknown): node is ServiceClientConstructor {
  return typeof node === "function" && "service" in node && typeof node.service === "object" && node.service !== null;
}

function findHealthService(root: GrpcObject): ServiceClientConstructor {
  let node: unknown = root;
  for (const segment of ["grpc", "health", "v1", "Health"]) {
    if (typeof node !== "object" && typeof node !== "function") {
      throw new Error(`health service missing at ${segment}`);
    }
    if (node === null) {
      throw new Error(`health service missing at ${segment}`);
    }
    node = Reflect.get(node, segment);
  }
  if (!isServiceClientConstructor(node)) {
    throw new Error("grpc.health.v1.Health is not a service");
  }
  return node;
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  process.stdout.write(`fake-service mode=${args.mode} port=${args.port}${args.dt ? ` dt=${args.dt}` : ""}\n`);

  if (args.mode === "crash") {
    process.stderr.write(`boom: refusing to start on port ${args.port}\n`);
    process.exitCode = 3;
    return;
  }
  if (args.mode === "silent") {
    setInterval(() => undefined, 60_000);
    return;
  }
  if (args.mode === "stubborn") {
    process.on("SIGTERM", () => {
      process.stderr.write("ignoring SIGTERM\n");
    });
  }

  const definition = await protoLoader.load(args.proto, { keepCase: true, enums: String, defaults: true });
  const health = findHealthService(grpc.loadPackageDefinition(definition));
  const startedAt = Date.now();

  const server = new grpc.Server();
  server.addService(health.service, {
    Check: (call: ServerUnaryCall<{ service?: string }, unknown>, callback: sendUnaryData<unknown>) => {
      const service = call.request.service ?? "";
      if (args.mode === "not-serving" || Date.now() - startedAt < args.readyAfterMs) {
        callback(null, { status: "NOT_SERVING" });
        return;
      }
      const known = service === "" || service === "fake";
      callback(null, { status: known ? "SERVING" : "SERVICE_UNKNOWN" });
    },
  });

  server.bindAsync(`${args.host}:${args.port}`, grpc.ServerCredentials.createInsecure(), (error, boundPort) => {
    if (error) {
      process.stderr.write(`bind failed: ${error.message}\n`);
      process.exit(4);
    }
    process.stdout.write(`listening on ${args.host}:${boundPort}\n`);
  });
}

main().catch((error: unknown) => {
  process.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
  process.exitCode = 2;
});
