import { fileURLToPath } from "node:url";

import grpc from "@grpc/grpc-js";
import type {
  GrpcObject,
  MethodDefinition,
  ProtobufTypeDefinition,
  ServiceClientConstructor,
} from "@grpc/grpc-js";
import protoLoader from "@grpc/proto-loader";
import type { Options as ProtoLoaderOptions } from "@grpc/proto-loader";

import { BindingsUnavailableError } from "../errors.js";

/** Schema shipped with the package: the standard `grpc.health.v1` revision. */
export const DEFAULT_PROTO_PATH = fileURLToPath(new URL("../../proto/health.proto", import.meta.url));
export const DEFAULT_HEALTH_SERVICE_TYPE = "grpc.health.v1.Health";
export const DEFAULT_HEALTH_METHOD = "Check";

export interface BindingsOptions {
  protoPath?: string;
  includeDirs?: readonly string[];
  /** Fully qualified service name, e.g. `grpc.health.v1.Health`. */
  serviceType?: string;
  method?: string;
}

/** Loaded schema plus the resolved health call. */
export interface HealthBindings {
  readonly protoPath: string;
  readonly serviceType: string;
  readonly method: string;
  readonly root: GrpcObject;
  readonly clientConstructor: ServiceClientConstructor;
  readonly methodDefinition: MethodDefinition<unknown, unknown>;
}

export interface BindingsProvider {
  readonly protoPath: string;
  /** Loads the schema once; later calls share the result. A failed load is retried. */
  load(): Promise<HealthBindings>;
}

const LOADER_OPTIONS: ProtoLoaderOptions = {
  keepCase: true,
  longs: String,
  enums: String,
  defaults: true,
  oneofs: true,
};

type GrpcNode = GrpcObject | ServiceClientConstructor | ProtobufTypeDefinition;

function isNamespace(node: GrpcNode): node is GrpcObject {
  return typeof node === "object" && !("format" in node);
}

export function isServiceClientConstructor(node: unknown): node is ServiceClientConstructor {
  return typeof node === "function" && "service" in node && typeof node.service === "object" && node.service !== null;
}

/** Walks a dotted name through a loaded package definition. */
export function resolveServiceConstructor(root: GrpcObject, serviceType: string): ServiceClientConstructor | null {
  let node: GrpcNode = root;
  for (const segment of serviceType.split(".")) {
    if (!isNamespace(node)) {
      return null;
    }
    const next: GrpcNode | undefined = node[segment];
    if (next === undefined) {
      return null;
    }
    node = next;
  }
  return isServiceClientConstructor(node) ? node : null;
}

export function createBindingsProvider(options: BindingsOptions = {}): BindingsProvider {
  const protoPath = options.protoPath ?? DEFAULT_PROTO_PATH;
  const serviceType = options.serviceType ?? DEFAULT_HEALTH_SERVICE_TYPE;
  const method = options.method ?? DEFAULT_HEALTH_METHOD;
  const includeDirs = [...(options.includeDirs ?? [])];
  let pending: Promise<HealthBindings> | null = null;

  const loadOnce = async (): Promise<HealthBindings> => {
    let root: GrpcObject;
    try {
      const definition = await protoLoader.load(protoPath, { ...LOADER_OPTIONS, includeDirs });
      root = grpc.loadPackageDefinition(definition);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new BindingsUnavailableError(`Unable to load health schema ${protoPath}: ${reason}`, { protoPath }, error);
    }

    const clientConstructor = resolveServiceConstructor(root, serviceType);
    if (!clientConstructor) {
      throw new BindingsUnavailableError(`Service ${serviceType} is not defined in ${protoPath}`, {
        protoPath,
        serviceType,
      });
    }

    const methodDefinition: MethodDefinition<unknown, unknown> | undefined = clientConstructor.service[method];
    if (!methodDefinition || methodDefinition.requestStream || methodDefinition.responseStream) {
      throw new BindingsUnavailableError(`Unary method ${serviceType}/${method} is not defined in ${protoPath}`, {
        protoPath,
        serviceType,
        method,
      });
    }

    return { protoPath, serviceType, method, root, clientConstructor, methodDefinition };
  };

  return {
    protoPath,
    load(): Promise<HealthBindings> {
      if (!pending) {
        const attempt = loadOnce();
        pending = attempt;
        void attempt.catch(() => {
          if (pending === attempt) {
            pending = null;
          }
        });
      }
      return pending;
    },
  };
}
