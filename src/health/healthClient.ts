import grpc from "@grpc/grpc-js";
import type { ChannelOptions, Client } from "@grpc/grpc-js";
import { z } from "zod";

import { StructuredLogger } from "../logger.js";
import { runtimeNow } from "../runtime/timers.js";
import { createBindingsProvider, type BindingsProvider, type HealthBindings } from "./bindings.js";

export const HEALTH_STATUSES = ["UNKNOWN", "SERVING", "NOT_SERVING", "SERVICE_UNKNOWN"] as const;

export type HealthStatus = (typeof HEALTH_STATUSES)[number];

const HealthStatusSchema = z.union([
  z.enum(HEALTH_STATUSES),
  z.number().int().nonnegative(),
]);

const HealthResponseSchema = z.object({ status: HealthStatusSchema.optional() });

/**
 * Normalises a health response to one of the four statuses. Numeric values
 * follow the enum ordinals; unknown ordinals and absent fields read as
 * `UNKNOWN`. A payload that is not a response object is rejected.
 */
export function parseHealthStatus(response: unknown): HealthStatus {
  const parsed = HealthResponseSchema.parse(response);
  const status = parsed.status;
  if (status === undefined) {
    return "UNKNOWN";
  }
  if (typeof status === "number") {
    return HEALTH_STATUSES[status] ?? "UNKNOWN";
  }
  return status;
}

export interface HealthCheckOptions {
  /** Service name sent in the request; empty asks about the whole server. */
  service: string;
  timeoutMs: number;
}

/** Health call used by the readiness probe. */
export interface HealthChecker {
  /** Loads whatever the checker needs before the first call. Configuration errors surface here. */
  prepare(): Promise<void>;
  check(address: string, options: HealthCheckOptions): Promise<HealthStatus>;
  /** Drops any connection held for `address`. */
  release(address: string): void;
  close(): void;
}

/** Channel settings keeping reconnection snappy while the service is still binding. */
export const DEFAULT_CHANNEL_OPTIONS: ChannelOptions = {
  "grpc.initial_reconnect_backoff_ms": 50,
  "grpc.max_reconnect_backoff_ms": 250,
  "grpc.enable_retries": 0,
};

export interface GrpcHealthCheckerOptions {
  bindings?: BindingsProvider;
  logger?: StructuredLogger;
  channelOptions?: ChannelOptions;
}

/** {@link HealthChecker} speaking gRPC through bindings loaded at run time. */
export class GrpcHealthChecker implements HealthChecker {
  private readonly provider: BindingsProvider;
  private readonly logger: StructuredLogger;
  private readonly channelOptions: ChannelOptions;
  private readonly clients = new Map<string, Client>();

  constructor(options: GrpcHealthCheckerOptions = {}) {
    this.provider = options.bindings ?? createBindingsProvider();
    this.logger = options.logger ?? new StructuredLogger();
    this.channelOptions = { ...DEFAULT_CHANNEL_OPTIONS, ...(options.channelOptions ?? {}) };
  }

  async prepare(): Promise<void> {
    const bindings = await this.provider.load();
    this.logger.debug("health_bindings_loaded", {
      protoPath: bindings.protoPath,
      serviceType: bindings.serviceType,
      method: bindings.method,
    });
  }

  async check(address: string, { service, timeoutMs }: HealthCheckOptions): Promise<HealthStatus> {
    const bindings = await this.provider.load();
    const client = this.clientFor(address, bindings);
    const { path, requestSerialize, responseDeserialize } = bindings.methodDefinition;

    const response = await new Promise<unknown>((resolve, reject) => {
      client.makeUnaryRequest(
        path,
        requestSerialize,
        responseDeserialize,
        { service },
        new grpc.Metadata(),
        { deadline: runtimeNow() + Math.max(1, timeoutMs) },
        (error, value) => {
          if (error) {
            reject(error);
            return;
          }
          resolve(value);
        },
      );
    });

    return parseHealthStatus(response);
  }

  release(address: string): void {
    const client = this.clients.get(address);
    if (!client) {
      return;
    }
    this.clients.delete(address);
    client.close();
  }

  close(): void {
    for (const address of [...this.clients.keys()]) {
      this.release(address);
    }
  }

  private clientFor(address: string, bindings: HealthBindings): Client {
    const cached = this.clients.get(address);
    if (cached) {
      return cached;
    }
    const client = new bindings.clientConstructor(address, grpc.credentials.createInsecure(), this.channelOptions);
    this.clients.set(address, client);
    return client;
  }
}
