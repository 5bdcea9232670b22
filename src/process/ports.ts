import { createServer, isIPv6, type Server } from "node:net";

import { isErrnoException } from "../nodePrimitives.js";

export const LOOPBACK_HOST = "127.0.0.1";

/** `host:port` as gRPC targets expect it, with IPv6 literals in brackets. */
export function formatAddress(host: string, port: number): string {
  return isIPv6(host) ? `[${host}]:${port}` : `${host}:${port}`;
}

/** Source of candidate ports for each attempt. */
export interface PortAllocator {
  allocate(host: string): Promise<number>;
}

function listen(server: Server, port: number, host: string): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const onError = (error: Error) => {
      server.off("listening", onListening);
      reject(error);
    };
    const onListening = () => {
      server.off("error", onError);
      resolve();
    };
    server.once("error", onError);
    server.once("listening", onListening);
    server.listen({ port, host, exclusive: true });
  });
}

function close(server: Server): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}

/**
 * Asks the OS for an ephemeral port by binding port 0 and releasing it right
 * away. The port is only free at the instant of the call: the service can
 * still lose a race for it, which is what per-attempt re-allocation absorbs.
 */
export async function allocateFreePort(host: string = LOOPBACK_HOST): Promise<number> {
  const server = createServer();
  server.unref();
  await listen(server, 0, host);
  const address = server.address();
  await close(server);
  if (address === null || typeof address === "string") {
    throw new Error(`Unable to read the port assigned on ${host}`);
  }
  return address.port;
}

/** Returns true when `port` can be bound on `host` right now. */
export async function isPortFree(port: number, host: string = LOOPBACK_HOST): Promise<boolean> {
  const server = createServer();
  server.unref();
  try {
    await listen(server, port, host);
  } catch (error) {
    if (isErrnoException(error) && (error.code === "EADDRINUSE" || error.code === "EACCES")) {
      return false;
    }
    throw error;
  }
  await close(server);
  return true;
}

export const ephemeralPortAllocator: PortAllocator = {
  allocate: (host) => allocateFreePort(host),
};
