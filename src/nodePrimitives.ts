import process from "node:process";

/**
 * Runtime-dependent types derived from the Node.js process globals, kept in one
 * place so the process layer does not scatter `NodeJS.*` references.
 */
export type ProcessEnv = typeof process.env;

/** POSIX signals the harness sends or reports. */
export type SignalName = NodeJS.Signals;

/** Exit status reported by the OS for a child process. */
export interface ProcessExit {
  code: number | null;
  signal: SignalName | null;
  /** Epoch milliseconds at which the exit was observed. */
  at: number;
}

/** Errno-flavoured error raised by `child_process`, `fs` and `net`. */
export interface ErrnoException extends Error {
  code?: string;
  errno?: number;
  path?: string;
  syscall?: string;
}

/** Narrows an unknown failure to an errno-flavoured error. */
export function isErrnoException(value: unknown): value is ErrnoException {
  if (!(value instanceof Error)) {
    return false;
  }
  return ("code" in value && typeof value.code === "string") || "errno" in value;
}
