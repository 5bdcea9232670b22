import type { Readable } from "node:stream";

import { runtimeTimers } from "../runtime/timers.js";

export type OutputStreamName = "stdout" | "stderr";

/** Default number of bytes retained per stream. */
export const DEFAULT_OUTPUT_LIMIT_BYTES = 64 * 1024;

export interface CollectedOutput {
  stdout: string;
  stderr: string;
  /** Bytes dropped from the head of each stream to honour the limit. */
  truncatedBytes: Record<OutputStreamName, number>;
  /** True once both streams reached end-of-stream. */
  complete: boolean;
}

interface StreamState {
  chunks: string[];
  bytes: number;
  truncated: number;
  ended: boolean;
}

/**
 * Captures a child's stdout and stderr for diagnostics. Streams are consumed
 * in flowing mode from the moment the collector is attached, so the child can
 * never block on a full pipe, and only the most recent `limitBytes` of each
 * stream are retained.
 */
export class OutputCollector {
  private readonly limitBytes: number;
  private readonly states: Record<OutputStreamName, StreamState> = {
    stdout: { chunks: [], bytes: 0, truncated: 0, ended: false },
    stderr: { chunks: [], bytes: 0, truncated: 0, ended: false },
  };
  private readonly endWaiters = new Set<() => void>();

  constructor(
    streams: { stdout: Readable | null; stderr: Readable | null },
    options: { limitBytes?: number } = {},
  ) {
    this.limitBytes = Math.max(1, options.limitBytes ?? DEFAULT_OUTPUT_LIMIT_BYTES);
    this.attach("stdout", streams.stdout);
    this.attach("stderr", streams.stderr);
  }

  /** Everything retained so far, without waiting. */
  snapshot(): CollectedOutput {
    return {
      stdout: this.states.stdout.chunks.join(""),
      stderr: this.states.stderr.chunks.join(""),
      truncatedBytes: {
        stdout: this.states.stdout.truncated,
        stderr: this.states.stderr.truncated,
      },
      complete: this.isComplete(),
    };
  }

  /**
   * Waits up to `timeoutMs` for both streams to end, then returns whatever
   * was captured. Never rejects: partial output is still useful.
   */
  async drain(timeoutMs: number): Promise<CollectedOutput> {
    if (this.isComplete() || timeoutMs <= 0) {
      return this.snapshot();
    }

    await new Promise<void>((resolve) => {
      const done = () => {
        runtimeTimers.clearTimeout(timer);
        this.endWaiters.delete(done);
        resolve();
      };
      const timer = runtimeTimers.setTimeout(done, timeoutMs);
      this.endWaiters.add(done);
    });

    return this.snapshot();
  }

  private isComplete(): boolean {
    return this.states.stdout.ended && this.states.stderr.ended;
  }

  private attach(name: OutputStreamName, stream: Readable | null): void {
    const state = this.states[name];
    if (!stream) {
      state.ended = true;
      return;
    }

    stream.setEncoding("utf8");
    stream.on("data", (chunk: string) => {
      this.append(state, chunk);
    });
    const markEnded = () => {
      if (state.ended) {
        return;
      }
      state.ended = true;
      if (this.isComplete()) {
        for (const waiter of [...this.endWaiters]) {
          waiter();
        }
      }
    };
    stream.once("end", markEnded);
    stream.once("close", markEnded);
    // A broken pipe ends the capture; the exit status carries the real diagnosis.
    stream.once("error", markEnded);
  }

  private append(state: StreamState, chunk: string): void {
    state.chunks.push(chunk);
    state.bytes += Buffer.byteLength(chunk, "utf8");

    while (state.bytes > this.limitBytes && state.chunks.length > 0) {
      const head = state.chunks[0];
      const headBytes = Buffer.byteLength(head, "utf8");
      const overflow = state.bytes - this.limitBytes;
      if (headBytes <= overflow) {
        state.chunks.shift();
        state.bytes -= headBytes;
        state.truncated += headBytes;
        continue;
      }
      // Trim inside the head chunk. Slicing by characters keeps multi-byte
      // sequences intact, so the retained size may undershoot the limit slightly.
      const kept = Buffer.from(head, "utf8").subarray(overflow).toString("utf8").replace(/^�+/, "");
      const keptBytes = Buffer.byteLength(kept, "utf8");
      state.chunks[0] = kept;
      state.truncated += headBytes - keptBytes;
      state.bytes -= headBytes - keptBytes;
    }
  }
}
