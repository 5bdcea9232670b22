import type { SignalName } from "../nodePrimitives.js";

export type FailedAttemptOutcome = "crashed_before_ready" | "timed_out";

/** Diagnostics captured for one failed attempt. */
export interface FailureReportEntry {
  attempt: number;
  port: number;
  address: string;
  outcome: FailedAttemptOutcome;
  exitCode: number | null;
  exitSignal: SignalName | null;
  polls: number;
  elapsedMs: number;
  lastError: string | null;
  lastStatus: string | null;
  stdout: string;
  stderr: string;
  /** True when output was cut at the head or the streams had not ended when the drain gave up. */
  outputTruncated: boolean;
  /** Set when the attempt's process could not be terminated. */
  teardownError: string | null;
}

export interface FailureReportJSON {
  executable: string;
  maxAttempts: number;
  entries: FailureReportEntry[];
}

const OUTCOME_LABELS: Record<FailedAttemptOutcome, string> = {
  crashed_before_ready: "exited before becoming ready",
  timed_out: "not ready before the deadline",
};

function indent(text: string): string {
  const trimmed = text.replace(/\s+$/, "");
  if (trimmed.length === 0) {
    return "    <empty>";
  }
  return trimmed
    .split(/\r?\n/)
    .map((line) => `    ${line}`)
    .join("\n");
}

/**
 * Aggregated diagnostics of a run that never produced a ready service.
 * Entries are appended in attempt order.
 */
export class FailureReport {
  public readonly executable: string;
  public readonly maxAttempts: number;
  private readonly items: FailureReportEntry[] = [];

  constructor(executable: string, maxAttempts: number) {
    this.executable = executable;
    this.maxAttempts = maxAttempts;
  }

  add(entry: FailureReportEntry): void {
    this.items.push({ ...entry });
  }

  get entries(): readonly FailureReportEntry[] {
    return this.items;
  }

  get ports(): number[] {
    return this.items.map((entry) => entry.port);
  }

  /** Multi-line, human readable rendering used as the exhaustion error message. */
  format(): string {
    const lines = [
      `Service ${this.executable} failed to become ready after ${this.items.length} of ${this.maxAttempts} attempt(s)`,
    ];
    for (const entry of this.items) {
      lines.push(`--- attempt ${entry.attempt}/${this.maxAttempts} (port ${entry.port}, ${entry.address}) ---`);
      lines.push(`outcome: ${OUTCOME_LABELS[entry.outcome]} after ${entry.polls} poll(s) in ${entry.elapsedMs}ms`);
      lines.push(`exit code: ${entry.exitCode ?? "none"}, signal: ${entry.exitSignal ?? "none"}`);
      if (entry.lastStatus !== null) {
        lines.push(`last status: ${entry.lastStatus}`);
      }
      if (entry.lastError !== null) {
        lines.push(`last error: ${entry.lastError}`);
      }
      if (entry.teardownError !== null) {
        lines.push(`teardown error: ${entry.teardownError}`);
      }
      lines.push(`stdout${entry.outputTruncated ? " (truncated)" : ""}:`);
      lines.push(indent(entry.stdout));
      lines.push(`stderr${entry.outputTruncated ? " (truncated)" : ""}:`);
      lines.push(indent(entry.stderr));
    }
    return lines.join("\n");
  }

  toJSON(): FailureReportJSON {
    return {
      executable: this.executable,
      maxAttempts: this.maxAttempts,
      entries: this.items.map((entry) => ({ ...entry })),
    };
  }
}
