import type { Decision, FusionConfig, ResultSet, TraceRecord } from "../types";
import { TIMED_OUT, describeError, withTimeout } from "../utils";
import type { TraceStore } from "./store";

export interface TraceMetadata {
  requestId: string;
  query: string;
  provider: string | null;
  processingTimeMs: number;
  timestamp?: Date;
}

export interface PersistenceFailure {
  requestId: string;
  reason: "error" | "timeout";
  message: string;
}

export type PersistenceFailureReporter = (failure: PersistenceFailure) => void;

export interface TraceRecorderOptions {
  persistTimeoutMs: number;
  onFailure?: PersistenceFailureReporter;
}

const reportToConsole: PersistenceFailureReporter = (failure) => {
  console.error(`Failed to persist trace ${failure.requestId} (${failure.reason})`, failure.message);
};

/**
 * Best-effort trace persistence. `record` always resolves: failures and slow writes go to the
 * failure reporter and never reach the request that produced the trace.
 */
export class TraceRecorder {
  private readonly persistTimeoutMs: number;

  private readonly onFailure: PersistenceFailureReporter;

  constructor(private readonly store: TraceStore, { persistTimeoutMs, onFailure = reportToConsole }: TraceRecorderOptions) {
    this.persistTimeoutMs = persistTimeoutMs;
    this.onFailure = onFailure;
  }

  async record(resultSet: ResultSet, decision: Decision, config: FusionConfig, meta: TraceMetadata): Promise<void> {
    const record: TraceRecord = {
      requestId: meta.requestId,
      timestamp: meta.timestamp ?? new Date(),
      query: meta.query,
      provider: meta.provider,
      resultSet,
      decision,
      config,
      processingTimeMs: meta.processingTimeMs
    };

    let insertion: Promise<void>;
    try {
      insertion = this.store.insert(record);
    } catch (error) {
      this.report(record.requestId, "error", error);
      return;
    }

    const settled = await withTimeout(
      insertion.then(
        () => true,
        (error: unknown) => {
          this.report(record.requestId, "error", error);
          return false;
        }
      ),
      this.persistTimeoutMs
    );

    if (settled === TIMED_OUT) {
      this.report(record.requestId, "timeout", `store did not acknowledge within ${this.persistTimeoutMs}ms`);
    }
  }

  private report(requestId: string, reason: PersistenceFailure["reason"], error: unknown): void {
    try {
      this.onFailure({ requestId, reason, message: describeError(error) });
    } catch (reporterError) {
      console.error("Persistence failure reporter threw", reporterError);
    }
  }
}
