import { randomUUID } from "node:crypto";
import type { ChatbotProvider } from "./clients/types";
import { Dispatcher } from "./orchestration/dispatcher";
import { fuse } from "./orchestration/fusion";
import { TraceRecorder } from "./traces/recorder";
import type { Decision, FusionConfig, ResultSet, ServiceId } from "./types";
import { elapsedMs } from "./utils";

export interface IdentifyInput {
  query: string;
  image: Buffer;
  filename: string;
  provider?: ChatbotProvider;
  k?: number;
}

export interface IdentifyOptions {
  signal?: AbortSignal;
  fusion?: FusionConfig;
}

export interface OrchestrationResult {
  requestId: string;
  decision: Decision;
  resultSet: ResultSet;
  personId: string | null;
  answer: string | null;
  processingTimeMs: number;
  timestamp: Date;
}

export interface OrchestratorDeps {
  dispatcher: Dispatcher;
  recorder: TraceRecorder;
  fusion: FusionConfig;
  timeouts: Readonly<Record<ServiceId, number>>;
  overallDeadlineMs: number;
  generateId?: () => string;
  now?: () => Date;
}

export class Orchestrator {
  private readonly generateId: () => string;

  private readonly now: () => Date;

  constructor(private readonly deps: OrchestratorDeps) {
    this.generateId = deps.generateId ?? randomUUID;
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Dispatch, fuse, record, in that order. A cancelled request rejects with
   * `OrchestrationCancelledError` before fusion, so nothing is recorded for it.
   */
  async identifyAndAnswer(input: IdentifyInput, options: IdentifyOptions = {}): Promise<OrchestrationResult> {
    const startedAt = Date.now();
    const requestId = this.generateId();
    const fusion = options.fusion ?? this.deps.fusion;

    const resultSet = await this.deps.dispatcher.dispatch(
      {
        verifier: { image: input.image, filename: input.filename, requestId },
        chatbot: { message: input.query, provider: input.provider, k: input.k }
      },
      { timeouts: this.deps.timeouts, overallDeadlineMs: this.deps.overallDeadlineMs, signal: options.signal }
    );

    const decision = fuse(resultSet, fusion);
    const processingTimeMs = elapsedMs(startedAt);
    const timestamp = this.now();
    const chatbot = resultSet.chatbot?.status === "success" ? resultSet.chatbot.payload : null;

    await this.deps.recorder.record(resultSet, decision, fusion, {
      requestId,
      query: input.query,
      provider: chatbot?.provider ?? input.provider ?? null,
      processingTimeMs,
      timestamp
    });

    if (decision.outcome !== "match") {
      console.log(`Request ${requestId} resolved as ${decision.outcome} (${decision.reason})`);
    }

    return {
      requestId,
      decision,
      resultSet,
      personId: resultSet.verifier?.status === "success" ? resultSet.verifier.payload.personId : null,
      // Answers are released only to an identified caller.
      answer: decision.outcome === "match" && chatbot ? chatbot.answer : null,
      processingTimeMs,
      timestamp
    };
  }
}
