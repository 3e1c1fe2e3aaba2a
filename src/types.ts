export const SERVICE_IDS = ["verifier", "chatbot"] as const;

export type ServiceId = (typeof SERVICE_IDS)[number];

export type ServiceStatus = "success" | "timeout" | "transport_error" | "invalid_response";

export interface VerifierPayload {
  score: number;
  verified: boolean | null;
  personId: string | null;
}

export interface ChatbotPayload {
  answer: string;
  provider: string;
}

export interface ServicePayloads {
  verifier: VerifierPayload;
  chatbot: ChatbotPayload;
}

export interface ServiceErrorDetail {
  message: string;
  httpStatus?: number;
  body?: unknown;
}

export type ServiceSuccess<P> = {
  status: "success";
  payload: P;
  latencyMs: number;
};

export type ServiceFailure = {
  status: Exclude<ServiceStatus, "success">;
  error: ServiceErrorDetail;
  latencyMs: number;
};

// payload exists only on success; failures carry the detail for logging.
export type ServiceResult<P> = ServiceSuccess<P> | ServiceFailure;

export type ResultSet = Readonly<{
  [K in ServiceId]?: ServiceResult<ServicePayloads[K]>;
}>;

export const FUSION_METHODS = ["delta", "tau"] as const;

export type FusionMethod = (typeof FUSION_METHODS)[number];

export interface FusionConfig {
  readonly threshold: number;
  readonly margin: number;
  readonly method: FusionMethod;
}

export type DecisionOutcome = "match" | "no_match" | "unknown";

export type DecisionReason =
  | "matched"
  | "no_successful_services"
  | "below_threshold"
  | "not_verified"
  | "within_margin"
  | "missing_identity_signal";

export interface Decision {
  readonly outcome: DecisionOutcome;
  readonly successfulServices: number;
  readonly reason: DecisionReason;
  readonly score: number | null;
  readonly method: FusionMethod;
}

export interface TraceRecord {
  requestId: string;
  timestamp: Date;
  query: string;
  provider: string | null;
  resultSet: ResultSet;
  decision: Decision;
  config: FusionConfig;
  processingTimeMs: number;
}

export interface IdentificationRate {
  total: number;
  identified: number;
  notIdentified: number;
  identificationRate: number;
  avgScore: number | null;
  minScore: number | null;
  maxScore: number | null;
}

export interface QueryStatistics {
  totalQueries: number;
  avgProcessingTimeMs: number | null;
  minProcessingTimeMs: number | null;
  maxProcessingTimeMs: number | null;
  outcomes: Record<DecisionOutcome, number>;
}
