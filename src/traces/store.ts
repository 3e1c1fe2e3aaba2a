import type { IdentificationRate, QueryStatistics, TraceRecord } from "../types";

export interface TraceStore {
  insert(record: TraceRecord): Promise<void>;
  /** Most recent first. */
  latest(limit: number): Promise<TraceRecord[]>;
  identificationRate(since: Date): Promise<IdentificationRate>;
  queryStatistics(since: Date): Promise<QueryStatistics>;
}
