import type { IdentificationRate, QueryStatistics, TraceRecord } from "../types";
import { summarizeIdentification, summarizeQueries } from "./aggregate";
import type { TraceStore } from "./store";

export class MemoryTraceStore implements TraceStore {
  private readonly records: TraceRecord[] = [];

  async insert(record: TraceRecord): Promise<void> {
    this.records.push(record);
  }

  async latest(limit: number): Promise<TraceRecord[]> {
    return this.sortedNewestFirst().slice(0, limit);
  }

  async identificationRate(since: Date): Promise<IdentificationRate> {
    return summarizeIdentification(this.since(since));
  }

  async queryStatistics(since: Date): Promise<QueryStatistics> {
    return summarizeQueries(this.since(since));
  }

  all(): TraceRecord[] {
    return [...this.records];
  }

  private since(since: Date): TraceRecord[] {
    return this.records.filter((record) => record.timestamp.getTime() >= since.getTime());
  }

  private sortedNewestFirst(): TraceRecord[] {
    return [...this.records].sort((a, b) => b.timestamp.getTime() - a.timestamp.getTime());
  }
}
