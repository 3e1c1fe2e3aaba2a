import type { Pool } from "pg";
import type { Decision, FusionConfig, IdentificationRate, QueryStatistics, ResultSet, TraceRecord } from "../types";
import { emptyOutcomeCounts } from "./aggregate";
import type { TraceStore } from "./store";

export type Queryable = Pick<Pool, "query">;

type TraceRow = {
  request_id: string;
  timestamp: Date;
  query: string;
  provider: string | null;
  processing_time_ms: number;
  result_set: ResultSet;
  decision: Decision;
  config: FusionConfig;
};

type IdentificationRow = {
  total: number;
  identified: number;
  avg_score: number | null;
  min_score: number | null;
  max_score: number | null;
};

type QueryStatisticsRow = {
  total_queries: number;
  avg_processing_time_ms: number | null;
  min_processing_time_ms: number | null;
  max_processing_time_ms: number | null;
  match_count: number;
  no_match_count: number;
  unknown_count: number;
};

export class PgTraceStore implements TraceStore {
  constructor(private readonly pool: Queryable) {}

  async init(): Promise<void> {
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS traces (
        id SERIAL PRIMARY KEY,
        request_id TEXT NOT NULL,
        timestamp TIMESTAMPTZ NOT NULL,
        query TEXT NOT NULL,
        provider TEXT,
        outcome TEXT NOT NULL,
        reason TEXT NOT NULL,
        successful_services INTEGER NOT NULL,
        score DOUBLE PRECISION,
        processing_time_ms DOUBLE PRECISION NOT NULL,
        result_set JSONB NOT NULL,
        decision JSONB NOT NULL,
        config JSONB NOT NULL,
        created_at TIMESTAMPTZ DEFAULT NOW()
      );
    `);
    await this.pool.query(`CREATE INDEX IF NOT EXISTS traces_timestamp_idx ON traces (timestamp DESC);`);
    await this.pool.query(`CREATE INDEX IF NOT EXISTS traces_request_id_idx ON traces (request_id);`);
    await this.pool.query(`CREATE INDEX IF NOT EXISTS traces_outcome_idx ON traces (outcome, timestamp DESC);`);
  }

  async insert(record: TraceRecord): Promise<void> {
    const values = [
      record.requestId,
      record.timestamp,
      record.query,
      record.provider,
      record.decision.outcome,
      record.decision.reason,
      record.decision.successfulServices,
      record.decision.score,
      record.processingTimeMs,
      JSON.stringify(record.resultSet),
      JSON.stringify(record.decision),
      JSON.stringify(record.config)
    ];

    await this.pool.query(
      `INSERT INTO traces (request_id, timestamp, query, provider, outcome, reason, successful_services, score,
         processing_time_ms, result_set, decision, config)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12)`,
      values
    );
  }

  async latest(limit: number): Promise<TraceRecord[]> {
    const result = await this.pool.query<TraceRow>(
      `SELECT request_id, timestamp, query, provider, processing_time_ms, result_set, decision, config
       FROM traces
       ORDER BY timestamp DESC
       LIMIT $1`,
      [limit]
    );

    return result.rows.map((row) => ({
      requestId: row.request_id,
      timestamp: row.timestamp,
      query: row.query,
      provider: row.provider,
      processingTimeMs: row.processing_time_ms,
      resultSet: row.result_set,
      decision: row.decision,
      config: row.config
    }));
  }

  async identificationRate(since: Date): Promise<IdentificationRate> {
    const result = await this.pool.query<IdentificationRow>(
      `SELECT COUNT(*)::int AS total,
              COUNT(*) FILTER (WHERE outcome = 'match')::int AS identified,
              AVG(score) AS avg_score,
              MIN(score) AS min_score,
              MAX(score) AS max_score
       FROM traces
       WHERE timestamp >= $1`,
      [since]
    );

    const row = result.rows[0];
    const total = row?.total ?? 0;
    const identified = row?.identified ?? 0;
    return {
      total,
      identified,
      notIdentified: total - identified,
      identificationRate: total === 0 ? 0 : identified / total,
      avgScore: row?.avg_score ?? null,
      minScore: row?.min_score ?? null,
      maxScore: row?.max_score ?? null
    } satisfies IdentificationRate;
  }

  async queryStatistics(since: Date): Promise<QueryStatistics> {
    const result = await this.pool.query<QueryStatisticsRow>(
      `SELECT COUNT(*)::int AS total_queries,
              AVG(processing_time_ms) AS avg_processing_time_ms,
              MIN(processing_time_ms) AS min_processing_time_ms,
              MAX(processing_time_ms) AS max_processing_time_ms,
              COUNT(*) FILTER (WHERE outcome = 'match')::int AS match_count,
              COUNT(*) FILTER (WHERE outcome = 'no_match')::int AS no_match_count,
              COUNT(*) FILTER (WHERE outcome = 'unknown')::int AS unknown_count
       FROM traces
       WHERE timestamp >= $1`,
      [since]
    );

    const row = result.rows[0];
    const outcomes = emptyOutcomeCounts();
    outcomes.match = row?.match_count ?? 0;
    outcomes.no_match = row?.no_match_count ?? 0;
    outcomes.unknown = row?.unknown_count ?? 0;

    return {
      totalQueries: row?.total_queries ?? 0,
      avgProcessingTimeMs: row?.avg_processing_time_ms ?? null,
      minProcessingTimeMs: row?.min_processing_time_ms ?? null,
      maxProcessingTimeMs: row?.max_processing_time_ms ?? null,
      outcomes
    } satisfies QueryStatistics;
  }
}
