import { describe, expect, it, vi } from "vitest";
import { fuse } from "../../orchestration/fusion";
import { PgTraceStore } from "../../traces/pgStore";
import type { TraceRecord } from "../../types";
import { DELTA_CONFIG, chatbotSuccess, verifierSuccess } from "../fixtures";

function fakePool(rows: unknown[] = []) {
  const query = vi.fn().mockResolvedValue({ rows });
  return { pool: { query }, query };
}

const resultSet = { verifier: verifierSuccess(0.92, "p-7"), chatbot: chatbotSuccess() };

const RECORD: TraceRecord = {
  requestId: "req-42",
  timestamp: new Date("2026-03-02T10:00:00Z"),
  query: "¿Puedo convalidar asignaturas?",
  provider: "deepseek",
  resultSet,
  decision: fuse(resultSet, DELTA_CONFIG),
  config: DELTA_CONFIG,
  processingTimeMs: 87
};

describe("PgTraceStore", () => {
  it("creates the traces table and its indexes", async () => {
    const { pool, query } = fakePool();

    await new PgTraceStore(pool).init();

    expect(query).toHaveBeenCalledTimes(4);
    expect(query.mock.calls[0][0]).toContain("CREATE TABLE IF NOT EXISTS traces");
  });

  it("inserts one row with the decision columns and JSON documents", async () => {
    const { pool, query } = fakePool();

    await new PgTraceStore(pool).insert(RECORD);

    expect(query).toHaveBeenCalledTimes(1);
    const [sql, params] = query.mock.calls[0];
    expect(sql).toContain("INSERT INTO traces");
    expect(params).toEqual([
      "req-42",
      new Date("2026-03-02T10:00:00Z"),
      "¿Puedo convalidar asignaturas?",
      "deepseek",
      "match",
      "matched",
      2,
      0.92,
      87,
      JSON.stringify(resultSet),
      JSON.stringify(RECORD.decision),
      JSON.stringify(DELTA_CONFIG)
    ]);
  });

  it("maps rows back into trace records", async () => {
    const { pool, query } = fakePool([
      {
        request_id: "req-42",
        timestamp: RECORD.timestamp,
        query: RECORD.query,
        provider: "deepseek",
        processing_time_ms: 87,
        result_set: resultSet,
        decision: RECORD.decision,
        config: DELTA_CONFIG
      }
    ]);

    const traces = await new PgTraceStore(pool).latest(5);

    expect(query.mock.calls[0][1]).toEqual([5]);
    expect(traces).toEqual([RECORD]);
  });

  it("derives the identification rate from the counts", async () => {
    const since = new Date("2026-03-01T10:00:00Z");
    const { pool, query } = fakePool([{ total: 8, identified: 6, avg_score: 0.81, min_score: 0.4, max_score: 0.97 }]);

    const rate = await new PgTraceStore(pool).identificationRate(since);

    expect(query.mock.calls[0][1]).toEqual([since]);
    expect(rate).toEqual({
      total: 8,
      identified: 6,
      notIdentified: 2,
      identificationRate: 0.75,
      avgScore: 0.81,
      minScore: 0.4,
      maxScore: 0.97
    });
  });

  it("returns zeroed statistics for an empty window", async () => {
    const { pool } = fakePool([
      {
        total_queries: 0,
        avg_processing_time_ms: null,
        min_processing_time_ms: null,
        max_processing_time_ms: null,
        match_count: 0,
        no_match_count: 0,
        unknown_count: 0
      }
    ]);

    const stats = await new PgTraceStore(pool).queryStatistics(new Date(0));

    expect(stats).toEqual({
      totalQueries: 0,
      avgProcessingTimeMs: null,
      minProcessingTimeMs: null,
      maxProcessingTimeMs: null,
      outcomes: { match: 0, no_match: 0, unknown: 0 }
    });
  });

  it("propagates query failures to the caller", async () => {
    const query = vi.fn().mockRejectedValue(new Error("relation \"traces\" does not exist"));

    await expect(new PgTraceStore({ query }).insert(RECORD)).rejects.toThrow('relation "traces" does not exist');
  });
});
