import type { DecisionOutcome, IdentificationRate, QueryStatistics, TraceRecord } from "../types";

export function emptyOutcomeCounts(): Record<DecisionOutcome, number> {
  return { match: 0, no_match: 0, unknown: 0 };
}

export function summarizeIdentification(records: TraceRecord[]): IdentificationRate {
  const total = records.length;
  const identified = records.filter((record) => record.decision.outcome === "match").length;
  const scores = records
    .map((record) => record.decision.score)
    .filter((score): score is number => typeof score === "number");

  return {
    total,
    identified,
    notIdentified: total - identified,
    identificationRate: total === 0 ? 0 : identified / total,
    avgScore: mean(scores),
    minScore: scores.length === 0 ? null : Math.min(...scores),
    maxScore: scores.length === 0 ? null : Math.max(...scores)
  } satisfies IdentificationRate;
}

export function summarizeQueries(records: TraceRecord[]): QueryStatistics {
  const durations = records.map((record) => record.processingTimeMs);
  const outcomes = emptyOutcomeCounts();
  for (const record of records) {
    outcomes[record.decision.outcome] += 1;
  }

  return {
    totalQueries: records.length,
    avgProcessingTimeMs: mean(durations),
    minProcessingTimeMs: durations.length === 0 ? null : Math.min(...durations),
    maxProcessingTimeMs: durations.length === 0 ? null : Math.max(...durations),
    outcomes
  } satisfies QueryStatistics;
}

function mean(values: number[]): number | null {
  if (values.length === 0) {
    return null;
  }
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}
