import type { Decision, DecisionOutcome, DecisionReason, FusionConfig, FusionMethod, ResultSet } from "../types";
import { countSuccessful } from "./slots";

type Verdict = { outcome: DecisionOutcome; reason: DecisionReason };

type ScoreStrategy = (score: number, config: FusionConfig) => Verdict;

const CONSERVATISM: Record<DecisionOutcome, number> = {
  unknown: 2,
  no_match: 1,
  match: 0
};

/**
 * Delta compares the score against two cuts: `threshold` and `threshold + margin`. Scores in the
 * band between them are refused as ambiguous. When `threshold + margin` exceeds 1 the match band
 * is empty and every score at or above the threshold lands in the margin.
 */
const delta: ScoreStrategy = (score, { threshold, margin }) => {
  if (score < threshold) {
    return { outcome: "no_match", reason: "below_threshold" };
  }
  if (score < threshold + margin) {
    return { outcome: "unknown", reason: "within_margin" };
  }
  return { outcome: "match", reason: "matched" };
};

// Single cut at the threshold; the margin is ignored.
const tau: ScoreStrategy = (score, { threshold }) =>
  score < threshold ? { outcome: "no_match", reason: "below_threshold" } : { outcome: "match", reason: "matched" };

export const FUSION_STRATEGIES: Readonly<Record<FusionMethod, ScoreStrategy>> = Object.freeze({ delta, tau });

/** Picks the outcome least likely to assert an identity that is not there. No outcomes is `unknown`. */
export function mostConservative(outcomes: DecisionOutcome[]): DecisionOutcome {
  if (outcomes.length === 0) {
    return "unknown";
  }
  return outcomes.reduce<DecisionOutcome>(
    (current, candidate) => (CONSERVATISM[candidate] > CONSERVATISM[current] ? candidate : current),
    "match"
  );
}

export function fuse(resultSet: ResultSet, config: FusionConfig): Decision {
  const successfulServices = countSuccessful(resultSet);
  const decide = (verdict: Verdict, score: number | null): Decision =>
    Object.freeze({ ...verdict, successfulServices, score, method: config.method });

  if (successfulServices === 0) {
    return decide({ outcome: "unknown", reason: "no_successful_services" }, null);
  }

  const verifier = resultSet.verifier;
  if (verifier?.status !== "success") {
    // The chatbot answers the question but says nothing about who is asking.
    return decide({ outcome: "unknown", reason: "missing_identity_signal" }, null);
  }

  const { score, verified } = verifier.payload;
  // An explicit rejection from the verifier outranks its score.
  if (verified === false) {
    return decide({ outcome: "no_match", reason: "not_verified" }, score);
  }
  return decide(FUSION_STRATEGIES[config.method](score, config), score);
}
