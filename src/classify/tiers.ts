import type {
  ConfidenceTier,
  ConfirmedFailure,
  ConsistencyState,
  Freshness,
  Likelihood,
} from "../types/classification.js";

/**
 * Conversions from collaborator answers (optional numbers, nullable booleans,
 * tag lists) to the engine's explicit tiers.
 */
export function confidenceTier(score: number | null, highThreshold: number): ConfidenceTier {
  if (score === null) return "none";
  return score >= highThreshold ? "high" : "low";
}

export function likelihoodOf(
  group: string,
  likely: ReadonlySet<string>,
  possible: ReadonlySet<string>,
): Likelihood {
  if (likely.has(group)) return "likely";
  if (possible.has(group)) return "possible";
  return "none";
}

export function consistencyOf(answer: boolean | null): ConsistencyState {
  if (answer === null) return "unknown";
  return answer ? "consistent" : "inconsistent";
}

export function confirmationOf(answer: boolean | null): ConfirmedFailure {
  if (answer === null) return "unset";
  return answer ? "confirmed" : "refuted";
}

export function freshnessOf(classifications: readonly string[], newFailureTags: readonly string[]): Freshness {
  return classifications.some((c) => newFailureTags.includes(c)) ? "new" : "known";
}
