import type {
  ConfidenceTier,
  ConsistencyState,
  Freshness,
  FollowUpAction,
  Likelihood,
  SignalTiers,
  Verdict,
} from "../types/classification.js";

/** A row constrains any subset of the four tiers; an omitted tier matches anything. */
export type TierPattern = {
  consistency?: readonly ConsistencyState[];
  likelihood?: readonly Likelihood[];
  confidence?: readonly ConfidenceTier[];
  freshness?: readonly Freshness[];
};

export type DecisionRow = {
  id: string;
  when: TierPattern;
  verdict: Verdict;
  actions: readonly FollowUpAction[];
};

export type DecisionTableOptions = {
  inconsistentHoldRequiresRegression: boolean;
  knownConsistentWithoutEvidence: "intermittent" | "unknown";
};

const NOT_HIGH: readonly ConfidenceTier[] = ["low", "none"];
const COULD_REGRESS: readonly Likelihood[] = ["likely", "possible"];

/**
 * Ordered decision table; the first matching row wins.
 *
 * A follow-up is proposed only when its outcome could move the verdict:
 * a real retrigger where consistency would make the group real, an
 * intermittent retrigger where inconsistency would make it intermittent, and
 * a backfill where a possible regression would be real if it were likely.
 */
export function buildDecisionTable(opts: DecisionTableOptions): DecisionRow[] {
  return [
    // Inconsistent across configurations.
    {
      id: "inconsistent-high-new",
      when: {
        consistency: ["inconsistent"],
        confidence: ["high"],
        freshness: ["new"],
        ...(opts.inconsistentHoldRequiresRegression ? { likelihood: COULD_REGRESS } : {}),
      },
      verdict: "unknown",
      actions: [],
    },
    { id: "inconsistent", when: { consistency: ["inconsistent"] }, verdict: "intermittent", actions: [] },

    // Reproduces on every configuration.
    {
      id: "consistent-likely-high",
      when: { consistency: ["consistent"], likelihood: ["likely"], confidence: ["high"] },
      verdict: "real",
      actions: [],
    },
    {
      id: "consistent-likely-new",
      when: { consistency: ["consistent"], likelihood: ["likely"], freshness: ["new"] },
      verdict: "real",
      actions: [],
    },
    {
      id: "consistent-possible-high",
      when: { consistency: ["consistent"], likelihood: ["possible"], confidence: ["high"] },
      verdict: "unknown",
      actions: ["backfill"],
    },
    {
      id: "consistent-possible-new",
      when: { consistency: ["consistent"], likelihood: ["possible"], freshness: ["new"] },
      verdict: "unknown",
      actions: ["backfill"],
    },
    {
      id: "consistent-known-no-evidence",
      when: { consistency: ["consistent"], likelihood: ["none"], confidence: ["none"], freshness: ["known"] },
      verdict: opts.knownConsistentWithoutEvidence,
      actions: [],
    },
    { id: "consistent", when: { consistency: ["consistent"] }, verdict: "unknown", actions: [] },

    // Not enough configurations have run yet.
    {
      id: "unknown-likely-high-new",
      when: { consistency: ["unknown"], likelihood: ["likely"], confidence: ["high"], freshness: ["new"] },
      verdict: "unknown",
      actions: ["real_retrigger"],
    },
    {
      id: "unknown-likely-high-known",
      when: { consistency: ["unknown"], likelihood: ["likely"], confidence: ["high"], freshness: ["known"] },
      verdict: "unknown",
      actions: ["real_retrigger", "intermittent_retrigger"],
    },
    {
      id: "unknown-likely-new",
      when: { consistency: ["unknown"], likelihood: ["likely"], confidence: NOT_HIGH, freshness: ["new"] },
      verdict: "unknown",
      actions: ["real_retrigger", "intermittent_retrigger"],
    },
    {
      id: "unknown-likely-known",
      when: { consistency: ["unknown"], likelihood: ["likely"], confidence: NOT_HIGH, freshness: ["known"] },
      verdict: "unknown",
      actions: ["intermittent_retrigger"],
    },
    {
      id: "unknown-possible-high-new",
      when: { consistency: ["unknown"], likelihood: ["possible"], confidence: ["high"], freshness: ["new"] },
      verdict: "unknown",
      actions: ["backfill"],
    },
    {
      id: "unknown-possible-high-known",
      when: { consistency: ["unknown"], likelihood: ["possible"], confidence: ["high"], freshness: ["known"] },
      verdict: "unknown",
      actions: ["backfill", "intermittent_retrigger"],
    },
    {
      id: "unknown-possible-new",
      when: { consistency: ["unknown"], likelihood: ["possible"], confidence: NOT_HIGH, freshness: ["new"] },
      verdict: "unknown",
      actions: ["backfill", "intermittent_retrigger"],
    },
    {
      id: "unknown-possible-known",
      when: { consistency: ["unknown"], likelihood: ["possible"], confidence: NOT_HIGH, freshness: ["known"] },
      verdict: "unknown",
      actions: ["intermittent_retrigger"],
    },
    {
      // Neither a retrigger nor a backfill would change anything here.
      id: "unknown-none-high-new",
      when: { consistency: ["unknown"], likelihood: ["none"], confidence: ["high"], freshness: ["new"] },
      verdict: "unknown",
      actions: [],
    },
    {
      id: "unknown-none",
      when: { consistency: ["unknown"], likelihood: ["none"] },
      verdict: "unknown",
      actions: ["intermittent_retrigger"],
    },
  ];
}

function allows<T>(allowed: readonly T[] | undefined, value: T): boolean {
  return allowed === undefined || allowed.includes(value);
}

export function matchesRow(row: DecisionRow, tiers: SignalTiers): boolean {
  return (
    allows(row.when.consistency, tiers.consistency) &&
    allows(row.when.likelihood, tiers.likelihood) &&
    allows(row.when.confidence, tiers.confidence) &&
    allows(row.when.freshness, tiers.freshness)
  );
}

/** First row matching the tiers. The table covers every combination. */
export function lookupDecision(table: readonly DecisionRow[], tiers: SignalTiers): DecisionRow {
  const row = table.find((r) => matchesRow(r, tiers));
  if (!row) {
    throw new Error(`Decision table has no row for ${JSON.stringify(tiers)}`);
  }
  return row;
}
