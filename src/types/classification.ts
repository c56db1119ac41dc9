import type { TaskRecord } from "./push.js";

/** Regression classification vocabulary. Every signal keeps its "unknown" arm. */
export type PushStatus = "GOOD" | "BAD" | "UNKNOWN";

export type Verdict = "real" | "intermittent" | "unknown";

export type ConfidenceTier = "none" | "low" | "high";

export type Likelihood = "likely" | "possible" | "none";

export type ConsistencyState = "consistent" | "inconsistent" | "unknown";

export type Freshness = "new" | "known";

export type ConfirmedFailure = "confirmed" | "refuted" | "unset";

export type FollowUpAction = "real_retrigger" | "intermittent_retrigger" | "backfill";

export type SignalTiers = {
  confidence: ConfidenceTier;
  likelihood: Likelihood;
  consistency: ConsistencyState;
  freshness: Freshness;
};

export type Regressions = {
  real: Record<string, TaskRecord[]>;
  intermittent: Record<string, TaskRecord[]>;
  unknown: Record<string, TaskRecord[]>;
};

export type ToRetriggerOrBackfill = {
  real_retrigger: Set<string>;
  intermittent_retrigger: Set<string>;
  backfill: Set<string>;
};

export type GroupDecision = {
  name: string;
  verdict: Verdict;
  confirmed: ConfirmedFailure;
  /** Null when the confirmation override decided the group. */
  tiers: SignalTiers | null;
  confidence_score: number | null;
  actions: FollowUpAction[];
  rule: string;
  running: boolean;
};

export type ConsistentFailuresCounts = {
  /** Minimum number of configurations that must have run the group. */
  configurations: number;
  /** Minimum number of failing runs per configuration. */
  failures: number;
};

export type ClassifyOptions = {
  unknownFromRegressions?: boolean;
  consistentFailuresCounts?: ConsistentFailuresCounts;
  considerChildrenPushesConfigs?: boolean;
};

export type ClassificationResult = [PushStatus, Regressions, ToRetriggerOrBackfill];
