/** Configuration types for the layered config. */
export type ThresholdsConfig = {
  /** Scores at or above this band as "high" confidence. */
  high_confidence: number;
};

export type DecisionConfig = {
  new_failure_tags: string[];
  /** Hold INCONSISTENT+HIGH+NEW as unknown only when the group could also regress. */
  inconsistent_hold_requires_regression: boolean;
  /** Verdict for a consistent, known failure with no confidence and no likelihood. */
  known_consistent_without_evidence: "intermittent" | "unknown";
  excluded_groups: string[];
};

export type EvidenceConfig = {
  cache_artifact_url: string;
  prediction_service_url: string;
  retry_interval_ms: number;
  retry_timeout_ms: number;
  /** Abort a single HTTP request after this long. */
  request_timeout_ms: number;
  max_attempts: number;
};

export type PushTriageConfig = {
  schema_version: string;
  log_level: string;
  thresholds: ThresholdsConfig;
  decision: DecisionConfig;
  evidence: EvidenceConfig;
};
