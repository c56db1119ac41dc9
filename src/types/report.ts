import type {
  ConfirmedFailure,
  FollowUpAction,
  PushStatus,
  SignalTiers,
  Verdict,
} from "./classification.js";

/** Classification report: one document per classified push. */
export type ReportGroup = {
  name: string;
  verdict: Verdict;
  confirmed: ConfirmedFailure;
  tiers: SignalTiers | null;
  confidence_score: number | null;
  actions: FollowUpAction[];
  rule: string;
  running: boolean;
  failing_tasks: string[];
};

export type ClassificationReport = {
  schema_version: "1.0.0";
  generated_at: string;
  push: { rev: string; branch: string };
  options: {
    unknown_from_regressions: boolean;
    consider_children_pushes_configs: boolean;
    consistent_failures_counts: { configurations: number; failures: number } | null;
  };
  status: PushStatus;
  regressions: { real: string[]; intermittent: string[]; unknown: string[] };
  to_retrigger_or_backfill: { real_retrigger: string[]; intermittent_retrigger: string[]; backfill: string[] };
  groups: ReportGroup[];
};
