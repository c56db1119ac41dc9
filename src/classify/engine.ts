import type { Logger } from "pino";
import { groupConfidence } from "../evidence/selection-data.js";
import { createChildLogger, silentLogger } from "../lib/logger.js";
import type {
  ClassificationResult,
  ClassifyOptions,
  FollowUpAction,
  GroupDecision,
  PushStatus,
  Regressions,
  SignalTiers,
  ToRetriggerOrBackfill,
  Verdict,
} from "../types/classification.js";
import type { DecisionConfig, ThresholdsConfig } from "../types/config.js";
import type { GroupSummary, Push, TaskRecord, TestSelectionData } from "../types/push.js";
import { ActionPlanner } from "./action-planner.js";
import { aggregatePushStatus } from "./aggregator.js";
import { buildDecisionTable, lookupDecision, type DecisionRow } from "./decision-table.js";
import { matchExcludedGroup } from "./rules.js";
import { confidenceTier, confirmationOf, consistencyOf, freshnessOf, likelihoodOf } from "./tiers.js";

export type ClassifierDeps = {
  thresholds: ThresholdsConfig;
  decision: DecisionConfig;
  logger?: Logger;
};

export type PushEvaluation = {
  status: PushStatus;
  regressions: Regressions;
  toRetriggerOrBackfill: ToRetriggerOrBackfill;
  decisions: GroupDecision[];
};

type Signals = {
  selection: TestSelectionData;
  likely: Set<string>;
  possible: Set<string>;
};

/**
 * Regression classifier. Turns the evidence gathered for one push into a
 * verdict per failing group, a push status and the follow-ups worth running.
 *
 * 1. Read the push-level signals (selection scores, likely/possible sets)
 * 2. Per failing group: confirmation override, else tiers → decision table
 * 3. Collect follow-ups through the action planner
 * 4. Aggregate the push status
 *
 * Missing per-group evidence is a tier, not an error; failures reading the
 * push-level signals propagate.
 */
export class RegressionClassifier {
  private readonly table: DecisionRow[];
  private readonly logger: Logger;

  constructor(private readonly deps: ClassifierDeps) {
    this.table = buildDecisionTable({
      inconsistentHoldRequiresRegression: deps.decision.inconsistent_hold_requires_regression,
      knownConsistentWithoutEvidence: deps.decision.known_consistent_without_evidence,
    });
    this.logger = deps.logger ?? silentLogger();
  }

  async classify(push: Push, options: ClassifyOptions = {}): Promise<ClassificationResult> {
    const evaluation = await this.evaluate(push, options);
    return [evaluation.status, evaluation.regressions, evaluation.toRetriggerOrBackfill];
  }

  async classifyRegressions(
    push: Push,
    options: ClassifyOptions = {},
  ): Promise<[Regressions, ToRetriggerOrBackfill]> {
    const evaluation = await this.evaluate(push, options);
    return [evaluation.regressions, evaluation.toRetriggerOrBackfill];
  }

  async evaluate(push: Push, options: ClassifyOptions = {}): Promise<PushEvaluation> {
    const log = createChildLogger(this.logger, { rev: push.rev, branch: push.branch });
    const signals = await this.readSignals(push);

    const byVerdict: Record<Verdict, Map<string, TaskRecord[]>> = {
      real: new Map(),
      intermittent: new Map(),
      unknown: new Map(),
    };
    const planner = new ActionPlanner();
    const decisions: GroupDecision[] = [];

    for (const [name, summary] of push.groupSummaries) {
      if (summary.status === "pass") continue;

      const excludedBy = matchExcludedGroup(name, this.deps.decision.excluded_groups);
      if (excludedBy) {
        log.debug({ group: name, pattern: excludedBy }, "group excluded from classification");
        continue;
      }

      const decision = this.decideGroup(push, name, summary, signals, options);
      byVerdict[decision.verdict].set(name, summary.failingTasks());

      if (decision.confirmed !== "unset") {
        planner.markSettled(name);
      } else {
        planner.plan(name, decision.actions);
      }

      decisions.push(decision);
      log.debug(
        { group: name, verdict: decision.verdict, rule: decision.rule, actions: decision.actions },
        "group classified",
      );
    }

    // fromEntries defines own keys; "__proto__" stays a group name.
    const regressions: Regressions = {
      real: Object.fromEntries(byVerdict.real),
      intermittent: Object.fromEntries(byVerdict.intermittent),
      unknown: Object.fromEntries(byVerdict.unknown),
    };
    const status = aggregatePushStatus(regressions);
    const toRetriggerOrBackfill = planner.result();

    log.info(
      {
        status,
        real: Object.keys(regressions.real).length,
        intermittent: Object.keys(regressions.intermittent).length,
        unknown: Object.keys(regressions.unknown).length,
      },
      "push classified",
    );

    return { status, regressions, toRetriggerOrBackfill, decisions };
  }

  private async readSignals(push: Push): Promise<Signals> {
    return {
      selection: await push.getTestSelectionData(),
      likely: push.getLikelyRegressions(),
      possible: push.getPossibleRegressions(),
    };
  }

  private decideGroup(
    push: Push,
    name: string,
    summary: GroupSummary,
    signals: Signals,
    options: ClassifyOptions,
  ): GroupDecision {
    const score = groupConfidence(signals.selection, name);
    const running = push.isGroupRunning(name);

    // Step 1: a completed confirmation pass settles the group.
    const confirmed = confirmationOf(summary.isConfirmedFailure());
    if (confirmed !== "unset") {
      return {
        name,
        verdict: confirmed === "confirmed" ? "real" : "intermittent",
        confirmed,
        tiers: null,
        confidence_score: score,
        actions: [],
        rule: confirmed === "confirmed" ? "confirmed-failure" : "refuted-failure",
        running,
      };
    }

    // Step 2: signal tiers.
    const considerChildren = options.considerChildrenPushesConfigs ?? true;
    const consistencyAnswer = considerChildren
      ? summary.isConfigConsistentFailure(options.consistentFailuresCounts)
      : summary.isCrossConfigFailure(options.consistentFailuresCounts);

    const tiers: SignalTiers = {
      confidence: confidenceTier(score, this.deps.thresholds.high_confidence),
      likelihood: likelihoodOf(name, signals.likely, signals.possible),
      consistency: consistencyOf(consistencyAnswer),
      freshness: freshnessOf(summary.classifications, this.deps.decision.new_failure_tags),
    };

    // Step 3: decision table.
    const row = lookupDecision(this.table, tiers);
    let actions: FollowUpAction[] = [...row.actions];
    let rule = row.id;

    if (
      (options.unknownFromRegressions ?? true) &&
      row.verdict === "unknown" &&
      actions.length === 0 &&
      tiers.likelihood !== "none" &&
      tiers.consistency !== "inconsistent"
    ) {
      actions = ["backfill"];
      rule = `${row.id}+regression-backfill`;
    }

    // Jobs still in flight will supply the missing samples.
    if (running) actions = [];

    return { name, verdict: row.verdict, confirmed, tiers, confidence_score: score, actions, rule, running };
  }
}
