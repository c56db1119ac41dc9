import type { PushEvaluation } from "../classify/engine.js";
import type { ClassifyOptions } from "../types/classification.js";
import type { PushIdentity } from "../evidence/sources.js";
import type { ClassificationReport, ReportGroup } from "../types/report.js";

export type BuildReportInput = {
  push: PushIdentity;
  evaluation: PushEvaluation;
  options: ClassifyOptions;
  /** Defaults to now. */
  generatedAt?: Date;
};

function sortedKeys(record: Record<string, unknown>): string[] {
  return Object.keys(record).sort();
}

/**
 * Classification report as a JSON-serialisable view of one evaluation.
 * Group lists are sorted so two runs over the same push diff cleanly.
 */
export function buildClassificationReport(input: BuildReportInput): ClassificationReport {
  const { push, evaluation, options } = input;
  const { regressions, toRetriggerOrBackfill } = evaluation;

  const groups: ReportGroup[] = evaluation.decisions
    .map((d) => ({
      ...d,
      failing_tasks: (regressions[d.verdict][d.name] ?? []).map((t) => t.id),
    }))
    .sort((a, b) => a.name.localeCompare(b.name));

  return {
    schema_version: "1.0.0",
    generated_at: (input.generatedAt ?? new Date()).toISOString(),
    push: { rev: push.rev, branch: push.branch },
    options: {
      unknown_from_regressions: options.unknownFromRegressions ?? true,
      consider_children_pushes_configs: options.considerChildrenPushesConfigs ?? true,
      consistent_failures_counts: options.consistentFailuresCounts ?? null,
    },
    status: evaluation.status,
    regressions: {
      real: sortedKeys(regressions.real),
      intermittent: sortedKeys(regressions.intermittent),
      unknown: sortedKeys(regressions.unknown),
    },
    to_retrigger_or_backfill: {
      real_retrigger: [...toRetriggerOrBackfill.real_retrigger].sort(),
      intermittent_retrigger: [...toRetriggerOrBackfill.intermittent_retrigger].sort(),
      backfill: [...toRetriggerOrBackfill.backfill].sort(),
    },
    groups,
  };
}

/** One line per group, for terminals. */
export function formatHumanReport(report: ClassificationReport): string {
  const lines = [`${report.push.branch}@${report.push.rev}: ${report.status}`];
  for (const g of report.groups) {
    const actions = g.actions.length > 0 ? ` -> ${g.actions.join(", ")}` : "";
    const running = g.running ? " (running)" : "";
    lines.push(`  ${g.verdict.padEnd(12)} ${g.name} [${g.rule}]${actions}${running}`);
  }
  return lines.join("\n");
}
