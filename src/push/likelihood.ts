import type { GroupSummary, TaskRecord } from "../types/push.js";
import { summarizeGroups } from "./group-summary.js";

export type RegressionLikelihood = {
  likely: Set<string>;
  possible: Set<string>;
};

/**
 * Regression likelihood against the parent push:
 * - likely: failing here, ran and passed on the parent
 * - possible: failing here, never ran on the parent
 * A group already failing on the parent is neither.
 */
export function deriveRegressionLikelihood(
  summaries: ReadonlyMap<string, GroupSummary>,
  parentTasks: readonly TaskRecord[],
): RegressionLikelihood {
  const parent = summarizeGroups(parentTasks);
  const likely = new Set<string>();
  const possible = new Set<string>();

  for (const [name, summary] of summaries) {
    if (summary.status === "pass") continue;
    const before = parent.get(name);
    if (!before) possible.add(name);
    else if (before.status === "pass") likely.add(name);
  }

  return { likely, possible };
}
