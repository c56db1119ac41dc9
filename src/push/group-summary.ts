import type { ConsistentFailuresCounts } from "../types/classification.js";
import type { GroupResult, GroupStatus, GroupSummary, TaskRecord } from "../types/push.js";

export const DEFAULT_CONSISTENT_FAILURES_COUNTS: ConsistentFailuresCounts = {
  configurations: 2,
  failures: 1,
};

function resultsFor(task: TaskRecord, group: string): GroupResult[] {
  return task.results.filter((r) => r.group === group);
}

/**
 * Tri-state cross-configuration check over a set of task records:
 * - any configuration with a passing run → false
 * - too few configurations, or a configuration without enough failing runs → null
 * - otherwise → true
 */
export function crossConfigFailure(
  tasks: readonly TaskRecord[],
  group: string,
  counts: ConsistentFailuresCounts = DEFAULT_CONSISTENT_FAILURES_COUNTS,
): boolean | null {
  const failuresByConfig = new Map<string, number>();

  for (const task of tasks) {
    for (const result of resultsFor(task, group)) {
      if (result.ok) return false;
      failuresByConfig.set(task.configuration, (failuresByConfig.get(task.configuration) ?? 0) + 1);
    }
  }

  if (failuresByConfig.size < counts.configurations) return null;
  for (const failures of failuresByConfig.values()) {
    if (failures < counts.failures) return null;
  }
  return true;
}

/**
 * GroupSummary computed from the push's task records. Confirmation runs are
 * kept apart from regular runs: they answer `isConfirmedFailure` only.
 */
export class TaskGroupSummary implements GroupSummary {
  private readonly runs: TaskRecord[];
  private readonly confirmRuns: TaskRecord[];

  constructor(
    readonly name: string,
    tasks: readonly TaskRecord[],
    private readonly childTasks: readonly TaskRecord[] = [],
  ) {
    const touching = tasks.filter((t) => resultsFor(t, name).length > 0);
    this.runs = touching.filter((t) => t.kind !== "confirm");
    this.confirmRuns = touching.filter((t) => t.kind === "confirm");
  }

  get status(): GroupStatus {
    const results = this.runs.flatMap((t) => resultsFor(t, this.name));
    if (results.every((r) => r.ok)) return "pass";
    if (results.every((r) => !r.ok)) return "fail";
    return "intermittent";
  }

  get classifications(): readonly string[] {
    const tags = this.failingTasks()
      .map((t) => t.classification)
      .filter((c): c is string => c !== undefined);
    return [...new Set(tags)];
  }

  failingTasks(): TaskRecord[] {
    return this.runs.filter((t) => resultsFor(t, this.name).some((r) => !r.ok));
  }

  isConfirmedFailure(): boolean | null {
    const results = this.confirmRuns
      .filter((t) => t.state === "completed" || t.state === "failed")
      .flatMap((t) => resultsFor(t, this.name));
    if (results.length === 0) return null;
    return results.some((r) => !r.ok);
  }

  isCrossConfigFailure(counts?: ConsistentFailuresCounts): boolean | null {
    return crossConfigFailure(this.runs, this.name, counts);
  }

  /** Same check, widened with the group's runs on child pushes. */
  isConfigConsistentFailure(counts?: ConsistentFailuresCounts): boolean | null {
    const childRuns = this.childTasks.filter((t) => t.kind !== "confirm");
    return crossConfigFailure([...this.runs, ...childRuns], this.name, counts);
  }
}

/** Build one summary per group named in any task result of the push. */
export function summarizeGroups(
  tasks: readonly TaskRecord[],
  childTasks: readonly TaskRecord[] = [],
): Map<string, TaskGroupSummary> {
  const names = new Set(tasks.flatMap((t) => t.results.map((r) => r.group)));
  const summaries = new Map<string, TaskGroupSummary>();
  for (const name of [...names].sort()) {
    summaries.set(name, new TaskGroupSummary(name, tasks, childTasks));
  }
  return summaries;
}
