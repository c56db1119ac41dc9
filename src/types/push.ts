import type { ConsistentFailuresCounts } from "./classification.js";

/** Collaborator shapes consumed by the classification engine. */
export type TaskState = "pending" | "running" | "completed" | "failed" | "exception";

export type TaskKind = "test" | "confirm";

export type GroupResult = {
  group: string;
  ok: boolean;
  duration_ms: number;
};

export type TaskRecord = {
  id: string;
  label: string;
  configuration: string;
  state: TaskState;
  kind: TaskKind;
  classification?: string;
  results: GroupResult[];
  /** Groups scheduled on the task, known before results are. */
  groups?: string[];
};

export type GroupStatus = "pass" | "fail" | "intermittent";

export interface GroupSummary {
  readonly name: string;
  readonly status: GroupStatus;
  readonly classifications: readonly string[];
  failingTasks(): TaskRecord[];
  isConfirmedFailure(): boolean | null;
  isCrossConfigFailure(counts?: ConsistentFailuresCounts): boolean | null;
  isConfigConsistentFailure(counts?: ConsistentFailuresCounts): boolean | null;
}

/** Per-group confidence scores in [0, 1]. Other keys of the payload are ignored. */
export type TestSelectionData = {
  groups: Record<string, number>;
};

export interface Push {
  readonly rev: string;
  readonly branch: string;
  readonly decisionTaskId: string | null;
  readonly groupSummaries: ReadonlyMap<string, GroupSummary>;
  isGroupRunning(name: string): boolean;
  getLikelyRegressions(): Set<string>;
  getPossibleRegressions(): Set<string>;
  getTestSelectionData(): Promise<TestSelectionData>;
}
