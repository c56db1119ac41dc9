import type { GroupResult, TaskKind, TaskState, TestSelectionData } from "./push.js";

/** On-disk push snapshot (schemas/push-snapshot.schema.json). */
export type SnapshotTask = {
  id: string;
  label: string;
  configuration: string;
  state: TaskState;
  kind?: TaskKind;
  classification?: string;
  groups?: string[];
  results?: GroupResult[];
  /** JUnit XML report, relative to the snapshot file. */
  report?: string;
};

export type PushSnapshotFile = {
  rev: string;
  branch: string;
  decision_task_id?: string;
  tasks: SnapshotTask[];
  likely_regressions?: string[];
  possible_regressions?: string[];
  test_selection_data?: TestSelectionData;
  /** Parent snapshot, relative to this file. */
  parent?: string;
  children?: string[];
};
