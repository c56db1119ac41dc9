import fs from "node:fs";
import path from "node:path";
import type { Logger } from "pino";
import { parseJunitGroupsFile } from "../adapter/junit-xml.js";
import {
  ChildPushNotFoundError,
  ParentPushNotFoundError,
  PushNotFoundError,
  SnapshotInvalidError,
  SourcesNotFoundError,
} from "../errors.js";
import { TEST_SELECTION_CAPABILITY } from "../evidence/index.js";
import type { EvidenceChain } from "../evidence/sources.js";
import { silentLogger } from "../lib/logger.js";
import { defaultRegistry, type SchemaRegistry } from "../schema/registry.js";
import type { PushSnapshotFile, SnapshotTask } from "../types/snapshot.js";
import type { GroupSummary, Push, TaskRecord, TestSelectionData } from "../types/push.js";
import { summarizeGroups } from "./group-summary.js";
import { deriveRegressionLikelihood } from "./likelihood.js";

export type LoadSnapshotOptions = {
  /** Consulted when the snapshot embeds no selection data. */
  chain?: EvidenceChain<TestSelectionData>;
  registry?: SchemaRegistry;
  logger?: Logger;
};

type SnapshotPushInit = {
  file: PushSnapshotFile;
  filePath: string;
  tasks: TaskRecord[];
  childTasks: TaskRecord[];
  likely: Set<string>;
  possible: Set<string>;
  chain?: EvidenceChain<TestSelectionData>;
};

/** A push read from a snapshot file on disk. */
export class SnapshotPush implements Push {
  readonly rev: string;
  readonly branch: string;
  readonly decisionTaskId: string | null;
  readonly filePath: string;
  readonly tasks: readonly TaskRecord[];
  readonly groupSummaries: ReadonlyMap<string, GroupSummary>;

  private readonly likely: Set<string>;
  private readonly possible: Set<string>;
  private readonly embeddedSelection: TestSelectionData | undefined;
  private readonly chain: EvidenceChain<TestSelectionData> | undefined;

  constructor(init: SnapshotPushInit) {
    this.rev = init.file.rev;
    this.branch = init.file.branch;
    this.decisionTaskId = init.file.decision_task_id ?? null;
    this.filePath = init.filePath;
    this.tasks = init.tasks;
    this.groupSummaries = summarizeGroups(init.tasks, init.childTasks);
    this.likely = init.likely;
    this.possible = init.possible;
    this.embeddedSelection = init.file.test_selection_data;
    this.chain = init.chain;
  }

  isGroupRunning(name: string): boolean {
    return this.tasks.some(
      (t) =>
        (t.state === "pending" || t.state === "running") &&
        ((t.groups ?? []).includes(name) || t.results.some((r) => r.group === name)),
    );
  }

  getLikelyRegressions(): Set<string> {
    return new Set(this.likely);
  }

  getPossibleRegressions(): Set<string> {
    return new Set(this.possible);
  }

  async getTestSelectionData(): Promise<TestSelectionData> {
    if (this.embeddedSelection) return this.embeddedSelection;
    if (!this.chain) throw new SourcesNotFoundError(TEST_SELECTION_CAPABILITY);
    return this.chain.fetch(this);
  }
}

function readSnapshotFile(
  filePath: string,
  registry: SchemaRegistry,
  notFound: (reason: string) => Error,
): PushSnapshotFile {
  if (!fs.existsSync(filePath)) throw notFound(`no snapshot at ${filePath}`);

  let decoded: unknown;
  try {
    decoded = JSON.parse(fs.readFileSync(filePath, "utf8"));
  } catch (e) {
    throw new SnapshotInvalidError(filePath, e instanceof Error ? e.message : String(e));
  }

  if (!registry.conforms("push-snapshot", decoded)) {
    throw new SnapshotInvalidError(filePath, registry.validate("push-snapshot", decoded).errors ?? "schema mismatch");
  }
  return decoded;
}

function toTaskRecord(task: SnapshotTask, baseDir: string, filePath: string): TaskRecord {
  let results = task.results ?? [];
  if (task.results === undefined && task.report !== undefined) {
    const reportPath = path.resolve(baseDir, task.report);
    if (!fs.existsSync(reportPath)) {
      throw new SnapshotInvalidError(filePath, `report of task ${task.id} not found: ${task.report}`);
    }
    results = parseJunitGroupsFile(reportPath);
  }

  const record: TaskRecord = {
    id: task.id,
    label: task.label,
    configuration: task.configuration,
    state: task.state,
    kind: task.kind ?? "test",
    results,
  };
  if (task.classification !== undefined) record.classification = task.classification;
  if (task.groups !== undefined) record.groups = task.groups;
  return record;
}

function readTasks(file: PushSnapshotFile, filePath: string): TaskRecord[] {
  const baseDir = path.dirname(filePath);
  return file.tasks.map((t) => toTaskRecord(t, baseDir, filePath));
}

/**
 * Load a push snapshot with its children (widened consistency coverage) and,
 * when it carries no explicit regression lists, its parent.
 */
export async function loadPushSnapshot(filePath: string, opts: LoadSnapshotOptions = {}): Promise<SnapshotPush> {
  const registry = opts.registry ?? (await defaultRegistry());
  const log = opts.logger ?? silentLogger();
  const resolved = path.resolve(filePath);
  const baseDir = path.dirname(resolved);

  const file = readSnapshotFile(resolved, registry, (reason) => new PushNotFoundError(path.basename(resolved), reason));
  const tasks = readTasks(file, resolved);

  const childTasks: TaskRecord[] = [];
  for (const child of file.children ?? []) {
    const childPath = path.resolve(baseDir, child);
    const childFile = readSnapshotFile(childPath, registry, (reason) => new ChildPushNotFoundError(file.rev, reason));
    childTasks.push(...readTasks(childFile, childPath));
  }

  let likely = new Set(file.likely_regressions ?? []);
  let possible = new Set(file.possible_regressions ?? []);

  const hasLists = file.likely_regressions !== undefined || file.possible_regressions !== undefined;
  if (!hasLists && file.parent !== undefined) {
    const parentPath = path.resolve(baseDir, file.parent);
    const parentFile = readSnapshotFile(parentPath, registry, (reason) => new ParentPushNotFoundError(file.rev, reason));
    const derived = deriveRegressionLikelihood(summarizeGroups(tasks), readTasks(parentFile, parentPath));
    likely = derived.likely;
    possible = derived.possible;
    log.debug({ rev: file.rev, parent: parentFile.rev }, "regression likelihood derived from parent push");
  }

  log.debug({ rev: file.rev, tasks: tasks.length, children: childTasks.length }, "push snapshot loaded");

  return new SnapshotPush({ file, filePath: resolved, tasks, childTasks, likely, possible, chain: opts.chain });
}
