import type { TestSelectionData } from "../types/push.js";

function isScoreRecord(value: unknown): value is Record<string, number> {
  if (value === null || typeof value !== "object" || Array.isArray(value)) return false;
  return Object.values(value).every((v) => typeof v === "number" && v >= 0 && v <= 1);
}

/** Narrow a decoded payload to selection data; every group score must lie in [0, 1]. */
export function parseTestSelectionData(payload: unknown): TestSelectionData | null {
  if (payload === null || typeof payload !== "object" || Array.isArray(payload)) return null;

  const groups: unknown = Reflect.get(payload, "groups");
  if (!isScoreRecord(groups)) return null;
  return { groups };
}

/** Score for a group; absent when the model expressed no opinion. */
export function groupConfidence(data: TestSelectionData, group: string): number | null {
  return Object.hasOwn(data.groups, group) ? (data.groups[group] ?? null) : null;
}
