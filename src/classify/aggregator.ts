import type { PushStatus, Regressions } from "../types/classification.js";

/**
 * Any real regression makes the push bad; otherwise any unresolved group keeps
 * it from being good. Intermittent failures alone leave it good.
 */
export function aggregatePushStatus(regressions: Regressions): PushStatus {
  if (Object.keys(regressions.real).length > 0) return "BAD";
  if (Object.keys(regressions.unknown).length > 0) return "UNKNOWN";
  return "GOOD";
}
