import { minimatch } from "minimatch";

/**
 * Match a group name against exclusion patterns.
 * Returns the first matching pattern, or null.
 */
export function matchExcludedGroup(group: string, patterns: readonly string[]): string | null {
  for (const pattern of patterns) {
    if (minimatch(group, pattern, { matchBase: true })) {
      return pattern;
    }
  }
  return null;
}
