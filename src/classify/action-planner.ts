import type { FollowUpAction, ToRetriggerOrBackfill } from "../types/classification.js";

/**
 * Collects per-group follow-ups into push-wide work sets. Groups settled by a
 * confirmation pass are never scheduled again.
 */
export class ActionPlanner {
  private readonly sets = emptySets();
  private readonly settled = new Set<string>();

  markSettled(group: string): void {
    this.settled.add(group);
    for (const set of Object.values(this.sets)) set.delete(group);
  }

  plan(group: string, actions: readonly FollowUpAction[]): void {
    if (this.settled.has(group)) return;
    for (const action of actions) this.sets[action].add(group);
  }

  result(): ToRetriggerOrBackfill {
    return {
      real_retrigger: new Set(this.sets.real_retrigger),
      intermittent_retrigger: new Set(this.sets.intermittent_retrigger),
      backfill: new Set(this.sets.backfill),
    };
  }
}

function emptySets(): ToRetriggerOrBackfill {
  return { real_retrigger: new Set(), intermittent_retrigger: new Set(), backfill: new Set() };
}
