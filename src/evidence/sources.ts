import type { Logger } from "pino";
import { SourceUnavailableError, SourcesNotFoundError } from "../errors.js";
import type { Push } from "../types/push.js";

export type SourceOutcome<T> = { status: "found"; data: T } | { status: "missing"; reason: string };

export type PushIdentity = Pick<Push, "rev" | "branch" | "decisionTaskId">;

export interface EvidenceSource<T> {
  readonly name: string;
  fetch(push: PushIdentity): Promise<SourceOutcome<T>>;
}

/**
 * Ordered list of sources for one capability; the first source that finds the
 * data wins. A source that misses or is unavailable hands over to the next one.
 * Any other error (a timeout, a programming error) propagates as is.
 */
export class EvidenceChain<T> {
  constructor(
    readonly capability: string,
    private readonly sources: EvidenceSource<T>[],
    private readonly logger: Logger,
  ) {}

  async fetch(push: PushIdentity): Promise<T> {
    for (const source of this.sources) {
      const log = this.logger.child({ source: source.name, rev: push.rev });
      try {
        const outcome = await source.fetch(push);
        if (outcome.status === "found") {
          log.debug("evidence source hit");
          return outcome.data;
        }
        log.debug({ reason: outcome.reason }, "evidence source miss");
      } catch (err) {
        if (!(err instanceof SourceUnavailableError)) throw err;
        log.warn({ attempts: err.attempts }, "evidence source unavailable");
      }
    }
    throw new SourcesNotFoundError(this.capability);
  }
}
