import type { Logger } from "pino";
import type { TestSelectionData } from "../types/push.js";
import { expandUrl, type HttpGet } from "./http.js";
import { parseTestSelectionData } from "./selection-data.js";
import type { EvidenceSource, PushIdentity, SourceOutcome } from "./sources.js";

/**
 * Selection data previously published as an artifact of the push's decision
 * task. A miss is expected (the artifact is only written for some pushes) and
 * never an error.
 */
export class ArtifactCacheSource implements EvidenceSource<TestSelectionData> {
  readonly name = "artifact-cache";

  constructor(
    private readonly urlTemplate: string,
    private readonly get: HttpGet,
    private readonly logger: Logger,
  ) {}

  async fetch(push: PushIdentity): Promise<SourceOutcome<TestSelectionData>> {
    if (!push.decisionTaskId) {
      return { status: "missing", reason: "push has no decision task" };
    }

    const url = expandUrl(this.urlTemplate, {
      decision_task_id: push.decisionTaskId,
      rev: push.rev,
      branch: push.branch,
    });

    let status: number;
    let body: unknown;
    try {
      const res = await this.get(url);
      status = res.status;
      if (status !== 200) {
        return { status: "missing", reason: `HTTP ${status}` };
      }
      body = await res.json();
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.warn({ url, err: message }, "cached selection artifact unreachable");
      return { status: "missing", reason: message };
    }

    const data = parseTestSelectionData(body);
    if (!data) {
      this.logger.warn({ url }, "cached selection artifact is malformed");
      return { status: "missing", reason: "malformed artifact" };
    }
    return { status: "found", data };
  }
}
