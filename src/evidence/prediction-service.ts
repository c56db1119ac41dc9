import type { Logger } from "pino";
import { PredictionServiceTimeoutError, SourceUnavailableError } from "../errors.js";
import type { TestSelectionData } from "../types/push.js";
import { expandUrl, type HttpGet } from "./http.js";
import {
  RetryExhaustedError,
  RetryTimeoutError,
  retryUntil,
  type AttemptOutcome,
  type RetryPolicy,
  type Sleep,
} from "./retry.js";
import { parseTestSelectionData } from "./selection-data.js";
import type { EvidenceSource, PushIdentity, SourceOutcome } from "./sources.js";

/**
 * Live prediction service. `202` means the service is still computing the
 * schedule for the push; `404`, `5xx` and network errors are transient.
 */
export class PredictionServiceSource implements EvidenceSource<TestSelectionData> {
  readonly name = "prediction-service";

  constructor(
    private readonly urlTemplate: string,
    private readonly policy: RetryPolicy,
    private readonly get: HttpGet,
    private readonly logger: Logger,
    private readonly sleep?: Sleep,
  ) {}

  async fetch(push: PushIdentity): Promise<SourceOutcome<TestSelectionData>> {
    const url = expandUrl(this.urlTemplate, { rev: push.rev, branch: push.branch });

    try {
      const data = await retryUntil((n) => this.attempt(url, n), this.policy, {
        sleep: this.sleep,
        onRetry: ({ attempt, reason, waitedMs }) =>
          this.logger.info({ url, attempt, reason, waitedMs }, "prediction service retry"),
      });
      return { status: "found", data };
    } catch (err) {
      if (err instanceof RetryTimeoutError) throw new PredictionServiceTimeoutError(err.waitedMs);
      if (err instanceof RetryExhaustedError) throw new SourceUnavailableError(this.name, err.attempts, err.lastError);
      throw err;
    }
  }

  private async attempt(url: string, n: number): Promise<AttemptOutcome<TestSelectionData>> {
    let status: number;
    let body: unknown;
    try {
      const res = await this.get(url);
      status = res.status;
      if (status === 202) return { kind: "pending" };
      if (status !== 200) return { kind: "transient", error: new Error(`HTTP ${status}`) };
      body = await res.json();
    } catch (err) {
      return { kind: "transient", error: err };
    }

    const data = parseTestSelectionData(body);
    if (!data) {
      this.logger.warn({ url, attempt: n }, "prediction service returned a malformed body");
      return { kind: "transient", error: new Error("malformed body") };
    }
    return { kind: "done", value: data };
  }
}
