import type { Logger } from "pino";
import type { EvidenceConfig } from "../types/config.js";
import type { TestSelectionData } from "../types/push.js";
import { ArtifactCacheSource } from "./artifact-cache.js";
import { fetchGet, withRequestTimeout, type HttpGet } from "./http.js";
import { PredictionServiceSource } from "./prediction-service.js";
import type { Sleep } from "./retry.js";
import { EvidenceChain } from "./sources.js";

export const TEST_SELECTION_CAPABILITY = "push_test_selection_data";

export type SelectionChainDeps = {
  logger: Logger;
  get?: HttpGet;
  sleep?: Sleep;
};

/** Cached decision-task artifact first, then the live prediction service. */
export function createSelectionChain(
  config: EvidenceConfig,
  deps: SelectionChainDeps,
): EvidenceChain<TestSelectionData> {
  const get = withRequestTimeout(deps.get ?? fetchGet, config.request_timeout_ms);
  return new EvidenceChain(
    TEST_SELECTION_CAPABILITY,
    [
      new ArtifactCacheSource(config.cache_artifact_url, get, deps.logger),
      new PredictionServiceSource(
        config.prediction_service_url,
        {
          maxAttempts: config.max_attempts,
          intervalMs: config.retry_interval_ms,
          timeoutMs: config.retry_timeout_ms,
        },
        get,
        deps.logger,
        deps.sleep,
      ),
    ],
    deps.logger,
  );
}

export { EvidenceChain } from "./sources.js";
export type { EvidenceSource, SourceOutcome, PushIdentity } from "./sources.js";
