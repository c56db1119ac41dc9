import { sharedAjv, type AjvValidateFn } from "../schema/ajv.js";

/** Config schema. Checks the raw layered config before normalization fills defaults. */
const CONFIG_SCHEMA = {
  type: "object",
  required: ["schema_version"],
  properties: {
    schema_version: { type: "string", minLength: 1 },
    log_level: { type: "string", enum: ["fatal", "error", "warn", "info", "debug", "trace", "silent"] },
    thresholds: {
      type: "object",
      properties: {
        high_confidence: { type: "number", minimum: 0, maximum: 1 },
      },
    },
    decision: {
      type: "object",
      properties: {
        new_failure_tags: { type: "array", items: { type: "string", minLength: 1 } },
        inconsistent_hold_requires_regression: { type: "boolean" },
        known_consistent_without_evidence: { type: "string", enum: ["intermittent", "unknown"] },
        excluded_groups: { type: "array", items: { type: "string", minLength: 1 } },
      },
    },
    evidence: {
      type: "object",
      properties: {
        cache_artifact_url: { type: "string", minLength: 1 },
        prediction_service_url: { type: "string", minLength: 1 },
        retry_interval_ms: { type: "integer", minimum: 1 },
        retry_timeout_ms: { type: "integer", minimum: 1 },
        request_timeout_ms: { type: "integer", minimum: 1 },
        max_attempts: { type: "integer", minimum: 1 },
      },
    },
  },
};

export type ConfigValidationResult = {
  valid: boolean;
  errors: string | null;
};

let compiled: AjvValidateFn | null = null;

/** Validate a raw (un-normalized) config against the config schema. */
export async function validateConfig(config: unknown): Promise<ConfigValidationResult> {
  const ajv = await sharedAjv();
  const validate = (compiled ??= ajv.compile(CONFIG_SCHEMA));
  const valid = validate(config);
  return {
    valid,
    errors: valid ? null : ajv.errorsText(validate.errors),
  };
}
