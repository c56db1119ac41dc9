import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import YAML from "yaml";
import type { DecisionConfig, EvidenceConfig, PushTriageConfig, ThresholdsConfig } from "../types/config.js";

const CONFIG_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../config");

export const DEFAULT_CONFIG: PushTriageConfig = {
  schema_version: "1.0.0",
  log_level: "info",
  thresholds: { high_confidence: 0.8 },
  decision: {
    new_failure_tags: ["new failure not classified"],
    inconsistent_hold_requires_regression: false,
    known_consistent_without_evidence: "intermittent",
    excluded_groups: [],
  },
  evidence: {
    cache_artifact_url: "https://ci.example.org/api/queue/v1/task/{decision_task_id}/artifacts/public/push-schedules.json",
    prediction_service_url: "https://predict.example.org/push/{branch}/{rev}/schedules",
    retry_interval_ms: 10_000,
    retry_timeout_ms: 1_800_000,
    request_timeout_ms: 30_000,
    max_attempts: 3,
  },
};

type RawConfig = Record<string, unknown>;

function isRecord(value: unknown): value is RawConfig {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Deep merge two plain objects. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
function deepMerge(base: RawConfig, override: RawConfig): RawConfig {
  const result: RawConfig = { ...base };
  for (const [key, val] of Object.entries(override)) {
    const prev = result[key];
    if (isRecord(val)) {
      result[key] = deepMerge(isRecord(prev) ? prev : {}, val);
    } else if (val !== undefined) {
      result[key] = val;
    }
  }
  return result;
}

/** Load a YAML file and return parsed object, or empty object if not found. */
function loadYaml(filePath: string): RawConfig {
  if (!fs.existsSync(filePath)) return {};
  const parsed: unknown = YAML.parse(fs.readFileSync(filePath, "utf8"));
  return isRecord(parsed) ? parsed : {};
}

/** Apply PUSHTRIAGE_ prefixed environment variable overrides to top-level keys. */
function applyEnvOverrides(config: RawConfig): RawConfig {
  const prefix = "PUSHTRIAGE_";
  const result = { ...config };
  for (const [key, value] of Object.entries(process.env)) {
    if (!key.startsWith(prefix) || value === undefined) continue;
    // PUSHTRIAGE_LOG_LEVEL → log_level
    result[key.slice(prefix.length).toLowerCase()] = value;
  }
  return result;
}

function pickString(raw: RawConfig, key: string, fallback: string): string {
  const v = raw[key];
  return typeof v === "string" ? v : fallback;
}

function pickNumber(raw: RawConfig, key: string, fallback: number): number {
  const v = raw[key];
  if (typeof v === "number") return v;
  if (typeof v === "string" && v.trim() !== "" && Number.isFinite(Number(v))) return Number(v);
  return fallback;
}

function pickBoolean(raw: RawConfig, key: string, fallback: boolean): boolean {
  const v = raw[key];
  return typeof v === "boolean" ? v : fallback;
}

function pickStrings(raw: RawConfig, key: string, fallback: string[]): string[] {
  const v = raw[key];
  return Array.isArray(v) ? v.filter((s): s is string => typeof s === "string") : fallback;
}

function section(raw: RawConfig, key: string): RawConfig {
  const v = raw[key];
  return isRecord(v) ? v : {};
}

/** Normalize a merged raw config into typed config, filling defaults. */
export function normalizeConfig(raw: RawConfig): PushTriageConfig {
  const d = DEFAULT_CONFIG;
  const t = section(raw, "thresholds");
  const dec = section(raw, "decision");
  const ev = section(raw, "evidence");

  const thresholds: ThresholdsConfig = {
    high_confidence: pickNumber(t, "high_confidence", d.thresholds.high_confidence),
  };

  const knownConsistent = dec.known_consistent_without_evidence;
  const decision: DecisionConfig = {
    new_failure_tags: pickStrings(dec, "new_failure_tags", d.decision.new_failure_tags),
    inconsistent_hold_requires_regression: pickBoolean(
      dec,
      "inconsistent_hold_requires_regression",
      d.decision.inconsistent_hold_requires_regression,
    ),
    known_consistent_without_evidence:
      knownConsistent === "unknown" || knownConsistent === "intermittent"
        ? knownConsistent
        : d.decision.known_consistent_without_evidence,
    excluded_groups: pickStrings(dec, "excluded_groups", d.decision.excluded_groups),
  };

  const evidence: EvidenceConfig = {
    cache_artifact_url: pickString(ev, "cache_artifact_url", d.evidence.cache_artifact_url),
    prediction_service_url: pickString(ev, "prediction_service_url", d.evidence.prediction_service_url),
    retry_interval_ms: pickNumber(ev, "retry_interval_ms", d.evidence.retry_interval_ms),
    retry_timeout_ms: pickNumber(ev, "retry_timeout_ms", d.evidence.retry_timeout_ms),
    request_timeout_ms: pickNumber(ev, "request_timeout_ms", d.evidence.request_timeout_ms),
    max_attempts: pickNumber(ev, "max_attempts", d.evidence.max_attempts),
  };

  return {
    schema_version: pickString(raw, "schema_version", d.schema_version),
    log_level: pickString(raw, "log_level", d.log_level),
    thresholds,
    decision,
    evidence,
  };
}

/**
 * Load the raw layered config: base.yaml ← {envName}.yaml ← environment variables.
 * Exposed separately so `validate` can check what the files actually say.
 */
export function loadRawConfig(envName?: string, configDir?: string): RawConfig {
  const dir = configDir ?? CONFIG_DIR;

  // Layer 1: base.yaml
  let merged = loadYaml(path.join(dir, "base.yaml"));

  // Layer 2: environment-specific override
  if (envName) {
    merged = deepMerge(merged, loadYaml(path.join(dir, `${envName}.yaml`)));
  }

  // Layer 3: environment variables
  return applyEnvOverrides(merged);
}

/**
 * Load layered config and normalize it.
 *
 * @param envName - Optional environment name (e.g., "staging").
 *                  Loads `config/{envName}.yaml` as override layer.
 * @param configDir - Optional config directory path override.
 */
export function loadConfig(envName?: string, configDir?: string): PushTriageConfig {
  return normalizeConfig(loadRawConfig(envName, configDir));
}
