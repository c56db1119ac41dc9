import fs from "node:fs";
import path from "node:path";
import type { Logger } from "pino";
import { RegressionClassifier } from "../classify/engine.js";
import { normalizeConfig, loadRawConfig } from "../config/loader.js";
import { validateConfig } from "../config/validator.js";
import { isPushTriageError } from "../errors.js";
import { createSelectionChain } from "../evidence/index.js";
import type { HttpGet } from "../evidence/http.js";
import type { Sleep } from "../evidence/retry.js";
import { createLogger } from "../lib/logger.js";
import { DEFAULT_CONSISTENT_FAILURES_COUNTS } from "../push/group-summary.js";
import { loadPushSnapshot } from "../push/snapshot.js";
import { buildClassificationReport } from "../report/report-builder.js";
import { defaultRegistry } from "../schema/registry.js";
import type { ClassifyOptions } from "../types/classification.js";
import type { ClassificationReport } from "../types/report.js";

export type ClassifyCommandOptions = {
  snapshotPath: string;
  configDir?: string;
  envName?: string;
  unknownFromRegressions?: boolean;
  considerChildrenPushesConfigs?: boolean;
  minConfigs?: number;
  minFailures?: number;
  /** Ask the evidence sources when the snapshot embeds no selection data. */
  fetchEvidence?: boolean;
  outPath?: string;
  logger?: Logger;
  get?: HttpGet;
  sleep?: Sleep;
};

export type ClassifyCommandResult =
  | { ok: true; report: ClassificationReport; outPath?: string }
  | { ok: false; error: { code: string; message: string } };

function positiveInt(value: number | undefined, flag: string): string | null {
  if (value === undefined) return null;
  return Number.isInteger(value) && value >= 1 ? null : `${flag} must be a positive integer (got ${value})`;
}

function classifyOptions(opts: ClassifyCommandOptions): ClassifyOptions {
  const options: ClassifyOptions = {
    unknownFromRegressions: opts.unknownFromRegressions ?? true,
    considerChildrenPushesConfigs: opts.considerChildrenPushesConfigs ?? true,
  };
  if (opts.minConfigs !== undefined || opts.minFailures !== undefined) {
    options.consistentFailuresCounts = {
      configurations: opts.minConfigs ?? DEFAULT_CONSISTENT_FAILURES_COUNTS.configurations,
      failures: opts.minFailures ?? DEFAULT_CONSISTENT_FAILURES_COUNTS.failures,
    };
  }
  return options;
}

/**
 * Classify one push snapshot: load config, load the push, run the engine and
 * build the report. Errors come back as a result object; the CLI owns exit codes.
 */
export async function classifyCommand(opts: ClassifyCommandOptions): Promise<ClassifyCommandResult> {
  const argError = positiveInt(opts.minConfigs, "--min-configs") ?? positiveInt(opts.minFailures, "--min-failures");
  if (argError) return { ok: false, error: { code: "INVALID_ARGS", message: argError } };

  try {
    const raw = loadRawConfig(opts.envName, opts.configDir);
    const check = await validateConfig(raw);
    if (!check.valid) {
      return { ok: false, error: { code: "CONFIG_INVALID", message: `Config invalid: ${check.errors ?? "unknown error"}` } };
    }
    const config = normalizeConfig(raw);
    const logger = opts.logger ?? createLogger(config.log_level);

    const registry = await defaultRegistry();
    const chain = opts.fetchEvidence
      ? createSelectionChain(config.evidence, { logger, get: opts.get, sleep: opts.sleep })
      : undefined;
    const push = await loadPushSnapshot(opts.snapshotPath, { chain, registry, logger });

    const classifier = new RegressionClassifier({
      thresholds: config.thresholds,
      decision: config.decision,
      logger,
    });
    const options = classifyOptions(opts);
    const evaluation = await classifier.evaluate(push, options);
    const report = buildClassificationReport({ push, evaluation, options });

    const reportCheck = registry.validate("classification-report", report);
    if (!reportCheck.valid) {
      return { ok: false, error: { code: "REPORT_INVALID", message: `Report failed its schema: ${reportCheck.errors ?? ""}` } };
    }

    if (opts.outPath) {
      const outPath = path.resolve(opts.outPath);
      fs.mkdirSync(path.dirname(outPath), { recursive: true });
      fs.writeFileSync(outPath, JSON.stringify(report, null, 2) + "\n", "utf8");
      return { ok: true, report, outPath };
    }
    return { ok: true, report };
  } catch (e) {
    if (isPushTriageError(e)) return { ok: false, error: { code: e.code, message: e.message } };
    return { ok: false, error: { code: "INTERNAL", message: e instanceof Error ? e.message : String(e) } };
  }
}
