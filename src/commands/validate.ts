import fs from "node:fs";
import path from "node:path";
import { loadRawConfig } from "../config/loader.js";
import { validateConfig } from "../config/validator.js";
import { isPushTriageError } from "../errors.js";
import { loadPushSnapshot } from "../push/snapshot.js";
import { defaultRegistry } from "../schema/registry.js";

export type Diagnostic = {
  level: "error" | "warn" | "info";
  code: string;
  message: string;
  path?: string;
};

export type ValidateResult = { ok: true; warnings: Diagnostic[] } | { ok: false; errors: Diagnostic[] };

function diag(level: Diagnostic["level"], code: string, message: string, filePath?: string): Diagnostic {
  return filePath === undefined ? { level, code, message } : { level, code, message, path: filePath };
}

/**
 * Validate the layered config and, optionally, push snapshots (schema, task
 * reports, children and parent references).
 */
export async function validateAll(opts: {
  configDir: string;
  envName?: string;
  snapshots?: string[];
}): Promise<ValidateResult> {
  const errors: Diagnostic[] = [];
  const configDir = path.resolve(opts.configDir);

  if (!fs.existsSync(configDir)) {
    return { ok: false, errors: [diag("error", "CONFIG_DIR_MISSING", `Config directory not found: ${configDir}`)] };
  }

  const basePath = path.join(configDir, "base.yaml");
  if (!fs.existsSync(basePath)) {
    errors.push(diag("error", "CONFIG_BASE_MISSING", `Missing base config: ${basePath}`, basePath));
  }
  if (opts.envName) {
    const envPath = path.join(configDir, `${opts.envName}.yaml`);
    if (!fs.existsSync(envPath)) {
      errors.push(diag("warn", "CONFIG_ENV_MISSING", `No override for environment '${opts.envName}': ${envPath}`, envPath));
    }
  }

  try {
    const check = await validateConfig(loadRawConfig(opts.envName, configDir));
    if (!check.valid) {
      errors.push(diag("error", "CONFIG_INVALID", `Config invalid: ${check.errors ?? "unknown error"}`, configDir));
    }
  } catch (e) {
    errors.push(
      diag("error", "CONFIG_READ_FAILED", `Failed to read config: ${e instanceof Error ? e.message : String(e)}`, configDir),
    );
  }

  if (opts.snapshots && opts.snapshots.length > 0) {
    const registry = await defaultRegistry();
    for (const snapshot of opts.snapshots) {
      try {
        await loadPushSnapshot(snapshot, { registry });
      } catch (e) {
        if (!isPushTriageError(e)) throw e;
        errors.push(diag("error", e.code, e.message, path.resolve(snapshot)));
      }
    }
  }

  if (errors.some((d) => d.level === "error")) return { ok: false, errors };
  return { ok: true, warnings: errors };
}
